import { SchemaError } from '../utils/errors.js';
import type { RawRow } from './normalizer.js';

/**
 * Column-oriented table indexed by row label (the row number as a string).
 *
 * Column rewrites are all-or-nothing: `mapColumn` computes the new column
 * first and only then swaps it in, so a failing coercion leaves it untouched.
 */
export class Table {
    private readonly data = new Map<string, unknown[]>();
    private readonly positions = new Map<string, number>();

    constructor(readonly index: readonly string[]) {
        index.forEach((label, position) => this.positions.set(label, position));
    }

    get columns(): string[] {
        return [...this.data.keys()];
    }

    get rowCount(): number {
        return this.index.length;
    }

    hasColumn(name: string): boolean {
        return this.data.has(name);
    }

    column(name: string): readonly unknown[] {
        const values = this.data.get(name);
        if (!values) throw new SchemaError(`Unknown column "${name}"`, name);
        return values;
    }

    setColumn(name: string, values: unknown[]): void {
        if (values.length !== this.index.length) {
            throw new SchemaError(
                `Column "${name}" has ${values.length} values for ${this.index.length} rows`,
                name
            );
        }
        this.data.set(name, values);
    }

    mapColumn(name: string, fn: (value: unknown) => unknown): void {
        this.setColumn(name, this.column(name).map(fn));
    }

    get(label: string, name: string): unknown {
        const position = this.positions.get(label);
        if (position === undefined) throw new SchemaError(`Unknown row "${label}"`);
        return this.column(name)[position];
    }

    /**
     * Rows as plain objects, in index order.
     */
    toRecords(): Array<Record<string, unknown>> {
        return this.index.map((label) => {
            const record: Record<string, unknown> = {};
            for (const name of this.data.keys()) {
                record[name] = this.get(label, name);
            }
            return record;
        });
    }
}

/**
 * Materialize normalized rows: the first cell becomes the row label, the rest
 * fill `columnNames` in order.
 */
export function createTable(rows: readonly RawRow[], columnNames: readonly string[]): Table {
    const table = new Table(rows.map((row) => String(row[0])));

    columnNames.forEach((name, position) => {
        table.setColumn(
            name,
            rows.map((row) => {
                if (row.length !== columnNames.length + 1) {
                    throw new SchemaError(
                        `Row ${row[0]} has ${row.length - 1} values for ${columnNames.length} columns`
                    );
                }
                return row[position + 1];
            })
        );
    });

    return table;
}
