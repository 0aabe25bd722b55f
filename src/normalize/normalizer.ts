import { SchemaError } from '../utils/errors.js';

/**
 * A normalized record: its position (plus page offset) followed by one value per key.
 */
export type RawRow = [index: number, ...values: unknown[]];

/**
 * Read `key` from a record. Absent keys are a schema violation, not a default.
 */
export function getValue(record: unknown, key: string): unknown {
    if (typeof record !== 'object' || record === null || Array.isArray(record)) {
        throw new SchemaError(`Expected a record object while reading "${key}"`, key);
    }
    if (!Object.prototype.hasOwnProperty.call(record, key)) {
        throw new SchemaError(`Record is missing key "${key}"`, key);
    }
    return Reflect.get(record, key);
}

/**
 * Turn `payload[section]` into rows of `[index + offset, record[key1], record[key2], ...]`,
 * keeping the input order.
 */
export function normalize(
    payload: unknown,
    section: string,
    keys: readonly string[],
    offset: number
): RawRow[] {
    const records = getValue(payload, section);
    if (!Array.isArray(records)) {
        throw new SchemaError(`Section "${section}" is not a list`, section);
    }

    return records.map((record: unknown, index): RawRow => [
        index + offset,
        ...keys.map((key) => getValue(record, key)),
    ]);
}
