import type { ArticleFields } from '../types/index.js';
import { SchemaError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import type { Table } from './table.js';

/**
 * Column names of an article table, in the order the details API keys map onto them.
 */
export const ARTICLE_COLUMNS = [
    'DOI',
    'Title',
    'Authors',
    'Corresponding_Authors',
    'Institution',
    'Date',
    'Version',
    'Type',
    'Category',
    'Xml',
    'Published',
] as const;

/** Derived by `tabularize` from the Authors column */
export const AUTHOR_COUNT_COLUMN = 'Num_of_Authors';

/**
 * Parse a `YYYY-MM-DD` date. Anything from the first `:` on is dropped first.
 * @returns the UTC midnight of that day, or `null` (not-a-time) when unparseable
 */
export function parseDate(value: string): Date | null {
    const head = value.trim().split(':')[0] ?? '';
    const match = /^(\d{4})-(\d{1,2})-(\d{1,2})$/.exec(head);

    if (match) {
        const year = Number(match[1]);
        const month = Number(match[2]);
        const day = Number(match[3]);
        const date = new Date(Date.UTC(year, month - 1, day));
        if (date.getUTCFullYear() === year && date.getUTCMonth() === month - 1 && date.getUTCDate() === day) {
            return date;
        }
    }

    getLogger('tabularize').warn({ value }, 'Unparseable date, storing not-a-time');
    return null;
}

/**
 * Upper-case the first letter of every word and lower-case the rest.
 */
export function titleCase(value: string): string {
    return value
        .toLowerCase()
        .replace(/(^|[^a-z])([a-z])/g, (_match, boundary: string, letter: string) => boundary + letter.toUpperCase());
}

function toText(value: unknown): string {
    if (typeof value === 'string') return value;
    if (typeof value === 'number' || typeof value === 'boolean') return String(value);
    throw new SchemaError(`Cannot convert ${value === null ? 'null' : typeof value} to text`);
}

function toInteger(value: unknown): number {
    if (typeof value === 'number' && Number.isInteger(value)) return value;
    if (typeof value === 'string' && /^\s*-?\d+\s*$/.test(value)) return Number.parseInt(value, 10);
    throw new SchemaError(`Cannot convert ${JSON.stringify(value)} to an integer`);
}

/**
 * Number of non-empty `;`-separated entries in an author list.
 */
export function countAuthors(authors: string): number {
    return authors.split(';').filter((part) => part.trim().length > 0).length;
}

type Coercion = [label: string, apply: (table: Table) => void];

const COERCIONS: Coercion[] = [
    [AUTHOR_COUNT_COLUMN, (t) => t.setColumn(AUTHOR_COUNT_COLUMN, t.column('Authors').map((v) => countAuthors(toText(v))))],
    ['DOI', (t) => t.mapColumn('DOI', toText)],
    ['Title', (t) => t.mapColumn('Title', (v) => toText(v).trim())],
    ['Authors', (t) => t.mapColumn('Authors', (v) => toText(v).trim())],
    ['Corresponding_Authors', (t) => t.mapColumn('Corresponding_Authors', (v) => toText(v).trim())],
    ['Institution', (t) => t.mapColumn('Institution', (v) => toText(v).trim().toUpperCase())],
    ['Date', (t) => t.mapColumn('Date', (v) => parseDate(toText(v)))],
    ['Version', (t) => t.mapColumn('Version', toInteger)],
    ['Type', (t) => t.mapColumn('Type', (v) => toText(v).trim().toLowerCase())],
    ['Category', (t) => t.mapColumn('Category', (v) => titleCase(toText(v).trim()))],
    ['Xml', (t) => t.mapColumn('Xml', toText)],
    ['Published', (t) => t.mapColumn('Published', toText)],
];

/**
 * Apply the article column coercions in place, stopping at the first one
 * that fails.
 * @returns the column whose coercion failed, or null when every column converted
 */
export function convertColumns(table: Table): string | null {
    for (const [label, apply] of COERCIONS) {
        try {
            apply(table);
        } catch (error) {
            getLogger('tabularize').error({ column: label, error }, 'Error in data format, returning partially converted table');
            return label;
        }
    }
    return null;
}

/**
 * Apply the article column coercions in place and return the table.
 *
 * Best effort: the first coercion that fails is logged and the remaining
 * ones are skipped, leaving a partially transformed table.
 */
export function tabularize(table: Table): Table {
    convertColumns(table);
    return table;
}

function readString(table: Table, label: string, column: string): string {
    const value = table.get(label, column);
    if (typeof value !== 'string') {
        throw new SchemaError(`Row ${label}: column ${column} is not text`, column);
    }
    return value;
}

/**
 * Read one tabularized row as Article fields.
 * @throws SchemaError when a column was left unconverted or holds the wrong type
 */
export function rowToArticleFields(table: Table, label: string): ArticleFields {
    const date = table.get(label, 'Date');
    if (date !== null && !(date instanceof Date)) {
        throw new SchemaError(`Row ${label}: column Date was not converted`, 'Date');
    }

    const version = table.get(label, 'Version');
    if (typeof version !== 'number') {
        throw new SchemaError(`Row ${label}: column Version was not converted`, 'Version');
    }

    const numAuthors = table.hasColumn(AUTHOR_COUNT_COLUMN) ? table.get(label, AUTHOR_COUNT_COLUMN) : undefined;

    return {
        doi: readString(table, label, 'DOI'),
        title: readString(table, label, 'Title'),
        authors: readString(table, label, 'Authors'),
        numAuthors: typeof numAuthors === 'number' ? numAuthors : undefined,
        corrAuthors: readString(table, label, 'Corresponding_Authors'),
        institution: readString(table, label, 'Institution'),
        date,
        version,
        type: readString(table, label, 'Type'),
        category: splitCategories(readString(table, label, 'Category')),
        xml: readString(table, label, 'Xml'),
        pubDoi: readString(table, label, 'Published'),
    };
}

function splitCategories(value: string): string[] {
    return value
        .split(';')
        .map((part) => part.trim())
        .filter((part) => part.length > 0);
}
