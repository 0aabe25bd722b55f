/**
 * Shared utilities for source adapters.
 */

/**
 * Strip DOI prefix URLs to get just the DOI identifier.
 * "https://doi.org/10.1101/123456" → "10.1101/123456"
 */
export function stripDoiPrefix(doi: string | null | undefined): string | null {
    if (!doi) return null;
    return doi
        .trim()
        .replace(/^https?:\/\/(dx\.)?doi\.org\//i, '')
        .replace(/^doi:/i, '')
        .trim() || null;
}

/**
 * Whether a string looks like a bare DOI ("10.<registrant>/<suffix>").
 */
export function isDoi(value: string): boolean {
    return /^10\.\d{4,9}\/\S+$/.test(value);
}

/**
 * Interval bounds accepted by the details endpoint.
 */
export function isIsoDate(value: string): boolean {
    return /^\d{4}-\d{2}-\d{2}$/.test(value) && !Number.isNaN(Date.parse(`${value}T00:00:00Z`));
}

/**
 * Read a string field off an untyped JSON object; null when absent or not text.
 */
export function readString(source: unknown, key: string): string | null {
    if (typeof source !== 'object' || source === null || !(key in source)) return null;
    const value: unknown = Reflect.get(source, key);
    return typeof value === 'string' ? value : null;
}
