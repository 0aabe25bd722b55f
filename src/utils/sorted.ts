/**
 * Helpers for keeping plain arrays ordered without re-sorting on every insert.
 */

export type Comparator<T> = (a: T, b: T) => number;

/**
 * Index at which `item` goes so that it lands after every element comparing equal.
 */
export function upperBound<T>(list: readonly T[], item: T, compare: Comparator<T>): number {
    let lo = 0;
    let hi = list.length;
    while (lo < hi) {
        const mid = (lo + hi) >>> 1;
        const probe = list[mid];
        if (probe !== undefined && compare(probe, item) <= 0) {
            lo = mid + 1;
        } else {
            hi = mid;
        }
    }
    return lo;
}

/**
 * Insert keeping `list` ordered; equal elements keep insertion order.
 */
export function insertSorted<T>(list: T[], item: T, compare: Comparator<T>): void {
    list.splice(upperBound(list, item, compare), 0, item);
}

/**
 * Insert unless an element comparing equal is already present.
 * @returns true when the item was added
 */
export function insertSortedUnique<T>(list: T[], item: T, compare: Comparator<T>): boolean {
    const index = upperBound(list, item, compare);
    const previous = list[index - 1];
    if (index > 0 && previous !== undefined && compare(previous, item) === 0) {
        return false;
    }
    list.splice(index, 0, item);
    return true;
}

export function compareStrings(a: string, b: string): number {
    if (a < b) return -1;
    if (a > b) return 1;
    return 0;
}
