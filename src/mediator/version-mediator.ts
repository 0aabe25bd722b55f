import type { Article } from '../types/index.js';
import { compareStrings, insertSortedUnique } from '../utils/sorted.js';

/**
 * Whether `incoming` should take over a version slot held by `stored`.
 * Only a strictly earlier submission date wins; a dated record counts as
 * earlier than an undated one, and equal or missing dates keep the stored record.
 */
export function shouldReplace(stored: Article, incoming: Article): boolean {
    if (incoming.version > stored.version) return false;
    if (incoming.date === null) return false;
    if (stored.date === null) return true;
    return incoming.date.getTime() < stored.date.getTime();
}

/**
 * Reconciles preprint revisions that share a publication DOI.
 *
 * Each pub DOI maps version number -> Article. A pub DOI with at least one
 * stored version but no version 1 is listed in the missing-initial-version set,
 * which drives supplemental fetches of the original preprint record.
 *
 * Every method is synchronous, so callers on the event loop never observe a
 * half-applied `add`.
 */
export class VersionMediator {
    private readonly groups = new Map<string, Map<number, Article>>();
    private readonly missing: string[] = [];

    add(pubDoi: string, article: Article): void {
        let versions = this.groups.get(pubDoi);
        if (!versions) {
            versions = new Map();
            this.groups.set(pubDoi, versions);
        }

        const stored = versions.get(article.version);
        if (!stored || shouldReplace(stored, article)) {
            versions.set(article.version, article);
        }

        this.updateMissing(pubDoi, versions);
    }

    has(pubDoi: string): boolean {
        return this.groups.has(pubDoi);
    }

    get size(): number {
        return this.groups.size;
    }

    /**
     * Stored versions of a pub DOI, ascending by version number.
     */
    getVersions(pubDoi: string): Article[] {
        const versions = this.groups.get(pubDoi);
        if (!versions) return [];
        return [...versions.entries()].sort(([a], [b]) => a - b).map(([, article]) => article);
    }

    /**
     * Lowest version number stored for the pub DOI, or undefined when none is.
     */
    firstStoredVersion(pubDoi: string): number | undefined {
        const versions = this.groups.get(pubDoi);
        if (!versions || versions.size === 0) return undefined;
        return Math.min(...versions.keys());
    }

    /**
     * Sorted snapshot of the pub DOIs still missing their version 1.
     */
    missingInitialVersionKeys(): string[] {
        return [...this.missing];
    }

    /**
     * Preprint DOI of the first stored version for a pub DOI.
     */
    convertGroupKeyToCanonicalDoi(pubDoi: string): string | undefined {
        const first = this.firstStoredVersion(pubDoi);
        if (first === undefined) return undefined;
        return this.groups.get(pubDoi)?.get(first)?.doi;
    }

    private updateMissing(pubDoi: string, versions: Map<number, Article>): void {
        const index = this.missing.indexOf(pubDoi);
        if (versions.has(1)) {
            if (index >= 0) this.missing.splice(index, 1);
        } else if (versions.size > 0) {
            insertSortedUnique(this.missing, pubDoi, compareStrings);
        }
    }
}
