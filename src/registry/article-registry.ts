import { isPublished, type Article } from '../types/index.js';
import { shouldReplace, type VersionMediator } from '../mediator/version-mediator.js';
import { compareStrings, insertSorted, insertSortedUnique } from '../utils/sorted.js';

/**
 * Articles by DOI. A DOI holds every registered revision, ascending by
 * version; revisions with equal versions keep arrival order.
 */
export class ArticleRegistry {
    private readonly versions = new Map<string, Article[]>();
    private readonly published: string[] = [];

    constructor(private readonly mediator: VersionMediator) {}

    /**
     * Add a revision. A real pub DOI also lands in the published set and is
     * handed to the version mediator.
     */
    register(article: Article): Article {
        let list = this.versions.get(article.doi);
        if (!list) {
            list = [];
            this.versions.set(article.doi, list);
        }
        insertSorted(list, article, (a, b) => a.version - b.version);

        if (isPublished(article.pubDoi)) {
            insertSortedUnique(this.published, article.pubDoi, compareStrings);
            this.mediator.add(article.pubDoi, article);
        }
        return article;
    }

    /**
     * Offer a revision whose DOI and version may already be registered, as
     * when a page is served twice. The stored revision for that version is
     * swapped for `article` only when `shouldReplace` ranks it ahead; an
     * unknown version is registered as usual.
     * @returns the revision kept for that version
     */
    reconcile(article: Article): Article {
        const list = this.versions.get(article.doi);
        const index = list ? list.findIndex((stored) => stored.version === article.version) : -1;
        const stored = list?.[index];
        if (!list || !stored) return this.register(article);
        if (!shouldReplace(stored, article)) return stored;

        list[index] = article;
        if (isPublished(article.pubDoi)) {
            insertSortedUnique(this.published, article.pubDoi, compareStrings);
            this.mediator.add(article.pubDoi, article);
        }
        return article;
    }

    /**
     * Earliest known revision.
     */
    get(doi: string): Article | undefined {
        return this.versions.get(doi)?.[0];
    }

    getAllVersions(doi: string): readonly Article[] {
        return this.versions.get(doi) ?? [];
    }

    has(doi: string): boolean {
        return this.versions.has(doi);
    }

    /** Number of distinct DOIs */
    get size(): number {
        return this.versions.size;
    }

    /**
     * Every revision of every DOI, grouped by DOI.
     */
    values(): Article[] {
        return [...this.versions.values()].flat();
    }

    /**
     * Sorted pub DOIs seen on any registered revision.
     */
    publishedDois(): string[] {
        return [...this.published];
    }
}
