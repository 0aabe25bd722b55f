/**
 * Entity kinds that the registries intern.
 * The set is closed: construction dispatches on this tag, never on a class name.
 */
export type EntityKind =
    | 'article'
    | 'journal'
    | 'institution'
    | 'department'
    | 'category'
    | 'author'
    | 'publication';

/**
 * Anything with a stable identifier. Mediator keys and graph nodes only need this.
 */
export interface Identifiable {
    readonly id: string;
}

/** Sentinel stored in `pubDoi` while a preprint has no published version. */
export const UNPUBLISHED = 'NA';

/**
 * A named grouping entity (institution, department, category).
 * Used as a mediator key when building the cross-reference graph.
 */
export interface MediatorKey extends Identifiable {
    readonly kind: 'institution' | 'department' | 'category';
    readonly name: string;
}

export interface Institution extends MediatorKey {
    readonly kind: 'institution';
}

export interface Department extends MediatorKey {
    readonly kind: 'department';
}

export interface Category extends MediatorKey {
    readonly kind: 'category';
}

export interface Author extends Identifiable {
    readonly kind: 'author';
    readonly name: string;
}

/**
 * One preprint revision. Several Article objects may share a DOI,
 * one per version.
 */
export interface Article extends Identifiable {
    readonly kind: 'article';
    /** Same as `doi`; articles are interned by DOI. */
    readonly id: string;
    readonly doi: string;
    readonly title: string;
    /** Raw `;`-separated author list as served by the API */
    readonly authors: string;
    readonly numAuthors: number;
    readonly corrAuthors: string;
    readonly institution: string;
    /** Submission date; `null` is the not-a-time sentinel */
    readonly date: Date | null;
    /** Positive revision number */
    readonly version: number;
    readonly type: string;
    readonly category: string[];
    readonly xml: string;
    /** DOI of the peer-reviewed publication, or `UNPUBLISHED` */
    readonly pubDoi: string;

    authorsDetail: Author[] | null;
    corrAuthorsDetail: Author | null;
    publicationLink: string | null;
}

/**
 * Fields accepted when creating an Article. Detail fields are resolved later.
 */
export type ArticleFields = Omit<
    Article,
    'kind' | 'id' | 'numAuthors' | 'authorsDetail' | 'corrAuthorsDetail' | 'publicationLink'
> & {
    numAuthors?: number;
    publicationLink?: string | null;
};

export interface Journal extends Identifiable {
    readonly kind: 'journal';
    /** Same as `title`; journals are interned by title. */
    readonly id: string;
    readonly title: string;
    prefix: string | null;
    issn: string | null;
    impactFactor: number;
}

/**
 * An Article that appeared in a Journal. Identity is the article's pub DOI.
 */
export interface Publication extends Identifiable {
    readonly kind: 'publication';
    readonly id: string;
    readonly pubDoi: string;
    readonly name: string;
    readonly journal: Journal;
    readonly article: Article;
}

export type Entity = Article | Journal | Institution | Department | Category | Author | Publication;

/**
 * Kind of full-text link discovered for a published article.
 */
export type LinkType = 'xml' | 'pdf' | 'web';

/**
 * Whether a pub DOI value names a real publication.
 */
export function isPublished(pubDoi: string): boolean {
    const value = pubDoi.trim();
    return value.length > 0 && value.toUpperCase() !== UNPUBLISHED;
}
