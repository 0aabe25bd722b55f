import type { Article, ArticleFields, Author, Journal, Publication } from '../types/index.js';
import type { Registries } from '../registry/registries.js';
import { buildArticle, buildAuthor, buildJournal, buildPublication } from '../registry/entity-factory.js';
import { compareStrings } from '../utils/sorted.js';

// ─── Entity construction ─────────────────────────────────────

/**
 * Register an article revision. A revision with a real publication DOI is
 * also handed to the version mediator.
 */
export function createArticle(registries: Registries, fields: ArticleFields): Article {
    return buildArticle(registries, fields);
}

export function createJournal(registries: Registries, name: string): Journal {
    return buildJournal(registries, name);
}

/**
 * Intern the publication of `article` in `journal`, keyed by the article's pub DOI.
 */
export function createPublication(registries: Registries, journal: Journal, article: Article): Publication {
    return buildPublication(registries, journal, article);
}

/**
 * Preprint DOIs whose publication has no version 1 on record yet, sorted.
 * Each is the DOI of the earliest stored revision for that publication.
 */
export function getMissingInitialVersionDois(registries: Registries): string[] {
    const { versions } = registries.mediators;
    const dois = new Set<string>();
    for (const pubDoi of versions.missingInitialVersionKeys()) {
        const doi = versions.convertGroupKeyToCanonicalDoi(pubDoi);
        if (doi) dois.add(doi);
    }
    return [...dois].sort(compareStrings);
}

// ─── Authors ─────────────────────────────────────────────────

export function splitAuthors(authors: string): string[] {
    return authors
        .split(';')
        .map((name) => name.trim())
        .filter((name) => name.length > 0);
}

/**
 * Fill the author detail fields of an article from the author registry.
 */
export function resolveAuthors(registries: Registries, article: Article): Author[] {
    const authors = splitAuthors(article.authors).map((name) => buildAuthor(registries, name));
    article.authorsDetail = authors;

    const corresponding = article.corrAuthors.trim();
    article.corrAuthorsDetail = corresponding ? buildAuthor(registries, corresponding) : null;
    return authors;
}

// ─── Institutions ────────────────────────────────────────────

const DEPARTMENT_PREFIXES = ['DEPARTMENT', 'DEPT', 'DIVISION', 'SCHOOL', 'FACULTY'];

/**
 * Department named inside an institution string, e.g.
 * "DEPARTMENT OF BIOLOGY, EXAMPLE UNIVERSITY" -> "DEPARTMENT OF BIOLOGY".
 */
export function departmentOf(institution: string): string | null {
    for (const segment of institution.split(',')) {
        const part = segment.trim().toUpperCase();
        if (DEPARTMENT_PREFIXES.some((prefix) => part.startsWith(prefix))) {
            return part;
        }
    }
    return null;
}
