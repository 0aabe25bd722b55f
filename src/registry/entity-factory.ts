import {
    isPublished,
    type Article,
    type ArticleFields,
    type Author,
    type Category,
    type Department,
    type Entity,
    type Institution,
    type Journal,
    type Publication,
} from '../types/index.js';
import { InvalidRequestError } from '../utils/errors.js';
import { countAuthors } from '../normalize/tabularize.js';
import type { Registries } from './registries.js';

/**
 * Closed set of construction requests, one variant per entity kind.
 */
export type EntityRequest =
    | { kind: 'article'; fields: ArticleFields }
    | { kind: 'journal'; title: string; prefix?: string | null; issn?: string | null; impactFactor?: number }
    | { kind: 'institution'; name: string }
    | { kind: 'department'; name: string }
    | { kind: 'category'; name: string }
    | { kind: 'author'; name: string }
    | { kind: 'publication'; journal: Journal; article: Article };

function requireName(kind: string, name: string): string {
    const id = name.trim();
    if (id.length === 0) {
        throw new InvalidRequestError(`A ${kind} needs a non-empty name`);
    }
    return id;
}

/**
 * Validate article fields and build a revision that is not registered yet.
 */
export function articleFromFields(fields: ArticleFields): Article {
    const doi = fields.doi.trim();
    if (doi.length === 0) {
        throw new InvalidRequestError('An article needs a non-empty DOI');
    }
    if (!Number.isInteger(fields.version) || fields.version < 1) {
        throw new InvalidRequestError(`Article ${doi} has invalid version ${fields.version}`);
    }

    const article: Article = {
        ...fields,
        kind: 'article',
        id: doi,
        doi,
        category: [...fields.category],
        numAuthors: fields.numAuthors ?? countAuthors(fields.authors),
        authorsDetail: null,
        corrAuthorsDetail: null,
        publicationLink: fields.publicationLink ?? null,
    };
    return article;
}

/**
 * Validate and register one article revision.
 */
export function buildArticle(registries: Registries, fields: ArticleFields): Article {
    return registries.articles.register(articleFromFields(fields));
}

export function buildJournal(
    registries: Registries,
    title: string,
    details: { prefix?: string | null; issn?: string | null; impactFactor?: number } = {}
): Journal {
    const id = requireName('journal', title);
    return registries.journals.createOrGet(id, () => ({
        kind: 'journal',
        id,
        title: id,
        prefix: details.prefix ?? null,
        issn: details.issn ?? null,
        impactFactor: details.impactFactor ?? 0.0,
    }));
}

export function buildPublication(registries: Registries, journal: Journal, article: Article): Publication {
    const pubDoi = article.pubDoi.trim();
    if (!isPublished(pubDoi)) {
        throw new InvalidRequestError(`Article ${article.doi} has no publication DOI`);
    }
    return registries.publications.createOrGet(pubDoi, () => ({
        kind: 'publication',
        id: pubDoi,
        pubDoi,
        name: `${article.title}\n${pubDoi}`,
        journal,
        article,
    }));
}

export function buildInstitution(registries: Registries, name: string): Institution {
    const id = requireName('institution', name);
    return registries.institutions.createOrGet(id, () => ({ kind: 'institution', id, name: id }));
}

export function buildDepartment(registries: Registries, name: string): Department {
    const id = requireName('department', name);
    return registries.departments.createOrGet(id, () => ({ kind: 'department', id, name: id }));
}

export function buildCategory(registries: Registries, name: string): Category {
    const id = requireName('category', name);
    return registries.categories.createOrGet(id, () => ({ kind: 'category', id, name: id }));
}

export function buildAuthor(registries: Registries, name: string): Author {
    const id = requireName('author', name);
    return registries.authors.createOrGet(id, () => ({ kind: 'author', id, name: id }));
}

/**
 * Construct (or fetch the interned instance of) the entity a request names.
 */
export function createEntity(registries: Registries, request: EntityRequest): Entity {
    switch (request.kind) {
        case 'article':
            return buildArticle(registries, request.fields);
        case 'journal':
            return buildJournal(registries, request.title, request);
        case 'institution':
            return buildInstitution(registries, request.name);
        case 'department':
            return buildDepartment(registries, request.name);
        case 'category':
            return buildCategory(registries, request.name);
        case 'author':
            return buildAuthor(registries, request.name);
        case 'publication':
            return buildPublication(registries, request.journal, request.article);
        default: {
            const unknownRequest: never = request;
            throw new InvalidRequestError(`Unknown entity request ${JSON.stringify(unknownRequest)}`);
        }
    }
}
