import type { Article, ArticleFields } from '../types/index.js';

/**
 * Article fields for tests; DOIs and names are placeholders.
 */
export function articleFields(overrides: Partial<ArticleFields> = {}): ArticleFields {
    return {
        doi: '10.1101/000001',
        title: 'Test article',
        authors: 'Doe, J.; Roe, R.',
        corrAuthors: 'Doe, J.',
        institution: 'EXAMPLE UNIVERSITY',
        date: new Date(Date.UTC(2021, 0, 1)),
        version: 1,
        type: 'new results',
        category: ['Genetics'],
        xml: '',
        pubDoi: 'NA',
        ...overrides,
    };
}

/**
 * One record as served by the details endpoint.
 */
export function detailsRecord(overrides: Record<string, unknown> = {}): Record<string, unknown> {
    return {
        doi: '10.1101/000001',
        title: 'Test article',
        authors: 'Doe, J.; Roe, R.',
        author_corresponding: 'Doe, J.',
        author_corresponding_institution: 'Example University',
        date: '2021-01-01',
        version: '1',
        type: 'new results',
        category: 'genetics',
        jatsxml: '',
        published: 'NA',
        ...overrides,
    };
}

/**
 * A detached Article, not registered anywhere.
 */
export function makeArticle(overrides: Partial<ArticleFields> = {}): Article {
    const fields = articleFields(overrides);
    return {
        ...fields,
        kind: 'article',
        id: fields.doi,
        numAuthors: fields.numAuthors ?? 2,
        authorsDetail: null,
        corrAuthorsDetail: null,
        publicationLink: fields.publicationLink ?? null,
    };
}
