import { describe, it, expect, vi, afterEach } from 'vitest';
import { Registry } from '../registry/registry.js';
import { articleFromFields, createEntity } from '../registry/entity-factory.js';
import { createRegistries, getRegistries, resetRegistries } from '../registry/registries.js';
import { createArticle, createJournal, createPublication, departmentOf, resolveAuthors } from '../builder/articles.js';
import { normalize } from '../normalize/normalizer.js';
import { createTable } from '../normalize/table.js';
import { ARTICLE_COLUMNS, rowToArticleFields, tabularize } from '../normalize/tabularize.js';
import { DETAILS_KEYS } from '../sources/biorxiv.js';
import { InvalidRequestError } from '../utils/errors.js';
import { articleFields as fields, detailsRecord } from './fixtures.js';

describe('Registry', () => {
    it('should return the first instance and never call a later builder', () => {
        const registry = new Registry<{ id: string; label: string }>('thing');
        const first = registry.createOrGet('a', () => ({ id: 'a', label: 'first' }));
        const build = vi.fn(() => ({ id: 'a', label: 'second' }));

        const second = registry.createOrGet('a', build);

        expect(second).toBe(first);
        expect(second.label).toBe('first');
        expect(build).not.toHaveBeenCalled();
        expect(registry.size).toBe(1);
    });

    it('should keep kinds in separate stores', () => {
        const registries = createRegistries();
        createEntity(registries, { kind: 'institution', name: 'SHARED NAME' });
        createEntity(registries, { kind: 'category', name: 'SHARED NAME' });

        expect(registries.institutions.get('SHARED NAME')?.kind).toBe('institution');
        expect(registries.categories.get('SHARED NAME')?.kind).toBe('category');
    });
});

describe('ArticleRegistry', () => {
    it('should return the earliest version whatever the insertion order', () => {
        const registries = createRegistries();
        createArticle(registries, fields({ version: 3, title: 'v3' }));
        createArticle(registries, fields({ version: 1, title: 'v1' }));
        createArticle(registries, fields({ version: 2, title: 'v2' }));

        expect(registries.articles.get('10.1101/000001')?.title).toBe('v1');
        expect(registries.articles.getAllVersions('10.1101/000001').map((a) => a.version)).toEqual([1, 2, 3]);
        expect(registries.articles.size).toBe(1);
    });

    it('should keep equal versions in arrival order', () => {
        const registries = createRegistries();
        createArticle(registries, fields({ version: 2, title: 'first' }));
        createArticle(registries, fields({ version: 2, title: 'second' }));

        expect(registries.articles.getAllVersions('10.1101/000001').map((a) => a.title)).toEqual(['first', 'second']);
    });

    it('should record published articles and notify the version mediator', () => {
        const registries = createRegistries();
        createArticle(registries, fields({ doi: '10.1101/000002', version: 2, pubDoi: '10.1000/j.2' }));
        createArticle(registries, fields({ doi: '10.1101/000001', version: 1, pubDoi: '10.1000/j.1' }));
        createArticle(registries, fields({ doi: '10.1101/000003', pubDoi: 'na' }));

        expect(registries.articles.publishedDois()).toEqual(['10.1000/j.1', '10.1000/j.2']);
        expect(registries.mediators.versions.size).toBe(2);
        expect(registries.mediators.versions.getVersions('10.1000/j.2')[0]).toBe(
            registries.articles.get('10.1101/000002')
        );
    });

    it('should count authors when no count is given', () => {
        const article = createArticle(createRegistries(), fields({ authors: 'A; B; ; C' }));
        expect(article.numAuthors).toBe(3);
        expect(createArticle(createRegistries(), fields({ authors: 'A; B;' })).numAuthors).toBe(2);
    });

    it('should swap a repeated revision only for a strictly earlier date', () => {
        const registries = createRegistries();
        const stored = createArticle(registries, fields({ title: 'stored', date: new Date(Date.UTC(2021, 0, 5)), pubDoi: '10.1000/j.1' }));

        const later = articleFromFields(fields({ title: 'later', date: new Date(Date.UTC(2021, 0, 9)), pubDoi: '10.1000/j.1' }));
        expect(registries.articles.reconcile(later)).toBe(stored);

        const earlier = articleFromFields(fields({ title: 'earlier', date: new Date(Date.UTC(2021, 0, 1)), pubDoi: '10.1000/j.1' }));
        expect(registries.articles.reconcile(earlier)).toBe(earlier);

        expect(registries.articles.getAllVersions('10.1101/000001')).toEqual([earlier]);
        expect(registries.mediators.versions.getVersions('10.1000/j.1')).toEqual([earlier]);
    });

    it('should register a version it has not seen', () => {
        const registries = createRegistries();
        createArticle(registries, fields({ version: 1 }));

        registries.articles.reconcile(articleFromFields(fields({ version: 2 })));

        expect(registries.articles.getAllVersions('10.1101/000001').map((a) => a.version)).toEqual([1, 2]);
    });
});

describe('entity construction', () => {
    it('should reject a non-positive or fractional version and an empty DOI', () => {
        const registries = createRegistries();
        expect(() => createArticle(registries, fields({ version: 0 }))).toThrow(InvalidRequestError);
        expect(() => createArticle(registries, fields({ version: 1.5 }))).toThrow(InvalidRequestError);
        expect(() => createArticle(registries, fields({ doi: '  ' }))).toThrow(InvalidRequestError);
        expect(registries.articles.size).toBe(0);
    });

    it('should intern journals by title with default details', () => {
        const registries = createRegistries();
        const journal = createJournal(registries, 'Journal of Tests');

        expect(createJournal(registries, 'Journal of Tests')).toBe(journal);
        expect(journal).toEqual({
            kind: 'journal',
            id: 'Journal of Tests',
            title: 'Journal of Tests',
            prefix: null,
            issn: null,
            impactFactor: 0,
        });
    });

    it('should build a publication keyed by pub DOI', () => {
        const registries = createRegistries();
        const article = createArticle(registries, fields({ title: 'Findings', pubDoi: '10.1000/j.1' }));
        const journal = createJournal(registries, 'Journal of Tests');

        const publication = createPublication(registries, journal, article);

        expect(publication.id).toBe('10.1000/j.1');
        expect(publication.name).toBe('Findings\n10.1000/j.1');
        expect(publication.article).toBe(article);
        expect(createPublication(registries, journal, article)).toBe(publication);
    });

    it('should refuse a publication for an unpublished article', () => {
        const registries = createRegistries();
        const article = createArticle(registries, fields());
        expect(() => createPublication(registries, createJournal(registries, 'J'), article)).toThrow(InvalidRequestError);
    });

    it('should resolve author details through the author registry', () => {
        const registries = createRegistries();
        const first = createArticle(registries, fields({ doi: '10.1101/000001' }));
        const second = createArticle(registries, fields({ doi: '10.1101/000002', authors: 'Roe, R.' }));

        resolveAuthors(registries, first);
        resolveAuthors(registries, second);

        expect(first.authorsDetail?.map((a) => a.name)).toEqual(['Doe, J.', 'Roe, R.']);
        expect(first.corrAuthorsDetail?.name).toBe('Doe, J.');
        expect(second.authorsDetail?.[0]).toBe(first.authorsDetail?.[1]);
        expect(registries.authors.size).toBe(2);
    });
});

describe('departmentOf', () => {
    it('should find a department segment', () => {
        expect(departmentOf('DEPARTMENT OF BIOLOGY, EXAMPLE UNIVERSITY')).toBe('DEPARTMENT OF BIOLOGY');
        expect(departmentOf('Example Institute, School of Medicine')).toBe('SCHOOL OF MEDICINE');
        expect(departmentOf('EXAMPLE UNIVERSITY')).toBeNull();
    });
});

describe('shared registries', () => {
    afterEach(() => {
        resetRegistries();
    });

    it('should create the process-wide registries once', () => {
        expect(getRegistries()).toBe(getRegistries());
    });

    it('should start over after a reset', () => {
        const before = getRegistries();
        resetRegistries();
        expect(getRegistries()).not.toBe(before);
    });
});

describe('round trip', () => {
    it('should resolve a DOI to its lower-version row', () => {
        const payload = {
            collection: [
                detailsRecord({ doi: '10.1101/000009', title: 'Revised title', version: '2', date: '2021-03-01' }),
                detailsRecord({ doi: '10.1101/000009', title: 'Original title', version: '1', date: '2021-02-01' }),
            ],
        };
        const registries = createRegistries();

        const table = tabularize(createTable(normalize(payload, 'collection', DETAILS_KEYS, 0), ARTICLE_COLUMNS));
        for (const label of table.index) {
            createArticle(registries, rowToArticleFields(table, label));
        }

        expect(registries.articles.get('10.1101/000009')?.title).toBe('Original title');
        expect(registries.articles.getAllVersions('10.1101/000009')).toHaveLength(2);
    });
});
