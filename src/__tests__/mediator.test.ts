import { describe, it, expect } from 'vitest';
import { VersionMediator, shouldReplace } from '../mediator/version-mediator.js';
import { GroupingMediator, readAttribute } from '../mediator/grouping-mediator.js';
import { createRegistries } from '../registry/registries.js';
import { buildInstitution } from '../registry/entity-factory.js';
import { createArticle, getMissingInitialVersionDois } from '../builder/articles.js';
import type { Article } from '../types/index.js';
import { articleFields, makeArticle } from './fixtures.js';

const PUB = '10.1000/j.1';

function day(d: number): Date {
    return new Date(Date.UTC(2021, 0, d));
}

describe('VersionMediator', () => {
    it('should list a key whose only revision is version 2', () => {
        const mediator = new VersionMediator();
        mediator.add(PUB, makeArticle({ version: 2, pubDoi: PUB }));

        expect(mediator.missingInitialVersionKeys()).toEqual([PUB]);
        expect(mediator.firstStoredVersion(PUB)).toBe(2);
    });

    it('should drop the key once version 1 arrives', () => {
        const mediator = new VersionMediator();
        mediator.add(PUB, makeArticle({ version: 2, pubDoi: PUB }));
        mediator.add(PUB, makeArticle({ version: 1, pubDoi: PUB }));

        expect(mediator.missingInitialVersionKeys()).toEqual([]);
        expect(mediator.getVersions(PUB).map((a) => a.version)).toEqual([1, 2]);
        expect(mediator.firstStoredVersion(PUB)).toBe(1);
    });

    it('should keep the missing set sorted and free of duplicates', () => {
        const mediator = new VersionMediator();
        mediator.add('10.1000/j.3', makeArticle({ version: 3 }));
        mediator.add('10.1000/j.2', makeArticle({ version: 2 }));
        mediator.add('10.1000/j.3', makeArticle({ version: 4 }));

        expect(mediator.missingInitialVersionKeys()).toEqual(['10.1000/j.2', '10.1000/j.3']);
    });

    it('should return a copy of the missing set', () => {
        const mediator = new VersionMediator();
        mediator.add(PUB, makeArticle({ version: 2 }));

        mediator.missingInitialVersionKeys().pop();

        expect(mediator.missingInitialVersionKeys()).toEqual([PUB]);
    });

    it('should map a key to the DOI of its first stored version', () => {
        const mediator = new VersionMediator();
        mediator.add(PUB, makeArticle({ doi: '10.1101/000003', version: 3 }));
        mediator.add(PUB, makeArticle({ doi: '10.1101/000002', version: 2 }));

        expect(mediator.convertGroupKeyToCanonicalDoi(PUB)).toBe('10.1101/000002');
        expect(mediator.convertGroupKeyToCanonicalDoi('10.1000/unknown')).toBeUndefined();
        expect(mediator.firstStoredVersion('10.1000/unknown')).toBeUndefined();
    });

    it('should keep the earlier-dated record for a version whatever the arrival order', () => {
        const early = makeArticle({ title: 'early', date: day(1) });
        const late = makeArticle({ title: 'late', date: day(9) });

        const forward = new VersionMediator();
        forward.add(PUB, early);
        forward.add(PUB, late);

        const backward = new VersionMediator();
        backward.add(PUB, late);
        backward.add(PUB, early);

        expect(forward.getVersions(PUB)[0]?.title).toBe('early');
        expect(backward.getVersions(PUB)[0]?.title).toBe('early');
    });

    it('should keep the stored record on equal dates', () => {
        const mediator = new VersionMediator();
        mediator.add(PUB, makeArticle({ title: 'first', date: day(3) }));
        mediator.add(PUB, makeArticle({ title: 'second', date: day(3) }));

        expect(mediator.getVersions(PUB)[0]?.title).toBe('first');
    });
});

describe('shouldReplace', () => {
    const stored = makeArticle({ version: 2, date: day(5) });

    it('should prefer a strictly earlier date', () => {
        expect(shouldReplace(stored, makeArticle({ version: 2, date: day(4) }))).toBe(true);
        expect(shouldReplace(stored, makeArticle({ version: 2, date: day(6) }))).toBe(false);
    });

    it('should never let a higher version take the slot', () => {
        expect(shouldReplace(stored, makeArticle({ version: 3, date: day(1) }))).toBe(false);
    });

    it('should rank a dated record ahead of an undated one', () => {
        const undated = makeArticle({ version: 2, date: null });
        expect(shouldReplace(undated, stored)).toBe(true);
        expect(shouldReplace(stored, undated)).toBe(false);
        expect(shouldReplace(undated, makeArticle({ version: 2, date: null }))).toBe(false);
    });
});

describe('getMissingInitialVersionDois', () => {
    it('should return the canonical preprint DOI of each incomplete publication', () => {
        const registries = createRegistries();
        createArticle(registries, articleFields({ doi: '10.1101/000020', version: 2, pubDoi: '10.1000/j.b' }));
        createArticle(registries, articleFields({ doi: '10.1101/000010', version: 3, pubDoi: '10.1000/j.a' }));
        createArticle(registries, articleFields({ doi: '10.1101/000030', version: 1, pubDoi: '10.1000/j.c' }));
        createArticle(registries, articleFields({ doi: '10.1101/000030', version: 2, pubDoi: '10.1000/j.c' }));

        expect(getMissingInitialVersionDois(registries)).toEqual(['10.1101/000010', '10.1101/000020']);
    });
});

describe('GroupingMediator', () => {
    it('should insert an item once and keep items ordered by id', () => {
        const mediator = new GroupingMediator<Article>('link_type');
        const b = makeArticle({ doi: '10.1101/b' });
        const a = makeArticle({ doi: '10.1101/a' });

        expect(mediator.add('pdf', b)).toBe(true);
        expect(mediator.add('pdf', a)).toBe(true);
        expect(mediator.add('pdf', makeArticle({ doi: '10.1101/b' }))).toBe(false);

        expect(mediator.get('pdf')).toEqual([a, b]);
        expect(mediator.get('xml')).toEqual([]);
        expect(mediator.keys()).toEqual(['pdf']);
    });

    it('should group entity keys by id', () => {
        const registries = createRegistries();
        const institution = buildInstitution(registries, 'EXAMPLE UNIVERSITY');
        const mediator = new GroupingMediator<Article>('institution');

        mediator.add(institution, makeArticle({ doi: '10.1101/a' }));
        mediator.add('EXAMPLE UNIVERSITY', makeArticle({ doi: '10.1101/b' }));

        expect(mediator.size).toBe(1);
        expect(mediator.get(institution).map((a) => a.id)).toEqual(['10.1101/a', '10.1101/b']);
    });

    describe('toGraphTables', () => {
        it('should emit one node per key and item and one edge per pair', () => {
            const registries = createRegistries();
            const mediator = new GroupingMediator<Article>('institution');
            const institution = buildInstitution(registries, 'EXAMPLE UNIVERSITY');
            mediator.add(institution, makeArticle({ doi: '10.1101/b', title: 'Beta' }));
            mediator.add(institution, makeArticle({ doi: '10.1101/a', title: 'Alpha' }));
            mediator.add('OTHER INSTITUTE', makeArticle({ doi: '10.1101/a', title: 'Alpha' }));

            const tables = mediator.toGraphTables('name', 'title', 'institution_article');

            expect(tables.nodes).toEqual([
                { id: 'EXAMPLE UNIVERSITY', kind: 'institution', name: 'EXAMPLE UNIVERSITY' },
                { id: '10.1101/a', kind: 'article', name: 'Alpha' },
                { id: '10.1101/b', kind: 'article', name: 'Beta' },
                { id: 'OTHER INSTITUTE', kind: 'institution', name: 'OTHER INSTITUTE' },
            ]);
            expect(tables.edges).toEqual([
                { src: 'EXAMPLE UNIVERSITY', srcKind: 'institution', dst: '10.1101/a', dstKind: 'article', relationship: 'institution_article' },
                { src: 'EXAMPLE UNIVERSITY', srcKind: 'institution', dst: '10.1101/b', dstKind: 'article', relationship: 'institution_article' },
                { src: 'OTHER INSTITUTE', srcKind: 'institution', dst: '10.1101/a', dstKind: 'article', relationship: 'institution_article' },
            ]);
        });

        it('should skip rows whose attribute cannot be read', () => {
            const mediator = new GroupingMediator<Article>('link_type');
            mediator.add('xml', makeArticle({ doi: '10.1101/a', publicationLink: 'https://example.org/a.xml' }));
            mediator.add('xml', makeArticle({ doi: '10.1101/b', publicationLink: null }));

            const tables = mediator.toGraphTables('name', 'publicationLink', 'link_type_article');

            expect(tables.nodes.map((n) => n.id)).toEqual(['xml', '10.1101/a']);
            expect(tables.edges).toHaveLength(1);
            expect(tables.edges[0]?.dst).toBe('10.1101/a');
        });
    });
});

describe('readAttribute', () => {
    it('should render numbers as text and reject missing attributes', () => {
        expect(readAttribute({ version: 2 }, 'version')).toBe('2');
        expect(() => readAttribute({}, 'title')).toThrow(TypeError);
        expect(() => readAttribute({ title: null }, 'title')).toThrow(TypeError);
    });
});
