import type { GraphTables, PrepubGraphConfig, Publication } from '../types/index.js';
import type { Table } from '../normalize/table.js';
import { rowToArticleFields } from '../normalize/tabularize.js';
import { ConcurrencyPool } from '../query/concurrency.js';
import { createRegistries, type Registries } from '../registry/registries.js';
import { articleFromFields, buildCategory, buildDepartment, buildInstitution } from '../registry/entity-factory.js';
import { BiorxivAdapter } from '../sources/biorxiv.js';
import { CrossrefAdapter } from '../sources/crossref.js';
import { HarvestDatabase } from '../storage/database.js';
import { createHttpClient, type HttpClient, type RateLimit } from '../utils/http-client.js';
import { InvalidRequestError, PrepubGraphError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import { compareStrings } from '../utils/sorted.js';
import { VERSION } from '../version.js';
import {
    createArticle,
    createJournal,
    createPublication,
    departmentOf,
    getMissingInitialVersionDois,
    resolveAuthors,
} from './articles.js';

/**
 * Relationship labels of the cross-reference graph.
 */
export const RELATIONSHIPS = {
    institution: 'institution_publication',
    department: 'department_publication',
    category: 'category_publication',
    linkType: 'link_type_article',
} as const;

export interface HarvestStats {
    totalCount: number;
    pages: number;
    failedPages: number;
    rows: number;
    rejectedRows: number;
    articles: number;
    revisions: number;
    supplementalFetches: number;
    journals: number;
    publications: number;
    missingInitialVersions: number;
    linkTypes: Record<string, number>;
    nodes: number;
    edges: number;
}

export interface HarvestResult {
    out: string;
    registries: Registries;
    graph: GraphTables;
    stats: HarvestStats;
}

/**
 * Collaborators a caller (or a test) can supply instead of the defaults.
 */
export interface HarvestDeps {
    client?: HttpClient;
    registries?: Registries;
    crossrefBase?: string;
}

/**
 * Build the HTTP client a harvest runs with.
 */
export function createHarvestClient(config: PrepubGraphConfig): HttpClient {
    const rateLimits: Record<string, RateLimit> = {};
    if (config.requestsPerSecond !== undefined && config.requestsPerSecond > 0) {
        const limit = { tokensPerSecond: config.requestsPerSecond, maxBurst: Math.max(1, Math.ceil(config.requestsPerSecond)) };
        rateLimits['biorxiv'] = limit;
        rateLimits['crossref'] = limit;
    }

    return createHttpClient({
        timeout: config.timeout,
        version: VERSION,
        mailto: config.mailto,
        maxAttempts: config.maxAttempts,
        baseDelayMs: config.baseDelayMs,
        rateLimits,
    });
}

/**
 * Run a full harvest:
 *
 * 1. Count and page through the details interval
 * 2. Build article revisions from the tabularized rows
 * 3. Fetch the preprint history of publications missing version 1
 * 4. Resolve journals and publications
 * 5. Index publications by institution, department and category
 * 6. Classify full-text links (optional)
 * 7. Write the snapshot
 */
export async function runHarvest(config: PrepubGraphConfig, deps: HarvestDeps = {}): Promise<HarvestResult> {
    const logger = getLogger('harvest');
    if (!config.from || !config.to) {
        throw new InvalidRequestError('A harvest needs both a --from and a --to date');
    }

    const client = deps.client ?? createHarvestClient(config);
    const registries = deps.registries ?? createRegistries();
    const pool = new ConcurrencyPool(config.concurrency);
    const biorxiv = new BiorxivAdapter({
        apiBase: config.apiBase,
        server: config.server,
        client,
        concurrency: config.concurrency,
        maxAttempts: config.maxAttempts,
        pageSize: config.pageSize,
    });

    logger.info({ server: config.server, from: config.from, to: config.to }, 'Starting harvest');
    const startTime = Date.now();

    // ──────────────────────────────────────────────────
    // Step 1-2: Interval pages -> article revisions
    // ──────────────────────────────────────────────────
    const interval = await biorxiv.harvestInterval(config.from, config.to);
    const ingested = ingestTable(registries, interval.table);
    logger.info(
        { rows: interval.table.rowCount, rejected: ingested.rejected, failedPages: interval.failed.length },
        'Interval ingested'
    );

    // ──────────────────────────────────────────────────
    // Step 3: Supplemental fetches for missing version 1
    // ──────────────────────────────────────────────────
    let supplementalFetches = 0;
    if (config.fetchMissingVersions) {
        const missing = getMissingInitialVersionDois(registries);
        await Promise.all(
            missing.map((doi) =>
                pool.run(async () => {
                    try {
                        const table = await biorxiv.fetchArticleVersions(doi);
                        supplementalFetches++;
                        ingestTable(registries, table);
                    } catch (error) {
                        logger.warn({ doi, error }, 'Supplemental version fetch failed');
                    }
                })
            )
        );
        logger.info({ requested: missing.length, fetched: supplementalFetches }, 'Missing versions fetched');
    }

    // ──────────────────────────────────────────────────
    // Step 4-5: Journals, publications, cross-references
    // ──────────────────────────────────────────────────
    for (const article of registries.articles.values()) {
        resolveAuthors(registries, article);
    }

    const publications: Publication[] = [];
    if (config.resolveJournals) {
        const { versions } = registries.mediators;
        await Promise.all(
            registries.articles.publishedDois().map((pubDoi) =>
                pool.run(async () => {
                    const article = versions.getVersions(pubDoi)[0];
                    if (!article) return;
                    try {
                        const title = await biorxiv.fetchPublishedJournal(article.doi);
                        if (title) {
                            publications.push(createPublication(registries, createJournal(registries, title), article));
                        }
                    } catch (error) {
                        logger.warn({ pubDoi, doi: article.doi, error }, 'Journal lookup failed');
                    }
                })
            )
        );
        publications.sort((a, b) => compareStrings(a.id, b.id));
        for (const publication of publications) {
            indexPublication(registries, publication);
        }
        logger.info({ journals: registries.journals.size, publications: publications.length }, 'Publications resolved');
    }

    // ──────────────────────────────────────────────────
    // Step 6: Full-text link classification
    // ──────────────────────────────────────────────────
    const linkTypes: Record<string, number> = {};
    if (config.resolveLinks && publications.length > 0) {
        const crossref = new CrossrefAdapter({ client, baseUrl: deps.crossrefBase });
        const classified = await Promise.all(
            publications.map((publication) =>
                pool.run(async () => {
                    try {
                        return { publication, link: await crossref.classify(publication.pubDoi) };
                    } catch (error) {
                        logger.warn({ pubDoi: publication.pubDoi, error }, 'Link classification failed');
                        return null;
                    }
                })
            )
        );
        for (const entry of classified) {
            if (!entry) continue;
            const { article } = entry.publication;
            article.publicationLink = entry.link.url;
            registries.mediators.linkTypeArticles.add(entry.link.type, article);
            linkTypes[entry.link.type] = (linkTypes[entry.link.type] ?? 0) + 1;
        }
    }

    // ──────────────────────────────────────────────────
    // Step 7: Snapshot
    // ──────────────────────────────────────────────────
    const graph = buildGraphTables(registries);
    const stats: HarvestStats = {
        totalCount: interval.totalCount,
        pages: interval.pages,
        failedPages: interval.failed.length,
        rows: interval.table.rowCount,
        rejectedRows: ingested.rejected,
        articles: registries.articles.size,
        revisions: registries.articles.values().length,
        supplementalFetches,
        journals: registries.journals.size,
        publications: registries.publications.size,
        missingInitialVersions: registries.mediators.versions.missingInitialVersionKeys().length,
        linkTypes,
        nodes: graph.nodes.length,
        edges: graph.edges.length,
    };

    writeSnapshot(config, registries, graph, stats);

    const elapsed = ((Date.now() - startTime) / 1000).toFixed(1);
    logger.info({ ...stats, elapsed: `${elapsed}s`, out: config.out }, 'Harvest complete');

    return { out: config.out, registries, graph, stats };
}

// ─── Internal helpers ─────────────────────────────────

/**
 * Create an Article for every row of a tabularized table. Rows that do not
 * validate are logged and skipped. A row repeating a registered DOI and
 * version is not added again; it only takes the slot over when it carries a
 * strictly earlier date.
 */
export function ingestTable(registries: Registries, table: Table): { created: number; rejected: number } {
    const logger = getLogger('harvest');
    let created = 0;
    let rejected = 0;

    for (const label of table.index) {
        try {
            const fields = rowToArticleFields(table, label);
            const known = registries.articles
                .getAllVersions(fields.doi.trim())
                .some((article) => article.version === fields.version);
            if (known) {
                registries.articles.reconcile(articleFromFields(fields));
                continue;
            }

            createArticle(registries, fields);
            created++;
        } catch (error) {
            if (!(error instanceof PrepubGraphError)) throw error;
            logger.warn({ row: label, error }, 'Row rejected');
            rejected++;
        }
    }
    return { created, rejected };
}

/**
 * Add a publication to the institution, department and category groupings.
 */
export function indexPublication(registries: Registries, publication: Publication): void {
    const { mediators } = registries;
    const { article } = publication;

    const institutionName = article.institution.trim();
    if (institutionName) {
        mediators.institutionPublications.add(buildInstitution(registries, institutionName), publication);

        const department = departmentOf(institutionName);
        if (department) {
            mediators.departmentPublications.add(buildDepartment(registries, department), publication);
        }
    }

    for (const name of article.category) {
        mediators.categoryPublications.add(buildCategory(registries, name), publication);
    }
}

/**
 * Merge the graph projections of every grouping mediator. A node shared by
 * several groupings appears once.
 */
export function buildGraphTables(registries: Registries): GraphTables {
    const { mediators } = registries;
    const parts = [
        mediators.institutionPublications.toGraphTables('name', 'name', RELATIONSHIPS.institution),
        mediators.departmentPublications.toGraphTables('name', 'name', RELATIONSHIPS.department),
        mediators.categoryPublications.toGraphTables('name', 'name', RELATIONSHIPS.category),
        mediators.linkTypeArticles.toGraphTables('name', 'title', RELATIONSHIPS.linkType),
    ];

    const merged: GraphTables = { nodes: [], edges: [] };
    const seen = new Set<string>();
    for (const part of parts) {
        for (const node of part.nodes) {
            const key = `${node.kind}\u0000${node.id}`;
            if (seen.has(key)) continue;
            seen.add(key);
            merged.nodes.push(node);
        }
        merged.edges.push(...part.edges);
    }
    return merged;
}

function writeSnapshot(config: PrepubGraphConfig, registries: Registries, graph: GraphTables, stats: HarvestStats): void {
    const db = new HarvestDatabase(config.out);
    try {
        const { versions } = registries.mediators;
        db.clearRunTables();
        db.insertArticles(registries.articles.values());
        db.insertJournals(registries.journals.values());
        db.insertPublications(registries.publications.values());
        db.insertMissingVersions(
            versions.missingInitialVersionKeys().flatMap((pubDoi) => {
                const doi = versions.convertGroupKeyToCanonicalDoi(pubDoi);
                return doi ? [{ pub_doi: pubDoi, doi }] : [];
            })
        );
        db.insertGraph(graph);
        db.insertRun({
            created_at: new Date().toISOString(),
            prepubgraph_version: VERSION,
            config_json: JSON.stringify(config),
            server: config.server,
            interval: `${config.from ?? ''}/${config.to ?? ''}`,
            stats_json: JSON.stringify(stats),
        });
    } finally {
        db.close();
    }
}
