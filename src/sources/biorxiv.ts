import type { PreprintServer } from '../types/index.js';
import { Query } from '../query/query.js';
import { QueryPlanner, type FailedPage } from '../query/planner.js';
import { normalize, type RawRow } from '../normalize/normalizer.js';
import { createTable, type Table } from '../normalize/table.js';
import { ARTICLE_COLUMNS, convertColumns, tabularize } from '../normalize/tabularize.js';
import { getHttpClient, type HttpClient } from '../utils/http-client.js';
import { InvalidRequestError, SchemaError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import { isDoi, isIsoDate, readString, stripDoiPrefix } from './utils.js';

/**
 * Record keys read from the details endpoint, position for position with `ARTICLE_COLUMNS`.
 */
export const DETAILS_KEYS = [
    'doi',
    'title',
    'authors',
    'author_corresponding',
    'author_corresponding_institution',
    'date',
    'version',
    'type',
    'category',
    'jatsxml',
    'published',
] as const;

/** Records per page served by the details endpoint */
export const DETAILS_PAGE_SIZE = 100;

const SOURCE = 'biorxiv';

export interface BiorxivAdapterOptions {
    apiBase?: string;
    server?: PreprintServer;
    client?: HttpClient;
    concurrency?: number;
    maxAttempts?: number;
    pageSize?: number;
}

/**
 * Result of harvesting an interval: one tabularized table built from every
 * page that arrived and converted, plus the pages that did not.
 */
export interface IntervalHarvest {
    totalCount: number;
    pages: number;
    table: Table;
    failed: FailedPage[];
}

/**
 * bioRxiv / medRxiv details and pubs API adapter.
 *
 * @see https://api.biorxiv.org/
 */
export class BiorxivAdapter {
    readonly name = 'bioRxiv';
    readonly server: PreprintServer;
    private readonly apiBase: string;
    private readonly client: HttpClient;
    private readonly maxAttempts?: number;
    private readonly pageSize: number;
    private readonly planner: QueryPlanner;

    constructor(options: BiorxivAdapterOptions = {}) {
        this.apiBase = (options.apiBase ?? 'https://api.biorxiv.org').replace(/\/+$/, '');
        this.server = options.server ?? 'biorxiv';
        this.client = options.client ?? getHttpClient();
        this.maxAttempts = options.maxAttempts;
        this.pageSize = options.pageSize ?? DETAILS_PAGE_SIZE;
        this.planner = new QueryPlanner({
            client: this.client,
            concurrency: options.concurrency,
            maxAttempts: options.maxAttempts,
            source: SOURCE,
        });
    }

    /**
     * `{base}/details/{server}/{from}/{to}`; pages append `/{cursor}`.
     */
    intervalUrl(from: string, to: string): string {
        if (!isIsoDate(from) || !isIsoDate(to)) {
            throw new InvalidRequestError(`Interval bounds must be YYYY-MM-DD dates, got ${from} and ${to}`);
        }
        if (from > to) {
            throw new InvalidRequestError(`Interval start ${from} is after its end ${to}`);
        }
        return `${this.apiBase}/details/${this.server}/${from}/${to}`;
    }

    async countInterval(from: string, to: string): Promise<number> {
        return this.planner.fetchTotalCount(this.intervalUrl(from, to));
    }

    /**
     * Fetch every page of an interval through the pool and build one article table.
     * Rows keep their global position, so the table is in page order regardless
     * of completion order. Each page is converted on its own first; a page with
     * a record that does not convert is reported as failed and left out.
     */
    async harvestInterval(from: string, to: string): Promise<IntervalHarvest> {
        const logger = getLogger('biorxiv');
        const url = this.intervalUrl(from, to);

        const totalCount = await this.planner.fetchTotalCount(url);
        const queries = this.planner.plan(url, DETAILS_KEYS, ARTICLE_COLUMNS, this.pageSize, totalCount);
        logger.info({ from, to, totalCount, pages: queries.length }, 'Harvesting interval');

        const report = await this.planner.runAll(queries);
        const failed = [...report.failed];
        const rows: RawRow[] = [];

        const completed = [...report.completed].sort(([a], [b]) => a - b);
        for (const [page, query] of completed) {
            try {
                const pageRows = normalize(query.result, 'collection', query.keys, page * this.pageSize);
                const column = convertColumns(createTable(pageRows, ARTICLE_COLUMNS));
                if (column !== null) {
                    throw new SchemaError(`Page ${page} has a record whose ${column} column cannot be converted`, column);
                }
                rows.push(...pageRows);
            } catch (error) {
                logger.warn({ page, url: query.url, error }, 'Page payload rejected');
                failed.push({ page, url: query.url, error });
            }
        }

        failed.sort((a, b) => a.page - b.page);
        return {
            totalCount,
            pages: queries.length,
            table: tabularize(createTable(rows, ARTICLE_COLUMNS)),
            failed,
        };
    }

    /**
     * Every revision the server holds for one preprint DOI, as an article table.
     */
    async fetchArticleVersions(doi: string): Promise<Table> {
        const id = this.requireDoi(doi);
        const query = new Query(`${this.apiBase}/details/${this.server}/${id}`, DETAILS_KEYS, ARTICLE_COLUMNS);
        await query.execute({ client: this.client, maxAttempts: this.maxAttempts, source: SOURCE });

        const rows = normalize(query.result, 'collection', query.keys, 0);
        getLogger('biorxiv').debug({ doi: id, versions: rows.length }, 'Fetched preprint versions');
        return tabularize(createTable(rows, ARTICLE_COLUMNS));
    }

    /**
     * Journal a preprint was published in, from the pubs endpoint.
     * @returns null when the server knows of no publication
     */
    async fetchPublishedJournal(doi: string): Promise<string | null> {
        const id = this.requireDoi(doi);
        const response = await this.client.get(`${this.apiBase}/pubs/${this.server}/${id}`, 'json', {
            maxAttempts: this.maxAttempts,
            source: SOURCE,
        });

        const payload = response.data;
        const collection: unknown =
            typeof payload === 'object' && payload !== null && 'collection' in payload ? payload.collection : undefined;
        if (!Array.isArray(collection)) {
            throw new SchemaError(`Pubs response for ${id} has no "collection" list`, 'collection');
        }

        const first: unknown = collection[0];
        const journal = readString(first, 'published_journal')?.trim();
        return journal ? journal : null;
    }

    private requireDoi(doi: string): string {
        const id = stripDoiPrefix(doi);
        if (!id || !isDoi(id)) {
            throw new InvalidRequestError(`Not a DOI: "${doi}"`);
        }
        return id;
    }
}
