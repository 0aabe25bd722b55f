import { Query } from './query.js';
import { ConcurrencyPool } from './concurrency.js';
import { getHttpClient, type HttpClient } from '../utils/http-client.js';
import { InvalidRequestError, SchemaError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';

export interface PlannerOptions {
    client?: HttpClient;
    /** Pool width for `runAll` */
    concurrency?: number;
    maxAttempts?: number;
    /** Rate-limit bucket name passed to the client */
    source?: string;
}

/**
 * A page that failed after its retries ran out.
 */
export interface FailedPage {
    page: number;
    url: string;
    error: unknown;
}

/**
 * Outcome of driving a batch of queries through the pool.
 * `completed` is in completion order; callers sort by page when order matters.
 */
export interface RunReport {
    completed: Array<[number, Query]>;
    failed: FailedPage[];
}

/**
 * Plans page queries over a record-list endpoint and runs them concurrently.
 */
export class QueryPlanner {
    private readonly client: HttpClient;
    private readonly pool: ConcurrencyPool;
    private readonly maxAttempts?: number;
    private readonly source?: string;

    constructor(options: PlannerOptions = {}) {
        this.client = options.client ?? getHttpClient();
        this.pool = new ConcurrencyPool(options.concurrency ?? 8);
        this.maxAttempts = options.maxAttempts;
        this.source = options.source;
    }

    /**
     * One query per offset in `[0, pageSize, 2*pageSize, ...)` below `totalCount`,
     * addressed as `baseUrl/offset` and tagged with `page = offset / pageSize`.
     */
    plan(
        baseUrl: string,
        keys: readonly string[],
        columnNames: readonly string[],
        pageSize: number,
        totalCount: number
    ): Query[] {
        if (!Number.isInteger(pageSize) || pageSize <= 0) {
            throw new InvalidRequestError(`Page size must be a positive integer, got ${pageSize}`);
        }
        if (!Number.isInteger(totalCount) || totalCount < 0) {
            throw new InvalidRequestError(`Total count must be a non-negative integer, got ${totalCount}`);
        }

        const base = baseUrl.replace(/\/+$/, '');
        const queries: Query[] = [];
        for (let offset = 0; offset < totalCount; offset += pageSize) {
            queries.push(new Query(`${base}/${offset}`, keys, columnNames, offset / pageSize));
        }
        return queries;
    }

    /**
     * Execute every query through the bounded pool.
     * A failing page is reported in `failed` and does not stop its siblings.
     */
    async runAll(queries: readonly Query[]): Promise<RunReport> {
        const logger = getLogger('planner');
        const report: RunReport = { completed: [], failed: [] };

        await Promise.all(
            queries.map((query) =>
                this.pool.run(async () => {
                    try {
                        const entry = await query.execute({
                            client: this.client,
                            maxAttempts: this.maxAttempts,
                            source: this.source,
                        });
                        report.completed.push(entry);
                    } catch (error) {
                        logger.warn({ page: query.page, url: query.url, error }, 'Page fetch failed');
                        report.failed.push({ page: query.page, url: query.url, error });
                    }
                })
            )
        );

        logger.info(
            { pages: queries.length, completed: report.completed.length, failed: report.failed.length },
            'Page batch finished'
        );
        return report;
    }

    /**
     * Fetch page 0 of `url` once and read `messages[0].total`.
     */
    async fetchTotalCount(url: string): Promise<number> {
        const base = url.replace(/\/+$/, '');
        const response = await this.client.get(`${base}/0`, 'json', {
            maxAttempts: this.maxAttempts,
            source: this.source,
        });
        return readTotalCount(response.data);
    }
}

/**
 * Pull the total record count out of a details-API payload.
 */
export function readTotalCount(payload: unknown): number {
    if (typeof payload !== 'object' || payload === null || !('messages' in payload)) {
        throw new SchemaError('Payload has no "messages" section', 'messages');
    }
    const messages = payload.messages;
    if (!Array.isArray(messages) || messages.length === 0) {
        throw new SchemaError('"messages" is empty or not a list', 'messages');
    }

    const first: unknown = messages[0];
    if (typeof first !== 'object' || first === null || !('total' in first)) {
        throw new SchemaError('First message has no "total"', 'total');
    }

    // Numeric strings are accepted as well as numbers
    const total = typeof first.total === 'string' ? Number(first.total) : first.total;
    if (typeof total !== 'number' || !Number.isInteger(total) || total < 0) {
        throw new SchemaError(`"total" is not a non-negative integer: ${String(first.total)}`, 'total');
    }
    return total;
}
