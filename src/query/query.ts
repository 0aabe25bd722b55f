import { getHttpClient, parseResponseView, type HttpClient } from '../utils/http-client.js';
import { InvalidRequestError, PrepubGraphError } from '../utils/errors.js';

/**
 * Options for executing a single query.
 */
export interface ExecuteOptions {
    /** Defaults to the shared client */
    client?: HttpClient;
    /** Response view: text | bytes | json */
    view?: string;
    maxAttempts?: number;
    /** Rate-limit bucket name */
    source?: string;
}

/**
 * One page request against a record-list endpoint.
 *
 * `keys` are the JSON keys read from every record and `columnNames` the
 * table columns they become, position for position. The result slot is
 * written exactly once by `execute()` (or `setResult()`).
 */
export class Query {
    private resultValue: unknown = undefined;
    private completed = false;

    constructor(
        readonly url: string,
        readonly keys: readonly string[],
        readonly columnNames: readonly string[],
        readonly page = 0
    ) {
        if (keys.length !== columnNames.length) {
            throw new InvalidRequestError(
                `Query keys and column names differ in length (${keys.length} vs ${columnNames.length})`
            );
        }
        if (!Number.isInteger(page) || page < 0) {
            throw new InvalidRequestError(`Query page must be a non-negative integer, got ${page}`);
        }
    }

    get result(): unknown {
        return this.resultValue;
    }

    get hasResult(): boolean {
        return this.completed;
    }

    setResult(data: unknown): void {
        if (this.completed) {
            throw new PrepubGraphError(`Result for ${this.url} was already set`);
        }
        this.resultValue = data;
        this.completed = true;
    }

    /**
     * Fetch the page and store the payload.
     * @returns the page index paired with this query
     */
    async execute(options: ExecuteOptions = {}): Promise<[number, Query]> {
        const view = parseResponseView(options.view ?? 'json');
        const client = options.client ?? getHttpClient();

        const response = await client.get(this.url, view, {
            maxAttempts: options.maxAttempts,
            source: options.source,
        });
        this.setResult(response.data);
        return [this.page, this];
    }
}
