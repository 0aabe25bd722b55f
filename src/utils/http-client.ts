import { getLogger } from './logger.js';
import { InvalidRequestError, PrepubGraphError, SchemaError } from './errors.js';

/**
 * Error classification for HTTP responses.
 */
const RETRYABLE_STATUS_CODES = new Set([429, 500, 502, 503, 504]);
const RETRYABLE_ERROR_CODES = new Set(['ECONNRESET', 'ECONNREFUSED', 'ETIMEDOUT', 'EPIPE', 'EAI_AGAIN', 'UND_ERR_SOCKET', 'UND_ERR_CONNECT_TIMEOUT']);

/**
 * Views a caller can take of a response body.
 */
export const RESPONSE_VIEWS = ['text', 'bytes', 'json'] as const;
export type ResponseView = (typeof RESPONSE_VIEWS)[number];

/**
 * Validate a requested view name. Names are trimmed and case-folded first.
 * @throws InvalidRequestError for anything other than text, bytes or json
 */
export function parseResponseView(view: string): ResponseView {
    const normalized = view.trim().toLowerCase();
    const match = RESPONSE_VIEWS.find((v) => v === normalized);
    if (!match) {
        throw new InvalidRequestError(`Unexpected response view "${view}" (expected one of ${RESPONSE_VIEWS.join(', ')})`);
    }
    return match;
}

/**
 * Token bucket rate limiter.
 * Allows `tokensPerSecond` requests per second with burst capacity.
 */
class TokenBucket {
    private tokens: number;
    private lastRefill: number;

    constructor(
        private readonly tokensPerSecond: number,
        private readonly maxTokens: number
    ) {
        this.tokens = maxTokens;
        this.lastRefill = Date.now();
    }

    async acquire(): Promise<void> {
        this.refill();

        if (this.tokens >= 1) {
            this.tokens -= 1;
            return;
        }

        // Reserve the token now so concurrent callers queue behind each other
        const waitMs = ((1 - this.tokens) / this.tokensPerSecond) * 1000;
        this.tokens -= 1;
        await sleep(waitMs);
    }

    private refill(): void {
        const now = Date.now();
        const elapsed = (now - this.lastRefill) / 1000;
        this.tokens = Math.min(this.maxTokens, this.tokens + elapsed * this.tokensPerSecond);
        this.lastRefill = now;
    }
}

export interface RateLimit {
    tokensPerSecond: number;
    maxBurst: number;
}

/**
 * Options shared by every request a client makes.
 */
export interface HttpClientOptions {
    timeout?: number;
    version?: string;
    mailto?: string;
    /** Attempt ceiling per request, first attempt included */
    maxAttempts?: number;
    /** Delay before the first retry; doubles for each later retry */
    baseDelayMs?: number;
    /** Per-source limits; sources without an entry are not throttled */
    rateLimits?: Record<string, RateLimit>;
    sleep?: (ms: number) => Promise<void>;
}

/**
 * HTTP request options.
 */
export interface HttpRequestOptions {
    headers?: Record<string, string>;
    timeout?: number;
    source?: string;  // For per-source rate limiting and counters
    maxAttempts?: number;
}

/**
 * HTTP response wrapper.
 */
export interface HttpResponse<T = unknown> {
    status: number;
    headers: Record<string, string>;
    data: T;
    ok: boolean;
    /** Number of attempts it took, 1 when the first call succeeded */
    attempts: number;
}

/**
 * HTTP error with classification.
 */
export class HttpError extends PrepubGraphError {
    constructor(
        message: string,
        public readonly status: number,
        public readonly retryable: boolean,
        public readonly response?: unknown,
        public readonly attempts = 1,
        options?: ErrorOptions
    ) {
        super(message, options);
        this.name = 'HttpError';
    }
}

/**
 * GET-only HTTP client with per-source rate limiting and bounded
 * exponential-backoff retries.
 */
export class HttpClient {
    private buckets = new Map<string, TokenBucket>();
    private requestCounts = new Map<string, number>();
    private readonly defaultTimeout: number;
    private readonly userAgent: string;
    private readonly maxAttempts: number;
    private readonly baseDelayMs: number;
    private readonly rateLimits: Record<string, RateLimit>;
    private readonly sleep: (ms: number) => Promise<void>;

    constructor(options: HttpClientOptions = {}) {
        this.defaultTimeout = options.timeout ?? 30000;
        this.maxAttempts = options.maxAttempts ?? 10;
        this.baseDelayMs = options.baseDelayMs ?? 1000;
        this.rateLimits = options.rateLimits ?? {};
        this.sleep = options.sleep ?? sleep;

        const version = options.version ?? '1.0.0';
        this.userAgent = options.mailto
            ? `prepubgraph/${version} (mailto:${options.mailto})`
            : `prepubgraph/${version}`;

        if (this.maxAttempts < 1) {
            throw new InvalidRequestError(`maxAttempts must be at least 1, got ${this.maxAttempts}`);
        }
    }

    /**
     * GET a URL and return the requested view of its body.
     *
     * Network failures, timeouts and 429/5xx responses are retried, waiting
     * `baseDelayMs * 2^attempt` between attempts. Once `maxAttempts` attempts
     * have failed an `HttpError` is thrown. Other 4xx responses fail at once.
     */
    async get(url: string, view: 'text', options?: HttpRequestOptions): Promise<HttpResponse<string>>;
    async get(url: string, view: 'bytes', options?: HttpRequestOptions): Promise<HttpResponse<Uint8Array>>;
    async get(url: string, view?: string, options?: HttpRequestOptions): Promise<HttpResponse<unknown>>;
    async get(url: string, view = 'json', options: HttpRequestOptions = {}): Promise<HttpResponse<unknown>> {
        // Validated before any network traffic
        const responseView = parseResponseView(view);
        const {
            headers = {},
            timeout = this.defaultTimeout,
            source = 'default',
            maxAttempts = this.maxAttempts,
        } = options;
        const logger = getLogger('http');

        const requestHeaders: Record<string, string> = {
            'User-Agent': this.userAgent,
            ...headers,
        };

        for (let attempt = 0; attempt < maxAttempts; attempt++) {
            await this.getBucket(source)?.acquire();
            this.requestCounts.set(source, (this.requestCounts.get(source) ?? 0) + 1);

            let failure: HttpError;
            try {
                const controller = new AbortController();
                const timeoutId = setTimeout(() => controller.abort(), timeout);

                let response: Response;
                let body: Uint8Array;
                try {
                    response = await fetch(url, {
                        method: 'GET',
                        headers: requestHeaders,
                        signal: controller.signal,
                    });
                    body = new Uint8Array(await response.arrayBuffer());
                } finally {
                    clearTimeout(timeoutId);
                }

                if (response.ok) {
                    const responseHeaders: Record<string, string> = {};
                    response.headers.forEach((value, key) => {
                        responseHeaders[key] = value;
                    });

                    return {
                        status: response.status,
                        headers: responseHeaders,
                        data: decodeBody(body, responseView, url),
                        ok: true,
                        attempts: attempt + 1,
                    };
                }

                const retryable = RETRYABLE_STATUS_CODES.has(response.status);
                failure = new HttpError(
                    `HTTP ${response.status}: ${response.statusText}`,
                    response.status,
                    retryable,
                    new TextDecoder().decode(body),
                    attempt + 1
                );
                if (!retryable) throw failure;
            } catch (error) {
                if (error instanceof PrepubGraphError) throw error;
                failure = classifyNetworkError(error, url, timeout, attempt + 1);
                if (!failure.retryable) throw failure;
            }

            if (attempt + 1 >= maxAttempts) {
                throw new HttpError(
                    `Giving up on ${url} after ${maxAttempts} attempts: ${failure.message}`,
                    failure.status,
                    false,
                    failure.response,
                    maxAttempts,
                    { cause: failure }
                );
            }

            const backoff = this.backoffFor(attempt);
            logger.warn(
                { status: failure.status, attempt: attempt + 1, backoffMs: backoff, url },
                'Retryable request failure, backing off'
            );
            await this.sleep(backoff);
        }

        // maxAttempts >= 1 means the loop always returns or throws
        throw new HttpError(`Max attempts exceeded for ${url}`, 0, false, undefined, maxAttempts);
    }

    /**
     * Delay before retry number `attempt + 1`.
     */
    backoffFor(attempt: number): number {
        return this.baseDelayMs * 2 ** attempt;
    }

    /**
     * Get request count for a source.
     */
    getRequestCount(source: string): number {
        return this.requestCounts.get(source) ?? 0;
    }

    /**
     * Get all request counts.
     */
    getAllRequestCounts(): Record<string, number> {
        return Object.fromEntries(this.requestCounts.entries());
    }

    /**
     * Reset request counts.
     */
    resetCounts(): void {
        this.requestCounts.clear();
    }

    private getBucket(source: string): TokenBucket | undefined {
        const limit = this.rateLimits[source];
        if (!limit) return undefined;

        let bucket = this.buckets.get(source);
        if (!bucket) {
            bucket = new TokenBucket(limit.tokensPerSecond, limit.maxBurst);
            this.buckets.set(source, bucket);
        }
        return bucket;
    }
}

function decodeBody(body: Uint8Array, view: ResponseView, url: string): unknown {
    switch (view) {
        case 'bytes':
            return body;
        case 'text':
            return new TextDecoder().decode(body);
        case 'json':
            try {
                const parsed: unknown = JSON.parse(new TextDecoder().decode(body));
                return parsed;
            } catch (error) {
                throw new SchemaError(`Response from ${url} is not valid JSON`, undefined, { cause: error });
            }
    }
}

function errorCode(error: unknown): string | undefined {
    if (typeof error !== 'object' || error === null) return undefined;
    if ('code' in error && typeof error.code === 'string') return error.code;
    if ('cause' in error) return errorCode(error.cause);
    return undefined;
}

function classifyNetworkError(error: unknown, url: string, timeout: number, attempts: number): HttpError {
    if (error instanceof Error && error.name === 'AbortError') {
        return new HttpError(`Request timeout after ${timeout}ms: ${url}`, 0, true, undefined, attempts, { cause: error });
    }

    const code = errorCode(error);
    const retryable = code
        ? RETRYABLE_ERROR_CODES.has(code)
        : error instanceof TypeError && error.message === 'fetch failed';

    return new HttpError(
        `Network error: ${error instanceof Error ? error.message : String(error)}`,
        0,
        retryable,
        undefined,
        attempts,
        { cause: error }
    );
}

/**
 * Sleep for the specified number of milliseconds.
 */
function sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Singleton HTTP client instance.
 */
let clientInstance: HttpClient | null = null;

/**
 * Get the shared HTTP client instance. Options only apply on first call.
 */
export function getHttpClient(options?: HttpClientOptions): HttpClient {
    if (!clientInstance) {
        clientInstance = new HttpClient(options);
    }
    return clientInstance;
}

/**
 * Create a new HTTP client (for testing or custom configuration).
 */
export function createHttpClient(options?: HttpClientOptions): HttpClient {
    return new HttpClient(options);
}
