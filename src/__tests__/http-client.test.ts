import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from 'vitest';
import { HttpClient, HttpError, parseResponseView } from '../utils/http-client.js';
import { InvalidRequestError, SchemaError } from '../utils/errors.js';

function jsonResponse(body: unknown, status = 200): Response {
    return new Response(JSON.stringify(body), { status, headers: { 'content-type': 'application/json' } });
}

describe('HttpClient', () => {
    let sleep: Mock<(ms: number) => Promise<void>>;
    let client: HttpClient;

    beforeEach(() => {
        sleep = vi.fn<(ms: number) => Promise<void>>(async () => {});
        client = new HttpClient({ timeout: 5000, maxAttempts: 4, baseDelayMs: 100, sleep });
    });

    afterEach(() => {
        vi.unstubAllGlobals();
    });

    describe('response views', () => {
        it('should trim and case-fold view names', () => {
            expect(parseResponseView(' JSON ')).toBe('json');
            expect(parseResponseView('Bytes')).toBe('bytes');
        });

        it('should reject an unknown view before any network call', async () => {
            const mockFetch = vi.fn();
            vi.stubGlobal('fetch', mockFetch);

            await expect(client.get('https://api.example.com/x', 'xml')).rejects.toBeInstanceOf(InvalidRequestError);
            expect(mockFetch).not.toHaveBeenCalled();
        });

        it('should parse json bodies', async () => {
            vi.stubGlobal('fetch', vi.fn(async () => jsonResponse({ messages: [{ total: 3 }] })));

            const response = await client.get('https://api.example.com/x');
            expect(response.data).toEqual({ messages: [{ total: 3 }] });
            expect(response.attempts).toBe(1);
        });

        it('should return text and bytes views', async () => {
            vi.stubGlobal('fetch', vi.fn(async () => new Response('abc')));

            const text = await client.get('https://api.example.com/x', 'text');
            expect(text.data).toBe('abc');

            const bytes = await client.get('https://api.example.com/x', 'bytes');
            expect(bytes.data).toBeInstanceOf(Uint8Array);
            expect(Array.from(bytes.data)).toEqual([97, 98, 99]);
        });

        it('should raise SchemaError for a malformed json body without retrying', async () => {
            const mockFetch = vi.fn(async () => new Response('{not json'));
            vi.stubGlobal('fetch', mockFetch);

            await expect(client.get('https://api.example.com/x', 'json')).rejects.toBeInstanceOf(SchemaError);
            expect(mockFetch).toHaveBeenCalledTimes(1);
        });
    });

    describe('retries', () => {
        it('should double the delay between attempts and give up after maxAttempts', async () => {
            const mockFetch = vi.fn(async () => new Response('busy', { status: 503 }));
            vi.stubGlobal('fetch', mockFetch);

            const error: unknown = await client.get('https://api.example.com/x').catch((e: unknown) => e);

            expect(error).toBeInstanceOf(HttpError);
            if (!(error instanceof HttpError)) return;
            expect(error.status).toBe(503);
            expect(error.attempts).toBe(4);
            expect(error.retryable).toBe(false);
            expect(mockFetch).toHaveBeenCalledTimes(4);
            expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([100, 200, 400]);
        });

        it('should return once a retry succeeds', async () => {
            const mockFetch = vi
                .fn()
                .mockImplementationOnce(async () => new Response('', { status: 500 }))
                .mockImplementationOnce(async () => {
                    throw new TypeError('fetch failed');
                })
                .mockImplementationOnce(async () => jsonResponse({ ok: true }));
            vi.stubGlobal('fetch', mockFetch);

            const response = await client.get('https://api.example.com/x');
            expect(response.data).toEqual({ ok: true });
            expect(response.attempts).toBe(3);
            expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([100, 200]);
        });

        it('should not retry a 404', async () => {
            const mockFetch = vi.fn(async () => new Response('missing', { status: 404, statusText: 'Not Found' }));
            vi.stubGlobal('fetch', mockFetch);

            const error: unknown = await client.get('https://api.example.com/x').catch((e: unknown) => e);

            expect(error).toBeInstanceOf(HttpError);
            if (!(error instanceof HttpError)) return;
            expect(error.status).toBe(404);
            expect(error.retryable).toBe(false);
            expect(error.response).toBe('missing');
            expect(mockFetch).toHaveBeenCalledTimes(1);
            expect(sleep).not.toHaveBeenCalled();
        });

        it('should honour a per-request attempt ceiling', async () => {
            const mockFetch = vi.fn(async () => new Response('', { status: 429 }));
            vi.stubGlobal('fetch', mockFetch);

            await expect(client.get('https://api.example.com/x', 'json', { maxAttempts: 1 })).rejects.toBeInstanceOf(HttpError);
            expect(mockFetch).toHaveBeenCalledTimes(1);
            expect(sleep).not.toHaveBeenCalled();
        });

        it('should reject a ceiling below one attempt', () => {
            expect(() => new HttpClient({ maxAttempts: 0 })).toThrow(InvalidRequestError);
        });

        it('should compute backoff as base * 2^attempt', () => {
            expect([0, 1, 2, 3].map((attempt) => client.backoffFor(attempt))).toEqual([100, 200, 400, 800]);
        });
    });

    describe('request counting', () => {
        it('should count every attempt per source', async () => {
            vi.stubGlobal(
                'fetch',
                vi
                    .fn()
                    .mockImplementationOnce(async () => new Response('', { status: 502 }))
                    .mockImplementation(async () => jsonResponse({}))
            );

            await client.get('https://api.example.com/1', 'json', { source: 'biorxiv' });
            await client.get('https://api.example.com/2', 'json', { source: 'crossref' });

            expect(client.getAllRequestCounts()).toEqual({ biorxiv: 2, crossref: 1 });
            client.resetCounts();
            expect(client.getRequestCount('biorxiv')).toBe(0);
        });
    });

    describe('headers', () => {
        it('should send a User-Agent with the contact address', async () => {
            const mockFetch = vi.fn(async (_url: string, _init: RequestInit) => jsonResponse({}));
            vi.stubGlobal('fetch', mockFetch);

            await new HttpClient({ version: '9.9.9', mailto: 'test@example.org' }).get('https://api.example.com/x');

            const init = mockFetch.mock.calls[0]?.[1];
            expect(init?.headers).toEqual({ 'User-Agent': 'prepubgraph/9.9.9 (mailto:test@example.org)' });
        });
    });

    describe('HttpError', () => {
        it('should create error with status and retryable flag', () => {
            const error = new HttpError('Not Found', 404, false);
            expect(error.message).toBe('Not Found');
            expect(error.status).toBe(404);
            expect(error.retryable).toBe(false);
            expect(error.attempts).toBe(1);
            expect(error.name).toBe('HttpError');
        });
    });
});
