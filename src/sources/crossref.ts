import type { LinkType } from '../types/index.js';
import { getHttpClient, HttpError, type HttpClient } from '../utils/http-client.js';
import { InvalidRequestError, SchemaError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import { isDoi, readString, stripDoiPrefix } from './utils.js';

const CROSSREF_BASE = 'https://api.crossref.org';
const SOURCE = 'crossref';

/**
 * Full-text link listed in a Crossref work record.
 */
export interface CrossrefLink {
    url: string;
    contentType: string;
}

export interface LinkClassification {
    type: LinkType;
    /** Reachable full-text URL; null for `web` */
    url: string | null;
}

export interface CrossrefAdapterOptions {
    baseUrl?: string;
    client?: HttpClient;
    /** Attempts per link validation request */
    validationAttempts?: number;
}

/**
 * Crossref works API adapter: finds where a published article's full text lives.
 *
 * @see https://api.crossref.org/swagger-ui/index.html
 */
export class CrossrefAdapter {
    readonly name = 'Crossref';
    private readonly baseUrl: string;
    private readonly client: HttpClient;
    private readonly validationAttempts: number;

    constructor(options: CrossrefAdapterOptions = {}) {
        this.baseUrl = (options.baseUrl ?? CROSSREF_BASE).replace(/\/+$/, '');
        this.client = options.client ?? getHttpClient();
        this.validationAttempts = options.validationAttempts ?? 1;
    }

    async fetchLinks(pubDoi: string): Promise<CrossrefLink[]> {
        const doi = stripDoiPrefix(pubDoi);
        if (!doi || !isDoi(doi)) {
            throw new InvalidRequestError(`Not a DOI: "${pubDoi}"`);
        }

        const response = await this.client.get(`${this.baseUrl}/works/${doi}`, 'json', { source: SOURCE });
        const payload = response.data;
        const message: unknown =
            typeof payload === 'object' && payload !== null && 'message' in payload ? payload.message : undefined;
        if (typeof message !== 'object' || message === null) {
            throw new SchemaError(`Crossref response for ${doi} has no "message"`, 'message');
        }

        const links: unknown = 'link' in message ? message.link : [];
        if (!Array.isArray(links)) return [];

        return links.flatMap((link: unknown): CrossrefLink[] => {
            const url = readString(link, 'URL');
            const contentType = readString(link, 'content-type');
            return url && contentType ? [{ url, contentType }] : [];
        });
    }

    /**
     * Whether a GET on `url` succeeds. HTTP failures count as unreachable.
     */
    async isReachable(url: string): Promise<boolean> {
        try {
            await this.client.get(url, 'bytes', { source: SOURCE, maxAttempts: this.validationAttempts });
            return true;
        } catch (error) {
            if (error instanceof HttpError) {
                getLogger('crossref').debug({ url, status: error.status }, 'Link not reachable');
                return false;
            }
            throw error;
        }
    }

    /**
     * Prefer a reachable XML link, then a reachable PDF link, else `web`.
     */
    async classify(pubDoi: string): Promise<LinkClassification> {
        const links = await this.fetchLinks(pubDoi);

        for (const [type, contentType] of [['xml', 'application/xml'], ['pdf', 'application/pdf']] as const) {
            const link = links.find((candidate) => candidate.contentType === contentType);
            if (link && (await this.isReachable(link.url))) {
                return { type, url: link.url };
            }
        }
        return { type: 'web', url: null };
    }
}
