/**
 * Log level options.
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

/**
 * Preprint servers exposed by the details API.
 */
export type PreprintServer = 'biorxiv' | 'medrxiv';

/**
 * Full configuration merged from CLI flags, env vars, and config file.
 */
export interface PrepubGraphConfig {
    // Input
    server: PreprintServer;
    from?: string;
    to?: string;
    apiBase: string;
    mailto?: string;

    // Fetching
    pageSize: number;
    maxAttempts: number;
    baseDelayMs: number;
    concurrency: number;
    timeout: number;
    requestsPerSecond?: number;

    // Enrichment
    resolveJournals: boolean;
    resolveLinks: boolean;
    fetchMissingVersions: boolean;

    // Output
    out: string;

    // Logging
    logLevel: LogLevel;
    jsonLogs: boolean;
}

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: Omit<PrepubGraphConfig, 'out'> = {
    server: 'biorxiv',
    apiBase: 'https://api.biorxiv.org',
    pageSize: 100,
    maxAttempts: 10,
    baseDelayMs: 1000,
    concurrency: 8,
    timeout: 30000,
    resolveJournals: true,
    resolveLinks: false,
    fetchMissingVersions: true,
    logLevel: 'info',
    jsonLogs: false,
};

/**
 * Run metadata stored in the SQLite `runs` table.
 */
export interface RunRecord {
    run_id?: number;
    created_at: string;
    prepubgraph_version: string;
    config_json: string;
    server: string;
    interval: string;
    stats_json: string;
}
