import { cosmiconfig } from 'cosmiconfig';
import { DEFAULT_CONFIG, type LogLevel, type PrepubGraphConfig, type PreprintServer } from '../types/index.js';
import { InvalidRequestError } from './errors.js';
import { getLogger } from './logger.js';

export const DEFAULT_OUT = './prepubgraph.db';

const SERVERS: readonly PreprintServer[] = ['biorxiv', 'medrxiv'];
const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug'];

/**
 * Keep only the fields of a parsed config file that have the expected type.
 * Anything else is logged and dropped.
 */
export function sanitizeFileConfig(raw: unknown): Partial<PrepubGraphConfig> {
    const config: Partial<PrepubGraphConfig> = {};
    if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) return config;

    const read = (key: string): unknown => (key in raw ? Reflect.get(raw, key) : undefined);
    const dropped: string[] = [];

    const text = (key: string): string | undefined => {
        const value = read(key);
        if (value === undefined) return undefined;
        if (typeof value === 'string') return value;
        dropped.push(key);
        return undefined;
    };
    const count = (key: string): number | undefined => {
        const value = read(key);
        if (value === undefined) return undefined;
        if (typeof value === 'number' && Number.isFinite(value) && value >= 0) return value;
        dropped.push(key);
        return undefined;
    };
    const flag = (key: string): boolean | undefined => {
        const value = read(key);
        if (value === undefined) return undefined;
        if (typeof value === 'boolean') return value;
        dropped.push(key);
        return undefined;
    };

    const server = text('server');
    if (server !== undefined) {
        const match = SERVERS.find((s) => s === server);
        if (match) config.server = match;
        else dropped.push('server');
    }
    const logLevel = text('logLevel');
    if (logLevel !== undefined) {
        const match = LOG_LEVELS.find((l) => l === logLevel);
        if (match) config.logLevel = match;
        else dropped.push('logLevel');
    }

    config.from = text('from');
    config.to = text('to');
    config.apiBase = text('apiBase');
    config.mailto = text('mailto');
    config.out = text('out');
    config.pageSize = count('pageSize');
    config.maxAttempts = count('maxAttempts');
    config.baseDelayMs = count('baseDelayMs');
    config.concurrency = count('concurrency');
    config.timeout = count('timeout');
    config.requestsPerSecond = count('requestsPerSecond');
    config.resolveJournals = flag('resolveJournals');
    config.resolveLinks = flag('resolveLinks');
    config.fetchMissingVersions = flag('fetchMissingVersions');
    config.jsonLogs = flag('jsonLogs');

    if (dropped.length > 0) {
        getLogger('config').warn({ keys: dropped }, 'Ignoring config file entries with the wrong type');
    }
    return withoutUndefined(config);
}

/**
 * Load configuration from prepubgraph.config.json using cosmiconfig.
 * Returns null if no config file is found; defaults are used then.
 */
async function loadConfigFile(searchFrom?: string): Promise<Partial<PrepubGraphConfig> | null> {
    const explorer = cosmiconfig('prepubgraph', {
        searchPlaces: ['prepubgraph.config.json'],
    });

    try {
        const result = await explorer.search(searchFrom);
        if (result && !result.isEmpty) {
            getLogger('config').debug({ path: result.filepath }, 'Loaded config file');
            return sanitizeFileConfig(result.config);
        }
    } catch (error) {
        getLogger('config').warn({ error }, 'Failed to load config file, using defaults');
    }

    return null;
}

/**
 * Read relevant environment variables.
 */
export function loadEnvVars(env: NodeJS.ProcessEnv = process.env): Partial<PrepubGraphConfig> {
    const config: Partial<PrepubGraphConfig> = {};

    const apiBase = env['PREPUBGRAPH_API_BASE'];
    if (apiBase) config.apiBase = apiBase;

    const mailto = env['PREPUBGRAPH_MAILTO'];
    if (mailto) config.mailto = mailto;

    return config;
}

function withoutUndefined(config: Partial<PrepubGraphConfig>): Partial<PrepubGraphConfig> {
    const result: Partial<PrepubGraphConfig> = {};
    for (const [key, value] of Object.entries(config)) {
        if (value !== undefined) Reflect.set(result, key, value);
    }
    return result;
}

/**
 * Reject settings no harvest can run with.
 */
export function validateConfig(config: PrepubGraphConfig): PrepubGraphConfig {
    const positive: Array<keyof PrepubGraphConfig> = ['pageSize', 'maxAttempts', 'concurrency', 'timeout'];
    for (const key of positive) {
        const value = config[key];
        if (typeof value !== 'number' || !Number.isInteger(value) || value < 1) {
            throw new InvalidRequestError(`${key} must be a positive integer, got ${String(value)}`);
        }
    }
    if (!Number.isFinite(config.baseDelayMs) || config.baseDelayMs < 0) {
        throw new InvalidRequestError(`baseDelayMs must be a non-negative number, got ${config.baseDelayMs}`);
    }
    return config;
}

/**
 * Merge configuration from multiple sources.
 * Precedence: CLI flags > environment variables > config file > defaults
 */
export async function resolveConfig(
    cliFlags: Partial<PrepubGraphConfig>,
    options: { searchFrom?: string; env?: NodeJS.ProcessEnv } = {}
): Promise<PrepubGraphConfig> {
    const fileConfig = await loadConfigFile(options.searchFrom);
    const envConfig = loadEnvVars(options.env);

    const merged: PrepubGraphConfig = {
        ...DEFAULT_CONFIG,
        out: DEFAULT_OUT,
        ...fileConfig,
        ...envConfig,
        ...withoutUndefined(cliFlags),
    };

    return validateConfig(merged);
}
