import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { DEFAULT_OUT, loadEnvVars, resolveConfig, sanitizeFileConfig, validateConfig } from '../utils/config.js';
import { DEFAULT_CONFIG } from '../types/index.js';
import { InvalidRequestError } from '../utils/errors.js';

describe('sanitizeFileConfig', () => {
    it('should keep well-typed entries and drop the rest', () => {
        expect(
            sanitizeFileConfig({
                server: 'medrxiv',
                pageSize: 50,
                concurrency: 'lots',
                logLevel: 'verbose',
                resolveLinks: true,
                mailto: 'test@example.org',
                unknown: 1,
            })
        ).toEqual({ server: 'medrxiv', pageSize: 50, resolveLinks: true, mailto: 'test@example.org' });
    });

    it('should ignore anything that is not an object', () => {
        expect(sanitizeFileConfig(null)).toEqual({});
        expect(sanitizeFileConfig([1, 2])).toEqual({});
        expect(sanitizeFileConfig('pageSize=5')).toEqual({});
    });
});

describe('loadEnvVars', () => {
    it('should read the API base and contact address', () => {
        expect(
            loadEnvVars({ PREPUBGRAPH_API_BASE: 'https://api.example.org', PREPUBGRAPH_MAILTO: 'test@example.org' })
        ).toEqual({ apiBase: 'https://api.example.org', mailto: 'test@example.org' });
        expect(loadEnvVars({ PREPUBGRAPH_MAILTO: '' })).toEqual({});
    });
});

describe('validateConfig', () => {
    it('should reject non-positive sizes and a negative delay', () => {
        const base = { ...DEFAULT_CONFIG, out: DEFAULT_OUT };
        expect(validateConfig(base)).toBe(base);
        expect(() => validateConfig({ ...base, concurrency: 0 })).toThrow(InvalidRequestError);
        expect(() => validateConfig({ ...base, pageSize: 2.5 })).toThrow(InvalidRequestError);
        expect(() => validateConfig({ ...base, baseDelayMs: -1 })).toThrow(InvalidRequestError);
    });
});

describe('resolveConfig', () => {
    let tmpDir: string;

    beforeEach(() => {
        tmpDir = mkdtempSync(join(tmpdir(), 'prepubgraph-config-'));
    });

    afterEach(() => {
        rmSync(tmpDir, { recursive: true, force: true });
    });

    it('should fall back to defaults without a config file', async () => {
        const config = await resolveConfig({}, { searchFrom: tmpDir, env: {} });
        expect(config).toEqual({ ...DEFAULT_CONFIG, out: DEFAULT_OUT });
    });

    it('should layer file, environment and flags in that order', async () => {
        writeFileSync(
            join(tmpDir, 'prepubgraph.config.json'),
            JSON.stringify({ server: 'medrxiv', pageSize: 50, concurrency: 4, mailto: 'file@example.org', out: './file.db' })
        );

        const config = await resolveConfig(
            { concurrency: 2, from: '2021-01-01', to: undefined },
            { searchFrom: tmpDir, env: { PREPUBGRAPH_MAILTO: 'env@example.org' } }
        );

        expect(config.server).toBe('medrxiv');
        expect(config.pageSize).toBe(50);
        expect(config.concurrency).toBe(2);
        expect(config.mailto).toBe('env@example.org');
        expect(config.out).toBe('./file.db');
        expect(config.from).toBe('2021-01-01');
        expect(config.to).toBeUndefined();
        expect(config.maxAttempts).toBe(DEFAULT_CONFIG.maxAttempts);
    });

    it('should reject an invalid merged configuration', async () => {
        await expect(resolveConfig({ pageSize: 0 }, { searchFrom: tmpDir, env: {} })).rejects.toBeInstanceOf(
            InvalidRequestError
        );
    });
});
