import { describe, it, expect } from 'vitest';
import { DEFAULT_CONFIG, UNPUBLISHED, isPublished } from '../types/index.js';

describe('Types', () => {
    describe('DEFAULT_CONFIG', () => {
        it('should have sensible defaults', () => {
            expect(DEFAULT_CONFIG.server).toBe('biorxiv');
            expect(DEFAULT_CONFIG.apiBase).toBe('https://api.biorxiv.org');
            expect(DEFAULT_CONFIG.pageSize).toBe(100);
            expect(DEFAULT_CONFIG.maxAttempts).toBe(10);
            expect(DEFAULT_CONFIG.resolveJournals).toBe(true);
            expect(DEFAULT_CONFIG.resolveLinks).toBe(false);
            expect(DEFAULT_CONFIG.fetchMissingVersions).toBe(true);
            expect(DEFAULT_CONFIG.logLevel).toBe('info');
        });
    });

    describe('isPublished', () => {
        it('should treat the sentinel in any case as unpublished', () => {
            expect(isPublished(UNPUBLISHED)).toBe(false);
            expect(isPublished(' na ')).toBe(false);
            expect(isPublished('')).toBe(false);
            expect(isPublished('10.1000/j.1')).toBe(true);
        });
    });
});
