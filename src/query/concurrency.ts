import pLimit from 'p-limit';

/**
 * Caps the number of in-flight async operations.
 */
export class ConcurrencyPool {
    private readonly limiter: ReturnType<typeof pLimit>;

    constructor(readonly maxConcurrency = 8) {
        this.limiter = pLimit(maxConcurrency);
    }

    /**
     * Run `fn` once a slot is free.
     */
    run<T>(fn: () => Promise<T>): Promise<T> {
        return this.limiter(fn);
    }

    /** Operations currently running */
    get activeCount(): number {
        return this.limiter.activeCount;
    }

    /** Operations waiting for a slot */
    get pendingCount(): number {
        return this.limiter.pendingCount;
    }
}
