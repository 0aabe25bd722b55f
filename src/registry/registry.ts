import type { Identifiable } from '../types/index.js';

/**
 * Identity map for one entity kind.
 *
 * `createOrGet` is first-writer-wins: once an id is present the builder of
 * every later call is never invoked and the stored instance is returned.
 * Nothing here awaits, so a lookup and its insert always run back to back.
 */
export class Registry<T extends Identifiable> {
    private readonly entries = new Map<string, T>();

    constructor(readonly kind: string) {}

    createOrGet(id: string, build: () => T): T {
        const existing = this.entries.get(id);
        if (existing) return existing;

        const created = build();
        this.entries.set(id, created);
        return created;
    }

    get(id: string): T | undefined {
        return this.entries.get(id);
    }

    has(id: string): boolean {
        return this.entries.has(id);
    }

    get size(): number {
        return this.entries.size;
    }

    values(): T[] {
        return [...this.entries.values()];
    }
}
