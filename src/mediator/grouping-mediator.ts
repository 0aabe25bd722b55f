import type { Identifiable, MediatorKey } from '../types/index.js';
import type { GraphEdge, GraphNode, GraphTables } from '../types/graph.js';
import { compareStrings, insertSortedUnique } from '../utils/sorted.js';
import { getLogger } from '../utils/logger.js';

export type GroupKey = MediatorKey | string;

function keyId(key: GroupKey): string {
    return typeof key === 'string' ? key : key.id;
}

function byId(a: Identifiable, b: Identifiable): number {
    return compareStrings(a.id, b.id);
}

/**
 * Read a named attribute off a grouped value and render it as text.
 */
export function readAttribute(source: object, attribute: string): string {
    if (!(attribute in source)) {
        throw new TypeError(`No attribute "${attribute}"`);
    }
    const value: unknown = Reflect.get(source, attribute);
    if (typeof value === 'string') return value;
    if (typeof value === 'number') return String(value);
    throw new TypeError(`Attribute "${attribute}" is not text`);
}

/**
 * Key -> sorted, duplicate-free list of items.
 *
 * Keys are either named entities (institution, department, category) or plain
 * strings such as a link type. Items are kept ordered by id and inserted only
 * when no item with the same id is present.
 */
export class GroupingMediator<T extends Identifiable & { readonly kind: string }> {
    private readonly groups = new Map<string, { key: GroupKey; items: T[] }>();

    constructor(readonly keyKind: string) {}

    /**
     * @returns false when an item with the same id was already grouped under `key`
     */
    add(key: GroupKey, item: T): boolean {
        const id = keyId(key);
        let group = this.groups.get(id);
        if (!group) {
            group = { key, items: [] };
            this.groups.set(id, group);
        }
        return insertSortedUnique(group.items, item, byId);
    }

    get(key: GroupKey): readonly T[] {
        return this.groups.get(keyId(key))?.items ?? [];
    }

    keys(): GroupKey[] {
        return [...this.groups.values()].map((group) => group.key);
    }

    get size(): number {
        return this.groups.size;
    }

    /**
     * Project the grouping as graph rows. One node per key and per distinct
     * item, one edge per (key, item) pair. A row whose attribute cannot be read
     * is logged and left out.
     *
     * @param keyAttribute - attribute of a key used as its node name (ignored for string keys)
     * @param itemAttribute - attribute of an item used as its node name
     */
    toGraphTables(keyAttribute: string, itemAttribute: string, relationship: string): GraphTables {
        const logger = getLogger('mediator');
        const nodes: GraphNode[] = [];
        const edges: GraphEdge[] = [];
        const seen = new Set<string>();

        for (const [id, { key, items }] of this.groups) {
            let keyName: string;
            try {
                keyName = typeof key === 'string' ? key : readAttribute(key, keyAttribute);
            } catch (error) {
                logger.warn({ key: id, attribute: keyAttribute, error }, 'Skipping group with unreadable key');
                continue;
            }
            const keyKind = typeof key === 'string' ? this.keyKind : key.kind;
            if (!seen.has(id)) {
                seen.add(id);
                nodes.push({ id, kind: keyKind, name: keyName });
            }

            for (const item of items) {
                try {
                    const name = readAttribute(item, itemAttribute);
                    if (!seen.has(item.id)) {
                        seen.add(item.id);
                        nodes.push({ id: item.id, kind: item.kind, name });
                    }
                    edges.push({ src: id, srcKind: keyKind, dst: item.id, dstKind: item.kind, relationship });
                } catch (error) {
                    logger.warn({ key: id, item: item.id, attribute: itemAttribute, error }, 'Skipping unreadable row');
                }
            }
        }

        return { nodes, edges };
    }
}
