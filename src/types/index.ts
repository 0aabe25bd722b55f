/**
 * Barrel export for all shared types.
 */
export { UNPUBLISHED, isPublished } from './entity.js';
export type {
    EntityKind,
    Identifiable,
    MediatorKey,
    Institution,
    Department,
    Category,
    Author,
    Article,
    ArticleFields,
    Journal,
    Publication,
    Entity,
    LinkType,
} from './entity.js';
export type { GraphNode, GraphEdge, GraphTables } from './graph.js';
export { DEFAULT_CONFIG } from './config.js';
export type { PrepubGraphConfig, PreprintServer, LogLevel, RunRecord } from './config.js';
