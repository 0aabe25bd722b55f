/**
 * Library entry point.
 */
export * from './types/index.js';
export { PrepubGraphError, InvalidRequestError, SchemaError } from './utils/errors.js';
export {
    HttpClient,
    HttpError,
    RESPONSE_VIEWS,
    parseResponseView,
    getHttpClient,
    createHttpClient,
} from './utils/http-client.js';
export type { ResponseView, HttpClientOptions, HttpRequestOptions, HttpResponse, RateLimit } from './utils/http-client.js';
export { initLogger, getLogger } from './utils/logger.js';
export { resolveConfig } from './utils/config.js';

export { Query, type ExecuteOptions } from './query/query.js';
export { QueryPlanner, readTotalCount, type PlannerOptions, type RunReport, type FailedPage } from './query/planner.js';
export { ConcurrencyPool } from './query/concurrency.js';

export { normalize, getValue, type RawRow } from './normalize/normalizer.js';
export { Table, createTable } from './normalize/table.js';
export { ARTICLE_COLUMNS, tabularize, parseDate, rowToArticleFields } from './normalize/tabularize.js';

export { Registry } from './registry/registry.js';
export { ArticleRegistry } from './registry/article-registry.js';
export { createEntity, type EntityRequest } from './registry/entity-factory.js';
export { createRegistries, getRegistries, resetRegistries, type Registries, type Mediators } from './registry/registries.js';
export { VersionMediator, shouldReplace } from './mediator/version-mediator.js';
export { GroupingMediator, type GroupKey } from './mediator/grouping-mediator.js';

export {
    createArticle,
    createJournal,
    createPublication,
    getMissingInitialVersionDois,
    resolveAuthors,
    departmentOf,
} from './builder/articles.js';
export { runHarvest, buildGraphTables, type HarvestResult, type HarvestStats } from './builder/harvest-builder.js';

export { BiorxivAdapter, DETAILS_KEYS } from './sources/biorxiv.js';
export { CrossrefAdapter, type LinkClassification } from './sources/crossref.js';
export { HarvestDatabase } from './storage/database.js';
export { exportSnapshot, renderExport, type ExportFormat } from './exporters/export.js';
export { VERSION } from './version.js';
