/**
 * Barrel export for all shared types.
 */
export { WILDCARD_TOKEN } from './query.js';
export type { Filter, Query } from './query.js';
export type { Result, FetchOutcome, AggregationMap, HarvestStats } from './result.js';
export type { DblpSearchResponse, DblpHit, DblpAuthor } from './dblp.js';
export { DEFAULT_CONFIG, HARVEST_VERSION, MAX_HITS_CAP } from './config.js';
export type {
    HarvestConfig,
    LogLevel,
    ExportFormat,
    PacingMode,
    RetryConfig,
    RunRecord,
} from './config.js';
