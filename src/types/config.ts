/**
 * Release version, reported in the User-Agent header and stored with every run.
 */
export const HARVEST_VERSION = '1.0.0';

/**
 * Log level options.
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug' | 'silent';

/**
 * Report formats written at the end of a run.
 */
export type ExportFormat = 'csv' | 'json';

/**
 * When the inter-query delay applies:
 * - `success`: only after a query whose response parsed cleanly
 * - `always`: after every query, whatever its outcome
 */
export type PacingMode = 'success' | 'always';

/**
 * Per-query retry policy for the search API.
 */
export interface RetryConfig {
    /** Retries allowed after the first attempt */
    maxRetries: number;
    /** First backoff delay, doubled after every retry */
    backoffBaseMs: number;
    /** Ceiling for the computed backoff (server hints may exceed it) */
    maxBackoffMs: number;
}

/**
 * Full configuration merged from CLI flags, env vars, and config file.
 */
export interface HarvestConfig {
    // Query space
    keywords: string[];
    venues: string[];
    years: string[];

    // Upstream API
    baseUrl: string;
    maxHits: number;
    timeoutMs: number;
    contactEmail: string;

    // Resilience
    retry: RetryConfig;
    /** Extra attempts the HTTP client makes on its own for 5xx and network errors */
    transportRetries: number;
    interQueryDelayMs: number;
    pacing: PacingMode;

    // Citation records
    saveBibtex: boolean;
    bibExtension: string;

    // Output
    outdir: string;
    format: ExportFormat;

    // Logging
    logLevel: LogLevel;
    jsonLogs: boolean;
    logFile?: string;
}

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: HarvestConfig = {
    keywords: ['data condensation', 'data distillation'],
    venues: ['ICLR', 'ICML', 'NIPS', 'AAAI', 'KDD', 'ICDM', 'WSDM', 'WWW', 'CIKM', 'IJCAI', 'CVPR', 'ICCV', 'ECCV'],
    years: ['2024', '2023'],
    baseUrl: 'https://dblp.org/search/publ/api',
    maxHits: 100,
    timeoutMs: 10_000,
    contactEmail: 'dblp-harvest@example.com',
    retry: {
        maxRetries: 5,
        backoffBaseMs: 5_000,
        maxBackoffMs: 300_000,
    },
    transportRetries: 0,
    interQueryDelayMs: 5_000,
    pacing: 'success',
    saveBibtex: false,
    bibExtension: '.bib',
    outdir: './data_condensation',
    format: 'csv',
    logLevel: 'info',
    jsonLogs: false,
};

/**
 * Upper bound the search API accepts for the `h` parameter.
 */
export const MAX_HITS_CAP = 1000;

/**
 * Run metadata stored in the SQLite `runs` table.
 */
export interface RunRecord {
    run_id?: number;
    created_at: string;
    harvest_version: string;
    config_json: string;
    stats_json: string;
}
