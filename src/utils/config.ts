import { cosmiconfig } from 'cosmiconfig';
import { DEFAULT_CONFIG, MAX_HITS_CAP, type HarvestConfig } from '../types/index.js';
import { getLogger } from './logger.js';

/**
 * Partial configuration as accepted from a file or from CLI flags.
 */
export type HarvestConfigInput = Partial<Omit<HarvestConfig, 'retry'>> & {
    retry?: Partial<HarvestConfig['retry']>;
};

/**
 * Invalid configuration value.
 */
export class ConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigError';
    }
}

const LIST_KEYS = ['keywords', 'venues', 'years'] as const;

/**
 * Read a list of terms from a config file. Numbers are taken as their
 * decimal text, so `"years": [2024]` means "2024".
 */
function stringList(key: string, value: unknown): string[] {
    if (!Array.isArray(value)) {
        throw new ConfigError(`${key} must be a list, got ${JSON.stringify(value)}`);
    }
    return value.map((entry: unknown) => {
        if (typeof entry === 'string') return entry;
        if (typeof entry === 'number' && Number.isFinite(entry)) return String(entry);
        throw new ConfigError(`${key} entries must be strings, got ${JSON.stringify(entry)}`);
    });
}

/**
 * Load configuration from dblp-harvest.config.json using cosmiconfig.
 * Returns null if no config file is found.
 */
async function loadConfigFile(searchFrom?: string): Promise<HarvestConfigInput | null> {
    const explorer = cosmiconfig('dblp-harvest', {
        searchPlaces: ['dblp-harvest.config.json'],
    });

    try {
        const result = await explorer.search(searchFrom);
        if (result && !result.isEmpty) {
            getLogger().debug({ path: result.filepath }, 'Loaded config file');
            if (typeof result.config !== 'object' || result.config === null || Array.isArray(result.config)) {
                throw new ConfigError(`${result.filepath} must contain a JSON object`);
            }

            const fileConfig: HarvestConfigInput = result.config;
            for (const key of LIST_KEYS) {
                const list: unknown = result.config[key];
                if (list !== undefined) fileConfig[key] = stringList(key, list);
            }
            return fileConfig;
        }
    } catch (error) {
        if (error instanceof ConfigError) throw error;
        getLogger().warn({ error }, 'Failed to load config file, using defaults');
    }

    return null;
}

/**
 * Read relevant environment variables.
 */
function loadEnvVars(): HarvestConfigInput {
    const env: HarvestConfigInput = {};

    const email = process.env['DBLP_HARVEST_EMAIL'];
    if (email) env.contactEmail = email;

    const baseUrl = process.env['DBLP_HARVEST_BASE_URL'];
    if (baseUrl) env.baseUrl = baseUrl;

    return env;
}

/**
 * Drop keys whose value is undefined so they don't shadow lower layers.
 */
function defined<T extends object>(input: T | null | undefined): Partial<T> {
    const out: Partial<T> = {};
    if (!input) return out;
    for (const key in input) {
        if (input[key] !== undefined) out[key] = input[key];
    }
    return out;
}

/**
 * Merge configuration from multiple sources.
 * Precedence: CLI flags > environment variables > config file > defaults
 */
export async function resolveConfig(
    cliFlags: HarvestConfigInput,
    options: { searchFrom?: string } = {}
): Promise<HarvestConfig> {
    const fileConfig = await loadConfigFile(options.searchFrom);
    const envConfig = loadEnvVars();

    const merged: HarvestConfig = {
        ...DEFAULT_CONFIG,
        ...defined(fileConfig),
        ...defined(envConfig),
        ...defined(cliFlags),
        // Deep merge nested objects
        retry: {
            ...DEFAULT_CONFIG.retry,
            ...defined(fileConfig?.retry),
            ...defined(cliFlags.retry),
        },
    };

    validateConfig(merged);
    return merged;
}

function nonNegativeInteger(name: string, value: number): void {
    if (!Number.isInteger(value) || value < 0) {
        throw new ConfigError(`${name} must be a non-negative integer, got ${value}`);
    }
}

/**
 * Check the merged configuration. Throws ConfigError on the first problem.
 */
export function validateConfig(config: HarvestConfig): void {
    for (const key of LIST_KEYS) {
        const index = config[key].findIndex((value: unknown) => typeof value !== 'string');
        if (index !== -1) {
            throw new ConfigError(`${key} entries must be strings, got ${String(config[key][index])}`);
        }
    }
    if (config.keywords.length === 0) {
        throw new ConfigError('At least one keyword is required');
    }
    if (config.keywords.some((keyword) => keyword.trim() === '')) {
        throw new ConfigError('Keywords must not be empty');
    }
    if (config.venues.length === 0 || config.years.length === 0) {
        throw new ConfigError('Venues and years must each list at least one entry (use "all" for no filter)');
    }
    if (!Number.isInteger(config.maxHits) || config.maxHits < 1 || config.maxHits > MAX_HITS_CAP) {
        throw new ConfigError(`maxHits must be between 1 and ${MAX_HITS_CAP}, got ${config.maxHits}`);
    }

    nonNegativeInteger('retry.maxRetries', config.retry.maxRetries);
    nonNegativeInteger('retry.backoffBaseMs', config.retry.backoffBaseMs);
    nonNegativeInteger('retry.maxBackoffMs', config.retry.maxBackoffMs);
    nonNegativeInteger('transportRetries', config.transportRetries);
    nonNegativeInteger('interQueryDelayMs', config.interQueryDelayMs);

    if (!Number.isInteger(config.timeoutMs) || config.timeoutMs <= 0) {
        throw new ConfigError(`timeoutMs must be a positive integer, got ${config.timeoutMs}`);
    }
    if (config.pacing !== 'success' && config.pacing !== 'always') {
        throw new ConfigError(`pacing must be "success" or "always", got ${String(config.pacing)}`);
    }
    if (config.format !== 'csv' && config.format !== 'json') {
        throw new ConfigError(`format must be "csv" or "json", got ${String(config.format)}`);
    }
}
