import type { Logger } from 'pino';
import type { HarvestConfig } from '../types/index.js';
import { HttpClient, sleep, type Transport } from './http-client.js';
import { getLogger } from './logger.js';

/**
 * Everything a run shares: settings, the one transport (connection reuse),
 * the log sink, and the clock used for waits. Built once per run and passed
 * into the fetcher, downloader and orchestrator.
 */
export interface HarvestContext {
    readonly config: HarvestConfig;
    readonly transport: Transport;
    readonly logger: Logger;
    readonly sleep: (ms: number) => Promise<void>;
}

export function createContext(
    config: HarvestConfig,
    overrides: Partial<Omit<HarvestContext, 'config'>> = {}
): HarvestContext {
    const logger = overrides.logger ?? getLogger();

    const transport = overrides.transport ?? new HttpClient({
        timeout: config.timeoutMs,
        email: config.contactEmail,
        retries: config.transportRetries,
        logger,
    });

    return {
        config,
        transport,
        logger,
        sleep: overrides.sleep ?? sleep,
    };
}
