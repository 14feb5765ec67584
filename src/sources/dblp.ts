import { MAX_HITS_CAP, type FetchOutcome, type Query, type Result } from '../types/index.js';
import type { HarvestContext } from '../utils/context.js';
import { HttpError } from '../utils/http-client.js';
import { asText, isRecord, normalizeHit } from './normalize.js';
import { buildQueryString, describeQuery } from './query.js';
import { initialRetryState, resume, transition, type AttemptingState, type FailureEvent } from './retry-state.js';

/**
 * Outcome of decoding one search response body.
 */
export type ParsedSearch =
    | { kind: 'empty' }
    | { kind: 'hits'; total: number; results: Result[] }
    | { kind: 'malformed'; reason: string; results: Result[] };

type Attempt =
    | { ok: true; data: unknown }
    | { ok: false; event: FailureEvent; error: string };

/**
 * Read a decoded search response. `@total` missing or zero means no results;
 * a single hit object is treated as a one-element list. On a structural
 * fault the results read so far are kept.
 */
export function parseSearchResponse(data: unknown): ParsedSearch {
    if (!isRecord(data)) {
        return { kind: 'malformed', reason: 'Response is not an object', results: [] };
    }

    const result = data['result'];
    const hits = isRecord(result) ? result['hits'] : undefined;
    const rawTotal = isRecord(hits) ? hits['@total'] : undefined;
    const totalText = rawTotal === undefined ? '0' : asText(rawTotal).trim();

    if (!/^\d+$/.test(totalText)) {
        return { kind: 'malformed', reason: `Unexpected @total value: ${JSON.stringify(rawTotal)}`, results: [] };
    }

    const total = parseInt(totalText, 10);
    if (total === 0) return { kind: 'empty' };

    const rawHits = isRecord(hits) ? hits['hit'] : undefined;
    let list: unknown[];
    if (rawHits === undefined) {
        list = [];
    } else if (Array.isArray(rawHits)) {
        list = rawHits;
    } else if (isRecord(rawHits)) {
        list = [rawHits];
    } else {
        return { kind: 'malformed', reason: 'Missing key: hit is neither an object nor a list', results: [] };
    }

    const results: Result[] = [];
    for (const [index, hit] of list.entries()) {
        if (!isRecord(hit)) {
            return { kind: 'malformed', reason: `Missing key: hit ${index} is not an object`, results };
        }
        results.push(normalizeHit(hit));
    }

    return { kind: 'hits', total, results };
}

/**
 * Retrying fetcher for the DBLP publication search API.
 * One instance per run; retry state is created fresh for every query.
 *
 * @see https://dblp.org/faq/How+to+use+the+dblp+search+API.html
 */
export class DblpFetcher {
    constructor(private readonly ctx: HarvestContext) {}

    /**
     * Run one query to completion. Never rejects: rate limits, transport
     * failures and bodies that are not JSON are retried; structurally
     * unexpected JSON is logged and cut short.
     */
    async fetch(query: Query): Promise<FetchOutcome> {
        const { config, logger } = this.ctx;
        const fields = describeQuery(query);
        const params = {
            q: buildQueryString(query),
            format: 'json',
            h: Math.min(config.maxHits, MAX_HITS_CAP),
        };

        let state: AttemptingState = initialRetryState(config.retry);
        let attempts = 0;

        for (;;) {
            attempts++;
            logger.debug({ ...fields, q: params.q, attempt: attempts }, 'DBLP search request');

            const attempt = await this.attempt(params);
            if (attempt.ok) {
                return this.complete(query, attempt.data, attempts);
            }

            const next = transition(state, attempt.event, config.retry);

            if (next.kind === 'exhausted') {
                logger.error(
                    { ...fields, attempts, error: attempt.error },
                    'Max retries exceeded, skipping query'
                );
                await this.pace(false);
                return { kind: 'exhausted', attempts, lastError: attempt.error };
            }

            if (next.kind === 'rate-limited') {
                logger.warn(
                    { ...fields, delayMs: next.delayMs, retries: next.retries, maxRetries: config.retry.maxRetries },
                    'Rate limited (429), waiting before retry'
                );
            } else {
                logger.warn(
                    { ...fields, error: attempt.error, delayMs: next.delayMs, retries: next.retries, maxRetries: config.retry.maxRetries },
                    'Request failed, retrying after backoff'
                );
            }

            await this.ctx.sleep(next.delayMs);
            state = resume(next);
        }
    }

    private async attempt(params: Record<string, string | number>): Promise<Attempt> {
        try {
            const response = await this.ctx.transport.get(this.ctx.config.baseUrl, {
                params,
                headers: { Accept: 'application/json' },
                timeout: this.ctx.config.timeoutMs,
            });
            return decodeBody(response.data);
        } catch (error) {
            const message = errorMessage(error);
            if (error instanceof HttpError && error.status === 429) {
                return { ok: false, event: { type: 'rate-limited', retryAfterMs: error.retryAfterMs }, error: message };
            }
            return { ok: false, event: { type: 'failure' }, error: message };
        }
    }

    private async complete(query: Query, data: unknown, attempts: number): Promise<FetchOutcome> {
        const { logger } = this.ctx;
        const fields = describeQuery(query);
        const parsed = parseSearchResponse(data);

        switch (parsed.kind) {
            case 'empty':
                logger.info(fields, 'No results');
                await this.pace(false);
                return { kind: 'empty', attempts };

            case 'malformed':
                logger.error(
                    { ...fields, reason: parsed.reason, parsed: parsed.results.length },
                    'Unexpected data format, keeping partial results'
                );
                await this.pace(false);
                return parsed.results.length > 0
                    ? { kind: 'success', results: parsed.results, total: parsed.results.length, attempts }
                    : { kind: 'empty', attempts };

            case 'hits':
                logger.info({ ...fields, total: parsed.total, received: parsed.results.length }, 'Query complete');
                await this.pace(true);
                return { kind: 'success', results: parsed.results, total: parsed.total, attempts };
        }
    }

    /**
     * Inter-query delay, separate from retry backoff.
     */
    private async pace(clean: boolean): Promise<void> {
        const { interQueryDelayMs, pacing } = this.ctx.config;
        if (interQueryDelayMs <= 0) return;
        if (clean || pacing === 'always') {
            await this.ctx.sleep(interQueryDelayMs);
        }
    }
}

/**
 * A 200 carrying an HTML maintenance page is a failed attempt, not an answer.
 */
function decodeBody(body: string): Attempt {
    try {
        return { ok: true, data: JSON.parse(body) };
    } catch (error) {
        return { ok: false, event: { type: 'failure' }, error: `Invalid JSON: ${errorMessage(error)}` };
    }
}

function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
