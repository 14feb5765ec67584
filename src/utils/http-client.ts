import type { Logger } from 'pino';
import { HARVEST_VERSION } from '../types/index.js';
import { getLogger } from './logger.js';

/**
 * Error classification for HTTP responses.
 * 429 is never retried here; it surfaces immediately with the Retry-After hint.
 */
const RETRYABLE_STATUS_CODES = new Set([500, 502, 503, 504]);
const RETRYABLE_ERROR_CODES = new Set(['ECONNRESET', 'ECONNREFUSED', 'ETIMEDOUT', 'EAI_AGAIN', 'UND_ERR_SOCKET', 'UND_ERR_CONNECT_TIMEOUT']);

/**
 * HTTP request options.
 */
export interface HttpRequestOptions {
    headers?: Record<string, string>;
    params?: Record<string, string | number>;
    timeout?: number;
}

/**
 * HTTP response wrapper. The body is always returned as text;
 * decoding is left to the caller.
 */
export interface HttpResponse {
    status: number;
    headers: Record<string, string>;
    data: string;
    ok: boolean;
}

/**
 * Anything that can perform a GET. The search fetcher and the citation
 * downloader only depend on this, so tests can script responses.
 */
export interface Transport {
    get(url: string, options?: HttpRequestOptions): Promise<HttpResponse>;
}

/**
 * HTTP error with classification.
 * `status` is 0 for timeouts and network failures.
 */
export class HttpError extends Error {
    constructor(
        message: string,
        public readonly status: number,
        public readonly retryable: boolean,
        public readonly retryAfterMs: number | null = null,
        public readonly response?: string
    ) {
        super(message);
        this.name = 'HttpError';
    }
}

export interface HttpClientOptions {
    timeout?: number;
    email?: string;
    /** Extra attempts for 5xx and network errors (0 = single attempt) */
    retries?: number;
    initialBackoffMs?: number;
    maxBackoffMs?: number;
    logger?: Logger;
}

/**
 * HTTP client over the global `fetch`, shared by every request of a run.
 */
export class HttpClient implements Transport {
    private readonly defaultTimeout: number;
    private readonly userAgent: string;
    private readonly retries: number;
    private readonly initialBackoffMs: number;
    private readonly maxBackoffMs: number;
    private readonly logger: Logger;

    constructor(options: HttpClientOptions = {}) {
        this.defaultTimeout = options.timeout ?? 10_000;
        const email = options.email ?? 'dblp-harvest@example.com';
        this.userAgent = `dblp-harvest/${HARVEST_VERSION} (mailto:${email})`;
        this.retries = options.retries ?? 0;
        this.initialBackoffMs = options.initialBackoffMs ?? 1000;
        this.maxBackoffMs = options.maxBackoffMs ?? 30_000;
        this.logger = options.logger ?? getLogger();
    }

    /**
     * GET a URL, retrying 5xx and network errors up to `retries` times.
     * Throws HttpError for every non-2xx status, timeout, or network failure.
     */
    async get(url: string, options: HttpRequestOptions = {}): Promise<HttpResponse> {
        const { headers = {}, params, timeout = this.defaultTimeout } = options;

        const target = params ? `${url}?${toSearchParams(params).toString()}` : url;
        const requestHeaders: Record<string, string> = {
            'User-Agent': this.userAgent,
            ...headers,
        };

        for (let attempt = 0; attempt <= this.retries; attempt++) {
            const controller = new AbortController();
            const timeoutId = setTimeout(() => controller.abort(), timeout);

            try {
                const response = await fetch(target, {
                    method: 'GET',
                    headers: requestHeaders,
                    signal: controller.signal,
                });
                const data = await response.text();

                // Build headers map
                const responseHeaders: Record<string, string> = {};
                response.headers.forEach((value, key) => {
                    responseHeaders[key] = value;
                });

                if (!response.ok) {
                    const retryable = response.status === 429 || RETRYABLE_STATUS_CODES.has(response.status);

                    if (RETRYABLE_STATUS_CODES.has(response.status) && attempt < this.retries) {
                        const backoff = this.calculateBackoff(attempt);
                        this.logger.warn(
                            { status: response.status, attempt: attempt + 1, backoffMs: backoff, url: target },
                            'Retryable HTTP error, backing off'
                        );
                        await sleep(backoff);
                        continue;
                    }

                    throw new HttpError(
                        `HTTP ${response.status}: ${response.statusText}`,
                        response.status,
                        retryable,
                        parseRetryAfter(response.headers.get('retry-after')),
                        data
                    );
                }

                return { status: response.status, headers: responseHeaders, data, ok: true };
            } catch (error) {
                if (error instanceof HttpError) throw error;

                const code = errorCode(error);
                const timedOut = error instanceof Error && error.name === 'AbortError';
                const retryable = timedOut || (code !== undefined && RETRYABLE_ERROR_CODES.has(code));

                if (retryable && attempt < this.retries) {
                    const backoff = this.calculateBackoff(attempt);
                    this.logger.warn(
                        { errorCode: code, timedOut, attempt: attempt + 1, backoffMs: backoff, url: target },
                        'Retryable network error, backing off'
                    );
                    await sleep(backoff);
                    continue;
                }

                if (timedOut) {
                    throw new HttpError(`Request timeout after ${timeout}ms: ${target}`, 0, true);
                }

                throw new HttpError(
                    `Network error: ${error instanceof Error ? error.message : String(error)}`,
                    0,
                    retryable
                );
            } finally {
                clearTimeout(timeoutId);
            }
        }

        // Unreachable: the last attempt always returns or throws
        throw new HttpError(`Max retries exceeded for ${target}`, 0, false);
    }

    private calculateBackoff(attempt: number): number {
        // Exponential backoff with jitter
        const exponential = this.initialBackoffMs * Math.pow(2, attempt);
        const jitter = Math.random() * exponential * 0.5;
        return Math.min(this.maxBackoffMs, exponential + jitter);
    }
}

/**
 * Parse a Retry-After header (delta-seconds or HTTP date) into milliseconds.
 */
export function parseRetryAfter(header: string | null, now: number = Date.now()): number | null {
    if (!header) return null;

    // Try parsing as seconds
    if (/^\s*\d+\s*$/.test(header)) return parseInt(header, 10) * 1000;

    // Try parsing as HTTP date
    const date = new Date(header);
    if (!isNaN(date.getTime())) {
        return Math.max(0, date.getTime() - now);
    }

    return null;
}

function toSearchParams(params: Record<string, string | number>): URLSearchParams {
    const search = new URLSearchParams();
    for (const [key, value] of Object.entries(params)) {
        search.set(key, String(value));
    }
    return search;
}

/**
 * Node's fetch reports socket problems as `TypeError('fetch failed')` with
 * the system error in `cause`.
 */
function errorCode(error: unknown): string | undefined {
    for (const candidate of [error, error instanceof Error ? error.cause : undefined]) {
        if (typeof candidate === 'object' && candidate !== null && 'code' in candidate && typeof candidate.code === 'string') {
            return candidate.code;
        }
    }
    return undefined;
}

/**
 * Sleep for the specified number of milliseconds.
 */
export function sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
}
