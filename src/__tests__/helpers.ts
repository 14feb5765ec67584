import pino from 'pino';
import { DEFAULT_CONFIG, type DblpHit, type DblpSearchResponse, type HarvestConfig } from '../types/index.js';
import { createContext, type HarvestContext } from '../utils/context.js';
import type { HarvestConfigInput } from '../utils/config.js';
import { HttpError, type HttpRequestOptions, type HttpResponse, type Transport } from '../utils/http-client.js';

/**
 * One scripted reply: a body (objects are sent as JSON), an HTTP error
 * status, or a network failure.
 */
export type Step =
    | { body: string | object }
    | { status: number; retryAfterMs?: number | null }
    | { error: string };

export interface RecordedCall {
    url: string;
    options?: HttpRequestOptions;
}

/**
 * In-process transport that replays steps in order, or asks a responder.
 */
export class ScriptedTransport implements Transport {
    readonly calls: RecordedCall[] = [];
    private readonly steps: Step[];
    private readonly responder: ((call: RecordedCall) => Step) | undefined;

    constructor(
        script: Step[] | ((call: RecordedCall) => Step),
        private readonly fallback?: Step
    ) {
        this.steps = Array.isArray(script) ? [...script] : [];
        this.responder = Array.isArray(script) ? undefined : script;
    }

    async get(url: string, options?: HttpRequestOptions): Promise<HttpResponse> {
        const call = { url, options };
        this.calls.push(call);

        const step = this.responder ? this.responder(call) : this.steps.shift() ?? this.fallback;
        if (!step) throw new Error(`Unexpected request to ${url}`);

        if ('body' in step) {
            const data = typeof step.body === 'string' ? step.body : JSON.stringify(step.body);
            return { status: 200, headers: {}, data, ok: true };
        }
        if ('status' in step) {
            throw new HttpError(`HTTP ${step.status}`, step.status, step.status === 429 || step.status >= 500, step.retryAfterMs ?? null);
        }
        throw new HttpError(`Network error: ${step.error}`, 0, true);
    }

    /** The `q` parameter of every search request, in order */
    queries(): string[] {
        return this.calls.flatMap((call) => {
            const q = call.options?.params?.['q'];
            return q === undefined ? [] : [String(q)];
        });
    }
}

export function testConfig(overrides: HarvestConfigInput = {}): HarvestConfig {
    return {
        ...DEFAULT_CONFIG,
        ...overrides,
        retry: { ...DEFAULT_CONFIG.retry, ...overrides.retry },
    };
}

/**
 * Context with a silent logger and a sleep that only records its delays.
 */
export function createTestContext(
    transport: Transport,
    overrides: HarvestConfigInput = {}
): { ctx: HarvestContext; delays: number[] } {
    const delays: number[] = [];
    const ctx = createContext(testConfig(overrides), {
        transport,
        logger: pino({ level: 'silent' }),
        sleep: async (ms: number) => {
            delays.push(ms);
        },
    });
    return { ctx, delays };
}

export function hit(info: NonNullable<DblpHit['info']>): DblpHit {
    return { '@score': '1', info };
}

export function searchBody(hits: DblpHit | DblpHit[], total?: string): DblpSearchResponse {
    const count = Array.isArray(hits) ? hits.length : 1;
    return { result: { hits: { '@total': total ?? String(count), hit: hits } } };
}

export const EMPTY_BODY: DblpSearchResponse = { result: { hits: { '@total': '0' } } };
