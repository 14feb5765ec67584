import { WILDCARD_TOKEN, type Filter, type Query } from '../types/index.js';

/**
 * Thrown when a query cannot be built from its inputs.
 * Not retryable: it means the configuration is wrong.
 */
export class InvalidQueryError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'InvalidQueryError';
    }
}

export const WILDCARD: Filter = { kind: 'wildcard' };

/**
 * Parse a venue or year token. "all" (any case, surrounding spaces ignored)
 * is the wildcard; anything else is kept trimmed.
 */
export function parseFilter(token: string): Filter {
    const value = token.trim();
    if (value.toLowerCase() === WILDCARD_TOKEN) return WILDCARD;
    return { kind: 'value', value };
}

export function createQuery(keyword: string, venue: string | Filter, year: string | Filter): Query {
    const trimmed = keyword.trim();
    if (!trimmed) {
        throw new InvalidQueryError('Keyword must not be empty');
    }

    return {
        keyword: trimmed,
        venue: typeof venue === 'string' ? parseFilter(venue) : venue,
        year: typeof year === 'string' ? parseFilter(year) : year,
    };
}

/**
 * Build the `q` parameter: keyword, then a stream clause for the venue,
 * then a year clause. Wildcards contribute nothing.
 *
 * ICLR → "streamid:conf/iclr:"; "journals/tpami" is taken as a full stream id.
 */
export function buildQueryString(query: Query): string {
    const parts = [query.keyword];

    if (query.venue.kind === 'value') {
        const venue = query.venue.value.toLowerCase();
        const streamId = venue.includes('/') ? venue : `conf/${venue}`;
        parts.push(`streamid:${streamId}:`);
    }

    if (query.year.kind === 'value') {
        parts.push(`year:${query.year.value}:`);
    }

    return parts.join(' ');
}

export function filterLabel(filter: Filter): string {
    return filter.kind === 'wildcard' ? WILDCARD_TOKEN : filter.value;
}

/**
 * Structured fields for log lines about a query.
 */
export function describeQuery(query: Query): { keyword: string; venue: string; year: string } {
    return {
        keyword: query.keyword,
        venue: filterLabel(query.venue),
        year: filterLabel(query.year),
    };
}
