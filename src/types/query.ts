/**
 * Token that means "do not filter on this dimension" in venue and year lists.
 * Only the configuration layer ever compares against it.
 */
export const WILDCARD_TOKEN = 'all';

/**
 * A venue or year restriction.
 */
export type Filter =
    | { readonly kind: 'wildcard' }
    | { readonly kind: 'value'; readonly value: string };

/**
 * One keyword × venue × year combination submitted to the search API.
 * Also the unit of retry/backoff: state never carries over between queries.
 */
export interface Query {
    readonly keyword: string;
    readonly venue: Filter;
    readonly year: Filter;
}
