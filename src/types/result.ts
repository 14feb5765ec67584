/**
 * One normalized publication hit.
 * All fields are plain strings; anything the API left out is an empty string.
 */
export interface Result {
    readonly title: string;

    /** Author names joined with ", " in upstream order */
    readonly authors: string;

    readonly venue: string;
    readonly year: string;

    /** Record URL on the API side (may be empty) */
    readonly url: string;
}

/**
 * What a single query produced.
 * `attempts` counts the requests actually issued for the query.
 */
export type FetchOutcome =
    | { kind: 'success'; results: Result[]; total: number; attempts: number }
    | { kind: 'empty'; attempts: number }
    | { kind: 'exhausted'; attempts: number; lastError: string };

/**
 * Keyword → results, in query iteration order (year outer, venue inner).
 */
export type AggregationMap = Map<string, Result[]>;

/**
 * Counters collected by the orchestrator over one run.
 */
export interface HarvestStats {
    queries: number;
    /** Search requests sent, retries included */
    requests: number;
    successes: number;
    empty: number;
    exhausted: number;
    results: number;
    artifactsSaved: number;
    artifactsFailed: number;
    artifactsSkipped: number;
}
