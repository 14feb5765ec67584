import type { AggregationMap, FetchOutcome, HarvestStats, Query, Result } from '../types/index.js';
import { DblpFetcher } from '../sources/dblp.js';
import { createQuery, describeQuery, parseFilter } from '../sources/query.js';
import type { CitationDownloader } from '../downloads/citation-downloader.js';
import type { HarvestContext } from '../utils/context.js';

/**
 * The part of the fetcher the orchestrator relies on.
 */
export interface QueryFetcher {
    fetch(query: Query): Promise<FetchOutcome>;
}

function emptyStats(): HarvestStats {
    return {
        queries: 0,
        requests: 0,
        successes: 0,
        empty: 0,
        exhausted: 0,
        results: 0,
        artifactsSaved: 0,
        artifactsFailed: 0,
        artifactsSkipped: 0,
    };
}

/**
 * Walks keyword × year × venue in that nesting order,
 * one request at a time:
 *
 * 1. Build the query
 * 2. Fetch (retries and pacing live in the fetcher)
 * 3. Append results to the keyword's list
 * 4. Download one citation record per result, when a downloader is given
 *
 * Failures of a single query or download are logged and the batch goes on,
 * so the returned map always has one entry per keyword.
 */
export class BatchOrchestrator {
    private stats: HarvestStats = emptyStats();
    private readonly fetcher: QueryFetcher;
    private readonly downloader: CitationDownloader | undefined;

    constructor(
        private readonly ctx: HarvestContext,
        options: { fetcher?: QueryFetcher; downloader?: CitationDownloader } = {}
    ) {
        this.fetcher = options.fetcher ?? new DblpFetcher(ctx);
        this.downloader = options.downloader;
    }

    /**
     * Rejects with InvalidQueryError, before any request, if a keyword is empty.
     */
    async run(keywords: string[], venues: string[], years: string[]): Promise<AggregationMap> {
        const { logger } = this.ctx;

        // Validate every keyword before the first request
        const plan = keywords.map((keyword) => createQuery(keyword, 'all', 'all').keyword);
        const venueFilters = venues.map(parseFilter);
        const yearFilters = years.map(parseFilter);

        this.stats = emptyStats();
        const aggregation: AggregationMap = new Map();
        const startTime = Date.now();

        logger.info(
            { keywords: plan.length, venues: venueFilters.length, years: yearFilters.length },
            'Starting harvest'
        );

        for (const keyword of plan) {
            const keywordResults = aggregation.get(keyword) ?? [];
            aggregation.set(keyword, keywordResults);

            for (const year of yearFilters) {
                for (const venue of venueFilters) {
                    const query = createQuery(keyword, venue, year);
                    logger.info(describeQuery(query), 'Fetching results');

                    const results = this.record(await this.fetcher.fetch(query));
                    keywordResults.push(...results);

                    if (this.downloader) {
                        for (const result of results) {
                            await this.download(this.downloader, result);
                        }
                    }
                }
            }
        }

        logger.info(
            { ...this.stats, durationMs: Date.now() - startTime },
            'Harvest complete'
        );

        return aggregation;
    }

    getStats(): HarvestStats {
        return { ...this.stats };
    }

    private record(outcome: FetchOutcome): Result[] {
        this.stats.queries++;
        this.stats.requests += outcome.attempts;
        switch (outcome.kind) {
            case 'success':
                this.stats.successes++;
                this.stats.results += outcome.results.length;
                return outcome.results;
            case 'empty':
                this.stats.empty++;
                return [];
            case 'exhausted':
                this.stats.exhausted++;
                return [];
        }
    }

    private async download(downloader: CitationDownloader, result: Result): Promise<void> {
        const outcome = await downloader.fetchArtifact(result.url, result.title);
        switch (outcome.kind) {
            case 'saved':
                this.stats.artifactsSaved++;
                break;
            case 'failed':
                this.stats.artifactsFailed++;
                break;
            case 'skipped':
                this.stats.artifactsSkipped++;
                break;
        }
    }
}
