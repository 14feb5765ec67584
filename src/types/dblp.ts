/**
 * DBLP publication search response (subset of relevant fields).
 * Every field is optional here: the normalizer is the only place that reads
 * these shapes and it treats them as untrusted.
 *
 * @see https://dblp.org/faq/How+to+use+the+dblp+search+API.html
 */
export interface DblpSearchResponse {
    result?: {
        query?: string;
        status?: { '@code'?: string; text?: string };
        hits?: {
            '@total'?: string;
            '@computed'?: string;
            '@sent'?: string;
            '@first'?: string;
            hit?: DblpHit | DblpHit[];
        };
    };
}

export interface DblpAuthor {
    '@pid'?: string;
    text?: string;
}

export interface DblpHit {
    '@score'?: string;
    '@id'?: string;
    info?: {
        authors?: { author?: DblpAuthor | DblpAuthor[] };
        title?: string;
        venue?: string | string[];
        year?: string;
        type?: string;
        key?: string;
        doi?: string;
        ee?: string;
        url?: string;
    };
    url?: string;
}
