import type { Result } from '../types/index.js';

/**
 * The three shapes `info.authors.author` arrives in.
 */
export type AuthorsField =
    | { kind: 'list'; entries: unknown[] }
    | { kind: 'single'; entry: unknown }
    | { kind: 'absent' };

export function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Read a text field. Strings and numbers are kept; a list of them
 * (multi-venue records) is joined with ", "; anything else is "".
 */
export function asText(value: unknown): string {
    if (typeof value === 'string') return value;
    if (typeof value === 'number' && Number.isFinite(value)) return String(value);
    if (Array.isArray(value)) {
        return value.map(asText).filter((part) => part !== '').join(', ');
    }
    return '';
}

export function readAuthorsField(authors: unknown): AuthorsField {
    const author = isRecord(authors) ? authors['author'] : undefined;
    if (Array.isArray(author)) return { kind: 'list', entries: author };
    if (author === undefined || author === null) return { kind: 'absent' };
    return { kind: 'single', entry: author };
}

function authorName(entry: unknown): string {
    if (isRecord(entry)) return asText(entry['text']);
    return typeof entry === 'string' ? entry : '';
}

export function joinAuthors(field: AuthorsField): string {
    switch (field.kind) {
        case 'list':
            return field.entries.map(authorName).filter((name) => name !== '').join(', ');
        case 'single':
            return authorName(field.entry);
        case 'absent':
            return '';
    }
}

/**
 * Convert one raw search hit into a Result. Never throws:
 * missing or oddly shaped fields become empty strings.
 */
export function normalizeHit(raw: unknown): Result {
    const info = isRecord(raw) && isRecord(raw['info']) ? raw['info'] : {};

    return {
        title: asText(info['title']),
        authors: joinAuthors(readAuthorsField(info['authors'])),
        venue: asText(info['venue']),
        year: asText(info['year']),
        url: asText(info['url']),
    };
}
