import { describe, it, expect } from 'vitest';
import { buildQueryString, createQuery, describeQuery, InvalidQueryError, parseFilter } from '../sources/query.js';
import { asText, joinAuthors, normalizeHit, readAuthorsField } from '../sources/normalize.js';
import { hit } from './helpers.js';

describe('Query', () => {
    describe('parseFilter', () => {
        it('should treat "all" in any case as the wildcard', () => {
            for (const token of ['all', 'ALL', ' All ']) {
                expect(parseFilter(token)).toEqual({ kind: 'wildcard' });
            }
        });

        it('should keep other tokens trimmed', () => {
            expect(parseFilter(' ICLR ')).toEqual({ kind: 'value', value: 'ICLR' });
            expect(parseFilter('2024')).toEqual({ kind: 'value', value: '2024' });
        });
    });

    describe('createQuery', () => {
        it('should reject an empty keyword', () => {
            expect(() => createQuery('   ', 'all', 'all')).toThrow(InvalidQueryError);
        });

        it('should trim the keyword', () => {
            expect(createQuery(' foo ', 'ICLR', '2024').keyword).toBe('foo');
        });
    });

    describe('buildQueryString', () => {
        it('should add lower-cased stream and year clauses', () => {
            expect(buildQueryString(createQuery('data distillation', 'ICLR', '2024')))
                .toBe('data distillation streamid:conf/iclr: year:2024:');
        });

        it('should use a venue containing a slash as the full stream id', () => {
            expect(buildQueryString(createQuery('graphs', 'journals/TPAMI', 'all')))
                .toBe('graphs streamid:journals/tpami:');
        });

        it('should omit the clause of every wildcard dimension', () => {
            const venues = ['all', 'ALL', 'ICML', 'kdd', ' All', 'NIPS'];
            const years = ['all', '2019', 'All ', '2024', 'aLL'];

            for (const venue of venues) {
                for (const year of years) {
                    const q = buildQueryString(createQuery('foo', venue, year));
                    const venueWildcard = venue.trim().toLowerCase() === 'all';
                    const yearWildcard = year.trim().toLowerCase() === 'all';

                    expect(q.includes('streamid:')).toBe(!venueWildcard);
                    expect(q.includes('year:')).toBe(!yearWildcard);
                    expect(q.startsWith('foo')).toBe(true);
                    if (venueWildcard && yearWildcard) {
                        expect(q).toBe('foo');
                    }
                }
            }
        });
    });

    it('should describe a query for logging', () => {
        expect(describeQuery(createQuery('foo', 'all', '2024'))).toEqual({ keyword: 'foo', venue: 'all', year: '2024' });
    });
});

describe('Normalizer', () => {
    describe('authors', () => {
        it('should join a single object, a list, and an absent field', () => {
            expect(joinAuthors(readAuthorsField({ author: { text: 'A' } }))).toBe('A');
            expect(joinAuthors(readAuthorsField({ author: [{ text: 'A' }, { text: 'B' }] }))).toBe('A, B');
            expect(joinAuthors(readAuthorsField(undefined))).toBe('');
        });

        it('should classify the three shapes', () => {
            expect(readAuthorsField({ author: [] })).toEqual({ kind: 'list', entries: [] });
            expect(readAuthorsField({ author: { text: 'A' } })).toEqual({ kind: 'single', entry: { text: 'A' } });
            expect(readAuthorsField({})).toEqual({ kind: 'absent' });
            expect(readAuthorsField('nonsense')).toEqual({ kind: 'absent' });
        });

        it('should drop list entries without a name and keep order', () => {
            const field = readAuthorsField({ author: [{ text: 'Zoe' }, { '@pid': '12/3' }, { text: 'Adam' }] });
            expect(joinAuthors(field)).toBe('Zoe, Adam');
        });
    });

    describe('asText', () => {
        it('should accept strings, numbers and lists', () => {
            expect(asText('ICLR')).toBe('ICLR');
            expect(asText(2024)).toBe('2024');
            expect(asText(['CoRR', 'ICLR'])).toBe('CoRR, ICLR');
            expect(asText({ text: 'x' })).toBe('');
            expect(asText(null)).toBe('');
        });
    });

    describe('normalizeHit', () => {
        it('should map every field', () => {
            const raw = hit({
                authors: { author: [{ '@pid': '1', text: 'Ada Lovelace' }, { '@pid': '2', text: 'Alan Turing' }] },
                title: 'On Computable Foo.',
                venue: 'ICLR',
                year: '2024',
                type: 'Conference and Workshop Papers',
                url: 'https://dblp.org/rec/conf/iclr/LovelaceT24',
            });

            expect(normalizeHit(raw)).toEqual({
                title: 'On Computable Foo.',
                authors: 'Ada Lovelace, Alan Turing',
                venue: 'ICLR',
                year: '2024',
                url: 'https://dblp.org/rec/conf/iclr/LovelaceT24',
            });
        });

        it('should degrade missing fields to empty strings', () => {
            const empty = { title: '', authors: '', venue: '', year: '', url: '' };
            expect(normalizeHit({})).toEqual(empty);
            expect(normalizeHit({ info: 'broken' })).toEqual(empty);
            expect(normalizeHit(null)).toEqual(empty);
        });

        it('should keep the title when authors and venue are unusable', () => {
            const result = normalizeHit({ info: { title: 'Kept', authors: 42, venue: { name: 'x' } } });
            expect(result.title).toBe('Kept');
            expect(result.authors).toBe('');
            expect(result.venue).toBe('');
        });
    });
});
