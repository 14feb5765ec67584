import { describe, it, expect, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { CitationDownloader, DirectoryArtifactSink, citationUrl, type ArtifactSink } from '../downloads/citation-downloader.js';
import { sanitizeFilename } from '../utils/sanitize.js';
import { createTestContext, ScriptedTransport } from './helpers.js';

class MemorySink implements ArtifactSink {
    readonly files = new Map<string, string>();

    write(name: string, content: string): string {
        this.files.set(name, content);
        return `memory://${name}`;
    }
}

const BIBTEX = '@inproceedings{DBLP:conf/iclr/Lovelace24,\n  title = {A Study of Foo}\n}\n';

describe('sanitizeFilename', () => {
    it('should replace path separators and colons', () => {
        expect(sanitizeFilename('a/b:c')).toBe('a_b_c');
    });

    it('should replace every illegal character one for one', () => {
        const illegal = '/\\*?:"<>|';
        expect(sanitizeFilename(illegal)).toBe('_'.repeat(illegal.length));
        expect(sanitizeFilename(`x${illegal}y`)).toHaveLength(illegal.length + 2);
    });

    it('should leave other characters alone', () => {
        expect(sanitizeFilename('Data Distillation: A Survey?')).toBe('Data Distillation_ A Survey_');
        expect(sanitizeFilename('plain-name.v2 (final)')).toBe('plain-name.v2 (final)');
    });
});

describe('citationUrl', () => {
    it('should point DBLP record URLs at their BibTeX export', () => {
        expect(citationUrl('https://dblp.org/rec/conf/iclr/Lovelace24', '.bib')).toBe('https://dblp.org/rec/conf/iclr/Lovelace24.bib');
    });

    it('should keep URLs that already carry the extension or are not records', () => {
        expect(citationUrl('https://dblp.org/rec/conf/iclr/Lovelace24.bib', '.bib')).toBe('https://dblp.org/rec/conf/iclr/Lovelace24.bib');
        expect(citationUrl('https://example.org/paper.bib', '.bib')).toBe('https://example.org/paper.bib');
        expect(citationUrl('https://doi.org/10.1000/xyz', '.bib')).toBe('https://doi.org/10.1000/xyz');
    });
});

describe('CitationDownloader', () => {
    let tmpDir: string | undefined;

    afterEach(() => {
        if (tmpDir) fs.rmSync(tmpDir, { recursive: true, force: true });
        tmpDir = undefined;
    });

    it('should save the payload under the sanitized label', async () => {
        const transport = new ScriptedTransport([{ body: BIBTEX }]);
        const { ctx } = createTestContext(transport);
        const sink = new MemorySink();

        const outcome = await new CitationDownloader(ctx, sink).fetchArtifact('https://dblp.org/rec/conf/iclr/Lovelace24', 'Foo/Bar: a study');

        expect(outcome).toEqual({ kind: 'saved', location: 'memory://Foo_Bar_ a study', bytes: Buffer.byteLength(BIBTEX) });
        expect(sink.files.get('Foo_Bar_ a study')).toBe(BIBTEX);
        expect(transport.calls.map((call) => call.url)).toEqual(['https://dblp.org/rec/conf/iclr/Lovelace24.bib']);
    });

    it('should log and skip a failed download after a single attempt', async () => {
        const transport = new ScriptedTransport([], { status: 503 });
        const { ctx } = createTestContext(transport);
        const sink = new MemorySink();

        const outcome = await new CitationDownloader(ctx, sink).fetchArtifact('https://dblp.org/rec/conf/kdd/X23', 'X');

        expect(outcome).toEqual({ kind: 'failed', error: 'HTTP 503' });
        expect(transport.calls).toHaveLength(1);
        expect(sink.files.size).toBe(0);
    });

    it('should skip results without a URL', async () => {
        const transport = new ScriptedTransport([]);
        const { ctx } = createTestContext(transport);

        const outcome = await new CitationDownloader(ctx, new MemorySink()).fetchArtifact('', 'No URL');

        expect(outcome).toEqual({ kind: 'skipped', reason: 'empty url' });
        expect(transport.calls).toHaveLength(0);
    });

    it('should write files through the directory sink', async () => {
        tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'dblp-harvest-bibs-'));
        const bibDir = path.join(tmpDir, 'bibs');
        const transport = new ScriptedTransport([{ body: BIBTEX }]);
        const { ctx } = createTestContext(transport);

        const outcome = await new CitationDownloader(ctx, new DirectoryArtifactSink(bibDir)).fetchArtifact(
            'https://dblp.org/rec/conf/iclr/Lovelace24',
            'What is "foo"?'
        );

        const expected = path.join(bibDir, 'What is _foo__.bib');
        expect(outcome).toEqual({ kind: 'saved', location: expected, bytes: Buffer.byteLength(BIBTEX) });
        expect(fs.readFileSync(expected, 'utf-8')).toBe(BIBTEX);
    });
});
