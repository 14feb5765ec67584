import { mkdirSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import type { HarvestContext } from '../utils/context.js';
import { sanitizeFilename } from '../utils/sanitize.js';

/**
 * Where downloaded citation records end up.
 * `write` returns the location it stored the payload at.
 */
export interface ArtifactSink {
    write(name: string, content: string): string;
}

/**
 * One file per record in a directory: `<dir>/<name><extension>`.
 */
export class DirectoryArtifactSink implements ArtifactSink {
    constructor(
        private readonly dir: string,
        private readonly extension = '.bib'
    ) {
        mkdirSync(this.dir, { recursive: true });
    }

    write(name: string, content: string): string {
        const filePath = join(this.dir, `${name}${this.extension}`);
        writeFileSync(filePath, content, 'utf-8');
        return filePath;
    }
}

export type ArtifactOutcome =
    | { kind: 'saved'; location: string; bytes: number }
    | { kind: 'failed'; error: string }
    | { kind: 'skipped'; reason: string };

/**
 * Turn a DBLP record URL into its BibTeX export by appending the extension.
 * "https://dblp.org/rec/conf/iclr/Foo24" → "https://dblp.org/rec/conf/iclr/Foo24.bib"
 * Other URLs are used as given.
 */
export function citationUrl(url: string, extension: string): string {
    if (!/\/rec\//.test(url) || url.endsWith(extension)) return url;
    return `${url}${extension}`;
}

/**
 * Best-effort download of one citation record per result: a single request
 * through the shared transport, failures logged and skipped.
 */
export class CitationDownloader {
    constructor(
        private readonly ctx: HarvestContext,
        private readonly sink: ArtifactSink
    ) {}

    async fetchArtifact(url: string, label: string): Promise<ArtifactOutcome> {
        const { logger, transport, config } = this.ctx;

        if (!url) {
            logger.debug({ label }, 'No record URL, skipping citation download');
            return { kind: 'skipped', reason: 'empty url' };
        }

        const target = citationUrl(url, config.bibExtension);

        try {
            const response = await transport.get(target, { timeout: config.timeoutMs });
            const location = this.sink.write(sanitizeFilename(label), response.data);
            const bytes = Buffer.byteLength(response.data, 'utf-8');
            logger.info({ location, bytes }, 'Citation record saved');
            return { kind: 'saved', location, bytes };
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            logger.error({ label, url: target, error: message }, 'Error downloading citation record');
            return { kind: 'failed', error: message };
        }
    }
}
