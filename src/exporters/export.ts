import { mkdirSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { HarvestDatabase } from '../storage/database.js';
import { HARVEST_VERSION, type AggregationMap, type ExportFormat, type Result } from '../types/index.js';
import { getLogger } from '../utils/logger.js';
import { sanitizeFilename } from '../utils/sanitize.js';

// ─── Types ───────────────────────────────────────────────

/**
 * One keyword's table.
 */
export interface Sheet {
    name: string;
    keyword: string;
    rows: Result[];
}

const COLUMNS = ['title', 'authors', 'venue', 'year', 'url'] as const;

/** Spreadsheet applications refuse longer sheet names */
export const MAX_SHEET_NAME_LENGTH = 31;

// ─── Sheets ──────────────────────────────────────────────

/**
 * Sheet (and file) name for a keyword: sanitized, then truncated.
 */
export function sheetName(keyword: string): string {
    return sanitizeFilename(keyword).slice(0, MAX_SHEET_NAME_LENGTH);
}

/**
 * One sheet per keyword with results, in map order. Keywords without results
 * are left out; names that collide after truncation get a numeric suffix.
 */
export function buildSheets(aggregation: AggregationMap): Sheet[] {
    const logger = getLogger();
    const used = new Set<string>();
    const sheets: Sheet[] = [];

    for (const [keyword, rows] of aggregation) {
        if (rows.length === 0) {
            logger.info({ keyword }, 'No results to save for keyword');
            continue;
        }

        const base = sheetName(keyword);
        let name = base;
        for (let n = 2; used.has(name); n++) {
            const suffix = `~${n}`;
            name = base.slice(0, MAX_SHEET_NAME_LENGTH - suffix.length) + suffix;
        }
        used.add(name);
        sheets.push({ name, keyword, rows });
    }

    return sheets;
}

// ─── Main Export Function ────────────────────────────────

/**
 * Write the report for an aggregation map into `outDir`.
 * Returns the paths written.
 */
export function exportResults(aggregation: AggregationMap, outDir: string, format: ExportFormat): string[] {
    const sheets = buildSheets(aggregation);
    mkdirSync(outDir, { recursive: true });

    let written: string[];
    switch (format) {
        case 'csv':
            written = sheets.map((sheet) => {
                const filePath = join(outDir, `${sheet.name}.csv`);
                writeFileSync(filePath, exportCSV(sheet.rows), 'utf-8');
                return filePath;
            });
            break;
        case 'json': {
            const filePath = join(outDir, 'results.json');
            writeFileSync(filePath, exportJson(sheets), 'utf-8');
            written = [filePath];
            break;
        }
        default:
            throw new Error(`Unsupported export format: ${String(format)}`);
    }

    getLogger().info({ format, outDir, sheets: sheets.length, files: written.length }, 'Results exported');
    return written;
}

/**
 * Re-export a stored run (the latest when `runId` is omitted).
 */
export function exportFromDatabase(dbPath: string, outDir: string, format: ExportFormat, runId?: number): string[] {
    const db = new HarvestDatabase(dbPath);

    try {
        const id = runId ?? db.getLatestRunId();
        if (id === undefined) {
            throw new Error(`No runs stored in ${dbPath}`);
        }
        return exportResults(db.getAggregation(id), outDir, format);
    } finally {
        db.close();
    }
}

// ─── Format Implementations ─────────────────────────────

function quote(value: string): string {
    return `"${value.replace(/"/g, '""')}"`;
}

export function exportCSV(rows: Result[]): string {
    let csv = COLUMNS.join(',') + '\n';
    for (const row of rows) {
        csv += COLUMNS.map((column) => quote(row[column])).join(',') + '\n';
    }
    return csv;
}

export function exportJson(sheets: Sheet[]): string {
    return JSON.stringify({
        generator: {
            name: 'dblp-harvest',
            version: HARVEST_VERSION,
            exported_at: new Date().toISOString(),
        },
        sheets: sheets.map((sheet) => ({
            name: sheet.name,
            keyword: sheet.keyword,
            rows: sheet.rows.map((row) => ({
                title: row.title,
                authors: row.authors,
                venue: row.venue,
                year: row.year,
                url: row.url,
            })),
        })),
    }, null, 2);
}
