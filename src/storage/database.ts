import Database from 'better-sqlite3';
import type { AggregationMap, Result, RunRecord } from '../types/index.js';
import { getLogger } from '../utils/logger.js';

/**
 * SQLite schema migration v1.
 */
const MIGRATION_V1 = `
-- Runs: one harvest each
CREATE TABLE IF NOT EXISTS runs (
  run_id INTEGER PRIMARY KEY,
  created_at TEXT NOT NULL DEFAULT (datetime('now')),
  harvest_version TEXT NOT NULL,
  config_json TEXT NOT NULL,
  stats_json TEXT NOT NULL DEFAULT '{}'
);

-- Results: normalized hits, in aggregation order per keyword
CREATE TABLE IF NOT EXISTS results (
  result_id INTEGER PRIMARY KEY,
  run_id INTEGER NOT NULL REFERENCES runs(run_id),
  keyword TEXT NOT NULL,
  position INTEGER NOT NULL,
  title TEXT NOT NULL,
  authors TEXT NOT NULL,
  venue TEXT NOT NULL,
  year TEXT NOT NULL,
  url TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_results_run ON results(run_id, keyword, position);
`;

/**
 * v2: the keyword list of each run, so keywords without results survive a reload.
 */
const MIGRATION_V2 = `
CREATE TABLE IF NOT EXISTS run_keywords (
  run_id INTEGER NOT NULL REFERENCES runs(run_id),
  keyword TEXT NOT NULL,
  position INTEGER NOT NULL,
  PRIMARY KEY (run_id, keyword)
);
`;

interface ResultRow extends Result {
    keyword: string;
}

export interface StoredRun extends RunRecord {
    run_id: number;
    result_count: number;
}

/**
 * Result store wrapper around better-sqlite3.
 * Handles schema migration, WAL mode, foreign keys, and reads/writes of runs.
 */
export class HarvestDatabase {
    private db: Database.Database;

    constructor(dbPath: string) {
        this.db = new Database(dbPath);

        // Set pragmas
        this.db.pragma('journal_mode = WAL');
        this.db.pragma('foreign_keys = ON');

        // Run migrations
        this.migrate();

        getLogger().debug({ dbPath }, 'Database initialized');
    }

    /**
     * Run schema migrations.
     */
    private migrate(): void {
        const currentVersion = this.db.pragma('user_version', { simple: true });

        if (typeof currentVersion !== 'number' || currentVersion < 1) {
            this.db.exec(MIGRATION_V1);
            this.db.pragma('user_version = 1');
            getLogger().debug('Database migrated to v1');
        }

        if (typeof currentVersion !== 'number' || currentVersion < 2) {
            this.db.exec(MIGRATION_V2);
            this.db.pragma('user_version = 2');
            getLogger().debug('Database migrated to v2');
        }
    }

    // ─── Runs ─────────────────────────────────────────────────

    insertRun(run: Omit<RunRecord, 'run_id'>): number {
        const stmt = this.db.prepare(`
      INSERT INTO runs (created_at, harvest_version, config_json, stats_json)
      VALUES (@created_at, @harvest_version, @config_json, @stats_json)
    `);
        const result = stmt.run(run);
        return Number(result.lastInsertRowid);
    }

    getLatestRunId(): number | undefined {
        const row = this.db.prepare<[], { run_id: number }>('SELECT run_id FROM runs ORDER BY run_id DESC LIMIT 1').get();
        return row?.run_id;
    }

    getRuns(): StoredRun[] {
        return this.db.prepare<[], StoredRun>(`
      SELECT r.*, (SELECT COUNT(*) FROM results WHERE results.run_id = r.run_id) AS result_count
      FROM runs r ORDER BY r.run_id
    `).all();
    }

    // ─── Results ──────────────────────────────────────────────

    /**
     * Store a whole aggregation map for a run in a single transaction.
     * Keywords are recorded even when they have no results.
     */
    insertResults(runId: number, aggregation: AggregationMap): number {
        const keywordStmt = this.db.prepare(`
      INSERT OR IGNORE INTO run_keywords (run_id, keyword, position)
      VALUES (@run_id, @keyword, (SELECT COUNT(*) FROM run_keywords WHERE run_id = @run_id))
    `);
        const stmt = this.db.prepare(`
      INSERT INTO results (run_id, keyword, position, title, authors, venue, year, url)
      VALUES (@run_id, @keyword, @position, @title, @authors, @venue, @year, @url)
    `);

        let inserted = 0;
        const insertAll = this.db.transaction((entries: Array<[string, Result[]]>) => {
            for (const [keyword, results] of entries) {
                keywordStmt.run({ run_id: runId, keyword });
                results.forEach((result, position) => {
                    stmt.run({ run_id: runId, keyword, position, ...result });
                    inserted++;
                });
            }
        });

        insertAll([...aggregation.entries()]);
        return inserted;
    }

    /**
     * Rebuild the aggregation map of a run, keywords in their stored order.
     */
    getAggregation(runId: number): AggregationMap {
        const keywords = this.db.prepare<[number], { keyword: string }>(`
      SELECT keyword FROM run_keywords WHERE run_id = ? ORDER BY position
    `).all(runId);
        const rows = this.db.prepare<[number], ResultRow>(`
      SELECT keyword, title, authors, venue, year, url FROM results
      WHERE run_id = ? ORDER BY result_id
    `).all(runId);

        const aggregation: AggregationMap = new Map(keywords.map(({ keyword }): [string, Result[]] => [keyword, []]));
        for (const { keyword, ...result } of rows) {
            const list = aggregation.get(keyword) ?? [];
            list.push(result);
            aggregation.set(keyword, list);
        }
        return aggregation;
    }

    // ─── Stats ────────────────────────────────────────────────

    getStats(): {
        runs: number;
        results: number;
        resultsByKeyword: Record<string, number>;
    } {
        const count = (sql: string): number =>
            this.db.prepare<[], { count: number }>(sql).get()?.count ?? 0;

        const runs = count('SELECT COUNT(*) as count FROM runs');
        const results = count('SELECT COUNT(*) as count FROM results');

        const keywordRows = this.db
            .prepare<[], { keyword: string; count: number }>('SELECT keyword, COUNT(*) as count FROM results GROUP BY keyword ORDER BY keyword')
            .all();
        const resultsByKeyword: Record<string, number> = {};
        for (const row of keywordRows) {
            resultsByKeyword[row.keyword] = row.count;
        }

        return { runs, results, resultsByKeyword };
    }

    // ─── Utility ──────────────────────────────────────────────

    /**
     * Close the database connection.
     */
    close(): void {
        this.db.close();
        getLogger().debug('Database closed');
    }
}
