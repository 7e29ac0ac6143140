/**
 * Run Tracker
 * SQLite history of runbook runs and their final statistics
 */

import Database from 'better-sqlite3';
import path from 'path';
import fs from 'fs';
import type { RunHistoryEntry, RunRecord, RunStatus } from '../types';
import { PATHS } from '../utils/constants';
import { logger } from '../utils/logger';

interface RunRow {
  id: string;
  runbook: string;
  status: string;
  dry_run: number;
  started_at: string;
  completed_at: string | null;
  summary: string | null;
  error: string | null;
}

const isRunStatus = (value: string): value is RunStatus =>
  value === 'running' || value === 'completed' || value === 'failed';

const parseSummary = (raw: string | null): RunRecord | undefined => {
  if (!raw) return undefined;
  const parsed: unknown = JSON.parse(raw);
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) return undefined;

  const record: RunRecord = {};
  for (const [key, value] of Object.entries(parsed)) {
    if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
      record[key] = value;
    }
  }
  return record;
};

export class RunTracker {
  private db: Database.Database;

  /**
   * @param dbPath - database file, or ':memory:'; defaults to the data directory
   */
  constructor(dbPath?: string) {
    const file = dbPath ?? path.join(process.cwd(), PATHS.DATA_DIR, PATHS.DB_FILE);

    if (file !== ':memory:') {
      const dir = path.dirname(file);
      if (!fs.existsSync(dir)) {
        fs.mkdirSync(dir, { recursive: true });
      }
    }

    this.db = new Database(file);
    this.initialize(file !== ':memory:');
    logger.debug(`Initialized run tracker: ${file}`);
  }

  private initialize(onDisk: boolean): void {
    if (onDisk) {
      this.db.pragma('journal_mode = WAL');
    }

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS runs (
        id TEXT PRIMARY KEY,
        runbook TEXT NOT NULL,
        status TEXT NOT NULL DEFAULT 'running',
        dry_run INTEGER NOT NULL DEFAULT 0,
        started_at TEXT NOT NULL,
        completed_at TEXT,
        summary TEXT,
        error TEXT
      );

      CREATE INDEX IF NOT EXISTS idx_runs_runbook ON runs(runbook);
      CREATE INDEX IF NOT EXISTS idx_runs_started ON runs(started_at);
    `);
  }

  /**
   * Record the start of a run
   */
  startRun(id: string, runbook: string, dryRun: boolean, startedAt: Date = new Date()): RunHistoryEntry {
    const entry: RunHistoryEntry = {
      id,
      runbook,
      status: 'running',
      dryRun,
      startedAt: startedAt.toISOString(),
    };

    this.db
      .prepare(`INSERT INTO runs (id, runbook, status, dry_run, started_at) VALUES (?, ?, ?, ?, ?)`)
      .run(entry.id, entry.runbook, entry.status, dryRun ? 1 : 0, entry.startedAt);

    return entry;
  }

  /**
   * Store the final record of a successful run
   */
  completeRun(id: string, summary: RunRecord, completedAt: Date = new Date()): void {
    this.db
      .prepare(`UPDATE runs SET status = 'completed', completed_at = ?, summary = ? WHERE id = ?`)
      .run(completedAt.toISOString(), JSON.stringify(summary), id);
  }

  failRun(id: string, message: string, summary?: RunRecord, completedAt: Date = new Date()): void {
    this.db
      .prepare(`UPDATE runs SET status = 'failed', completed_at = ?, error = ?, summary = ? WHERE id = ?`)
      .run(completedAt.toISOString(), message, summary ? JSON.stringify(summary) : null, id);
  }

  getRun(id: string): RunHistoryEntry | null {
    const row = this.db.prepare<[string], RunRow>(`SELECT * FROM runs WHERE id = ?`).get(id);
    return row ? this.mapRun(row) : null;
  }

  /**
   * Most recent runs first, optionally for one runbook
   */
  getRecentRuns(runbook?: string, limit: number = 10): RunHistoryEntry[] {
    const rows = runbook
      ? this.db
          .prepare<[string, number], RunRow>(
            `SELECT * FROM runs WHERE runbook = ? ORDER BY started_at DESC, rowid DESC LIMIT ?`
          )
          .all(runbook, limit)
      : this.db
          .prepare<[number], RunRow>(`SELECT * FROM runs ORDER BY started_at DESC, rowid DESC LIMIT ?`)
          .all(limit);

    return rows.map((row) => this.mapRun(row));
  }

  private mapRun(row: RunRow): RunHistoryEntry {
    return {
      id: row.id,
      runbook: row.runbook,
      status: isRunStatus(row.status) ? row.status : 'failed',
      dryRun: row.dry_run === 1,
      startedAt: row.started_at,
      completedAt: row.completed_at ?? undefined,
      summary: parseSummary(row.summary),
      error: row.error ?? undefined,
    };
  }

  /**
   * Close database connection
   */
  close(): void {
    this.db.close();
  }
}
