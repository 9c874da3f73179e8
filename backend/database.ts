import BetterSqlite3 from 'better-sqlite3';
import * as path from 'path';
import * as fs from 'fs';
import { DATA_DIR_NAME } from './logger.js';
import { migrations } from './migrations.js';
import type { BatchResult } from './models.js';
import { countByStatus } from './report.js';
import type { AttemptRecord, BatchRecord, SessionRecord, Storage } from './storage.js';

export const DATABASE_FILE_NAME = 'runs.db';

export class Database implements Storage {
  private db: BetterSqlite3.Database;

  constructor(workDir: string, databasePath?: string) {
    const dbPath = databasePath || path.join(workDir, DATA_DIR_NAME, DATABASE_FILE_NAME);
    const dbDir = path.dirname(dbPath);

    try {
      if (!fs.existsSync(dbDir)) {
        fs.mkdirSync(dbDir, { recursive: true });
      }

      this.db = new BetterSqlite3(dbPath);
      this.db.pragma('journal_mode = WAL');
      this.db.pragma('foreign_keys = ON');
      this.runMigrations();
    } catch (error) {
      throw new Error(
        `Failed to initialize database at ${dbPath}: ${error instanceof Error ? error.message : String(error)}`
      );
    }
  }

  private runMigrations(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS schema_migrations (
        id INTEGER PRIMARY KEY,
        name TEXT NOT NULL,
        appliedAt TEXT NOT NULL
      );
    `);

    const applied = new Set(
      (this.db.prepare('SELECT id FROM schema_migrations').all() as Array<{ id: number }>).map(row => row.id)
    );
    const record = this.db.prepare('INSERT INTO schema_migrations (id, name, appliedAt) VALUES (?, ?, ?)');

    for (const migration of migrations) {
      if (applied.has(migration.id)) {
        continue;
      }
      migration.up(this.db);
      record.run(migration.id, migration.name, new Date().toISOString());
    }
  }

  getAppliedMigrations(): number[] {
    const rows = this.db.prepare('SELECT id FROM schema_migrations ORDER BY id').all() as Array<{ id: number }>;
    return rows.map(row => row.id);
  }

  saveBatch(result: BatchResult, workDir: string): BatchRecord {
    const entries = Object.values(result.entries).sort((a, b) => a.problemId.localeCompare(b.problemId));
    const totals = countByStatus(result.entries);

    const insertBatch = this.db.prepare(
      `INSERT INTO batches (workDir, startedAt, finishedAt, problemCount, succeeded, exhausted, fatalErrors)
       VALUES (?, ?, ?, ?, ?, ?, ?)`
    );
    const insertSession = this.db.prepare(
      `INSERT INTO sessions (batchId, problemId, status, attemptCount, maxIterations, acceptedAttemptIndex,
                             failureCategory, failureMessage, startedAt, finishedAt)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`
    );
    const insertAttempt = this.db.prepare(
      `INSERT INTO attempts (sessionId, attemptIndex, proofText, hint, feedback, verificationOutcome,
                             verification, verdictOutcome, verdict, createdAt)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`
    );

    const save = this.db.transaction((): number => {
      const batch = insertBatch.run(
        workDir,
        result.startedAt,
        result.finishedAt,
        entries.length,
        totals.succeeded,
        totals.exhausted,
        totals.fatal_error,
      );
      const batchId = Number(batch.lastInsertRowid);

      for (const entry of entries) {
        const session = entry.session;
        const sessionRow = insertSession.run(
          batchId,
          entry.problemId,
          entry.status,
          entry.attemptCount,
          session.config.maxIterations,
          entry.acceptedAttempt?.index ?? null,
          session.failure?.category ?? null,
          session.failure?.message ?? null,
          session.startedAt,
          session.finishedAt,
        );
        const sessionId = Number(sessionRow.lastInsertRowid);

        for (const attempt of session.attempts) {
          insertAttempt.run(
            sessionId,
            attempt.index,
            attempt.proofText,
            attempt.hint,
            attempt.feedback?.text ?? null,
            attempt.verification?.outcome ?? null,
            attempt.verification ? JSON.stringify(attempt.verification) : null,
            attempt.verdict?.outcome ?? null,
            attempt.verdict ? JSON.stringify(attempt.verdict) : null,
            attempt.createdAt,
          );
        }
      }
      return batchId;
    });

    const batchId = save();
    const saved = this.getBatch(batchId);
    if (!saved) {
      throw new Error(`Batch ${batchId} was not stored`);
    }
    return saved;
  }

  getBatch(id: number): BatchRecord | undefined {
    const stmt = this.db.prepare('SELECT * FROM batches WHERE id = ?');
    return stmt.get(id) as BatchRecord | undefined;
  }

  listBatches(limit = 20): BatchRecord[] {
    const stmt = this.db.prepare('SELECT * FROM batches ORDER BY id DESC LIMIT ?');
    return stmt.all(limit) as BatchRecord[];
  }

  getSessions(batchId: number): SessionRecord[] {
    const stmt = this.db.prepare('SELECT * FROM sessions WHERE batchId = ? ORDER BY problemId');
    return stmt.all(batchId) as SessionRecord[];
  }

  getAttempts(sessionId: number): AttemptRecord[] {
    const stmt = this.db.prepare('SELECT * FROM attempts WHERE sessionId = ? ORDER BY attemptIndex');
    return stmt.all(sessionId) as AttemptRecord[];
  }

  close(): void {
    this.db.close();
  }
}
