import type BetterSqlite3 from 'better-sqlite3';

export interface Migration {
  id: number;
  name: string;
  up: (db: BetterSqlite3.Database) => void;
}

export const migrations: Migration[] = [
  {
    id: 1,
    name: 'initial_schema',
    up: (db) => {
      db.exec(`
        BEGIN;

        CREATE TABLE IF NOT EXISTS batches (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          workDir TEXT NOT NULL,
          startedAt TEXT NOT NULL,
          finishedAt TEXT NOT NULL,
          problemCount INTEGER NOT NULL,
          succeeded INTEGER NOT NULL,
          exhausted INTEGER NOT NULL,
          fatalErrors INTEGER NOT NULL
        );

        CREATE TABLE IF NOT EXISTS sessions (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          batchId INTEGER NOT NULL,
          problemId TEXT NOT NULL,
          status TEXT NOT NULL CHECK(status IN ('succeeded', 'exhausted', 'fatal_error')),
          attemptCount INTEGER NOT NULL,
          maxIterations INTEGER NOT NULL,
          acceptedAttemptIndex INTEGER,
          failureCategory TEXT,
          failureMessage TEXT,
          startedAt TEXT NOT NULL,
          finishedAt TEXT,
          UNIQUE (batchId, problemId),
          FOREIGN KEY (batchId) REFERENCES batches(id) ON DELETE CASCADE
        );

        CREATE TABLE IF NOT EXISTS attempts (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          sessionId INTEGER NOT NULL,
          attemptIndex INTEGER NOT NULL,
          proofText TEXT NOT NULL,
          hint TEXT,
          feedback TEXT,
          verificationOutcome TEXT CHECK(verificationOutcome IN ('pass', 'fail', 'error')),
          verification TEXT,
          verdictOutcome TEXT CHECK(verdictOutcome IN ('accept', 'reject')),
          verdict TEXT,
          createdAt TEXT NOT NULL,
          UNIQUE (sessionId, attemptIndex),
          FOREIGN KEY (sessionId) REFERENCES sessions(id) ON DELETE CASCADE
        );

        COMMIT;
      `);
    },
  },
  {
    id: 2,
    name: 'add_foreign_key_indexes',
    up: (db) => {
      db.exec(`
        BEGIN;

        CREATE INDEX IF NOT EXISTS idx_sessions_batchId ON sessions(batchId);
        CREATE INDEX IF NOT EXISTS idx_attempts_sessionId ON attempts(sessionId);

        COMMIT;
      `);
    },
  },
];
