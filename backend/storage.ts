import type { BatchResult, SessionFailureCategory, TerminalStatus } from './models.js';

export interface BatchRecord {
  id: number;
  workDir: string;
  startedAt: string;
  finishedAt: string;
  problemCount: number;
  succeeded: number;
  exhausted: number;
  fatalErrors: number;
}

export interface SessionRecord {
  id: number;
  batchId: number;
  problemId: string;
  status: TerminalStatus;
  attemptCount: number;
  maxIterations: number;
  acceptedAttemptIndex: number | null;
  failureCategory: SessionFailureCategory | null;
  failureMessage: string | null;
  startedAt: string;
  finishedAt: string | null;
}

export interface AttemptRecord {
  id: number;
  sessionId: number;
  attemptIndex: number;
  proofText: string;
  hint: string | null;
  feedback: string | null;
  verificationOutcome: 'pass' | 'fail' | 'error' | null;
  /** JSON of the full VerifyResult. */
  verification: string | null;
  verdictOutcome: 'accept' | 'reject' | null;
  /** JSON of the full JudgeVerdict. */
  verdict: string | null;
  createdAt: string;
}

export interface Storage {
  /** Stores a finished batch with every session and attempt in one transaction. */
  saveBatch(result: BatchResult, workDir: string): BatchRecord;
  getBatch(id: number): BatchRecord | undefined;
  listBatches(limit?: number): BatchRecord[];

  getSessions(batchId: number): SessionRecord[];
  getAttempts(sessionId: number): AttemptRecord[];

  close(): void;
}
