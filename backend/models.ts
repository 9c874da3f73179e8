export type ProblemKind = 'formal' | 'informal';

export type ProblemFormat = 'lean' | 'tex' | 'markdown' | 'text' | 'unknown';

export interface ContextSnippet {
  name: string;
  content: string;
}

export interface Problem {
  readonly id: string;
  readonly statement: string;
  readonly kind: ProblemKind;
  readonly format: ProblemFormat;
  readonly hint?: string;
  readonly context?: readonly ContextSnippet[];
  readonly sourcePath?: string;
}

export type VerifyErrorReason = 'timeout' | 'toolchain_missing' | 'crash' | 'cancelled';

export type VerifyResult =
  | { outcome: 'pass'; warnings: string[] }
  | { outcome: 'fail'; diagnostic: string; errors: string[]; warnings: string[] }
  | { outcome: 'error'; diagnostic: string; reason: VerifyErrorReason };

export type JudgeVerdict =
  | { outcome: 'accept'; summary: string }
  | { outcome: 'reject'; reason: string; issues: string[]; unavailable: boolean };

export type FailureCategory =
  | 'verification_failed'
  | 'verifier_error'
  | 'judge_rejected'
  | 'judge_unavailable';

export interface FeedbackContext {
  previousAttempt: number;
  summary: string[];
  analysis: FailureAnalysis | null;
  text: string;
}

export interface Attempt {
  readonly problemId: string;
  readonly index: number;
  readonly proofText: string;
  readonly hint: string | null;
  readonly feedback: FeedbackContext | null;
  readonly verification: VerifyResult | null;
  readonly verdict: JudgeVerdict | null;
  readonly createdAt: string;
}

export interface FailureAnalysis {
  analysis: string;
  suggestions: string;
  revisedHint: string | null;
  shouldRetry: boolean;
}

export type SessionStatus = 'pending' | 'in_progress' | 'succeeded' | 'exhausted' | 'fatal_error';

export type TerminalStatus = Extract<SessionStatus, 'succeeded' | 'exhausted' | 'fatal_error'>;

export type SessionFailureCategory =
  | 'malformed_problem'
  | 'configuration'
  | 'transport'
  | 'empty_output'
  | 'generator_crash'
  | 'internal_error'
  | 'cancelled'
  | 'timeout';

export interface SessionFailure {
  category: SessionFailureCategory;
  message: string;
}

export interface FeedbackLimits {
  maxProofChars: number;
  maxDiagnosticChars: number;
  maxSummaryEntries: number;
}

export interface SessionConfig {
  readonly maxIterations: number;
  readonly verifyEnabled: boolean;
  readonly judgeEnabled: boolean;
  readonly analysisEnabled: boolean;
  readonly feedback: Readonly<FeedbackLimits>;
  readonly timeoutMs: number | null;
}

export interface ProofSession {
  readonly problemId: string;
  readonly status: SessionStatus;
  readonly attempts: readonly Attempt[];
  readonly acceptedAttempt: Attempt | null;
  readonly failure: SessionFailure | null;
  readonly config: SessionConfig;
  readonly startedAt: string;
  readonly finishedAt: string | null;
}

export interface BatchEntry {
  readonly problemId: string;
  readonly status: TerminalStatus;
  readonly attemptCount: number;
  readonly acceptedAttempt: Attempt | null;
  readonly session: ProofSession;
}

export interface BatchResult {
  readonly startedAt: string;
  readonly finishedAt: string;
  readonly entries: Readonly<Record<string, BatchEntry>>;
}
