import type {
  Attempt,
  FailureAnalysis,
  FeedbackContext,
  JudgeVerdict,
  Problem,
  VerifyResult,
} from '../models.js';

export type PreflightResult = { ok: true } | { ok: false; message: string };

export interface GenerationBudget {
  timeoutMs: number;
  maxTokens: number | null;
}

export interface GenerateRequest {
  problem: Problem;
  hint: string | null;
  feedback: FeedbackContext | null;
  budget: GenerationBudget;
}

export type GenerationFailureCategory =
  | 'configuration'
  | 'malformed_problem'
  | 'transport'
  | 'empty_output';

export type GenerateResult =
  | { kind: 'proof'; proofText: string }
  | { kind: 'failure'; category: GenerationFailureCategory; message: string };

export interface ProofGenerator {
  generate(request: GenerateRequest, signal?: AbortSignal): Promise<GenerateResult>;
  preflight?(): Promise<PreflightResult>;
}

export interface VerifyRequest {
  proofText: string;
  /** Identity of the formal statement being proved, used to name scratch artifacts. */
  targetId: string;
}

export interface ProofVerifier {
  verify(request: VerifyRequest, signal?: AbortSignal): Promise<VerifyResult>;
  preflight?(): Promise<PreflightResult>;
}

export interface JudgeRequest {
  statement: string;
  proofText: string;
}

/** Implementations resolve every failure to a reject verdict instead of throwing. */
export interface ProofJudge {
  judge(request: JudgeRequest, signal?: AbortSignal): Promise<JudgeVerdict>;
  preflight?(): Promise<PreflightResult>;
}

export interface AnalysisRequest {
  problem: Problem;
  hint: string | null;
  attempt: Attempt;
}

export interface FailureAnalyst {
  analyze(request: AnalysisRequest, signal?: AbortSignal): Promise<FailureAnalysis>;
}

export const JUDGE_UNAVAILABLE_PREFIX = 'judge unavailable';

export function unavailableVerdict(detail: string): JudgeVerdict {
  return {
    outcome: 'reject',
    reason: `${JUDGE_UNAVAILABLE_PREFIX}: ${detail}`,
    issues: [],
    unavailable: true,
  };
}
