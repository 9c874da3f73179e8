import { SessionTransitionError } from './errors.js';
import { buildFeedbackContext } from './feedback.js';
import type {
  Attempt,
  FailureAnalysis,
  FeedbackContext,
  JudgeVerdict,
  Problem,
  ProofSession,
  SessionConfig,
  SessionFailure,
  SessionStatus,
  TerminalStatus,
  VerifyResult,
} from './models.js';

export type SessionPhase =
  | 'init'
  | 'generating'
  | 'verifying'
  | 'judging'
  | 'retrying'
  | 'succeeded'
  | 'exhausted'
  | 'fatal_error';

export interface AttemptDraft {
  index: number;
  proofText: string;
  hint: string | null;
  feedback: FeedbackContext | null;
  verification: VerifyResult | null;
  createdAt: string;
}

export type SessionState =
  | { phase: 'init' }
  | { phase: 'generating'; hint: string | null; feedback: FeedbackContext | null }
  | { phase: 'verifying'; draft: AttemptDraft }
  | { phase: 'judging'; draft: AttemptDraft }
  | { phase: 'retrying'; hint: string | null }
  | { phase: 'succeeded'; accepted: Attempt }
  | { phase: 'exhausted' }
  | { phase: 'fatal_error'; failure: SessionFailure };

export interface SessionMachine {
  readonly problem: Problem;
  readonly config: SessionConfig;
  readonly state: SessionState;
  readonly attempts: readonly Attempt[];
  readonly startedAt: string;
  readonly finishedAt: string | null;
}

export type SessionEvent =
  | { type: 'start'; at: string }
  | { type: 'generated'; proofText: string; at: string }
  | { type: 'generation_failed'; failure: SessionFailure; at: string }
  | { type: 'verified'; result: VerifyResult; at: string }
  | { type: 'judged'; verdict: JudgeVerdict; at: string }
  | { type: 'retry'; analysis: FailureAnalysis | null; at: string }
  | { type: 'abort'; failure: SessionFailure; at: string };

const TERMINAL_PHASES: ReadonlySet<SessionPhase> = new Set(['succeeded', 'exhausted', 'fatal_error']);

export function createSession(problem: Problem, config: SessionConfig, at: string): SessionMachine {
  return {
    problem,
    config,
    state: { phase: 'init' },
    attempts: [],
    startedAt: at,
    finishedAt: null,
  };
}

export function isTerminal(machine: SessionMachine): boolean {
  return TERMINAL_PHASES.has(machine.state.phase);
}

export function statusOf(machine: SessionMachine): SessionStatus {
  switch (machine.state.phase) {
    case 'init':
      return 'pending';
    case 'succeeded':
      return 'succeeded';
    case 'exhausted':
      return 'exhausted';
    case 'fatal_error':
      return 'fatal_error';
    default:
      return 'in_progress';
  }
}

export function terminalStatusOf(session: ProofSession): TerminalStatus | null {
  const status = session.status;
  return status === 'succeeded' || status === 'exhausted' || status === 'fatal_error' ? status : null;
}

/** True while another generation would stay within the iteration budget. */
export function canRetry(machine: SessionMachine): boolean {
  return machine.attempts.length < machine.config.maxIterations;
}

export function validateProblem(problem: Problem): string | null {
  if (problem.id.trim().length === 0) {
    return 'Problem has no identity';
  }
  if (problem.statement.trim().length === 0) {
    return `Problem ${problem.id} has an empty statement`;
  }
  return null;
}

export function escalateHint(originalHint: string | null, reason: string): string {
  return (
    `IMPORTANT: Previous proof was rejected as trivial or degenerate. ${reason}\n\n` +
    `Original: ${originalHint ?? 'None'}`
  );
}

function seal(problemId: string, draft: AttemptDraft, verdict: JudgeVerdict | null): Attempt {
  return Object.freeze({
    problemId,
    index: draft.index,
    proofText: draft.proofText,
    hint: draft.hint,
    feedback: draft.feedback,
    verification: draft.verification,
    verdict,
    createdAt: draft.createdAt,
  });
}

function nextHint(
  machine: SessionMachine,
  currentHint: string | null,
  analysis: FailureAnalysis | null,
): string | null {
  if (analysis?.revisedHint) {
    return analysis.revisedHint;
  }
  const latest = machine.attempts[machine.attempts.length - 1];
  if (latest?.verdict?.outcome === 'reject' && !latest.verdict.unavailable) {
    return escalateHint(machine.problem.hint ?? null, latest.verdict.reason);
  }
  return currentHint;
}

function fail(machine: SessionMachine, failure: SessionFailure, at: string, attempts = machine.attempts): SessionMachine {
  return { ...machine, attempts, state: { phase: 'fatal_error', failure }, finishedAt: at };
}

function reject(machine: SessionMachine, event: SessionEvent): never {
  throw new SessionTransitionError(machine.state.phase, event.type);
}

/**
 * The whole session lifecycle as a pure transition. The driver performs the adapter
 * call the current phase asks for and reports its outcome as the next event.
 */
export function step(machine: SessionMachine, event: SessionEvent): SessionMachine {
  const state = machine.state;

  switch (state.phase) {
    case 'init': {
      if (event.type === 'abort') {
        return fail(machine, event.failure, event.at);
      }
      if (event.type !== 'start') {
        return reject(machine, event);
      }
      const problemError = validateProblem(machine.problem);
      if (problemError) {
        return fail(machine, { category: 'malformed_problem', message: problemError }, event.at);
      }
      return {
        ...machine,
        state: { phase: 'generating', hint: machine.problem.hint ?? null, feedback: null },
      };
    }

    case 'generating': {
      if (event.type === 'abort' || event.type === 'generation_failed') {
        return fail(machine, event.failure, event.at);
      }
      if (event.type !== 'generated') {
        return reject(machine, event);
      }
      const draft: AttemptDraft = {
        index: machine.attempts.length + 1,
        proofText: event.proofText,
        hint: state.hint,
        feedback: state.feedback,
        verification: null,
        createdAt: event.at,
      };
      if (!machine.config.verifyEnabled) {
        const accepted = seal(machine.problem.id, draft, null);
        return {
          ...machine,
          attempts: [...machine.attempts, accepted],
          state: { phase: 'succeeded', accepted },
          finishedAt: event.at,
        };
      }
      return { ...machine, state: { phase: 'verifying', draft } };
    }

    case 'verifying': {
      if (event.type === 'abort') {
        const abandoned = seal(machine.problem.id, state.draft, null);
        return fail(machine, event.failure, event.at, [...machine.attempts, abandoned]);
      }
      if (event.type !== 'verified') {
        return reject(machine, event);
      }
      const draft: AttemptDraft = { ...state.draft, verification: event.result };
      if (event.result.outcome === 'pass' && machine.config.judgeEnabled) {
        return { ...machine, state: { phase: 'judging', draft } };
      }
      const attempt = seal(machine.problem.id, draft, null);
      const attempts = [...machine.attempts, attempt];
      if (event.result.outcome === 'pass') {
        return { ...machine, attempts, state: { phase: 'succeeded', accepted: attempt }, finishedAt: event.at };
      }
      return { ...machine, attempts, state: { phase: 'retrying', hint: draft.hint } };
    }

    case 'judging': {
      if (event.type === 'abort') {
        const abandoned = seal(machine.problem.id, state.draft, null);
        return fail(machine, event.failure, event.at, [...machine.attempts, abandoned]);
      }
      if (event.type !== 'judged') {
        return reject(machine, event);
      }
      const attempt = seal(machine.problem.id, state.draft, event.verdict);
      const attempts = [...machine.attempts, attempt];
      if (event.verdict.outcome === 'accept') {
        return { ...machine, attempts, state: { phase: 'succeeded', accepted: attempt }, finishedAt: event.at };
      }
      return { ...machine, attempts, state: { phase: 'retrying', hint: state.draft.hint } };
    }

    case 'retrying': {
      if (event.type === 'abort') {
        return fail(machine, event.failure, event.at);
      }
      if (event.type !== 'retry') {
        return reject(machine, event);
      }
      if (!canRetry(machine)) {
        return { ...machine, state: { phase: 'exhausted' }, finishedAt: event.at };
      }
      const feedback = buildFeedbackContext(machine.attempts, machine.config.feedback, event.analysis);
      return {
        ...machine,
        state: {
          phase: 'generating',
          hint: nextHint(machine, state.hint, event.analysis),
          feedback,
        },
      };
    }

    case 'succeeded':
    case 'exhausted':
    case 'fatal_error':
      return reject(machine, event);
  }
}

export function toProofSession(machine: SessionMachine): ProofSession {
  const state = machine.state;
  return Object.freeze({
    problemId: machine.problem.id,
    status: statusOf(machine),
    attempts: machine.attempts,
    acceptedAttempt: state.phase === 'succeeded' ? state.accepted : null,
    failure: state.phase === 'fatal_error' ? state.failure : null,
    config: machine.config,
    startedAt: machine.startedAt,
    finishedAt: machine.finishedAt,
  });
}
