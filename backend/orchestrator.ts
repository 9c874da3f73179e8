import {
  unavailableVerdict,
  type FailureAnalyst,
  type GenerationBudget,
  type ProofGenerator,
  type ProofJudge,
  type ProofVerifier,
} from './adapters/types.js';
import { describeError } from './errors.js';
import { ProofEventEmitter, type ProofEvent } from './events.js';
import { classifyAttempt, describeCategory } from './feedback.js';
import { componentLogger } from './logger.js';
import type {
  FailureAnalysis,
  Problem,
  ProofSession,
  SessionConfig,
  SessionFailure,
  VerifyResult,
} from './models.js';
import {
  canRetry,
  createSession,
  isTerminal,
  statusOf,
  step,
  terminalStatusOf,
  toProofSession,
  type SessionEvent,
  type SessionMachine,
} from './session-machine.js';

const logger = componentLogger('Orchestrator');

export interface OrchestratorConfig {
  generator: ProofGenerator;
  verifier: ProofVerifier;
  judge: ProofJudge;
  analyst?: FailureAnalyst;
  config: SessionConfig;
  budget: GenerationBudget;
  eventEmitter?: ProofEventEmitter;
  /** Clock for attempt and session timestamps. */
  now?: () => Date;
  silent?: boolean;
}

type CallOutcome<T> =
  | { kind: 'value'; value: T }
  | { kind: 'threw'; error: unknown }
  | { kind: 'aborted' };

/**
 * Resolves with the task's outcome, or with `aborted` as soon as the signal fires.
 * An abandoned task keeps running until the adapter notices the same signal.
 */
function settle<T>(task: () => Promise<T>, signal: AbortSignal): Promise<CallOutcome<T>> {
  if (signal.aborted) {
    return Promise.resolve({ kind: 'aborted' });
  }
  return new Promise<CallOutcome<T>>(resolve => {
    const onAbort = (): void => resolve({ kind: 'aborted' });
    signal.addEventListener('abort', onAbort, { once: true });
    const done = (outcome: CallOutcome<T>): void => {
      signal.removeEventListener('abort', onAbort);
      resolve(outcome);
    };

    let pending: Promise<T>;
    try {
      pending = task();
    } catch (error) {
      done({ kind: 'threw', error });
      return;
    }
    pending.then(
      value => done({ kind: 'value', value }),
      (error: unknown) => done({ kind: 'threw', error }),
    );
  });
}

export class AttemptOrchestrator {
  private readonly generator: ProofGenerator;
  private readonly verifier: ProofVerifier;
  private readonly judge: ProofJudge;
  private readonly analyst: FailureAnalyst | null;
  private readonly config: SessionConfig;
  private readonly budget: GenerationBudget;
  private readonly eventEmitter: ProofEventEmitter;
  private readonly now: () => Date;
  private readonly silent: boolean;

  constructor(config: OrchestratorConfig) {
    this.generator = config.generator;
    this.verifier = config.verifier;
    this.judge = config.judge;
    this.analyst = config.analyst ?? null;
    this.config = config.config;
    this.budget = config.budget;
    this.eventEmitter = config.eventEmitter ?? new ProofEventEmitter();
    this.now = config.now ?? (() => new Date());
    this.silent = config.silent ?? false;
  }

  getEventEmitter(): ProofEventEmitter {
    return this.eventEmitter;
  }

  getConfig(): SessionConfig {
    return this.config;
  }

  private timestamp(): string {
    return this.now().toISOString();
  }

  private emitEvent(event: ProofEvent): void {
    this.eventEmitter.emit('event', event);
  }

  private log(
    message: string,
    level: 'info' | 'warn' | 'error' | 'success' = 'info',
    problemId?: string,
  ): void {
    if (!this.silent) {
      console.log(problemId ? `[${problemId}] ${message}` : message);
    }
    if (level === 'success') {
      logger.info(message);
    } else {
      logger[level](message);
    }
    this.emitEvent({
      type: 'log',
      timestamp: this.now().getTime(),
      level,
      message,
      problemId,
    });
  }

  /**
   * Drives one problem to a terminal state. Never rejects for adapter failures: those end
   * up in the session. Anything else that throws mid-session ends it as `internal_error`
   * with the attempts made so far. `signal` cancels the session; `config.timeoutMs` bounds its wall time.
   */
  async run(problem: Problem, signal?: AbortSignal): Promise<ProofSession> {
    const controller = new AbortController();
    const cancellation: { failure: SessionFailure | null } = { failure: null };

    const abort = (failure: SessionFailure): void => {
      if (!controller.signal.aborted) {
        cancellation.failure = failure;
        controller.abort();
      }
    };
    const onExternalAbort = (): void => abort({ category: 'cancelled', message: 'Session cancelled' });

    let machine = createSession(problem, this.config, this.timestamp());
    let timeoutId: NodeJS.Timeout | undefined;

    try {
      if (signal?.aborted) {
        onExternalAbort();
      }
      signal?.addEventListener('abort', onExternalAbort, { once: true });

      const timeoutMs = this.config.timeoutMs;
      if (timeoutMs !== null) {
        timeoutId = setTimeout(
          () => abort({ category: 'timeout', message: `Session exceeded its time limit of ${timeoutMs / 1000}s` }),
          timeoutMs,
        );
      }

      this.emitEvent({
        type: 'session_started',
        timestamp: this.now().getTime(),
        problemId: problem.id,
        maxIterations: this.config.maxIterations,
      });

      while (!isTerminal(machine)) {
        const event: SessionEvent = cancellation.failure
          ? { type: 'abort', failure: cancellation.failure, at: this.timestamp() }
          : await this.nextEvent(machine, controller.signal, () => cancellation.failure);
        const previous = machine;
        machine = step(previous, event);
        this.announce(previous, machine);
      }
    } catch (error) {
      machine = this.sealAfterCrash(machine, error);
    } finally {
      if (timeoutId) clearTimeout(timeoutId);
      signal?.removeEventListener('abort', onExternalAbort);
      controller.abort();
    }

    const session = toProofSession(machine);
    this.reportCompletion(session);
    return session;
  }

  /** Ends the session as an internal error, keeping every attempt recorded so far. */
  private sealAfterCrash(machine: SessionMachine, error: unknown): SessionMachine {
    const message = `Session crashed: ${describeError(error)}`;
    logger.error(`[${machine.problem.id}] ${message}`);
    if (isTerminal(machine)) {
      return machine;
    }
    return step(machine, { type: 'abort', failure: { category: 'internal_error', message }, at: this.timestamp() });
  }

  private announce(previous: SessionMachine, next: SessionMachine): void {
    const problemId = previous.problem.id;

    if (next.attempts.length > previous.attempts.length) {
      const sealed = next.attempts[next.attempts.length - 1];
      const category = classifyAttempt(sealed);
      if (category && next.state.phase === 'retrying') {
        this.emitEvent({
          type: 'attempt_failed',
          timestamp: this.now().getTime(),
          problemId,
          attempt: sealed.index,
          category,
        });
        this.log(`Attempt ${sealed.index} failed: ${describeCategory(category)}`, 'warn', problemId);
      }
    }

    if (next.state.phase !== previous.state.phase) {
      this.emitEvent({
        type: 'phase_change',
        timestamp: this.now().getTime(),
        problemId,
        phase: next.state.phase,
        attempt: ['generating', 'verifying', 'judging'].includes(next.state.phase)
          ? next.attempts.length + 1
          : next.attempts.length,
      });
    }
  }

  private async nextEvent(
    machine: SessionMachine,
    signal: AbortSignal,
    abortFailure: () => SessionFailure | null,
  ): Promise<SessionEvent> {
    const state = machine.state;
    const problem = machine.problem;
    const aborted = (): SessionEvent => ({
      type: 'abort',
      failure: abortFailure() ?? { category: 'cancelled', message: 'Session cancelled' },
      at: this.timestamp(),
    });

    switch (state.phase) {
      case 'init':
        this.log(`Starting session (max ${this.config.maxIterations} attempts)`, 'info', problem.id);
        return { type: 'start', at: this.timestamp() };

      case 'generating': {
        const attemptNumber = machine.attempts.length + 1;
        this.log(`Generating attempt ${attemptNumber}/${this.config.maxIterations}`, 'info', problem.id);
        const outcome = await settle(
          () => this.generator.generate(
            { problem, hint: state.hint, feedback: state.feedback, budget: this.budget },
            signal,
          ),
          signal,
        );
        if (outcome.kind === 'aborted') {
          return aborted();
        }
        if (outcome.kind === 'threw') {
          this.log(`Generator crashed: ${describeError(outcome.error)}`, 'error', problem.id);
          return {
            type: 'generation_failed',
            failure: { category: 'generator_crash', message: describeError(outcome.error) },
            at: this.timestamp(),
          };
        }
        const result = outcome.value;
        if (result.kind === 'failure') {
          this.log(`Generation failed (${result.category}): ${result.message}`, 'error', problem.id);
          return {
            type: 'generation_failed',
            failure: { category: result.category, message: result.message },
            at: this.timestamp(),
          };
        }
        this.emitEvent({
          type: 'attempt_generated',
          timestamp: this.now().getTime(),
          problemId: problem.id,
          attempt: attemptNumber,
          proofLength: result.proofText.length,
        });
        return { type: 'generated', proofText: result.proofText, at: this.timestamp() };
      }

      case 'verifying': {
        const outcome = await settle(
          () => this.verifier.verify({ proofText: state.draft.proofText, targetId: problem.id }, signal),
          signal,
        );
        if (outcome.kind === 'aborted') {
          return aborted();
        }
        const result: VerifyResult = outcome.kind === 'value'
          ? outcome.value
          : { outcome: 'error', reason: 'crash', diagnostic: `Verifier crashed: ${describeError(outcome.error)}` };
        this.emitEvent({
          type: 'verification_complete',
          timestamp: this.now().getTime(),
          problemId: problem.id,
          attempt: state.draft.index,
          outcome: result.outcome,
          diagnostic: result.outcome === 'pass' ? undefined : result.diagnostic,
        });
        this.log(
          result.outcome === 'pass'
            ? `Attempt ${state.draft.index} verified`
            : `Attempt ${state.draft.index} verification ${result.outcome === 'fail' ? 'failed' : `error (${result.reason})`}`,
          result.outcome === 'pass' ? 'success' : 'warn',
          problem.id,
        );
        return { type: 'verified', result, at: this.timestamp() };
      }

      case 'judging': {
        const outcome = await settle(
          () => this.judge.judge({ statement: problem.statement, proofText: state.draft.proofText }, signal),
          signal,
        );
        if (outcome.kind === 'aborted') {
          return aborted();
        }
        const verdict = outcome.kind === 'value'
          ? outcome.value
          : unavailableVerdict(describeError(outcome.error));
        this.emitEvent({
          type: 'judge_complete',
          timestamp: this.now().getTime(),
          problemId: problem.id,
          attempt: state.draft.index,
          outcome: verdict.outcome,
          reason: verdict.outcome === 'reject' ? verdict.reason : undefined,
        });
        this.log(
          verdict.outcome === 'accept'
            ? `Attempt ${state.draft.index} accepted by judge`
            : `Attempt ${state.draft.index} rejected by judge: ${verdict.reason}`,
          verdict.outcome === 'accept' ? 'success' : 'warn',
          problem.id,
        );
        return { type: 'judged', verdict, at: this.timestamp() };
      }

      case 'retrying': {
        let analysis: FailureAnalysis | null = null;
        const latest = machine.attempts[machine.attempts.length - 1];
        if (this.analyst && this.config.analysisEnabled && canRetry(machine) && latest) {
          const analyst = this.analyst;
          const outcome = await settle(
            () => analyst.analyze({ problem, hint: state.hint, attempt: latest }, signal),
            signal,
          );
          if (outcome.kind === 'aborted') {
            return aborted();
          }
          if (outcome.kind === 'threw') {
            this.log(`Failure analysis unavailable: ${describeError(outcome.error)}`, 'warn', problem.id);
          } else {
            analysis = outcome.value;
          }
        }
        return { type: 'retry', analysis, at: this.timestamp() };
      }

      case 'succeeded':
      case 'exhausted':
      case 'fatal_error':
        throw new Error(`Session for ${problem.id} is already ${statusOf(machine)}`);
    }
  }

  private reportCompletion(session: ProofSession): void {
    const terminal = terminalStatusOf(session);
    if (!terminal) {
      return;
    }

    if (terminal === 'succeeded') {
      this.log(`Proof accepted after ${session.attempts.length} attempt(s)`, 'success', session.problemId);
    } else if (terminal === 'exhausted') {
      this.log(`Gave up after ${session.attempts.length} attempt(s)`, 'warn', session.problemId);
    } else {
      const failure = session.failure;
      this.log(
        `Fatal error${failure ? ` (${failure.category}): ${failure.message}` : ''}`,
        'error',
        session.problemId,
      );
      this.emitEvent({
        type: 'error',
        timestamp: this.now().getTime(),
        error: failure?.message ?? 'Session failed',
        problemId: session.problemId,
      });
    }

    this.emitEvent({
      type: 'session_complete',
      timestamp: this.now().getTime(),
      problemId: session.problemId,
      status: terminal,
      attemptCount: session.attempts.length,
      failure: session.failure ?? undefined,
    });
  }
}
