import type { ProofGenerator, ProofJudge, ProofVerifier, PreflightResult } from './adapters/types.js';
import { runWorkerPool } from './concurrency.js';
import {
  BatchAbortedError,
  DuplicateProblemError,
  describeError,
  type PreflightFailure,
} from './errors.js';
import { ProofEventEmitter } from './events.js';
import { componentLogger } from './logger.js';
import type {
  BatchEntry,
  BatchResult,
  Problem,
  ProofSession,
  SessionFailure,
} from './models.js';
import { countByStatus } from './report.js';
import { AttemptOrchestrator, type OrchestratorConfig } from './orchestrator.js';
import { createSession, step, terminalStatusOf, toProofSession } from './session-machine.js';
import type { StopController } from './stop-controller.js';

const log = componentLogger('BatchRunner');

export interface BatchRunnerConfig extends OrchestratorConfig {
  concurrency: number;
  /** Check adapter availability before any session starts. */
  preflight?: boolean;
}

export interface BatchRunOptions {
  signal?: AbortSignal;
  stopController?: StopController;
}

export type BatchEntries = Readonly<Record<string, BatchEntry>>;

/**
 * Order-independent union of two entry maps with disjoint keys. Keys come out sorted,
 * so any merge order of the same entries yields the same value.
 */
export function mergeBatchEntries(left: BatchEntries, right: BatchEntries): BatchEntries {
  const merged: Record<string, BatchEntry> = {};
  const keys = [...Object.keys(left), ...Object.keys(right)].sort();
  for (const key of keys) {
    const fromLeft = left[key];
    const fromRight = right[key];
    if (fromLeft && fromRight) {
      throw new Error(`Problem ${key} appears in more than one batch entry`);
    }
    merged[key] = fromLeft ?? fromRight;
  }
  return merged;
}

export function toBatchEntry(session: ProofSession): BatchEntry {
  const status = terminalStatusOf(session);
  if (!status) {
    throw new Error(`Session for ${session.problemId} has not finished (status ${session.status})`);
  }
  return Object.freeze({
    problemId: session.problemId,
    status,
    attemptCount: session.attempts.length,
    acceptedAttempt: session.acceptedAttempt,
    session,
  });
}

export class BatchRunner {
  private readonly orchestrator: AttemptOrchestrator;
  private readonly config: BatchRunnerConfig;
  private readonly eventEmitter: ProofEventEmitter;
  private readonly now: () => Date;

  constructor(config: BatchRunnerConfig) {
    this.config = config;
    this.eventEmitter = config.eventEmitter ?? new ProofEventEmitter();
    this.now = config.now ?? (() => new Date());
    this.orchestrator = new AttemptOrchestrator({ ...config, eventEmitter: this.eventEmitter, now: this.now });
  }

  getEventEmitter(): ProofEventEmitter {
    return this.eventEmitter;
  }

  async run(problems: readonly Problem[], options: BatchRunOptions = {}): Promise<BatchResult> {
    const { signal, stopController } = options;
    const duplicates = findDuplicateIds(problems);
    if (duplicates.length > 0) {
      throw new DuplicateProblemError(duplicates);
    }

    if (this.config.preflight ?? true) {
      const failures = await this.runPreflight();
      if (failures.length > 0) {
        log.error(`Preflight failed for ${failures.map(failure => failure.adapter).join(', ')}`);
        throw new BatchAbortedError(failures);
      }
    }

    const startedAt = this.now();
    this.eventEmitter.emit('event', {
      type: 'batch_started',
      timestamp: startedAt.getTime(),
      totalProblems: problems.length,
      concurrency: this.config.concurrency,
    });
    log.info(`Running ${problems.length} problem(s) with concurrency ${this.config.concurrency}`);

    const outcome = await runWorkerPool(
      problems,
      problem => this.runIsolated(problem, signal),
      {
        concurrency: this.config.concurrency,
        shouldStart: () => !signal?.aborted && !stopController?.isStopRequested(),
      },
    );

    if (outcome.skipped.length > 0) {
      stopController?.markStopTriggered();
      log.info(`${outcome.skipped.length} problem(s) were not started`);
    }

    let entries: BatchEntries = {};
    for (const session of outcome.completed.values()) {
      entries = mergeBatchEntries(entries, { [session.problemId]: toBatchEntry(session) });
    }
    for (const index of outcome.skipped) {
      const session = this.unstartedSession(problems[index], {
        category: 'cancelled',
        message: 'Batch stopped before this problem started',
      });
      entries = mergeBatchEntries(entries, { [session.problemId]: toBatchEntry(session) });
    }

    const finishedAt = this.now();
    const result: BatchResult = Object.freeze({
      startedAt: startedAt.toISOString(),
      finishedAt: finishedAt.toISOString(),
      entries: Object.freeze(entries),
    });

    this.eventEmitter.emit('event', {
      type: 'batch_complete',
      timestamp: finishedAt.getTime(),
      totals: countByStatus(result.entries),
      totalTime: finishedAt.getTime() - startedAt.getTime(),
    });
    return result;
  }

  /** A session whose run still rejects is recorded as its own fatal error; the batch carries on. */
  private async runIsolated(problem: Problem, signal?: AbortSignal): Promise<ProofSession> {
    try {
      return await this.orchestrator.run(problem, signal);
    } catch (error) {
      log.error(`Session for ${problem.id} crashed: ${describeError(error)}`);
      return this.unstartedSession(problem, {
        category: 'internal_error',
        message: `Session crashed: ${describeError(error)}`,
      });
    }
  }

  private unstartedSession(problem: Problem, failure: SessionFailure): ProofSession {
    const at = this.now().toISOString();
    const machine = createSession(problem, this.config.config, at);
    return toProofSession(step(machine, { type: 'abort', failure, at }));
  }

  private async runPreflight(): Promise<PreflightFailure[]> {
    const checks: Array<[PreflightFailure['adapter'], ProofGenerator | ProofVerifier | ProofJudge]> = [
      ['generator', this.config.generator],
    ];
    if (this.config.config.verifyEnabled) {
      checks.push(['verifier', this.config.verifier]);
      if (this.config.config.judgeEnabled) {
        checks.push(['judge', this.config.judge]);
      }
    }

    const failures: PreflightFailure[] = [];
    for (const [adapter, target] of checks) {
      if (!target.preflight) {
        continue;
      }
      let result: PreflightResult;
      try {
        result = await target.preflight();
      } catch (error) {
        result = { ok: false, message: describeError(error) };
      }
      if (!result.ok) {
        failures.push({ adapter, message: result.message });
      } else {
        log.info(`Preflight ok: ${adapter}`);
      }
    }
    return failures;
  }
}

function findDuplicateIds(problems: readonly Problem[]): string[] {
  const seen = new Set<string>();
  const duplicates = new Set<string>();
  for (const problem of problems) {
    if (seen.has(problem.id)) {
      duplicates.add(problem.id);
    }
    seen.add(problem.id);
  }
  return [...duplicates].sort();
}
