import { vi } from 'vitest';

import { BatchRunner, mergeBatchEntries, toBatchEntry, type BatchRunnerConfig } from '../batch-runner.js';
import { BatchAbortedError, DuplicateProblemError } from '../errors.js';
import type { ProofEvent } from '../events.js';
import { StopController } from '../stop-controller.js';
import {
  BUDGET,
  PASS,
  StubGenerator,
  StubJudge,
  StubVerifier,
  delay,
  failWith,
  fixedClock,
  problem,
  proofFor,
  sessionConfig,
} from './helpers.js';

function runner(overrides: Partial<BatchRunnerConfig> = {}): BatchRunner {
  return new BatchRunner({
    generator: new StubGenerator(),
    verifier: new StubVerifier(),
    judge: new StubJudge(),
    config: sessionConfig(),
    budget: BUDGET,
    concurrency: 2,
    now: fixedClock,
    silent: true,
    ...overrides,
  });
}

describe('BatchRunner', () => {
  it('records every problem with its own terminal status', async () => {
    const generator = new StubGenerator((request, call) =>
      request.problem.id === 'P3'
        ? { kind: 'failure', category: 'configuration', message: 'No generator command configured' }
        : { kind: 'proof', proofText: proofFor(request.problem.id, call) },
    );
    const verifier = new StubVerifier(request => (request.targetId === 'P2' ? failWith('error: nope') : PASS));

    const result = await runner({ generator, verifier }).run([problem('P1'), problem('P2'), problem('P3')]);

    expect(Object.keys(result.entries)).toEqual(['P1', 'P2', 'P3']);
    expect(result.entries.P1).toMatchObject({ status: 'succeeded', attemptCount: 1 });
    expect(result.entries.P1.acceptedAttempt?.proofText).toBe(proofFor('P1', 1));
    expect(result.entries.P2).toMatchObject({ status: 'exhausted', attemptCount: 3, acceptedAttempt: null });
    expect(result.entries.P3).toMatchObject({ status: 'fatal_error', attemptCount: 0 });
    expect(result.entries.P3.session.failure).toEqual({
      category: 'configuration',
      message: 'No generator command configured',
    });
  });

  it('returns the same entries whatever the concurrency and completion order', async () => {
    const delays: Record<string, number> = { A: 30, B: 5, C: 15, D: 0 };
    let inFlight = 0;
    let maxInFlight = 0;
    const slowGenerator = () =>
      new StubGenerator(async (request, call) => {
        inFlight += 1;
        maxInFlight = Math.max(maxInFlight, inFlight);
        await delay(delays[request.problem.id] ?? 0);
        inFlight -= 1;
        return { kind: 'proof', proofText: proofFor(request.problem.id, call) };
      });
    const verifier = () => new StubVerifier(request => (request.targetId === 'C' ? failWith('error: C') : PASS));
    const problems = ['A', 'B', 'C', 'D'].map(id => problem(id));

    const parallel = await runner({ generator: slowGenerator(), verifier: verifier(), concurrency: 2 }).run(problems);
    const parallelMax = maxInFlight;
    maxInFlight = 0;
    const serial = await runner({ generator: slowGenerator(), verifier: verifier(), concurrency: 1 }).run(
      [...problems].reverse(),
    );

    expect(parallel.entries).toEqual(serial.entries);
    expect(Object.keys(parallel.entries)).toEqual(['A', 'B', 'C', 'D']);
    expect(parallelMax).toBeLessThanOrEqual(2);
    expect(maxInFlight).toBe(1);
  });

  it('rejects a batch with duplicate problem ids', async () => {
    const generator = new StubGenerator();

    await expect(runner({ generator }).run([problem('b'), problem('a'), problem('b')])).rejects.toThrow(
      DuplicateProblemError,
    );
    expect(generator.callCount).toBe(0);
  });

  it('aborts before any session when a required adapter fails preflight', async () => {
    const generator = new StubGenerator();
    const verifier = Object.assign(new StubVerifier(), {
      preflight: async () => ({ ok: false as const, message: 'lake not found' }),
    });

    const run = runner({ generator, verifier }).run([problem('P1')]);

    await expect(run).rejects.toThrow(BatchAbortedError);
    await expect(run).rejects.toThrow('Batch aborted: required adapters are unavailable\n  verifier: lake not found');
    expect(generator.callCount).toBe(0);
  });

  it('reports an adapter whose preflight throws', async () => {
    const generator = Object.assign(new StubGenerator(), {
      preflight: async (): Promise<{ ok: true }> => {
        throw new Error('spawn EACCES');
      },
    });

    await expect(runner({ generator }).run([problem('P1')])).rejects.toMatchObject({
      failures: [{ adapter: 'generator', message: 'spawn EACCES' }],
    });
  });

  it('does not check the judge when judging is disabled', async () => {
    const preflight = vi.fn(async () => ({ ok: true as const }));
    const judge = Object.assign(new StubJudge(), { preflight });

    const result = await runner({ judge, config: sessionConfig({ judgeEnabled: false }) }).run([problem('P1')]);

    expect(preflight).not.toHaveBeenCalled();
    expect(result.entries.P1.status).toBe('succeeded');
  });

  it('can skip preflight entirely', async () => {
    const preflight = vi.fn(async () => ({ ok: false as const, message: 'unavailable' }));
    const generator = Object.assign(new StubGenerator(), { preflight });

    const result = await runner({ generator, preflight: false }).run([problem('P1')]);

    expect(preflight).not.toHaveBeenCalled();
    expect(result.entries.P1.status).toBe('succeeded');
  });

  it('records every problem as cancelled when the signal is already aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const generator = new StubGenerator();

    const result = await runner({ generator }).run([problem('P1'), problem('P2')], { signal: controller.signal });

    expect(generator.callCount).toBe(0);
    for (const id of ['P1', 'P2']) {
      expect(result.entries[id]).toMatchObject({ status: 'fatal_error', attemptCount: 0 });
      expect(result.entries[id].session.failure).toEqual({
        category: 'cancelled',
        message: 'Batch stopped before this problem started',
      });
    }
  });

  it('lets running sessions finish after a graceful stop', async () => {
    const stopController = new StopController();
    const generator = new StubGenerator((request, call) => {
      stopController.requestStop();
      return { kind: 'proof', proofText: proofFor(request.problem.id, call) };
    });

    const result = await runner({ generator, concurrency: 1 }).run([problem('A'), problem('B'), problem('C')], {
      stopController,
    });

    expect(result.entries.A.status).toBe('succeeded');
    expect(result.entries.B.session.failure?.category).toBe('cancelled');
    expect(result.entries.C.session.failure?.category).toBe('cancelled');
    expect(stopController.wasStopTriggered()).toBe(true);
  });

  it('does not mark a stop that skipped nothing', async () => {
    const stopController = new StopController();

    await runner().run([problem('A')], { stopController });

    expect(stopController.wasStopTriggered()).toBe(false);
  });

  it('isolates a session that crashes', async () => {
    const batch = runner();
    batch.getEventEmitter().on('event', (event: ProofEvent) => {
      if (event.type === 'session_started' && event.problemId === 'P2') {
        throw new Error('listener exploded');
      }
    });

    const result = await batch.run([problem('P1'), problem('P2'), problem('P3')]);

    expect(result.entries.P1.status).toBe('succeeded');
    expect(result.entries.P3.status).toBe('succeeded');
    expect(result.entries.P2.status).toBe('fatal_error');
    expect(result.entries.P2.session.failure).toEqual({
      category: 'internal_error',
      message: 'Session crashed: listener exploded',
    });
  });

  it('keeps the attempts of a session that crashes mid-run', async () => {
    const verifier = new StubVerifier(() => failWith('error: unsolved goals'));
    const batch = runner({ verifier });
    batch.getEventEmitter().on('event', (event: ProofEvent) => {
      if (event.type === 'attempt_failed' && event.problemId === 'P1' && event.attempt === 2) {
        throw new Error('listener exploded');
      }
    });

    const result = await batch.run([problem('P1'), problem('P2')]);

    expect(result.entries.P1).toMatchObject({ status: 'fatal_error', attemptCount: 2 });
    expect(result.entries.P1.session.failure?.category).toBe('internal_error');
    expect(result.entries.P2).toMatchObject({ status: 'exhausted', attemptCount: 3 });
  });

  it('emits batch totals on completion', async () => {
    const verifier = new StubVerifier(request => (request.targetId === 'P2' ? failWith('error: nope') : PASS));
    const batch = runner({ verifier });
    const events: ProofEvent[] = [];
    batch.getEventEmitter().on('event', event => events.push(event));

    await batch.run([problem('P1'), problem('P2')]);

    expect(events[0]).toMatchObject({ type: 'batch_started', totalProblems: 2, concurrency: 2 });
    expect(events[events.length - 1]).toMatchObject({
      type: 'batch_complete',
      totals: { succeeded: 1, exhausted: 1, fatal_error: 0 },
      totalTime: 0,
    });
  });

  it('freezes the result', async () => {
    const result = await runner().run([problem('P1')]);

    expect(Object.isFrozen(result)).toBe(true);
    expect(Object.isFrozen(result.entries)).toBe(true);
    expect(Object.isFrozen(result.entries.P1)).toBe(true);
  });
});

describe('mergeBatchEntries', () => {
  async function entriesFor(...ids: string[]) {
    const result = await runner().run(ids.map(id => problem(id)));
    return result.entries;
  }

  it('is commutative and associative over disjoint entries', async () => {
    const all = await entriesFor('a', 'b', 'c');
    const a = { a: all.a };
    const b = { b: all.b };
    const c = { c: all.c };

    expect(mergeBatchEntries(a, b)).toEqual(mergeBatchEntries(b, a));
    expect(Object.keys(mergeBatchEntries(b, a))).toEqual(['a', 'b']);
    expect(mergeBatchEntries(mergeBatchEntries(a, b), c)).toEqual(mergeBatchEntries(a, mergeBatchEntries(b, c)));
    expect(mergeBatchEntries(mergeBatchEntries(c, a), b)).toEqual(all);
  });

  it('refuses to merge the same problem twice', async () => {
    const all = await entriesFor('a');

    expect(() => mergeBatchEntries({ a: all.a }, { a: all.a })).toThrow('Problem a appears in more than one batch entry');
  });

  it('only builds entries for finished sessions', async () => {
    const all = await entriesFor('a');
    const running = { ...all.a.session, status: 'in_progress' as const };

    expect(() => toBatchEntry(running)).toThrow('Session for a has not finished (status in_progress)');
  });
});
