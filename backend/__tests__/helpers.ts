import type {
  FailureAnalyst,
  AnalysisRequest,
  GenerateRequest,
  GenerateResult,
  JudgeRequest,
  ProofGenerator,
  ProofJudge,
  ProofVerifier,
  VerifyRequest,
} from '../adapters/types.js';
import type {
  Attempt,
  FailureAnalysis,
  JudgeVerdict,
  Problem,
  SessionConfig,
  VerifyResult,
} from '../models.js';

export const FIXED_TIME = '2024-01-01T00:00:00.000Z';

export const fixedClock = (): Date => new Date(FIXED_TIME);

export const BUDGET = { timeoutMs: 60_000, maxTokens: null };

export function sessionConfig(overrides: Partial<SessionConfig> = {}): SessionConfig {
  return {
    maxIterations: 3,
    verifyEnabled: true,
    judgeEnabled: true,
    analysisEnabled: false,
    feedback: { maxProofChars: 4000, maxDiagnosticChars: 2000, maxSummaryEntries: 5 },
    timeoutMs: null,
    ...overrides,
  };
}

export function problem(id: string, overrides: Partial<Problem> = {}): Problem {
  return {
    id,
    statement: `theorem ${id} : 1 + 1 = 2`,
    kind: 'formal',
    format: 'lean',
    ...overrides,
  };
}

export const proofFor = (problemId: string, call: number): string =>
  `theorem ${problemId} : 1 + 1 = 2 := by norm_num -- call ${call}`;

export const PASS: VerifyResult = { outcome: 'pass', warnings: [] };

export const failWith = (diagnostic: string): VerifyResult => ({
  outcome: 'fail',
  diagnostic,
  errors: [diagnostic],
  warnings: [],
});

export const ACCEPT: JudgeVerdict = { outcome: 'accept', summary: 'proves the statement' };

export const rejectWith = (reason: string, issues: string[] = []): JudgeVerdict => ({
  outcome: 'reject',
  reason,
  issues,
  unavailable: false,
});

type Responder<Req, Res> = (request: Req, call: number, signal?: AbortSignal) => Res | Promise<Res>;

/** Counts calls per problem so concurrent sessions sharing one stub stay independent. */
class CallCounter {
  private readonly counts = new Map<string, number>();

  next(key: string): number {
    const count = (this.counts.get(key) ?? 0) + 1;
    this.counts.set(key, count);
    return count;
  }

  total(): number {
    let sum = 0;
    for (const count of this.counts.values()) {
      sum += count;
    }
    return sum;
  }
}

export class StubGenerator implements ProofGenerator {
  readonly requests: GenerateRequest[] = [];
  private readonly counter = new CallCounter();

  constructor(
    private readonly respond: Responder<GenerateRequest, GenerateResult> = (request, call) => ({
      kind: 'proof',
      proofText: proofFor(request.problem.id, call),
    }),
  ) {}

  get callCount(): number {
    return this.counter.total();
  }

  async generate(request: GenerateRequest, signal?: AbortSignal): Promise<GenerateResult> {
    this.requests.push(request);
    return this.respond(request, this.counter.next(request.problem.id), signal);
  }
}

export class StubVerifier implements ProofVerifier {
  readonly requests: VerifyRequest[] = [];
  private readonly counter = new CallCounter();

  constructor(private readonly respond: Responder<VerifyRequest, VerifyResult> = () => PASS) {}

  get callCount(): number {
    return this.counter.total();
  }

  async verify(request: VerifyRequest, signal?: AbortSignal): Promise<VerifyResult> {
    this.requests.push(request);
    return this.respond(request, this.counter.next(request.targetId), signal);
  }
}

export class StubJudge implements ProofJudge {
  readonly requests: JudgeRequest[] = [];
  private readonly counter = new CallCounter();

  constructor(private readonly respond: Responder<JudgeRequest, JudgeVerdict> = () => ACCEPT) {}

  get callCount(): number {
    return this.counter.total();
  }

  async judge(request: JudgeRequest, signal?: AbortSignal): Promise<JudgeVerdict> {
    this.requests.push(request);
    return this.respond(request, this.counter.next(request.statement), signal);
  }
}

export class StubAnalyst implements FailureAnalyst {
  readonly requests: AnalysisRequest[] = [];

  constructor(private readonly respond: (attempt: Attempt) => FailureAnalysis) {}

  async analyze(request: AnalysisRequest): Promise<FailureAnalysis> {
    this.requests.push(request);
    return this.respond(request.attempt);
  }
}

/** Resolves `value` once `signal` aborts; never otherwise. */
export function untilAborted<T>(signal: AbortSignal | undefined, value: T): Promise<T> {
  return new Promise<T>(resolve => {
    signal?.addEventListener('abort', () => resolve(value), { once: true });
  });
}

export const delay = (ms: number): Promise<void> => new Promise(resolve => setTimeout(resolve, ms));

/** A `node -e` command line: argv[1] onwards are the extra arguments. */
export const nodeScript = (script: string): string[] => [process.execPath, '-e', script];
