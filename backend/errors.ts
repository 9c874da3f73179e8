export class ConfigError extends Error {
  constructor(public readonly path: string, message: string) {
    super(`${path}: ${message}`);
    this.name = 'ConfigError';
  }
}

export class ProblemLoadError extends Error {
  constructor(public readonly problemPath: string, message: string) {
    super(message);
    this.name = 'ProblemLoadError';
  }
}

export class SessionTransitionError extends Error {
  constructor(public readonly phase: string, public readonly eventType: string) {
    super(`Event '${eventType}' is not accepted in phase '${phase}'`);
    this.name = 'SessionTransitionError';
  }
}

export interface PreflightFailure {
  adapter: 'generator' | 'verifier' | 'judge';
  message: string;
}

export class BatchAbortedError extends Error {
  constructor(public readonly failures: PreflightFailure[]) {
    super(
      'Batch aborted: required adapters are unavailable\n' +
        failures.map(failure => `  ${failure.adapter}: ${failure.message}`).join('\n'),
    );
    this.name = 'BatchAbortedError';
  }
}

export class DuplicateProblemError extends Error {
  constructor(public readonly problemIds: string[]) {
    super(`Duplicate problem id(s) in batch: ${problemIds.join(', ')}`);
    this.name = 'DuplicateProblemError';
  }
}

export const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
