export { AttemptOrchestrator, type OrchestratorConfig } from './orchestrator.js';
export {
  BatchRunner,
  mergeBatchEntries,
  toBatchEntry,
  type BatchEntries,
  type BatchRunnerConfig,
  type BatchRunOptions,
} from './batch-runner.js';
export {
  canRetry,
  createSession,
  escalateHint,
  isTerminal,
  statusOf,
  step,
  terminalStatusOf,
  toProofSession,
  validateProblem,
  type SessionEvent,
  type SessionMachine,
  type SessionPhase,
  type SessionState,
} from './session-machine.js';
export { buildFeedbackContext, classifyAttempt, describeCategory } from './feedback.js';
export { ConcurrencyGate, runWorkerPool } from './concurrency.js';
export { StopController } from './stop-controller.js';
export { ProofEventEmitter, type ProofEvent } from './events.js';
export { PROMPTS } from './prompts.js';
export { VerdictParser } from './verdict-parser.js';
export {
  CONFIG_FILE_NAME,
  DEFAULT_CONFIG,
  describeConfig,
  maskSecret,
  resolveConfig,
  sessionConfigOf,
  type ConfigOverrides,
  type ProofConfig,
} from './config.js';
export {
  BatchAbortedError,
  ConfigError,
  DuplicateProblemError,
  ProblemLoadError,
  SessionTransitionError,
} from './errors.js';
export {
  detectFormat,
  listProblemFiles,
  loadContextFolder,
  loadProblemFile,
  problemFromString,
} from './problem-loader.js';
export { summarizeBatch, writeReport, writeSolutions, type BatchReport } from './report.js';
export { Database } from './database.js';
export type { AttemptRecord, BatchRecord, SessionRecord, Storage } from './storage.js';
export { CommandJudge } from './adapters/command-judge.js';
export { CommandFailureAnalyst } from './adapters/failure-analyst.js';
export { LeanVerifier } from './adapters/lean-verifier.js';
export { ProcessGenerator } from './adapters/process-generator.js';
export { createAdapters, createBatchRunner } from './runtime.js';
export {
  unavailableVerdict,
  type FailureAnalyst,
  type GenerateRequest,
  type GenerateResult,
  type ProofGenerator,
  type ProofJudge,
  type ProofVerifier,
} from './adapters/types.js';
export type * from './models.js';
