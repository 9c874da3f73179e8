import { CommandJudge } from './adapters/command-judge.js';
import { CommandFailureAnalyst } from './adapters/failure-analyst.js';
import { LeanVerifier } from './adapters/lean-verifier.js';
import { ProcessGenerator } from './adapters/process-generator.js';
import { BatchRunner } from './batch-runner.js';
import { sessionConfigOf, type ProofConfig } from './config.js';
import type { ProofEventEmitter } from './events.js';

export interface Adapters {
  generator: ProcessGenerator;
  verifier: LeanVerifier;
  judge: CommandJudge;
  analyst: CommandFailureAnalyst;
}

/** The process-backed adapters for a resolved configuration. */
export function createAdapters(config: ProofConfig, env: NodeJS.ProcessEnv = process.env): Adapters {
  return {
    generator: new ProcessGenerator(config.generator, config.workDir, env),
    verifier: new LeanVerifier(config.verifier, config.workDir, env),
    judge: new CommandJudge(config.judge, config.workDir, env),
    analyst: new CommandFailureAnalyst(config.judge, config.workDir, env),
  };
}

export interface BatchRunnerOptions {
  eventEmitter?: ProofEventEmitter;
  silent?: boolean;
}

export function createBatchRunner(
  config: ProofConfig,
  adapters: Adapters,
  options: BatchRunnerOptions = {},
): BatchRunner {
  return new BatchRunner({
    ...adapters,
    config: sessionConfigOf(config),
    budget: {
      timeoutMs: config.generator.timeoutMs,
      maxTokens: config.generator.maxTokens,
    },
    concurrency: config.batch.concurrency,
    eventEmitter: options.eventEmitter,
    silent: options.silent,
  });
}
