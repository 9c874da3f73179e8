#!/usr/bin/env node

import { Command, InvalidArgumentError } from 'commander';
import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'fs';
import { dirname, resolve } from 'path';
import {
  describeConfig,
  loadEnvironment,
  resolveConfig,
  type ConfigOverrides,
  type ProofConfig,
} from './config.js';
import { Database, DATABASE_FILE_NAME } from './database.js';
import { describeError } from './errors.js';
import { DATA_DIR_NAME, Logger, type LogLevel } from './logger.js';
import type { BatchResult } from './models.js';
import { listProblemFiles, loadContextFolder, loadProblemFile } from './problem-loader.js';
import { formatReportLines, summarizeBatch, writeReport, writeSolutions } from './report.js';
import { createAdapters, createBatchRunner } from './runtime.js';
import { StopController } from './stop-controller.js';

interface CommonOptions {
  dir?: string;
  config?: string;
  env?: string;
  logLevel?: LogLevel;
}

interface Setup {
  config: ProofConfig;
  env: NodeJS.ProcessEnv;
}

interface RunOptions extends CommonOptions {
  maxIterations?: number;
  verify: boolean;
  judge: boolean;
  analysis?: boolean;
}

interface ProveOptions extends RunOptions {
  hint?: string;
  hintFile?: string;
  context: string[];
  contextFolder?: string;
  output?: string;
}

interface BatchOptions extends RunOptions {
  ext: string;
  output?: string;
  concurrency?: number;
  report?: string;
}

const LOG_LEVELS: LogLevel[] = ['debug', 'info', 'warn', 'error'];

const parsePositiveInt = (value: string): number => {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError(`expected a positive integer, got: ${value}`);
  }
  return parsed;
};

const parseLogLevel = (value: string): LogLevel => {
  const level = LOG_LEVELS.find(candidate => candidate === value.toLowerCase());
  if (!level) {
    throw new InvalidArgumentError(`expected one of ${LOG_LEVELS.join(', ')}, got: ${value}`);
  }
  return level;
};

const collect = (value: string, previous: string[]): string[] => [...previous, value];

const banner = (title: string): void => {
  console.log('═'.repeat(80));
  console.log(title);
  console.log('═'.repeat(80));
};

const formatElapsed = (startTime: number): string => {
  const elapsed = Math.floor((Date.now() - startTime) / 1000);
  return `${Math.floor(elapsed / 60)}m ${elapsed % 60}s`;
};

function loadSettings(options: CommonOptions, overrides: ConfigOverrides = {}): Setup {
  const workDir = options.dir ? resolve(options.dir) : process.cwd();
  const env = loadEnvironment(workDir, options.env);
  const config = resolveConfig({ workDir, configPath: options.config, env, overrides });
  return { config, env };
}

function setup(options: CommonOptions, overrides: ConfigOverrides = {}): Setup {
  const settings = loadSettings(options, overrides);
  Logger.initialize({ workDir: settings.config.workDir, minLevel: options.logLevel ?? 'info' });
  return settings;
}

const runOverrides = (options: RunOptions): ConfigOverrides => ({
  maxIterations: options.maxIterations,
  verifyEnabled: options.verify ? undefined : false,
  judgeEnabled: options.judge ? undefined : false,
  analysisEnabled: options.analysis ? true : undefined,
});

/**
 * First Ctrl+C lets running sessions finish and skips the rest; the second abandons
 * in-flight work.
 */
function installInterruptHandler(stopController: StopController, abortController: AbortController): () => void {
  const onSigint = (): void => {
    if (!stopController.isStopRequested()) {
      stopController.requestStop();
      console.log('\nStopping after running sessions finish (Ctrl+C again to abort them)');
      return;
    }
    console.log('\nAborting running sessions');
    abortController.abort();
  };
  process.on('SIGINT', onSigint);
  return () => process.off('SIGINT', onSigint);
}

function persist(config: ProofConfig, result: BatchResult): number | null {
  const storage = new Database(config.workDir);
  try {
    return storage.saveBatch(result, config.workDir).id;
  } catch (error) {
    console.warn(`Could not store run history: ${describeError(error)}`);
    return null;
  } finally {
    storage.close();
  }
}

function printOutcome(result: BatchResult, batchId: number | null, startTime: number): boolean {
  const report = summarizeBatch(result);
  console.log('\n' + '═'.repeat(80));
  for (const line of formatReportLines(report)) {
    console.log(line);
  }
  for (const problem of report.problems) {
    if (problem.failure) {
      console.log(`  ${problem.problemId}: ${problem.failure.category}: ${problem.failure.message}`);
    }
  }
  console.log('═'.repeat(80));
  console.log(`Total time: ${formatElapsed(startTime)}`);
  if (batchId !== null) {
    console.log(`Run ID: ${batchId} (lemmaloop history ${batchId})`);
  }
  console.log('═'.repeat(80));
  return report.totals.exhausted === 0 && report.totals.fatal_error === 0;
}

function fail(error: unknown, startTime: number): never {
  console.error('\n' + '═'.repeat(80));
  console.error('✗✗✗ FAILED ✗✗✗');
  console.error('═'.repeat(80));
  console.error(describeError(error));
  console.error('═'.repeat(80));
  console.error(`Time before failure: ${formatElapsed(startTime)}`);

  if (error instanceof Error && error.stack && process.env.DEBUG) {
    console.error('\nStack trace (DEBUG mode):');
    console.error(error.stack);
  }
  process.exit(1);
}

const program = new Command();

program
  .name('lemmaloop')
  .description('Generate, verify and judge Lean proofs with bounded retries')
  .version('0.1.0');

program
  .command('prove')
  .description('Prove a single problem (Lean, TeX, Markdown or text file)')
  .argument('<problem>', 'Problem file')
  .option('-p, --hint <text>', 'Proof hint')
  .option('-P, --hint-file <path>', 'Read the proof hint from a file')
  .option('-c, --context <path>', 'Context file (repeatable)', collect, [])
  .option('-C, --context-folder <path>', 'Add every known file under this folder as context')
  .option('-o, --output <file>', 'Write the accepted proof here')
  .option('-n, --max-iterations <count>', 'Maximum attempts', parsePositiveInt)
  .option('--no-verify', 'Skip Lean verification')
  .option('--no-judge', 'Skip the semantic judge')
  .option('--analysis', 'Ask for a failure analysis between attempts')
  .option('-d, --dir <path>', 'Work directory (default: current directory)')
  .option('--config <path>', 'Configuration file (default: lemmaloop.yaml in the work directory)')
  .option('-e, --env <file>', 'Dotenv file with credentials (default: .env in the work directory)')
  .option('--log-level <level>', 'Log file level (debug|info|warn|error)', parseLogLevel)
  .action(async (problemPath: string, options: ProveOptions) => {
    const startTime = Date.now();
    try {
      const { config, env } = setup(options, runOverrides(options));
      const hint = options.hintFile ? readFileSync(resolve(options.hintFile), 'utf-8') : options.hint;
      const contextPaths = [...options.context];
      if (options.contextFolder) {
        contextPaths.push(...loadContextFolder(resolve(options.contextFolder)));
      }
      const problem = loadProblemFile(problemPath, { hint, contextPaths });

      banner('LEMMALOOP - Prove');
      console.log(`Problem:        ${problem.sourcePath ?? problem.id} (${problem.format})`);
      console.log(`Hint:           ${hint ? 'provided' : 'none'}`);
      console.log(`Context files:  ${problem.context?.length ?? 0}`);
      console.log(`Max iterations: ${config.maxIterations}`);
      console.log(`Verification:   ${config.verifyEnabled ? 'on' : 'off'}, judge: ${config.judgeEnabled ? 'on' : 'off'}`);
      console.log('═'.repeat(80));

      const runner = createBatchRunner(config, createAdapters(config, env));
      const stopController = new StopController();
      const abortController = new AbortController();
      const removeHandler = installInterruptHandler(stopController, abortController);
      let result: BatchResult;
      try {
        result = await runner.run([problem], { signal: abortController.signal, stopController });
      } finally {
        removeHandler();
      }

      const batchId = persist(config, result);
      const accepted = result.entries[problem.id]?.acceptedAttempt;
      if (accepted && options.output) {
        const outputPath = resolve(options.output);
        mkdirSync(dirname(outputPath), { recursive: true });
        writeFileSync(outputPath, accepted.proofText, 'utf-8');
        console.log(`Proof written to ${outputPath}`);
      } else if (accepted) {
        console.log('\n' + accepted.proofText);
      }

      process.exit(printOutcome(result, batchId, startTime) ? 0 : 1);
    } catch (error) {
      fail(error, startTime);
    }
  });

program
  .command('batch')
  .description('Prove every problem file in a folder')
  .argument('<folder>', 'Folder with problem files')
  .option('--ext <extension>', 'Problem file extension', '.lean')
  .option('-o, --output <dir>', 'Write <problem>_solved.lean files here')
  .option('-n, --max-iterations <count>', 'Maximum attempts per problem', parsePositiveInt)
  .option('-j, --concurrency <count>', 'Problems run at once', parsePositiveInt)
  .option('--report <file>', 'Write a JSON report here')
  .option('--no-verify', 'Skip Lean verification')
  .option('--no-judge', 'Skip the semantic judge')
  .option('--analysis', 'Ask for a failure analysis between attempts')
  .option('-d, --dir <path>', 'Work directory (default: current directory)')
  .option('--config <path>', 'Configuration file (default: lemmaloop.yaml in the work directory)')
  .option('-e, --env <file>', 'Dotenv file with credentials (default: .env in the work directory)')
  .option('--log-level <level>', 'Log file level (debug|info|warn|error)', parseLogLevel)
  .action(async (folder: string, options: BatchOptions) => {
    const startTime = Date.now();
    try {
      const { config, env } = setup(options, {
        ...runOverrides(options),
        batch: options.concurrency ? { concurrency: options.concurrency } : undefined,
      });
      const files = listProblemFiles(resolve(folder), options.ext);
      if (files.length === 0) {
        throw new Error(`No *${options.ext} problem files in ${resolve(folder)}`);
      }
      const problems = files.map(file => loadProblemFile(file));

      banner('LEMMALOOP - Batch');
      console.log(`Folder:         ${resolve(folder)}`);
      console.log(`Problems:       ${problems.length}`);
      console.log(`Concurrency:    ${config.batch.concurrency}`);
      console.log(`Max iterations: ${config.maxIterations}`);
      console.log('═'.repeat(80));

      const runner = createBatchRunner(config, createAdapters(config, env));
      const stopController = new StopController();
      const abortController = new AbortController();
      const removeHandler = installInterruptHandler(stopController, abortController);
      let result: BatchResult;
      try {
        result = await runner.run(problems, { signal: abortController.signal, stopController });
      } finally {
        removeHandler();
      }

      const batchId = persist(config, result);
      if (options.output) {
        const written = writeSolutions(result, resolve(options.output));
        console.log(`Wrote ${written.length} solution file(s) to ${resolve(options.output)}`);
      }
      if (options.report) {
        writeReport(result, resolve(options.report));
        console.log(`Report written to ${resolve(options.report)}`);
      }
      if (stopController.wasStopTriggered()) {
        console.log('Stopped early: problems that had not started are recorded as cancelled');
      }

      process.exit(printOutcome(result, batchId, startTime) ? 0 : 1);
    } catch (error) {
      fail(error, startTime);
    }
  });

program
  .command('check')
  .description('Verify an existing Lean proof file')
  .argument('<proof>', 'Lean file')
  .option('-d, --dir <path>', 'Work directory (default: current directory)')
  .option('--config <path>', 'Configuration file (default: lemmaloop.yaml in the work directory)')
  .option('-e, --env <file>', 'Dotenv file with credentials (default: .env in the work directory)')
  .option('--log-level <level>', 'Log file level (debug|info|warn|error)', parseLogLevel)
  .action(async (proofPath: string, options: CommonOptions) => {
    const startTime = Date.now();
    try {
      const { config, env } = setup(options);
      const { verifier } = createAdapters(config, env);
      const result = await verifier.checkFile(resolve(proofPath));

      if (result.outcome === 'pass') {
        console.log('✓ Proof verified by Lean');
        for (const warning of result.warnings) {
          console.log(`  warning: ${warning}`);
        }
        process.exit(0);
      }
      if (result.outcome === 'fail') {
        console.log(`✗ Verification failed (${result.errors.length} error(s))`);
        console.log(result.diagnostic);
      } else {
        console.log(`✗ Verifier could not run (${result.reason})`);
        console.log(result.diagnostic);
      }
      process.exit(1);
    } catch (error) {
      fail(error, startTime);
    }
  });

program
  .command('config')
  .description('Show the effective configuration')
  .option('-d, --dir <path>', 'Work directory (default: current directory)')
  .option('--config <path>', 'Configuration file (default: lemmaloop.yaml in the work directory)')
  .option('-e, --env <file>', 'Dotenv file with credentials (default: .env in the work directory)')
  .action((options: CommonOptions) => {
    const startTime = Date.now();
    try {
      const { config, env } = loadSettings(options);
      const rows = describeConfig(config, env);
      const width = Math.max(...rows.map(([label]) => label.length));
      banner('LEMMALOOP - Configuration');
      for (const [label, value] of rows) {
        console.log(`${label.padEnd(width)}  ${value}`);
      }
      console.log('═'.repeat(80));
    } catch (error) {
      fail(error, startTime);
    }
  });

program
  .command('history')
  .description('List stored runs, or show one run in detail')
  .argument('[runId]', 'Run ID', parsePositiveInt)
  .option('-d, --dir <path>', 'Work directory (default: current directory)')
  .action((runId: number | undefined, options: CommonOptions) => {
    const startTime = Date.now();
    try {
      const workDir = options.dir ? resolve(options.dir) : process.cwd();
      const dbPath = resolve(workDir, DATA_DIR_NAME, DATABASE_FILE_NAME);
      if (!existsSync(dbPath)) {
        throw new Error(`No run history at ${dbPath}`);
      }
      const storage = new Database(workDir);
      try {
        if (runId === undefined) {
          for (const batch of storage.listBatches()) {
            console.log(
              `#${batch.id}  ${batch.startedAt}  ${batch.problemCount} problem(s): ` +
                `${batch.succeeded} succeeded, ${batch.exhausted} exhausted, ${batch.fatalErrors} fatal`,
            );
          }
          return;
        }
        const batch = storage.getBatch(runId);
        if (!batch) {
          throw new Error(`Run ${runId} not found in ${dbPath}`);
        }
        banner(`Run #${batch.id} (${batch.startedAt} - ${batch.finishedAt})`);
        for (const session of storage.getSessions(batch.id)) {
          console.log(`${session.problemId}: ${session.status}, ${session.attemptCount}/${session.maxIterations} attempt(s)`);
          if (session.failureCategory) {
            console.log(`  ${session.failureCategory}: ${session.failureMessage ?? ''}`);
          }
          for (const attempt of storage.getAttempts(session.id)) {
            console.log(
              `  #${attempt.attemptIndex}  verify: ${attempt.verificationOutcome ?? '-'}  judge: ${attempt.verdictOutcome ?? '-'}`,
            );
          }
        }
      } finally {
        storage.close();
      }
    } catch (error) {
      fail(error, startTime);
    }
  });

program.parse();
