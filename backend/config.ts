import { parse as parseDotenv } from 'dotenv';
import { existsSync, readFileSync } from 'fs';
import { resolve } from 'path';
import { parse as parseYaml } from 'yaml';

import { ConfigError } from './errors.js';
import type { FeedbackLimits, SessionConfig } from './models.js';

export const CONFIG_FILE_NAME = 'lemmaloop.yaml';
export const ENV_FILE_NAME = '.env';

export interface GeneratorSettings {
  command: string[];
  timeoutMs: number;
  requiredEnv: string[];
  maxTokens: number | null;
}

export interface VerifierSettings {
  command: string[];
  projectRoot: string | null;
  scratchDir: string;
  timeoutMs: number;
  concurrency: number;
}

export interface JudgeSettings {
  command: string[];
  timeoutMs: number;
}

export interface SessionSettings {
  timeoutMs: number | null;
}

export interface BatchSettings {
  concurrency: number;
}

export interface ProofConfig {
  readonly workDir: string;
  readonly maxIterations: number;
  readonly verifyEnabled: boolean;
  readonly judgeEnabled: boolean;
  readonly analysisEnabled: boolean;
  readonly feedback: Readonly<FeedbackLimits>;
  readonly session: Readonly<SessionSettings>;
  readonly batch: Readonly<BatchSettings>;
  readonly generator: Readonly<GeneratorSettings>;
  readonly verifier: Readonly<VerifierSettings>;
  readonly judge: Readonly<JudgeSettings>;
}

export interface ConfigOverrides {
  maxIterations?: number;
  verifyEnabled?: boolean;
  judgeEnabled?: boolean;
  analysisEnabled?: boolean;
  feedback?: Partial<FeedbackLimits>;
  session?: Partial<SessionSettings>;
  batch?: Partial<BatchSettings>;
  generator?: Partial<GeneratorSettings>;
  verifier?: Partial<VerifierSettings>;
  judge?: Partial<JudgeSettings>;
}

export const DEFAULT_CONFIG: Omit<ProofConfig, 'workDir'> = {
  maxIterations: 5,
  verifyEnabled: true,
  judgeEnabled: true,
  analysisEnabled: false,
  feedback: {
    maxProofChars: 4000,
    maxDiagnosticChars: 2000,
    maxSummaryEntries: 5,
  },
  session: { timeoutMs: null },
  batch: { concurrency: 2 },
  generator: {
    command: [],
    timeoutMs: 30 * 60 * 1000,
    requiredEnv: [],
    maxTokens: null,
  },
  verifier: {
    command: ['lake', 'build'],
    projectRoot: null,
    scratchDir: 'solutions',
    timeoutMs: 300 * 1000,
    concurrency: 1,
  },
  judge: {
    command: ['claude', '--print'],
    timeoutMs: 10 * 60 * 1000,
  },
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const readPositiveInt = (value: unknown, path: string): number | undefined => {
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== 'number' || !Number.isInteger(value) || value <= 0) {
    throw new ConfigError(path, 'must be a positive integer');
  }
  return value;
};

const readSeconds = (value: unknown, path: string): number | undefined => {
  const seconds = readPositiveInt(value, path);
  return seconds === undefined ? undefined : seconds * 1000;
};

const readBoolean = (value: unknown, path: string): boolean | undefined => {
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== 'boolean') {
    throw new ConfigError(path, 'must be true or false');
  }
  return value;
};

const readString = (value: unknown, path: string): string | undefined => {
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== 'string' || value.trim().length === 0) {
    throw new ConfigError(path, 'must be a non-empty string');
  }
  return value;
};

const readStringArray = (value: unknown, path: string): string[] | undefined => {
  if (value === undefined) {
    return undefined;
  }
  if (typeof value === 'string') {
    return value.split(/\s+/).filter(part => part.length > 0);
  }
  if (!Array.isArray(value)) {
    throw new ConfigError(path, 'must be a string or list of strings');
  }
  const items: string[] = [];
  value.forEach((item, index) => {
    if (typeof item !== 'string') {
      throw new ConfigError(`${path}[${index}]`, 'must be a string');
    }
    items.push(item);
  });
  return items;
};

const readSection = (value: unknown, path: string): Record<string, unknown> => {
  if (value === undefined) {
    return {};
  }
  if (!isRecord(value)) {
    throw new ConfigError(path, 'must be a mapping');
  }
  return value;
};

export const parseConfigFile = (yamlContent: string): ConfigOverrides => {
  const parsed: unknown = parseYaml(yamlContent);
  if (parsed === null || parsed === undefined) {
    return {};
  }
  if (!isRecord(parsed)) {
    throw new ConfigError('config', 'must be a YAML mapping');
  }

  const feedback = readSection(parsed.feedback, 'feedback');
  const session = readSection(parsed.session, 'session');
  const batch = readSection(parsed.batch, 'batch');
  const generator = readSection(parsed.generator, 'generator');
  const verifier = readSection(parsed.verifier, 'verifier');
  const judge = readSection(parsed.judge, 'judge');

  let maxTokens: number | null | undefined;
  if (generator.max_tokens === null) {
    maxTokens = null;
  } else {
    maxTokens = readPositiveInt(generator.max_tokens, 'generator.max_tokens');
  }

  return {
    maxIterations: readPositiveInt(parsed.max_iterations, 'max_iterations'),
    verifyEnabled: readBoolean(parsed.verify_enabled, 'verify_enabled'),
    judgeEnabled: readBoolean(parsed.judge_enabled, 'judge_enabled'),
    analysisEnabled: readBoolean(parsed.analysis_enabled, 'analysis_enabled'),
    feedback: {
      maxProofChars: readPositiveInt(feedback.max_proof_chars, 'feedback.max_proof_chars'),
      maxDiagnosticChars: readPositiveInt(feedback.max_diagnostic_chars, 'feedback.max_diagnostic_chars'),
      maxSummaryEntries: readPositiveInt(feedback.max_summary_entries, 'feedback.max_summary_entries'),
    },
    session: {
      timeoutMs: readSeconds(session.timeout_seconds, 'session.timeout_seconds'),
    },
    batch: {
      concurrency: readPositiveInt(batch.concurrency, 'batch.concurrency'),
    },
    generator: {
      command: readStringArray(generator.command, 'generator.command'),
      timeoutMs: readSeconds(generator.timeout_seconds, 'generator.timeout_seconds'),
      requiredEnv: readStringArray(generator.required_env, 'generator.required_env'),
      maxTokens,
    },
    verifier: {
      command: readStringArray(verifier.command, 'verifier.command'),
      projectRoot: readString(verifier.project_root, 'verifier.project_root'),
      scratchDir: readString(verifier.scratch_dir, 'verifier.scratch_dir'),
      timeoutMs: readSeconds(verifier.timeout_seconds, 'verifier.timeout_seconds'),
      concurrency: readPositiveInt(verifier.concurrency, 'verifier.concurrency'),
    },
    judge: {
      command: readStringArray(judge.command, 'judge.command'),
      timeoutMs: readSeconds(judge.timeout_seconds, 'judge.timeout_seconds'),
    },
  };
};

const readEnvInt = (env: NodeJS.ProcessEnv, name: string): number | undefined => {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') {
    return undefined;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigError(name, `must be a positive integer, got: ${raw}`);
  }
  return value;
};

export const configFromEnv = (env: NodeJS.ProcessEnv): ConfigOverrides => {
  const leanTimeoutSeconds = readEnvInt(env, 'LEAN_TIMEOUT_SECONDS');
  const projectRoot = env.LEAN_PROJECT_ROOT?.trim();

  return {
    maxIterations: readEnvInt(env, 'MAX_ITERATIONS'),
    batch: { concurrency: readEnvInt(env, 'BATCH_CONCURRENCY') },
    verifier: {
      timeoutMs: leanTimeoutSeconds === undefined ? undefined : leanTimeoutSeconds * 1000,
      projectRoot: projectRoot ? projectRoot : undefined,
    },
  };
};

const pick = <T>(override: T | undefined, fallback: T): T => (override === undefined ? fallback : override);

const mergeOverrides = (base: ProofConfig, overrides: ConfigOverrides): ProofConfig => {
  const { feedback = {}, session = {}, batch = {}, generator = {}, verifier = {}, judge = {} } = overrides;
  return {
    workDir: base.workDir,
    maxIterations: pick(overrides.maxIterations, base.maxIterations),
    verifyEnabled: pick(overrides.verifyEnabled, base.verifyEnabled),
    judgeEnabled: pick(overrides.judgeEnabled, base.judgeEnabled),
    analysisEnabled: pick(overrides.analysisEnabled, base.analysisEnabled),
    feedback: {
      maxProofChars: pick(feedback.maxProofChars, base.feedback.maxProofChars),
      maxDiagnosticChars: pick(feedback.maxDiagnosticChars, base.feedback.maxDiagnosticChars),
      maxSummaryEntries: pick(feedback.maxSummaryEntries, base.feedback.maxSummaryEntries),
    },
    session: { timeoutMs: pick(session.timeoutMs, base.session.timeoutMs) },
    batch: { concurrency: pick(batch.concurrency, base.batch.concurrency) },
    generator: {
      command: pick(generator.command, base.generator.command),
      timeoutMs: pick(generator.timeoutMs, base.generator.timeoutMs),
      requiredEnv: pick(generator.requiredEnv, base.generator.requiredEnv),
      maxTokens: pick(generator.maxTokens, base.generator.maxTokens),
    },
    verifier: {
      command: pick(verifier.command, base.verifier.command),
      projectRoot: pick(verifier.projectRoot, base.verifier.projectRoot),
      scratchDir: pick(verifier.scratchDir, base.verifier.scratchDir),
      timeoutMs: pick(verifier.timeoutMs, base.verifier.timeoutMs),
      concurrency: pick(verifier.concurrency, base.verifier.concurrency),
    },
    judge: {
      command: pick(judge.command, base.judge.command),
      timeoutMs: pick(judge.timeoutMs, base.judge.timeoutMs),
    },
  };
};

const validateConfig = (config: ProofConfig): void => {
  const positive: Array<[string, number]> = [
    ['maxIterations', config.maxIterations],
    ['batch.concurrency', config.batch.concurrency],
    ['verifier.concurrency', config.verifier.concurrency],
    ['feedback.maxProofChars', config.feedback.maxProofChars],
    ['feedback.maxDiagnosticChars', config.feedback.maxDiagnosticChars],
    ['feedback.maxSummaryEntries', config.feedback.maxSummaryEntries],
  ];
  for (const [path, value] of positive) {
    if (!Number.isInteger(value) || value <= 0) {
      throw new ConfigError(path, `must be a positive integer, got: ${value}`);
    }
  }
  if (config.verifier.command.length === 0) {
    throw new ConfigError('verifier.command', 'must name an executable');
  }
  if (config.judge.command.length === 0) {
    throw new ConfigError('judge.command', 'must name an executable');
  }
};

const freezeConfig = (config: ProofConfig): ProofConfig =>
  Object.freeze({
    ...config,
    feedback: Object.freeze({ ...config.feedback }),
    session: Object.freeze({ ...config.session }),
    batch: Object.freeze({ ...config.batch }),
    generator: Object.freeze({
      ...config.generator,
      command: [...config.generator.command],
      requiredEnv: [...config.generator.requiredEnv],
    }),
    verifier: Object.freeze({ ...config.verifier, command: [...config.verifier.command] }),
    judge: Object.freeze({ ...config.judge, command: [...config.judge.command] }),
  });

/**
 * `baseEnv` with the variables of a dotenv file filled in underneath it: values already
 * set in the environment win. Without `envFile`, `.env` in the work directory is read
 * when present.
 */
export const loadEnvironment = (
  workDir: string,
  envFile?: string,
  baseEnv: NodeJS.ProcessEnv = process.env,
): NodeJS.ProcessEnv => {
  const envPath = envFile ? resolve(envFile) : resolve(workDir, ENV_FILE_NAME);
  if (!existsSync(envPath)) {
    if (envFile) {
      throw new ConfigError('env', `file not found: ${envPath}`);
    }
    return baseEnv;
  }
  return { ...parseDotenv(readFileSync(envPath, 'utf-8')), ...baseEnv };
};

export interface ResolveConfigOptions {
  workDir: string;
  configPath?: string;
  env?: NodeJS.ProcessEnv;
  overrides?: ConfigOverrides;
}

export const resolveConfig = (options: ResolveConfigOptions): ProofConfig => {
  const workDir = resolve(options.workDir);
  let config: ProofConfig = { ...DEFAULT_CONFIG, workDir };

  const configPath = options.configPath
    ? resolve(options.configPath)
    : resolve(workDir, CONFIG_FILE_NAME);

  if (existsSync(configPath)) {
    config = mergeOverrides(config, parseConfigFile(readFileSync(configPath, 'utf-8')));
  } else if (options.configPath) {
    throw new ConfigError('config', `file not found: ${configPath}`);
  }

  if (options.env) {
    config = mergeOverrides(config, configFromEnv(options.env));
  }
  if (options.overrides) {
    config = mergeOverrides(config, options.overrides);
  }

  if (config.verifier.projectRoot) {
    config = {
      ...config,
      verifier: { ...config.verifier, projectRoot: resolve(workDir, config.verifier.projectRoot) },
    };
  }

  validateConfig(config);
  return freezeConfig(config);
};

export const sessionConfigOf = (config: ProofConfig): SessionConfig =>
  Object.freeze({
    maxIterations: config.maxIterations,
    verifyEnabled: config.verifyEnabled,
    judgeEnabled: config.judgeEnabled,
    analysisEnabled: config.analysisEnabled,
    feedback: config.feedback,
    timeoutMs: config.session.timeoutMs,
  });

export const maskSecret = (secret: string | undefined): string => {
  if (!secret) {
    return 'Not set';
  }
  if (secret.length <= 8) {
    return '*'.repeat(secret.length);
  }
  return secret.slice(0, 4) + '*'.repeat(secret.length - 8) + secret.slice(-4);
};

const formatSeconds = (ms: number | null): string => (ms === null ? 'none' : `${ms / 1000}s`);

const formatCommand = (command: string[]): string =>
  command.length === 0 ? 'Not set' : command.join(' ');

export const describeConfig = (
  config: ProofConfig,
  env: NodeJS.ProcessEnv,
): Array<[string, string]> => {
  const rows: Array<[string, string]> = [
    ['Work directory', config.workDir],
    ['Max iterations', String(config.maxIterations)],
    ['Verification', config.verifyEnabled ? 'enabled' : 'disabled'],
    ['Judging', config.judgeEnabled ? 'enabled' : 'disabled'],
    ['Failure analysis', config.analysisEnabled ? 'enabled' : 'disabled'],
    ['Batch concurrency', String(config.batch.concurrency)],
    ['Session timeout', formatSeconds(config.session.timeoutMs)],
    ['Generator command', formatCommand(config.generator.command)],
    ['Generator timeout', formatSeconds(config.generator.timeoutMs)],
    ['Verifier command', formatCommand(config.verifier.command)],
    ['Lean project root', config.verifier.projectRoot ?? 'auto-detect'],
    ['Lean timeout', formatSeconds(config.verifier.timeoutMs)],
    ['Verifier concurrency', String(config.verifier.concurrency)],
    ['Judge command', formatCommand(config.judge.command)],
    ['Judge timeout', formatSeconds(config.judge.timeoutMs)],
  ];
  for (const name of config.generator.requiredEnv) {
    rows.push([name, maskSecret(env[name])]);
  }
  return rows;
};
