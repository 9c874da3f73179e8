import { randomUUID } from "crypto";
import { existsSync, mkdirSync, readFileSync, rmSync, writeFileSync } from "fs";
import { homedir } from "os";
import { dirname, isAbsolute, join, relative, resolve } from "path";

import { ConcurrencyGate } from "../concurrency.js";
import type { VerifierSettings } from "../config.js";
import { describeError } from "../errors.js";
import { componentLogger } from "../logger.js";
import type { VerifyResult } from "../models.js";
import { formatCommandLine, runProcess } from "../process-runner.js";
import type { PreflightResult, ProofVerifier, VerifyRequest } from "./types.js";

const log = componentLogger("LeanVerifier");

export const SORRY_DIAGNOSTIC = "Proof contains sorry (incomplete)";

const LAKEFILES = ["lakefile.toml", "lakefile.lean"];

/** Walks up from `start` to the first directory holding a lakefile. */
export function findLeanProjectRoot(start: string): string | null {
  let current = resolve(start);
  while (true) {
    if (LAKEFILES.some((name) => existsSync(join(current, name)))) {
      return current;
    }
    const parent = dirname(current);
    if (parent === current) {
      return null;
    }
    current = parent;
  }
}

/** `sorry` or `admit` anywhere outside a `--` line comment. */
export function containsSorry(content: string): boolean {
  return content.split("\n").some((line) => {
    const code = line.split("--")[0];
    return /\b(sorry|admit)\b/.test(code);
  });
}

export function parseBuildOutput(output: string): { errors: string[]; warnings: string[] } {
  const errors: string[] = [];
  const warnings: string[] = [];
  for (const line of output.split("\n")) {
    const lower = line.toLowerCase();
    if (lower.includes("error:")) {
      errors.push(line.trim());
    } else if (lower.includes("warning:")) {
      warnings.push(line.trim());
    } else if (lower.includes("declaration uses 'sorry'")) {
      warnings.push(SORRY_DIAGNOSTIC);
    }
  }
  return { errors, warnings };
}

/** Module names must be valid Lean identifiers and unique per invocation. */
export function scratchModuleName(targetId: string): string {
  const sanitized = targetId.replace(/[^A-Za-z0-9_]/g, "_").replace(/^_+/, "");
  const suffix = randomUUID().replace(/-/g, "").slice(0, 12);
  return `Proof_${sanitized || "anon"}_${suffix}`;
}

const moduleNameOf = (projectRoot: string, leanFile: string): string =>
  relative(projectRoot, leanFile).replace(/\.lean$/, "").split(/[\\/]/).join(".");

const sorryFailure = (): VerifyResult => ({
  outcome: "fail",
  diagnostic: SORRY_DIAGNOSTIC,
  errors: [SORRY_DIAGNOSTIC],
  warnings: [],
});

export class LeanVerifier implements ProofVerifier {
  private readonly gate: ConcurrencyGate;
  private readonly env: NodeJS.ProcessEnv;

  constructor(
    private readonly settings: VerifierSettings,
    private readonly workDir: string,
    env: NodeJS.ProcessEnv = process.env,
  ) {
    this.gate = new ConcurrencyGate(settings.concurrency);
    this.env = withElanPath(env);
  }

  getProjectRoot(): string | null {
    if (this.settings.projectRoot) {
      return existsSync(this.settings.projectRoot) ? this.settings.projectRoot : null;
    }
    return findLeanProjectRoot(this.workDir);
  }

  async verify(request: VerifyRequest, signal?: AbortSignal): Promise<VerifyResult> {
    const projectRoot = this.getProjectRoot();
    if (!projectRoot) {
      return {
        outcome: "error",
        reason: "toolchain_missing",
        diagnostic: `Lean project not found (no lakefile.toml or lakefile.lean above ${this.workDir})`,
      };
    }

    if (containsSorry(request.proofText)) {
      log.info(`Proof for ${request.targetId} contains sorry; not building`);
      return sorryFailure();
    }

    const scratchDir = join(projectRoot, this.settings.scratchDir);
    const leanFile = join(scratchDir, `${scratchModuleName(request.targetId)}.lean`);

    try {
      mkdirSync(scratchDir, { recursive: true });
      writeFileSync(leanFile, request.proofText, "utf-8");
    } catch (error) {
      return {
        outcome: "error",
        reason: "crash",
        diagnostic: `Could not write scratch file ${leanFile}: ${describeError(error)}`,
      };
    }

    try {
      return await this.build(projectRoot, leanFile, signal);
    } finally {
      rmSync(leanFile, { force: true });
    }
  }

  /** Verifies a proof file where it lies; files outside the project are built from a scratch copy. */
  async checkFile(filePath: string, signal?: AbortSignal): Promise<VerifyResult> {
    const leanFile = resolve(this.workDir, filePath);
    if (!existsSync(leanFile)) {
      return { outcome: "error", reason: "crash", diagnostic: `File not found: ${leanFile}` };
    }

    const content = readFileSync(leanFile, "utf-8");
    const projectRoot = this.getProjectRoot();
    const relativePath = projectRoot ? relative(projectRoot, leanFile) : "";
    if (!projectRoot || relativePath.startsWith("..") || isAbsolute(relativePath)) {
      return this.verify({ proofText: content, targetId: "Check" }, signal);
    }

    if (containsSorry(content)) {
      return sorryFailure();
    }
    return this.build(projectRoot, leanFile, signal);
  }

  async preflight(): Promise<PreflightResult> {
    const projectRoot = this.getProjectRoot();
    if (!projectRoot) {
      return { ok: false, message: `No Lean project (lakefile.toml or lakefile.lean) found from ${this.workDir}` };
    }

    const [executable] = this.settings.command;
    const result = await runProcess({
      command: [executable, "--version"],
      cwd: projectRoot,
      timeoutMs: 30_000,
      env: this.env,
    });
    if (result.kind === "exited" && result.exitCode === 0) {
      log.info(`Lean toolchain available: ${result.stdout.trim()}`);
      return { ok: true };
    }
    if (result.kind === "spawn_failed") {
      return { ok: false, message: `${executable} not found: ${result.error.message}` };
    }
    return { ok: false, message: `${executable} --version did not succeed (${result.kind})` };
  }

  private build(projectRoot: string, leanFile: string, signal?: AbortSignal): Promise<VerifyResult> {
    const moduleName = moduleNameOf(projectRoot, leanFile);
    const command = [...this.settings.command, moduleName];

    return this.gate.run(async (): Promise<VerifyResult> => {
      if (signal?.aborted) {
        return { outcome: "error", reason: "cancelled", diagnostic: "Verification cancelled before it started" };
      }

      log.info(`Building ${moduleName}: ${formatCommandLine(command)}`);
      const result = await runProcess({
        command,
        cwd: projectRoot,
        timeoutMs: this.settings.timeoutMs,
        signal,
        env: this.env,
      });

      switch (result.kind) {
        case "spawn_failed":
          return {
            outcome: "error",
            reason: result.code === "ENOENT" ? "toolchain_missing" : "crash",
            diagnostic: `Could not run ${formatCommandLine(command)}: ${result.error.message}`,
          };
        case "timed_out":
          return {
            outcome: "error",
            reason: "timeout",
            diagnostic: `Verification timed out after ${this.settings.timeoutMs / 1000}s`,
          };
        case "aborted":
          return { outcome: "error", reason: "cancelled", diagnostic: "Verification cancelled" };
        case "exited": {
          const output = result.stdout + result.stderr;
          const { errors, warnings } = parseBuildOutput(output);
          if (result.exitCode === 0 && errors.length === 0) {
            log.info(`${moduleName} verified`);
            return { outcome: "pass", warnings };
          }
          log.info(`${moduleName} failed with ${errors.length} error(s), exit code ${result.exitCode}`);
          return {
            outcome: "fail",
            diagnostic: errors.length > 0
              ? errors.join("\n")
              : output.trim() || `${formatCommandLine(command)} exited with code ${result.exitCode}`,
            errors,
            warnings,
          };
        }
      }
    });
  }
}

/** Puts `~/.elan/bin` on PATH when elan is installed there. */
export function withElanPath(env: NodeJS.ProcessEnv): NodeJS.ProcessEnv {
  const elanBin = join(homedir(), ".elan", "bin");
  if (!existsSync(elanBin) || (env.PATH ?? "").split(":").includes(elanBin)) {
    return env;
  }
  return { ...env, PATH: env.PATH ? `${elanBin}:${env.PATH}` : elanBin };
}
