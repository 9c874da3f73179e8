import type { JudgeSettings } from "../config.js";
import { describeError } from "../errors.js";
import { componentLogger } from "../logger.js";
import type { JudgeVerdict } from "../models.js";
import { formatCommandLine, runProcess } from "../process-runner.js";
import { PROMPTS } from "../prompts.js";
import { VerdictParser } from "../verdict-parser.js";
import {
  unavailableVerdict,
  type JudgeRequest,
  type PreflightResult,
  type ProofJudge,
} from "./types.js";

const log = componentLogger("CommandJudge");

export class CommandJudge implements ProofJudge {
  private readonly parser = new VerdictParser();

  constructor(
    private readonly settings: JudgeSettings,
    private readonly workDir: string,
    private readonly env: NodeJS.ProcessEnv = process.env,
  ) {}

  async judge(request: JudgeRequest, signal?: AbortSignal): Promise<JudgeVerdict> {
    const commandLine = formatCommandLine(this.settings.command);
    try {
      const result = await runProcess({
        command: this.settings.command,
        cwd: this.workDir,
        input: PROMPTS.judge(request.statement, request.proofText),
        timeoutMs: this.settings.timeoutMs,
        signal,
        env: this.env,
      });

      switch (result.kind) {
        case "spawn_failed":
          return unavailableVerdict(`could not start ${commandLine}: ${result.error.message}`);
        case "timed_out":
          return unavailableVerdict(`timed out after ${this.settings.timeoutMs / 1000}s`);
        case "aborted":
          return unavailableVerdict("judging was aborted");
        case "exited": {
          if (result.exitCode !== 0) {
            return unavailableVerdict(`${commandLine} exited with code ${result.exitCode}`);
          }
          const verdict = this.parser.parseVerdictOutput(result.stdout);
          log.info(`Judge verdict: ${verdict.outcome}`);
          return verdict;
        }
      }
    } catch (error) {
      log.error(`Judge failed: ${describeError(error)}`);
      return unavailableVerdict(describeError(error));
    }
  }

  async preflight(): Promise<PreflightResult> {
    const [executable] = this.settings.command;
    const result = await runProcess({
      command: [executable, "--version"],
      cwd: this.workDir,
      timeoutMs: 30_000,
      env: this.env,
    });
    if (result.kind === "exited" && result.exitCode === 0) {
      return { ok: true };
    }
    if (result.kind === "spawn_failed") {
      return { ok: false, message: `${executable} not found: ${result.error.message}` };
    }
    return { ok: false, message: `${executable} --version did not succeed (${result.kind})` };
  }
}
