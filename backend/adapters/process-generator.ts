import type { GeneratorSettings } from "../config.js";
import { componentLogger } from "../logger.js";
import { formatCommandLine, runProcess } from "../process-runner.js";
import { PROMPTS } from "../prompts.js";
import type {
  GenerateRequest,
  GenerateResult,
  PreflightResult,
  ProofGenerator,
} from "./types.js";

const log = componentLogger("ProcessGenerator");

const STDERR_TAIL_CHARS = 500;

/** The first ```lean (or untagged) block of the reply, or the whole reply when it has none. */
export function extractProofText(output: string): string {
  const fenced = output.match(/```(?:lean4?)?\s*\n([\s\S]*?)```/i);
  if (fenced) {
    return fenced[1].trim();
  }
  return output.trim();
}

const tail = (text: string): string => {
  const trimmed = text.trim();
  return trimmed.length > STDERR_TAIL_CHARS ? `...${trimmed.slice(-STDERR_TAIL_CHARS)}` : trimmed;
};

/**
 * Runs the configured generator command once per request: the generation prompt goes
 * in on stdin and the proof comes back on stdout.
 */
export class ProcessGenerator implements ProofGenerator {
  constructor(
    private readonly settings: GeneratorSettings,
    private readonly workDir: string,
    private readonly env: NodeJS.ProcessEnv = process.env,
  ) {}

  private checkConfiguration(): string | null {
    if (this.settings.command.length === 0) {
      return "No generator command configured (set generator.command in lemmaloop.yaml)";
    }
    const missing = this.settings.requiredEnv.filter((name) => !this.env[name]?.trim());
    if (missing.length > 0) {
      return `Missing required environment variable(s): ${missing.join(", ")}`;
    }
    return null;
  }

  async generate(request: GenerateRequest, signal?: AbortSignal): Promise<GenerateResult> {
    const configurationError = this.checkConfiguration();
    if (configurationError) {
      return { kind: "failure", category: "configuration", message: configurationError };
    }

    const { problem, hint, feedback, budget } = request;
    if (problem.statement.trim().length === 0) {
      return {
        kind: "failure",
        category: "malformed_problem",
        message: `Problem ${problem.id} has an empty statement`,
      };
    }

    const prompt = PROMPTS.generation(problem, hint, feedback, budget.maxTokens);
    const commandLine = formatCommandLine(this.settings.command);
    log.info(`Generating proof for ${problem.id} with ${commandLine} (prompt ${prompt.length} chars)`);

    const result = await runProcess({
      command: this.settings.command,
      cwd: this.workDir,
      input: prompt,
      timeoutMs: budget.timeoutMs,
      signal,
      env: this.env,
    });

    switch (result.kind) {
      case "spawn_failed":
        return {
          kind: "failure",
          category: "configuration",
          message: `Could not start generator ${commandLine}: ${result.error.message}`,
        };
      case "timed_out":
        return {
          kind: "failure",
          category: "transport",
          message: `Generator timed out after ${budget.timeoutMs / 1000}s`,
        };
      case "aborted":
        return { kind: "failure", category: "transport", message: "Generator run was aborted" };
      case "exited": {
        if (result.exitCode !== 0) {
          const stderr = tail(result.stderr);
          return {
            kind: "failure",
            category: "transport",
            message: `Generator exited with code ${result.exitCode}${stderr ? `: ${stderr}` : ""}`,
          };
        }
        const proofText = extractProofText(result.stdout);
        if (proofText.length === 0) {
          return { kind: "failure", category: "empty_output", message: "Generator returned no proof text" };
        }
        log.info(`Generator returned ${proofText.length} chars for ${problem.id}`);
        return { kind: "proof", proofText };
      }
    }
  }

  async preflight(): Promise<PreflightResult> {
    const configurationError = this.checkConfiguration();
    return configurationError ? { ok: false, message: configurationError } : { ok: true };
  }
}
