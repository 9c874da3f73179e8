import type { JudgeSettings } from "../config.js";
import { componentLogger } from "../logger.js";
import type { FailureAnalysis } from "../models.js";
import { formatCommandLine, runProcess } from "../process-runner.js";
import { PROMPTS } from "../prompts.js";
import type { AnalysisRequest, FailureAnalyst } from "./types.js";

const log = componentLogger("FailureAnalyst");

const NO_REVISION = /no revision needed/i;

/** Splits a markdown reply into `## Heading` sections keyed by lower-cased heading. */
export function splitSections(text: string): Map<string, string> {
  const sections = new Map<string, string>();
  let heading: string | null = null;
  let body: string[] = [];

  const flush = (): void => {
    if (heading !== null) {
      sections.set(heading, body.join("\n").trim());
    }
  };

  for (const line of text.split("\n")) {
    const match = line.match(/^##\s+(.+?)\s*$/);
    if (match) {
      flush();
      heading = match[1].toLowerCase();
      body = [];
    } else {
      body.push(line);
    }
  }
  flush();
  return sections;
}

/** The first section whose heading starts with `prefix`, so `## Suggestion` and `## Suggestions` both match. */
const sectionStartingWith = (sections: Map<string, string>, prefix: string): string | undefined => {
  for (const [heading, body] of sections) {
    if (heading.startsWith(prefix)) {
      return body;
    }
  }
  return undefined;
};

export function parseAnalysis(text: string): FailureAnalysis {
  const sections = splitSections(text);
  const revised = sectionStartingWith(sections, "revised proof") ?? "";
  const shouldRetry = sectionStartingWith(sections, "should retry") ?? "YES";

  return {
    analysis: sectionStartingWith(sections, "analysis") ?? text.trim(),
    suggestions: sectionStartingWith(sections, "suggestion") ?? "",
    revisedHint: revised.length === 0 || NO_REVISION.test(revised) ? null : revised,
    shouldRetry: !/^no\b/i.test(shouldRetry.trim()),
  };
}

/** Asks the judge's model why an attempt failed. Throws when no usable reply comes back. */
export class CommandFailureAnalyst implements FailureAnalyst {
  constructor(
    private readonly settings: JudgeSettings,
    private readonly workDir: string,
    private readonly env: NodeJS.ProcessEnv = process.env,
  ) {}

  async analyze(request: AnalysisRequest, signal?: AbortSignal): Promise<FailureAnalysis> {
    const commandLine = formatCommandLine(this.settings.command);
    const result = await runProcess({
      command: this.settings.command,
      cwd: this.workDir,
      input: PROMPTS.analysis(request.problem, request.hint, request.attempt),
      timeoutMs: this.settings.timeoutMs,
      signal,
      env: this.env,
    });

    if (result.kind !== "exited") {
      throw new Error(`Failure analysis with ${commandLine} did not complete (${result.kind})`);
    }
    if (result.exitCode !== 0 || result.stdout.trim().length === 0) {
      throw new Error(`Failure analysis with ${commandLine} failed with exit code ${result.exitCode}`);
    }

    const analysis = parseAnalysis(result.stdout);
    log.info(
      `Analysis of attempt ${request.attempt.index}: revised hint ${analysis.revisedHint ? "provided" : "not provided"}, ` +
        `should retry ${analysis.shouldRetry ? "yes" : "no"}`,
    );
    return analysis;
  }
}
