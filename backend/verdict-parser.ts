import { unavailableVerdict } from "./adapters/types.js";
import { componentLogger } from "./logger.js";
import type { JudgeVerdict } from "./models.js";

const log = componentLogger("VerdictParser");

const DEFAULT_REJECT_REASON = "Judge rejected the proof without giving a reason";

type ParseAttempt =
  | { status: "parsed"; verdict: JudgeVerdict }
  | { status: "invalid"; message: string }
  | { status: "not_json" };

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

export class VerdictParser {
  parseVerdictOutput(rawOutput: string): JudgeVerdict {
    const trimmedOutput = rawOutput.trim();
    const candidates: string[] = [];

    const fencedMatch = trimmedOutput.match(/```(?:json|jsonc)?\s*\n([\s\S]*?)\n?```/i);
    if (fencedMatch) {
      candidates.push(fencedMatch[1].trim());
    }
    candidates.push(trimmedOutput);
    const extractedJSON = this.extractJSONFromText(trimmedOutput);
    if (extractedJSON) {
      candidates.push(extractedJSON);
    }

    for (const candidate of candidates) {
      const attempt = this.tryParseJSON(candidate);
      if (attempt.status === "parsed") {
        return attempt.verdict;
      }
      if (attempt.status === "invalid") {
        log.warn(`Judge output is JSON but not a verdict: ${attempt.message}`);
        return unavailableVerdict(attempt.message);
      }
    }

    log.warn(`Failed to parse judge output as JSON. Raw output (first 200 chars): ${rawOutput.substring(0, 200)}`);
    return unavailableVerdict(
      `could not parse judge output as JSON.\n\nRaw output:\n${rawOutput.substring(0, 500)}`,
    );
  }

  private tryParseJSON(text: string): ParseAttempt {
    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch {
      return { status: "not_json" };
    }

    if (!isRecord(parsed)) {
      return { status: "invalid", message: "Parsed JSON is not an object" };
    }

    const isRealProof = typeof parsed.is_real_proof === "boolean"
      ? parsed.is_real_proof
      : parsed.valid;
    if (typeof isRealProof !== "boolean") {
      return {
        status: "invalid",
        message: 'Missing "is_real_proof" (or "valid") boolean field',
      };
    }

    if (parsed.issues !== undefined && !Array.isArray(parsed.issues)) {
      return { status: "invalid", message: 'Invalid "issues" field (must be an array)' };
    }

    const issues: string[] = [];
    const rawIssues: unknown[] = Array.isArray(parsed.issues) ? parsed.issues : [];
    for (let index = 0; index < rawIssues.length; index++) {
      const issue = rawIssues[index];
      if (typeof issue !== "string") {
        return { status: "invalid", message: `Issue at index ${index} is not a string` };
      }
      issues.push(issue);
    }

    const summary = typeof parsed.summary === "string" ? parsed.summary.trim() : "";
    const feedback = typeof parsed.feedback === "string" ? parsed.feedback.trim() : "";

    if (isRealProof) {
      return { status: "parsed", verdict: { outcome: "accept", summary } };
    }

    return {
      status: "parsed",
      verdict: {
        outcome: "reject",
        reason: feedback || summary || DEFAULT_REJECT_REASON,
        issues,
        unavailable: false,
      },
    };
  }

  private extractJSONFromText(text: string): string | null {
    const firstBrace = text.indexOf("{");
    if (firstBrace === -1) return null;

    let braceCount = 0;
    let inString = false;
    let escapeNext = false;

    for (let i = firstBrace; i < text.length; i++) {
      const char = text[i];

      if (escapeNext) {
        escapeNext = false;
        continue;
      }

      if (char === "\\") {
        escapeNext = true;
        continue;
      }

      if (char === '"') {
        inString = !inString;
        continue;
      }

      if (inString) continue;

      if (char === "{") {
        braceCount++;
      } else if (char === "}") {
        braceCount--;
        if (braceCount === 0) {
          return text.substring(firstBrace, i + 1);
        }
      }
    }

    return null;
  }
}
