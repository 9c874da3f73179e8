import { spawn } from "child_process";
import { componentLogger } from "./logger.js";

const log = componentLogger("ProcessRunner");

export interface ProcessRunOptions {
  /** Executable followed by its arguments. */
  command: string[];
  cwd: string;
  input?: string;
  timeoutMs?: number;
  signal?: AbortSignal;
  env?: NodeJS.ProcessEnv;
}

export type ProcessRunResult =
  | { kind: "exited"; exitCode: number | null; stdout: string; stderr: string }
  | { kind: "timed_out"; stdout: string; stderr: string }
  | { kind: "aborted"; stdout: string; stderr: string }
  | { kind: "spawn_failed"; error: Error; code: string | null };

const errorCode = (error: Error): string | null => {
  if ("code" in error && typeof error.code === "string") {
    return error.code;
  }
  return null;
};

export function formatCommandLine(command: string[]): string {
  return command.map((part) => (/\s/.test(part) ? JSON.stringify(part) : part)).join(" ");
}

/**
 * Spawns a child process, feeds `input` on stdin and collects both output streams.
 * Never rejects: timeouts, aborts and spawn failures come back as result variants,
 * and the child is sent SIGTERM whenever it is abandoned.
 */
export function runProcess(options: ProcessRunOptions): Promise<ProcessRunResult> {
  const [executable, ...args] = options.command;
  if (!executable) {
    return Promise.resolve({
      kind: "spawn_failed",
      error: new Error("No command configured"),
      code: null,
    });
  }

  if (options.signal?.aborted) {
    return Promise.resolve({ kind: "aborted", stdout: "", stderr: "" });
  }

  log.debug(`Spawning ${formatCommandLine(options.command)} in ${options.cwd}`);

  return new Promise<ProcessRunResult>((resolve) => {
    const child = spawn(executable, args, {
      cwd: options.cwd,
      env: options.env ?? process.env,
      stdio: ["pipe", "pipe", "pipe"],
    });

    let stdoutData = "";
    let stderrData = "";
    let settled = false;
    let timeoutId: NodeJS.Timeout | undefined;

    const onAbort = (): void => {
      child.kill("SIGTERM");
      finish({ kind: "aborted", stdout: stdoutData, stderr: stderrData });
    };

    const finish = (result: ProcessRunResult): void => {
      if (settled) {
        return;
      }
      settled = true;
      if (timeoutId) clearTimeout(timeoutId);
      options.signal?.removeEventListener("abort", onAbort);
      resolve(result);
    };

    if (options.timeoutMs !== undefined && options.timeoutMs > 0) {
      timeoutId = setTimeout(() => {
        log.warn(`${executable} timed out after ${options.timeoutMs}ms`);
        child.kill("SIGTERM");
        finish({ kind: "timed_out", stdout: stdoutData, stderr: stderrData });
      }, options.timeoutMs);
    }

    options.signal?.addEventListener("abort", onAbort, { once: true });

    child.stdout.on("data", (chunk: Buffer) => {
      stdoutData += chunk.toString();
    });

    child.stderr.on("data", (chunk: Buffer) => {
      stderrData += chunk.toString();
    });

    child.stdin.on("error", (error) => {
      // EPIPE when the child exits without reading its input; the exit status says the rest
      log.debug(`stdin of ${executable} closed early: ${error.message}`);
    });
    child.stdin.end(options.input ?? "");

    child.on("error", (error) => {
      log.error(`Failed to run ${executable}: ${error.message}`);
      finish({ kind: "spawn_failed", error, code: errorCode(error) });
    });

    child.on("close", (code) => {
      finish({ kind: "exited", exitCode: code, stdout: stdoutData, stderr: stderrData });
    });
  });
}
