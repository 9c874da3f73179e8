import { mkdirSync, writeFileSync } from 'fs';
import { dirname, join } from 'path';

import type { BatchResult, SessionFailure, TerminalStatus } from './models.js';

export interface ReportEntry {
  problemId: string;
  status: TerminalStatus;
  attemptCount: number;
  acceptedProof: string | null;
  failure: SessionFailure | null;
}

export interface BatchReport {
  startedAt: string;
  finishedAt: string;
  totals: Record<TerminalStatus, number>;
  problems: ReportEntry[];
}

export function countByStatus(entries: BatchResult['entries']): Record<TerminalStatus, number> {
  const totals: Record<TerminalStatus, number> = { succeeded: 0, exhausted: 0, fatal_error: 0 };
  for (const entry of Object.values(entries)) {
    totals[entry.status] += 1;
  }
  return totals;
}

export function summarizeBatch(result: BatchResult): BatchReport {
  const problems = Object.values(result.entries)
    .sort((a, b) => a.problemId.localeCompare(b.problemId))
    .map(entry => ({
      problemId: entry.problemId,
      status: entry.status,
      attemptCount: entry.attemptCount,
      acceptedProof: entry.acceptedAttempt?.proofText ?? null,
      failure: entry.session.failure,
    }));

  return {
    startedAt: result.startedAt,
    finishedAt: result.finishedAt,
    totals: countByStatus(result.entries),
    problems,
  };
}

export function writeReport(result: BatchResult, filePath: string): BatchReport {
  const report = summarizeBatch(result);
  mkdirSync(dirname(filePath), { recursive: true });
  writeFileSync(filePath, JSON.stringify(report, null, 2) + '\n', 'utf-8');
  return report;
}

/** Writes `<problemId>_solved.lean` for every accepted proof and returns the paths written. */
export function writeSolutions(result: BatchResult, outputDir: string): string[] {
  const written: string[] = [];
  const entries = Object.values(result.entries).sort((a, b) => a.problemId.localeCompare(b.problemId));
  for (const entry of entries) {
    if (!entry.acceptedAttempt) {
      continue;
    }
    mkdirSync(outputDir, { recursive: true });
    const target = join(outputDir, `${entry.problemId}_solved.lean`);
    writeFileSync(target, entry.acceptedAttempt.proofText, 'utf-8');
    written.push(target);
  }
  return written;
}

export function formatReportLines(report: BatchReport): string[] {
  const width = Math.max(7, ...report.problems.map(problem => problem.problemId.length));
  const lines = [`${'Problem'.padEnd(width)}  ${'Status'.padEnd(11)}  Attempts`];
  for (const problem of report.problems) {
    lines.push(`${problem.problemId.padEnd(width)}  ${problem.status.padEnd(11)}  ${problem.attemptCount}`);
  }
  const { succeeded, exhausted, fatal_error: fatalErrors } = report.totals;
  lines.push('');
  lines.push(`Succeeded: ${succeeded}  Exhausted: ${exhausted}  Fatal: ${fatalErrors}`);
  return lines;
}
