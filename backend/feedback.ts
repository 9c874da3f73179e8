import type {
  Attempt,
  FailureAnalysis,
  FailureCategory,
  FeedbackContext,
  FeedbackLimits,
} from './models.js';

const CATEGORY_LABELS: Record<FailureCategory, string> = {
  verification_failed: 'verification failed',
  verifier_error: 'verifier could not run',
  judge_rejected: 'rejected by judge',
  judge_unavailable: 'judge unavailable',
};

export function classifyAttempt(attempt: Attempt): FailureCategory | null {
  const verification = attempt.verification;
  if (!verification) {
    return null;
  }
  if (verification.outcome === 'fail') {
    return 'verification_failed';
  }
  if (verification.outcome === 'error') {
    return 'verifier_error';
  }
  if (attempt.verdict?.outcome === 'reject') {
    return attempt.verdict.unavailable ? 'judge_unavailable' : 'judge_rejected';
  }
  return null;
}

export function describeCategory(category: FailureCategory): string {
  return CATEGORY_LABELS[category];
}

export function truncate(text: string, maxChars: number): string {
  if (text.length <= maxChars) {
    return text;
  }
  return `${text.slice(0, maxChars)}\n... (truncated, ${text.length - maxChars} more characters)`;
}

/**
 * Feedback for the next generation: full detail for the most recent attempt only,
 * one line per earlier attempt, capped at `maxSummaryEntries` lines.
 */
export function buildFeedbackContext(
  attempts: readonly Attempt[],
  limits: FeedbackLimits,
  analysis: FailureAnalysis | null = null,
): FeedbackContext {
  const latest = attempts[attempts.length - 1];
  if (!latest) {
    throw new Error('Cannot build feedback without a previous attempt');
  }

  const category = classifyAttempt(latest);
  const sections: string[] = [];

  sections.push(
    `## Previous attempt (#${latest.index}): ${category ? describeCategory(category) : 'not accepted'}`,
  );
  sections.push(`### Proof\n\`\`\`lean\n${truncate(latest.proofText, limits.maxProofChars)}\n\`\`\``);

  const verification = latest.verification;
  if (verification && verification.outcome !== 'pass') {
    sections.push(
      `### Verifier diagnostic\n\`\`\`\n${truncate(verification.diagnostic, limits.maxDiagnosticChars)}\n\`\`\``,
    );
  } else if (verification && verification.warnings.length > 0) {
    sections.push(
      `### Verifier warnings\n${truncate(verification.warnings.join('\n'), limits.maxDiagnosticChars)}`,
    );
  }

  if (latest.verdict?.outcome === 'reject') {
    const issues = latest.verdict.issues.map(issue => `- ${issue}`).join('\n');
    const body = issues ? `${latest.verdict.reason}\n\n${issues}` : latest.verdict.reason;
    sections.push(`### Judge rejection\n${truncate(body, limits.maxDiagnosticChars)}`);
  }

  if (analysis) {
    sections.push(`### Analysis\n${analysis.analysis}`);
    if (analysis.suggestions) {
      sections.push(`### Suggestions\n${analysis.suggestions}`);
    }
  }

  const earlier = attempts.slice(0, -1);
  const summary = earlier.slice(-limits.maxSummaryEntries).map(attempt => {
    const earlierCategory = classifyAttempt(attempt);
    return `Attempt ${attempt.index}: ${earlierCategory ? describeCategory(earlierCategory) : 'not accepted'}`;
  });

  if (summary.length > 0) {
    const omitted = earlier.length - summary.length;
    const lines = summary.map(line => `- ${line}`);
    if (omitted > 0) {
      lines.unshift(`- (${omitted} earlier attempt(s) omitted)`);
    }
    sections.push(`## Earlier attempts\n${lines.join('\n')}`);
  }

  return {
    previousAttempt: latest.index,
    summary,
    analysis,
    text: sections.join('\n\n'),
  };
}
