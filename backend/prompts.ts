import type { Attempt, ContextSnippet, FeedbackContext, Problem } from './models.js';

const renderContext = (context: readonly ContextSnippet[] | undefined): string => {
  if (!context || context.length === 0) {
    return '';
  }
  const blocks = context.map(snippet => `--- ${snippet.name} ---\n${snippet.content}`);
  return `\n\nCONTEXT:\n${blocks.join('\n\n')}`;
};

const renderAttemptFailure = (attempt: Attempt): string => {
  const verification = attempt.verification;
  if (verification && verification.outcome !== 'pass') {
    return verification.diagnostic;
  }
  if (attempt.verdict?.outcome === 'reject') {
    return attempt.verdict.reason;
  }
  return 'None';
};

export const PROMPTS = {
  generation: (
    problem: Problem,
    hint: string | null,
    feedback: FeedbackContext | null,
    maxTokens: number | null,
  ) => {
    const kindLine = problem.kind === 'formal'
      ? 'The following is a formal Lean 4 statement. Complete the proof without changing the statement.'
      : 'The following is an informal mathematical problem. Formalize it faithfully in Lean 4 and prove it.';

    let prompt = `${kindLine}\n\n${problem.statement}`;

    if (hint) {
      prompt += `\n\nPROVIDED SOLUTION:\n${hint}`;
    }

    prompt += renderContext(problem.context);

    if (feedback) {
      prompt += `\n\nPREVIOUS ATTEMPTS FAILED. Use this feedback to produce a different proof:\n\n${feedback.text}`;
    }

    prompt += `

REQUIREMENTS:
- Reply with the complete Lean 4 file only, in a single \`\`\`lean block
- Do NOT use sorry or admit
- Do NOT weaken, specialize or restate the theorem into something easier`;

    if (maxTokens !== null) {
      prompt += `\n- Keep the reply under ${maxTokens} tokens`;
    }

    return prompt;
  },

  judge: (
    statement: string,
    proofText: string,
  ) => `Problem:
${statement}

Lean Proof:
\`\`\`lean
${proofText}
\`\`\`

This proof already type-checks. Decide whether it genuinely proves the problem or only
passes the checker. Reject it for any of:

1. DEGENERATE CASES - using trivial objects (a point as a triangle, the empty set, n = 0)
2. VACUOUS PROOFS - exploiting weak or contradictory definitions or hypotheses
3. EXCLUDED MIDDLE ABUSE - concluding "P or not P" instead of proving P
4. FORMALIZATION ONLY - definitions without a theorem and its proof
5. PLACEHOLDERS - sorry, admit, or axioms introduced to close goals
6. WRONG THEOREM - proving a weaker or different statement

Reply with JSON only:
{"is_real_proof": true | false, "confidence": 0-1, "summary": "what the proof does", "issues": ["..."], "feedback": "what the next attempt must fix"}

Be strict.`,

  analysis: (
    problem: Problem,
    hint: string | null,
    attempt: Attempt,
  ) => `You are an expert mathematical proof assistant helping to debug Lean 4 proofs.

## Problem
${problem.statement}

## Proof Hint
${hint ?? 'None'}

## Generated Lean Proof
\`\`\`lean
${attempt.proofText}
\`\`\`

## Error Output
\`\`\`
${renderAttemptFailure(attempt)}
\`\`\`

Attempt #${attempt.index}. Analyze the failure and reply in this format:

## Analysis
[What went wrong]

## Suggestions
[Actionable suggestions]

## Revised Proof Hint
[New proof sketch, or "NO REVISION NEEDED"]

## Should Retry
[YES or NO]`,
};
