import { tmpdir } from 'os';

import { CommandFailureAnalyst, parseAnalysis, splitSections } from '../adapters/failure-analyst.js';
import { formatCommandLine } from '../process-runner.js';
import { FIXED_TIME, failWith, nodeScript, problem } from './helpers.js';

const REPLY = [
  '## Analysis',
  'The proof applies the wrong lemma.',
  '',
  '## Suggestions',
  'Use Nat.succ_le_of_lt.',
  '',
  '## Revised Proof Hint',
  'Induct on n and close the step with omega.',
  '',
  '## Should Retry',
  'YES',
].join('\n');

const ATTEMPT = {
  problemId: 'p1',
  index: 2,
  proofText: 'theorem p1 : 1 + 1 = 2 := by simp',
  hint: null,
  feedback: null,
  verification: failWith('error: simp made no progress'),
  verdict: null,
  createdAt: FIXED_TIME,
};

describe('splitSections', () => {
  it('keys sections by lower-cased heading', () => {
    const sections = splitSections('intro\n## Analysis\nline one\nline two\n## Should Retry\nNO\n');

    expect([...sections.keys()]).toEqual(['analysis', 'should retry']);
    expect(sections.get('analysis')).toBe('line one\nline two');
    expect(sections.get('should retry')).toBe('NO');
  });
});

describe('parseAnalysis', () => {
  it('reads every section', () => {
    expect(parseAnalysis(REPLY)).toEqual({
      analysis: 'The proof applies the wrong lemma.',
      suggestions: 'Use Nat.succ_le_of_lt.',
      revisedHint: 'Induct on n and close the step with omega.',
      shouldRetry: true,
    });
  });

  it('drops a hint that asks for no revision', () => {
    const reply = '## Analysis\nclose\n## Revised Proof Hint\nNO REVISION NEEDED\n## Should Retry\nNo, give up';

    expect(parseAnalysis(reply)).toEqual({
      analysis: 'close',
      suggestions: '',
      revisedHint: null,
      shouldRetry: false,
    });
  });

  it('matches headings by their leading words', () => {
    const reply = '## Analysis of the failure\nwrong lemma\n## Suggestion\nTry simp.\n## Revised Proof Sketch\nUse strong induction.';

    expect(parseAnalysis(reply)).toEqual({
      analysis: 'wrong lemma',
      suggestions: 'Try simp.',
      revisedHint: 'Use strong induction.',
      shouldRetry: true,
    });
  });

  it('uses the whole reply when it has no sections', () => {
    expect(parseAnalysis('  just prose  ')).toEqual({
      analysis: 'just prose',
      suggestions: '',
      revisedHint: null,
      shouldRetry: true,
    });
  });
});

describe('CommandFailureAnalyst', () => {
  it('parses the reply of the analysis command', async () => {
    const analyst = new CommandFailureAnalyst(
      { command: nodeScript(`process.stdout.write(${JSON.stringify(REPLY)})`), timeoutMs: 10_000 },
      tmpdir(),
    );

    const analysis = await analyst.analyze({ problem: problem('p1'), hint: null, attempt: ATTEMPT });

    expect(analysis.revisedHint).toBe('Induct on n and close the step with omega.');
  });

  it('sends the failing proof and its diagnostic', async () => {
    const script = `
      let input = '';
      process.stdin.on('data', chunk => { input += chunk; });
      process.stdin.on('end', () => {
        const ok = input.includes('by simp') && input.includes('error: simp made no progress') && input.includes('Attempt #2');
        console.log('## Analysis\\n' + (ok ? 'complete input' : 'incomplete input'));
      });
    `;
    const analyst = new CommandFailureAnalyst({ command: nodeScript(script), timeoutMs: 10_000 }, tmpdir());

    const analysis = await analyst.analyze({ problem: problem('p1'), hint: null, attempt: ATTEMPT });

    expect(analysis.analysis).toBe('complete input');
  });

  it('throws when the command fails', async () => {
    const command = nodeScript('process.exit(1)');
    const analyst = new CommandFailureAnalyst({ command, timeoutMs: 10_000 }, tmpdir());

    await expect(analyst.analyze({ problem: problem('p1'), hint: null, attempt: ATTEMPT })).rejects.toThrow(
      `Failure analysis with ${formatCommandLine(command)} failed with exit code 1`,
    );
  });

  it('throws when the command times out', async () => {
    const command = nodeScript('setTimeout(() => {}, 10000)');
    const analyst = new CommandFailureAnalyst({ command, timeoutMs: 100 }, tmpdir());

    await expect(analyst.analyze({ problem: problem('p1'), hint: null, attempt: ATTEMPT })).rejects.toThrow(
      `Failure analysis with ${formatCommandLine(command)} did not complete (timed_out)`,
    );
  });
});
