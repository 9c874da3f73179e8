import { tmpdir } from 'os';

import { ProcessGenerator, extractProofText } from '../adapters/process-generator.js';
import type { GeneratorSettings } from '../config.js';
import { BUDGET, nodeScript, problem } from './helpers.js';

const settings = (overrides: Partial<GeneratorSettings> = {}): GeneratorSettings => ({
  command: [],
  timeoutMs: 60_000,
  requiredEnv: [],
  maxTokens: null,
  ...overrides,
});

const request = (overrides: { budget?: typeof BUDGET; hint?: string | null } = {}) => ({
  problem: problem('p1'),
  hint: overrides.hint ?? null,
  feedback: null,
  budget: overrides.budget ?? BUDGET,
});

describe('extractProofText', () => {
  it('unwraps the first lean block', () => {
    expect(extractProofText('Sure.\n```lean4\ntheorem a : True := trivial\n```\n```lean\nother\n```')).toBe(
      'theorem a : True := trivial',
    );
  });

  it('unwraps an untagged block', () => {
    expect(extractProofText('Here it is:\n```\ntheorem a : True := trivial\n```\nDone.')).toBe('theorem a : True := trivial');
  });

  it('keeps a bare reply as is', () => {
    expect(extractProofText('  theorem a : True := trivial\n')).toBe('theorem a : True := trivial');
  });
});

describe('ProcessGenerator', () => {
  it('returns the proof printed by the command', async () => {
    const generator = new ProcessGenerator(
      settings({ command: nodeScript('console.log("```lean\\ntheorem p1 : 1 + 1 = 2 := by norm_num\\n```")') }),
      tmpdir(),
    );

    expect(await generator.generate(request())).toEqual({
      kind: 'proof',
      proofText: 'theorem p1 : 1 + 1 = 2 := by norm_num',
    });
  });

  it('sends the prompt with the hint on stdin', async () => {
    const script = `
      let input = '';
      process.stdin.on('data', chunk => { input += chunk; });
      process.stdin.on('end', () => {
        console.log(input.includes('PROVIDED SOLUTION:\\ncompute both sides') ? 'hint received' : 'no hint');
      });
    `;
    const generator = new ProcessGenerator(settings({ command: nodeScript(script) }), tmpdir());

    expect(await generator.generate(request({ hint: 'compute both sides' }))).toEqual({
      kind: 'proof',
      proofText: 'hint received',
    });
  });

  it('fails with configuration when no command is set', async () => {
    const generator = new ProcessGenerator(settings(), tmpdir());

    expect(await generator.generate(request())).toEqual({
      kind: 'failure',
      category: 'configuration',
      message: 'No generator command configured (set generator.command in lemmaloop.yaml)',
    });
    expect(await generator.preflight()).toEqual({
      ok: false,
      message: 'No generator command configured (set generator.command in lemmaloop.yaml)',
    });
  });

  it('fails with configuration when a required variable is missing', async () => {
    const generator = new ProcessGenerator(
      settings({ command: nodeScript('console.log("x")'), requiredEnv: ['MODEL_API_KEY', 'MODEL_URL'] }),
      tmpdir(),
      { MODEL_URL: 'http://localhost:8000', MODEL_API_KEY: '  ' },
    );

    expect(await generator.generate(request())).toMatchObject({
      category: 'configuration',
      message: 'Missing required environment variable(s): MODEL_API_KEY',
    });
  });

  it('passes preflight once the command and variables are set', async () => {
    const generator = new ProcessGenerator(
      settings({ command: nodeScript('console.log("x")'), requiredEnv: ['MODEL_API_KEY'] }),
      tmpdir(),
      { MODEL_API_KEY: 'test-secret' },
    );

    expect(await generator.preflight()).toEqual({ ok: true });
  });

  it('rejects an empty statement without running the command', async () => {
    const generator = new ProcessGenerator(settings({ command: ['lemmaloop-no-such-generator'] }), tmpdir());

    expect(await generator.generate({ ...request(), problem: problem('p1', { statement: ' ' }) })).toEqual({
      kind: 'failure',
      category: 'malformed_problem',
      message: 'Problem p1 has an empty statement',
    });
  });

  it('reports a non-zero exit with the tail of stderr', async () => {
    const generator = new ProcessGenerator(
      settings({ command: nodeScript('console.error("rate limited"); process.exit(2)') }),
      tmpdir(),
    );

    expect(await generator.generate(request())).toEqual({
      kind: 'failure',
      category: 'transport',
      message: 'Generator exited with code 2: rate limited',
    });
  });

  it('reports empty output', async () => {
    const generator = new ProcessGenerator(settings({ command: nodeScript('console.log("   ")') }), tmpdir());

    expect(await generator.generate(request())).toEqual({
      kind: 'failure',
      category: 'empty_output',
      message: 'Generator returned no proof text',
    });
  });

  it('times out against the generation budget', async () => {
    const generator = new ProcessGenerator(settings({ command: nodeScript('setTimeout(() => {}, 10000)') }), tmpdir());

    expect(await generator.generate(request({ budget: { timeoutMs: 100, maxTokens: null } }))).toEqual({
      kind: 'failure',
      category: 'transport',
      message: 'Generator timed out after 0.1s',
    });
  });

  it('reports a command that cannot be started as configuration', async () => {
    const generator = new ProcessGenerator(settings({ command: ['lemmaloop-no-such-generator'] }), tmpdir());

    const result = await generator.generate(request());

    expect(result.kind).toBe('failure');
    if (result.kind === 'failure') {
      expect(result.category).toBe('configuration');
      expect(result.message).toMatch(/^Could not start generator lemmaloop-no-such-generator: /);
    }
  });

  it('stops when aborted', async () => {
    const controller = new AbortController();
    const generator = new ProcessGenerator(settings({ command: nodeScript('setTimeout(() => {}, 10000)') }), tmpdir());

    const pending = generator.generate(request(), controller.signal);
    setTimeout(() => controller.abort(), 50);

    expect(await pending).toEqual({ kind: 'failure', category: 'transport', message: 'Generator run was aborted' });
  });
});
