import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';

import { ProblemLoadError } from '../errors.js';
import {
  detectFormat,
  listProblemFiles,
  loadContextFolder,
  loadProblemFile,
  problemFromString,
  problemIdOf,
} from '../problem-loader.js';

describe('problem loader', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'lemmaloop-problems-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('detects formats from extensions', () => {
    expect(detectFormat('a/b.lean')).toBe('lean');
    expect(detectFormat('notes.TEX')).toBe('tex');
    expect(detectFormat('README.md')).toBe('markdown');
    expect(detectFormat('problem.txt')).toBe('text');
    expect(detectFormat('data.json')).toBe('unknown');
    expect(problemIdOf('/x/mathd_algebra_1.lean')).toBe('mathd_algebra_1');
  });

  it('loads a Lean problem as a formal statement', () => {
    writeFileSync(join(dir, 'two.lean'), 'theorem two : 1 + 1 = 2 := by sorry\n');

    const loaded = loadProblemFile('two.lean', { baseDir: dir, hint: 'compute' });

    expect(loaded).toEqual({
      id: 'two',
      statement: 'theorem two : 1 + 1 = 2 := by sorry\n',
      kind: 'formal',
      format: 'lean',
      hint: 'compute',
      context: undefined,
      sourcePath: join(dir, 'two.lean'),
    });
    expect(Object.isFrozen(loaded)).toBe(true);
  });

  it('loads other formats as informal problems with context', () => {
    writeFileSync(join(dir, 'sum.md'), 'Show that the sum of two odd numbers is even.');
    mkdirSync(join(dir, 'ctx'));
    writeFileSync(join(dir, 'ctx', 'defs.lean'), 'def odd (n : Nat) := n % 2 = 1');

    const loaded = loadProblemFile(join(dir, 'sum.md'), {
      baseDir: dir,
      contextPaths: [join('ctx', 'defs.lean'), 'ctx/missing.lean'],
    });

    expect(loaded.kind).toBe('informal');
    expect(loaded.format).toBe('markdown');
    expect(loaded.context).toEqual([{ name: join('ctx', 'defs.lean'), content: 'def odd (n : Nat) := n % 2 = 1' }]);
  });

  it('fails for a missing problem file', () => {
    expect(() => loadProblemFile('absent.lean', { baseDir: dir })).toThrow(ProblemLoadError);
    expect(() => loadProblemFile('absent.lean', { baseDir: dir })).toThrow(
      `Problem file not found: ${join(dir, 'absent.lean')}`,
    );
  });

  it('collects known files from a context folder recursively', () => {
    mkdirSync(join(dir, 'nested'));
    writeFileSync(join(dir, 'b.lean'), '');
    writeFileSync(join(dir, 'a.tex'), '');
    writeFileSync(join(dir, 'nested', 'c.md'), '');
    writeFileSync(join(dir, 'skip.bin'), '');

    expect(loadContextFolder(dir)).toEqual([
      join(dir, 'a.tex'),
      join(dir, 'b.lean'),
      join(dir, 'nested', 'c.md'),
    ]);
    expect(loadContextFolder(join(dir, 'none'))).toEqual([]);
  });

  it('lists problem files by extension in name order', () => {
    writeFileSync(join(dir, 'p2.lean'), '');
    writeFileSync(join(dir, 'p1.lean'), '');
    writeFileSync(join(dir, 'notes.md'), '');
    mkdirSync(join(dir, 'dir.lean'));

    expect(listProblemFiles(dir)).toEqual([join(dir, 'p1.lean'), join(dir, 'p2.lean')]);
    expect(listProblemFiles(dir, 'md')).toEqual([join(dir, 'notes.md')]);
    expect(() => listProblemFiles(join(dir, 'none'))).toThrow(`Problem folder not found: ${join(dir, 'none')}`);
  });

  it('builds a problem from a string', () => {
    expect(problemFromString('q', 'Prove that 2 is prime.')).toEqual({
      id: 'q',
      statement: 'Prove that 2 is prime.',
      kind: 'informal',
      format: 'text',
      hint: undefined,
    });
    expect(problemFromString('f', 'theorem f : True', 'lean').kind).toBe('formal');
  });
});
