import { existsSync, readdirSync, readFileSync, statSync } from 'fs';
import { basename, extname, join, relative, resolve } from 'path';

import { ProblemLoadError } from './errors.js';
import type { ContextSnippet, Problem, ProblemFormat } from './models.js';

export const FORMAT_EXTENSIONS: Readonly<Record<string, ProblemFormat>> = {
  '.lean': 'lean',
  '.tex': 'tex',
  '.md': 'markdown',
  '.markdown': 'markdown',
  '.txt': 'text',
};

export function detectFormat(filePath: string): ProblemFormat {
  return FORMAT_EXTENSIONS[extname(filePath).toLowerCase()] ?? 'unknown';
}

/** The file name without its extension; batch entries and solution files are keyed by it. */
export function problemIdOf(filePath: string): string {
  return basename(filePath, extname(filePath));
}

export interface LoadProblemOptions {
  hint?: string;
  contextPaths?: string[];
  /** Relative paths resolve against this directory. Defaults to the process cwd. */
  baseDir?: string;
}

const readContext = (paths: string[], baseDir: string): ContextSnippet[] =>
  paths
    .map(contextPath => resolve(baseDir, contextPath))
    .filter(contextPath => existsSync(contextPath) && statSync(contextPath).isFile())
    .map(contextPath => ({
      name: relative(baseDir, contextPath) || basename(contextPath),
      content: readFileSync(contextPath, 'utf-8'),
    }));

export function loadProblemFile(filePath: string, options: LoadProblemOptions = {}): Problem {
  const baseDir = options.baseDir ?? process.cwd();
  const problemPath = resolve(baseDir, filePath);
  if (!existsSync(problemPath) || !statSync(problemPath).isFile()) {
    throw new ProblemLoadError(problemPath, `Problem file not found: ${problemPath}`);
  }

  const format = detectFormat(problemPath);
  const context = readContext(options.contextPaths ?? [], baseDir);

  return Object.freeze({
    id: problemIdOf(problemPath),
    statement: readFileSync(problemPath, 'utf-8'),
    kind: format === 'lean' ? 'formal' : 'informal',
    format,
    hint: options.hint,
    context: context.length > 0 ? Object.freeze(context) : undefined,
    sourcePath: problemPath,
  });
}

function walk(dir: string): string[] {
  const files: string[] = [];
  for (const entry of readdirSync(dir, { withFileTypes: true })) {
    const entryPath = join(dir, entry.name);
    if (entry.isDirectory()) {
      files.push(...walk(entryPath));
    } else if (entry.isFile()) {
      files.push(entryPath);
    }
  }
  return files;
}

/** Every file under `dir` with a known problem extension, sorted. A missing folder yields none. */
export function loadContextFolder(dir: string): string[] {
  if (!existsSync(dir) || !statSync(dir).isDirectory()) {
    return [];
  }
  return walk(dir)
    .filter(file => detectFormat(file) !== 'unknown')
    .sort();
}

/** Problem files directly inside `dir` with the given extension, sorted by name. */
export function listProblemFiles(dir: string, extension = '.lean'): string[] {
  if (!existsSync(dir) || !statSync(dir).isDirectory()) {
    throw new ProblemLoadError(dir, `Problem folder not found: ${dir}`);
  }
  const suffix = extension.startsWith('.') ? extension : `.${extension}`;
  return readdirSync(dir)
    .filter(name => name.toLowerCase().endsWith(suffix.toLowerCase()))
    .sort()
    .map(name => join(dir, name))
    .filter(file => statSync(file).isFile());
}

export function problemFromString(
  id: string,
  statement: string,
  format: ProblemFormat = 'text',
  hint?: string,
): Problem {
  return Object.freeze({
    id,
    statement,
    kind: format === 'lean' ? 'formal' : 'informal',
    format,
    hint,
  });
}
