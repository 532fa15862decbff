// packages/core/src/languages.ts
import fs from 'node:fs';
import path from 'node:path';
import { errorMessage } from './errors.js';
import { Logger } from './logger.js';

export const LANGUAGES = ['c', 'cpp', 'java', 'python', 'javascript'] as const;
export type Language = (typeof LANGUAGES)[number];

export function isLanguage(v: string): v is Language {
  return (LANGUAGES as readonly string[]).includes(v);
}

/** Extension table. TypeScript sources count as javascript. */
export const LANGUAGE_EXTENSIONS: Readonly<Record<Language, readonly string[]>> = {
  c: ['.c', '.h'],
  cpp: ['.cpp', '.cc', '.cxx', '.hpp', '.hxx', '.h++'],
  java: ['.java'],
  python: ['.py'],
  javascript: ['.js', '.jsx', '.ts', '.tsx'],
};

const EXTENSION_TO_LANGUAGE: ReadonlyMap<string, Language> = new Map(
  LANGUAGES.flatMap((lang) => LANGUAGE_EXTENSIONS[lang].map((ext) => [ext, lang] as const))
);

const SKIP_DIRS = new Set([
  '.git',
  '.hg',
  '.svn',
  'node_modules',
  '.venv',
  'venv',
  '__pycache__',
  '.tox',
  '.mypy_cache',
  '.pytest_cache',
]);

export function languageForPath(filePath: string): Language | undefined {
  return EXTENSION_TO_LANGUAGE.get(path.extname(filePath).toLowerCase());
}

/**
 * Walks the tree and yields every regular file (absolute path).
 * Symlinks are not followed; unreadable directories are skipped.
 */
export function* walkFiles(root: string): Generator<string> {
  const stack = [path.resolve(root)];
  while (stack.length > 0) {
    const dir = stack.pop();
    if (dir === undefined) break;

    let entries: fs.Dirent[];
    try {
      entries = fs.readdirSync(dir, { withFileTypes: true });
    } catch (error) {
      Logger.debug(`skipping unreadable directory ${dir}: ${errorMessage(error)}`);
      continue;
    }

    entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
    for (const entry of entries) {
      const full = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        if (!SKIP_DIRS.has(entry.name)) stack.push(full);
      } else if (entry.isFile()) {
        yield full;
      }
    }
  }
}

/** Languages present under `root`, in LANGUAGES order. */
export function detectLanguages(root: string): Language[] {
  const found = new Set<Language>();
  for (const file of walkFiles(root)) {
    const lang = languageForPath(file);
    if (lang) found.add(lang);
    if (found.size === LANGUAGES.length) break;
  }

  const languages = LANGUAGES.filter((lang) => found.has(lang));
  if (languages.length === 0) {
    Logger.warn(`no supported source files found under ${root}`);
  }
  return languages;
}

/** Absolute paths of the sources for the given languages, sorted. */
export function sourceFiles(root: string, languages: readonly Language[]): string[] {
  const wanted = new Set(languages);
  const out: string[] = [];
  for (const file of walkFiles(root)) {
    const lang = languageForPath(file);
    if (lang && wanted.has(lang)) out.push(file);
  }
  return out.sort();
}
