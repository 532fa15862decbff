import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, describe, expect, test } from 'vitest';
import {
  LANGUAGES,
  LANGUAGE_EXTENSIONS,
  attachReachability,
  attachVerdict,
  createFinding,
  detectLanguages,
  expectExit,
  languageForPath,
  leavesBase,
  normalizeFindingPath,
  normalizeSeverity,
  runPool,
  sourceFiles,
  withScratchDir,
  withTimeout,
  ToolExecutionError,
  type Finding,
  type SeverityTable,
} from './index.js';

const tmpDirs: string[] = [];

function mkProject(files: Record<string, string>): string {
  const root = fs.mkdtempSync(path.join(os.tmpdir(), 'sastweave-core-'));
  tmpDirs.push(root);
  for (const [rel, content] of Object.entries(files)) {
    const full = path.join(root, rel);
    fs.mkdirSync(path.dirname(full), { recursive: true });
    fs.writeFileSync(full, content);
  }
  return root;
}

afterEach(() => {
  for (const dir of tmpDirs.splice(0)) fs.rmSync(dir, { recursive: true, force: true });
});

function mkFinding(overrides: Partial<Parameters<typeof createFinding>[0]> = {}): Finding {
  return createFinding({
    findingId: 'semgrep-1',
    filePath: 'app/src/main.c',
    line: 10,
    column: 5,
    ruleId: 'c.lang.security.strcpy',
    message: 'strcpy into fixed buffer',
    severity: 'error',
    tool: { name: 'Semgrep' },
    ...overrides,
  });
}

describe('language detector', () => {
  test.each(LANGUAGES.map((lang) => [lang]))('a tree with only %s sources yields exactly that language', (lang) => {
    const files: Record<string, string> = {};
    LANGUAGE_EXTENSIONS[lang].forEach((ext, i) => {
      files[`src/nested/file${i}${ext}`] = '// sample\n';
    });
    const root = mkProject(files);
    expect(detectLanguages(root)).toEqual([lang]);
  });

  test('empty and unsupported trees yield no languages', () => {
    expect(detectLanguages(mkProject({}))).toEqual([]);
    expect(detectLanguages(mkProject({ 'README.md': '# hi', 'build.rs': 'fn main() {}' }))).toEqual([]);
  });

  test('mixed trees are reported in canonical order and skip vendored directories', () => {
    const root = mkProject({
      'web/app.tsx': 'export {}',
      'lib/util.py': 'x = 1',
      'native/a.c': 'int main(void) { return 0; }',
      'node_modules/dep/Main.java': 'class Main {}',
    });
    expect(detectLanguages(root)).toEqual(['c', 'python', 'javascript']);
  });

  test('sourceFiles lists only the requested languages, sorted', () => {
    const root = mkProject({ 'b.c': '', 'a.cpp': '', 'x.py': '', 'inc/h.h': '' });
    expect(sourceFiles(root, ['c']).map((f) => path.relative(root, f))).toEqual(['b.c', path.join('inc', 'h.h')]);
  });

  test('languageForPath is case-insensitive on the extension', () => {
    expect(languageForPath('Main.JAVA')).toBe('java');
    expect(languageForPath('kernel.h++')).toBe('cpp');
    expect(languageForPath('Makefile')).toBeUndefined();
  });
});

describe('severity normalization', () => {
  const table: SeverityTable = { high: 'error', medium: 'warning', low: 'note' };

  test('maps known labels case-insensitively', () => {
    expect(normalizeSeverity('HIGH', table)).toBe('error');
    expect(normalizeSeverity(' Medium ', table)).toBe('warning');
    expect(normalizeSeverity('low', table)).toBe('note');
  });

  test('unknown or missing labels become warning', () => {
    expect(normalizeSeverity('catastrophic', table)).toBe('warning');
    expect(normalizeSeverity(undefined, table)).toBe('warning');
    expect(normalizeSeverity('constructor', table)).toBe('warning');
  });
});

describe('finding paths', () => {
  const root = path.resolve('/work/proj');

  test('relative tool paths are resolved against the project root and expressed from its parent', () => {
    expect(normalizeFindingPath('src/main.c', root)).toBe('proj/src/main.c');
  });

  test('absolute paths inside the project are made relative to its parent', () => {
    expect(normalizeFindingPath(path.join(root, 'pkg', 'mod.py'), root)).toBe('proj/pkg/mod.py');
    expect(normalizeFindingPath(`file://${root}/pkg/mod.py`, root)).toBe('proj/pkg/mod.py');
  });

  test('paths outside the parent directory keep their absolute form', () => {
    const outside = path.resolve('/elsewhere/lib/vendor.c');
    expect(normalizeFindingPath(outside, root)).toBe(outside.replace(/\\/g, '/'));
  });

  test('a sibling directory whose name starts with two dots is still inside the parent', () => {
    expect(normalizeFindingPath(path.resolve('/work/..cache/a.c'), root)).toBe('..cache/a.c');
    expect(normalizeFindingPath('..hidden/b.c', root)).toBe('proj/..hidden/b.c');
  });

  test('leavesBase', () => {
    expect(leavesBase('..')).toBe(true);
    expect(leavesBase(path.join('..', 'x.c'))).toBe(true);
    expect(leavesBase('../x.c')).toBe(true);
    expect(leavesBase('..cache/x.c')).toBe(false);
    expect(leavesBase('src/..x')).toBe(false);
  });
});

describe('finding model', () => {
  test('rule name defaults to the rule id and positions are clamped to 1', () => {
    const f = mkFinding({ line: 0, column: undefined, ruleName: '  ' });
    expect(f.ruleName).toBe('c.lang.security.strcpy');
    expect(f.line).toBe(1);
    expect(f.column).toBe(1);
    expect(Object.isFrozen(f)).toBe(true);
  });

  test('an empty rule id is rejected', () => {
    expect(() => mkFinding({ ruleId: ' ' })).toThrow(/empty rule id/);
  });

  test('enrichment returns new findings and happens at most once per kind', () => {
    const base = mkFinding();
    const withEvidence = attachReachability(base, { reachable: true, callStack: ['main', 'copy'], dataFlow: [] });
    const verified = attachVerdict(withEvidence, { isValid: true, confidence: 0.9, explanation: 'real' });

    expect(base.reachability).toBeUndefined();
    expect(verified.reachability?.callStack).toEqual(['main', 'copy']);
    expect(verified.verdict?.confidence).toBe(0.9);
    expect(() => attachReachability(verified, { reachable: false, callStack: [], dataFlow: [] })).toThrow();
    expect(() => attachVerdict(verified, { isValid: false, confidence: 0, explanation: 'again' })).toThrow();
  });
});

describe('worker pool', () => {
  test('keeps input order and never exceeds the concurrency bound', async () => {
    let inFlight = 0;
    let peak = 0;
    const slots = new Set<number>();

    const out = await runPool([30, 5, 20, 1, 10], 2, async (ms, slot) => {
      inFlight += 1;
      peak = Math.max(peak, inFlight);
      slots.add(slot);
      await new Promise((r) => setTimeout(r, ms));
      inFlight -= 1;
      return ms * 2;
    });

    expect(out).toEqual([60, 10, 40, 2, 20]);
    expect(peak).toBe(2);
    expect([...slots].sort()).toEqual([0, 1]);
  });

  test('an aborted signal stops the pool', async () => {
    const controller = new AbortController();
    controller.abort();
    await expect(runPool([1, 2], 1, async (n) => n, controller.signal)).rejects.toThrow(/cancelled/);
  });

  test('withTimeout rejects with the supplied error', async () => {
    await expect(withTimeout(new Promise(() => undefined), 10, new Error('slow oracle'))).rejects.toThrow('slow oracle');
  });
});

describe('process helpers', () => {
  test('expectExit accepts listed codes and reports timeouts', () => {
    expect(expectExit('bandit', { code: 1, stdout: '{}', stderr: '', timedOut: false }, [0, 1]).stdout).toBe('{}');
    expect(() => expectExit('bandit', { code: 2, stdout: '', stderr: 'boom', timedOut: false }, [0, 1])).toThrow(
      'bandit: exited with code 2: boom'
    );

    let caught: unknown;
    try {
      expectExit('joern', { code: 137, stdout: '', stderr: '', timedOut: true });
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(ToolExecutionError);
    expect(caught instanceof ToolExecutionError && caught.timedOut).toBe(true);
  });

  test('scratch directories are removed even when the body throws', async () => {
    let seen = '';
    await expect(
      withScratchDir('test', async (dir) => {
        seen = dir;
        fs.writeFileSync(path.join(dir, 'a.o'), 'obj');
        throw new Error('compile failed');
      })
    ).rejects.toThrow('compile failed');
    expect(seen).not.toBe('');
    expect(fs.existsSync(seen)).toBe(false);
  });
});
