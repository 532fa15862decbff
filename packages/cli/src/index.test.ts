// packages/cli/src/index.test.ts
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, describe, expect, test, vi } from 'vitest';
import {
  CancelledError,
  ConfigError,
  FatalIOError,
  resolveAnalyzerConfig,
  type BinaryResolver,
  type ConfigLayer,
  type ProcessRunner,
} from '@sastweave/core';
import type { ContainerSession, ReachabilityOracle } from '@sastweave/reachability';
import type { VerificationOracle } from '@sastweave/verify';
import { getHelpText, parseArgs, resolveConfig, runPipeline, summarizeFindings } from './index.js';

const tmpDirs: string[] = [];

afterEach(() => {
  for (const dir of tmpDirs.splice(0)) fs.rmSync(dir, { recursive: true, force: true });
});

function mkTmp(): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'sastweave-cli-'));
  tmpDirs.push(dir);
  return dir;
}

const VULN_C = [
  '#include <string.h>',
  '#include <stdio.h>',
  '',
  'void copy(const char *input);',
  '',
  'int main(int argc, char **argv) {',
  '  if (argc > 1) copy(argv[1]);',
  '  return 0;',
  '}',
  'void copy(const char *input) { char buf[16]; strcpy(buf, input); }',
  '',
].join('\n');

const STRCPY_RULE = 'c.lang.security.insecure-use-strcpy-fn.insecure-use-strcpy-fn';

const SEMGREP_SARIF = JSON.stringify({
  version: '2.1.0',
  runs: [
    {
      tool: {
        driver: {
          name: 'Semgrep OSS',
          semanticVersion: '1.70.0',
          rules: [
            {
              id: STRCPY_RULE,
              shortDescription: { text: 'strcpy buffer overflow' },
              properties: { 'security-severity': '7.5' },
            },
          ],
        },
      },
      results: [
        {
          ruleId: STRCPY_RULE,
          level: 'warning',
          message: { text: 'strcpy does not bound the copy; possible buffer overflow' },
          locations: [{ physicalLocation: { artifactLocation: { uri: 'src/vuln.c' }, region: { startLine: 10, startColumn: 46 } } }],
        },
      ],
    },
  ],
});

/** A project with one C file (line 10 calls strcpy) and one Python file. */
function mkProject(): { root: string; outDir: string } {
  const tmp = mkTmp();
  const root = path.join(tmp, 'proj');
  fs.mkdirSync(path.join(root, 'src'), { recursive: true });
  fs.mkdirSync(path.join(root, 'scripts'));
  fs.writeFileSync(path.join(root, 'src', 'vuln.c'), VULN_C);
  fs.writeFileSync(path.join(root, 'scripts', 'run.py'), 'import os\nos.system("ls")\n');
  return { root, outDir: path.join(tmp, 'out') };
}

/** Only semgrep is installed. */
function semgrepOnly() {
  const calls: string[][] = [];
  const which: BinaryResolver = async (name) => (name === 'semgrep' ? '/opt/bin/semgrep' : undefined);
  const exec: ProcessRunner = async (argv) => {
    calls.push([...argv]);
    if (argv[1] === '--version') return { code: 0, stdout: '1.70.0\n', stderr: '', timedOut: false };
    if (argv[1] === 'scan') return { code: 1, stdout: SEMGREP_SARIF, stderr: '', timedOut: false };
    throw new Error(`unexpected command: ${argv.join(' ')}`);
  };
  return { which, exec, calls };
}

function config(outDir: string, layer: ConfigLayer = {}) {
  return resolveAnalyzerConfig([{ outDir, concurrency: 2 }, layer]);
}

function readJson(file: string): unknown {
  return JSON.parse(fs.readFileSync(file, 'utf8'));
}

describe('parseArgs', () => {
  test('scan with flags, inline values and a repeatable option', () => {
    const parsed = parseArgs([
      'scan',
      './proj',
      '--enable-llm',
      '--disable-tool',
      'joern',
      '--disable-tool=bandit',
      '--timeout-codeql',
      '3600',
    ]);
    expect(parsed).toEqual({
      command: 'scan',
      scanPath: './proj',
      opts: { 'enable-llm': true, 'disable-tool': ['joern', 'bandit'], 'timeout-codeql': '3600' },
    });
  });

  test('help and list-engines', () => {
    expect(parseArgs(['--help'])).toMatchObject({ showHelp: true, helpTarget: 'general' });
    expect(parseArgs(['scan', '--help'])).toMatchObject({ showHelp: true, helpTarget: 'scan', scanPath: undefined });
    expect(parseArgs(['--', '--list-engines'])).toMatchObject({ command: 'list-engines', opts: { 'list-engines': true } });
    expect(getHelpText('scan')).toContain('--disable-tool <id>');
  });

  test('bad command lines are configuration errors', () => {
    expect(() => parseArgs(['lint', 'x'])).toThrow(ConfigError);
    expect(() => parseArgs(['scan'])).toThrow('Usage: sastweave scan <path> [options]');
    expect(() => parseArgs(['scan', 'p', '--bogus'])).toThrow(/unknown option --bogus/);
    expect(() => parseArgs(['scan', 'p', '--llm-url'])).toThrow('--llm-url needs a value');
    expect(() => parseArgs(['scan', 'p', 'stray'])).toThrow(/unexpected argument "stray"/);
  });
});

describe('resolveConfig', () => {
  test('settings file < environment < command line', () => {
    const cwd = mkTmp();
    fs.writeFileSync(
      path.join(cwd, 'sastweave.yml'),
      ['concurrency: 2', 'llm:', '  enabled: true', '  model: file-model', 'tools:', '  semgrep:', '    timeout: 60', ''].join('\n')
    );
    const { opts } = parseArgs(['scan', 'p', '--llm-model', 'cli-model', '--tools', 'semgrep,bandit']);

    const cfg = resolveConfig(opts, { SASTWEAVE_LLM_MODEL: 'env-model', SASTWEAVE_CONCURRENCY: '3' }, cwd);

    expect(cfg.llm.model).toBe('cli-model');
    expect(cfg.llm.enabled).toBe(true);
    expect(cfg.concurrency).toBe(3);
    expect(cfg.tools.semgrep).toEqual({ enabled: true, timeoutSec: 60 });
    expect(cfg.tools.bandit.enabled).toBe(true);
    expect(cfg.tools.codeql.enabled).toBe(false);
    expect(Object.isFrozen(cfg.tools.semgrep)).toBe(true);
  });

  test('disable-tool wins over --tools; per-tool timeouts apply', () => {
    const { opts } = parseArgs(['scan', 'p', '--tools', 'semgrep', '--disable-tool', 'semgrep', '--timeout-bandit=30']);
    const cfg = resolveConfig(opts, {}, mkTmp());
    expect(cfg.tools.semgrep.enabled).toBe(false);
    expect(cfg.tools.bandit).toEqual({ enabled: false, timeoutSec: 30 });
  });

  test('invalid values are rejected', () => {
    const cwd = mkTmp();
    expect(() => resolveConfig(parseArgs(['scan', 'p', '--tools', 'semgrep,eslint']).opts, {}, cwd)).toThrow(
      /unknown tool "eslint"/
    );
    expect(() => resolveConfig(parseArgs(['scan', 'p', '--concurrency', '0']).opts, {}, cwd)).toThrow(ConfigError);
    expect(() => resolveConfig(parseArgs(['scan', 'p', '--config', 'missing.yml']).opts, {}, cwd)).toThrow(
      /config file not found/
    );
  });
});

describe('runPipeline', () => {
  test('strcpy at line 10 comes out of the pattern tool; missing tools are skipped', async () => {
    const { root, outDir } = mkProject();
    const { which, exec, calls } = semgrepOnly();

    const result = await runPipeline(root, config(outDir), { exec, which });

    expect(result.languages).toEqual(['c', 'python']);
    expect(result.findings).toHaveLength(1);
    expect(result.findings[0]).toMatchObject({
      ruleId: STRCPY_RULE,
      line: 10,
      severity: 'error',
      filePath: 'proj/src/vuln.c',
      tool: { name: 'Semgrep', version: '1.70.0' },
    });

    const statuses = Object.fromEntries(result.dispatch.map((r) => [r.engineId, r.meta.status]));
    expect(statuses).toEqual({ codeql: 'skipped', joern: 'skipped', bandit: 'skipped', semgrep: 'ok' });
    expect(result.dispatch.find((r) => r.engineId === 'bandit')?.meta.installHint).toBe('pip install bandit');

    const scan = calls.find((argv) => argv[1] === 'scan');
    expect(scan).toContain('--include=*.c');
    expect(scan).toContain('--include=*.py');

    expect(result.written.map((f) => path.basename(f))).toEqual(['semgrep.sarif', 'merged.sarif']);
    const semgrepUnits = result.dispatch.filter((r) => r.engineId === 'semgrep').map((r) => r.unitId).sort();
    expect(result.bundle.merged.runs[0].invocations?.map((i) => [i.properties.unitId, i.executionSuccessful])).toEqual(
      semgrepUnits.map((unitId) => [unitId, true])
    );
    expect(readJson(path.join(outDir, 'merged.sarif'))).toMatchObject({
      version: '2.1.0',
      runs: [
        {
          tool: { driver: { name: 'Semgrep', version: '1.70.0' } },
          results: [
            {
              ruleId: STRCPY_RULE,
              level: 'error',
              locations: [
                {
                  physicalLocation: {
                    artifactLocation: { uri: 'proj/src/vuln.c' },
                    region: { startLine: 10, startColumn: 46 },
                  },
                },
              ],
            },
          ],
        },
      ],
    });
    expect(summarizeFindings(result.findings)).toBe('findings=1 error=1 warning=0 note=0');
  });

  test('an unparsable verification reply gives a negative verdict and reports are still written', async () => {
    const { root, outDir } = mkProject();
    const complete = vi.fn(async () => 'Looks exploitable to me!');
    const oracle: VerificationOracle = { name: 'stub', complete };

    const result = await runPipeline(root, config(outDir, { llm: { enabled: true } }), {
      ...semgrepOnly(),
      verificationOracle: oracle,
    });

    expect(complete).toHaveBeenCalledTimes(1);
    expect(result.findings[0].verdict).toEqual({
      isValid: false,
      confidence: 0,
      explanation: 'Error during verification: response is not JSON',
    });
    expect(result.written).toHaveLength(2);

    const [sarifResult] = result.bundle.merged.runs[0].results;
    expect(sarifResult.fixes).toBeUndefined();
    expect(sarifResult.properties?.verification).toMatchObject({ isValid: false, confidence: 0 });
  });

  test('reachability evidence lands in the report and containers are removed', async () => {
    const { root, outDir } = mkProject();
    const dispose = vi.fn(async () => undefined);
    const session: ContainerSession = {
      id: 'c1',
      image: 'stub-image',
      removed: false,
      exec: async () => ({ code: 0, stdout: '', stderr: '', timedOut: false }),
      dispose,
    };
    const oracle: ReachabilityOracle = {
      name: 'stub',
      languages: ['c'],
      image: 'stub-image',
      evaluate: async () => ({ reachable: true, callStack: ['main (src/vuln.c:6)', 'copy (src/vuln.c:10)'], dataFlow: ['main -> copy'] }),
    };

    const result = await runPipeline(root, config(outDir, { reachability: { enabled: true } }), {
      ...semgrepOnly(),
      sessions: async () => session,
      reachabilityOracles: [oracle],
    });

    expect(result.findings[0].reachability?.reachable).toBe(true);
    expect(result.bundle.merged.runs[0].results[0].properties?.reachability).toEqual({
      reachable: true,
      callStack: ['main (src/vuln.c:6)', 'copy (src/vuln.c:10)'],
      dataFlow: ['main -> copy'],
    });
    expect(dispose).toHaveBeenCalledTimes(1);
  });

  test('no tool installed: empty reports, still written', async () => {
    const { root, outDir } = mkProject();
    const exec: ProcessRunner = async () => {
      throw new Error('nothing should run');
    };
    const result = await runPipeline(root, config(outDir), { exec, which: async () => undefined });

    expect(result.findings).toEqual([]);
    expect(result.written.map((f) => path.basename(f))).toEqual(['merged.sarif']);
    expect(readJson(path.join(outDir, 'merged.sarif'))).toEqual({
      $schema: 'https://json.schemastore.org/sarif-2.1.0.json',
      version: '2.1.0',
      runs: [],
    });
  });

  test('an unwritable output directory is fatal', async () => {
    const { root } = mkProject();
    const blocker = path.join(mkTmp(), 'file');
    fs.writeFileSync(blocker, 'x');

    await expect(runPipeline(root, config(path.join(blocker, 'out')), semgrepOnly())).rejects.toBeInstanceOf(FatalIOError);
  });

  test('a missing project is fatal', async () => {
    const tmp = mkTmp();
    await expect(runPipeline(path.join(tmp, 'nope'), config(path.join(tmp, 'out')), semgrepOnly())).rejects.toBeInstanceOf(
      FatalIOError
    );
  });

  test('cancellation stops the run before any report is written', async () => {
    const { root, outDir } = mkProject();
    const controller = new AbortController();
    controller.abort();

    await expect(runPipeline(root, config(outDir), { ...semgrepOnly(), signal: controller.signal })).rejects.toBeInstanceOf(
      CancelledError
    );
    expect(fs.existsSync(outDir)).toBe(false);
  });
});
