// packages/engines/src/codeql.ts
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import {
  ToolUnavailableError,
  expectExit,
  sourceFiles,
  withScratchDir,
  type Finding,
  type Language,
  type ProcessResult,
} from '@sastweave/core';
import {
  BinaryLocator,
  probeVersion,
  readReport,
  remaining,
  type EngineAdapter,
  type EngineContext,
  type ParseContext,
} from './adapter.js';
import { executeCompilePlan, planJavaCompile, planNativeCompile, type CompilePlan } from './compile.js';
import { SARIF_LEVELS, parseSarifFindings } from './sarif-input.js';

/** CodeQL extractor per language; C and C++ share the cpp extractor. */
const EXTRACTOR: Readonly<Record<Language, string>> = {
  c: 'cpp',
  cpp: 'cpp',
  java: 'java',
  python: 'python',
  javascript: 'javascript',
};

const TRACED = new Set(['cpp', 'java']);

export class CodeQlAdapter implements EngineAdapter {
  readonly engineId = 'codeql';
  readonly displayName = 'CodeQL';
  readonly tool = { name: 'CodeQL', informationUri: 'https://codeql.github.com' };
  readonly installHint = 'Install the CodeQL CLI bundle and put `codeql` on PATH (or unpack it to /opt/codeql).';
  readonly languages: readonly Language[] = ['c', 'cpp', 'java', 'python', 'javascript'];
  readonly scope = 'language';
  readonly severityMap = SARIF_LEVELS;

  private readonly locator = new BinaryLocator('codeql', ['/opt/codeql', path.join(os.homedir(), 'codeql')]);

  unitKey(language: Language): string {
    return EXTRACTOR[language];
  }

  async isAvailable(ctx: EngineContext) {
    return Boolean(await this.locator.resolve(ctx));
  }

  async version(ctx: EngineContext) {
    const bin = await this.locator.resolve(ctx);
    if (!bin) return 'unavailable';
    return probeVersion(ctx, [bin, 'version', '--format=terse']);
  }

  private compilePlan(ctx: EngineContext, extractor: string, scratch: string): CompilePlan {
    if (extractor === 'java') {
      return planJavaCompile(ctx.projectRoot, sourceFiles(ctx.projectRoot, ['java']), path.join(scratch, 'classes'));
    }
    return planNativeCompile(ctx.projectRoot, sourceFiles(ctx.projectRoot, ['c', 'cpp']), path.join(scratch, 'obj'));
  }

  async invoke(ctx: EngineContext, languages: readonly Language[], timeoutMs: number): Promise<string> {
    const bin = await this.locator.resolve(ctx);
    if (!bin) throw new ToolUnavailableError('codeql', this.installHint);

    const extractor = EXTRACTOR[languages[0] ?? 'javascript'];
    const deadline = Date.now() + timeoutMs;
    const run = (args: string[]): Promise<ProcessResult> =>
      ctx.exec([bin, ...args], { cwd: ctx.projectRoot, timeoutMs: remaining(deadline), signal: ctx.signal });

    return withScratchDir(`codeql-${extractor}`, async (scratch) => {
      const db = path.join(scratch, 'db');
      const sarif = path.join(scratch, 'results.sarif');

      if (TRACED.has(extractor)) {
        // init -> trace each compile unit -> finalize; a failing unit only loses its own sources
        expectExit(
          'codeql',
          await run(['database', 'init', `--language=${extractor}`, `--source-root=${ctx.projectRoot}`, '--overwrite', db])
        );
        const plan = this.compilePlan(ctx, extractor, scratch);
        await fs.promises.mkdir(plan.outputDir, { recursive: true });
        await executeCompilePlan(plan, (argv) => run(['database', 'trace-command', '--', db, ...argv]));
        expectExit('codeql', await run(['database', 'finalize', '--threads=0', db]));
      } else {
        expectExit(
          'codeql',
          await run([
            'database',
            'create',
            db,
            `--language=${extractor}`,
            `--source-root=${ctx.projectRoot}`,
            '--threads=0',
            '--overwrite',
          ])
        );
      }

      expectExit(
        'codeql',
        await run([
          'database',
          'analyze',
          db,
          '--format=sarif-latest',
          `--sarif-category=${extractor}`,
          `--output=${sarif}`,
          '--threads=0',
          `codeql/${extractor}-queries:codeql-suites/${extractor}-security-and-quality.qls`,
        ])
      );

      return readReport('codeql', sarif);
    });
  }

  parse(raw: string, ctx: ParseContext): Finding[] {
    return parseSarifFindings(raw, ctx, { label: ctx.unitId, severityMap: this.severityMap });
  }
}
