// packages/engines/src/spotbugs.ts
import fs from 'node:fs';
import path from 'node:path';
import {
  Logger,
  ToolExecutionError,
  ToolUnavailableError,
  sourceFiles,
  withScratchDir,
  type Finding,
  type Language,
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
import { executeCompilePlan, planJavaCompile } from './compile.js';
import { SARIF_LEVELS, parseSarifFindings } from './sarif-input.js';

function spotbugsDirs(): string[] {
  const home = process.env.SPOTBUGS_HOME;
  return [...(home ? [path.join(home, 'bin')] : []), '/opt/spotbugs/bin'];
}

export class SpotBugsAdapter implements EngineAdapter {
  readonly engineId = 'spotbugs';
  readonly displayName = 'SpotBugs';
  readonly tool = { name: 'SpotBugs', informationUri: 'https://spotbugs.github.io' };
  readonly installHint = 'Install SpotBugs and put `spotbugs` on PATH (or set SPOTBUGS_HOME); `javac` is needed too.';
  readonly languages: readonly Language[] = ['java'];
  readonly scope = 'project';
  readonly severityMap = SARIF_LEVELS;

  private readonly locator = new BinaryLocator('spotbugs', spotbugsDirs());

  async isAvailable(ctx: EngineContext) {
    return Boolean(await this.locator.resolve(ctx));
  }

  async version(ctx: EngineContext) {
    const bin = await this.locator.resolve(ctx);
    if (!bin) return 'unavailable';
    return probeVersion(ctx, [bin, '-textui', '-version']);
  }

  async invoke(ctx: EngineContext, _languages: readonly Language[], timeoutMs: number): Promise<string> {
    const bin = await this.locator.resolve(ctx);
    if (!bin) throw new ToolUnavailableError('spotbugs', this.installHint);

    const deadline = Date.now() + timeoutMs;

    return withScratchDir('spotbugs', async (scratch) => {
      const classes = path.join(scratch, 'classes');
      await fs.promises.mkdir(classes, { recursive: true });

      const plan = planJavaCompile(ctx.projectRoot, sourceFiles(ctx.projectRoot, ['java']), classes);
      await executeCompilePlan(plan, (argv) =>
        ctx.exec(argv, { cwd: ctx.projectRoot, timeoutMs: remaining(deadline), signal: ctx.signal })
      );

      const report = path.join(scratch, 'spotbugs.sarif');
      const result = await ctx.exec(
        [bin, '-textui', '-quiet', '-sarif', '-output', report, '-sourcepath', ctx.projectRoot, classes],
        { cwd: ctx.projectRoot, timeoutMs: remaining(deadline), signal: ctx.signal }
      );
      if (result.timedOut) throw new ToolExecutionError('spotbugs', 'timed out', { timedOut: true });
      // SpotBugs may exit non-zero and still write a complete report
      if (result.code !== 0) Logger.warn(`spotbugs exited with code ${result.code}`);

      return readReport('spotbugs', report);
    });
  }

  parse(raw: string, ctx: ParseContext): Finding[] {
    return parseSarifFindings(raw, ctx, { label: ctx.unitId, severityMap: this.severityMap });
  }
}
