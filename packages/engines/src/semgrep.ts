// packages/engines/src/semgrep.ts
import {
  LANGUAGE_EXTENSIONS,
  ToolUnavailableError,
  expectExit,
  type Finding,
  type Language,
  type Severity,
} from '@sastweave/core';
import { BinaryLocator, probeVersion, type EngineAdapter, type EngineContext, type ParseContext } from './adapter.js';
import {
  SARIF_LEVELS,
  levelSeverity,
  parseSarifFindings,
  type SarifResultInput,
  type SarifRuleInput,
} from './sarif-input.js';

/** CVSS-like `security-severity` score (0-10) -> severity. */
export function scoreSeverity(score: number): Severity {
  if (score >= 7) return 'error';
  if (score >= 4) return 'warning';
  return 'note';
}

function readScore(props: Record<string, unknown> | undefined): number | undefined {
  const raw = props?.['security-severity'];
  const score = typeof raw === 'number' ? raw : typeof raw === 'string' ? Number.parseFloat(raw) : Number.NaN;
  return Number.isFinite(score) ? score : undefined;
}

export function semgrepSeverity(result: SarifResultInput, rule: SarifRuleInput | undefined): Severity {
  const score = readScore(result.properties) ?? readScore(rule?.properties);
  return score === undefined ? levelSeverity(result, rule, SARIF_LEVELS) : scoreSeverity(score);
}

export function includeGlobs(languages: readonly Language[]): string[] {
  const exts = new Set(languages.flatMap((l) => LANGUAGE_EXTENSIONS[l]));
  return [...exts].sort().map((ext) => `--include=*${ext}`);
}

export class SemgrepAdapter implements EngineAdapter {
  readonly engineId = 'semgrep';
  readonly displayName = 'Semgrep';
  readonly tool = { name: 'Semgrep', informationUri: 'https://semgrep.dev' };
  readonly installHint = 'pip install semgrep';
  readonly languages: readonly Language[] = ['c', 'cpp', 'java', 'python', 'javascript'];
  readonly scope = 'project';
  readonly severityMap = SARIF_LEVELS;

  private readonly locator = new BinaryLocator('semgrep');

  async isAvailable(ctx: EngineContext) {
    return Boolean(await this.locator.resolve(ctx));
  }

  async version(ctx: EngineContext) {
    const bin = await this.locator.resolve(ctx);
    if (!bin) return 'unavailable';
    return probeVersion(ctx, [bin, '--version']);
  }

  async invoke(ctx: EngineContext, languages: readonly Language[], timeoutMs: number): Promise<string> {
    const bin = await this.locator.resolve(ctx);
    if (!bin) throw new ToolUnavailableError('semgrep', this.installHint);

    // --config=auto fetches the registry rule set and needs metrics left on
    const result = await ctx.exec(
      [
        bin,
        'scan',
        '--config=auto',
        '--sarif',
        '--quiet',
        '--disable-version-check',
        ...includeGlobs(languages),
        ctx.projectRoot,
      ],
      { cwd: ctx.projectRoot, timeoutMs, signal: ctx.signal }
    );
    return expectExit('semgrep', result, [0, 1]).stdout;
  }

  parse(raw: string, ctx: ParseContext): Finding[] {
    return parseSarifFindings(raw, ctx, {
      label: ctx.unitId,
      severityMap: this.severityMap,
      severityOf: semgrepSeverity,
    });
  }
}
