// packages/engines/src/bandit.ts
import { z } from 'zod';
import {
  Logger,
  ToolUnavailableError,
  createFinding,
  errorMessage,
  expectExit,
  normalizeFindingPath,
  normalizeSeverity,
  type Finding,
  type Language,
  type SeverityTable,
} from '@sastweave/core';
import { BinaryLocator, probeVersion, type EngineAdapter, type EngineContext, type ParseContext } from './adapter.js';

export const BANDIT_SEVERITY: SeverityTable = {
  high: 'error',
  medium: 'warning',
  low: 'note',
};

const BanditReportSchema = z.object({ results: z.array(z.unknown()) }).passthrough();

const BanditResultSchema = z
  .object({
    test_id: z.string().trim().min(1),
    test_name: z.string().optional(),
    issue_text: z.string().trim().min(1),
    issue_severity: z.string().optional(),
    issue_confidence: z.string().optional(),
    issue_cwe: z.object({ id: z.number(), link: z.string() }).partial().optional(),
    filename: z.string().trim().min(1),
    line_number: z.number().int(),
    col_offset: z.number().int().optional(),
    code: z.string().optional(),
    more_info: z.string().optional(),
  })
  .passthrough();

export class BanditAdapter implements EngineAdapter {
  readonly engineId = 'bandit';
  readonly displayName = 'Bandit';
  readonly tool = { name: 'Bandit', informationUri: 'https://bandit.readthedocs.io' };
  readonly installHint = 'pip install bandit';
  readonly languages: readonly Language[] = ['python'];
  readonly scope = 'project';
  readonly severityMap = BANDIT_SEVERITY;

  private readonly locator = new BinaryLocator('bandit');

  async isAvailable(ctx: EngineContext) {
    return Boolean(await this.locator.resolve(ctx));
  }

  async version(ctx: EngineContext) {
    const bin = await this.locator.resolve(ctx);
    if (!bin) return 'unavailable';
    const banner = await probeVersion(ctx, [bin, '--version']);
    return banner.replace(/^bandit\s+/i, '');
  }

  async invoke(ctx: EngineContext, _languages: readonly Language[], timeoutMs: number): Promise<string> {
    const bin = await this.locator.resolve(ctx);
    if (!bin) throw new ToolUnavailableError('bandit', this.installHint);

    // -ll: medium severity and above; exit 1 just means issues were found
    const result = await ctx.exec([bin, '-r', ctx.projectRoot, '-f', 'json', '-ll', '-q'], {
      cwd: ctx.projectRoot,
      timeoutMs,
      signal: ctx.signal,
    });
    return expectExit('bandit', result, [0, 1]).stdout;
  }

  parse(raw: string, ctx: ParseContext): Finding[] {
    if (!raw.trim()) return [];

    let doc: unknown;
    try {
      doc = JSON.parse(raw);
    } catch (error) {
      Logger.warn(`${ctx.unitId}: report is not valid JSON (${errorMessage(error)}); no findings taken`);
      return [];
    }

    const report = BanditReportSchema.safeParse(doc);
    if (!report.success) {
      Logger.warn(`${ctx.unitId}: report has no results array; no findings taken`);
      return [];
    }

    const findings: Finding[] = [];
    let seq = 0;
    let skipped = 0;

    for (const entry of report.data.results) {
      const parsed = BanditResultSchema.safeParse(entry);
      if (!parsed.success) {
        skipped += 1;
        continue;
      }

      const r = parsed.data;
      seq += 1;
      try {
        findings.push(
          createFinding({
            findingId: `${ctx.unitId}-${seq}`,
            filePath: normalizeFindingPath(r.filename, ctx.projectRoot),
            line: r.line_number,
            column: (r.col_offset ?? 0) + 1,
            ruleId: r.test_id,
            ruleName: r.test_name,
            message: r.issue_text,
            severity: normalizeSeverity(r.issue_severity, this.severityMap),
            tool: ctx.tool,
            toolMetadata: {
              ...(r.issue_severity ? { issueSeverity: r.issue_severity } : {}),
              ...(r.issue_confidence ? { confidence: r.issue_confidence } : {}),
              ...(r.issue_cwe?.id !== undefined ? { cwe: `CWE-${r.issue_cwe.id}` } : {}),
              ...(r.more_info ? { moreInfo: r.more_info } : {}),
            },
            language: 'python',
          })
        );
      } catch (error) {
        Logger.debug(`${ctx.unitId}: ${errorMessage(error)}`);
        skipped += 1;
      }
    }

    if (skipped > 0) Logger.warn(`${ctx.unitId}: skipped ${skipped} malformed record(s)`);
    return findings;
  }
}
