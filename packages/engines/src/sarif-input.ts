// packages/engines/src/sarif-input.ts
import { z } from 'zod';
import {
  Logger,
  createFinding,
  errorMessage,
  languageForPath,
  normalizeFindingPath,
  normalizeSeverity,
  type Finding,
  type Severity,
  type SeverityTable,
  type ToolIdentity,
} from '@sastweave/core';
import type { ParseContext } from './adapter.js';

/** SARIF `level` values. `none` is informational. */
export const SARIF_LEVELS: SeverityTable = {
  error: 'error',
  warning: 'warning',
  note: 'note',
  none: 'note',
};

const RuleSchema = z
  .object({
    id: z.string().min(1),
    name: z.string().optional(),
    shortDescription: z.object({ text: z.string() }).partial().optional(),
    defaultConfiguration: z.object({ level: z.string() }).partial().optional(),
    properties: z.record(z.unknown()).optional(),
  })
  .passthrough();

const ComponentSchema = z
  .object({
    name: z.string().optional(),
    version: z.string().optional(),
    semanticVersion: z.string().optional(),
    informationUri: z.string().optional(),
    rules: z.array(z.unknown()).optional(),
  })
  .passthrough();

const RunSchema = z
  .object({
    tool: z.object({ driver: ComponentSchema, extensions: z.array(ComponentSchema).optional() }).passthrough(),
    results: z.array(z.unknown()).optional(),
  })
  .passthrough();

const LogSchema = z.object({ runs: z.array(z.unknown()) }).passthrough();

const LocationSchema = z
  .object({
    physicalLocation: z
      .object({
        artifactLocation: z.object({ uri: z.string().min(1) }).passthrough(),
        region: z
          .object({
            startLine: z.number().optional(),
            startColumn: z.number().optional(),
            snippet: z.object({ text: z.string() }).partial().optional(),
          })
          .passthrough()
          .optional(),
      })
      .passthrough(),
  })
  .passthrough();

const ResultSchema = z
  .object({
    ruleId: z.string().optional(),
    rule: z.object({ id: z.string().optional() }).passthrough().optional(),
    level: z.string().optional(),
    message: z.object({ text: z.string().optional(), markdown: z.string().optional() }).passthrough(),
    locations: z.array(z.unknown()).optional(),
    properties: z.record(z.unknown()).optional(),
  })
  .passthrough();

export type SarifRuleInput = z.infer<typeof RuleSchema>;
export type SarifResultInput = z.infer<typeof ResultSchema>;
type SarifComponent = z.infer<typeof ComponentSchema>;

export interface SarifParseOptions {
  /** Used in warnings. */
  label: string;
  severityMap: SeverityTable;
  /** Replaces the level lookup, e.g. for score-based severities. */
  severityOf?: (result: SarifResultInput, rule: SarifRuleInput | undefined) => Severity;
}

function collectRules(components: readonly SarifComponent[]): Map<string, SarifRuleInput> {
  const rules = new Map<string, SarifRuleInput>();
  for (const component of components) {
    for (const raw of component.rules ?? []) {
      const parsed = RuleSchema.safeParse(raw);
      if (parsed.success && !rules.has(parsed.data.id)) rules.set(parsed.data.id, parsed.data);
    }
  }
  return rules;
}

export function levelSeverity(
  result: SarifResultInput,
  rule: SarifRuleInput | undefined,
  table: SeverityTable
): Severity {
  return normalizeSeverity(result.level ?? rule?.defaultConfiguration?.level, table);
}

/**
 * Reads a SARIF log (CodeQL, SpotBugs, Semgrep) into Findings, one per result
 * location. Results without a rule id, message text or location URI are
 * skipped; an unreadable document yields no findings.
 */
export function parseSarifFindings(raw: string, ctx: ParseContext, options: SarifParseOptions): Finding[] {
  if (!raw.trim()) return [];

  let doc: unknown;
  try {
    doc = JSON.parse(raw);
  } catch (error) {
    Logger.warn(`${options.label}: report is not valid JSON (${errorMessage(error)}); no findings taken`);
    return [];
  }

  const log = LogSchema.safeParse(doc);
  if (!log.success) {
    Logger.warn(`${options.label}: report has no SARIF runs; no findings taken`);
    return [];
  }

  const findings: Finding[] = [];
  let seq = 0;
  let skipped = 0;

  for (const rawRun of log.data.runs) {
    const run = RunSchema.safeParse(rawRun);
    if (!run.success) {
      skipped += 1;
      continue;
    }

    const driver = run.data.tool.driver;
    const rules = collectRules([driver, ...(run.data.tool.extensions ?? [])]);
    const tool: ToolIdentity = {
      name: ctx.tool.name,
      version: driver.semanticVersion ?? driver.version ?? ctx.tool.version,
      informationUri: driver.informationUri ?? ctx.tool.informationUri,
    };

    for (const rawResult of run.data.results ?? []) {
      const parsed = ResultSchema.safeParse(rawResult);
      if (!parsed.success) {
        skipped += 1;
        continue;
      }

      const result = parsed.data;
      const ruleId = (result.ruleId ?? result.rule?.id ?? '').trim();
      const message = (result.message.text ?? result.message.markdown ?? '').trim();
      const locations = (result.locations ?? []).flatMap((loc) => {
        const l = LocationSchema.safeParse(loc);
        return l.success ? [l.data.physicalLocation] : [];
      });

      if (!ruleId || !message || locations.length === 0) {
        skipped += 1;
        continue;
      }

      const rule = rules.get(ruleId);
      const severity = options.severityOf
        ? options.severityOf(result, rule)
        : levelSeverity(result, rule, options.severityMap);

      for (const location of locations) {
        seq += 1;
        const filePath = normalizeFindingPath(location.artifactLocation.uri, ctx.projectRoot);
        const snippet = location.region?.snippet?.text;
        findings.push(
          createFinding({
            findingId: `${ctx.unitId}-${seq}`,
            filePath,
            line: location.region?.startLine,
            column: location.region?.startColumn,
            ruleId,
            ruleName: rule?.shortDescription?.text ?? rule?.name,
            message,
            severity,
            tool,
            toolMetadata: {
              ...(result.level ? { level: result.level } : {}),
              ...(snippet ? { snippet } : {}),
              ...(rule?.properties ? { ruleProperties: rule.properties } : {}),
            },
            language: languageForPath(filePath),
          })
        );
      }
    }
  }

  if (skipped > 0) Logger.warn(`${options.label}: skipped ${skipped} malformed record(s)`);
  return findings;
}
