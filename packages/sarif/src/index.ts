import fs from 'node:fs';
import path from 'node:path';
import { pathToFileURL } from 'node:url';
import { FatalIOError, Logger, type EngineExecutionMeta, type Finding, type Severity, type ToolIdentity } from '@sastweave/core';

export const SARIF_SCHEMA = 'https://json.schemastore.org/sarif-2.1.0.json';
export const MERGED_REPORT_FILE = 'merged.sarif';

export type SarifLevel = Severity;

export interface SarifRule {
  id: string;
  name?: string;
  shortDescription?: { text: string };
}

export interface SarifRegion {
  startLine: number;
  startColumn: number;
}

export interface SarifFix {
  description: { text: string };
  artifactChanges: Array<{
    artifactLocation: { uri: string };
    replacements: Array<{
      deletedRegion: SarifRegion;
      insertedContent: { text: string };
    }>;
  }>;
}

export interface SarifResult {
  ruleId: string;
  level: SarifLevel;
  message: { text: string };
  locations: Array<{
    physicalLocation: {
      artifactLocation: { uri: string };
      region: SarifRegion;
    };
  }>;
  fixes?: SarifFix[];
  properties?: Record<string, unknown>;
}

export interface SarifInvocation {
  executionSuccessful: boolean;
  endTimeUtc: string;
  properties: {
    unitId: string;
    status: EngineExecutionMeta['status'];
    durationMs: number;
    errorMessage?: string;
  };
}

export interface SarifRun {
  tool: {
    driver: {
      name: string;
      version?: string;
      informationUri?: string;
      rules: SarifRule[];
    };
  };
  invocations?: SarifInvocation[];
  results: SarifResult[];
}

export interface SarifLog {
  $schema: string;
  version: '2.1.0';
  runs: SarifRun[];
}

export interface ToolReport {
  toolName: string;
  fileName: string;
  log: SarifLog;
}

/** What one dispatched unit recorded about its run; a DispatchResult fits. */
export interface ToolExecution {
  tool: { name: string };
  meta: EngineExecutionMeta;
}

export interface ReportBundle {
  perTool: ToolReport[];
  merged: SarifLog;
}

/** Stable, locale-independent compare */
function cmpStr(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

/**
 * Always '/' separators. Relative paths stay relative; absolute ones become
 * file:// URIs.
 */
export function toSarifUri(filePath: string): string {
  const p = filePath.trim();
  if (!p) return '.';
  if (path.isAbsolute(p)) return pathToFileURL(p).href;
  return p.replace(/\\/g, '/');
}

/** `SpotBugs` -> `spotbugs.sarif`, `Some Tool` -> `some_tool.sarif`. */
export function reportFileName(toolName: string): string {
  const base = toolName.trim().toLowerCase().replace(/[\s/\\]+/g, '_') || 'unknown';
  return `${base}.sarif`;
}

export function formatConfidence(confidence: number): string {
  return confidence.toFixed(2);
}

function toFix(finding: Finding, uri: string): SarifFix[] | undefined {
  const verdict = finding.verdict;
  if (!verdict?.isValid || !verdict.patchText) return undefined;
  return [
    {
      description: { text: `${verdict.explanation} (confidence: ${formatConfidence(verdict.confidence)})` },
      artifactChanges: [
        {
          artifactLocation: { uri },
          replacements: [
            {
              // a region with no end covers the rest of the line
              deletedRegion: { startLine: finding.line, startColumn: 1 },
              insertedContent: { text: verdict.patchText },
            },
          ],
        },
      ],
    },
  ];
}

export function findingToSarifResult(finding: Finding): SarifResult {
  const uri = toSarifUri(finding.filePath);
  const fixes = toFix(finding, uri);

  const properties: Record<string, unknown> = {};
  if (finding.reachability) {
    properties.reachability = {
      reachable: finding.reachability.reachable,
      callStack: [...finding.reachability.callStack],
      dataFlow: [...finding.reachability.dataFlow],
    };
  }
  if (finding.verdict) {
    properties.verification = {
      isValid: finding.verdict.isValid,
      confidence: finding.verdict.confidence,
      explanation: finding.verdict.explanation,
      ...(finding.verdict.patchText ? { patch: finding.verdict.patchText } : {}),
    };
  }

  return {
    ruleId: finding.ruleId,
    level: finding.severity,
    message: { text: finding.message },
    locations: [
      {
        physicalLocation: {
          artifactLocation: { uri },
          region: { startLine: finding.line, startColumn: finding.column },
        },
      },
    ],
    ...(fixes ? { fixes } : {}),
    ...(Object.keys(properties).length > 0 ? { properties } : {}),
  };
}

function rulesFor(findings: readonly Finding[]): SarifRule[] {
  const byId = new Map<string, SarifRule>();
  for (const f of findings) {
    if (!byId.has(f.ruleId)) byId.set(f.ruleId, { id: f.ruleId, name: f.ruleName, shortDescription: { text: f.ruleName } });
  }
  return [...byId.values()].sort((a, b) => cmpStr(a.id, b.id));
}

/** First identity seen for a tool wins; later findings only fill what it lacks. */
function identityFor(findings: readonly Finding[]): ToolIdentity {
  const identity: ToolIdentity = { name: findings[0]?.tool.name ?? 'unknown' };
  for (const f of findings) {
    identity.version ??= f.tool.version;
    identity.informationUri ??= f.tool.informationUri;
  }
  return identity;
}

function toInvocation(meta: EngineExecutionMeta): SarifInvocation {
  return {
    executionSuccessful: meta.status === 'ok',
    endTimeUtc: meta.finishedAt,
    properties: {
      unitId: meta.unitId,
      status: meta.status,
      durationMs: meta.durationMs,
      ...(meta.errorMessage ? { errorMessage: meta.errorMessage } : {}),
    },
  };
}

function buildRun(findings: readonly Finding[], executions: readonly ToolExecution[]): SarifRun {
  const identity = identityFor(findings);
  const invocations = executions
    .filter((e) => e.tool.name === identity.name)
    .map((e) => e.meta)
    .sort((a, b) => cmpStr(a.unitId, b.unitId))
    .map(toInvocation);
  return {
    tool: {
      driver: {
        name: identity.name,
        ...(identity.version ? { version: identity.version } : {}),
        ...(identity.informationUri ? { informationUri: identity.informationUri } : {}),
        rules: rulesFor(findings),
      },
    },
    ...(invocations.length > 0 ? { invocations } : {}),
    results: findings.map(findingToSarifResult),
  };
}

function sarifLog(runs: SarifRun[]): SarifLog {
  return { $schema: SARIF_SCHEMA, version: '2.1.0', runs };
}

/**
 * One log per tool plus a merged log holding every run. Runs are ordered by
 * tool name; results keep the order the findings came in. Each run lists the
 * invocations of the units that ran under its tool name; executions of tools
 * without findings add no run. Pure: the same inputs always give the same bundle.
 */
export function buildReports(findings: readonly Finding[], executions: readonly ToolExecution[] = []): ReportBundle {
  const groups = new Map<string, Finding[]>();
  for (const f of findings) {
    const group = groups.get(f.tool.name);
    if (group) group.push(f);
    else groups.set(f.tool.name, [f]);
  }

  const runs = [...groups.entries()]
    .sort(([a], [b]) => cmpStr(a, b))
    .map(([toolName, group]) => ({ toolName, run: buildRun(group, executions) }));

  return {
    perTool: runs.map(({ toolName, run }) => ({
      toolName,
      fileName: reportFileName(toolName),
      log: sarifLog([run]),
    })),
    merged: sarifLog(runs.map(({ run }) => run)),
  };
}

export function resultCount(log: SarifLog): number {
  return log.runs.reduce((n, run) => n + run.results.length, 0);
}

async function writeJson(file: string, log: SarifLog): Promise<void> {
  try {
    await fs.promises.writeFile(file, `${JSON.stringify(log, null, 2)}\n`, 'utf8');
  } catch (error) {
    throw new FatalIOError(file, 'write', error);
  }
}

/** Writes every per-tool report and `merged.sarif`; returns the paths written. */
export async function writeReports(outDir: string, bundle: ReportBundle): Promise<string[]> {
  const dir = path.resolve(outDir);
  try {
    await fs.promises.mkdir(dir, { recursive: true });
  } catch (error) {
    throw new FatalIOError(dir, 'create directory', error);
  }

  const written: string[] = [];
  for (const report of bundle.perTool) {
    const file = path.join(dir, report.fileName);
    await writeJson(file, report.log);
    written.push(file);
  }

  const merged = path.join(dir, MERGED_REPORT_FILE);
  await writeJson(merged, bundle.merged);
  written.push(merged);

  Logger.info(`wrote ${written.length} report(s) to ${dir} (${resultCount(bundle.merged)} result(s))`);
  return written;
}
