// packages/core/src/index.ts
import path from 'node:path';
import type { EngineId } from './config.js';
import type { Language } from './languages.js';

export * from './errors.js';
export * from './logger.js';
export * from './languages.js';
export * from './config.js';
export * from './process.js';
export * from './pool.js';

export type Severity = 'error' | 'warning' | 'note';

export const SEVERITIES: readonly Severity[] = ['error', 'warning', 'note'];

/** Lower-cased tool severity label -> canonical severity. */
export type SeverityTable = Readonly<Record<string, Severity>>;

export interface ToolIdentity {
  name: string;
  version?: string;
  informationUri?: string;
}

export interface ReachabilityEvidence {
  reachable: boolean;
  callStack: string[];
  dataFlow: string[];
}

export interface PatchVerdict {
  isValid: boolean;
  /** 0..1 */
  confidence: number;
  patchText?: string;
  explanation: string;
}

/**
 * One normalized observation from one tool.
 * Findings are frozen; enrichment returns a new Finding (see attachReachability / attachVerdict).
 */
export interface Finding {
  readonly findingId: string;
  /** Relative to the project's parent directory (POSIX separators), or absolute when outside it. */
  readonly filePath: string;
  readonly line: number;
  readonly column: number;
  readonly ruleId: string;
  readonly ruleName: string;
  readonly message: string;
  readonly severity: Severity;
  readonly tool: Readonly<ToolIdentity>;
  readonly toolMetadata: Readonly<Record<string, unknown>>;
  readonly language?: Language;
  readonly reachability?: Readonly<ReachabilityEvidence>;
  readonly verdict?: Readonly<PatchVerdict>;
}

export interface FindingInput {
  findingId: string;
  filePath: string;
  line?: number;
  column?: number;
  ruleId: string;
  ruleName?: string;
  message: string;
  severity: Severity;
  tool: ToolIdentity;
  toolMetadata?: Record<string, unknown>;
  language?: Language;
}

export interface EngineExecutionMeta {
  unitId: string;
  engineId: EngineId;
  displayName: string;
  version: string;
  status: 'ok' | 'skipped' | 'failed' | 'timeout';
  durationMs: number;
  /** ISO-8601 UTC. */
  finishedAt: string;
  errorMessage?: string;
  installHint?: string;
}

function positiveInt(v: number | undefined): number {
  return typeof v === 'number' && Number.isFinite(v) && v >= 1 ? Math.floor(v) : 1;
}

export function createFinding(input: FindingInput): Finding {
  const ruleId = input.ruleId.trim();
  if (!ruleId) throw new TypeError(`finding ${input.findingId} has an empty rule id`);

  const finding: Finding = {
    findingId: input.findingId,
    filePath: input.filePath,
    line: positiveInt(input.line),
    column: positiveInt(input.column),
    ruleId,
    ruleName: input.ruleName?.trim() || ruleId,
    message: input.message,
    severity: input.severity,
    tool: Object.freeze({ ...input.tool }),
    toolMetadata: Object.freeze({ ...(input.toolMetadata ?? {}) }),
    ...(input.language ? { language: input.language } : {}),
  };
  return Object.freeze(finding);
}

export function attachReachability(finding: Finding, evidence: ReachabilityEvidence): Finding {
  if (finding.reachability) throw new Error(`finding ${finding.findingId} already carries reachability evidence`);
  return Object.freeze({
    ...finding,
    reachability: Object.freeze({
      reachable: evidence.reachable,
      callStack: [...evidence.callStack],
      dataFlow: [...evidence.dataFlow],
    }),
  });
}

export function attachVerdict(finding: Finding, verdict: PatchVerdict): Finding {
  if (finding.verdict) throw new Error(`finding ${finding.findingId} already carries a verdict`);
  return Object.freeze({ ...finding, verdict: Object.freeze({ ...verdict }) });
}

/** Maps a tool's own label through its table; anything unknown is a warning. */
export function normalizeSeverity(raw: string | undefined, table: SeverityTable): Severity {
  const key = (raw ?? '').trim().toLowerCase();
  return Object.hasOwn(table, key) ? table[key] : 'warning';
}

export function toPosixPath(p: string): string {
  return String(p || '').replace(/\\/g, '/');
}

/**
 * Finding paths are relative to the project's *parent* directory, so they
 * start with the project directory name (`app/src/main.c`). Relative tool
 * paths are taken as relative to the project root. A file outside the parent
 * keeps its absolute path.
 */
export function normalizeFindingPath(rawPath: string, projectRoot: string): string {
  let v = String(rawPath || '').trim();
  if (v.startsWith('file://')) {
    try {
      v = decodeURIComponent(new URL(v).pathname);
    } catch {
      v = v.slice('file://'.length);
    }
  }
  if (!v) return v;

  const root = path.resolve(projectRoot);
  const abs = path.isAbsolute(v) ? path.normalize(v) : path.resolve(root, v);
  const parent = path.dirname(root);
  const rel = path.relative(parent, abs);

  if (rel && !leavesBase(rel)) return toPosixPath(rel);
  return toPosixPath(abs);
}

/** True when a path.relative() result climbs out of its base; `..cache/x` does not. */
export function leavesBase(rel: string): boolean {
  return rel === '..' || rel.startsWith(`..${path.sep}`) || rel.startsWith('../') || path.isAbsolute(rel);
}

/** Absolute host path for a Finding path produced by normalizeFindingPath. */
export function resolveFindingPath(findingPath: string, projectRoot: string): string {
  if (path.isAbsolute(findingPath)) return findingPath;
  return path.resolve(path.dirname(path.resolve(projectRoot)), findingPath);
}
