// engines/src/index.ts
import {
  Logger,
  ToolExecutionError,
  ToolUnavailableError,
  errorMessage,
  isAbortError,
  runPool,
  withTimeout,
  type EngineExecutionMeta,
  type EngineId,
  type Finding,
  type Language,
  type ToolIdentity,
} from '@sastweave/core';
import type { EngineAdapter, EngineContext } from './adapter.js';
import { BanditAdapter } from './bandit.js';
import { CodeQlAdapter } from './codeql.js';
import { JoernAdapter } from './joern.js';
import { SemgrepAdapter } from './semgrep.js';
import { SpotBugsAdapter } from './spotbugs.js';

export * from './adapter.js';
export * from './compile.js';
export * from './sarif-input.js';
export { BanditAdapter, BANDIT_SEVERITY } from './bandit.js';
export { CodeQlAdapter } from './codeql.js';
export { JoernAdapter, JOERN_QUERIES, joernScript, type JoernQuery } from './joern.js';
export { SemgrepAdapter, includeGlobs, scoreSeverity, semgrepSeverity } from './semgrep.js';
export { SpotBugsAdapter } from './spotbugs.js';

/** Which tools run for which language. */
export type EngineRegistry = Readonly<Record<Language, readonly EngineId[]>>;

export const ENGINE_REGISTRY: EngineRegistry = {
  c: ['codeql', 'joern', 'semgrep'],
  cpp: ['codeql', 'joern', 'semgrep'],
  java: ['codeql', 'spotbugs', 'semgrep'],
  python: ['codeql', 'bandit', 'semgrep'],
  javascript: ['codeql', 'semgrep'],
};

/** Fresh adapters; each caches its binary lookups, so one set per run. */
export function createAdapters(): EngineAdapter[] {
  return [new CodeQlAdapter(), new JoernAdapter(), new SpotBugsAdapter(), new BanditAdapter(), new SemgrepAdapter()];
}

export interface DispatchUnit {
  /** `semgrep` for project-scoped tools, `codeql:cpp` for per-language ones. */
  unitId: string;
  adapter: EngineAdapter;
  languages: Language[];
}

export interface DispatchResult {
  unitId: string;
  engineId: EngineId;
  languages: Language[];
  tool: ToolIdentity;
  /** Raw report; present only when the tool ran to completion. */
  output?: string;
  meta: EngineExecutionMeta;
}

/**
 * Expands detected languages into invocation units, in adapter order.
 * A tool runs only for languages that both the registry and the adapter list.
 */
export function planDispatch(
  languages: readonly Language[],
  adapters: readonly EngineAdapter[],
  registry: EngineRegistry = ENGINE_REGISTRY
): DispatchUnit[] {
  const units: DispatchUnit[] = [];

  for (const adapter of adapters) {
    const langs = languages.filter(
      (lang) => registry[lang].includes(adapter.engineId) && adapter.languages.includes(lang)
    );
    if (langs.length === 0) continue;

    if (adapter.scope === 'project') {
      units.push({ unitId: adapter.engineId, adapter, languages: langs });
      continue;
    }

    const groups = new Map<string, Language[]>();
    for (const lang of langs) {
      const key = adapter.unitKey?.(lang) ?? lang;
      groups.set(key, [...(groups.get(key) ?? []), lang]);
    }
    for (const [key, group] of groups) {
      units.push({ unitId: `${adapter.engineId}:${key}`, adapter, languages: group });
    }
  }

  return units;
}

async function runUnit(ctx: EngineContext, unit: DispatchUnit): Promise<DispatchResult> {
  const { adapter } = unit;
  const start = Date.now();
  const settings = ctx.config.tools[adapter.engineId];

  const result = (status: EngineExecutionMeta['status'], version: string, extra: Partial<EngineExecutionMeta> = {}) => ({
    unitId: unit.unitId,
    engineId: adapter.engineId,
    languages: unit.languages,
    tool: { ...adapter.tool, version },
    meta: {
      unitId: unit.unitId,
      engineId: adapter.engineId,
      displayName: adapter.displayName,
      version,
      status,
      durationMs: Date.now() - start,
      finishedAt: new Date().toISOString(),
      ...extra,
    },
  });

  if (!settings.enabled) {
    Logger.debug(`${unit.unitId}: disabled by configuration`);
    return result('skipped', 'unknown', { errorMessage: 'Disabled by configuration' });
  }

  let available = false;
  try {
    available = await adapter.isAvailable(ctx);
  } catch (error) {
    if (isAbortError(error)) throw error;
    Logger.warn(`${unit.unitId}: preflight failed: ${errorMessage(error)}`);
    return result('failed', 'unknown', { errorMessage: `Preflight failed: ${errorMessage(error)}` });
  }

  if (!available) {
    Logger.warn(`${adapter.displayName} not found; skipping ${unit.unitId}. ${adapter.installHint}`);
    return result('skipped', 'unavailable', {
      errorMessage: `Not installed. ${adapter.installHint}`,
      installHint: adapter.installHint,
    });
  }

  let version = 'unknown';
  try {
    version = await adapter.version(ctx);
  } catch (error) {
    if (isAbortError(error)) throw error;
    Logger.debug(`${unit.unitId}: version check failed: ${errorMessage(error)}`);
  }

  const timeoutMs = settings.timeoutSec * 1000;
  Logger.info(`${unit.unitId}: running ${adapter.displayName} ${version} on ${unit.languages.join(', ')}`);

  try {
    const output = await withTimeout(
      adapter.invoke(ctx, unit.languages, timeoutMs),
      timeoutMs,
      new ToolExecutionError(adapter.engineId, `timed out after ${settings.timeoutSec}s`, { timedOut: true })
    );
    const done = result('ok', version);
    Logger.info(`${unit.unitId}: finished in ${done.meta.durationMs}ms`);
    return { ...done, output };
  } catch (error) {
    if (isAbortError(error)) throw error;

    if (error instanceof ToolUnavailableError) {
      Logger.warn(`${unit.unitId}: ${error.message}`);
      return result('skipped', version, { errorMessage: error.message, installHint: adapter.installHint });
    }

    const timedOut = error instanceof ToolExecutionError && error.timedOut;
    Logger.warn(`${unit.unitId}: ${errorMessage(error)}`);
    return result(timedOut ? 'timeout' : 'failed', version, { errorMessage: errorMessage(error) });
  }
}

/**
 * Runs every applicable tool, at most `config.concurrency` at a time.
 * One tool failing, timing out or missing never stops the others; results
 * come back in plan order. Only cancellation rejects.
 */
export async function dispatch(
  ctx: EngineContext,
  languages: readonly Language[],
  adapters: readonly EngineAdapter[] = createAdapters(),
  registry: EngineRegistry = ENGINE_REGISTRY
): Promise<DispatchResult[]> {
  const units = planDispatch(languages, adapters, registry);
  if (units.length === 0) {
    Logger.warn('no analysis tool applies to the detected languages');
    return [];
  }
  return runPool(units, ctx.config.concurrency, (unit) => runUnit(ctx, unit), ctx.signal);
}

/**
 * Parses every completed unit's output into Findings, in dispatch order.
 * A parser blowing up costs that unit's findings, nothing more.
 */
export function normalize(
  results: readonly DispatchResult[],
  projectRoot: string,
  adapters: readonly EngineAdapter[] = createAdapters()
): Finding[] {
  const byId = new Map(adapters.map((adapter) => [adapter.engineId, adapter]));
  const findings: Finding[] = [];

  for (const result of results) {
    if (result.output === undefined) continue;
    const adapter = byId.get(result.engineId);
    if (!adapter) {
      Logger.warn(`${result.unitId}: no parser registered for ${result.engineId}`);
      continue;
    }

    try {
      const parsed = adapter.parse(result.output, { projectRoot, unitId: result.unitId, tool: result.tool });
      Logger.debug(`${result.unitId}: ${parsed.length} finding(s)`);
      findings.push(...parsed);
    } catch (error) {
      Logger.warn(`${result.unitId}: could not parse output: ${errorMessage(error)}`);
    }
  }

  return findings;
}

export async function listEngines(ctx: EngineContext, adapters: readonly EngineAdapter[] = createAdapters()) {
  return Promise.all(
    adapters.map(async (adapter) => {
      const available = await adapter.isAvailable(ctx);
      return {
        engineId: adapter.engineId,
        displayName: adapter.displayName,
        languages: [...adapter.languages],
        enabled: ctx.config.tools[adapter.engineId].enabled,
        available,
        version: available ? await adapter.version(ctx) : 'unavailable',
        installHint: adapter.installHint,
      };
    })
  );
}
