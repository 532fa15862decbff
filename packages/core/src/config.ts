// packages/core/src/config.ts
import fs from 'node:fs';
import path from 'node:path';
import YAML from 'yaml';
import { z } from 'zod';
import { ConfigError, errorMessage } from './errors.js';
import { Logger } from './logger.js';

/** Canonical engine ids, in registry order. */
export const ENGINE_IDS = ['codeql', 'joern', 'spotbugs', 'bandit', 'semgrep'] as const;
export type EngineId = (typeof ENGINE_IDS)[number];

export function isEngineId(v: string): v is EngineId {
  return (ENGINE_IDS as readonly string[]).includes(v);
}

export const SETTINGS_FILE = 'sastweave.yml';

export interface ToolSettings {
  enabled: boolean;
  timeoutSec: number;
}

export interface LlmSettings {
  enabled: boolean;
  url: string;
  apiKey?: string;
  model: string;
  timeoutSec: number;
  temperature: number;
}

export interface ReachabilitySettings {
  enabled: boolean;
  timeoutSec: number;
  svfImage: string;
  sootupImage: string;
}

/**
 * Immutable run configuration. Built once per run by `resolveAnalyzerConfig`
 * and passed explicitly to every stage.
 */
export interface AnalyzerConfig {
  readonly outDir: string;
  readonly concurrency: number;
  readonly llm: Readonly<LlmSettings>;
  readonly reachability: Readonly<ReachabilitySettings>;
  readonly tools: Readonly<Record<EngineId, Readonly<ToolSettings>>>;
}

/** One configuration layer. Every field is optional; later layers win. */
export interface ConfigLayer {
  outDir?: string;
  concurrency?: number;
  llm?: Partial<LlmSettings>;
  reachability?: Partial<ReachabilitySettings>;
  tools?: Partial<Record<EngineId, Partial<ToolSettings>>>;
}

export const DEFAULT_TOOL_TIMEOUTS: Readonly<Record<EngineId, number>> = {
  codeql: 1800,
  joern: 600,
  spotbugs: 600,
  bandit: 120,
  semgrep: 180,
};

export function defaultConfig(): AnalyzerConfig {
  return {
    outDir: 'sastweave-out',
    concurrency: 4,
    llm: {
      enabled: false,
      url: 'http://localhost:11434',
      model: 'qwen2.5:7b',
      timeoutSec: 120,
      temperature: 0.3,
    },
    reachability: {
      enabled: false,
      timeoutSec: 300,
      svfImage: 'svf-tools/svf',
      sootupImage: 'sootup/sootup',
    },
    tools: {
      codeql: { enabled: true, timeoutSec: DEFAULT_TOOL_TIMEOUTS.codeql },
      joern: { enabled: true, timeoutSec: DEFAULT_TOOL_TIMEOUTS.joern },
      spotbugs: { enabled: true, timeoutSec: DEFAULT_TOOL_TIMEOUTS.spotbugs },
      bandit: { enabled: true, timeoutSec: DEFAULT_TOOL_TIMEOUTS.bandit },
      semgrep: { enabled: true, timeoutSec: DEFAULT_TOOL_TIMEOUTS.semgrep },
    },
  };
}

const positive = z.number().positive();

const ToolFileSchema = z
  .object({
    enabled: z.boolean().optional(),
    timeout: positive.optional(),
  })
  .strict();

export const SettingsFileSchema = z
  .object({
    outDir: z.string().min(1).optional(),
    concurrency: z.number().int().positive().optional(),
    llm: z
      .object({
        enabled: z.boolean(),
        url: z.string().url(),
        apiKey: z.string(),
        model: z.string().min(1),
        timeout: positive,
        temperature: z.number().min(0).max(2),
      })
      .partial()
      .strict()
      .optional(),
    reachability: z
      .object({
        enabled: z.boolean(),
        timeout: positive,
        images: z.object({ svf: z.string().min(1), sootup: z.string().min(1) }).partial().strict(),
      })
      .partial()
      .strict()
      .optional(),
    tools: z.record(z.enum(ENGINE_IDS), ToolFileSchema).optional(),
  })
  .strict();

export type SettingsFile = z.infer<typeof SettingsFileSchema>;

function formatIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`).join('; ');
}

export function settingsToLayer(file: SettingsFile): ConfigLayer {
  const tools: NonNullable<ConfigLayer['tools']> = {};
  for (const id of ENGINE_IDS) {
    const entry = file.tools?.[id];
    if (entry) tools[id] = { enabled: entry.enabled, timeoutSec: entry.timeout };
  }

  return {
    outDir: file.outDir,
    concurrency: file.concurrency,
    llm: file.llm && {
      enabled: file.llm.enabled,
      url: file.llm.url,
      apiKey: file.llm.apiKey,
      model: file.llm.model,
      timeoutSec: file.llm.timeout,
      temperature: file.llm.temperature,
    },
    reachability: file.reachability && {
      enabled: file.reachability.enabled,
      timeoutSec: file.reachability.timeout,
      svfImage: file.reachability.images?.svf,
      sootupImage: file.reachability.images?.sootup,
    },
    tools,
  };
}

/**
 * Reads the YAML settings file. An explicit path must exist; otherwise
 * `sastweave.yml` in `cwd` is used when present.
 */
export function loadSettingsFile(configPath?: string, cwd = process.cwd()): ConfigLayer {
  const candidate = configPath ? path.resolve(cwd, configPath) : path.join(cwd, SETTINGS_FILE);
  if (!fs.existsSync(candidate)) {
    if (configPath) throw new ConfigError(`config file not found: ${candidate}`);
    return {};
  }

  let data: unknown;
  try {
    data = YAML.parse(fs.readFileSync(candidate, 'utf8'));
  } catch (error) {
    throw new ConfigError(`cannot parse ${candidate}: ${errorMessage(error)}`);
  }

  const parsed = SettingsFileSchema.safeParse(data ?? {});
  if (!parsed.success) throw new ConfigError(`invalid config ${candidate}: ${formatIssues(parsed.error)}`);

  Logger.debug(`settings loaded from ${candidate}`);
  return settingsToLayer(parsed.data);
}

export function parseBoolean(value: string | boolean | undefined): boolean | undefined {
  if (typeof value === 'boolean') return value;
  if (typeof value !== 'string') return undefined;
  const normalized = value.trim().toLowerCase();
  if (['true', '1', 'yes', 'on'].includes(normalized)) return true;
  if (['false', '0', 'no', 'off'].includes(normalized)) return false;
  return undefined;
}

function envBoolean(env: NodeJS.ProcessEnv, key: string): boolean | undefined {
  const raw = env[key];
  if (raw === undefined || raw === '') return undefined;
  const value = parseBoolean(raw);
  if (value === undefined) throw new ConfigError(`${key} must be a boolean, got "${raw}"`);
  return value;
}

function envNumber(env: NodeJS.ProcessEnv, key: string): number | undefined {
  const raw = env[key];
  if (raw === undefined || raw === '') return undefined;
  const value = Number(raw);
  if (!Number.isFinite(value) || value <= 0) throw new ConfigError(`${key} must be a positive number, got "${raw}"`);
  return value;
}

function envString(env: NodeJS.ProcessEnv, key: string): string | undefined {
  const raw = env[key]?.trim();
  return raw ? raw : undefined;
}

/** Reads SASTWEAVE_* variables. */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): ConfigLayer {
  const tools: NonNullable<ConfigLayer['tools']> = {};
  for (const id of ENGINE_IDS) {
    const prefix = `SASTWEAVE_${id.toUpperCase()}`;
    const enabled = envBoolean(env, `${prefix}_ENABLED`);
    const timeoutSec = envNumber(env, `${prefix}_TIMEOUT`);
    if (enabled !== undefined || timeoutSec !== undefined) tools[id] = { enabled, timeoutSec };
  }

  return {
    outDir: envString(env, 'SASTWEAVE_OUT_DIR'),
    concurrency: envNumber(env, 'SASTWEAVE_CONCURRENCY'),
    llm: {
      enabled: envBoolean(env, 'SASTWEAVE_ENABLE_LLM'),
      url: envString(env, 'SASTWEAVE_LLM_URL'),
      apiKey: envString(env, 'SASTWEAVE_LLM_API_KEY'),
      model: envString(env, 'SASTWEAVE_LLM_MODEL'),
      timeoutSec: envNumber(env, 'SASTWEAVE_LLM_TIMEOUT'),
    },
    reachability: {
      enabled: envBoolean(env, 'SASTWEAVE_ENABLE_REACHABILITY'),
      timeoutSec: envNumber(env, 'SASTWEAVE_REACHABILITY_TIMEOUT'),
      svfImage: envString(env, 'SASTWEAVE_SVF_IMAGE'),
      sootupImage: envString(env, 'SASTWEAVE_SOOTUP_IMAGE'),
    },
    tools,
  };
}

function pick<V>(next: V | undefined, current: V): V {
  return next === undefined ? current : next;
}

function mergeLlm(current: LlmSettings, patch: Partial<LlmSettings> | undefined): LlmSettings {
  return {
    enabled: pick(patch?.enabled, current.enabled),
    url: pick(patch?.url, current.url),
    apiKey: pick(patch?.apiKey, current.apiKey),
    model: pick(patch?.model, current.model),
    timeoutSec: pick(patch?.timeoutSec, current.timeoutSec),
    temperature: pick(patch?.temperature, current.temperature),
  };
}

function mergeReachability(
  current: ReachabilitySettings,
  patch: Partial<ReachabilitySettings> | undefined
): ReachabilitySettings {
  return {
    enabled: pick(patch?.enabled, current.enabled),
    timeoutSec: pick(patch?.timeoutSec, current.timeoutSec),
    svfImage: pick(patch?.svfImage, current.svfImage),
    sootupImage: pick(patch?.sootupImage, current.sootupImage),
  };
}

function mergeTool(current: ToolSettings, patch: Partial<ToolSettings> | undefined): ToolSettings {
  return {
    enabled: pick(patch?.enabled, current.enabled),
    timeoutSec: pick(patch?.timeoutSec, current.timeoutSec),
  };
}

function deepFreeze<T>(value: T): T {
  if (value && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}

/**
 * Merges layers lowest-precedence first, e.g.
 * `resolveAnalyzerConfig([fileLayer, envLayer, explicitLayer])`.
 */
export function resolveAnalyzerConfig(layers: readonly ConfigLayer[]): AnalyzerConfig {
  const base = defaultConfig();
  let outDir = base.outDir;
  let concurrency = base.concurrency;
  let llm: LlmSettings = { ...base.llm };
  let reachability: ReachabilitySettings = { ...base.reachability };
  const tools = { ...base.tools };

  for (const layer of layers) {
    outDir = layer.outDir ?? outDir;
    concurrency = layer.concurrency ?? concurrency;
    llm = mergeLlm(llm, layer.llm);
    reachability = mergeReachability(reachability, layer.reachability);
    for (const id of ENGINE_IDS) tools[id] = mergeTool(tools[id], layer.tools?.[id]);
  }

  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new ConfigError(`concurrency must be a positive integer, got ${concurrency}`);
  }

  return deepFreeze({ outDir, concurrency, llm, reachability, tools });
}
