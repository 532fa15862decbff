#!/usr/bin/env node
import fs from 'node:fs';
import path from 'node:path';
import { pathToFileURL } from 'node:url';
import {
  CancelledError,
  ConfigError,
  ENGINE_IDS,
  FatalIOError,
  LogLevel,
  Logger,
  SEVERITIES,
  configFromEnv,
  detectLanguages,
  errorMessage,
  isEngineId,
  loadSettingsFile,
  parseBoolean,
  resolveAnalyzerConfig,
  resolveBinary,
  runProcess,
  type AnalyzerConfig,
  type BinaryResolver,
  type ConfigLayer,
  type Finding,
  type Language,
  type ProcessRunner,
} from '@sastweave/core';
import {
  createAdapters,
  dispatch,
  listEngines,
  normalize,
  type DispatchResult,
  type EngineAdapter,
  type EngineContext,
  type EngineRegistry,
} from '@sastweave/engines';
import {
  ReachabilityAugmenter,
  dockerSessionFactory,
  type ReachabilityOracle,
  type SessionFactory,
} from '@sastweave/reachability';
import { OpenAiVerificationOracle, PatchVerifier, type VerificationOracle } from '@sastweave/verify';
import { buildReports, writeReports, type ReportBundle } from '@sastweave/sarif';

type OptValue = string | boolean | string[];
export type ParsedArgs = {
  scanPath?: string;
  opts: Record<string, OptValue>;
  command: 'scan' | 'list-engines';
  showHelp?: boolean;
  helpTarget?: 'general' | 'scan' | 'list-engines';
};

const BOOLEAN_FLAGS = new Set(['list-engines', 'help', 'enable-llm', 'enable-reachability', 'verbose', 'quiet']);

const REPEATABLE_FLAGS = new Set(['disable-tool']);

const VALUE_FLAGS = new Set([
  'out-dir',
  'config',
  'concurrency',
  'llm-url',
  'llm-key',
  'llm-model',
  'tools',
  ...ENGINE_IDS.map((id) => `timeout-${id}`),
]);

const USAGE = 'Usage: sastweave scan <path> [options]';

function pushOpt(opts: Record<string, OptValue>, key: string, value: string) {
  const cur = opts[key];
  if (cur === undefined) {
    opts[key] = value;
    return;
  }
  if (Array.isArray(cur)) {
    cur.push(value);
    return;
  }
  opts[key] = [String(cur), value];
}

function hasHelpFlag(argv: string[]): boolean {
  return argv.includes('--help') || argv.includes('-h');
}

export function getHelpText(target: ParsedArgs['helpTarget'] = 'general'): string {
  const general = [
    'sastweave',
    '',
    'Usage:',
    '  sastweave scan <path> [options]',
    '  sastweave --list-engines',
    '  sastweave --help',
    '',
    'Commands:',
    '  scan             Analyze a project and write SARIF reports',
    '  --list-engines   List analysis tools, their availability and versions',
    '',
    'Run `sastweave scan --help` for scan options.',
  ].join('\n');

  const scan = [
    'sastweave scan',
    '',
    'Usage:',
    '  sastweave scan <path> [options]',
    '',
    'Options:',
    '  --out-dir <dir>           Report directory (default: sastweave-out)',
    '  --config <path>           YAML settings file (default: ./sastweave.yml when present)',
    '  --concurrency <n>         Parallel tools / findings (default: 4)',
    '  --tools <csv>             Only run these tools (codeql,joern,spotbugs,bandit,semgrep)',
    '  --disable-tool <id>       Skip a tool; repeatable',
    '  --timeout-<tool> <sec>    Per-tool timeout, e.g. --timeout-codeql 3600',
    '  --enable-reachability     Add call-graph reachability evidence (needs docker)',
    '  --enable-llm              Ask an LLM to verify findings and propose patches',
    '  --llm-url <url>           OpenAI-compatible endpoint (default: http://localhost:11434)',
    '  --llm-key <key>           API key for the endpoint',
    '  --llm-model <name>        Model name (default: qwen2.5:7b)',
    '  --verbose                 Debug logging',
    '  --quiet                   Warnings and errors only',
    '',
    'Environment: SASTWEAVE_* variables override the settings file; flags override both.',
  ].join('\n');

  const listEnginesHelp = [
    'sastweave list engines',
    '',
    'Usage:',
    '  sastweave --list-engines',
    '',
    'Prints one line per tool as:',
    '  <engineId>\tenabled=<true|false>\tavailable=<true|false>\tversion=<version>\thint=<installHint>',
  ].join('\n');

  if (target === 'scan') return scan;
  if (target === 'list-engines') return listEnginesHelp;
  return general;
}

function parseOpts(tokens: readonly string[]): Record<string, OptValue> {
  const opts: Record<string, OptValue> = {};
  for (let i = 0; i < tokens.length; i++) {
    const token = tokens[i];
    if (token === '-h') continue;
    if (!token.startsWith('--')) throw new ConfigError(`unexpected argument "${token}". ${USAGE}`);

    // support --key=value
    const eqIdx = token.indexOf('=');
    const key = (eqIdx >= 0 ? token.slice(2, eqIdx) : token.slice(2)).trim();
    const valueInline = eqIdx >= 0 ? token.slice(eqIdx + 1) : undefined;

    if (BOOLEAN_FLAGS.has(key)) {
      // --flag=false is a value
      opts[key] = valueInline ?? true;
      continue;
    }

    if (!VALUE_FLAGS.has(key) && !REPEATABLE_FLAGS.has(key)) {
      throw new ConfigError(`unknown option --${key}. Run \`sastweave scan --help\` for options.`);
    }

    const val = valueInline ?? tokens[i + 1];
    if (val === undefined || (valueInline === undefined && val.startsWith('--'))) {
      throw new ConfigError(`--${key} needs a value`);
    }
    if (valueInline === undefined) i += 1;

    if (REPEATABLE_FLAGS.has(key)) pushOpt(opts, key, val);
    else opts[key] = val;
  }
  return opts;
}

export function parseArgs(argv: string[]): ParsedArgs {
  const normalized = argv[0] === '--' ? argv.slice(1) : argv;
  const showHelp = hasHelpFlag(normalized);

  if (normalized.includes('--list-engines')) {
    return {
      command: 'list-engines',
      opts: parseOpts(normalized),
      showHelp,
      helpTarget: showHelp ? 'list-engines' : undefined,
    };
  }

  const [command, scanPath, ...rest] = normalized;

  if (showHelp) {
    if (command === 'scan') {
      return {
        command: 'scan',
        scanPath: scanPath?.startsWith('-') ? undefined : scanPath,
        opts: {},
        showHelp: true,
        helpTarget: 'scan',
      };
    }
    return { command: 'scan', opts: {}, showHelp: true, helpTarget: 'general' };
  }

  if (command !== 'scan' || !scanPath || scanPath.startsWith('--')) throw new ConfigError(USAGE);

  return { command: 'scan', scanPath, opts: parseOpts(rest) };
}

export function parseListOpt(value: string | readonly string[] | undefined, defaults: readonly string[]): string[] {
  let raw = '';
  if (typeof value === 'string') raw = value;
  else if (Array.isArray(value)) raw = value.join(',');

  const parsed = raw
    .split(/[\s,]+/)
    .map((entry: string) => entry.trim().toLowerCase())
    .filter(Boolean);
  const deduped = [...new Set(parsed)];
  return deduped.length ? deduped : [...defaults];
}

function stringOpt(opts: Record<string, OptValue>, key: string): string | undefined {
  const value = opts[key];
  if (value === undefined) return undefined;
  if (typeof value === 'string') return value;
  if (Array.isArray(value)) return value[value.length - 1];
  throw new ConfigError(`--${key} needs a value`);
}

function numberOpt(opts: Record<string, OptValue>, key: string): number | undefined {
  const raw = stringOpt(opts, key);
  if (raw === undefined) return undefined;
  const value = Number(raw);
  if (!Number.isFinite(value) || value <= 0) throw new ConfigError(`--${key} must be a positive number, got "${raw}"`);
  return value;
}

function flagOpt(opts: Record<string, OptValue>, key: string): boolean | undefined {
  const value = opts[key];
  if (value === undefined || typeof value === 'boolean') return value;
  const raw = Array.isArray(value) ? value[value.length - 1] : value;
  const parsed = parseBoolean(raw);
  if (parsed === undefined) throw new ConfigError(`--${key} must be true or false, got "${raw}"`);
  return parsed;
}

function toolListOpt(opts: Record<string, OptValue>, key: string): string[] | undefined {
  const value = opts[key];
  if (value === undefined) return undefined;
  if (typeof value === 'boolean') throw new ConfigError(`--${key} needs a value`);

  const ids = parseListOpt(value, []);
  for (const id of ids) {
    if (!isEngineId(id)) throw new ConfigError(`unknown tool "${id}" in --${key} (known: ${ENGINE_IDS.join(', ')})`);
  }
  return ids;
}

/** Command-line layer: the highest-precedence ConfigLayer. */
export function configFromArgs(opts: Record<string, OptValue>): ConfigLayer {
  const only = toolListOpt(opts, 'tools');
  const disabled = toolListOpt(opts, 'disable-tool') ?? [];

  const tools: NonNullable<ConfigLayer['tools']> = {};
  for (const id of ENGINE_IDS) {
    let enabled: boolean | undefined = only ? only.includes(id) : undefined;
    if (disabled.includes(id)) enabled = false;
    const timeoutSec = numberOpt(opts, `timeout-${id}`);
    if (enabled !== undefined || timeoutSec !== undefined) tools[id] = { enabled, timeoutSec };
  }

  const concurrency = numberOpt(opts, 'concurrency');
  if (concurrency !== undefined && !Number.isInteger(concurrency)) {
    throw new ConfigError(`--concurrency must be a whole number, got ${concurrency}`);
  }

  return {
    outDir: stringOpt(opts, 'out-dir'),
    concurrency,
    llm: {
      enabled: flagOpt(opts, 'enable-llm'),
      url: stringOpt(opts, 'llm-url'),
      apiKey: stringOpt(opts, 'llm-key'),
      model: stringOpt(opts, 'llm-model'),
    },
    reachability: { enabled: flagOpt(opts, 'enable-reachability') },
    tools,
  };
}

/** Settings file < environment < command line. */
export function resolveConfig(
  opts: Record<string, OptValue>,
  env: NodeJS.ProcessEnv = process.env,
  cwd = process.cwd()
): AnalyzerConfig {
  return resolveAnalyzerConfig([loadSettingsFile(stringOpt(opts, 'config'), cwd), configFromEnv(env), configFromArgs(opts)]);
}

export interface PipelineDeps {
  exec?: ProcessRunner;
  which?: BinaryResolver;
  adapters?: readonly EngineAdapter[];
  registry?: EngineRegistry;
  sessions?: SessionFactory;
  reachabilityOracles?: ReachabilityOracle[];
  verificationOracle?: VerificationOracle;
  promptDirs?: string[];
  signal?: AbortSignal;
}

export interface PipelineResult {
  projectRoot: string;
  languages: Language[];
  dispatch: DispatchResult[];
  findings: Finding[];
  bundle: ReportBundle;
  written: string[];
}

const STAGES = ['detect', 'dispatch', 'normalize', 'augment', 'verify', 'report'] as const;

function stage(name: (typeof STAGES)[number], detail: string) {
  Logger.info(`[${STAGES.indexOf(name) + 1}/${STAGES.length}] ${name}: ${detail}`);
}

async function projectRootOf(projectPath: string): Promise<string> {
  const root = path.resolve(projectPath);
  let stat: fs.Stats;
  try {
    stat = await fs.promises.stat(root);
  } catch (error) {
    throw new FatalIOError(root, 'read project', error);
  }
  if (!stat.isDirectory()) throw new FatalIOError(root, 'read project', new Error('not a directory'));
  return root;
}

/**
 * detect -> dispatch -> normalize -> augment -> verify -> report.
 * Tool, reachability and verification failures only cost their own results;
 * FatalIOError and CancelledError are the only rejections.
 */
export async function runPipeline(
  projectPath: string,
  config: AnalyzerConfig,
  deps: PipelineDeps = {}
): Promise<PipelineResult> {
  const { signal } = deps;
  const projectRoot = await projectRootOf(projectPath);

  stage('detect', projectRoot);
  const languages = detectLanguages(projectRoot);
  Logger.info(`languages: ${languages.length ? languages.join(', ') : 'none'}`);

  const ctx: EngineContext = {
    projectRoot,
    config,
    exec: deps.exec ?? runProcess,
    which: deps.which ?? resolveBinary,
    signal,
  };
  const adapters = deps.adapters ?? createAdapters();

  stage('dispatch', `concurrency ${config.concurrency}`);
  const results = await dispatch(ctx, languages, adapters, deps.registry);
  if (results.length) Logger.info(`tools: ${results.map((r) => `${r.unitId}=${r.meta.status}`).join(' ')}`);

  stage('normalize', `${results.filter((r) => r.output !== undefined).length} report(s)`);
  let findings = normalize(results, projectRoot, adapters);
  Logger.info(`${findings.length} finding(s)`);

  if (config.reachability.enabled) {
    stage('augment', `${findings.length} finding(s)`);
    const augmenter = new ReachabilityAugmenter(config, {
      sessions: deps.sessions ?? dockerSessionFactory(ctx.exec),
      oracles: deps.reachabilityOracles,
    });
    findings = await augmenter.augment(findings, projectRoot, signal);
  } else {
    stage('augment', 'skipped (reachability disabled)');
  }

  if (config.llm.enabled) {
    stage('verify', `${findings.length} finding(s) with ${config.llm.model}`);
    const verifier = new PatchVerifier(config, {
      oracle: deps.verificationOracle ?? new OpenAiVerificationOracle(config.llm),
      promptDirs: deps.promptDirs,
    });
    findings = await verifier.verifyAll(findings, projectRoot, signal);
  } else {
    stage('verify', 'skipped (LLM disabled)');
  }

  if (signal?.aborted) throw new CancelledError();

  const outDir = path.resolve(config.outDir);
  stage('report', outDir);
  const bundle = buildReports(findings, results);
  const written = await writeReports(outDir, bundle);

  return { projectRoot, languages, dispatch: results, findings, bundle, written };
}

export function summarizeFindings(findings: readonly Finding[]): string {
  const counts = SEVERITIES.map((severity) => `${severity}=${findings.filter((f) => f.severity === severity).length}`);
  return `findings=${findings.length} ${counts.join(' ')}`;
}

function applyLogLevel(opts: Record<string, OptValue>) {
  if (flagOpt(opts, 'verbose')) Logger.setLevel(LogLevel.DEBUG);
  else if (flagOpt(opts, 'quiet')) Logger.setLevel(LogLevel.WARN);
}

async function main() {
  const parsed = parseArgs(process.argv.slice(2));

  if (parsed.showHelp) {
    console.log(getHelpText(parsed.helpTarget));
    return;
  }

  applyLogLevel(parsed.opts);
  const config = resolveConfig(parsed.opts);

  if (parsed.command === 'list-engines') {
    const ctx: EngineContext = { projectRoot: process.cwd(), config, exec: runProcess, which: resolveBinary };
    for (const entry of await listEngines(ctx)) {
      console.log(
        `${entry.engineId}\tenabled=${entry.enabled}\tavailable=${entry.available}\tversion=${entry.version}\thint=${entry.installHint}`
      );
    }
    return;
  }

  if (!parsed.scanPath) throw new ConfigError(USAGE);

  const controller = new AbortController();
  const onSignal = (sig: NodeJS.Signals) => {
    Logger.warn(`${sig} received; stopping tools and removing containers`);
    controller.abort();
  };
  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);

  try {
    const result = await runPipeline(parsed.scanPath, config, { signal: controller.signal });
    console.log(`sastweave: wrote ${result.written.length} report(s) to ${path.resolve(config.outDir)}`);
    console.log(`Tools: ${result.dispatch.map((r) => `${r.unitId}=${r.meta.status}`).join(' ') || 'none'}`);
    console.log(`sastweave ${summarizeFindings(result.findings)}`);
  } finally {
    process.off('SIGINT', onSignal);
    process.off('SIGTERM', onSignal);
  }
}

const isDirectRun = (() => {
  const arg1 = process.argv[1];
  if (!arg1) return false;
  try {
    return import.meta.url === pathToFileURL(arg1).href;
  } catch {
    return false;
  }
})();

if (isDirectRun) {
  main().catch((err: unknown) => {
    if (err instanceof CancelledError) {
      Logger.warn(err.message);
      process.exit(130);
    }
    Logger.error(errorMessage(err), err);
    process.exit(1);
  });
}
