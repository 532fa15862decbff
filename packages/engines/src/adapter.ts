// packages/engines/src/adapter.ts
import fs from 'node:fs';
import path from 'node:path';
import { ToolExecutionError } from '@sastweave/core';
import type {
  AnalyzerConfig,
  BinaryResolver,
  EngineId,
  Finding,
  Language,
  ProcessRunner,
  SeverityTable,
  ToolIdentity,
} from '@sastweave/core';

export interface EngineContext {
  /** Absolute project root. */
  projectRoot: string;
  config: AnalyzerConfig;
  exec: ProcessRunner;
  which: BinaryResolver;
  signal?: AbortSignal;
}

/** What a parser needs besides the raw output. Parsers never touch the filesystem. */
export interface ParseContext {
  projectRoot: string;
  /** Dispatch unit that produced the output; prefixes finding ids. */
  unitId: string;
  /** Identity recorded at dispatch time (name + detected version). */
  tool: ToolIdentity;
}

export interface EngineAdapter {
  readonly engineId: EngineId;
  readonly displayName: string;
  /** Defaults; a tool's own SARIF driver may supply version and URI. */
  readonly tool: ToolIdentity;
  readonly installHint: string;
  readonly languages: readonly Language[];
  /**
   * 'language': one invocation per detected language (per `unitKey`).
   * 'project': one invocation for the whole project with every applicable language.
   */
  readonly scope: 'language' | 'project';
  readonly severityMap: SeverityTable;

  /** Languages sharing a key share one invocation (C and C++ share a CodeQL database). */
  unitKey?(language: Language): string;

  isAvailable(ctx: EngineContext): Promise<boolean>;
  version(ctx: EngineContext): Promise<string>;

  /**
   * Runs the tool and returns its raw report. Throws ToolUnavailableError or
   * ToolExecutionError; the dispatcher turns those into warnings.
   */
  invoke(ctx: EngineContext, languages: readonly Language[], timeoutMs: number): Promise<string>;

  /** Pure conversion of raw output into Findings. Never throws on bad records. */
  parse(raw: string, ctx: ParseContext): Finding[];
}

/** Binary lookup shared by the adapters: PATH first, then well-known install dirs. */
export class BinaryLocator {
  private resolved?: string;

  constructor(
    readonly name: string,
    readonly extraDirs: readonly string[] = []
  ) {}

  async resolve(ctx: EngineContext): Promise<string | undefined> {
    if (this.resolved) return this.resolved;
    this.resolved = await ctx.which(this.name, this.extraDirs);
    return this.resolved;
  }
}

export function firstLine(text: string): string {
  return (
    text
      .split(/\r?\n/)
      .map((x) => x.trim())
      .find(Boolean) ?? ''
  );
}

/** Version banner of a tool; `unknown` when it prints nothing useful. */
export async function probeVersion(ctx: EngineContext, argv: string[]): Promise<string> {
  const result = await ctx.exec(argv, { timeoutMs: 30_000, signal: ctx.signal });
  return firstLine(result.stdout || result.stderr) || 'unknown';
}

/** Milliseconds left before `deadline`, never less than 1. */
export function remaining(deadline: number): number {
  return Math.max(1, deadline - Date.now());
}

export async function readReport(tool: string, file: string): Promise<string> {
  try {
    return await fs.promises.readFile(file, 'utf8');
  } catch (error) {
    throw new ToolExecutionError(tool, `did not write ${path.basename(file)}`, { cause: error });
  }
}
