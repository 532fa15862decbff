// packages/engines/src/compile.ts
import path from 'node:path';
import {
  BuildFailureError,
  Logger,
  ToolUnavailableError,
  languageForPath,
  toPosixPath,
  type ProcessResult,
} from '@sastweave/core';

export interface CompileUnit {
  /** Relative to the project root. */
  source: string;
  /** Absolute output path (object file or classes directory). */
  target: string;
}

export interface CompileInvocation {
  argv: string[];
  sources: string[];
}

/**
 * Declarative build for tools that need compiled artifacts. Targets always
 * live under `outputDir`, a scratch directory owned by the caller.
 */
export interface CompilePlan {
  compiler: string;
  outputDir: string;
  units: CompileUnit[];
  invocations: CompileInvocation[];
}

const NATIVE_SOURCE_EXTS = new Set(['.c', '.cpp', '.cc', '.cxx']);

/** `src/net/io.c` -> `src_net_io.c.o`, so equal basenames in different dirs never collide. */
export function objectNameFor(relSource: string): string {
  return `${toPosixPath(relSource).replace(/^\.\//, '').replace(/\//g, '_')}.o`;
}

function relativeSources(root: string, sources: readonly string[]): string[] {
  return sources.map((s) => toPosixPath(path.isAbsolute(s) ? path.relative(root, s) : s));
}

/** One `-c` invocation per translation unit; g++ when any C++ source is present. */
export function planNativeCompile(root: string, sources: readonly string[], outputDir: string): CompilePlan {
  const rel = relativeSources(root, sources).filter((s) => NATIVE_SOURCE_EXTS.has(path.extname(s).toLowerCase()));
  const compiler = rel.some((s) => languageForPath(s) === 'cpp') ? 'g++' : 'gcc';

  const units = rel.map((source) => ({ source, target: path.join(outputDir, objectNameFor(source)) }));
  return {
    compiler,
    outputDir,
    units,
    invocations: units.map((u) => ({ argv: [compiler, '-c', u.source, '-o', u.target], sources: [u.source] })),
  };
}

/** A single javac batch into `outputDir`. */
export function planJavaCompile(root: string, sources: readonly string[], outputDir: string): CompilePlan {
  const rel = relativeSources(root, sources).filter((s) => s.endsWith('.java'));
  const units = rel.map((source) => ({ source, target: outputDir }));
  return {
    compiler: 'javac',
    outputDir,
    units,
    invocations: rel.length
      ? [{ argv: ['javac', '-d', outputDir, '-sourcepath', root, '-nowarn', '-encoding', 'UTF-8', ...rel], sources: rel }]
      : [],
  };
}

export interface CompileOutcome {
  built: number;
  failures: BuildFailureError[];
}

/**
 * Runs every invocation through `run` (directly, or wrapped in a tracer).
 * Failures are collected, never thrown: analysis proceeds with what was built.
 */
export async function executeCompilePlan(
  plan: CompilePlan,
  run: (argv: string[]) => Promise<ProcessResult>
): Promise<CompileOutcome> {
  const failures: BuildFailureError[] = [];
  let built = 0;

  for (const invocation of plan.invocations) {
    const label = invocation.sources.length === 1 ? invocation.sources[0] : `${invocation.sources.length} sources`;
    try {
      const result = await run(invocation.argv);
      if (result.code === 0 && !result.timedOut) {
        built += invocation.sources.length;
        continue;
      }
      const detail = result.timedOut ? 'timed out' : (result.stderr || result.stdout).trim().split(/\r?\n/)[0] ?? '';
      failures.push(new BuildFailureError(label, detail || `exit ${result.code}`));
    } catch (error) {
      if (!(error instanceof ToolUnavailableError)) throw error;
      failures.push(new BuildFailureError(label, error.message));
    }
  }

  for (const failure of failures) Logger.warn(failure.message);
  if (plan.invocations.length > 0) {
    Logger.debug(`${plan.compiler}: built ${built}/${plan.units.length} unit(s)`);
  }
  return { built, failures };
}
