// packages/reachability/src/oracles.ts
import fs from 'node:fs';
import { z } from 'zod';
import {
  Logger,
  ToolExecutionError,
  type Finding,
  type Language,
  type ProcessResult,
  type ReachabilityEvidence,
} from '@sastweave/core';
import type { ContainerSession } from './container.js';
import { enclosingFunction, javaClassName, parseCallGraphDot, resolveFunction, shortestCallPath } from './callgraph.js';

export interface OracleRequest {
  finding: Finding;
  /** Host path of the flagged file. */
  absPath: string;
  /** Path relative to the project root, POSIX separators (also valid inside the container). */
  relPath: string;
  /** Epoch ms by which every container step must be done. */
  deadline: number;
}

/** Answers "is this line reachable from an entry point" for one language family. */
export interface ReachabilityOracle {
  readonly name: string;
  readonly languages: readonly Language[];
  readonly image: string;
  evaluate(session: ContainerSession, request: OracleRequest): Promise<ReachabilityEvidence>;
}

export function diagnostic(message: string): ReachabilityEvidence {
  return { reachable: false, callStack: [message], dataFlow: [] };
}

function firstOutputLine(result: ProcessResult): string {
  return (result.stderr || result.stdout).trim().split(/\r?\n/)[0] ?? '';
}

async function step(
  tool: string,
  session: ContainerSession,
  argv: string[],
  deadline: number,
  cwd?: string
): Promise<ProcessResult> {
  const result = await session.exec(argv, { cwd, timeoutMs: Math.max(1, deadline - Date.now()) });
  if (result.timedOut) {
    // only the exec client was killed; removing the container stops the step itself
    await session.dispose();
    throw new ToolExecutionError(tool, 'timed out', { timedOut: true });
  }
  return result;
}

/** Scratch name inside the container's /tmp for a project file. */
function scratchName(relPath: string): string {
  return relPath.replace(/[\\/]/g, '_');
}

/** C/C++: LLVM bitcode -> SVF Andersen call graph -> BFS from `main`. */
export class SvfOracle implements ReachabilityOracle {
  readonly name = 'svf';
  readonly languages: readonly Language[] = ['c', 'cpp'];

  constructor(readonly image: string) {}

  async evaluate(session: ContainerSession, request: OracleRequest): Promise<ReachabilityEvidence> {
    const { relPath, deadline } = request;
    const work = `/tmp/svf-${scratchName(relPath)}`;
    const bitcode = `${work}/module.bc`;

    await step('svf', session, ['mkdir', '-p', work], deadline);

    const compile = await step('clang', session, ['clang', '-c', '-emit-llvm', '-g', relPath, '-o', bitcode], deadline);
    if (compile.code !== 0) return diagnostic(`Compilation failed: ${firstOutputLine(compile)}`);

    // wpa drops callgraph_final.dot into its working directory
    const wpa = await step('wpa', session, ['wpa', '-ander', '-dump-callgraph', bitcode], deadline, work);
    if (wpa.code !== 0) return diagnostic(`SVF analysis failed: ${firstOutputLine(wpa)}`);

    const dot = await step('svf', session, ['cat', `${work}/callgraph_final.dot`], deadline);
    if (dot.code !== 0 || !dot.stdout.trim()) return diagnostic('SVF produced no call graph');

    const graph = parseCallGraphDot(dot.stdout);
    const source = await fs.promises.readFile(request.absPath, 'utf8');
    const enclosing = enclosingFunction(source, request.finding.line);
    if (!enclosing) return diagnostic(`No enclosing function for ${relPath}:${request.finding.line}`);

    const target = resolveFunction(graph, enclosing);
    if (!target) return diagnostic(`${enclosing} is not in the call graph`);

    const chain = shortestCallPath(graph, 'main', target);
    if (!chain) return { reachable: false, callStack: [], dataFlow: [] };

    return {
      reachable: true,
      callStack: [...chain.slice(0, -1), `${chain[chain.length - 1]} (${relPath}:${request.finding.line})`],
      dataFlow: chain.slice(1).map((callee, i) => `${chain[i]} -> ${callee}`),
    };
  }
}

const SOOTUP_JAR = '/opt/sootup/sootup-cli.jar';

const SootUpSummarySchema = z.object({
  reachable: z.boolean(),
  callStack: z.array(z.string()).optional(),
  dataFlow: z.array(z.string()).optional(),
});

/** SootUp prints either a JSON summary line or a plain `Reachable` marker. */
export function readSootUpOutput(stdout: string, location: string): ReachabilityEvidence {
  for (const line of stdout.split(/\r?\n/).reverse()) {
    const text = line.trim();
    if (!text.startsWith('{')) continue;
    try {
      const summary = SootUpSummarySchema.safeParse(JSON.parse(text));
      if (summary.success) {
        return {
          reachable: summary.data.reachable,
          callStack: summary.data.callStack ?? (summary.data.reachable ? [location] : []),
          dataFlow: summary.data.dataFlow ?? [],
        };
      }
    } catch {
      Logger.debug(`sootup: ignoring non-JSON line: ${text.slice(0, 80)}`);
    }
  }
  return /\bReachable\b/.test(stdout)
    ? { reachable: true, callStack: [location], dataFlow: [] }
    : { reachable: false, callStack: [], dataFlow: [] };
}

/** Java: javac into the container's /tmp, then SootUp over the bytecode. */
export class SootUpOracle implements ReachabilityOracle {
  readonly name = 'sootup';
  readonly languages: readonly Language[] = ['java'];

  constructor(readonly image: string) {}

  async evaluate(session: ContainerSession, request: OracleRequest): Promise<ReachabilityEvidence> {
    const { relPath, deadline } = request;
    const classes = `/tmp/sootup-${scratchName(relPath)}`;

    await step('sootup', session, ['mkdir', '-p', classes], deadline);
    const javac = await step('javac', session, ['javac', '-d', classes, '-sourcepath', '.', relPath], deadline);
    if (javac.code !== 0) return diagnostic(`Compilation failed: ${firstOutputLine(javac)}`);

    const source = await fs.promises.readFile(request.absPath, 'utf8');
    const className = javaClassName(source, relPath);
    const location = `${className}:${request.finding.line}`;

    const run = await step(
      'sootup',
      session,
      [
        'java',
        '-jar',
        SOOTUP_JAR,
        '--input-dir',
        classes,
        '--class-name',
        className,
        '--line',
        String(request.finding.line),
        '--analysis',
        'reachability',
      ],
      deadline
    );
    if (run.code !== 0) return diagnostic(`SootUp analysis failed: ${firstOutputLine(run)}`);
    return readSootUpOutput(run.stdout, location);
  }
}
