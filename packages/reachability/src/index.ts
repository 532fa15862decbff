// packages/reachability/src/index.ts
import path from 'node:path';
import {
  Logger,
  attachReachability,
  errorMessage,
  isAbortError,
  languageForPath,
  leavesBase,
  resolveFindingPath,
  runPool,
  toPosixPath,
  type AnalyzerConfig,
  type Finding,
  type ReachabilityEvidence,
} from '@sastweave/core';
import type { ContainerSession, SessionFactory } from './container.js';
import { SootUpOracle, SvfOracle, diagnostic, type ReachabilityOracle } from './oracles.js';

export * from './callgraph.js';
export * from './container.js';
export * from './oracles.js';

export const NOT_EVALUATED: Readonly<ReachabilityEvidence> = Object.freeze({
  reachable: false,
  callStack: ['Reachability analysis disabled'],
  dataFlow: [],
});

export function defaultOracles(config: AnalyzerConfig): ReachabilityOracle[] {
  return [new SvfOracle(config.reachability.svfImage), new SootUpOracle(config.reachability.sootupImage)];
}

export interface AugmenterOptions {
  sessions: SessionFactory;
  oracles?: ReachabilityOracle[];
}

/**
 * Container sessions held by one augment() call: at most one per worker slot
 * and oracle, so no two findings ever share a container at the same time.
 */
class SessionPool {
  private readonly sessions = new Map<string, Promise<ContainerSession>>();

  constructor(
    private readonly factory: SessionFactory,
    private readonly projectRoot: string,
    private readonly signal?: AbortSignal
  ) {}

  /** A removed session (e.g. after a step timed out) is replaced by a fresh one. */
  async acquire(slot: number, oracle: ReachabilityOracle): Promise<ContainerSession> {
    const key = `${slot}:${oracle.name}`;
    const current = this.sessions.get(key);
    if (current) {
      const session = await current;
      if (!session.removed) return session;
    }
    const next = this.factory(oracle.image, this.projectRoot, this.signal);
    this.sessions.set(key, next);
    return next;
  }

  async disposeAll(): Promise<void> {
    const settled = await Promise.allSettled(this.sessions.values());
    this.sessions.clear();
    await Promise.all(settled.map((s) => (s.status === 'fulfilled' ? s.value.dispose() : undefined)));
  }
}

export class ReachabilityAugmenter {
  private readonly oracles: ReachabilityOracle[];

  constructor(
    private readonly config: AnalyzerConfig,
    private readonly options: AugmenterOptions
  ) {
    this.oracles = options.oracles ?? defaultOracles(config);
  }

  get enabled(): boolean {
    return this.config.reachability.enabled;
  }

  oracleFor(finding: Finding): ReachabilityOracle | undefined {
    const language = finding.language ?? languageForPath(finding.filePath);
    return language ? this.oracles.find((o) => o.languages.includes(language)) : undefined;
  }

  /** Evidence for one finding in a session the caller owns. Never throws except on cancellation. */
  async evaluate(
    finding: Finding,
    projectRoot: string,
    session?: ContainerSession
  ): Promise<ReachabilityEvidence> {
    if (!this.enabled) return NOT_EVALUATED;

    const oracle = this.oracleFor(finding);
    if (!oracle) {
      const language = finding.language ?? languageForPath(finding.filePath) ?? path.extname(finding.filePath);
      return diagnostic(`Reachability analysis not supported for ${language || 'unknown language'}`);
    }

    const root = path.resolve(projectRoot);
    const absPath = resolveFindingPath(finding.filePath, root);
    const relPath = toPosixPath(path.relative(root, absPath));
    if (!relPath || leavesBase(relPath)) {
      return diagnostic(`${finding.filePath} is outside the project`);
    }

    let active: ContainerSession;
    try {
      active = session ?? (await this.options.sessions(oracle.image, root));
    } catch (error) {
      if (isAbortError(error)) throw error;
      Logger.warn(`reachability ${finding.findingId}: ${oracle.name} container unavailable: ${errorMessage(error)}`);
      return diagnostic(`Error: ${errorMessage(error)}`);
    }

    try {
      return await oracle.evaluate(active, {
        finding,
        absPath,
        relPath,
        deadline: Date.now() + this.config.reachability.timeoutSec * 1000,
      });
    } catch (error) {
      if (isAbortError(error)) throw error;
      Logger.warn(`reachability ${finding.findingId}: ${errorMessage(error)}`);
      return diagnostic(`Error: ${errorMessage(error)}`);
    } finally {
      if (!session) await active.dispose();
    }
  }

  /**
   * Attaches evidence to every finding, `concurrency` at a time. Disabled:
   * returns the input untouched. Containers are removed when the stage ends,
   * whether it finished, failed or was cancelled.
   */
  async augment(findings: readonly Finding[], projectRoot: string, signal?: AbortSignal): Promise<Finding[]> {
    if (!this.enabled) return [...findings];

    const root = path.resolve(projectRoot);
    const pool = new SessionPool(this.options.sessions, root, signal);
    Logger.info(`reachability: evaluating ${findings.length} finding(s)`);

    try {
      return await runPool(
        findings,
        this.config.concurrency,
        async (finding, slot) => {
          const oracle = this.oracleFor(finding);
          let evidence: ReachabilityEvidence;
          if (!oracle) {
            evidence = await this.evaluate(finding, root);
          } else {
            try {
              evidence = await this.evaluate(finding, root, await pool.acquire(slot, oracle));
            } catch (error) {
              if (isAbortError(error)) throw error;
              Logger.warn(`reachability ${finding.findingId}: ${oracle.name} container unavailable: ${errorMessage(error)}`);
              evidence = diagnostic(`Error: ${errorMessage(error)}`);
            }
          }
          return attachReachability(finding, evidence);
        },
        signal
      );
    } finally {
      await pool.disposeAll();
    }
  }
}
