// packages/reachability/src/container.ts
import path from 'node:path';
import {
  Logger,
  ToolExecutionError,
  errorMessage,
  expectExit,
  type ProcessResult,
  type ProcessRunner,
} from '@sastweave/core';

/** Where the project is mounted inside every analysis container. */
export const CONTAINER_SRC = '/src';

export interface ExecOptions {
  /** Working directory inside the container; defaults to the mounted project. */
  cwd?: string;
  timeoutMs?: number;
}

/** A running analysis container. Exclusive to one worker at a time. */
export interface ContainerSession {
  readonly id: string;
  readonly image: string;
  /** True once dispose() has run. */
  readonly removed: boolean;
  exec(argv: readonly string[], options?: ExecOptions): Promise<ProcessResult>;
  dispose(): Promise<void>;
}

export type SessionFactory = (image: string, projectRoot: string, signal?: AbortSignal) => Promise<ContainerSession>;

/** Container driven through the docker CLI: `run -d`, `exec`, `rm -f`. */
export class DockerSession implements ContainerSession {
  private disposed = false;

  private constructor(
    private readonly run: ProcessRunner,
    readonly id: string,
    readonly image: string,
    private readonly signal?: AbortSignal
  ) {}

  static async start(
    exec: ProcessRunner,
    image: string,
    projectRoot: string,
    signal?: AbortSignal
  ): Promise<DockerSession> {
    const mount = `${path.resolve(projectRoot)}:${CONTAINER_SRC}:ro`;
    const result = expectExit(
      'docker',
      await exec(
        ['docker', 'run', '-d', '--rm', '-v', mount, '-w', CONTAINER_SRC, '--entrypoint', 'sleep', image, 'infinity'],
        { timeoutMs: 120_000, signal }
      )
    );

    const id = result.stdout.trim().split(/\s+/).pop() ?? '';
    if (!id) throw new ToolExecutionError('docker', `no container id for ${image}`);
    Logger.debug(`container ${id.slice(0, 12)} started from ${image}`);
    return new DockerSession(exec, id, image, signal);
  }

  get removed(): boolean {
    return this.disposed;
  }

  exec(argv: readonly string[], options: ExecOptions = {}): Promise<ProcessResult> {
    if (this.disposed) return Promise.reject(new ToolExecutionError('docker', `container ${this.id} already removed`));
    return this.run(['docker', 'exec', '-w', options.cwd ?? CONTAINER_SRC, this.id, ...argv], {
      timeoutMs: options.timeoutMs,
      signal: this.signal,
    });
  }

  /** Idempotent. Never takes the run's signal: cleanup must still happen after a cancel. */
  async dispose(): Promise<void> {
    if (this.disposed) return;
    this.disposed = true;
    try {
      const result = await this.run(['docker', 'rm', '-f', this.id], { timeoutMs: 60_000 });
      if (result.code !== 0) Logger.warn(`could not remove container ${this.id}: ${result.stderr.trim()}`);
    } catch (error) {
      Logger.warn(`could not remove container ${this.id}: ${errorMessage(error)}`);
    }
  }
}

export function dockerSessionFactory(exec: ProcessRunner): SessionFactory {
  return (image, projectRoot, signal) => DockerSession.start(exec, image, projectRoot, signal);
}
