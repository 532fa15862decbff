// packages/core/src/process.ts
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { spawn, type ChildProcess } from 'node:child_process';
import { CancelledError, ToolExecutionError, ToolUnavailableError, errorMessage } from './errors.js';
import { Logger } from './logger.js';

export interface ProcessOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  timeoutMs?: number;
  signal?: AbortSignal;
}

export interface ProcessResult {
  code: number;
  stdout: string;
  stderr: string;
  timedOut: boolean;
}

/**
 * Runs an argument vector (never a shell string) and collects its output.
 * Resolves for any exit code, including a timeout (`timedOut: true`).
 * Rejects with ToolUnavailableError when the binary cannot be spawned and
 * with CancelledError when the signal fires.
 */
export type ProcessRunner = (argv: readonly string[], options?: ProcessOptions) => Promise<ProcessResult>;

export type BinaryResolver = (name: string, extraDirs?: readonly string[]) => Promise<string | undefined>;

function killTree(child: ChildProcess) {
  const pid = child.pid;
  if (pid === undefined || child.exitCode !== null) return;
  try {
    // the child leads its own process group (detached), so this reaches its descendants too
    if (process.platform === 'win32') child.kill('SIGKILL');
    else process.kill(-pid, 'SIGKILL');
  } catch (error) {
    Logger.debug(`kill ${pid}: ${errorMessage(error)}`);
  }
}

export const runProcess: ProcessRunner = (argv, options = {}) => {
  const [file, ...args] = argv;
  if (!file) return Promise.reject(new ToolExecutionError('process', 'empty command'));
  const tool = path.basename(file);
  if (options.signal?.aborted) return Promise.reject(new CancelledError(tool));

  return new Promise((resolve, reject) => {
    Logger.debug(`exec: ${argv.join(' ')}${options.cwd ? ` (cwd ${options.cwd})` : ''}`);

    const child = spawn(file, args, {
      cwd: options.cwd,
      env: options.env ?? process.env,
      detached: process.platform !== 'win32',
      stdio: ['ignore', 'pipe', 'pipe'],
      windowsHide: true,
    });

    const stdout: Buffer[] = [];
    const stderr: Buffer[] = [];
    let timedOut = false;
    let cancelled = false;
    let settled = false;

    child.stdout.on('data', (chunk: Buffer) => stdout.push(chunk));
    child.stderr.on('data', (chunk: Buffer) => stderr.push(chunk));

    const timer =
      options.timeoutMs && options.timeoutMs > 0
        ? setTimeout(() => {
            timedOut = true;
            killTree(child);
          }, options.timeoutMs)
        : undefined;

    const onAbort = () => {
      cancelled = true;
      killTree(child);
    };
    options.signal?.addEventListener('abort', onAbort, { once: true });

    const finish = () => {
      settled = true;
      if (timer) clearTimeout(timer);
      options.signal?.removeEventListener('abort', onAbort);
    };

    child.on('error', (error: NodeJS.ErrnoException) => {
      if (settled) return;
      finish();
      if (error.code === 'ENOENT' || error.code === 'EACCES') reject(new ToolUnavailableError(tool));
      else reject(new ToolExecutionError(tool, error.message, { cause: error }));
    });

    child.on('close', (code, signal) => {
      if (settled) return;
      finish();
      if (cancelled) {
        reject(new CancelledError(tool));
        return;
      }
      resolve({
        code: code ?? (signal ? 128 : 1),
        stdout: Buffer.concat(stdout).toString('utf8'),
        stderr: Buffer.concat(stderr).toString('utf8'),
        timedOut,
      });
    });
  });
};

function tail(text: string, max = 400): string {
  const t = text.trim();
  return t.length > max ? `...${t.slice(-max)}` : t;
}

/**
 * Turns a timeout or an unexpected exit code into a ToolExecutionError.
 * Several tools exit 1 when they report findings, hence `okCodes`.
 */
export function expectExit(tool: string, result: ProcessResult, okCodes: readonly number[] = [0]): ProcessResult {
  if (result.timedOut) throw new ToolExecutionError(tool, 'timed out', { timedOut: true });
  if (!okCodes.includes(result.code)) {
    const detail = tail(result.stderr || result.stdout);
    throw new ToolExecutionError(tool, `exited with code ${result.code}${detail ? `: ${detail}` : ''}`, {
      exitCode: result.code,
    });
  }
  return result;
}

async function isExecutableFile(candidate: string): Promise<boolean> {
  try {
    const st = await fs.promises.stat(candidate);
    if (!st.isFile()) return false;
    await fs.promises.access(candidate, fs.constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Locates a binary on PATH, then in the given well-known directories.
 * No shell is involved.
 */
export const resolveBinary: BinaryResolver = async (name, extraDirs = []) => {
  if (path.isAbsolute(name)) return (await isExecutableFile(name)) ? name : undefined;

  const dirs = [...(process.env.PATH ?? '').split(path.delimiter).filter(Boolean), ...extraDirs];
  const exts = process.platform === 'win32' ? ['', ...(process.env.PATHEXT ?? '.EXE;.CMD;.BAT').split(';')] : [''];

  for (const dir of dirs) {
    for (const ext of exts) {
      const candidate = path.join(dir, `${name}${ext.toLowerCase()}`);
      if (await isExecutableFile(candidate)) return candidate;
    }
  }
  return undefined;
};

/**
 * Creates a private temp directory for transient artifacts (object files,
 * compiled classes, query scripts, databases) and removes it on every exit path.
 */
export async function withScratchDir<T>(label: string, fn: (dir: string) => Promise<T>): Promise<T> {
  const dir = await fs.promises.mkdtemp(path.join(os.tmpdir(), `sastweave-${label}-`));
  try {
    return await fn(dir);
  } finally {
    try {
      await fs.promises.rm(dir, { recursive: true, force: true });
    } catch (error) {
      Logger.warn(`could not remove scratch directory ${dir}: ${errorMessage(error)}`);
    }
  }
}
