// packages/core/src/errors.ts

/**
 * Base class for every error the pipeline raises on purpose.
 * Anything else reaching the CLI is treated as a bug.
 */
export class SastweaveError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Binary or runtime dependency not found. The tool is skipped. */
export class ToolUnavailableError extends SastweaveError {
  readonly tool: string;

  constructor(tool: string, hint?: string) {
    super(hint ? `${tool} is not installed. ${hint}` : `${tool} is not installed`);
    this.tool = tool;
  }
}

/** Non-zero exit (outside the tool's accepted codes) or timeout. */
export class ToolExecutionError extends SastweaveError {
  readonly tool: string;
  readonly exitCode?: number;
  readonly timedOut: boolean;

  constructor(tool: string, message: string, opts: { exitCode?: number; timedOut?: boolean; cause?: unknown } = {}) {
    super(`${tool}: ${message}`, { cause: opts.cause });
    this.tool = tool;
    this.exitCode = opts.exitCode;
    this.timedOut = opts.timedOut ?? false;
  }
}

export class MalformedOutputError extends SastweaveError {}

/** Best-effort compilation step failed; analysis continues without that unit. */
export class BuildFailureError extends SastweaveError {
  readonly source: string;

  constructor(source: string, detail: string) {
    super(`build failed for ${source}: ${detail}`);
    this.source = source;
  }
}

/** Cannot create the output directory or write a report. Aborts the run. */
export class FatalIOError extends SastweaveError {
  readonly path: string;

  constructor(path: string, action: string, cause?: unknown) {
    const detail = cause instanceof Error ? `: ${cause.message}` : '';
    super(`cannot ${action} ${path}${detail}`, { cause });
    this.path = path;
  }
}

export class ConfigError extends SastweaveError {}

export class CancelledError extends SastweaveError {
  constructor(what = 'run') {
    super(`${what} cancelled`);
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error ?? '');
}

export function isAbortError(error: unknown): boolean {
  return error instanceof CancelledError || (error instanceof Error && error.name === 'AbortError');
}
