export type SolverBridgeErrorCode =
  | "CONFIGURATION"
  | "PROCESS_EXECUTION"
  | "SPAWN_FAILURE"
  | "PARSE"
  | "NOT_FOUND"
  | "CACHE_IO";

const EXCERPT_LIMIT = 512;

export function excerpt(text: string, limit = EXCERPT_LIMIT): string {
  if (text.length <= limit) {
    return text;
  }
  return `${text.slice(0, limit)}… (${text.length - limit} more chars)`;
}

export class SolverBridgeError extends Error {
  readonly code: SolverBridgeErrorCode;

  constructor(code: SolverBridgeErrorCode, message: string, options: { cause?: unknown } = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "SolverBridgeError";
    this.code = code;
  }
}

/** Invalid situation, hand or solver configuration. Never retried. */
export class ConfigurationError extends SolverBridgeError {
  readonly field: string;

  constructor(message: string, field: string, options: { cause?: unknown } = {}) {
    super("CONFIGURATION", message, options);
    this.name = "ConfigurationError";
    this.field = field;
  }
}

export type ProcessFailureReason = "exit" | "timeout" | "signal" | "spawn";

export interface ProcessExecutionDetails {
  reason: ProcessFailureReason;
  exitCode?: number | null;
  signal?: NodeJS.Signals | null;
  stderr?: string;
  transient?: boolean;
  durationMs?: number;
  cause?: unknown;
}

export class ProcessExecutionError extends SolverBridgeError {
  readonly reason: ProcessFailureReason;
  readonly exitCode: number | null;
  readonly signal: NodeJS.Signals | null;
  readonly stderrExcerpt: string;
  readonly transient: boolean;
  readonly durationMs?: number;

  constructor(message: string, details: ProcessExecutionDetails) {
    super(details.reason === "spawn" ? "SPAWN_FAILURE" : "PROCESS_EXECUTION", message, { cause: details.cause });
    this.name = "ProcessExecutionError";
    this.reason = details.reason;
    this.exitCode = details.exitCode ?? null;
    this.signal = details.signal ?? null;
    this.stderrExcerpt = excerpt(details.stderr ?? "");
    this.transient = details.transient ?? false;
    this.durationMs = details.durationMs;
  }

  get retryable(): boolean {
    return this.transient || this.reason === "timeout";
  }
}

/** The binary could not be started at all: missing or not executable. */
export class SpawnFailureError extends ProcessExecutionError {
  readonly binaryPath: string;

  constructor(binaryPath: string, cause: unknown) {
    super(`Failed to start solver binary '${binaryPath}': ${describeCause(cause)}`, {
      reason: "spawn",
      transient: false,
      cause
    });
    this.name = "SpawnFailureError";
    this.binaryPath = binaryPath;
  }

  override get retryable(): boolean {
    return false;
  }
}

/** Solver output does not match the pinned schema. Never retried. */
export class ParseError extends SolverBridgeError {
  readonly rawExcerpt: string;

  constructor(message: string, raw: string, options: { cause?: unknown } = {}) {
    super("PARSE", message, options);
    this.name = "ParseError";
    this.rawExcerpt = excerpt(raw);
  }
}

export class NotFoundError extends SolverBridgeError {
  readonly lookup: string;

  constructor(message: string, lookup: string) {
    super("NOT_FOUND", message);
    this.name = "NotFoundError";
    this.lookup = lookup;
  }
}

export type CacheOperation = "read" | "write" | "list" | "manifest";

export class CacheIOError extends SolverBridgeError {
  readonly path: string;
  readonly operation: CacheOperation;

  constructor(operation: CacheOperation, path: string, cause: unknown) {
    super("CACHE_IO", `Cache ${operation} failed at ${path}: ${describeCause(cause)}`, { cause });
    this.name = "CacheIOError";
    this.operation = operation;
    this.path = path;
  }
}

export function describeCause(cause: unknown): string {
  if (cause instanceof Error) {
    return cause.message;
  }
  return String(cause);
}
