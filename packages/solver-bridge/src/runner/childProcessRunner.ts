import { spawn } from "node:child_process";
import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { performance } from "node:perf_hooks";
import { LogLevel, ParseError, ProcessExecutionError, SpawnFailureError } from "@gto-broker/shared";
import { silentLogger, type ComponentLogger } from "@gto-broker/logger";
import type { ProcessInvocation } from "../command/types";
import type { ProcessRunner, RawOutput, SpawnFunction, SpawnedProcess } from "./types";

const DEFAULT_KILL_GRACE_MS = 2000;
const DEFAULT_MAX_OUTPUT_BYTES = 1024 * 1024;
const TRANSIENT_SPAWN_CODES = new Set(["EAGAIN", "ENOMEM", "EMFILE", "ENFILE"]);

export interface ChildProcessRunnerOptions {
  spawn?: SpawnFunction;
  killGraceMs?: number;
  /** Exit codes the binary uses for resource exhaustion. */
  transientExitCodes?: readonly number[];
  maxOutputBytes?: number;
  /** Signal the whole process group rather than only the binary. */
  processGroup?: boolean;
  tempRoot?: string;
  logger?: ComponentLogger;
}

export const spawnChild: SpawnFunction = (command, args, options) =>
  spawn(command, [...args], {
    cwd: options.cwd,
    detached: options.detached,
    stdio: ["ignore", "pipe", "pipe"]
  });

/** Keeps the first `limit` bytes of a stream. */
class BoundedCapture {
  private readonly chunks: Buffer[] = [];
  private size = 0;
  private dropped = 0;

  constructor(private readonly limit: number) {}

  push(chunk: Buffer | string): void {
    const buffer = typeof chunk === "string" ? Buffer.from(chunk) : chunk;
    const room = this.limit - this.size;
    if (room <= 0) {
      this.dropped += buffer.length;
      return;
    }
    const kept = buffer.length > room ? buffer.subarray(0, room) : buffer;
    this.chunks.push(kept);
    this.size += kept.length;
    this.dropped += buffer.length - kept.length;
  }

  text(): string {
    const body = Buffer.concat(this.chunks).toString("utf-8");
    return this.dropped > 0 ? `${body}\n[${this.dropped} bytes truncated]` : body;
  }
}

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

type ExecutionResult = Omit<RawOutput, "output">;

/**
 * Runs the solver binary in a private working directory. A run settles only
 * once the process has closed, so a timed-out binary is never left running.
 */
export class ChildProcessRunner implements ProcessRunner {
  private readonly spawnFn: SpawnFunction;
  private readonly killGraceMs: number;
  private readonly transientExitCodes: ReadonlySet<number>;
  private readonly maxOutputBytes: number;
  private readonly processGroup: boolean;
  private readonly tempRoot: string;
  private readonly logger: ComponentLogger;

  constructor(options: ChildProcessRunnerOptions = {}) {
    this.spawnFn = options.spawn ?? spawnChild;
    this.killGraceMs = Math.max(0, options.killGraceMs ?? DEFAULT_KILL_GRACE_MS);
    this.transientExitCodes = new Set(options.transientExitCodes ?? []);
    this.maxOutputBytes = Math.max(1, options.maxOutputBytes ?? DEFAULT_MAX_OUTPUT_BYTES);
    this.processGroup = options.processGroup ?? process.platform !== "win32";
    this.tempRoot = options.tempRoot ?? os.tmpdir();
    this.logger = options.logger ?? silentLogger;
  }

  async run(invocation: ProcessInvocation, timeoutMs: number): Promise<RawOutput> {
    const workdir = await mkdtemp(path.join(this.tempRoot, "gto-solve-"));
    try {
      await writeFile(path.join(workdir, invocation.inputFile), invocation.input, "utf-8");
      const result = await this.execute(invocation, workdir, timeoutMs);
      const output = invocation.outputFile
        ? await this.readResultFile(path.join(workdir, invocation.outputFile), result.stdout)
        : result.stdout;
      return { ...result, output };
    } finally {
      await rm(workdir, { recursive: true, force: true }).catch((error: unknown) => {
        this.logger.log(LogLevel.WARN, "solver.process.cleanup_failed", { workdir, error: String(error) });
      });
    }
  }

  private async readResultFile(filePath: string, stdout: string): Promise<string> {
    try {
      return await readFile(filePath, "utf-8");
    } catch (error) {
      if (errorCode(error) === "ENOENT") {
        throw new ParseError(`Solver exited without writing ${path.basename(filePath)}`, stdout);
      }
      throw error;
    }
  }

  private execute(invocation: ProcessInvocation, workdir: string, timeoutMs: number): Promise<ExecutionResult> {
    return new Promise<ExecutionResult>((resolve, reject) => {
      const startedAt = performance.now();
      const elapsed = () => Math.round(performance.now() - startedAt);

      let child: SpawnedProcess;
      try {
        child = this.spawnFn(invocation.binaryPath, invocation.args, { cwd: workdir, detached: this.processGroup });
      } catch (error) {
        reject(this.spawnError(invocation.binaryPath, error));
        return;
      }

      const stdout = new BoundedCapture(this.maxOutputBytes);
      const stderr = new BoundedCapture(this.maxOutputBytes);
      child.stdout?.on("data", (chunk: Buffer | string) => stdout.push(chunk));
      child.stderr?.on("data", (chunk: Buffer | string) => stderr.push(chunk));

      let settled = false;
      let timedOut = false;
      let killTimer: NodeJS.Timeout | undefined;
      const timeoutTimer = setTimeout(() => {
        timedOut = true;
        this.logger.log(LogLevel.WARN, "solver.process.timeout", { pid: child.pid, timeoutMs });
        this.signal(child, "SIGTERM");
        killTimer = setTimeout(() => this.signal(child, "SIGKILL"), this.killGraceMs);
      }, timeoutMs);

      const finish = (outcome: () => void) => {
        if (settled) {
          return;
        }
        settled = true;
        clearTimeout(timeoutTimer);
        if (killTimer) {
          clearTimeout(killTimer);
        }
        outcome();
      };

      child.on("error", error => {
        if (child.pid === undefined) {
          // Never started, so no close event follows.
          finish(() => reject(this.spawnError(invocation.binaryPath, error)));
          return;
        }
        this.logger.log(LogLevel.WARN, "solver.process.error", { pid: child.pid, error: error.message });
      });

      child.once("close", (code, signal) => {
        finish(() => {
          const durationMs = elapsed();
          if (timedOut) {
            reject(
              new ProcessExecutionError(`Solver timed out after ${timeoutMs}ms`, {
                reason: "timeout",
                exitCode: code,
                signal,
                stderr: stderr.text(),
                durationMs
              })
            );
            return;
          }
          if (code === 0) {
            resolve({ stdout: stdout.text(), stderr: stderr.text(), exitCode: 0, durationMs });
            return;
          }
          if (signal) {
            reject(
              new ProcessExecutionError(`Solver was killed by ${signal}`, {
                reason: "signal",
                signal,
                stderr: stderr.text(),
                transient: signal === "SIGKILL",
                durationMs
              })
            );
            return;
          }
          reject(
            new ProcessExecutionError(`Solver exited with code ${code ?? "unknown"}`, {
              reason: "exit",
              exitCode: code,
              stderr: stderr.text(),
              transient: code !== null && this.transientExitCodes.has(code),
              durationMs
            })
          );
        });
      });
    });
  }

  private spawnError(binaryPath: string, error: unknown): ProcessExecutionError {
    const code = errorCode(error);
    if (code && TRANSIENT_SPAWN_CODES.has(code)) {
      return new ProcessExecutionError(`Could not start solver: ${code}`, {
        reason: "spawn",
        transient: true,
        cause: error
      });
    }
    return new SpawnFailureError(binaryPath, error);
  }

  private signal(child: SpawnedProcess, signal: NodeJS.Signals): void {
    try {
      if (this.processGroup && child.pid !== undefined) {
        process.kill(-child.pid, signal);
      } else {
        child.kill(signal);
      }
    } catch (error) {
      // ESRCH: the group already exited between the timer and the signal.
      this.logger.log(LogLevel.DEBUG, "solver.process.signal_failed", { pid: child.pid, signal, error: String(error) });
    }
  }
}
