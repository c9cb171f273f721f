import type { Readable } from "node:stream";
import type { ProcessInvocation } from "../command/types";

export interface RawOutput {
  stdout: string;
  stderr: string;
  /** Contents of the dumped result file, or stdout when the dialect has none. */
  output: string;
  exitCode: number;
  durationMs: number;
}

export interface ProcessRunner {
  run(invocation: ProcessInvocation, timeoutMs: number): Promise<RawOutput>;
}

/** The subset of ChildProcess the runner relies on. */
export interface SpawnedProcess {
  readonly pid?: number;
  readonly stdout: Readable | null;
  readonly stderr: Readable | null;
  kill(signal?: NodeJS.Signals): boolean;
  on(event: "error", listener: (error: Error) => void): unknown;
  once(event: "close", listener: (code: number | null, signal: NodeJS.Signals | null) => void): unknown;
}

export interface SpawnOptions {
  cwd: string;
  /** Start the binary as the leader of a new process group. */
  detached: boolean;
}

export type SpawnFunction = (command: string, args: readonly string[], options: SpawnOptions) => SpawnedProcess;
