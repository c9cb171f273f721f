export { ChildProcessRunner, spawnChild } from "./childProcessRunner";
export type { ChildProcessRunnerOptions } from "./childProcessRunner";
export { RetryingRunner, isRetryable } from "./retryingRunner";
export type { RetryPolicy, RetryingRunnerOptions } from "./retryingRunner";
export { SlotPool } from "./slotPool";
export type { SlotPoolStats } from "./slotPool";
export type { ProcessRunner, RawOutput, SpawnFunction, SpawnOptions, SpawnedProcess } from "./types";
