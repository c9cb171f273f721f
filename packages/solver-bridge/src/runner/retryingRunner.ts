import { setTimeout as delay } from "node:timers/promises";
import { LogLevel, ProcessExecutionError, SpawnFailureError } from "@gto-broker/shared";
import { silentLogger, type ComponentLogger } from "@gto-broker/logger";
import type { ProcessInvocation } from "../command/types";
import type { ProcessRunner, RawOutput } from "./types";

export interface RetryPolicy {
  backoffMs: number;
  retryOnTimeout: boolean;
}

export interface RetryingRunnerOptions extends RetryPolicy {
  logger?: ComponentLogger;
  sleep?: (ms: number) => Promise<void>;
}

/** True for failures worth one more attempt: resource exhaustion, and timeouts when enabled. */
export function isRetryable(error: unknown, policy: Pick<RetryPolicy, "retryOnTimeout">): boolean {
  if (!(error instanceof ProcessExecutionError) || error instanceof SpawnFailureError) {
    return false;
  }
  if (error.reason === "timeout") {
    return policy.retryOnTimeout;
  }
  return error.transient;
}

/** Wraps a runner with a single retry after a fixed backoff. */
export class RetryingRunner implements ProcessRunner {
  private readonly logger: ComponentLogger;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(private readonly inner: ProcessRunner, private readonly options: RetryingRunnerOptions) {
    this.logger = options.logger ?? silentLogger;
    this.sleep = options.sleep ?? (async ms => {
      await delay(ms);
    });
  }

  async run(invocation: ProcessInvocation, timeoutMs: number): Promise<RawOutput> {
    try {
      return await this.inner.run(invocation, timeoutMs);
    } catch (error) {
      if (!isRetryable(error, this.options)) {
        throw error;
      }
      this.logger.log(LogLevel.WARN, "solver.process.retry", {
        backoffMs: this.options.backoffMs,
        reason: error instanceof ProcessExecutionError ? error.reason : "unknown",
        message: error instanceof Error ? error.message : String(error)
      });
      await this.sleep(this.options.backoffMs);
      return this.inner.run(invocation, timeoutMs);
    }
  }
}
