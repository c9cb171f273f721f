import {
  LogLevel,
  createStructuredEvent,
  shouldLog,
  type StructuredLogEvent
} from "@gto-broker/shared";
import type { LogSink } from "./sinks/types";

export interface StructuredLoggerOptions {
  sessionId: string;
  baseComponent: string;
  level: LogLevel;
  sinks: LogSink[];
  queueSize?: number;
  /** Receives sink failures. Defaults to console. */
  fallback?: Pick<Console, "warn">;
}

export interface LogOptions {
  component?: string;
}

/**
 * The part of a logger a component needs. Components receive one of these
 * through their options so tests can swap in a recording logger.
 */
export interface ComponentLogger {
  log(level: LogLevel, event: string, payload?: Record<string, unknown>, options?: LogOptions): void;
  child(component: string, defaultContext?: Record<string, unknown>): ComponentLogger;
}

export class StructuredLogger implements ComponentLogger {
  private readonly queue: StructuredLogEvent[] = [];
  private draining: Promise<void> | null = null;
  private stopped = false;
  private readonly queueSize: number;
  private dropped = 0;
  private readonly fallback: Pick<Console, "warn">;

  constructor(private readonly options: StructuredLoggerOptions) {
    this.queueSize = Math.max(100, options.queueSize ?? 1000);
    this.fallback = options.fallback ?? console;
  }

  get sessionId(): string {
    return this.options.sessionId;
  }

  async start() {
    await Promise.all(
      this.options.sinks.map(async sink => {
        if (sink.start) {
          await sink.start();
        }
      })
    );
  }

  async stop() {
    this.stopped = true;
    await this.flushOutstanding();
    await Promise.all(
      this.options.sinks.map(async sink => {
        if (sink.stop) {
          await sink.stop();
        }
      })
    );
  }

  async flushOutstanding() {
    while (this.queue.length > 0 || this.draining) {
      await this.drainQueue();
    }
    await Promise.all(
      this.options.sinks.map(async sink => {
        if (sink.flush) {
          await sink.flush();
        }
      })
    );
  }

  log(level: LogLevel, event: string, payload?: Record<string, unknown>, logOptions?: LogOptions) {
    if (this.stopped || !shouldLog(level, this.options.level)) {
      return;
    }
    const structured = createStructuredEvent({
      sessionId: this.options.sessionId,
      component: logOptions?.component ?? this.options.baseComponent,
      level,
      event,
      payload: { ...payload }
    });
    if (this.queue.length >= this.queueSize) {
      this.dropped += 1;
      if (this.dropped === 1) {
        this.fallback.warn(`[structured-logger] queue full, dropping ${structured.event}`);
      }
      return;
    }
    this.queue.push(structured);
    this.drainQueue().catch(error => {
      this.fallback.warn("[structured-logger] drain failed", error);
    });
  }

  child(component: string, defaultContext?: Record<string, unknown>): ComponentLogger {
    const mergedContext = { ...defaultContext };
    return {
      log: (level, event, payload, options) => {
        this.log(level, event, { ...mergedContext, ...payload }, { ...options, component });
      },
      child: (nextComponent, childContext) => this.child(nextComponent, { ...mergedContext, ...childContext })
    };
  }

  private drainQueue(): Promise<void> {
    if (!this.draining) {
      this.draining = this.runDrain().finally(() => {
        this.draining = null;
      });
    }
    return this.draining;
  }

  private async runDrain() {
    let next = this.queue.shift();
    while (next) {
      const current = next;
      await Promise.allSettled(
        this.options.sinks.map(async sink => {
          try {
            await sink.publish(current);
          } catch (error) {
            if (sink.name !== "console") {
              this.fallback.warn(`[structured-logger] sink ${sink.name} failed`, error);
            }
          }
        })
      );
      next = this.queue.shift();
    }
  }
}

/** A logger that discards everything; the default for components built without one. */
export const silentLogger: ComponentLogger = {
  log() {
    return undefined;
  },
  child() {
    return silentLogger;
  }
};
