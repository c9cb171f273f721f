import { shouldLog, type LogLevel, type StructuredLogEvent } from "@gto-broker/shared";

export interface LogSink {
  readonly name: string;
  level: LogLevel;
  start?(): Promise<void> | void;
  stop?(): Promise<void> | void;
  flush?(): Promise<void> | void;
  publish(event: StructuredLogEvent): Promise<void>;
}

/** Collects events in memory. */
export function createMemorySink(level: LogLevel, events: StructuredLogEvent[] = []): LogSink & { events: StructuredLogEvent[] } {
  return {
    name: "memory",
    level,
    events,
    async publish(event) {
      if (shouldLog(event.level, level)) {
        events.push(event);
      }
    }
  };
}
