import { LogLevel, shouldLog, type StructuredLogEvent } from "@gto-broker/shared";
import type { LogSink } from "./types";

export type ConsoleFormat = "json" | "line";

interface ConsoleSinkOptions {
  level: LogLevel;
  format?: ConsoleFormat;
  consoleImpl?: Pick<Console, "debug" | "info" | "warn" | "error">;
}

/** `2026-01-01T00:00:00.000Z INFO solver-bridge solver.request.hit key=v1:ab12` */
export function formatLine(event: StructuredLogEvent): string {
  const fields = Object.entries(event.payload ?? {})
    .filter(([, value]) => value !== undefined)
    .map(([name, value]) => `${name}=${typeof value === "string" ? value : JSON.stringify(value)}`);
  const head = `${new Date(event.timestamp).toISOString()} ${event.level.toUpperCase()} ${event.component} ${event.event}`;
  return fields.length > 0 ? `${head} ${fields.join(" ")}` : head;
}

export function createConsoleSink(options: ConsoleSinkOptions): LogSink {
  const consoleImpl = options.consoleImpl ?? console;
  const render = options.format === "line" ? formatLine : (event: StructuredLogEvent) => JSON.stringify(event);
  return {
    name: "console",
    level: options.level,
    async publish(event: StructuredLogEvent) {
      if (!shouldLog(event.level, options.level)) {
        return;
      }
      const text = render(event);
      switch (event.level) {
        case LogLevel.DEBUG:
          consoleImpl.debug(text);
          break;
        case LogLevel.WARN:
          consoleImpl.warn(text);
          break;
        case LogLevel.ERROR:
        case LogLevel.CRITICAL:
          consoleImpl.error(text);
          break;
        default:
          consoleImpl.info(text);
      }
    }
  };
}
