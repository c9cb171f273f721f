import path from "node:path";
import { parseLogLevel, type LoggingConfig } from "@gto-broker/shared";
import { StructuredLogger } from "./structuredLogger";
import { createConsoleSink, type ConsoleFormat } from "./sinks/consoleSink";
import { createFileSink } from "./sinks/fileSink";
import type { LogSink } from "./sinks/types";

export interface BrokerLoggerOptions {
  sessionId: string;
  component?: string;
  /** Overrides `config.level`, e.g. from BROKER_LOG_LEVEL. */
  level?: string;
  format?: ConsoleFormat;
  consoleImpl?: Pick<Console, "debug" | "info" | "warn" | "error">;
  extraSinks?: LogSink[];
}

export function createBrokerLogger(config: LoggingConfig, options: BrokerLoggerOptions): StructuredLogger {
  const level = parseLogLevel(options.level, config.level);
  const sinks: LogSink[] = [];
  if (config.console.enabled) {
    sinks.push(createConsoleSink({ level, format: options.format, consoleImpl: options.consoleImpl }));
  }
  if (config.file.enabled) {
    sinks.push(
      createFileSink({
        sessionId: options.sessionId,
        level,
        outputDir: config.file.outputDir ?? path.resolve("results", "logs"),
        maxFileSizeMb: config.file.maxFileSizeMb,
        maxFiles: config.file.maxFiles,
        logger: options.consoleImpl ?? console
      })
    );
  }
  sinks.push(...(options.extraSinks ?? []));
  return new StructuredLogger({
    sessionId: options.sessionId,
    baseComponent: options.component ?? "gto-broker",
    level,
    sinks
  });
}
