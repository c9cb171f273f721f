export { StructuredLogger, silentLogger } from "./structuredLogger";
export type { ComponentLogger, LogOptions, StructuredLoggerOptions } from "./structuredLogger";
export { createConsoleSink, formatLine } from "./sinks/consoleSink";
export type { ConsoleFormat } from "./sinks/consoleSink";
export { createFileSink } from "./sinks/fileSink";
export { createMemorySink } from "./sinks/types";
export type { LogSink } from "./sinks/types";
export { createBrokerLogger } from "./factory";
export type { BrokerLoggerOptions } from "./factory";
