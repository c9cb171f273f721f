export enum LogLevel {
  DEBUG = "debug",
  INFO = "info",
  WARN = "warn",
  ERROR = "error",
  CRITICAL = "critical"
}

const levelOrder: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 10,
  [LogLevel.INFO]: 20,
  [LogLevel.WARN]: 30,
  [LogLevel.ERROR]: 40,
  [LogLevel.CRITICAL]: 50
};

export function shouldLog(target: LogLevel, minimum: LogLevel): boolean {
  return levelOrder[target] >= levelOrder[minimum];
}

export function parseLogLevel(value: string | undefined, fallback: LogLevel = LogLevel.INFO): LogLevel {
  if (!value) {
    return fallback;
  }
  const normalized = value.trim().toLowerCase();
  const match = Object.values(LogLevel).find(level => level === normalized);
  return match ?? fallback;
}

export interface StructuredLogEvent<TPayload = Record<string, unknown>> {
  sessionId: string;
  component: string;
  event: string;
  level: LogLevel;
  timestamp: number;
  payload?: TPayload;
}

/**
 * Solver request lifecycle, logged as `solver.request.<phase>` events.
 */
export type RequestPhase =
  | "start"
  | "cache-lookup"
  | "hit"
  | "miss"
  | "compute"
  | "success"
  | "cache-write"
  | "done"
  | "failed";

interface StructuredEventOptions<TPayload> {
  sessionId: string;
  component: string;
  level: LogLevel;
  event: string;
  payload?: TPayload;
  timestamp?: number;
}

export function createStructuredEvent<TPayload = Record<string, unknown>>(
  options: StructuredEventOptions<TPayload>
): StructuredLogEvent<TPayload> {
  return {
    sessionId: options.sessionId,
    component: options.component,
    level: options.level,
    event: options.event,
    timestamp: options.timestamp ?? Date.now(),
    payload: options.payload
  };
}
