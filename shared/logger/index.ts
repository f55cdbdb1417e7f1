/**
 * Purpose: Emit structured JSON logs with consistent metadata fields.
 * Persists: None.
 * Security Risks: Callers must avoid logging account keys or SAS tokens.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogEvent {
  level: LogLevel;
  op: string;
  event?: string;
  [key: string]: unknown;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const isLogLevel = (value: string): value is LogLevel => Object.hasOwn(LEVEL_ORDER, value);

export const resolveLogLevel = (env: NodeJS.ProcessEnv = process.env): LogLevel => {
  const raw = env.LOG_LEVEL?.trim().toLowerCase();
  return raw && isLogLevel(raw) ? raw : "info";
};

export const shouldLog = (level: LogLevel, threshold: LogLevel): boolean =>
  LEVEL_ORDER[level] >= LEVEL_ORDER[threshold];

export const logEvent = ({ level, op, ...fields }: LogEvent): void => {
  if (!shouldLog(level, resolveLogLevel())) {
    return;
  }

  const entry = {
    ts: new Date().toISOString(),
    level,
    op,
    ...fields,
  };

  const line = JSON.stringify(entry);
  if (level === "error") {
    console.error(line);
    return;
  }
  console.log(line);
};
