export type LogLevel = "debug" | "info" | "warn" | "error";
export type LogThreshold = LogLevel | "silent";

const LEVEL_ORDER: Record<LogThreshold, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

let threshold: LogThreshold = "info";

export function isLogThreshold(value: string): value is LogThreshold {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

export function setLogLevel(level: LogThreshold): void {
  threshold = level;
}

function ts() {
  return new Date().toISOString();
}

export const logger = {
  debug: (msg: string, meta?: Record<string, unknown>) => log("debug", msg, meta),
  info: (msg: string, meta?: Record<string, unknown>) => log("info", msg, meta),
  warn: (msg: string, meta?: Record<string, unknown>) => log("warn", msg, meta),
  error: (msg: string, meta?: Record<string, unknown>) => log("error", msg, meta),
};

function log(level: LogLevel, msg: string, meta?: Record<string, unknown>) {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[threshold]) return;
  const base = { ts: ts(), level, msg };
  const out = meta ? { ...base, ...meta } : base;
  // JSON lines on stderr; stdout carries the report.
  console.error(JSON.stringify(out));
}
