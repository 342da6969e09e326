import { jsonStringify } from "@triarb/common";
import type { TraceId } from "@triarb/common";

export type Level = "info" | "warn" | "error";

export type Logger = {
  readonly trace_id: TraceId;
  log(level: Level, message: string, meta?: Record<string, unknown>): void;
};

export function logLine(
  service: string,
  level: Level,
  trace_id: TraceId,
  message: string,
  meta?: Record<string, unknown>,
): void {
  const base = `[${service}][${level}][trace=${trace_id}] ${message}`;
  const suffix = meta ? ` ${jsonStringify(meta)}` : "";

  if (level === "error") console.error(`${base}${suffix}`);
  else if (level === "warn") console.warn(`${base}${suffix}`);
  else console.log(`${base}${suffix}`);
}

/** Binds a service name and trace id so behaviours only pass the message. */
export function createLogger(service: string, trace_id: TraceId): Logger {
  return {
    trace_id,
    log: (level, message, meta) => logLine(service, level, trace_id, message, meta),
  };
}
