import { getLogContext } from "./log-context";
import { trace } from "@opentelemetry/api";

type LogLevel = "info" | "warn" | "error";

type LogFields = Record<string, unknown>;

// Identity and banking numbers read from farmer documents never reach the logs.
const REDACT_KEY_PATTERN =
  /(password|token|secret|authorization|cookie|aadhar|aadhaar|pan_number|account|ifsc|email|phone|mobile)/i;
const MAX_REDACTION_DEPTH = 6;

function redactValue(value: unknown, depth = 0): unknown {
  if (depth >= MAX_REDACTION_DEPTH) return "[MAX_DEPTH]";
  if (value == null) return value;
  if (value instanceof Error) {
    return { name: value.name, message: value.message };
  }
  if (Array.isArray(value)) {
    return value.map((entry) => redactValue(entry, depth + 1));
  }
  if (typeof value === "object") {
    return redactFields(Object.entries(value), depth);
  }
  return value;
}

function redactFields(entries: Array<[string, unknown]>, depth = 0): LogFields {
  const output: LogFields = {};
  for (const [key, entry] of entries) {
    output[key] = REDACT_KEY_PATTERN.test(key) ? "[REDACTED]" : redactValue(entry, depth + 1);
  }
  return output;
}

function write(level: LogLevel, message: string, fields?: LogFields): void {
  const context = getLogContext();
  const spanContext = trace.getActiveSpan()?.spanContext();
  const payload = {
    timestamp: new Date().toISOString(),
    level,
    message,
    requestId: context?.requestId ?? null,
    ...(context?.jobId ? { jobId: context.jobId } : {}),
    traceId: spanContext?.traceId ?? null,
    spanId: spanContext?.spanId ?? null,
    ...(fields ? redactFields(Object.entries(fields)) : {}),
  };
  const line = JSON.stringify(payload);
  if (level === "error") {
    console.error(line);
    return;
  }
  if (level === "warn") {
    console.warn(line);
    return;
  }
  console.log(line);
}

export function logInfo(message: string, fields?: LogFields): void {
  write("info", message, fields);
}

export function logWarn(message: string, fields?: LogFields): void {
  write("warn", message, fields);
}

export function logError(message: string, fields?: LogFields): void {
  write("error", message, fields);
}
