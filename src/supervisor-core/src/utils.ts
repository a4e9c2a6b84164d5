import type { FailureKind, FailureRecord, JsonObject, LogLevel, ProtocolStage } from "./types.js";

export class SupervisorError extends Error {
  readonly kind: FailureKind;

  statusCode?: number;

  stage?: ProtocolStage;

  details?: unknown;

  constructor(kind: FailureKind, message: string) {
    super(message);
    this.name = "SupervisorError";
    this.kind = kind;
  }
}

export type FailureExtras = Omit<FailureRecord, "kind" | "message"> & { details?: unknown };

export function failure(kind: FailureKind, message: string, extras: FailureExtras = {}): SupervisorError {
  const err = new SupervisorError(kind, message);
  if (extras.statusCode !== undefined) err.statusCode = extras.statusCode;
  if (extras.stage !== undefined) err.stage = extras.stage;
  if (extras.details !== undefined) err.details = extras.details;
  return err;
}

export function clamp(n: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, n));
}

export function readIntEnv(name: string, defaultValue: number, min: number, max: number): number {
  const raw = process.env[name];
  if (!raw || !raw.trim()) return defaultValue;
  const parsed = Number(raw);
  if (!Number.isFinite(parsed)) return defaultValue;
  return clamp(Math.trunc(parsed), min, max);
}

export function isPlainObject(v: unknown): v is JsonObject {
  if (v === null || typeof v !== "object") return false;
  const proto = Object.getPrototypeOf(v);
  return proto === Object.prototype || proto === null;
}

export function isBlank(value: unknown): boolean {
  return typeof value !== "string" || value.trim() === "";
}

/**
 * Rejects null, undefined and whitespace-only values with `Invalid <name>`.
 * The value is returned untouched; credentials are never trimmed.
 */
export function requireText(name: string, value: unknown): string {
  if (typeof value !== "string" || isBlank(value)) {
    throw failure("InvalidInput", `Invalid ${name}`);
  }
  return value;
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function parseLogLevel(raw: string | undefined, defaultLevel: LogLevel = "info"): LogLevel {
  const normalized = (raw ?? "").trim().toLowerCase();
  if (normalized === "debug" || normalized === "info" || normalized === "warn" || normalized === "error") {
    return normalized;
  }
  return defaultLevel;
}

export type Logger = Record<LogLevel, (event: string, data?: JsonObject) => void>;

function writeLine(level: LogLevel, event: string, data: JsonObject): void {
  console.log(
    JSON.stringify({
      ts: new Date().toISOString(),
      level,
      event,
      ...data,
    }),
  );
}

export function createLogger(threshold: LogLevel): Logger {
  const emit = (level: LogLevel) => (event: string, data: JsonObject = {}) => {
    if (LEVEL_PRIORITY[level] < LEVEL_PRIORITY[threshold]) return;
    writeLine(level, event, data);
  };

  return {
    debug: emit("debug"),
    info: emit("info"),
    warn: emit("warn"),
    error: emit("error"),
  };
}
