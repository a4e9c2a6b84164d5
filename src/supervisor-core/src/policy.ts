import fs from "node:fs";

import { parse as parseYaml } from "yaml";

import type { JsonObject } from "./types.js";
import { failure, getErrorMessage, isPlainObject } from "./utils.js";

const DEFAULT_REDACTION_FIELDS = [
  "authorization",
  "access_token",
  "refresh_token",
  "id_token",
  "token",
  "secret",
  "password",
  "username",
];

const REDACTED = "***redacted***";

function normalizeYamlList(value: unknown): string[] {
  if (!Array.isArray(value)) return [];
  return value
    .filter((v): v is string => typeof v === "string")
    .map((v) => v.trim().toLowerCase())
    .filter((v) => !!v);
}

/**
 * Default field names plus an optional YAML list (a top-level sequence of
 * names) from `filePath`. A missing file only yields the defaults; one that
 * cannot be read or parsed is `InvalidInput`.
 */
export function loadRedactionFields(filePath: string): Set<string> {
  if (!filePath || !fs.existsSync(filePath)) return new Set(DEFAULT_REDACTION_FIELDS);

  let parsed: unknown;
  try {
    parsed = parseYaml(fs.readFileSync(filePath, "utf8"));
  } catch (e) {
    throw failure("InvalidInput", `Unreadable redaction fields file '${filePath}': ${getErrorMessage(e)}`);
  }
  return new Set([...DEFAULT_REDACTION_FIELDS, ...normalizeYamlList(parsed)]);
}

function scrubText(value: string): string {
  const scrubbed = value
    .replace(/(authorization\s*[:=]\s*(?:bearer|basic)\s+)[^\s,;]+/gi, `$1${REDACTED}`)
    .replace(/((?:access_token|password)=)[^&\s]+/gi, `$1${REDACTED}`);
  return scrubbed.length > 120 ? `${scrubbed.slice(0, 117)}...` : scrubbed;
}

export function redactForLog(value: unknown, redactionFields: Set<string>): unknown {
  if (value === null || value === undefined) return value;
  if (typeof value === "string") return scrubText(value);
  if (typeof value !== "object") return value;
  if (Array.isArray(value)) return value.map((x) => redactForLog(x, redactionFields));
  if (!isPlainObject(value)) return "[non-plain-object]";

  const out: JsonObject = {};
  for (const [k, v] of Object.entries(value)) {
    const key = k.toLowerCase();
    const shouldRedact = redactionFields.has(key) || key.includes("secret") || key.includes("token") || key.includes("password");
    out[k] = shouldRedact ? REDACTED : redactForLog(v, redactionFields);
  }
  return out;
}
