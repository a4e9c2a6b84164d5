import type { CoreConfig, SupervisorSettings } from "./types.js";
import { failure, parseLogLevel, readIntEnv } from "./utils.js";

export function createCoreConfig(overrides: Partial<CoreConfig> = {}): CoreConfig {
  const base: CoreConfig = {
    // 0 keeps the transport defaults: no timeout, no body cap.
    httpTimeoutMs: readIntEnv("HTTP_TIMEOUT_MS", 0, 0, 600_000),
    maxResponseBytes: readIntEnv("MAX_RESPONSE_BYTES", 0, 0, 1_073_741_824),
    logLevel: parseLogLevel(process.env.LOG_LEVEL),
    redactionFieldsFile: process.env.REDACTION_FIELDS_FILE || "",
  };

  return {
    ...base,
    ...overrides,
  };
}

const SETTINGS_ENV = {
  baseUrl: "SUPERVISOR_BASE_URL",
  authUrl: "SUPERVISOR_AUTH_URL",
  orgName: "SUPERVISOR_ORG",
  username: "SUPERVISOR_USERNAME",
  password: "SUPERVISOR_PASSWORD",
} as const;

const REQUIRED_SETTINGS = ["baseUrl", "orgName", "username", "password"] as const;

/**
 * Reads caller credentials from SUPERVISOR_* variables. Returns null when
 * none are set; a partial set is an error.
 */
export function loadSupervisorSettingsFromEnv(): SupervisorSettings | null {
  const read = (name: string): string => process.env[name] ?? "";

  const values = {
    baseUrl: read(SETTINGS_ENV.baseUrl),
    authUrl: read(SETTINGS_ENV.authUrl),
    orgName: read(SETTINGS_ENV.orgName),
    username: read(SETTINGS_ENV.username),
    password: read(SETTINGS_ENV.password),
  };

  const allUnset = Object.values(values).every((v) => !v.trim());
  if (allUnset) return null;

  const missing = REQUIRED_SETTINGS.filter((key) => !values[key].trim()).map((key) => SETTINGS_ENV[key]);
  if (missing.length > 0) {
    throw failure("InvalidInput", `Supervisor credentials are partially configured. Missing: ${missing.join(", ")}.`);
  }

  return {
    baseUrl: values.baseUrl.trim(),
    authUrl: values.authUrl.trim() || undefined,
    orgName: values.orgName,
    username: values.username,
    password: values.password,
  };
}
