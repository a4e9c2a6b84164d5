import test from "node:test";
import assert from "node:assert/strict";

import { createCoreConfig, loadSupervisorSettingsFromEnv } from "./config.js";
import { SupervisorError } from "./utils.js";

const ENV_KEYS = [
  "HTTP_TIMEOUT_MS",
  "MAX_RESPONSE_BYTES",
  "LOG_LEVEL",
  "REDACTION_FIELDS_FILE",
  "SUPERVISOR_BASE_URL",
  "SUPERVISOR_AUTH_URL",
  "SUPERVISOR_ORG",
  "SUPERVISOR_USERNAME",
  "SUPERVISOR_PASSWORD",
];

function withEnv(values: Record<string, string>, fn: () => void): void {
  const saved = new Map(ENV_KEYS.map((k) => [k, process.env[k]]));
  for (const k of ENV_KEYS) delete process.env[k];
  Object.assign(process.env, values);
  try {
    fn();
  } finally {
    for (const [k, v] of saved) {
      if (v === undefined) delete process.env[k];
      else process.env[k] = v;
    }
  }
}

test("createCoreConfig keeps transport defaults when nothing is set", () => {
  withEnv({}, () => {
    assert.deepEqual(createCoreConfig(), {
      httpTimeoutMs: 0,
      maxResponseBytes: 0,
      logLevel: "info",
      redactionFieldsFile: "",
    });
  });
});

test("createCoreConfig reads and clamps environment values", () => {
  withEnv(
    {
      HTTP_TIMEOUT_MS: "2500",
      MAX_RESPONSE_BYTES: "-5",
      LOG_LEVEL: "DEBUG",
      REDACTION_FIELDS_FILE: "/etc/supervisor/redaction.yaml",
    },
    () => {
      assert.deepEqual(createCoreConfig(), {
        httpTimeoutMs: 2500,
        maxResponseBytes: 0,
        logLevel: "debug",
        redactionFieldsFile: "/etc/supervisor/redaction.yaml",
      });
    },
  );
});

test("createCoreConfig ignores unparseable values and applies overrides last", () => {
  withEnv({ HTTP_TIMEOUT_MS: "soon", LOG_LEVEL: "verbose" }, () => {
    const config = createCoreConfig({ maxResponseBytes: 4096 });
    assert.equal(config.httpTimeoutMs, 0);
    assert.equal(config.logLevel, "info");
    assert.equal(config.maxResponseBytes, 4096);
  });
});

test("loadSupervisorSettingsFromEnv returns null when nothing is set", () => {
  withEnv({}, () => {
    assert.equal(loadSupervisorSettingsFromEnv(), null);
  });
});

test("loadSupervisorSettingsFromEnv returns the full settings", () => {
  withEnv(
    {
      SUPERVISOR_BASE_URL: " https://svc.example/aiq ",
      SUPERVISOR_AUTH_URL: "https://svc.example/auth",
      SUPERVISOR_ORG: "acme",
      SUPERVISOR_USERNAME: "builder",
      SUPERVISOR_PASSWORD: "test-secret",
    },
    () => {
      assert.deepEqual(loadSupervisorSettingsFromEnv(), {
        baseUrl: "https://svc.example/aiq",
        authUrl: "https://svc.example/auth",
        orgName: "acme",
        username: "builder",
        password: "test-secret",
      });
    },
  );
});

test("loadSupervisorSettingsFromEnv names missing variables of a partial set", () => {
  withEnv({ SUPERVISOR_BASE_URL: "https://svc.example/aiq", SUPERVISOR_ORG: "acme" }, () => {
    assert.throws(
      () => loadSupervisorSettingsFromEnv(),
      (e: unknown) =>
        e instanceof SupervisorError &&
        e.kind === "InvalidInput" &&
        e.message === "Supervisor credentials are partially configured. Missing: SUPERVISOR_USERNAME, SUPERVISOR_PASSWORD.",
    );
  });
});
