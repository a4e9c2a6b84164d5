import test from "node:test";
import assert from "node:assert/strict";

import { SupervisorClient } from "./client.js";
import { reply, ScriptedExecutor } from "./test-support.js";
import type { SupervisorSettings } from "./types.js";
import { SupervisorError } from "./utils.js";

const SETTINGS: SupervisorSettings = {
  baseUrl: "https://svc.example/aiq",
  authUrl: "https://svc.example/auth",
  orgName: "acme",
  username: "builder",
  password: "test-secret",
};

const DISCOVERY = reply(200, { links: { token: "https://svc.example/token" } });
const EXCHANGE = reply(200, { access_token: "abc123" });

const ENV_KEYS = ["SUPERVISOR_BASE_URL", "SUPERVISOR_AUTH_URL", "SUPERVISOR_ORG", "SUPERVISOR_USERNAME", "SUPERVISOR_PASSWORD"];

async function withEnv(values: Record<string, string>, fn: () => void | Promise<void>): Promise<void> {
  const saved = new Map(ENV_KEYS.map((k) => [k, process.env[k]]));
  for (const k of ENV_KEYS) delete process.env[k];
  Object.assign(process.env, values);
  try {
    await fn();
  } finally {
    for (const [k, v] of saved) {
      if (v === undefined) delete process.env[k];
      else process.env[k] = v;
    }
  }
}

function client(executor: ScriptedExecutor, settings: SupervisorSettings = SETTINGS): SupervisorClient {
  return new SupervisorClient(settings, { executor, config: { logLevel: "error" } });
}

test("callAction authenticates and calls the organization action", async () => {
  const executor = new ScriptedExecutor([DISCOVERY, EXCHANGE, reply(200, { deployed: true })]);

  const result = await client(executor).callAction({ action: "status", params: [["verbose", "1"]] });

  assert.deepEqual(result, { status: 200, data: { deployed: true } });
  assert.equal(executor.requests[0].url, "https://svc.example/auth?orgName=acme");
  assert.deepEqual(executor.requests[2], {
    method: "GET",
    url: "https://svc.example/aiq/integration/acme/status?verbose=1",
    headers: { Accept: "application/json", Authorization: "BEARER abc123" },
    body: undefined,
  });
});

test("callAction sends a JSON body for writes", async () => {
  const executor = new ScriptedExecutor([DISCOVERY, EXCHANGE, reply(201, { id: "app-1" }, "Created")]);

  const result = await client(executor).callAction({ action: "apps", method: "POST", body: { name: "field-app" } });

  assert.deepEqual(result, { status: 201, data: { id: "app-1" } });
  assert.deepEqual(executor.requests[2].headers, {
    Accept: "application/json",
    "Content-Type": "application/json",
    Authorization: "BEARER abc123",
  });
  assert.equal(executor.requests[2].body, '{"name":"field-app"}');
});

test("callAction returns null data for an empty body", async () => {
  const executor = new ScriptedExecutor([DISCOVERY, EXCHANGE, reply(204, "", "No Content")]);
  assert.deepEqual(await client(executor).callAction({ action: "apps", method: "DELETE" }), { status: 204, data: null });
});

test("callAction reports non-2xx action responses as ActionRejected", async () => {
  const executor = new ScriptedExecutor([DISCOVERY, EXCHANGE, reply(404, "", "Not Found")]);

  await assert.rejects(
    client(executor).callAction({ action: "missing" }),
    (e: unknown) =>
      e instanceof SupervisorError && e.kind === "ActionRejected" && e.message === "Not Found" && e.statusCode === 404 && e.stage === "action",
  );
});

test("callAction does not reach the action when authentication fails", async () => {
  const executor = new ScriptedExecutor([DISCOVERY, reply(400, { error_description: "invalid_grant" }, "Bad Request")]);

  await assert.rejects(
    client(executor).callAction({ action: "status" }),
    (e: unknown) => e instanceof SupervisorError && e.kind === "AuthenticationRejected" && e.message === "invalid_grant",
  );
  assert.equal(executor.requests.length, 2);
});

test("callAction rejects a blank action before any request", async () => {
  const executor = new ScriptedExecutor([]);

  await assert.rejects(
    client(executor).callAction({ action: " " }),
    (e: unknown) => e instanceof SupervisorError && e.kind === "InvalidInput" && e.message === "Invalid action",
  );
  assert.equal(executor.requests.length, 0);
});

test("the base URL doubles as the auth URL when none is given", async () => {
  const executor = new ScriptedExecutor([DISCOVERY, EXCHANGE, reply(200, "{}")]);
  await client(executor, { ...SETTINGS, authUrl: undefined }).callAction({ action: "status" });
  assert.equal(executor.requests[0].url, "https://svc.example/aiq?orgName=acme");
});

test("SupervisorClient validates its settings up front", () => {
  assert.throws(
    () => new SupervisorClient({ ...SETTINGS, orgName: "" }),
    (e: unknown) => e instanceof SupervisorError && e.kind === "InvalidInput" && e.message === "Invalid organization",
  );
});

test("actionUri builds organization action URIs", () => {
  const uri = client(new ScriptedExecutor([])).actionUri("upload", ["file", "bundle.zip"]);
  assert.equal(uri.toString(), "https://svc.example/aiq/integration/acme/upload?file=bundle.zip");
});

test("fromEnv reads SUPERVISOR_* settings", async () => {
  await withEnv(
    {
      SUPERVISOR_BASE_URL: "https://svc.example/aiq",
      SUPERVISOR_ORG: "acme",
      SUPERVISOR_USERNAME: "builder",
      SUPERVISOR_PASSWORD: "test-secret",
    },
    () => {
      const fromEnv = SupervisorClient.fromEnv({ config: { logLevel: "error" } });
      assert.equal(fromEnv.orgName, "acme");
      assert.equal(fromEnv.actionUri("status").toString(), "https://svc.example/aiq/integration/acme/status");
    },
  );
});

test("fromEnv fails when nothing is configured", async () => {
  await withEnv({}, () => {
    assert.throws(
      () => SupervisorClient.fromEnv(),
      (e: unknown) => e instanceof SupervisorError && e.kind === "InvalidInput" && e.message.startsWith("Missing supervisor settings"),
    );
  });
});
