import { createCoreConfig } from "./config.js";
import { classifyResponse, describeFailure, toFailureRecord } from "./errors.js";
import { AxiosExecutor } from "./executor.js";
import { extractNonEmptyText, extractText, parseJsonBody } from "./json-path.js";
import { loadRedactionFields, redactForLog } from "./policy.js";
import type { ActionRequest, CoreConfig, HttpExecutor, HttpOutcome, OutboundRequest, ProtocolOptions, ProtocolStage } from "./types.js";
import { buildDiscoveryURI, parseTokenLink } from "./uri.js";
import { createLogger, failure, getErrorMessage, type Logger, requireText, SupervisorError } from "./utils.js";

const TOKEN_LINK_PATH = ["links", "token"];
const ACCESS_TOKEN_PATH = ["access_token"];
const FORM_CONTENT_TYPE = "application/x-www-form-urlencoded";

export type Credentials = {
  username: string;
  password: string;
};

type ProtocolContext = {
  config: CoreConfig;
  executor: HttpExecutor;
  log: Logger;
  redactionFields: Set<string>;
};

type AuthState =
  | { stage: "discovery"; discoveryUrl: URL }
  | { stage: "exchange"; tokenUrl: URL }
  | { stage: "done"; accessToken: string };

function createContext(options: ProtocolOptions): ProtocolContext {
  const config = createCoreConfig(options.config);
  return {
    config,
    executor: options.executor ?? new AxiosExecutor(config),
    log: createLogger(config.logLevel),
    redactionFields: loadRedactionFields(config.redactionFieldsFile),
  };
}

function withStage(e: unknown, stage: ProtocolStage): SupervisorError {
  const err = e instanceof SupervisorError ? e : failure("TransportFailure", getErrorMessage(e));
  if (err.stage === undefined) err.stage = stage;
  return err;
}

/**
 * The password-grant form, always in the order grant_type, scope,
 * username, password.
 */
export function buildTokenForm(credentials: Credentials): string {
  const form = new URLSearchParams();
  form.append("grant_type", "password");
  form.append("scope", "integration");
  form.append("username", credentials.username);
  form.append("password", credentials.password);
  return form.toString();
}

/**
 * Shared by both steps: execute, reject anything but 200, then read `path`
 * from the JSON body.
 */
async function readResponseValue(
  ctx: ProtocolContext,
  stage: ProtocolStage,
  request: ActionRequest,
  path: string[],
): Promise<string> {
  const startedAt = Date.now();

  let outcome: HttpOutcome;
  try {
    outcome = await ctx.executor.execute(request);
  } catch (e) {
    throw withStage(e, stage);
  }

  ctx.log.debug(`supervisor.${stage}`, {
    method: request.method,
    status: outcome.status,
    durationMs: Date.now() - startedAt,
  });

  const rejected = classifyResponse(outcome, stage);
  if (rejected) {
    rejected.details = { body: redactForLog(outcome.body, ctx.redactionFields) };
    throw rejected;
  }

  try {
    const document = parseJsonBody(outcome.body);
    return stage === "exchange" ? extractNonEmptyText(document, ...path) : extractText(document, ...path);
  } catch (e) {
    throw withStage(e, stage);
  }
}

async function discover(ctx: ProtocolContext, discoveryUrl: URL): Promise<URL> {
  const link = await readResponseValue(
    ctx,
    "discovery",
    { method: "GET", url: discoveryUrl.toString(), headers: { Accept: "application/json" } },
    TOKEN_LINK_PATH,
  );
  return parseTokenLink(link);
}

async function exchange(ctx: ProtocolContext, tokenUrl: URL, credentials: Credentials): Promise<string> {
  return readResponseValue(
    ctx,
    "exchange",
    {
      method: "POST",
      url: tokenUrl.toString(),
      headers: { "Content-Type": FORM_CONTENT_TYPE, Accept: "application/json" },
      body: buildTokenForm(credentials),
    },
    ACCESS_TOKEN_PATH,
  );
}

async function advance(ctx: ProtocolContext, state: AuthState, credentials: Credentials): Promise<AuthState> {
  switch (state.stage) {
    case "discovery":
      return { stage: "exchange", tokenUrl: await discover(ctx, state.discoveryUrl) };
    case "exchange":
      return { stage: "done", accessToken: await exchange(ctx, state.tokenUrl, credentials) };
    case "done":
      return state;
  }
}

async function runToCompletion(ctx: ProtocolContext, initial: AuthState, credentials: Credentials): Promise<string> {
  let state = initial;
  while (state.stage !== "done") {
    state = await advance(ctx, state, credentials);
  }
  return state.accessToken;
}

/**
 * Finds the token endpoint through the root document at `baseUrl`, then
 * trades the credentials for an access token with a password grant.
 *
 * Arguments are validated before any request is sent. Every failure is a
 * `SupervisorError` carrying its `kind`; nothing is retried or cached.
 */
export async function fetchAccessToken(
  baseUrl: string | null | undefined,
  username: string | null | undefined,
  password: string | null | undefined,
  orgName: string | null | undefined,
  options: ProtocolOptions = {},
): Promise<string> {
  requireText("URL", baseUrl);
  const credentials: Credentials = {
    username: requireText("username", username),
    password: requireText("password", password),
  };
  const org = requireText("organization", orgName);

  const initial: AuthState = { stage: "discovery", discoveryUrl: buildDiscoveryURI(baseUrl, org) };

  const ctx = createContext(options);
  const startedAt = Date.now();
  try {
    const accessToken = await runToCompletion(ctx, initial, credentials);
    ctx.log.info("supervisor.auth", { org, status: "authenticated", durationMs: Date.now() - startedAt });
    return accessToken;
  } catch (e) {
    if (e instanceof SupervisorError) {
      const record = toFailureRecord(e);
      ctx.log.warn("supervisor.auth", {
        org,
        kind: record.kind,
        stage: record.stage ?? null,
        statusCode: record.statusCode ?? null,
        error: describeFailure(record),
        durationMs: Date.now() - startedAt,
      });
    }
    throw e;
  }
}

/**
 * Authenticates and sets `Authorization: BEARER <token>` on `request`,
 * which is returned for chaining.
 */
export async function addAuthenticationHeader<T extends OutboundRequest>(
  request: T,
  baseUrl: string | null | undefined,
  username: string | null | undefined,
  password: string | null | undefined,
  orgName: string | null | undefined,
  options: ProtocolOptions = {},
): Promise<T> {
  const token = await fetchAccessToken(baseUrl, username, password, orgName, options);
  request.headers = { ...(request.headers ?? {}), Authorization: `BEARER ${token}` };
  return request;
}
