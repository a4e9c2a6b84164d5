import { findText } from "./json-path.js";
import type { FailureRecord, HttpOutcome, ProtocolStage, Result } from "./types.js";
import { failure, SupervisorError } from "./utils.js";

const HTTP_OK = 200;
const HTTP_BAD_REQUEST = 400;

function reasonPhrase(outcome: HttpOutcome): string {
  const phrase = outcome.statusText.trim();
  return phrase || `HTTP ${outcome.status}`;
}

function errorDescription(body: string): string | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch {
    return null;
  }
  const description = findText(parsed, "error_description");
  return description ? description : null;
}

/**
 * Returns null for a 200 response. Anything else becomes an
 * `AuthenticationRejected` error; only a 400 body is consulted, for its
 * `error_description`.
 */
export function classifyResponse(outcome: HttpOutcome, stage?: ProtocolStage): SupervisorError | null {
  if (outcome.status === HTTP_OK) return null;

  const message =
    outcome.status === HTTP_BAD_REQUEST ? errorDescription(outcome.body) ?? reasonPhrase(outcome) : reasonPhrase(outcome);

  return failure("AuthenticationRejected", message, { statusCode: outcome.status, stage });
}

export function toFailureRecord(error: SupervisorError): FailureRecord {
  const record: FailureRecord = { kind: error.kind, message: error.message };
  if (error.statusCode !== undefined) record.statusCode = error.statusCode;
  if (error.stage !== undefined) record.stage = error.stage;
  return record;
}

export function describeFailure(record: FailureRecord): string {
  if (record.kind === "AuthenticationRejected") {
    return `Failed to authenticate, the status code is [${record.statusCode ?? "n/a"}] and error message is [${record.message}]`;
  }
  return `${record.kind}: ${record.message}`;
}

/**
 * Settles `work` into a tagged result. Only classified failures are turned
 * into values; anything else is a bug and is rethrown.
 */
export async function attempt<T>(work: Promise<T> | (() => T | Promise<T>)): Promise<Result<Awaited<T>>> {
  try {
    const value = await (typeof work === "function" ? work() : work);
    return { ok: true, value };
  } catch (e) {
    if (e instanceof SupervisorError) return { ok: false, failure: toFailureRecord(e) };
    throw e;
  }
}
