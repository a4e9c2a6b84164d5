import { failure, getErrorMessage, isPlainObject, SupervisorError } from "./utils.js";

export function parseJsonBody(body: string): unknown {
  try {
    const parsed: unknown = JSON.parse(body);
    return parsed;
  } catch (e) {
    throw failure("MalformedResponse", `Response is not valid JSON: ${getErrorMessage(e)}`);
  }
}

/**
 * Walks `path` field by field from `root` and returns the terminal value as
 * text. Absent fields and non-scalar terminals both fail with
 * `MalformedResponse`; there is no null or default result.
 */
export function extractText(root: unknown, ...path: string[]): string {
  let node: unknown = root;
  for (const field of path) {
    if (!isPlainObject(node) || !Object.prototype.hasOwnProperty.call(node, field)) {
      throw failure("MalformedResponse", "Field not found in the response", { details: { path: path.join(".") } });
    }
    node = node[field];
  }

  if (typeof node === "string") return node;
  if (typeof node === "number" || typeof node === "boolean") return String(node);

  throw failure("MalformedResponse", `Field '${path.join(".")}' is not a text value`, {
    details: { path: path.join(".") },
  });
}

/**
 * Like `extractText`, but an empty result also counts as malformed.
 */
export function extractNonEmptyText(root: unknown, ...path: string[]): string {
  const value = extractText(root, ...path);
  if (value === "") {
    throw failure("MalformedResponse", `Field '${path.join(".")}' is empty`, { details: { path: path.join(".") } });
  }
  return value;
}

/**
 * Lenient lookup used where a missing value has a fallback.
 */
export function findText(root: unknown, ...path: string[]): string | null {
  try {
    return extractText(root, ...path);
  } catch (e) {
    if (e instanceof SupervisorError) return null;
    throw e;
  }
}
