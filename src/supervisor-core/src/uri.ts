import type { QueryParam } from "./types.js";
import { failure, getErrorMessage, requireText } from "./utils.js";

const INTEGRATION_PREFIX = "integration/";

export type BaseUrlInput = string | URL | null | undefined;

function parseBaseUrl(baseUrl: BaseUrlInput): URL {
  const raw = baseUrl instanceof URL ? baseUrl.toString() : requireText("URL", baseUrl).trim();

  let url: URL;
  try {
    url = new URL(raw);
  } catch {
    throw failure("InvalidInput", "Invalid URL");
  }

  if (url.protocol !== "https:" && url.protocol !== "http:") {
    throw failure("InvalidInput", `Invalid URL: unsupported protocol '${url.protocol}'`);
  }
  return url;
}

function encodeSegment(name: string, value: unknown): string {
  const text = requireText(name, value);
  // "." and ".." would be folded away as dot segments, even when escaped.
  if (text === "." || text === "..") {
    throw failure("InvalidInput", `Invalid ${name}: '${text}' is not a usable path segment`);
  }

  try {
    return encodeURIComponent(text);
  } catch (e) {
    throw failure("InvalidInput", `Invalid ${name}: ${getErrorMessage(e)}`);
  }
}

/**
 * Builds `<base>/integration/<org>/<action>` with each segment
 * percent-encoded. Query parameters are appended in the order given;
 * repeated names are kept.
 *
 * The base is treated as a directory, so `https://host/api` and
 * `https://host/api/` resolve to the same URI.
 */
export function buildActionURI(
  baseUrl: BaseUrlInput,
  orgName: string | null | undefined,
  action: string | null | undefined,
  ...params: QueryParam[]
): URL {
  const base = parseBaseUrl(baseUrl);
  const org = encodeSegment("organization", orgName);
  const act = encodeSegment("action", action);

  base.search = "";
  base.hash = "";
  if (!base.pathname.endsWith("/")) base.pathname = `${base.pathname}/`;

  const uri = new URL(`${INTEGRATION_PREFIX}${org}/${act}`, base);
  for (const [name, value] of params) {
    uri.searchParams.append(requireText("query parameter name", name), value);
  }
  return uri;
}

/**
 * Root document address used to find the token endpoint:
 * `<baseUrl>?orgName=<org>`. An existing query on the base is kept.
 */
export function buildDiscoveryURI(baseUrl: BaseUrlInput, orgName: string | null | undefined): URL {
  const url = parseBaseUrl(baseUrl);
  url.searchParams.append("orgName", requireText("organization", orgName));
  return url;
}

/**
 * A token link taken from a response must be an absolute http(s) URL.
 */
export function parseTokenLink(link: string): URL {
  let url: URL;
  try {
    url = new URL(link);
  } catch {
    throw failure("MalformedResponse", `Token link '${link}' is not an absolute URL`, { stage: "discovery" });
  }

  if (url.protocol !== "https:" && url.protocol !== "http:") {
    throw failure("MalformedResponse", `Token link '${link}' must be an http or https URL`, {
      stage: "discovery",
    });
  }
  return url;
}
