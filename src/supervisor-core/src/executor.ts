import axios, { type AxiosInstance } from "axios";

import type { ActionRequest, CoreConfig, HttpExecutor, HttpOutcome } from "./types.js";
import { failure, getErrorMessage } from "./utils.js";

function describeTransportError(e: unknown): string {
  if (axios.isAxiosError(e)) {
    if (e.code === "ECONNABORTED" || e.code === "ETIMEDOUT") return `Request timed out: ${e.message}`;
    return e.code ? `${e.code}: ${e.message}` : e.message;
  }
  return getErrorMessage(e);
}

/**
 * Sends one request and hands back status, reason phrase and the whole body
 * as text. Every HTTP status resolves, redirects included; only transport
 * problems reject, as `TransportFailure`.
 */
export class AxiosExecutor implements HttpExecutor {
  private readonly http: AxiosInstance;

  constructor(config: Pick<CoreConfig, "httpTimeoutMs" | "maxResponseBytes">) {
    this.http = axios.create({
      timeout: config.httpTimeoutMs,
      maxContentLength: config.maxResponseBytes > 0 ? config.maxResponseBytes : -1,
      // A 3xx is returned as is; credentials are never re-sent to a Location.
      maxRedirects: 0,
      responseType: "text",
      transformResponse: [(data: unknown) => data],
      validateStatus: () => true,
    });
  }

  async execute(request: ActionRequest): Promise<HttpOutcome> {
    try {
      const resp = await this.http.request<unknown>({
        method: request.method,
        url: request.url,
        headers: request.headers,
        data: request.body,
      });

      return {
        status: resp.status,
        statusText: resp.statusText ?? "",
        body: typeof resp.data === "string" ? resp.data : resp.data == null ? "" : String(resp.data),
      };
    } catch (e) {
      throw failure("TransportFailure", describeTransportError(e), { details: { method: request.method, url: request.url } });
    }
  }
}
