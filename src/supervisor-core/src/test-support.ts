import type { ActionRequest, HttpExecutor, HttpOutcome } from "./types.js";

export type ScriptedReply = HttpOutcome | Error;

export function reply(status: number, body: unknown = "", statusText = status === 200 ? "OK" : ""): HttpOutcome {
  return {
    status,
    statusText,
    body: typeof body === "string" ? body : JSON.stringify(body),
  };
}

/**
 * In-memory executor that answers requests from a fixed script and records
 * what was sent.
 */
export class ScriptedExecutor implements HttpExecutor {
  readonly requests: ActionRequest[] = [];

  private readonly replies: ScriptedReply[];

  constructor(replies: ScriptedReply[]) {
    this.replies = [...replies];
  }

  async execute(request: ActionRequest): Promise<HttpOutcome> {
    this.requests.push(request);
    const next = this.replies.shift();
    if (next === undefined) {
      throw new Error(`Unscripted request: ${request.method} ${request.url}`);
    }
    if (next instanceof Error) throw next;
    return next;
  }
}
