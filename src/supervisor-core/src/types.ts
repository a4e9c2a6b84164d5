export type JsonObject = Record<string, unknown>;

export type FailureKind =
  | "InvalidInput"
  | "TransportFailure"
  | "AuthenticationRejected"
  | "MalformedResponse"
  | "ActionRejected";

export type ProtocolStage = "discovery" | "exchange" | "action";

export type FailureRecord = {
  kind: FailureKind;
  message: string;
  statusCode?: number;
  stage?: ProtocolStage;
};

export type Result<T> = { ok: true; value: T } | { ok: false; failure: FailureRecord };

export type HttpMethod = "GET" | "POST" | "PUT" | "PATCH" | "DELETE";

export type ActionRequest = {
  method: HttpMethod;
  url: string;
  headers?: Record<string, string>;
  body?: string;
};

export type HttpOutcome = {
  status: number;
  statusText: string;
  body: string;
};

export interface HttpExecutor {
  execute(request: ActionRequest): Promise<HttpOutcome>;
}

/**
 * Anything that carries outbound headers. `addAuthenticationHeader` writes
 * the bearer token into `headers`.
 */
export type OutboundRequest = {
  headers?: Record<string, string>;
};

export type QueryParam = readonly [name: string, value: string];

export type LogLevel = "debug" | "info" | "warn" | "error";

export type CoreConfig = {
  httpTimeoutMs: number;
  maxResponseBytes: number;
  logLevel: LogLevel;
  redactionFieldsFile: string;
};

export type SupervisorSettings = {
  baseUrl: string;
  authUrl?: string;
  orgName: string;
  username: string;
  password: string;
};

export type ProtocolOptions = {
  executor?: HttpExecutor;
  config?: Partial<CoreConfig>;
};

export type CallActionInput = {
  action: string;
  method?: HttpMethod;
  params?: QueryParam[];
  body?: unknown;
};

export type CallActionOutput = {
  status: number;
  data: unknown;
};
