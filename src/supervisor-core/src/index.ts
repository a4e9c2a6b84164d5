export { SupervisorClient } from "./client.js";
export { createCoreConfig, loadSupervisorSettingsFromEnv } from "./config.js";
export { attempt, classifyResponse, describeFailure, toFailureRecord } from "./errors.js";
export { AxiosExecutor } from "./executor.js";
export { extractNonEmptyText, extractText, parseJsonBody } from "./json-path.js";
export { loadRedactionFields, redactForLog } from "./policy.js";
export { addAuthenticationHeader, buildTokenForm, fetchAccessToken, type Credentials } from "./token-protocol.js";
export { buildActionURI, buildDiscoveryURI, type BaseUrlInput } from "./uri.js";
export { failure, SupervisorError } from "./utils.js";
export type {
  ActionRequest,
  CallActionInput,
  CallActionOutput,
  CoreConfig,
  FailureKind,
  FailureRecord,
  HttpExecutor,
  HttpMethod,
  HttpOutcome,
  OutboundRequest,
  ProtocolOptions,
  ProtocolStage,
  QueryParam,
  Result,
  SupervisorSettings,
} from "./types.js";
