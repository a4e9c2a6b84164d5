import { createCoreConfig, loadSupervisorSettingsFromEnv } from "./config.js";
import { AxiosExecutor } from "./executor.js";
import { parseJsonBody } from "./json-path.js";
import { loadRedactionFields, redactForLog } from "./policy.js";
import { addAuthenticationHeader } from "./token-protocol.js";
import type {
  ActionRequest,
  CallActionInput,
  CallActionOutput,
  CoreConfig,
  HttpExecutor,
  HttpOutcome,
  ProtocolOptions,
  QueryParam,
  SupervisorSettings,
} from "./types.js";
import { buildActionURI } from "./uri.js";
import { createLogger, failure, getErrorMessage, type Logger, requireText, SupervisorError } from "./utils.js";

/**
 * Calls organization actions on an integration supervisor. Each call
 * authenticates from scratch; the client keeps no token.
 */
export class SupervisorClient {
  readonly config: CoreConfig;

  private readonly settings: Readonly<Required<SupervisorSettings>>;

  private readonly executor: HttpExecutor;

  private readonly log: Logger;

  private readonly redactionFields: Set<string>;

  constructor(settings: SupervisorSettings, options: ProtocolOptions = {}) {
    this.config = createCoreConfig(options.config);
    this.settings = Object.freeze({
      baseUrl: requireText("URL", settings.baseUrl),
      authUrl: settings.authUrl && settings.authUrl.trim() ? settings.authUrl : settings.baseUrl,
      orgName: requireText("organization", settings.orgName),
      username: requireText("username", settings.username),
      password: requireText("password", settings.password),
    });
    this.executor = options.executor ?? new AxiosExecutor(this.config);
    this.log = createLogger(this.config.logLevel);
    this.redactionFields = loadRedactionFields(this.config.redactionFieldsFile);
  }

  static fromEnv(options: ProtocolOptions = {}): SupervisorClient {
    const settings = loadSupervisorSettingsFromEnv();
    if (!settings) {
      throw failure("InvalidInput", "Missing supervisor settings. Set SUPERVISOR_BASE_URL, SUPERVISOR_ORG, SUPERVISOR_USERNAME and SUPERVISOR_PASSWORD.");
    }
    return new SupervisorClient(settings, options);
  }

  get orgName(): string {
    return this.settings.orgName;
  }

  actionUri(action: string, ...params: QueryParam[]): URL {
    return buildActionURI(this.settings.baseUrl, this.settings.orgName, action, ...params);
  }

  async callAction(input: CallActionInput): Promise<CallActionOutput> {
    const method = input.method ?? "GET";
    const uri = this.actionUri(input.action, ...(input.params ?? []));
    const hasBody = method !== "GET" && input.body !== undefined;

    const request: ActionRequest = {
      method,
      url: uri.toString(),
      headers: {
        Accept: "application/json",
        ...(hasBody ? { "Content-Type": "application/json" } : {}),
      },
      body: hasBody ? JSON.stringify(input.body) : undefined,
    };

    await addAuthenticationHeader(
      request,
      this.settings.authUrl,
      this.settings.username,
      this.settings.password,
      this.settings.orgName,
      { executor: this.executor, config: this.config },
    );

    const startedAt = Date.now();
    let outcome: HttpOutcome;
    try {
      outcome = await this.executor.execute(request);
    } catch (e) {
      if (e instanceof SupervisorError) {
        e.stage = "action";
        throw e;
      }
      throw failure("TransportFailure", getErrorMessage(e), { stage: "action" });
    }

    const logPayload = {
      org: this.settings.orgName,
      action: input.action,
      method,
      status: outcome.status,
      durationMs: Date.now() - startedAt,
    };

    if (outcome.status < 200 || outcome.status >= 300) {
      this.log.warn("supervisor.action", { ...logPayload, errorDetails: redactForLog(outcome.body, this.redactionFields) });
      throw failure("ActionRejected", outcome.statusText.trim() || `HTTP ${outcome.status}`, {
        statusCode: outcome.status,
        stage: "action",
        details: { body: redactForLog(outcome.body, this.redactionFields) },
      });
    }

    this.log.info("supervisor.action", logPayload);

    if (!outcome.body.trim()) return { status: outcome.status, data: null };
    try {
      return { status: outcome.status, data: parseJsonBody(outcome.body) };
    } catch (e) {
      if (e instanceof SupervisorError) e.stage = "action";
      throw e;
    }
  }
}
