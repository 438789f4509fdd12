import {
  GITHUB_API_VERSION,
  hasMockRegistrationTokenFormat,
  hasPersonalAccessTokenFormat,
  HealthPayload,
  MessagePayload,
  RegisteredRunner,
  RegisterRunnerRequest,
  RegistrationTokenPayload,
  ReleasePayload,
  RunnerListPayload,
  RunnerScope,
} from "../../shared/src/contracts";
import { RunnerApiRequestError } from "./errors";
import {
  parseHealthPayload,
  parseMessagePayload,
  parseRegisteredRunner,
  parseRegistrationTokenPayload,
  parseReleasePayload,
  parseRunnerListPayload,
} from "./responses";

const GITHUB_ACCEPT = "application/vnd.github+json";

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

export interface RunnerApiClientOptions {
  baseUrl: string;
  /**
   * Personal access token (`ghp_…` / `github_pat_…`) used for token issuance and runner listing.
   */
  token?: string;
  fetchImpl?: FetchLike;
}

/**
 * Client for the runner-registration endpoints of the control plane (real or mocked).
 */
export class RunnerApiClient {
  private readonly baseUrl: string;
  private readonly fetchImpl: FetchLike;

  public constructor(private readonly options: RunnerApiClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
  }

  public async getLatestRelease(): Promise<ReleasePayload> {
    return await this.request("GET", "/repos/actions/runner/releases/latest", parseReleasePayload);
  }

  public async createRegistrationToken(scope: RunnerScope): Promise<RegistrationTokenPayload> {
    const authorization = this.personalAuthorization();
    return await this.request("POST", `${scopePath(scope)}/actions/runners/registration-token`, parseRegistrationTokenPayload, {
      authorization,
    });
  }

  public async listRunners(scope: RunnerScope): Promise<RunnerListPayload> {
    const authorization = this.personalAuthorization();
    return await this.request("GET", `${scopePath(scope)}/actions/runners`, parseRunnerListPayload, { authorization });
  }

  /**
   * Registers a runner with a token obtained from `createRegistrationToken`.
   */
  public async registerRunner(registrationToken: string, request: RegisterRunnerRequest): Promise<RegisteredRunner> {
    if (!hasMockRegistrationTokenFormat(registrationToken)) {
      throw new RunnerApiRequestError("invalid-token", "Registration token does not look like an issued registration token.");
    }

    return await this.request("POST", "/mock/runners", parseRegisteredRunner, {
      authorization: `RemoteAuth ${registrationToken}`,
      body: request,
    });
  }

  public async health(): Promise<HealthPayload> {
    return await this.request("GET", "/health", parseHealthPayload);
  }

  public async reset(): Promise<MessagePayload> {
    return await this.request("POST", "/reset", parseMessagePayload);
  }

  private personalAuthorization(): string {
    const token = (this.options.token ?? "").trim();
    if (!hasPersonalAccessTokenFormat(token)) {
      throw new RunnerApiRequestError(
        "invalid-token",
        "Invalid token format. Token should start with 'ghp_' or 'github_pat_'.",
      );
    }
    return `Bearer ${token}`;
  }

  /**
   * Sends one request and validates the JSON body with `parse`. A body that is not JSON,
   * or not the shape `parse` expects, becomes an `invalid-response` error.
   */
  private async request<T>(
    method: "GET" | "POST",
    path: string,
    parse: (value: unknown) => T,
    extra: { authorization?: string; body?: unknown } = {},
  ): Promise<T> {
    const url = `${this.baseUrl}${path}`;
    const headers: Record<string, string> = {
      accept: GITHUB_ACCEPT,
      "x-github-api-version": GITHUB_API_VERSION,
    };

    if (extra.authorization) {
      headers.authorization = extra.authorization;
    }
    if (extra.body !== undefined) {
      headers["content-type"] = "application/json";
    }

    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        method,
        headers,
        body: extra.body !== undefined ? JSON.stringify(extra.body) : undefined,
      });
    } catch (error) {
      throw new RunnerApiRequestError("network", `Network error for ${method} ${path}: ${String(error)}`);
    }

    const text = await response.text();
    if (!response.ok) {
      throw new RunnerApiRequestError(
        "http",
        `HTTP ${response.status} for ${method} ${path}: ${truncate(text, 400)}`,
        response.status,
        text,
      );
    }

    let body: unknown;
    try {
      body = JSON.parse(text);
    } catch (error) {
      throw new RunnerApiRequestError(
        "invalid-response",
        `Response for ${method} ${path} is not JSON: ${String(error)}`,
        response.status,
        text,
      );
    }

    try {
      return parse(body);
    } catch (error) {
      throw new RunnerApiRequestError(
        "invalid-response",
        `Unexpected response shape for ${method} ${path}: ${error instanceof Error ? error.message : String(error)}`,
        response.status,
        text,
      );
    }
  }
}

export function scopePath(scope: RunnerScope): string {
  if (scope.kind === "org") {
    return `/orgs/${encodeURIComponent(scope.org)}`;
  }
  return `/repos/${encodeURIComponent(scope.owner)}/${encodeURIComponent(scope.repo)}`;
}

/**
 * `acme` -> org scope, `acme/widgets` -> repo scope.
 */
export function parseRunnerScope(value: string): RunnerScope {
  const parts = value.trim().split("/");
  if (parts.length === 1 && parts[0]) {
    return { kind: "org", org: parts[0] };
  }
  if (parts.length === 2 && parts[0] && parts[1]) {
    return { kind: "repo", owner: parts[0], repo: parts[1] };
  }
  throw new Error(`Expected 'org' or 'owner/repo', got '${value}'.`);
}

function truncate(value: string, maxLength: number): string {
  if (value.length <= maxLength) {
    return value;
  }
  return `${value.slice(0, Math.max(0, maxLength - 3))}...`;
}
