import {
  formatRunnerScope,
  parseRegisterRunnerRequest,
  RegisterRunnerRequest,
  RunnerScope,
} from "../../shared/src/contracts";
import { MockApiError } from "./errors";
import { MockEventBus } from "./events";
import { MockRegistry } from "./registry";
import { decodePathParam, RouteDefinition } from "./router";
import { issueRegistrationToken } from "./token";
import {
  HealthPayload,
  MessagePayload,
  RegisteredRunner,
  RegistrationTokenPayload,
  ReleasePayload,
  RunnerListPayload,
} from "./types";

const MOCK_RUNNER_VERSION = "2.311.0";

const RELEASE_DOWNLOAD_BASE = `https://github.com/actions/runner/releases/download/v${MOCK_RUNNER_VERSION}`;

const LATEST_RELEASE: ReleasePayload = {
  tag_name: `v${MOCK_RUNNER_VERSION}`,
  name: `v${MOCK_RUNNER_VERSION}`,
  assets: [
    {
      name: `actions-runner-win-x64-${MOCK_RUNNER_VERSION}.zip`,
      browser_download_url: `${RELEASE_DOWNLOAD_BASE}/actions-runner-win-x64-${MOCK_RUNNER_VERSION}.zip`,
      size: 86_452_011,
    },
    {
      name: `actions-runner-linux-x64-${MOCK_RUNNER_VERSION}.tar.gz`,
      browser_download_url: `${RELEASE_DOWNLOAD_BASE}/actions-runner-linux-x64-${MOCK_RUNNER_VERSION}.tar.gz`,
      size: 174_328_520,
    },
  ],
};

export interface HandlerContext {
  registry: MockRegistry;
  events: MockEventBus;
  now: () => Date;
  body?: string;
}

export interface HandlerResult {
  statusCode: number;
  payload: unknown;
}

export type MockApiRoute = RouteDefinition<HandlerContext, HandlerResult>;

/**
 * Route table in match priority. The first entry whose method and pattern match wins.
 */
export const MOCK_API_ROUTES: ReadonlyArray<MockApiRoute> = [
  {
    name: "latest-release",
    method: "GET",
    pattern: /^\/repos\/actions\/runner\/releases\/latest$/,
    access: "public",
    handler: () => ok(cloneRelease()),
  },
  {
    name: "org-registration-token",
    method: "POST",
    pattern: /^\/orgs\/([^/]+)\/actions\/runners\/registration-token$/,
    access: "personal-token",
    handler: (context, params) => issueToken(context, { kind: "org", org: decodePathParam(params[0], "org") }),
  },
  {
    name: "repo-registration-token",
    method: "POST",
    pattern: /^\/repos\/([^/]+)\/([^/]+)\/actions\/runners\/registration-token$/,
    access: "personal-token",
    handler: (context, params) =>
      issueToken(context, {
        kind: "repo",
        owner: decodePathParam(params[0], "owner"),
        repo: decodePathParam(params[1], "repo"),
      }),
  },
  {
    name: "org-runners",
    method: "GET",
    pattern: /^\/orgs\/([^/]+)\/actions\/runners$/,
    access: "personal-token",
    handler: (context, params) => {
      // Decoded only to reject malformed escapes; runners are not partitioned by scope.
      decodePathParam(params[0], "org");
      return listRunners(context);
    },
  },
  {
    name: "repo-runners",
    method: "GET",
    pattern: /^\/repos\/([^/]+)\/([^/]+)\/actions\/runners$/,
    access: "personal-token",
    handler: (context, params) => {
      // Same as above.
      decodePathParam(params[0], "owner");
      decodePathParam(params[1], "repo");
      return listRunners(context);
    },
  },
  {
    name: "health",
    method: "GET",
    pattern: /^\/health$/,
    access: "public",
    handler: (context) => health(context),
  },
  {
    name: "reset",
    method: "POST",
    pattern: /^\/reset$/,
    access: "public",
    handler: (context) => reset(context),
  },
  {
    name: "register-runner",
    method: "POST",
    pattern: /^\/mock\/runners$/,
    access: "registration-token",
    handler: (context) => registerRunner(context),
  },
];

function issueToken(context: HandlerContext, scope: RunnerScope): HandlerResult {
  const payload: RegistrationTokenPayload = issueRegistrationToken(context.now());

  context.events.publish("registration-token.issued", {
    scope: formatRunnerScope(scope),
    expires_at: payload.expires_at,
  });

  return ok(payload);
}

function listRunners(context: HandlerContext): HandlerResult {
  const { count, runners } = context.registry.list();
  const payload: RunnerListPayload = {
    total_count: count,
    runners,
  };
  return ok(payload);
}

function health(context: HandlerContext): HandlerResult {
  const snapshot = context.registry.snapshot();
  const payload: HealthPayload = {
    status: "healthy",
    uptime: formatUptime(snapshot.uptimeMs),
    request_count: snapshot.requestCount,
    registered_runners: snapshot.registeredRunners,
  };
  return ok(payload);
}

function reset(context: HandlerContext): HandlerResult {
  const clearedRunners = context.registry.reset();
  context.events.publish("registry.reset", { clearedRunners });

  const payload: MessagePayload = { message: "Mock data reset successfully" };
  return ok(payload);
}

function registerRunner(context: HandlerContext): HandlerResult {
  const request = parseRegistration(parseJsonBody(context.body));
  const runner: RegisteredRunner = context.registry.register(request.name, request.labels);
  context.events.publish("runner.registered", { runner });

  return { statusCode: 201, payload: runner };
}

function parseRegistration(body: unknown): RegisterRunnerRequest {
  try {
    return parseRegisterRunnerRequest(body);
  } catch (error) {
    throw new MockApiError("INVALID_INPUT", error instanceof Error ? error.message : String(error));
  }
}

function parseJsonBody(raw: string | undefined): unknown {
  if (!raw || !raw.trim()) {
    throw new MockApiError("INVALID_JSON", "Problems parsing JSON");
  }

  try {
    return JSON.parse(raw);
  } catch {
    throw new MockApiError("INVALID_JSON", "Problems parsing JSON");
  }
}

/**
 * `HH:MM:SS`, hours not wrapped at 24.
 */
export function formatUptime(uptimeMs: number): string {
  const totalSeconds = Math.floor(Math.max(0, uptimeMs) / 1_000);
  const hours = Math.floor(totalSeconds / 3_600);
  const minutes = Math.floor((totalSeconds % 3_600) / 60);
  const seconds = totalSeconds % 60;

  return [hours, minutes, seconds].map((part) => String(part).padStart(2, "0")).join(":");
}

function ok(payload: unknown): HandlerResult {
  return { statusCode: 200, payload };
}

function cloneRelease(): ReleasePayload {
  return {
    ...LATEST_RELEASE,
    assets: LATEST_RELEASE.assets.map((asset) => ({ ...asset })),
  };
}
