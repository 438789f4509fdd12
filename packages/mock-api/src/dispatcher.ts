import { API_DOCUMENTATION_URL, GITHUB_API_VERSION } from "../../shared/src/contracts";
import { checkRouteAccess } from "./auth";
import { MockApiError } from "./errors";
import { MockEventBus } from "./events";
import { HandlerResult, MOCK_API_ROUTES, MockApiRoute } from "./handlers";
import { MockRegistry } from "./registry";
import { matchRoute, normalizePathname } from "./router";
import { ApiErrorPayload, DispatchRequest, DispatchResult } from "./types";

export interface DispatcherOptions {
  authEnabled: boolean;
  events?: MockEventBus;
  routes?: ReadonlyArray<MockApiRoute>;
  clock?: () => Date;
}

/**
 * Maps one request to a JSON response.
 *
 * `dispatch` is synchronous: counting, matching, the auth gate and the handler's registry
 * mutation all run in a single event-loop turn, so concurrent connections never observe a
 * half-applied mutation.
 */
export class MockApiDispatcher {
  private readonly events: MockEventBus;
  private readonly routes: ReadonlyArray<MockApiRoute>;
  private readonly clock: () => Date;

  public constructor(
    private readonly registry: MockRegistry,
    private readonly options: DispatcherOptions,
  ) {
    this.events = options.events ?? new MockEventBus();
    this.routes = options.routes ?? MOCK_API_ROUTES;
    this.clock = options.clock ?? (() => new Date());
  }

  public get eventBus(): MockEventBus {
    return this.events;
  }

  public dispatch(request: DispatchRequest): DispatchResult {
    this.registry.recordRequest();

    try {
      const pathname = normalizePathname(request.path);
      const match = matchRoute(this.routes, request.method, pathname);

      if (!match) {
        return respond(404, notFound());
      }

      if (!checkRouteAccess(match.route.access, request.authorization, { authEnabled: this.options.authEnabled })) {
        return respond(401, unauthorized());
      }

      const result: HandlerResult = match.route.handler(
        {
          registry: this.registry,
          events: this.events,
          now: this.clock,
          body: request.body,
        },
        match.params,
      );

      return respond(result.statusCode, result.payload);
    } catch (error) {
      return errorResult(error);
    }
  }

  /**
   * Counts a request that failed before it could be dispatched (e.g. unreadable body)
   * and converts the failure into a response.
   */
  public fail(error: unknown): DispatchResult {
    this.registry.recordRequest();
    return errorResult(error);
  }
}

function errorResult(error: unknown): DispatchResult {
  if (error instanceof MockApiError) {
    return respond(error.statusCode, {
      message: error.message,
      documentation_url: API_DOCUMENTATION_URL,
    });
  }

  return internalError(error);
}

export function internalError(error: unknown): DispatchResult {
  const payload: ApiErrorPayload = {
    message: "Internal server error",
    error: error instanceof Error ? error.message : String(error),
  };
  return respond(500, payload);
}

function respond(statusCode: number, payload: unknown): DispatchResult {
  return {
    statusCode,
    headers: {
      "content-type": "application/json; charset=utf-8",
      "x-github-api-version": GITHUB_API_VERSION,
    },
    body: JSON.stringify(payload),
  };
}

function notFound(): ApiErrorPayload {
  return {
    message: "Not Found",
    documentation_url: API_DOCUMENTATION_URL,
  };
}

function unauthorized(): ApiErrorPayload {
  return { message: "Requires authentication" };
}
