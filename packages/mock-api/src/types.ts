import type {
  ApiErrorPayload,
  HealthPayload,
  MessagePayload,
  RegisteredRunner,
  RegistrationTokenPayload,
  ReleasePayload,
  RunnerListPayload,
} from "../../shared/src/contracts";

export type {
  ApiErrorPayload,
  HealthPayload,
  MessagePayload,
  RegisteredRunner,
  RegistrationTokenPayload,
  ReleasePayload,
  RunnerListPayload,
};

export type HttpMethod = "GET" | "POST";

export interface MockApiConfig {
  bindHost: string;
  port: number;
  authEnabled: boolean;
  logFile: string | null;
  verboseLogs: boolean;
}

/**
 * Gate applied before a route handler runs.
 *
 * - `public`: no header required.
 * - `personal-token`: `Bearer ghp_…` / `Bearer github_pat_…`.
 * - `registration-token`: a previously issued `MOCK_REG_…` token.
 */
export type RouteAccess = "public" | "personal-token" | "registration-token";

export interface DispatchRequest {
  method: string;
  path: string;
  authorization: string | null;
  body?: string;
}

export interface DispatchResult {
  statusCode: number;
  headers: Record<string, string>;
  body: string;
}

export interface RegistrySnapshot {
  requestCount: number;
  registeredRunners: number;
  startedAt: string;
  uptimeMs: number;
}
