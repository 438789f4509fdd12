/**
 * Wire contracts shared by the mock API server and its clients.
 */
export const MOCK_TOKEN_PREFIX = "MOCK_REG_";
export const GITHUB_API_VERSION = "2022-11-28";
export const API_DOCUMENTATION_URL = "https://docs.github.com/rest";
export const DEFAULT_RUNNER_LABELS = "self-hosted";

export type RunnerScope = { kind: "org"; org: string } | { kind: "repo"; owner: string; repo: string };

export interface RegisteredRunner {
  id: number;
  name: string;
  os: string;
  status: "online";
  labels: string[];
  busy: boolean;
  created_at: string;
}

export interface RegistrationTokenPayload {
  token: string;
  expires_at: string;
}

export interface RunnerListPayload {
  total_count: number;
  runners: RegisteredRunner[];
}

export interface ReleaseAsset {
  name: string;
  browser_download_url: string;
  size: number;
}

export interface ReleasePayload {
  tag_name: string;
  name: string;
  assets: ReleaseAsset[];
}

export interface HealthPayload {
  status: "healthy";
  uptime: string;
  request_count: number;
  registered_runners: number;
}

export interface MessagePayload {
  message: string;
}

export interface ApiErrorPayload {
  message: string;
  documentation_url?: string;
  error?: string;
}

export interface RegisterRunnerRequest {
  name: string;
  labels: string;
}

export type MockEventType = "runner.registered" | "registration-token.issued" | "registry.reset";

export interface MockEventDataMap {
  "runner.registered": { runner: RegisteredRunner };
  "registration-token.issued": { scope: string; expires_at: string };
  "registry.reset": { clearedRunners: number };
}

export interface MockEvent<T extends MockEventType = MockEventType> {
  v: 1;
  seq: number;
  ts: string;
  type: T;
  data: MockEventDataMap[T];
}

export type AnyMockEvent = { [K in MockEventType]: MockEvent<K> }[MockEventType];

/**
 * Parse and validate a runner registration payload.
 * Throws a descriptive error when payload is invalid.
 */
export function parseRegisterRunnerRequest(value: unknown): RegisterRunnerRequest {
  const payload = requireObject(value, "register runner payload");

  const name = requireNonEmptyString(payload.name, "name");
  const labels = parseOptionalLabels(payload.labels, "labels");

  return {
    name,
    labels: labels ?? DEFAULT_RUNNER_LABELS,
  };
}

/**
 * Splits a comma-separated label list, trimming entries and dropping empty ones.
 * Stricter than a plain comma split: `"a, ,b"` yields `["a", "b"]`, not `["a", " ", "b"]`.
 */
export function splitLabels(labelsCsv: string): string[] {
  return labelsCsv
    .split(",")
    .map((label) => label.trim())
    .filter((label) => label.length > 0);
}

/**
 * True when the raw token looks like a classic or fine-grained personal access token.
 */
export function hasPersonalAccessTokenFormat(token: string): boolean {
  return /^(ghp_|github_pat_)/.test(token);
}

export function hasMockRegistrationTokenFormat(token: string): boolean {
  return token.startsWith(MOCK_TOKEN_PREFIX) && token.length > MOCK_TOKEN_PREFIX.length;
}

export function formatRunnerScope(scope: RunnerScope): string {
  return scope.kind === "org" ? scope.org : `${scope.owner}/${scope.repo}`;
}

export function requireObject(value: unknown, label: string): Record<string, unknown> {
  if (!value || typeof value !== "object" || Array.isArray(value)) {
    throw new Error(`${label} must be a JSON object.`);
  }

  return value as Record<string, unknown>;
}

function requireNonEmptyString(value: unknown, field: string): string {
  if (typeof value !== "string") {
    throw new Error(`Field '${field}' must be a string.`);
  }

  const normalized = value.trim();
  if (!normalized) {
    throw new Error(`Field '${field}' must not be empty.`);
  }

  return normalized;
}

function parseOptionalLabels(value: unknown, field: string): string | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }

  if (Array.isArray(value)) {
    if (!value.every((item): item is string => typeof item === "string")) {
      throw new Error(`Field '${field}' must contain only strings.`);
    }
    return value.join(",");
  }

  if (typeof value !== "string") {
    throw new Error(`Field '${field}' must be a comma-separated string, a string array, or omitted.`);
  }

  return value;
}
