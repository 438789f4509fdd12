import {
  AnyMockEvent,
  HealthPayload,
  MessagePayload,
  RegisteredRunner,
  RegistrationTokenPayload,
  ReleaseAsset,
  ReleasePayload,
  requireObject,
  RunnerListPayload,
} from "../../shared/src/contracts";

/**
 * Response validators. Each one throws a descriptive error when the body does not
 * have the documented shape.
 */

export function parseRegistrationTokenPayload(value: unknown): RegistrationTokenPayload {
  const payload = requireObject(value, "registration token response");
  return {
    token: requireString(payload.token, "token"),
    expires_at: requireString(payload.expires_at, "expires_at"),
  };
}

export function parseRunnerListPayload(value: unknown): RunnerListPayload {
  const payload = requireObject(value, "runner list response");
  const runners = payload.runners;
  if (!Array.isArray(runners)) {
    throw new Error("Field 'runners' must be an array.");
  }

  return {
    total_count: requireNumber(payload.total_count, "total_count"),
    runners: runners.map((runner) => parseRegisteredRunner(runner)),
  };
}

export function parseRegisteredRunner(value: unknown): RegisteredRunner {
  const payload = requireObject(value, "runner");
  const labels = payload.labels;
  if (!Array.isArray(labels) || !labels.every((label): label is string => typeof label === "string")) {
    throw new Error("Field 'labels' must be an array of strings.");
  }
  if (payload.status !== "online") {
    throw new Error(`Unexpected runner status '${String(payload.status)}'.`);
  }
  if (typeof payload.busy !== "boolean") {
    throw new Error("Field 'busy' must be a boolean.");
  }

  return {
    id: requireNumber(payload.id, "id"),
    name: requireString(payload.name, "name"),
    os: requireString(payload.os, "os"),
    status: payload.status,
    labels: [...labels],
    busy: payload.busy,
    created_at: requireString(payload.created_at, "created_at"),
  };
}

export function parseReleasePayload(value: unknown): ReleasePayload {
  const payload = requireObject(value, "release response");
  const assets = payload.assets;
  if (!Array.isArray(assets)) {
    throw new Error("Field 'assets' must be an array.");
  }

  return {
    tag_name: requireString(payload.tag_name, "tag_name"),
    name: requireString(payload.name, "name"),
    assets: assets.map((asset) => parseReleaseAsset(asset)),
  };
}

export function parseHealthPayload(value: unknown): HealthPayload {
  const payload = requireObject(value, "health response");
  if (payload.status !== "healthy") {
    throw new Error(`Unexpected health status '${String(payload.status)}'.`);
  }

  return {
    status: payload.status,
    uptime: requireString(payload.uptime, "uptime"),
    request_count: requireNumber(payload.request_count, "request_count"),
    registered_runners: requireNumber(payload.registered_runners, "registered_runners"),
  };
}

export function parseMessagePayload(value: unknown): MessagePayload {
  const payload = requireObject(value, "message response");
  return { message: requireString(payload.message, "message") };
}

export function parseMockEvent(value: unknown): AnyMockEvent {
  const payload = requireObject(value, "event");
  const seq = requireNumber(payload.seq, "seq");
  const ts = requireString(payload.ts, "ts");
  const data = requireObject(payload.data, "event data");

  switch (payload.type) {
    case "runner.registered":
      return { v: 1, seq, ts, type: "runner.registered", data: { runner: parseRegisteredRunner(data.runner) } };
    case "registration-token.issued":
      return {
        v: 1,
        seq,
        ts,
        type: "registration-token.issued",
        data: { scope: requireString(data.scope, "scope"), expires_at: requireString(data.expires_at, "expires_at") },
      };
    case "registry.reset":
      return { v: 1, seq, ts, type: "registry.reset", data: { clearedRunners: requireNumber(data.clearedRunners, "clearedRunners") } };
    default:
      throw new Error(`Unknown event type '${String(payload.type)}'.`);
  }
}

function parseReleaseAsset(value: unknown): ReleaseAsset {
  const payload = requireObject(value, "release asset");
  return {
    name: requireString(payload.name, "name"),
    browser_download_url: requireString(payload.browser_download_url, "browser_download_url"),
    size: requireNumber(payload.size, "size"),
  };
}

function requireString(value: unknown, field: string): string {
  if (typeof value !== "string") {
    throw new Error(`Field '${field}' must be a string.`);
  }
  return value;
}

function requireNumber(value: unknown, field: string): number {
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new Error(`Field '${field}' must be a number.`);
  }
  return value;
}
