import { existsSync, readFileSync } from "fs";
import { resolve } from "path";
import { MockApiConfig } from "./types";

interface MockApiConfigFile {
  bindHost?: string;
  port?: number;
  authEnabled?: boolean;
  logFile?: string | null;
  verboseLogs?: boolean;
}

const DEFAULT_PORT = 8080;

/**
 * Loads runtime configuration from JSON and environment variables.
 *
 * Precedence order:
 * 1. Environment variables.
 * 2. JSON file content.
 * 3. Built-in defaults.
 */
export function loadConfig(
  cwd: string,
  env: NodeJS.ProcessEnv = process.env,
): { config: MockApiConfig; configPath: string; fromFile: boolean } {
  const configPath = env.RUNNER_MOCK_CONFIG
    ? resolve(cwd, env.RUNNER_MOCK_CONFIG)
    : resolve(cwd, "packages/mock-api/config/mock-api.config.json");

  const fileConfig = loadConfigFile(configPath);

  const bindHost = normalizeString(env.RUNNER_MOCK_BIND_HOST, fileConfig?.bindHost, "127.0.0.1");
  const port = normalizeNumber(env.RUNNER_MOCK_PORT, fileConfig?.port, DEFAULT_PORT, 1, 65535);
  const authEnabled = normalizeBoolean(env.RUNNER_MOCK_AUTH_ENABLED, fileConfig?.authEnabled, true);
  const logFileRaw = normalizeString(env.RUNNER_MOCK_LOG_FILE, fileConfig?.logFile ?? undefined, "");
  const verboseLogs = normalizeBoolean(env.RUNNER_MOCK_VERBOSE, fileConfig?.verboseLogs, false);

  const config: MockApiConfig = {
    bindHost,
    port,
    authEnabled,
    logFile: logFileRaw ? resolve(cwd, logFileRaw) : null,
    verboseLogs,
  };

  return { config, configPath, fromFile: fileConfig !== null };
}

function loadConfigFile(configPath: string): MockApiConfigFile | null {
  if (!existsSync(configPath)) {
    return null;
  }

  try {
    const raw = readFileSync(configPath, "utf8");
    const parsed: unknown = JSON.parse(raw);
    if (!parsed || typeof parsed !== "object" || Array.isArray(parsed)) {
      return null;
    }
    return parsed as MockApiConfigFile;
  } catch {
    return null;
  }
}

function normalizeString(primary: string | undefined, secondary: string | undefined, fallback: string): string {
  const value = (primary ?? (typeof secondary === "string" ? secondary : undefined) ?? fallback).trim();
  return value || fallback;
}

function normalizeNumber(
  primary: string | undefined,
  secondary: number | undefined,
  fallback: number,
  min: number,
  max: number,
): number {
  const fromEnv = primary ? Number(primary) : undefined;
  const candidate = fromEnv !== undefined && Number.isFinite(fromEnv) ? fromEnv : secondary;

  if (typeof candidate !== "number" || !Number.isFinite(candidate)) {
    return fallback;
  }

  const bounded = Math.floor(candidate);
  if (bounded < min) {
    return min;
  }
  if (bounded > max) {
    return max;
  }
  return bounded;
}

function normalizeBoolean(primary: string | undefined, secondary: boolean | undefined, fallback: boolean): boolean {
  if (typeof primary === "string" && primary.trim()) {
    const value = primary.trim().toLowerCase();
    return value === "1" || value === "true" || value === "yes" || value === "on";
  }

  if (typeof secondary === "boolean") {
    return secondary;
  }

  return fallback;
}
