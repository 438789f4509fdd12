import { ReleaseAsset, ReleasePayload } from "../../shared/src/contracts";

export type RunnerPlatform = "linux" | "win" | "osx";
export type RunnerArch = "x64" | "arm64" | "arm";

/**
 * Maps Node's `process.platform` / `process.arch` to the runner package naming.
 */
export function detectRunnerTarget(
  platform: string = process.platform,
  arch: string = process.arch,
): { platform: RunnerPlatform; arch: RunnerArch } {
  const runnerPlatform: RunnerPlatform | null =
    platform === "linux" ? "linux" : platform === "win32" ? "win" : platform === "darwin" ? "osx" : null;
  if (!runnerPlatform) {
    throw new Error(`Unsupported platform for runner packages: ${platform}`);
  }

  const runnerArch: RunnerArch | null = arch === "x64" ? "x64" : arch === "arm64" ? "arm64" : arch === "arm" ? "arm" : null;
  if (!runnerArch) {
    throw new Error(`Unsupported architecture for runner packages: ${arch}`);
  }

  return { platform: runnerPlatform, arch: runnerArch };
}

/**
 * Picks the `actions-runner-{platform}-{arch}-{version}` asset out of a release.
 */
export function selectReleaseAsset(release: ReleasePayload, platform: RunnerPlatform, arch: RunnerArch): ReleaseAsset {
  const prefix = `actions-runner-${platform}-${arch}-`;
  const asset = release.assets.find((candidate) => candidate.name.startsWith(prefix));

  if (!asset) {
    const available = release.assets.map((candidate) => candidate.name).join(", ") || "(none)";
    throw new Error(`Release ${release.tag_name} has no ${platform}-${arch} runner package. Available: ${available}`);
  }

  return { ...asset };
}

/**
 * `v2.311.0` -> `2.311.0`
 */
export function releaseVersion(release: ReleasePayload): string {
  return release.tag_name.replace(/^v/, "");
}
