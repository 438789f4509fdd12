export { RunnerApiClient, parseRunnerScope, scopePath } from "./client";
export type { FetchLike, RunnerApiClientOptions } from "./client";
export { RunnerApiRequestError } from "./errors";
export { MockEventStream } from "./eventStream";
export { detectRunnerTarget, releaseVersion, selectReleaseAsset } from "./releases";
export type { RunnerArch, RunnerPlatform } from "./releases";
