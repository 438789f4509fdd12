import { randomInt } from "crypto";
import { splitLabels } from "../../shared/src/contracts";
import { RegisteredRunner, RegistrySnapshot } from "./types";

export const MOCK_RUNNER_OS = "Linux";
export const RUNNER_ID_MIN = 1_000;
export const RUNNER_ID_MAX = 99_999;

export interface MockRegistryOptions {
  clock?: () => Date;
  nextRunnerId?: () => number;
}

/**
 * In-memory state of one mock service instance.
 *
 * Holds the registered runners (in registration order), the request counter and the
 * start time. Runners are never partitioned by org or repo, and duplicate names are kept.
 */
export class MockRegistry {
  private runners: RegisteredRunner[] = [];
  private requestCount = 0;
  private readonly clock: () => Date;
  private readonly nextRunnerId: () => number;
  private readonly startedAt: Date;

  public constructor(options: MockRegistryOptions = {}) {
    this.clock = options.clock ?? (() => new Date());
    this.nextRunnerId = options.nextRunnerId ?? (() => randomInt(RUNNER_ID_MIN, RUNNER_ID_MAX + 1));
    this.startedAt = this.clock();
  }

  public register(name: string, labelsCsv: string): RegisteredRunner {
    const runner: RegisteredRunner = {
      id: this.nextRunnerId(),
      name,
      os: MOCK_RUNNER_OS,
      status: "online",
      labels: splitLabels(labelsCsv),
      busy: false,
      created_at: this.clock().toISOString(),
    };

    this.runners.push(runner);
    return cloneRunner(runner);
  }

  public list(): { count: number; runners: RegisteredRunner[] } {
    return {
      count: this.runners.length,
      runners: this.runners.map(cloneRunner),
    };
  }

  /**
   * Clears every runner and the request counter. Returns how many runners were dropped.
   */
  public reset(): number {
    const cleared = this.runners.length;
    this.runners = [];
    this.requestCount = 0;
    return cleared;
  }

  public recordRequest(): number {
    this.requestCount += 1;
    return this.requestCount;
  }

  public snapshot(): RegistrySnapshot {
    return {
      requestCount: this.requestCount,
      registeredRunners: this.runners.length,
      startedAt: this.startedAt.toISOString(),
      uptimeMs: Math.max(0, this.clock().getTime() - this.startedAt.getTime()),
    };
  }
}

function cloneRunner(runner: RegisteredRunner): RegisteredRunner {
  return {
    ...runner,
    labels: [...runner.labels],
  };
}
