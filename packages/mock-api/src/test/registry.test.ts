import assert from "node:assert/strict";
import { test } from "node:test";
import { MOCK_RUNNER_OS, MockRegistry, RUNNER_ID_MAX, RUNNER_ID_MIN } from "../registry";

function fixedClock(start: string): { clock: () => Date; advance(ms: number): void } {
  let current = new Date(start).getTime();
  return {
    clock: () => new Date(current),
    advance(ms: number): void {
      current += ms;
    },
  };
}

test("register builds an online, idle runner with parsed labels", () => {
  const { clock } = fixedClock("2024-06-01T08:00:00.000Z");
  const registry = new MockRegistry({ clock, nextRunnerId: () => 4242 });

  const runner = registry.register("build-01", "self-hosted, linux,,x64");

  assert.deepEqual(runner, {
    id: 4242,
    name: "build-01",
    os: MOCK_RUNNER_OS,
    status: "online",
    labels: ["self-hosted", "linux", "x64"],
    busy: false,
    created_at: "2024-06-01T08:00:00.000Z",
  });
});

test("default ids fall inside the mock id range", () => {
  const registry = new MockRegistry();
  for (let index = 0; index < 20; index += 1) {
    const { id } = registry.register(`runner-${index}`, "self-hosted");
    assert.ok(Number.isInteger(id));
    assert.ok(id >= RUNNER_ID_MIN && id <= RUNNER_ID_MAX, `id ${id} out of range`);
  }
});

test("list preserves registration order and keeps duplicate names", () => {
  let nextId = 1000;
  const registry = new MockRegistry({ nextRunnerId: () => nextId++ });

  registry.register("alpha", "a");
  registry.register("beta", "b");
  registry.register("alpha", "c");

  const { count, runners } = registry.list();
  assert.equal(count, 3);
  assert.deepEqual(
    runners.map((runner) => [runner.id, runner.name]),
    [
      [1000, "alpha"],
      [1001, "beta"],
      [1002, "alpha"],
    ],
  );
});

test("returned records are copies and cannot mutate registry state", () => {
  const registry = new MockRegistry({ nextRunnerId: () => 7 });
  const created = registry.register("copy-check", "one");
  created.labels.push("injected");
  created.name = "renamed";

  const listed = registry.list().runners[0];
  assert.ok(listed);
  listed.labels.push("again");

  assert.deepEqual(registry.list().runners[0]?.labels, ["one"]);
  assert.equal(registry.list().runners[0]?.name, "copy-check");
});

test("reset clears runners and request count, and is idempotent", () => {
  const registry = new MockRegistry();
  registry.recordRequest();
  registry.recordRequest();
  registry.register("to-clear", "x");

  assert.equal(registry.reset(), 1);
  assert.equal(registry.snapshot().requestCount, 0);
  assert.equal(registry.list().count, 0);

  assert.equal(registry.reset(), 0);
  assert.equal(registry.snapshot().requestCount, 0);
  assert.equal(registry.snapshot().registeredRunners, 0);
});

test("snapshot reports counters, start time and uptime from the injected clock", () => {
  const time = fixedClock("2024-06-01T08:00:00.000Z");
  const registry = new MockRegistry({ clock: time.clock });

  assert.equal(registry.recordRequest(), 1);
  assert.equal(registry.recordRequest(), 2);
  registry.register("r", "x");
  time.advance(90_500);

  assert.deepEqual(registry.snapshot(), {
    requestCount: 2,
    registeredRunners: 1,
    startedAt: "2024-06-01T08:00:00.000Z",
    uptimeMs: 90_500,
  });
});

test("separate registries do not share state", () => {
  const first = new MockRegistry();
  const second = new MockRegistry();

  first.register("only-in-first", "x");
  first.recordRequest();

  assert.equal(second.list().count, 0);
  assert.equal(second.snapshot().requestCount, 0);
});
