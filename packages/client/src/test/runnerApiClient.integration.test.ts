import assert from "node:assert/strict";
import { test, TestContext } from "node:test";
import { ListenError } from "../../../mock-api/src/errors";
import { Logger } from "../../../mock-api/src/logger";
import { MockRegistry } from "../../../mock-api/src/registry";
import { MockApiServer } from "../../../mock-api/src/server";
import { FetchLike, parseRunnerScope, RunnerApiClient, scopePath } from "../client";
import { RunnerApiRequestError } from "../errors";
import { MockEventStream } from "../eventStream";
import { detectRunnerTarget, selectReleaseAsset } from "../releases";

const TOKEN = "ghp_test123";

async function withMockApi(t: TestContext, run: (baseUrl: string) => Promise<void>): Promise<void> {
  const server = new MockApiServer(
    { bindHost: "127.0.0.1", port: 0, authEnabled: true, logFile: null, verboseLogs: false },
    new MockRegistry(),
    new Logger(false),
  );

  try {
    await server.start();
  } catch (error) {
    if (error instanceof ListenError && (error.code === "EPERM" || error.code === "EACCES")) {
      t.skip("Socket listen is not permitted in this runtime; skipping integration test.");
      return;
    }
    throw error;
  }

  try {
    await run(`http://127.0.0.1:${server.port()}/`);
  } finally {
    await server.stop();
  }
}

function recordingFetch(response: () => Response): { fetchImpl: FetchLike; calls: string[] } {
  const calls: string[] = [];
  return {
    calls,
    fetchImpl: async (input) => {
      calls.push(input);
      return response();
    },
  };
}

test("issue, register and list runners against the mock API", async (t) => {
  await withMockApi(t, async (baseUrl) => {
    const client = new RunnerApiClient({ baseUrl, token: TOKEN });
    const scope = parseRunnerScope("acme/widgets");

    const issued = await client.createRegistrationToken(scope);
    assert.ok(issued.token.startsWith("MOCK_REG_"));

    const runner = await client.registerRunner(issued.token, { name: "build-01", labels: "self-hosted, linux" });
    assert.equal(runner.name, "build-01");
    assert.deepEqual(runner.labels, ["self-hosted", "linux"]);
    assert.ok(runner.id >= 1000 && runner.id <= 99999);

    const listed = await client.listRunners({ kind: "org", org: "acme" });
    assert.equal(listed.total_count, 1);
    assert.deepEqual(listed.runners[0], runner);

    const health = await client.health();
    assert.equal(health.registered_runners, 1);
    assert.equal(health.request_count, 4);

    assert.deepEqual(await client.reset(), { message: "Mock data reset successfully" });
    assert.equal((await client.health()).registered_runners, 0);
  });
});

test("latest release resolves to a downloadable linux package", async (t) => {
  await withMockApi(t, async (baseUrl) => {
    const client = new RunnerApiClient({ baseUrl });
    const release = await client.getLatestRelease();
    const target = detectRunnerTarget("linux", "x64");

    assert.equal(selectReleaseAsset(release, target.platform, target.arch).name, "actions-runner-linux-x64-2.311.0.tar.gz");
  });
});

test("event stream observes mutations made through the client", async (t) => {
  await withMockApi(t, async (baseUrl) => {
    const stream = await MockEventStream.connect(baseUrl);
    try {
      const client = new RunnerApiClient({ baseUrl, token: TOKEN });
      const issued = await client.createRegistrationToken({ kind: "org", org: "acme" });
      await client.registerRunner(issued.token, { name: "evented", labels: "self-hosted" });
      await client.reset();

      const tokenEvent = await stream.next("registration-token.issued");
      assert.ok(tokenEvent.type === "registration-token.issued");
      assert.equal(tokenEvent.data.scope, "acme");
      assert.equal(tokenEvent.data.expires_at, issued.expires_at);

      const resetEvent = await stream.next("registry.reset");
      assert.ok(resetEvent.type === "registry.reset");
      assert.equal(resetEvent.data.clearedRunners, 1);
      assert.equal(resetEvent.seq, 3);

      await assert.rejects(stream.next(null, 50), { message: "Timed out waiting for any event after 50 ms." });
    } finally {
      await stream.close();
    }
  });
});

test("server-side rejections surface as http errors with status", async (t) => {
  await withMockApi(t, async (baseUrl) => {
    const client = new RunnerApiClient({ baseUrl, token: TOKEN });

    await assert.rejects(
      client.registerRunner("MOCK_REG_placeholder", { name: "", labels: "self-hosted" }),
      (error: unknown) => {
        assert.ok(error instanceof RunnerApiRequestError);
        assert.equal(error.kind, "http");
        assert.equal(error.status, 422);
        assert.equal(JSON.parse(error.responseBody ?? "").message, "Field 'name' must not be empty.");
        return true;
      },
    );
  });
});

test("malformed personal tokens are rejected before any request", async () => {
  const { fetchImpl, calls } = recordingFetch(() => new Response("{}"));

  for (const token of [undefined, "", "token_abc", "gho_abc"]) {
    const client = new RunnerApiClient({ baseUrl: "http://mock.invalid", token, fetchImpl });
    await assert.rejects(client.createRegistrationToken({ kind: "org", org: "acme" }), {
      name: "RunnerApiRequestError",
      message: "Invalid token format. Token should start with 'ghp_' or 'github_pat_'.",
    });
  }

  const client = new RunnerApiClient({ baseUrl: "http://mock.invalid", token: TOKEN, fetchImpl });
  await assert.rejects(client.registerRunner("ghp_not_a_registration_token", { name: "x", labels: "x" }), (error: unknown) => {
    assert.ok(error instanceof RunnerApiRequestError);
    assert.equal(error.kind, "invalid-token");
    return true;
  });

  assert.deepEqual(calls, []);
});

test("requests carry API headers and encoded scope segments", async () => {
  const seen: Array<{ url: string; init: RequestInit }> = [];
  const fetchImpl: FetchLike = async (url, init) => {
    seen.push({ url, init });
    return new Response(JSON.stringify({ token: "MOCK_REG_x", expires_at: "2024-06-01T09:00:00Z" }));
  };

  const client = new RunnerApiClient({ baseUrl: "http://mock.invalid///", token: ` ${TOKEN} `, fetchImpl });
  await client.createRegistrationToken({ kind: "repo", owner: "acme", repo: "my widgets" });

  assert.equal(seen.length, 1);
  assert.equal(seen[0]?.url, "http://mock.invalid/repos/acme/my%20widgets/actions/runners/registration-token");
  assert.equal(seen[0]?.init.method, "POST");
  assert.deepEqual(seen[0]?.init.headers, {
    accept: "application/vnd.github+json",
    "x-github-api-version": "2022-11-28",
    authorization: `Bearer ${TOKEN}`,
  });
});

test("transport failures and non-JSON bodies map to distinct error kinds", async () => {
  const offline = new RunnerApiClient({
    baseUrl: "http://mock.invalid",
    fetchImpl: async () => {
      throw new TypeError("fetch failed");
    },
  });
  await assert.rejects(offline.health(), {
    kind: "network",
    message: "Network error for GET /health: TypeError: fetch failed",
  });

  const garbled = new RunnerApiClient({
    baseUrl: "http://mock.invalid",
    fetchImpl: recordingFetch(() => new Response("<html>", { status: 200 })).fetchImpl,
  });
  await assert.rejects(garbled.health(), (error: unknown) => {
    assert.ok(error instanceof RunnerApiRequestError);
    assert.equal(error.kind, "invalid-response");
    assert.equal(error.responseBody, "<html>");
    return true;
  });

  const failing = new RunnerApiClient({
    baseUrl: "http://mock.invalid",
    fetchImpl: recordingFetch(() => new Response("x".repeat(500), { status: 503 })).fetchImpl,
  });
  await assert.rejects(failing.reset(), (error: unknown) => {
    assert.ok(error instanceof RunnerApiRequestError);
    assert.equal(error.kind, "http");
    assert.equal(error.status, 503);
    assert.equal(error.message, `HTTP 503 for POST /reset: ${"x".repeat(397)}...`);
    return true;
  });
});

test("well-formed JSON with the wrong shape is an invalid-response error", async () => {
  const body = JSON.stringify({ status: "degraded" });
  const client = new RunnerApiClient({
    baseUrl: "http://mock.invalid",
    fetchImpl: recordingFetch(() => new Response(body, { status: 200 })).fetchImpl,
  });

  await assert.rejects(client.health(), (error: unknown) => {
    assert.ok(error instanceof RunnerApiRequestError);
    assert.equal(error.kind, "invalid-response");
    assert.equal(error.status, 200);
    assert.equal(error.responseBody, body);
    assert.equal(error.message, "Unexpected response shape for GET /health: Unexpected health status 'degraded'.");
    return true;
  });

  const listing = new RunnerApiClient({
    baseUrl: "http://mock.invalid",
    token: TOKEN,
    fetchImpl: recordingFetch(() => new Response(JSON.stringify({ total_count: 1, runners: "none" }))).fetchImpl,
  });
  await assert.rejects(listing.listRunners({ kind: "org", org: "acme" }), {
    kind: "invalid-response",
    message: "Unexpected response shape for GET /orgs/acme/actions/runners: Field 'runners' must be an array.",
  });
});

test("scope helpers parse and encode org and repo scopes", () => {
  assert.deepEqual(parseRunnerScope(" acme "), { kind: "org", org: "acme" });
  assert.deepEqual(parseRunnerScope("acme/widgets"), { kind: "repo", owner: "acme", repo: "widgets" });
  assert.throws(() => parseRunnerScope("a/b/c"), /Expected 'org' or 'owner\/repo', got 'a\/b\/c'\./);
  assert.throws(() => parseRunnerScope("acme/"), /Expected 'org' or 'owner\/repo'/);
  assert.equal(scopePath({ kind: "org", org: "a b" }), "/orgs/a%20b");
});
