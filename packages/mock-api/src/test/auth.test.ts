import assert from "node:assert/strict";
import { test } from "node:test";
import { checkRouteAccess, isAuthorized, isRegistrationTokenAuthorized } from "../auth";

const enabled = { authEnabled: true };
const disabled = { authEnabled: false };

test("personal-token headers with ghp_ or github_pat_ prefixes are accepted", () => {
  assert.equal(isAuthorized("Bearer ghp_test123", enabled), true);
  assert.equal(isAuthorized("Bearer github_pat_11AAAA_test", enabled), true);
});

test("missing, empty and malformed headers are rejected", () => {
  const rejected = [
    null,
    undefined,
    "",
    "ghp_test123",
    "bearer ghp_test123",
    "Bearer  ghp_test123",
    "Bearer gho_test123",
    "Token ghp_test123",
    "Bearer MOCK_REG_abc",
  ];

  for (const header of rejected) {
    assert.equal(isAuthorized(header, enabled), false, `expected rejection for ${String(header)}`);
  }
});

test("disabled auth accepts every header, including none", () => {
  assert.equal(isAuthorized(null, disabled), true);
  assert.equal(isAuthorized("garbage", disabled), true);
  assert.equal(isRegistrationTokenAuthorized(undefined, disabled), true);
});

test("registration-token gate accepts Bearer and RemoteAuth schemes only with MOCK_REG_ tokens", () => {
  assert.equal(isRegistrationTokenAuthorized("RemoteAuth MOCK_REG_abc=", enabled), true);
  assert.equal(isRegistrationTokenAuthorized("Bearer MOCK_REG_abc", enabled), true);
  assert.equal(isRegistrationTokenAuthorized("Bearer MOCK_REG_", enabled), false);
  assert.equal(isRegistrationTokenAuthorized("Bearer ghp_test123", enabled), false);
  assert.equal(isRegistrationTokenAuthorized(null, enabled), false);
});

test("route access dispatches to the matching validator", () => {
  assert.equal(checkRouteAccess("public", null, enabled), true);
  assert.equal(checkRouteAccess("personal-token", null, enabled), false);
  assert.equal(checkRouteAccess("personal-token", "Bearer ghp_x", enabled), true);
  assert.equal(checkRouteAccess("registration-token", "Bearer ghp_x", enabled), false);
  assert.equal(checkRouteAccess("registration-token", "RemoteAuth MOCK_REG_x", enabled), true);
});
