import { randomBytes } from "crypto";
import { MOCK_TOKEN_PREFIX } from "../../shared/src/contracts";
import { RegistrationTokenPayload } from "./types";

export const TOKEN_ENTROPY_BYTES = 32;
export const TOKEN_TTL_MS = 60 * 60 * 1_000;

/**
 * Issues a fresh registration token valid for one hour.
 *
 * `randomBytes` throws when the CSPRNG is unavailable; that error is left to propagate.
 */
export function issueRegistrationToken(now: Date = new Date()): RegistrationTokenPayload {
  const token = `${MOCK_TOKEN_PREFIX}${randomBytes(TOKEN_ENTROPY_BYTES).toString("base64")}`;
  const expiresAt = new Date(now.getTime() + TOKEN_TTL_MS);

  return {
    token,
    expires_at: formatUtcSeconds(expiresAt),
  };
}

/**
 * `yyyy-MM-ddTHH:mm:ssZ`
 */
export function formatUtcSeconds(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, "Z");
}
