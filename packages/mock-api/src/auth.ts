import { MOCK_TOKEN_PREFIX } from "../../shared/src/contracts";
import { RouteAccess } from "./types";

export interface AuthOptions {
  authEnabled: boolean;
}

const PERSONAL_TOKEN_HEADER = /^Bearer (ghp_|github_pat_)/;
const REGISTRATION_TOKEN_HEADER = new RegExp(`^(Bearer|RemoteAuth) ${MOCK_TOKEN_PREFIX}\\S+`);

/**
 * Format check for personal-access / app tokens. No signature or revocation lookup happens here.
 */
export function isAuthorized(header: string | null | undefined, options: AuthOptions): boolean {
  if (!options.authEnabled) {
    return true;
  }

  if (!header) {
    return false;
  }

  return PERSONAL_TOKEN_HEADER.test(header);
}

/**
 * Accepts any header carrying a `MOCK_REG_` token. Issued tokens are not remembered,
 * so expiry and reuse are not checked.
 */
export function isRegistrationTokenAuthorized(header: string | null | undefined, options: AuthOptions): boolean {
  if (!options.authEnabled) {
    return true;
  }

  if (!header) {
    return false;
  }

  return REGISTRATION_TOKEN_HEADER.test(header);
}

export function checkRouteAccess(access: RouteAccess, header: string | null, options: AuthOptions): boolean {
  switch (access) {
    case "public":
      return true;
    case "personal-token":
      return isAuthorized(header, options);
    case "registration-token":
      return isRegistrationTokenAuthorized(header, options);
  }
}
