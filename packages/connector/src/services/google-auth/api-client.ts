/**
 * Google OAuth
 *
 * One consent grants the Admin SDK Directory and Drive scopes; the stored
 * refresh token serves both clients.
 */

import {
  authorizationUrl,
  exchangeAuthorizationCode,
  refreshTokenGrant,
  type TokenGrant,
  type TokenSet,
} from "../../lib/oauth.js";

export const GOOGLE_AUTH_URL = "https://accounts.google.com/o/oauth2/v2/auth";
export const GOOGLE_TOKEN_URL = "https://oauth2.googleapis.com/token";

export const GOOGLE_SCOPES = [
  "https://www.googleapis.com/auth/admin.directory.group",
  "https://www.googleapis.com/auth/admin.directory.user",
  "https://www.googleapis.com/auth/drive",
];

export interface GoogleOAuthConfig {
  clientId: string;
  clientSecret: string;
  redirectUri: string;
}

/**
 * Offline access with a forced consent prompt, so Google issues a refresh
 * token every time.
 */
export function googleConsentUrl(config: GoogleOAuthConfig, scopes: string[] = GOOGLE_SCOPES): string {
  return authorizationUrl(GOOGLE_AUTH_URL, {
    client_id: config.clientId,
    redirect_uri: config.redirectUri,
    response_type: "code",
    scope: scopes.join(" "),
    access_type: "offline",
    prompt: "consent",
  });
}

export async function googleExchangeCode(config: GoogleOAuthConfig, code: string): Promise<TokenSet> {
  return exchangeAuthorizationCode(GOOGLE_TOKEN_URL, { ...config, code }, { service: "google" });
}

export function googleRefreshGrant(config: GoogleOAuthConfig): TokenGrant {
  return refreshTokenGrant(GOOGLE_TOKEN_URL, config, { service: "google" });
}
