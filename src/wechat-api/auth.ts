/**
 * Access-token grant for the WeChat Official Account API.
 *
 * Pure helpers (expiry check, URL builder) are exported separately so they
 * can be unit-tested without a network.
 */

import { readApiBody, requireString } from './response.js';
import { API_PATHS, DEFAULT_API_BASE, WeChatApiError } from './types.js';
import type { AccessTokenStore, WeChatCredentials } from './types.js';

/** Tokens are refreshed this long before their real expiry. */
export const TOKEN_SAFETY_MARGIN_MS = 5 * 60_000;

/**
 * Check whether a cached token is expired, applying
 * {@link TOKEN_SAFETY_MARGIN_MS}.
 */
export function isTokenExpired(store: AccessTokenStore, now: number = Date.now()): boolean {
  return now >= store.expiresAt - TOKEN_SAFETY_MARGIN_MS;
}

export function buildTokenUrl(credentials: WeChatCredentials, baseUrl: string = DEFAULT_API_BASE): string {
  const params = new URLSearchParams({
    grant_type: 'client_credential',
    appid: credentials.appId,
    secret: credentials.appSecret,
  });
  return `${baseUrl}${API_PATHS.token}?${params.toString()}`;
}

/**
 * Request a new access token with the client-credential grant.
 *
 * @throws {WeChatAuthError} for bad credentials or a non-whitelisted IP.
 */
export async function requestAccessToken(
  credentials: WeChatCredentials,
  fetchImpl: typeof fetch = fetch,
  baseUrl: string = DEFAULT_API_BASE,
): Promise<AccessTokenStore> {
  const response = await fetchImpl(buildTokenUrl(credentials, baseUrl), { method: 'GET' });
  const body = await readApiBody(response);

  const accessToken = requireString(body, 'access_token', response.status);
  const expiresIn = body.expires_in;
  if (typeof expiresIn !== 'number' || expiresIn <= 0) {
    throw new WeChatApiError(response.status, 0, 'WeChat API response is missing "expires_in"');
  }

  return { accessToken, expiresAt: Date.now() + expiresIn * 1000 };
}
