/**
 * RSO Token Exchange
 *
 * Exchanges an authorization code for a token set at the RSO token endpoint.
 * Client credentials travel in an HTTP Basic Authorization header; the body
 * is form-encoded. The token set is returned as the provider sent it.
 */

import type { AppConfig } from '../config/index.js';
import { TokenExchangeError, errorMessage } from '../errors.js';
import { logger } from '../observability/logger.js';
import type { FetchFn } from '../utils/fetch.js';
import { isJsonObject, type JsonObject } from '../utils/json.js';

/**
 * Token endpoint response, passed through without validation
 * (access_token, token_type, expires_in, refresh_token, id_token, ...)
 */
export type TokenSet = JsonObject;

export type TokenExchangeConfig = Pick<AppConfig, 'httpTimeoutMs'> & {
  rso: Pick<AppConfig['rso'], 'tokenUrl' | 'callbackUrl' | 'clientId' | 'clientSecret'>;
};

export function basicAuthHeader(clientId: string, clientSecret: string): string {
  return `Basic ${Buffer.from(`${clientId}:${clientSecret}`).toString('base64')}`;
}

/**
 * Exchange authorization code for a token set
 *
 * @param config - RSO endpoint and client credentials
 * @param code - Authorization code from the callback query string
 * @param fetchFn - fetch implementation (injected in tests)
 * @returns The parsed JSON object, or an empty object when the body is empty or not a JSON object
 * @throws TokenExchangeError on network failure, timeout or a non-2xx response
 */
export async function exchangeCodeForTokens(
  config: TokenExchangeConfig,
  code: string,
  fetchFn: FetchFn = fetch
): Promise<TokenSet> {
  const { tokenUrl, callbackUrl, clientId, clientSecret } = config.rso;

  logger.info('[RSO] Token exchange started', { endpoint: tokenUrl, redirectUri: callbackUrl });

  const body = new URLSearchParams({
    grant_type: 'authorization_code',
    code,
    redirect_uri: callbackUrl,
  });

  let tokenRes: Response;
  try {
    tokenRes = await fetchFn(tokenUrl, {
      method: 'POST',
      headers: {
        Authorization: basicAuthHeader(clientId, clientSecret),
        'Content-Type': 'application/x-www-form-urlencoded',
      },
      body: body.toString(),
      signal: AbortSignal.timeout(config.httpTimeoutMs),
    });
  } catch (err) {
    logger.error('[RSO] Token exchange network error', { error: errorMessage(err) });
    throw new TokenExchangeError(`Network error contacting RSO: ${errorMessage(err)}`);
  }

  let responseText: string;
  try {
    responseText = await tokenRes.text();
  } catch (err) {
    logger.error('[RSO] Token response body could not be read', { error: errorMessage(err) });
    throw new TokenExchangeError(`Error reading RSO token response: ${errorMessage(err)}`, tokenRes.status);
  }

  if (!tokenRes.ok) {
    const errorText = responseText;
    logger.error('[RSO] Token exchange failed', {
      status: tokenRes.status,
      statusText: tokenRes.statusText,
      error: errorText,
    });
    throw new TokenExchangeError(`Token exchange failed (${tokenRes.status}): ${errorText}`, tokenRes.status);
  }

  const tokens = parseTokenSet(responseText);

  logger.info('[RSO] Token exchange completed', {
    fields: Object.keys(tokens),
    hasAccessToken: typeof tokens.access_token === 'string',
  });

  return tokens;
}

/**
 * Parse a token endpoint body; anything but a JSON object yields `{}`
 */
export function parseTokenSet(text: string): TokenSet {
  if (text.trim() === '') {
    return {};
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    logger.warn('[RSO] Token response is not JSON', { error: errorMessage(err) });
    return {};
  }

  return isJsonObject(parsed) ? parsed : {};
}
