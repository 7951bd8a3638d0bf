/**
 * Riot API Client Factory
 *
 * Creates pre-configured clients for the two data APIs the display page reads.
 * The credential is captured in the closure, so callers never pass tokens
 * alongside request parameters.
 *
 * Usage:
 *   const client = createRsoClient(accessToken, config.httpTimeoutMs);
 *   const account = await getAccountData(client, config.api.accountDataUrl);
 */

import { RiotApiError, errorMessage } from '../errors.js';
import { logger } from '../observability/logger.js';
import type { FetchFn } from '../utils/fetch.js';
import { isJsonObject, type JsonObject } from '../utils/json.js';

export interface RiotClient {
  /**
   * Make an authenticated GET request and parse the JSON body
   * @param url - The full URL to fetch
   * @throws RiotApiError on network failure, timeout, non-2xx status or a non-object body
   */
  getJson: (url: string) => Promise<JsonObject>;

  /** How this client authenticates */
  authType: 'bearer' | 'api-key';
}

/**
 * Create a client that sends the user's RSO access token as a bearer token
 */
export function createRsoClient(accessToken: string, timeoutMs: number, fetchFn: FetchFn = fetch): RiotClient {
  return {
    authType: 'bearer',
    getJson: (url) => getJson(fetchFn, url, { Authorization: `Bearer ${accessToken}` }, timeoutMs),
  };
}

/**
 * Create a client that sends the static API token in the X-Riot-Token header
 */
export function createApiKeyClient(apiKey: string, timeoutMs: number, fetchFn: FetchFn = fetch): RiotClient {
  return {
    authType: 'api-key',
    getJson: (url) => getJson(fetchFn, url, { 'X-Riot-Token': apiKey }, timeoutMs),
  };
}

export async function getAccountData(client: RiotClient, url: string): Promise<JsonObject> {
  logger.info('Requesting account data');
  const data = await client.getJson(url);
  logger.info('Received account data', { keys: Object.keys(data) });
  return data;
}

export async function getChampionRotation(client: RiotClient, url: string): Promise<JsonObject> {
  logger.info('Requesting champion rotation data');
  const data = await client.getJson(url);
  logger.info('Received champion rotation data', { keys: Object.keys(data) });
  return data;
}

async function getJson(
  fetchFn: FetchFn,
  url: string,
  authHeaders: Record<string, string>,
  timeoutMs: number
): Promise<JsonObject> {
  let response: Response;
  try {
    response = await fetchFn(url, {
      method: 'GET',
      headers: {
        ...authHeaders,
        Accept: 'application/json',
      },
      signal: AbortSignal.timeout(timeoutMs),
    });
  } catch (err) {
    logger.error('Data API network error', { url, error: errorMessage(err) });
    throw new RiotApiError(`Network error contacting ${url}: ${errorMessage(err)}`, url);
  }

  let responseText: string;
  try {
    responseText = await response.text();
  } catch (err) {
    logger.error('Data API body could not be read', { url, status: response.status, error: errorMessage(err) });
    throw new RiotApiError(`Error reading response from ${url}: ${errorMessage(err)}`, url, response.status);
  }

  if (!response.ok) {
    logger.error('Data API request failed', { url, status: response.status, error: responseText });
    throw new RiotApiError(`Request to ${url} failed (${response.status}): ${responseText}`, url, response.status);
  }

  let body: unknown;
  try {
    body = JSON.parse(responseText);
  } catch (err) {
    logger.error('Data API returned an unreadable body', { url, status: response.status, error: errorMessage(err) });
    throw new RiotApiError(`Invalid JSON from ${url}: ${errorMessage(err)}`, url, response.status);
  }

  if (!isJsonObject(body)) {
    throw new RiotApiError(`Expected a JSON object from ${url}`, url, response.status);
  }
  return body;
}
