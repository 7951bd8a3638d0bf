/**
 * Builds the display-page URL the callback page redirects the browser to.
 *
 * Every token field becomes a `key=value&` pair, in the order the token
 * endpoint returned them. The trailing `&` is kept after the last pair.
 */

import type { TokenSet } from './token-exchange.js';

export const SHOW_DATA_PATH = '/show-data/';

/**
 * @example
 * buildRedirectTarget({ access_token: 'abc', token_type: 'bearer' })
 * // => '/show-data/?access_token=abc&token_type=bearer&'
 * buildRedirectTarget({})
 * // => '/show-data/?'
 */
export function buildRedirectTarget(tokens: TokenSet, path: string = SHOW_DATA_PATH): string {
  return `${path}?${toQueryString(tokens)}`;
}

export function toQueryString(tokens: TokenSet): string {
  let queryString = '';
  for (const [key, value] of Object.entries(tokens)) {
    queryString += `${encodeURIComponent(key)}=${encodeURIComponent(String(value))}&`;
  }
  return queryString;
}
