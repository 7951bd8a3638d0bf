/**
 * RSO URL Builder
 *
 * Derives the token, authorize, callback and sign-in URLs from the raw
 * configuration values. URLs are joined as plain strings: the values come
 * from the operator's environment and are passed to the provider as given.
 */

export interface RsoUrlInputs {
  rsoBaseUrl: string;
  appBaseUrl: string;
  /** Callback path, e.g. '/oauth-callback' */
  callbackPath: string;
  clientId: string;
  responseType: string;
  scope: string;
}

export interface RsoUrls {
  /** `{RSO_BASE_URL}/token` */
  tokenUrl: string;
  /** `{RSO_BASE_URL}/authorize` */
  authorizeUrl: string;
  /** `{APP_BASE_URL}{APP_CALLBACK_PATH}`, sent as redirect_uri */
  callbackUrl: string;
  /** Authorize URL with redirect_uri, client_id, response_type and scope */
  signInUrl: string;
}

export function buildRsoUrls(inputs: RsoUrlInputs): RsoUrls {
  const tokenUrl = `${inputs.rsoBaseUrl}/token`;
  const authorizeUrl = `${inputs.rsoBaseUrl}/authorize`;
  const callbackUrl = `${inputs.appBaseUrl}${inputs.callbackPath}`;

  return {
    tokenUrl,
    authorizeUrl,
    callbackUrl,
    signInUrl: buildSignInUrl(authorizeUrl, callbackUrl, inputs.clientId, inputs.responseType, inputs.scope),
  };
}

/**
 * Build the sign-in link shown on the login page
 *
 * @example
 * buildSignInUrl('https://auth.example.com/authorize', 'http://localhost:3000/oauth-callback', 'my-client', 'code', 'openid')
 * // => 'https://auth.example.com/authorize?redirect_uri=http://localhost:3000/oauth-callback&client_id=my-client&response_type=code&scope=openid'
 */
export function buildSignInUrl(
  authorizeUrl: string,
  callbackUrl: string,
  clientId: string,
  responseType: string,
  scope: string
): string {
  let url = authorizeUrl;
  url += `?redirect_uri=${callbackUrl}`;
  url += `&client_id=${clientId}`;
  url += `&response_type=${responseType}`;
  url += `&scope=${scope}`;
  return url;
}
