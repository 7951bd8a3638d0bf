export { loadConfig } from './env-config.js';
export type { AppConfig, TlsFiles, TokenHandoff } from './env-config.js';
export { buildRsoUrls, buildSignInUrl } from './rso-urls.js';
export type { RsoUrls, RsoUrlInputs } from './rso-urls.js';
