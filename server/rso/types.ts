/**
 * Shared types for the RSO sign-in flow
 */

import type { FetchFn } from '../utils/fetch.js';
import type { TokenSet } from './token-exchange.js';

// Express session interface extension (used when TOKEN_HANDOFF=session)
declare module 'express-session' {
  interface SessionData {
    tokenSet?: TokenSet;
  }
}

/**
 * Collaborators injected into route handler factories
 */
export interface RouteDeps {
  fetch: FetchFn;
}

export const defaultRouteDeps: RouteDeps = {
  fetch: (input, init) => fetch(input, init),
};
