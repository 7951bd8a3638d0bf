/**
 * RSO Callback Endpoint Factory
 *
 * Handles the browser redirect from RSO after the user signs in.
 *
 * Key Responsibilities:
 * - Read the authorization code from the query string
 * - Exchange it for a token set at the token endpoint
 * - Hand the token set to the display page, either in the redirect query
 *   string (default) or in the server-side session
 *
 * Usage:
 *   app.get(config.app.callbackPath, makeCallbackHandler(config, deps));
 */

import type { NextFunction, Request, Response } from 'express';
import type { AppConfig } from '../../config/index.js';
import { MissingParameterError } from '../../errors.js';
import { renderRedirectPage } from '../../html/pages.js';
import { logger } from '../../observability/logger.js';
import { getQueryParam } from '../query-params.js';
import { SHOW_DATA_PATH, buildRedirectTarget } from '../redirect-target.js';
import { exchangeCodeForTokens } from '../token-exchange.js';
import { defaultRouteDeps, type RouteDeps } from '../types.js';

export function makeCallbackHandler(config: Readonly<AppConfig>, deps: RouteDeps = defaultRouteDeps) {
  return async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    logger.info('[CALLBACK] RSO callback received', { handoff: config.app.tokenHandoff });

    try {
      const code = getQueryParam(req, 'code');
      if (!code) {
        throw new MissingParameterError('code');
      }

      const tokens = await exchangeCodeForTokens(config, code, deps.fetch);

      let target: string;
      if (config.app.tokenHandoff === 'session') {
        req.session.tokenSet = tokens;
        target = SHOW_DATA_PATH;
      } else {
        target = buildRedirectTarget(tokens);
      }

      logger.info('[CALLBACK] Redirecting to display page', { fields: Object.keys(tokens).length });
      res.type('html').send(renderRedirectPage(target));
    } catch (error) {
      next(error);
    }
  };
}
