/**
 * Display Page Handler
 *
 * Reads the account behind the user's access token and the current champion
 * rotation, one after the other, and renders both as HTML tables.
 *
 * The account lookup uses the RSO access token; the champion rotation uses
 * the static API token from configuration. Neither token is shared between
 * the two clients.
 */

import type { NextFunction, Request, Response } from 'express';
import type { AppConfig } from '../../config/index.js';
import { MissingParameterError } from '../../errors.js';
import { renderDataPage } from '../../html/pages.js';
import { logger } from '../../observability/logger.js';
import {
  createApiKeyClient,
  createRsoClient,
  getAccountData,
  getChampionRotation,
} from '../../riot-api/riot-api-client.js';
import { getQueryParam } from '../query-params.js';
import { defaultRouteDeps, type RouteDeps } from '../types.js';

export function makeShowDataHandler(config: Readonly<AppConfig>, deps: RouteDeps = defaultRouteDeps) {
  return async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    logger.info('[SHOW-DATA] Handling data request');

    try {
      const accessToken = resolveAccessToken(req, config);
      if (!accessToken) {
        throw new MissingParameterError('access_token');
      }

      const rsoClient = createRsoClient(accessToken, config.httpTimeoutMs, deps.fetch);
      const accountData = await getAccountData(rsoClient, config.api.accountDataUrl);

      const apiKeyClient = createApiKeyClient(config.api.token, config.httpTimeoutMs, deps.fetch);
      const championRotationData = await getChampionRotation(apiKeyClient, config.api.championDataUrl);

      logger.info('[SHOW-DATA] Completed data request');
      res.type('html').send(renderDataPage(accountData, championRotationData));
    } catch (error) {
      next(error);
    }
  };
}

/**
 * The query string wins; in session handoff mode the session's token set is the fallback
 */
function resolveAccessToken(req: Request, config: Readonly<AppConfig>): string | undefined {
  const fromQuery = getQueryParam(req, 'access_token');
  if (fromQuery || config.app.tokenHandoff !== 'session') {
    return fromQuery;
  }

  const fromSession = req.session?.tokenSet?.access_token;
  return typeof fromSession === 'string' && fromSession.length > 0 ? fromSession : undefined;
}
