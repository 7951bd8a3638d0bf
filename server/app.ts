/**
 * Express application factory
 *
 * Builds the app without listening so tests can serve it on an ephemeral port.
 */

import * as Sentry from '@sentry/node';
import express, { type Express } from 'express';
import session from 'express-session';
import morgan from 'morgan';
import type { AppConfig } from './config/index.js';
import { errorHandler } from './middleware/error-handler.js';
import { logger } from './observability/logger.js';
import { SHOW_DATA_PATH } from './rso/redirect-target.js';
import { makeCallbackHandler, makeLoginHandler, makeShowDataHandler } from './rso/route-handlers/index.js';
import { defaultRouteDeps, type RouteDeps } from './rso/types.js';

export function createApp(config: Readonly<AppConfig>, deps: RouteDeps = defaultRouteDeps): Express {
  const app = express();

  // Session store backs TOKEN_HANDOFF=session; nothing is stored in query mode
  app.use(session({
    secret: config.app.sessionSecret,
    resave: false,
    saveUninitialized: false,
    cookie: {
      secure: 'auto',
      httpOnly: true,
      sameSite: 'lax', // Important for OAuth redirects
      maxAge: 10 * 60 * 1000,
    },
  }));

  // HTTP request logging middleware
  app.use(morgan('common', {
    stream: {
      write: (message: string) => logger.info(message.trim()),
    },
  }));

  app.get('/health', (req, res) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  app.get('/', makeLoginHandler(config));
  app.get(config.app.callbackPath, makeCallbackHandler(config, deps));
  app.get(SHOW_DATA_PATH, makeShowDataHandler(config, deps));

  Sentry.setupExpressErrorHandler(app);
  app.use(errorHandler);

  return app;
}
