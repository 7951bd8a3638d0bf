/**
 * Login Page Handler
 *
 * Usage:
 *   app.get('/', makeLoginHandler(config));
 */

import type { Request, Response } from 'express';
import type { AppConfig } from '../../config/index.js';
import { renderLoginPage } from '../../html/pages.js';

export function makeLoginHandler(config: Readonly<AppConfig>) {
  const page = renderLoginPage(config.rso.signInUrl);

  return (req: Request, res: Response): void => {
    res.type('html').send(page);
  };
}
