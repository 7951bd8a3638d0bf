/**
 * Wraps the Express app in an HTTP or HTTPS server, depending on whether
 * TLS files are configured.
 */

import fs from 'node:fs';
import http from 'node:http';
import https from 'node:https';
import type { Express } from 'express';
import type { AppConfig } from './config/index.js';

export type ReadFileFn = (path: string) => Buffer;

export function createHttpServer(
  app: Express,
  config: Pick<AppConfig, 'tls'>,
  readFile: ReadFileFn = (path) => fs.readFileSync(path)
): http.Server | https.Server {
  if (!config.tls) {
    return http.createServer(app);
  }

  return https.createServer(
    {
      cert: readFile(config.tls.certPath),
      key: readFile(config.tls.keyPath),
    },
    app
  );
}

export function serverUrl(config: Pick<AppConfig, 'tls' | 'host' | 'port'>): string {
  return `${config.tls ? 'https' : 'http'}://${config.host}:${config.port}`;
}
