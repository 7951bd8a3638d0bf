/**
 * Debug helpers for OAuth flow troubleshooting
 */

import type { AppConfig } from './config/index.js';
import { logger } from './observability/logger.js';

/**
 * Log the resolved configuration at startup, with secrets masked
 */
export function logEnvironmentInfo(config: Readonly<AppConfig>): void {
  logger.info('========== ENVIRONMENT INFO ==========');
  logger.info(`Node version: ${process.version}`);
  logger.info(`Environment: ${config.nodeEnv}`);
  logger.info(`Port: ${config.port}`);
  logger.info(`Host: ${config.host}`);
  logger.info(`TLS: ${config.tls ? `cert ${config.tls.certPath}, key ${config.tls.keyPath}` : 'disabled'}`);
  logger.info('--- RSO Configuration ---');
  logger.info(`RSO_BASE_URL: ${config.rso.baseUrl}`);
  logger.info(`RSO_CLIENT_ID: ${maskSensitive(config.rso.clientId)}`);
  logger.info(`RSO_CLIENT_SECRET: ${presence(config.rso.clientSecret)}`);
  logger.info(`Callback URL: ${config.rso.callbackUrl}`);
  logger.info(`Sign-in URL: ${config.rso.signInUrl}`);
  logger.info('--- Data APIs ---');
  logger.info(`RGAPI_TOKEN: ${presence(config.api.token)}`);
  logger.info(`Account data URL: ${config.api.accountDataUrl}`);
  logger.info(`Champion data URL: ${config.api.championDataUrl}`);
  logger.info(`Token handoff: ${config.app.tokenHandoff}`);
  logger.info(`HTTP timeout: ${config.httpTimeoutMs}ms`);
  logger.info('========== ENVIRONMENT INFO END ==========');
}

/**
 * Mask sensitive data in strings for logging
 */
export function maskSensitive(value: string | undefined, showLength: number = 10): string {
  if (!value) return 'NOT SET';
  if (value.length <= showLength) return value; // Don't mask if too short
  return `${value.substring(0, showLength)}... (length: ${value.length})`;
}

function presence(value: string | undefined): string {
  return value ? `present (length: ${value.length})` : 'NOT SET';
}
