/**
 * Shared fixtures for unit tests
 */

import { loadConfig, type AppConfig } from '../config/index.js';

export const TEST_ENV = {
  RSO_BASE_URL: 'https://auth.example.com',
  RSO_CLIENT_ID: 'test-client',
  RSO_CLIENT_SECRET: 'test-secret',
  APP_BASE_URL: 'http://localhost:3000',
  APP_CALLBACK_PATH: '/oauth-callback',
  CLIENT_ID: 'test-client',
  RESPONSE_TYPE: 'code',
  SCOPE: 'openid',
  RGAPI_TOKEN: 'test-api-token',
  RGAPI_URL_ACCOUNT_DATA: 'https://account.example.com/riot/account/v1/accounts/me',
  RGAPI_URL_CHAMPION_DATA: 'https://platform.example.com/lol/platform/v3/champion-rotations',
  NODE_ENV: 'test',
};

export function createTestConfig(overrides: Record<string, string> = {}): Readonly<AppConfig> {
  return loadConfig({ ...TEST_ENV, ...overrides });
}

/**
 * Minimal fetch Response stand-in exposing what the server code reads
 */
export function mockResponse(status: number, body: string): Response {
  return {
    ok: status >= 200 && status < 300,
    status,
    statusText: status === 200 ? 'OK' : 'Error',
    text: async () => body,
    json: async () => JSON.parse(body),
  } as unknown as Response;
}

export function jsonResponse(body: unknown, status: number = 200): Response {
  return mockResponse(status, JSON.stringify(body));
}
