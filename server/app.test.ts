/**
 * App wiring tests
 *
 * Serves the Express app on an ephemeral localhost port. Outbound calls go
 * through an injected fetch stub, so nothing leaves the process.
 */

import { afterAll, beforeAll, beforeEach, describe, expect, it, jest } from '@jest/globals';
import type { Server } from 'node:http';
import type { AddressInfo } from 'node:net';
import { createApp } from './app.js';
import type { FetchFn } from './utils/fetch.js';
import { createTestConfig, jsonResponse } from './test-utils/fixtures.js';

const ACCOUNT_URL = 'https://account.example.com/riot/account/v1/accounts/me';

describe('createApp', () => {
  const config = createTestConfig();
  const upstreamFetch = jest.fn<FetchFn>();
  let server: Server;
  let baseUrl: string;

  beforeAll(async () => {
    const app = createApp(config, { fetch: upstreamFetch });
    server = await new Promise<Server>((resolve) => {
      const listening = app.listen(0, '127.0.0.1', () => resolve(listening));
    });
    const { port } = server.address() as AddressInfo;
    baseUrl = `http://127.0.0.1:${port}`;
  });

  afterAll(async () => {
    server.closeAllConnections();
    await new Promise<void>((resolve) => server.close(() => resolve()));
  });

  beforeEach(() => {
    upstreamFetch.mockReset();
    upstreamFetch.mockImplementation(async (input) => {
      if (input === 'https://auth.example.com/token') {
        return jsonResponse({ access_token: 'abc', token_type: 'bearer' });
      }
      if (input === ACCOUNT_URL) {
        return jsonResponse({ gameName: 'Tester' });
      }
      return jsonResponse({ maxNewPlayerLevel: 10 });
    });
  });

  it('serves the login page with the sign-in link', async () => {
    const res = await fetch(`${baseUrl}/`);
    const html = await res.text();

    expect(res.status).toBe(200);
    expect(res.headers.get('content-type')).toContain('text/html');
    expect(html).toContain(`<a href="${config.rso.signInUrl}">`);
  });

  it('reports health', async () => {
    const res = await fetch(`${baseUrl}/health`);
    const body = await res.json();

    expect(res.status).toBe(200);
    expect(body).toEqual({ status: 'ok', timestamp: expect.any(String) });
  });

  it('mounts the callback on the configured path', async () => {
    const res = await fetch(`${baseUrl}/oauth-callback?code=auth-code-123`);

    expect(res.status).toBe(200);
    expect(await res.text()).toBe(
      '<script>window.location.href = "/show-data/?access_token=abc&token_type=bearer&";</script>'
    );
  });

  it('answers 400 when the callback has no code', async () => {
    const res = await fetch(`${baseUrl}/oauth-callback`);

    expect(res.status).toBe(400);
    expect(upstreamFetch).not.toHaveBeenCalled();
  });

  it('renders the data page', async () => {
    const res = await fetch(`${baseUrl}/show-data/?access_token=abc&token_type=bearer&`);
    const html = await res.text();

    expect(res.status).toBe(200);
    expect(html).toContain('<td class="tg-0lax">Tester<br></td>');
    expect(html).toContain('<td class="tg-0lax">10<br></td>');
    expect(upstreamFetch).toHaveBeenCalledTimes(2);
  });

  it('answers 400 when the data page has no access token', async () => {
    const res = await fetch(`${baseUrl}/show-data/`);

    expect(res.status).toBe(400);
    expect(await res.text()).toContain('<p>Missing required query parameter: access_token</p>');
  });

  it('answers 502 when a data API fails', async () => {
    upstreamFetch.mockResolvedValueOnce(jsonResponse({ status: { message: 'Forbidden' } }, 403));

    const res = await fetch(`${baseUrl}/show-data/?access_token=abc`);

    expect(res.status).toBe(502);
  });
});
