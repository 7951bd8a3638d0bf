import { describe, expect, it } from '@jest/globals';
import { renderDataPage, renderErrorPage, renderLoginPage, renderRedirectPage } from './pages.js';

describe('renderLoginPage', () => {
  it('links to the sign-in URL', () => {
    const html = renderLoginPage('https://auth.example.com/authorize?client_id=test-client');

    expect(html).toContain('<h1>login</h1>');
    expect(html).toContain(
      '<a href="https://auth.example.com/authorize?client_id=test-client">Sign In --> https://auth.example.com/authorize?client_id=test-client</a>'
    );
  });
});

describe('renderRedirectPage', () => {
  it('navigates the browser with a script', () => {
    expect(renderRedirectPage('/show-data/?access_token=abc&')).toBe(
      '<script>window.location.href = "/show-data/?access_token=abc&";</script>'
    );
  });
});

describe('renderDataPage', () => {
  it('renders the account table before the champion rotation table', () => {
    const html = renderDataPage({ gameName: 'Tester' }, { maxNewPlayerLevel: 10 });

    const account = html.indexOf('<h2>account data queried using RSO Access Token:</h2>');
    const rotation = html.indexOf('<h2>champion rotation data queried using RGAPI token</h2>');

    expect(account).toBeGreaterThan(-1);
    expect(rotation).toBeGreaterThan(account);
    expect(html.indexOf('<td class="tg-0lax">Tester<br></td>')).toBeGreaterThan(account);
    expect(html.indexOf('<td class="tg-0lax">10<br></td>')).toBeGreaterThan(rotation);
  });
});

describe('renderErrorPage', () => {
  it('escapes the message', () => {
    const html = renderErrorPage(502, 'Token exchange failed (400): <invalid>');

    expect(html).toContain('<h1>Error 502</h1>');
    expect(html).toContain('<p>Token exchange failed (400): &lt;invalid&gt;</p>');
  });
});
