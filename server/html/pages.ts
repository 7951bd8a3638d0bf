/**
 * HTML pages served by the sample server
 */

import { json2table } from './json-to-table.js';

export function renderLoginPage(signInUrl: string): string {
  return `
    <h1>login</h1>
    <a href="${signInUrl}">Sign In --> ${signInUrl}</a>
    `;
}

/**
 * The callback answers with a page that navigates the browser itself, so the
 * token handoff to the display page happens client-side.
 */
export function renderRedirectPage(target: string): string {
  return `<script>window.location.href = "${target}";</script>`;
}

export function renderDataPage(accountData: Record<string, unknown>, championRotationData: Record<string, unknown>): string {
  const accountHtml = `
            <h2>account data queried using RSO Access Token:</h2>
            <p>${json2table(accountData)}</p>
        `;

  const championRotationHtml = `
            <h2>champion rotation data queried using RGAPI token</h2>
            <p>${json2table(championRotationData)}</p>
        `;

  return `
        ${accountHtml}
        ${championRotationHtml}
    `;
}

export function renderErrorPage(status: number, message: string): string {
  return `
    <h1>Error ${status}</h1>
    <p>${escapeHtml(message)}</p>
    <p><a href="/">Back to login</a></p>
    `;
}

function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#x27;');
}
