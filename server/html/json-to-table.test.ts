import { describe, expect, it } from '@jest/globals';
import { json2table } from './json-to-table.js';

function countRows(html: string): number {
  return html.split('<tr>').length - 1;
}

describe('json2table', () => {
  it('renders one row per key after the header row', () => {
    const html = json2table({ puuid: 'p-1', gameName: 'Tester', tagLine: 'EUW' });

    expect(countRows(html)).toBe(4);
  });

  it('keeps the iteration order of the input object', () => {
    const html = json2table({ puuid: 'p-1', gameName: 'Tester', tagLine: 'EUW' });

    const puuid = html.indexOf('<td class="tg-0lax">puuid</td>');
    const gameName = html.indexOf('<td class="tg-0lax">gameName</td>');
    const tagLine = html.indexOf('<td class="tg-0lax">tagLine</td>');

    expect(puuid).toBeGreaterThan(-1);
    expect(gameName).toBeGreaterThan(puuid);
    expect(tagLine).toBeGreaterThan(gameName);
  });

  it('interpolates values without escaping', () => {
    const html = json2table({ note: '<b>bold</b>' });

    expect(html).toContain('<td class="tg-0lax"><b>bold</b><br></td>');
  });

  it('renders arrays and numbers in their string form', () => {
    const html = json2table({ freeChampionIds: [1, 2, 3], maxNewPlayerLevel: 10 });

    expect(html).toContain('<td class="tg-0lax">1,2,3<br></td>');
    expect(html).toContain('<td class="tg-0lax">10<br></td>');
  });

  it('renders only the header for an empty object', () => {
    const html = json2table({});

    expect(countRows(html)).toBe(1);
    expect(html).toContain('<th class="tg-0lax">key</th>');
    expect(html).toContain('<th class="tg-0lax">value</th>');
  });

  it('prefixes the table with its inline style block', () => {
    const html = json2table({});

    expect(html.trimStart().startsWith('<style type="text/css">')).toBe(true);
    expect(html.indexOf('</style>')).toBeLessThan(html.indexOf('<table class="tg">'));
  });
});
