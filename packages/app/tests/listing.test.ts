/**
 * TWSE listing universe tests
 *
 * Fixtures are Big5-encoded like the live pages.
 */

import { describe, it, expect } from 'vitest';
import { readFile } from 'node:fs/promises';
import { ProviderResponseError, type SecurityRef } from '@yieldwatch/contracts';
import { TwseListingSource, parseListingHtml } from '../src/universe/twse-listing-source.js';
import { silentLogger, stubClient } from './helpers.js';

const fixture = (name: string) => readFile(new URL(`./fixtures/${name}`, import.meta.url));

async function collect(source: TwseListingSource): Promise<SecurityRef[]> {
  const securities: SecurityRef[] = [];
  for await (const security of source.securities()) {
    securities.push(security);
  }
  return securities;
}

describe('parseListingHtml', () => {
  it('should keep four-digit codes split at the ideographic space', () => {
    const html = `
      <table>
        <tr><th>Code and name</th></tr>
        <tr><td colspan="7">Stocks</td></tr>
        <tr><td>2371　大同</td><td>TW0002371002</td></tr>
        <tr><td>030001　元大購01</td><td>TW18Z0300011</td></tr>
        <tr><td>2330 台積電</td></tr>
      </table>`;

    expect(parseListingHtml(html, 'listed')).toEqual([{ code: '2371', name: '大同', market: 'listed' }]);
  });

  it('should return nothing for a page without rows', () => {
    expect(parseListingHtml('<html><body>maintenance</body></html>', 'otc')).toEqual([]);
  });
});

describe('TwseListingSource', () => {
  it('should yield listed securities before OTC ones', async () => {
    const listed = await fixture('listing-listed.big5.html');
    const otc = await fixture('listing-otc.big5.html');
    const { client, requests } = stubClient((config) => ({
      data: config.params?.strMode === 2 ? listed : otc,
    }));
    const source = new TwseListingSource({ logger: silentLogger, httpClient: client });

    expect(await collect(source)).toEqual([
      { code: '1101', name: '台泥', market: 'listed' },
      { code: '2371', name: '大同', market: 'listed' },
      { code: '0050', name: '元大台灣50', market: 'listed' },
      { code: '6488', name: '環球晶', market: 'otc' },
    ]);
    expect(requests.map((r) => r.params)).toEqual([{ strMode: 2 }, { strMode: 4 }]);
    expect(requests[0]?.responseType).toBe('arraybuffer');
  });

  it('should skip a market whose page cannot be fetched', async () => {
    const listed = await fixture('listing-listed.big5.html');
    const { client } = stubClient((config) =>
      config.params?.strMode === 2 ? { data: listed } : { status: 503, data: 'Service Unavailable' }
    );
    const source = new TwseListingSource({ logger: silentLogger, httpClient: client });

    const codes = (await collect(source)).map((s) => s.code);

    expect(codes).toEqual(['1101', '2371', '0050']);
  });

  it('should yield nothing when both markets fail', async () => {
    const { client } = stubClient(() => ({ status: 500, data: '' }));
    const source = new TwseListingSource({ logger: silentLogger, httpClient: client });

    expect(await collect(source)).toEqual([]);
  });

  it('should reject a page that is not binary content', async () => {
    const { client } = stubClient(() => ({ data: { unexpected: true } }));
    const source = new TwseListingSource({ logger: silentLogger, httpClient: client });

    await expect(source.fetchMarket('listed', 2)).rejects.toBeInstanceOf(ProviderResponseError);
  });
});
