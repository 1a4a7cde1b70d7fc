import { describe, it, expect, vi } from 'vitest';
import { ISIN_SEARCH_URL } from '../src/config/server.js';
import { extractIsin, hasIsin, lookupIsin } from '../src/services/isin.service.js';

const SUGGESTIONS =
  'mmSuggestDeliver(0, new Array("Name", "Category", "Keywords"), new Array(' +
  'new Array("Example Corp", "Stocks", "EXMP|US0000000001|EXMP||EXMP"), ' +
  'new Array("Example Corp Bond", "Bonds", "EXMPB|XS0000000002|EXMPB||EXMPB")), 2, 0);';

describe('extractIsin', () => {
  it('reads the ISIN that follows the symbol', () => {
    expect(extractIsin(SUGGESTIONS, 'EXMP')).toBe('US0000000001');
    expect(extractIsin(SUGGESTIONS, 'EXMPB')).toBe('XS0000000002');
  });

  it('matches symbols case-insensitively', () => {
    expect(extractIsin(SUGGESTIONS, 'exmp')).toBe('US0000000001');
  });

  it('returns a dash when the symbol is not listed', () => {
    expect(extractIsin(SUGGESTIONS, 'NOPE')).toBe('-');
  });

  it('returns a dash when the field is not an ISIN', () => {
    expect(extractIsin('"EXMP|not-an-isin|EXMP"', 'EXMP')).toBe('-');
  });

  it('falls back to an unlabelled hit when the payload mentions the queried name', () => {
    const body = 'new Array("Example Holdings", "Stocks", "|DE0000000003|||")';

    expect(extractIsin(body, 'EXH', 'Example Holdings')).toBe('DE0000000003');
    expect(extractIsin(body, 'EXH', 'Other Name')).toBe('-');
  });
});

describe('lookupIsin', () => {
  it('queries the suggestion endpoint with the symbol', async () => {
    const fetcher = vi.fn(async (_url: string) => SUGGESTIONS);

    await expect(lookupIsin('EXMP', { fetcher })).resolves.toBe('US0000000001');
    expect(fetcher).toHaveBeenCalledWith(`${ISIN_SEARCH_URL}?max_results=25&query=EXMP`);
  });

  it('searches by company name when one is given', async () => {
    const fetcher = vi.fn(async (_url: string) => SUGGESTIONS);

    await expect(lookupIsin('EXMP', { shortName: 'Example Corp', fetcher })).resolves.toBe('US0000000001');
    expect(fetcher).toHaveBeenCalledWith(`${ISIN_SEARCH_URL}?max_results=25&query=Example+Corp`);
  });

  it('skips the lookup for indices and pairs', async () => {
    const fetcher = vi.fn(async (_url: string) => SUGGESTIONS);

    await expect(lookupIsin('^GSPC', { fetcher })).resolves.toBe('-');
    await expect(lookupIsin('BTC-USD', { fetcher })).resolves.toBe('-');
    expect(fetcher).not.toHaveBeenCalled();
    expect(hasIsin('EXMP')).toBe(true);
  });
});
