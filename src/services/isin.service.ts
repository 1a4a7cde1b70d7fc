import { ISIN_SEARCH_URL } from '../config/server.js';

export const NO_ISIN = '-';

const ISIN_PATTERN = /^[A-Z]{2}[A-Z0-9]{9}[0-9]$/;

export type FetchText = (url: string) => Promise<string>;

async function fetchText(url: string): Promise<string> {
  const response = await fetch(url);

  if (!response.ok) {
    const error = await response.text();
    throw new Error(`ISIN lookup failed: ${response.status} ${error}`);
  }

  return response.text();
}

// Indices and currency pairs are not securities with an ISIN.
export function hasIsin(symbol: string): boolean {
  return !symbol.includes('-') && !symbol.includes('^');
}

/**
 * Pulls the ISIN out of a suggestion payload, where each hit looks like
 * `"AAPL|US0378331005|AAPL||AAPL"`. When no hit carries the symbol but the payload
 * mentions the queried name, the first hit without a symbol (`"|<ISIN>|...`) is used.
 */
export function extractIsin(body: string, symbol: string, query: string = symbol): string {
  let marker = `"${symbol.toUpperCase()}|`;
  if (!body.includes(marker)) {
    if (!body.toLowerCase().includes(query.toLowerCase())) {
      return NO_ISIN;
    }
    marker = '"|';
  }

  const start = body.indexOf(marker);
  if (start === -1) {
    return NO_ISIN;
  }

  const rest = body.slice(start + marker.length);
  const candidate = rest.split('"')[0].split('|')[0];
  return ISIN_PATTERN.test(candidate) ? candidate : NO_ISIN;
}

export interface IsinLookupOptions {
  /** Company name to search for; the symbol itself when absent. */
  shortName?: string;
  fetcher?: FetchText;
}

export async function lookupIsin(
  symbol: string,
  { shortName, fetcher = fetchText }: IsinLookupOptions = {}
): Promise<string> {
  if (!hasIsin(symbol)) {
    return NO_ISIN;
  }

  const query = shortName ?? symbol;
  const params = new URLSearchParams({ max_results: '25', query });
  const body = await fetcher(`${ISIN_SEARCH_URL}?${params.toString()}`);
  return extractIsin(body, symbol, query);
}
