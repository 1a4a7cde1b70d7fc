import type { Table } from '../utils/table.js';

export const PERIODS = ['1d', '5d', '1mo', '3mo', '6mo', '1y', '2y', '5y', '10y', 'ytd', 'max'] as const;

export const INTERVALS = [
  '1m', '2m', '5m', '15m', '30m', '60m', '90m', '1h', '1d', '5d', '1wk', '1mo', '3mo',
] as const;

export type Interval = (typeof INTERVALS)[number];

export type GroupBy = 'column' | 'ticker';

export interface HistoryOptions {
  period: string;
  interval: Interval;
}

export interface DownloadOptions extends HistoryOptions {
  groupBy: GroupBy;
}

export interface FinancialStatements {
  incomeStatement: Table;
  balanceSheet: Table;
  cashFlow: Table;
}

export interface OptionChain {
  calls: Table;
  puts: Table;
}

export type ProviderRecord = Record<string, unknown>;

/**
 * Everything the tools need from a market-data source. One method per capability so a
 * test can stand in for the network with plain objects.
 */
export interface MarketDataProvider {
  getInfo(symbol: string): Promise<ProviderRecord>;
  getHistory(symbol: string, options: HistoryOptions): Promise<Table>;
  getFinancials(symbol: string): Promise<FinancialStatements>;
  getRecommendations(symbol: string): Promise<Table>;
  download(symbols: string[], options: DownloadOptions): Promise<Table>;
  search(query: string, maxResults: number): Promise<ProviderRecord[]>;
  getDividends(symbol: string): Promise<Table>;
  getSplits(symbol: string): Promise<Table>;
  getActions(symbol: string): Promise<Table>;
  /** `null` when the security has no capital-gains series at all. */
  getCapitalGains(symbol: string): Promise<Table>;
  getEarnings(symbol: string): Promise<Table>;
  /** Most recent first, upcoming dates included. */
  getEarningsDates(symbol: string): Promise<Table>;
  getInstitutionalHolders(symbol: string): Promise<Table>;
  getMajorHolders(symbol: string): Promise<Table>;
  getInsiderTransactions(symbol: string): Promise<Table>;
  getNews(symbol: string, maxItems: number): Promise<ProviderRecord[]>;
  /** `YYYY-MM-DD` strings. */
  getOptionExpirations(symbol: string): Promise<string[]>;
  getOptionChain(symbol: string, expirationDate: string): Promise<OptionChain>;
  /** `"-"` when no ISIN is known. */
  getIsin(symbol: string): Promise<string>;
}

export function isInterval(value: string): value is Interval {
  return (INTERVALS as readonly string[]).includes(value);
}

export function isGroupBy(value: string): value is GroupBy {
  return value === 'column' || value === 'ticker';
}

const DAY_MS = 24 * 60 * 60 * 1000;

/** First instant covered by a period such as `5d`, `3mo`, `ytd` or `max`. */
export function periodStart(period: string, now: Date = new Date()): Date {
  if (period === 'max') {
    return new Date(0);
  }
  if (period === 'ytd') {
    return new Date(Date.UTC(now.getUTCFullYear(), 0, 1));
  }

  const match = /^(\d+)(d|wk|mo|y)$/.exec(period);
  if (!match) {
    throw new Error(`Invalid period: ${period}`);
  }

  const amount = Number(match[1]);
  const start = new Date(now.getTime());
  switch (match[2]) {
    case 'd':
      return new Date(now.getTime() - amount * DAY_MS);
    case 'wk':
      return new Date(now.getTime() - amount * 7 * DAY_MS);
    case 'mo':
      start.setUTCMonth(start.getUTCMonth() - amount);
      return start;
    default:
      start.setUTCFullYear(start.getUTCFullYear() - amount);
      return start;
  }
}

export function isIntraday(interval: Interval): boolean {
  return /^\d+[mh]$/.test(interval);
}
