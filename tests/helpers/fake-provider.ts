import type {
  DownloadOptions,
  FinancialStatements,
  HistoryOptions,
  MarketDataProvider,
  OptionChain,
  ProviderRecord,
} from '../../src/services/market-data.service.js';
import { type Table, emptyTable } from '../../src/utils/table.js';

export const HISTORY_TABLE: Table = {
  columns: ['Open', 'High', 'Low', 'Close', 'Volume'],
  rows: [
    [100, 105, 99, 104, 1000],
    [104, 106, 101, 102, 1200],
  ],
  index: {
    name: 'Date',
    values: [new Date('2024-03-04T14:30:00.000Z'), new Date('2024-03-05T14:30:00.000Z')],
  },
};

/**
 * In-memory provider. Every call is recorded; `failWith` makes every method reject.
 */
export class FakeProvider implements MarketDataProvider {
  calls: Array<{ method: string; args: unknown[] }> = [];
  failWith: Error | null = null;
  info: ProviderRecord = {
    longName: 'Example Corp',
    currentPrice: 101.5,
    targetHighPrice: 130,
    targetLowPrice: 90,
    targetMeanPrice: 115.25,
    numberOfAnalystOpinions: 12,
  };
  history: Table = HISTORY_TABLE;
  capitalGains: Table = emptyTable(['Capital Gains'], 'Date');
  earningsDates: Table = emptyTable();
  searchResults: ProviderRecord[] = [];
  news: ProviderRecord[] = [];
  isin = 'US0000000001';

  private async record<T>(method: string, args: unknown[], value: T): Promise<T> {
    this.calls.push({ method, args });
    if (this.failWith) {
      throw this.failWith;
    }
    return value;
  }

  getInfo(symbol: string) {
    return this.record('getInfo', [symbol], this.info);
  }
  getHistory(symbol: string, options: HistoryOptions) {
    return this.record('getHistory', [symbol, options], this.history);
  }
  getFinancials(symbol: string): Promise<FinancialStatements> {
    return this.record('getFinancials', [symbol], {
      incomeStatement: {
        columns: ['totalRevenue'],
        rows: [[500]],
        index: { name: 'Date', values: [new Date('2023-12-31T00:00:00.000Z')] },
      },
      balanceSheet: emptyTable(),
      cashFlow: { columns: ['netIncome'], rows: [[42]] },
    });
  }
  getRecommendations(symbol: string) {
    return this.record('getRecommendations', [symbol], emptyTable());
  }
  download(symbols: string[], options: DownloadOptions) {
    return this.record('download', [symbols, options], emptyTable());
  }
  search(query: string, maxResults: number) {
    return this.record('search', [query, maxResults], this.searchResults);
  }
  getDividends(symbol: string) {
    return this.record('getDividends', [symbol], emptyTable());
  }
  getSplits(symbol: string) {
    return this.record('getSplits', [symbol], emptyTable());
  }
  getActions(symbol: string) {
    return this.record('getActions', [symbol], emptyTable());
  }
  getCapitalGains(symbol: string) {
    return this.record('getCapitalGains', [symbol], this.capitalGains);
  }
  getEarnings(symbol: string) {
    return this.record('getEarnings', [symbol], emptyTable());
  }
  getEarningsDates(symbol: string) {
    return this.record('getEarningsDates', [symbol], this.earningsDates);
  }
  getInstitutionalHolders(symbol: string) {
    return this.record('getInstitutionalHolders', [symbol], emptyTable());
  }
  getMajorHolders(symbol: string) {
    return this.record('getMajorHolders', [symbol], emptyTable());
  }
  getInsiderTransactions(symbol: string) {
    return this.record('getInsiderTransactions', [symbol], emptyTable());
  }
  getNews(symbol: string, maxItems: number) {
    return this.record('getNews', [symbol, maxItems], this.news);
  }
  getOptionExpirations(symbol: string) {
    return this.record('getOptionExpirations', [symbol], ['2024-06-21']);
  }
  getOptionChain(symbol: string, expirationDate: string): Promise<OptionChain> {
    return this.record('getOptionChain', [symbol, expirationDate], {
      calls: { columns: ['strike', 'lastPrice'], rows: [[100, 3.5]] },
      puts: emptyTable(),
    });
  }
  getIsin(symbol: string) {
    return this.record('getIsin', [symbol], this.isin);
  }
}
