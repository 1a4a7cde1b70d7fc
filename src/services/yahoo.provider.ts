import yahooFinance from 'yahoo-finance2';
import { ProviderError } from '../utils/errors.js';
import { type Cell, type Table, emptyTable, tableFromRecords } from '../utils/table.js';
import { type FetchText, NO_ISIN, hasIsin, lookupIsin } from './isin.service.js';
import {
  type DownloadOptions,
  type FinancialStatements,
  type HistoryOptions,
  type Interval,
  type MarketDataProvider,
  type OptionChain,
  type ProviderRecord,
  isIntraday,
  periodStart,
} from './market-data.service.js';
import {
  type ChartQuote,
  type ChartResponse,
  ChartSchema,
  OptionsSchema,
  RecordSchema,
  SearchSchema,
  parseResponse,
  pickCells,
  recordList,
  summaryModule,
  toCell,
  toCellRecord,
} from './yahoo.schemas.js';

export type QuoteSummaryModule =
  | 'assetProfile'
  | 'summaryDetail'
  | 'price'
  | 'defaultKeyStatistics'
  | 'financialData'
  | 'quoteType'
  | 'incomeStatementHistory'
  | 'balanceSheetHistory'
  | 'cashflowStatementHistory'
  | 'recommendationTrend'
  | 'earnings'
  | 'earningsHistory'
  | 'calendarEvents'
  | 'institutionOwnership'
  | 'majorHoldersBreakdown'
  | 'insiderTransactions';

export interface ChartRequest {
  period1: Date;
  interval: Interval;
  events: string;
  /** Skip the client's own result validation, for event types it does not model. */
  raw?: boolean;
}

/** The slice of the Yahoo Finance client the provider talks to. */
export interface YahooClient {
  quoteSummary(symbol: string, modules: QuoteSummaryModule[]): Promise<unknown>;
  chart(symbol: string, request: ChartRequest): Promise<unknown>;
  search(query: string, counts: { quotesCount: number; newsCount: number }): Promise<unknown>;
  options(symbol: string, date?: Date): Promise<unknown>;
}

export function createYahooClient(): YahooClient {
  return {
    quoteSummary: (symbol, modules) => yahooFinance.quoteSummary(symbol, { modules }),
    chart: (symbol, { period1, interval, events, raw }) =>
      raw
        ? yahooFinance.chart(symbol, { period1, interval, events }, { validateResult: false })
        : yahooFinance.chart(symbol, { period1, interval, events }),
    search: (query, counts) => yahooFinance.search(query, counts),
    options: (symbol, date) => yahooFinance.options(symbol, date ? { date } : {}),
  };
}

const INFO_MODULES: QuoteSummaryModule[] = [
  'assetProfile',
  'summaryDetail',
  'price',
  'defaultKeyStatistics',
  'financialData',
  'quoteType',
];

const PRICE_FIELDS: Array<[column: string, field: keyof Omit<ChartQuote, 'date'>]> = [
  ['Open', 'open'],
  ['High', 'high'],
  ['Low', 'low'],
  ['Close', 'close'],
  ['Volume', 'volume'],
];

const HISTORY_COLUMNS = [...PRICE_FIELDS.map(([column]) => column), 'Dividends', 'Stock Splits'];

const INSTITUTIONAL_HOLDER_FIELDS: Array<[string, string]> = [
  ['Date Reported', 'reportDate'],
  ['Holder', 'organization'],
  ['pctHeld', 'pctHeld'],
  ['Shares', 'position'],
  ['Value', 'value'],
  ['pctChange', 'pctChange'],
];

const INSIDER_TRANSACTION_FIELDS: Array<[string, string]> = [
  ['Shares', 'shares'],
  ['Value', 'value'],
  ['URL', 'filerUrl'],
  ['Text', 'transactionText'],
  ['Insider', 'filerName'],
  ['Position', 'filerRelation'],
  ['Transaction', 'moneyText'],
  ['Start Date', 'startDate'],
  ['Ownership', 'ownership'],
];

const RECOMMENDATION_COLUMNS = ['period', 'strongBuy', 'buy', 'hold', 'sell', 'strongSell'];

// Corporate actions are requested over the whole history at a coarse interval.
const ALL_TIME = new Date(0);
const ACTIONS_INTERVAL: Interval = '1mo';

export interface YahooProviderOptions {
  fetchText?: FetchText;
  now?: () => Date;
}

export class YahooMarketDataProvider implements MarketDataProvider {
  private readonly now: () => Date;

  constructor(
    private readonly client: YahooClient = createYahooClient(),
    private readonly options: YahooProviderOptions = {}
  ) {
    this.now = options.now ?? (() => new Date());
  }

  async getInfo(symbol: string): Promise<ProviderRecord> {
    const summary = await this.summary(symbol, INFO_MODULES);
    const info: ProviderRecord = {};
    for (const name of INFO_MODULES) {
      for (const [key, value] of Object.entries(summaryModule(summary, name))) {
        if (key !== 'maxAge' && !(key in info)) {
          info[key] = value;
        }
      }
    }
    return info;
  }

  async getHistory(symbol: string, { period, interval }: HistoryOptions): Promise<Table> {
    const chart = await this.chart(symbol, {
      period1: periodStart(period, this.now()),
      interval,
      events: 'div|split',
    });
    return historyTable(chart, interval);
  }

  async getFinancials(symbol: string): Promise<FinancialStatements> {
    const summary = await this.summary(symbol, [
      'incomeStatementHistory',
      'balanceSheetHistory',
      'cashflowStatementHistory',
    ]);
    return {
      incomeStatement: statementTable(recordList(summaryModule(summary, 'incomeStatementHistory'), 'incomeStatementHistory')),
      balanceSheet: statementTable(recordList(summaryModule(summary, 'balanceSheetHistory'), 'balanceSheetStatements')),
      cashFlow: statementTable(recordList(summaryModule(summary, 'cashflowStatementHistory'), 'cashflowStatements')),
    };
  }

  async getRecommendations(symbol: string): Promise<Table> {
    const summary = await this.summary(symbol, ['recommendationTrend']);
    const trend = recordList(summaryModule(summary, 'recommendationTrend'), 'trend');
    return tableFromRecords(trend.map(item => toCellRecord(item)), { columns: RECOMMENDATION_COLUMNS });
  }

  async download(symbols: string[], { period, interval, groupBy }: DownloadOptions): Promise<Table> {
    const period1 = periodStart(period, this.now());
    const byTime = new Map<number, Map<string, Cell>>();
    const columns: string[] = [];
    const columnName = (field: string, symbol: string) =>
      groupBy === 'ticker' ? `${symbol}.${field}` : `${field}.${symbol}`;

    if (groupBy === 'ticker') {
      for (const symbol of symbols) {
        for (const [field] of PRICE_FIELDS) columns.push(columnName(field, symbol));
      }
    } else {
      for (const [field] of PRICE_FIELDS) {
        for (const symbol of symbols) columns.push(columnName(field, symbol));
      }
    }

    for (const symbol of symbols) {
      const chart = await this.chart(symbol, { period1, interval, events: 'div|split' });
      for (const quote of chart.quotes) {
        const time = quote.date.getTime();
        const row = byTime.get(time) ?? new Map<string, Cell>();
        for (const [field, key] of PRICE_FIELDS) {
          row.set(columnName(field, symbol), quote[key]);
        }
        byTime.set(time, row);
      }
    }

    const times = [...byTime.keys()].sort((a, b) => a - b);
    return {
      columns,
      rows: times.map(time => {
        const row = byTime.get(time);
        return columns.map(column => row?.get(column) ?? null);
      }),
      index: { name: indexName(interval), values: times.map(time => new Date(time)) },
    };
  }

  async search(query: string, maxResults: number): Promise<ProviderRecord[]> {
    const raw = await this.client.search(query, { quotesCount: maxResults, newsCount: 0 });
    return parseResponse(SearchSchema, raw, 'search').quotes;
  }

  async getDividends(symbol: string): Promise<Table> {
    const chart = await this.chart(symbol, { period1: ALL_TIME, interval: ACTIONS_INTERVAL, events: 'div' });
    return actionsTable(chart, { dividends: true, splits: false });
  }

  async getSplits(symbol: string): Promise<Table> {
    const chart = await this.chart(symbol, { period1: ALL_TIME, interval: ACTIONS_INTERVAL, events: 'split' });
    return actionsTable(chart, { dividends: false, splits: true });
  }

  async getActions(symbol: string): Promise<Table> {
    const chart = await this.chart(symbol, { period1: ALL_TIME, interval: ACTIONS_INTERVAL, events: 'div|split' });
    return actionsTable(chart, { dividends: true, splits: true });
  }

  async getCapitalGains(symbol: string): Promise<Table> {
    const chart = await this.chart(symbol, {
      period1: ALL_TIME,
      interval: ACTIONS_INTERVAL,
      events: 'capitalGains',
      raw: true,
    });
    // Ordinary stocks have no capital-gains series at all.
    const gains = chart.events?.capitalGains ?? [];
    const sorted = [...gains].sort((a, b) => a.date.getTime() - b.date.getTime());
    return {
      columns: ['Capital Gains'],
      rows: sorted.map(gain => [gain.amount]),
      index: { name: 'Date', values: sorted.map(gain => gain.date) },
    };
  }

  async getEarnings(symbol: string): Promise<Table> {
    const summary = await this.summary(symbol, ['earnings']);
    const chart = RecordSchema.safeParse(summaryModule(summary, 'earnings').financialsChart);
    const yearly = chart.success ? recordList(chart.data, 'yearly') : [];
    return tableFromRecords(
      yearly.map(item => pickCells(item, [['Year', 'date'], ['Revenue', 'revenue'], ['Earnings', 'earnings']])),
      { columns: ['Year', 'Revenue', 'Earnings'] }
    );
  }

  async getEarningsDates(symbol: string): Promise<Table> {
    const summary = await this.summary(symbol, ['earningsHistory', 'calendarEvents']);
    const rows: Array<{ date: Date; cells: Cell[] }> = [];

    const calendar = RecordSchema.safeParse(summaryModule(summary, 'calendarEvents').earnings);
    if (calendar.success) {
      const upcoming = calendar.data.earningsDate;
      const estimate = toCell(calendar.data.earningsAverage);
      for (const value of Array.isArray(upcoming) ? upcoming : []) {
        const date = toCell(value);
        if (date instanceof Date) {
          rows.push({ date, cells: [estimate, null, null] });
        }
      }
    }

    for (const item of recordList(summaryModule(summary, 'earningsHistory'), 'history')) {
      const date = toCell(item.quarter);
      if (date instanceof Date) {
        rows.push({
          date,
          cells: [toCell(item.epsEstimate), toCell(item.epsActual), toCell(item.surprisePercent)],
        });
      }
    }

    rows.sort((a, b) => b.date.getTime() - a.date.getTime());
    return {
      columns: ['EPS Estimate', 'Reported EPS', 'Surprise'],
      rows: rows.map(row => row.cells),
      index: { name: 'Earnings Date', values: rows.map(row => row.date) },
    };
  }

  async getInstitutionalHolders(symbol: string): Promise<Table> {
    const summary = await this.summary(symbol, ['institutionOwnership']);
    const holders = recordList(summaryModule(summary, 'institutionOwnership'), 'ownershipList');
    return tableFromRecords(holders.map(holder => pickCells(holder, INSTITUTIONAL_HOLDER_FIELDS)), {
      columns: INSTITUTIONAL_HOLDER_FIELDS.map(([column]) => column),
    });
  }

  async getMajorHolders(symbol: string): Promise<Table> {
    const summary = await this.summary(symbol, ['majorHoldersBreakdown']);
    const breakdown = toCellRecord(summaryModule(summary, 'majorHoldersBreakdown'));
    return {
      columns: ['Breakdown', 'Value'],
      rows: Object.entries(breakdown).map(([key, value]) => [key, value]),
    };
  }

  async getInsiderTransactions(symbol: string): Promise<Table> {
    const summary = await this.summary(symbol, ['insiderTransactions']);
    const transactions = recordList(summaryModule(summary, 'insiderTransactions'), 'transactions');
    return tableFromRecords(transactions.map(item => pickCells(item, INSIDER_TRANSACTION_FIELDS)), {
      columns: INSIDER_TRANSACTION_FIELDS.map(([column]) => column),
    });
  }

  async getNews(symbol: string, maxItems: number): Promise<ProviderRecord[]> {
    const raw = await this.client.search(symbol, { quotesCount: 0, newsCount: maxItems });
    return parseResponse(SearchSchema, raw, 'news').news;
  }

  async getOptionExpirations(symbol: string): Promise<string[]> {
    const raw = await this.client.options(symbol);
    return parseResponse(OptionsSchema, raw, 'options').expirationDates.map(formatDay);
  }

  async getOptionChain(symbol: string, expirationDate: string): Promise<OptionChain> {
    const expirations = await this.getOptionExpirations(symbol);
    if (!expirations.includes(expirationDate)) {
      throw new ProviderError(
        `Expiration '${expirationDate}' cannot be found. Available expirations are: [${expirations.join(', ')}]`
      );
    }

    const raw = await this.client.options(symbol, new Date(`${expirationDate}T00:00:00Z`));
    const chain = parseResponse(OptionsSchema, raw, 'option chain').options[0];
    if (!chain) {
      return { calls: emptyTable(), puts: emptyTable() };
    }
    return {
      calls: tableFromRecords(chain.calls.map(contract => toCellRecord(contract))),
      puts: tableFromRecords(chain.puts.map(contract => toCellRecord(contract))),
    };
  }

  async getIsin(symbol: string): Promise<string> {
    if (!hasIsin(symbol)) {
      return NO_ISIN;
    }
    const { shortName } = await this.getInfo(symbol);
    return lookupIsin(symbol, {
      shortName: typeof shortName === 'string' && shortName ? shortName : undefined,
      fetcher: this.options.fetchText,
    });
  }

  private async summary(symbol: string, modules: QuoteSummaryModule[]): Promise<Record<string, unknown>> {
    const raw = await this.client.quoteSummary(symbol, modules);
    return parseResponse(RecordSchema, raw, 'quoteSummary');
  }

  private async chart(symbol: string, request: ChartRequest): Promise<ChartResponse> {
    const raw = await this.client.chart(symbol, request);
    return parseResponse(ChartSchema, raw, 'chart');
  }
}

function indexName(interval: Interval): string {
  return isIntraday(interval) ? 'Datetime' : 'Date';
}

function formatDay(date: Date): string {
  return date.toISOString().slice(0, 10);
}

function statementTable(items: Array<Record<string, unknown>>): Table {
  return tableFromRecords(items.map(item => toCellRecord(item)), { indexKey: 'endDate', indexName: 'Date' });
}

/**
 * OHLCV rows with dividends and splits folded in (0 when there was none). Daily and longer
 * bars take every event that falls inside their period; intraday bars only exact matches.
 */
function historyTable(chart: ChartResponse, interval: Interval): Table {
  const intraday = isIntraday(interval);
  const quotes = chart.quotes.filter(quote => PRICE_FIELDS.some(([, field]) => quote[field] !== null));

  const dividends = quotes.map(() => 0);
  for (const event of chart.events?.dividends ?? []) {
    const bar = barIndex(quotes, event.date, intraday);
    if (bar !== -1) dividends[bar] += event.amount;
  }
  const splits = quotes.map(() => 0);
  for (const event of chart.events?.splits ?? []) {
    const bar = barIndex(quotes, event.date, intraday);
    if (bar !== -1) splits[bar] = (splits[bar] || 1) * (event.numerator / event.denominator);
  }

  return {
    columns: HISTORY_COLUMNS,
    rows: quotes.map((quote, i) => [...PRICE_FIELDS.map(([, field]) => quote[field]), dividends[i], splits[i]]),
    index: { name: indexName(interval), values: quotes.map(quote => quote.date) },
  };
}

/** Last bar starting on or before the event's day, -1 when the event precedes them all. */
function barIndex(quotes: ChartQuote[], date: Date, intraday: boolean): number {
  if (intraday) {
    return quotes.findIndex(quote => quote.date.getTime() === date.getTime());
  }
  const day = formatDay(date);
  for (let i = quotes.length - 1; i >= 0; i--) {
    if (formatDay(quotes[i].date) <= day) return i;
  }
  return -1;
}

function actionsTable(chart: ChartResponse, include: { dividends: boolean; splits: boolean }): Table {
  const byDay = new Map<string, { date: Date; dividend: number; split: number }>();
  const entry = (date: Date) => {
    const day = formatDay(date);
    const existing = byDay.get(day);
    if (existing) return existing;
    const created = { date, dividend: 0, split: 0 };
    byDay.set(day, created);
    return created;
  };

  if (include.dividends) {
    for (const event of chart.events?.dividends ?? []) entry(event.date).dividend = event.amount;
  }
  if (include.splits) {
    for (const event of chart.events?.splits ?? []) entry(event.date).split = event.numerator / event.denominator;
  }

  const columns = [
    ...(include.dividends ? ['Dividends'] : []),
    ...(include.splits ? ['Stock Splits'] : []),
  ];
  const entries = [...byDay.values()].sort((a, b) => a.date.getTime() - b.date.getTime());
  return {
    columns,
    rows: entries.map(item => [
      ...(include.dividends ? [item.dividend] : []),
      ...(include.splits ? [item.split] : []),
    ]),
    index: { name: 'Date', values: entries.map(item => item.date) },
  };
}
