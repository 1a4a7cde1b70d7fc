import { PERIODS } from '../../services/market-data.service.js';
import { normalizeTable } from '../../utils/table.js';
import type { McpToolDefinition } from '../types.js';
import { type ToolArguments, optionalInterval, optionalString, requireString } from './args.js';
import { SYMBOL_PROPERTY, type ToolContext } from './context.js';

export const DEFAULT_PERIOD = '1mo';
export const DEFAULT_INTERVAL = '1d';

export const getTickerHistoryDefinition: McpToolDefinition = {
  name: 'get_ticker_history',
  description: 'Get historical price data (OHLCV) for a ticker',
  inputSchema: {
    type: 'object',
    properties: {
      symbol: SYMBOL_PROPERTY,
      period: {
        type: 'string',
        description: `Time period: ${PERIODS.join(', ')}`,
        default: DEFAULT_PERIOD,
      },
      interval: {
        type: 'string',
        description: 'Data interval: 1m, 2m, 5m, 15m, 30m, 60m, 90m, 1h, 1d, 5d, 1wk, 1mo, 3mo',
        default: DEFAULT_INTERVAL,
      },
    },
    required: ['symbol'],
  },
};

export async function getTickerHistoryHandler(args: ToolArguments, { provider }: ToolContext) {
  const symbol = requireString(args, 'symbol');
  const period = optionalString(args, 'period', DEFAULT_PERIOD);
  const interval = optionalInterval(args, 'interval', DEFAULT_INTERVAL);

  const history = await provider.getHistory(symbol, { period, interval });

  return {
    symbol,
    period,
    interval,
    data: normalizeTable(history),
  };
}
