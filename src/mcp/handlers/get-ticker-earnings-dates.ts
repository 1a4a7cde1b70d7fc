import { headTable, normalizeTable } from '../../utils/table.js';
import type { McpToolDefinition } from '../types.js';
import { type ToolArguments, optionalInteger, requireString } from './args.js';
import { SYMBOL_PROPERTY, type ToolContext } from './context.js';

export const getTickerEarningsDatesDefinition: McpToolDefinition = {
  name: 'get_ticker_earnings_dates',
  description: 'Get upcoming and past earnings dates/calendar for a ticker',
  inputSchema: {
    type: 'object',
    properties: {
      symbol: SYMBOL_PROPERTY,
      limit: {
        type: 'integer',
        default: 12,
        description: 'Number of earnings dates to return',
      },
    },
    required: ['symbol'],
  },
};

export async function getTickerEarningsDatesHandler(args: ToolArguments, { provider }: ToolContext) {
  const symbol = requireString(args, 'symbol');
  const limit = optionalInteger(args, 'limit', 12);
  const earningsDates = await provider.getEarningsDates(symbol);

  return {
    symbol,
    earnings_dates: normalizeTable(headTable(earningsDates, limit)),
  };
}
