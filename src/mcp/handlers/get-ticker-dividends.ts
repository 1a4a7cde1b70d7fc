import { normalizeTable } from '../../utils/table.js';
import type { McpToolDefinition } from '../types.js';
import { type ToolArguments, requireString } from './args.js';
import { SYMBOL_PROPERTY, type ToolContext } from './context.js';

export const getTickerDividendsDefinition: McpToolDefinition = {
  name: 'get_ticker_dividends',
  description: 'Get historical dividend payments for a ticker',
  inputSchema: {
    type: 'object',
    properties: { symbol: SYMBOL_PROPERTY },
    required: ['symbol'],
  },
};

export async function getTickerDividendsHandler(args: ToolArguments, { provider }: ToolContext) {
  const symbol = requireString(args, 'symbol');
  return {
    symbol,
    dividends: normalizeTable(await provider.getDividends(symbol)),
  };
}
