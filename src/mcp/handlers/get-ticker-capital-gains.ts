import { normalizeTable } from '../../utils/table.js';
import type { McpToolDefinition } from '../types.js';
import { type ToolArguments, requireString } from './args.js';
import { SYMBOL_PROPERTY, type ToolContext } from './context.js';

export const getTickerCapitalGainsDefinition: McpToolDefinition = {
  name: 'get_ticker_capital_gains',
  description: 'Get capital gains distributions for a ticker',
  inputSchema: {
    type: 'object',
    properties: { symbol: SYMBOL_PROPERTY },
    required: ['symbol'],
  },
};

export async function getTickerCapitalGainsHandler(args: ToolArguments, { provider }: ToolContext) {
  const symbol = requireString(args, 'symbol');
  const capitalGains = await provider.getCapitalGains(symbol);

  return {
    symbol,
    capital_gains: normalizeTable(capitalGains),
  };
}
