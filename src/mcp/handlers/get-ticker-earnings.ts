import { normalizeTable } from '../../utils/table.js';
import type { McpToolDefinition } from '../types.js';
import { type ToolArguments, requireString } from './args.js';
import { SYMBOL_PROPERTY, type ToolContext } from './context.js';

export const getTickerEarningsDefinition: McpToolDefinition = {
  name: 'get_ticker_earnings',
  description: 'Get yearly revenue and earnings for a ticker',
  inputSchema: {
    type: 'object',
    properties: { symbol: SYMBOL_PROPERTY },
    required: ['symbol'],
  },
};

export async function getTickerEarningsHandler(args: ToolArguments, { provider }: ToolContext) {
  const symbol = requireString(args, 'symbol');
  return {
    symbol,
    earnings: normalizeTable(await provider.getEarnings(symbol)),
  };
}
