import { normalizeTable } from '../../utils/table.js';
import type { McpToolDefinition } from '../types.js';
import { type ToolArguments, requireString } from './args.js';
import { SYMBOL_PROPERTY, type ToolContext } from './context.js';

export const getTickerMajorHoldersDefinition: McpToolDefinition = {
  name: 'get_ticker_major_holders',
  description: 'Get major shareholders breakdown for a ticker',
  inputSchema: {
    type: 'object',
    properties: { symbol: SYMBOL_PROPERTY },
    required: ['symbol'],
  },
};

export async function getTickerMajorHoldersHandler(args: ToolArguments, { provider }: ToolContext) {
  const symbol = requireString(args, 'symbol');
  return {
    symbol,
    major_holders: normalizeTable(await provider.getMajorHolders(symbol)),
  };
}
