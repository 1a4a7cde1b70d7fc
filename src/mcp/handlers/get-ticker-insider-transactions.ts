import { normalizeTable } from '../../utils/table.js';
import type { McpToolDefinition } from '../types.js';
import { type ToolArguments, requireString } from './args.js';
import { SYMBOL_PROPERTY, type ToolContext } from './context.js';

export const getTickerInsiderTransactionsDefinition: McpToolDefinition = {
  name: 'get_ticker_insider_transactions',
  description: 'Get insider transaction data (smart money activity) for a ticker',
  inputSchema: {
    type: 'object',
    properties: { symbol: SYMBOL_PROPERTY },
    required: ['symbol'],
  },
};

export async function getTickerInsiderTransactionsHandler(args: ToolArguments, { provider }: ToolContext) {
  const symbol = requireString(args, 'symbol');
  return {
    symbol,
    insider_transactions: normalizeTable(await provider.getInsiderTransactions(symbol)),
  };
}
