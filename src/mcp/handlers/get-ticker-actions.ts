import { normalizeTable } from '../../utils/table.js';
import type { McpToolDefinition } from '../types.js';
import { type ToolArguments, requireString } from './args.js';
import { SYMBOL_PROPERTY, type ToolContext } from './context.js';

export const getTickerActionsDefinition: McpToolDefinition = {
  name: 'get_ticker_actions',
  description: 'Get all corporate actions (dividends + splits) for a ticker',
  inputSchema: {
    type: 'object',
    properties: { symbol: SYMBOL_PROPERTY },
    required: ['symbol'],
  },
};

export async function getTickerActionsHandler(args: ToolArguments, { provider }: ToolContext) {
  const symbol = requireString(args, 'symbol');
  return {
    symbol,
    actions: normalizeTable(await provider.getActions(symbol)),
  };
}
