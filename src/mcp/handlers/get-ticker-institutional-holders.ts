import { normalizeTable } from '../../utils/table.js';
import type { McpToolDefinition } from '../types.js';
import { type ToolArguments, requireString } from './args.js';
import { SYMBOL_PROPERTY, type ToolContext } from './context.js';

export const getTickerInstitutionalHoldersDefinition: McpToolDefinition = {
  name: 'get_ticker_institutional_holders',
  description: 'Get institutional ownership data for a ticker',
  inputSchema: {
    type: 'object',
    properties: { symbol: SYMBOL_PROPERTY },
    required: ['symbol'],
  },
};

export async function getTickerInstitutionalHoldersHandler(args: ToolArguments, { provider }: ToolContext) {
  const symbol = requireString(args, 'symbol');
  return {
    symbol,
    institutional_holders: normalizeTable(await provider.getInstitutionalHolders(symbol)),
  };
}
