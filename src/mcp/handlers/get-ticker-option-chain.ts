import { normalizeTable } from '../../utils/table.js';
import type { McpToolDefinition } from '../types.js';
import { type ToolArguments, requireString } from './args.js';
import { SYMBOL_PROPERTY, type ToolContext } from './context.js';

export const getTickerOptionChainDefinition: McpToolDefinition = {
  name: 'get_ticker_option_chain',
  description: 'Get full options chain (calls and puts) for a specific expiration date',
  inputSchema: {
    type: 'object',
    properties: {
      symbol: SYMBOL_PROPERTY,
      expiration_date: {
        type: 'string',
        description: 'Options expiration date (YYYY-MM-DD format)',
      },
    },
    required: ['symbol', 'expiration_date'],
  },
};

export async function getTickerOptionChainHandler(args: ToolArguments, { provider }: ToolContext) {
  const symbol = requireString(args, 'symbol');
  const expirationDate = requireString(args, 'expiration_date');
  const chain = await provider.getOptionChain(symbol, expirationDate);

  return {
    symbol,
    expiration_date: expirationDate,
    calls: normalizeTable(chain.calls),
    puts: normalizeTable(chain.puts),
  };
}
