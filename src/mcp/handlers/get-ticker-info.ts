import type { McpToolDefinition } from '../types.js';
import { type ToolArguments, requireString } from './args.js';
import type { ToolContext } from './context.js';

export const getTickerInfoDefinition: McpToolDefinition = {
  name: 'get_ticker_info',
  description: 'Get comprehensive information about a stock ticker including company details, financials, and key statistics',
  inputSchema: {
    type: 'object',
    properties: {
      symbol: {
        type: 'string',
        description: 'Stock ticker symbol (e.g., AAPL, TSLA, GOOGL)',
      },
    },
    required: ['symbol'],
  },
};

export async function getTickerInfoHandler(args: ToolArguments, { provider }: ToolContext) {
  const symbol = requireString(args, 'symbol');
  const info = await provider.getInfo(symbol);
  return { symbol, info };
}
