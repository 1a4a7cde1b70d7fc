import type { McpToolDefinition } from '../types.js';
import { type ToolArguments, optionalInteger, requireString } from './args.js';
import { SYMBOL_PROPERTY, type ToolContext } from './context.js';

export const getTickerNewsDefinition: McpToolDefinition = {
  name: 'get_ticker_news',
  description: 'Get latest news articles for a ticker',
  inputSchema: {
    type: 'object',
    properties: {
      symbol: SYMBOL_PROPERTY,
      max_items: {
        type: 'integer',
        default: 10,
        description: 'Maximum number of news items',
      },
    },
    required: ['symbol'],
  },
};

export async function getTickerNewsHandler(args: ToolArguments, { provider }: ToolContext) {
  const symbol = requireString(args, 'symbol');
  const maxItems = optionalInteger(args, 'max_items', 10);

  const news = (await provider.getNews(symbol, maxItems)).slice(0, Math.max(0, maxItems));

  return {
    symbol,
    count: news.length,
    news,
  };
}
