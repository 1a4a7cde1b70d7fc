import type { McpToolDefinition } from '../types.js';
import { type ToolArguments, optionalInteger, requireString } from './args.js';
import type { ToolContext } from './context.js';

export const searchTickersDefinition: McpToolDefinition = {
  name: 'search_tickers',
  description: 'Search for stocks, ETFs, and other securities by name or symbol',
  inputSchema: {
    type: 'object',
    properties: {
      query: {
        type: 'string',
        description: 'Search query (company name or ticker)',
      },
      max_results: {
        type: 'integer',
        description: 'Maximum number of results to return',
        default: 10,
      },
    },
    required: ['query'],
  },
};

export async function searchTickersHandler(args: ToolArguments, { provider }: ToolContext) {
  const query = requireString(args, 'query');
  const maxResults = optionalInteger(args, 'max_results', 10);

  const results = (await provider.search(query, maxResults)).slice(0, Math.max(0, maxResults));

  return {
    query,
    count: results.length,
    results,
  };
}
