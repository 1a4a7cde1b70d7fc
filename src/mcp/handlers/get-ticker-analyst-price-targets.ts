import type { McpToolDefinition } from '../types.js';
import { type ToolArguments, requireString } from './args.js';
import { SYMBOL_PROPERTY, type ToolContext } from './context.js';

export const getTickerAnalystPriceTargetsDefinition: McpToolDefinition = {
  name: 'get_ticker_analyst_price_targets',
  description: 'Get analyst price targets and consensus for a ticker',
  inputSchema: {
    type: 'object',
    properties: { symbol: SYMBOL_PROPERTY },
    required: ['symbol'],
  },
};

export async function getTickerAnalystPriceTargetsHandler(args: ToolArguments, { provider }: ToolContext) {
  const symbol = requireString(args, 'symbol');
  const info = await provider.getInfo(symbol);

  return {
    symbol,
    price_targets: {
      current_price: info.currentPrice ?? null,
      target_high_price: info.targetHighPrice ?? null,
      target_low_price: info.targetLowPrice ?? null,
      target_mean_price: info.targetMeanPrice ?? null,
      target_median_price: info.targetMedianPrice ?? null,
      number_of_analyst_opinions: info.numberOfAnalystOpinions ?? null,
    },
  };
}
