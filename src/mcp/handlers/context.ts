import type { MarketDataProvider } from '../../services/market-data.service.js';
import type { Logger } from '../../utils/logger.js';
import type { ToolArguments } from './args.js';

export interface ToolContext {
  provider: MarketDataProvider;
  logger: Logger;
}

/** Produces the tool's result object; the registry turns it into an envelope. */
export type ToolHandler = (args: ToolArguments, ctx: ToolContext) => Promise<object>;

export const SYMBOL_PROPERTY = {
  type: 'string',
  description: 'Stock ticker symbol',
} as const;
