import { normalizeTable } from '../../utils/table.js';
import type { McpToolDefinition } from '../types.js';
import {
  type ToolArguments,
  optionalGroupBy,
  optionalInterval,
  optionalString,
  requireStringArray,
} from './args.js';
import type { ToolContext } from './context.js';
import { DEFAULT_INTERVAL, DEFAULT_PERIOD } from './get-ticker-history.js';

export const downloadMultipleDefinition: McpToolDefinition = {
  name: 'download_multiple',
  description: 'Download data for multiple tickers efficiently (bulk download)',
  inputSchema: {
    type: 'object',
    properties: {
      symbols: {
        type: 'array',
        items: { type: 'string' },
        description: 'List of ticker symbols',
      },
      period: {
        type: 'string',
        description: 'Time period',
        default: DEFAULT_PERIOD,
      },
      interval: {
        type: 'string',
        description: 'Data interval',
        default: DEFAULT_INTERVAL,
      },
      group_by: {
        type: 'string',
        enum: ['column', 'ticker'],
        description: 'Name columns field-first (column) or ticker-first (ticker)',
        default: 'column',
      },
    },
    required: ['symbols'],
  },
};

export async function downloadMultipleHandler(args: ToolArguments, { provider }: ToolContext) {
  const symbols = requireStringArray(args, 'symbols');
  const period = optionalString(args, 'period', DEFAULT_PERIOD);
  const interval = optionalInterval(args, 'interval', DEFAULT_INTERVAL);
  const groupBy = optionalGroupBy(args, 'group_by', 'column');

  const data = await provider.download(symbols, { period, interval, groupBy });

  return {
    symbols,
    period,
    interval,
    group_by: groupBy,
    data: normalizeTable(data),
  };
}
