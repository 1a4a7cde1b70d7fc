import { normalizeTable } from '../../utils/table.js';
import type { McpToolDefinition } from '../types.js';
import { type ToolArguments, requireString } from './args.js';
import { SYMBOL_PROPERTY, type ToolContext } from './context.js';

export const getTickerFinancialsDefinition: McpToolDefinition = {
  name: 'get_ticker_financials',
  description: 'Get financial statements including income statement, balance sheet, and cash flow',
  inputSchema: {
    type: 'object',
    properties: { symbol: SYMBOL_PROPERTY },
    required: ['symbol'],
  },
};

export async function getTickerFinancialsHandler(args: ToolArguments, { provider }: ToolContext) {
  const symbol = requireString(args, 'symbol');
  const statements = await provider.getFinancials(symbol);

  return {
    symbol,
    income_statement: normalizeTable(statements.incomeStatement),
    balance_sheet: normalizeTable(statements.balanceSheet),
    cash_flow: normalizeTable(statements.cashFlow),
  };
}
