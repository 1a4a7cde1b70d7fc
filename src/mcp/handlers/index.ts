import { errorMessage, errorStack } from '../../utils/errors.js';
import type { McpToolDefinition, McpToolResult } from '../types.js';
import type { ToolArguments } from './args.js';
import type { ToolContext, ToolHandler } from './context.js';

import { getTickerInfoHandler, getTickerInfoDefinition } from './get-ticker-info.js';
import { getTickerHistoryHandler, getTickerHistoryDefinition } from './get-ticker-history.js';
import { getTickerFinancialsHandler, getTickerFinancialsDefinition } from './get-ticker-financials.js';
import { getTickerRecommendationsHandler, getTickerRecommendationsDefinition } from './get-ticker-recommendations.js';
import { downloadMultipleHandler, downloadMultipleDefinition } from './download-multiple.js';
import { searchTickersHandler, searchTickersDefinition } from './search-tickers.js';
import { getTickerDividendsHandler, getTickerDividendsDefinition } from './get-ticker-dividends.js';
import { getTickerSplitsHandler, getTickerSplitsDefinition } from './get-ticker-splits.js';
import { getTickerActionsHandler, getTickerActionsDefinition } from './get-ticker-actions.js';
import { getTickerCapitalGainsHandler, getTickerCapitalGainsDefinition } from './get-ticker-capital-gains.js';
import { getTickerEarningsHandler, getTickerEarningsDefinition } from './get-ticker-earnings.js';
import { getTickerEarningsDatesHandler, getTickerEarningsDatesDefinition } from './get-ticker-earnings-dates.js';
import {
  getTickerAnalystPriceTargetsHandler,
  getTickerAnalystPriceTargetsDefinition,
} from './get-ticker-analyst-price-targets.js';
import {
  getTickerInstitutionalHoldersHandler,
  getTickerInstitutionalHoldersDefinition,
} from './get-ticker-institutional-holders.js';
import { getTickerMajorHoldersHandler, getTickerMajorHoldersDefinition } from './get-ticker-major-holders.js';
import {
  getTickerInsiderTransactionsHandler,
  getTickerInsiderTransactionsDefinition,
} from './get-ticker-insider-transactions.js';
import { getTickerNewsHandler, getTickerNewsDefinition } from './get-ticker-news.js';
import { getTickerOptionsHandler, getTickerOptionsDefinition } from './get-ticker-options.js';
import { getTickerOptionChainHandler, getTickerOptionChainDefinition } from './get-ticker-option-chain.js';
import { getTickerIsinHandler, getTickerIsinDefinition } from './get-ticker-isin.js';

export type { ToolArguments } from './args.js';
export type { ToolContext, ToolHandler } from './context.js';

interface RegisteredTool {
  definition: McpToolDefinition;
  handler: ToolHandler;
}

const tools: RegisteredTool[] = [
  { definition: getTickerInfoDefinition, handler: getTickerInfoHandler },
  { definition: getTickerHistoryDefinition, handler: getTickerHistoryHandler },
  { definition: getTickerFinancialsDefinition, handler: getTickerFinancialsHandler },
  { definition: getTickerRecommendationsDefinition, handler: getTickerRecommendationsHandler },
  { definition: downloadMultipleDefinition, handler: downloadMultipleHandler },
  { definition: searchTickersDefinition, handler: searchTickersHandler },
  { definition: getTickerDividendsDefinition, handler: getTickerDividendsHandler },
  { definition: getTickerSplitsDefinition, handler: getTickerSplitsHandler },
  { definition: getTickerActionsDefinition, handler: getTickerActionsHandler },
  { definition: getTickerCapitalGainsDefinition, handler: getTickerCapitalGainsHandler },
  { definition: getTickerEarningsDefinition, handler: getTickerEarningsHandler },
  { definition: getTickerEarningsDatesDefinition, handler: getTickerEarningsDatesHandler },
  { definition: getTickerAnalystPriceTargetsDefinition, handler: getTickerAnalystPriceTargetsHandler },
  { definition: getTickerInstitutionalHoldersDefinition, handler: getTickerInstitutionalHoldersHandler },
  { definition: getTickerMajorHoldersDefinition, handler: getTickerMajorHoldersHandler },
  { definition: getTickerInsiderTransactionsDefinition, handler: getTickerInsiderTransactionsHandler },
  { definition: getTickerNewsDefinition, handler: getTickerNewsHandler },
  { definition: getTickerOptionsDefinition, handler: getTickerOptionsHandler },
  { definition: getTickerOptionChainDefinition, handler: getTickerOptionChainHandler },
  { definition: getTickerIsinDefinition, handler: getTickerIsinHandler },
];

const handlers = new Map<string, ToolHandler>(tools.map(tool => [tool.definition.name, tool.handler]));

const definitions: readonly McpToolDefinition[] = Object.freeze(tools.map(tool => tool.definition));

export function getToolDefinitions(): readonly McpToolDefinition[] {
  return definitions;
}

export function textResult(text: string, isError = false): McpToolResult {
  return isError
    ? { content: [{ type: 'text', text }], isError: true }
    : { content: [{ type: 'text', text }] };
}

/**
 * Runs one tool and always answers with an envelope: failures of any kind come back as
 * `isError: true` results rather than thrown errors.
 */
export async function handleToolCall(
  toolName: string,
  args: ToolArguments,
  ctx: ToolContext
): Promise<McpToolResult> {
  const handler = handlers.get(toolName);

  if (!handler) {
    ctx.logger.warn(`Unknown tool requested: ${toolName}`);
    return textResult(`Unknown tool: ${toolName}`, true);
  }

  try {
    const result = await handler(args, ctx);
    return textResult(JSON.stringify(result, null, 2));
  } catch (error) {
    ctx.logger.error(`Error executing ${toolName}: ${errorMessage(error)}`, {
      tool: toolName,
      arguments: args,
      stack: errorStack(error),
    });
    return textResult(`Error: ${errorMessage(error)}`, true);
  }
}
