#!/usr/bin/env node
import { runStdioServer } from './mcp/index.js';
import { YahooMarketDataProvider } from './services/yahoo.provider.js';
import { errorMessage, errorStack } from './utils/errors.js';
import { createLogger, routeConsoleToLogger } from './utils/logger.js';

const logger = createLogger();
routeConsoleToLogger(logger);

runStdioServer({
  input: process.stdin,
  output: process.stdout,
  provider: new YahooMarketDataProvider(),
  logger,
})
  .catch(error => {
    logger.error(`Fatal error: ${errorMessage(error)}`, { stack: errorStack(error) });
    process.exitCode = 1;
  })
  .finally(() => {
    logger.end();
  });
