import os from 'os';
import path from 'path';

export const SERVER_NAME = 'market-data-mcp';
export const SERVER_VERSION = '1.0.0';
export const PROTOCOL_VERSION = '2024-11-05';

// Logs never go to stdout/stderr: stdio carries the protocol.
export const LOG_DIR = path.join(os.tmpdir(), SERVER_NAME);
export const LOG_FILE_PATTERN = `${SERVER_NAME}-%DATE%.log`;
export const ERROR_LOG_FILE_PATTERN = 'error-%DATE%.log';
export const LOG_LEVEL = 'debug';

export const ISIN_SEARCH_URL = 'https://markets.businessinsider.com/ajax/SearchController_Suggest';
