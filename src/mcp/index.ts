import * as readline from 'readline';
import type { Readable, Writable } from 'stream';
import { z } from 'zod';
import { PROTOCOL_VERSION, SERVER_NAME, SERVER_VERSION } from '../config/server.js';
import { errorMessage, errorStack } from '../utils/errors.js';
import { getToolDefinitions, handleToolCall, type ToolContext } from './handlers/index.js';
import {
  JsonRpcErrorCodes,
  type JsonRpcId,
  type JsonRpcRequest,
  type JsonRpcResponse,
  type McpInitializeResult,
} from './types.js';

const NOTIFICATION_PREFIX = 'notifications/';

/** Returned by a method handler when nothing must be written back. */
export const NO_RESPONSE = Symbol('no-response');

const RequestSchema = z
  .object({
    jsonrpc: z.string().optional(),
    id: z.union([z.string(), z.number(), z.null()]).optional(),
    method: z.string().optional(),
    params: z.unknown().optional(),
  })
  .passthrough();

const ParamsSchema = z.record(z.string(), z.unknown());

export function initializeResult(): McpInitializeResult {
  return {
    protocolVersion: PROTOCOL_VERSION,
    capabilities: {
      tools: {},
    },
    serverInfo: {
      name: SERVER_NAME,
      version: SERVER_VERSION,
    },
  };
}

function readParams(params: unknown): Record<string, unknown> {
  if (params === undefined || params === null) {
    return {};
  }
  const parsed = ParamsSchema.safeParse(params);
  if (!parsed.success) {
    throw new Error('Invalid params: expected an object');
  }
  return parsed.data;
}

export function isNotification(request: JsonRpcRequest): boolean {
  return (request.method ?? '').startsWith(NOTIFICATION_PREFIX) || request.id === undefined;
}

export async function handleRequest(
  request: JsonRpcRequest,
  ctx: ToolContext
): Promise<unknown> {
  const method = request.method ?? '';

  if (method.startsWith(NOTIFICATION_PREFIX)) {
    ctx.logger.debug(`Received notification: ${method}`);
    return NO_RESPONSE;
  }

  const params = readParams(request.params);

  switch (method) {
    case 'initialize':
      return initializeResult();

    case 'tools/list':
      return { tools: getToolDefinitions() };

    case 'tools/call': {
      const toolName = typeof params.name === 'string' ? params.name : '';
      const toolArgs = readParams(params.arguments);
      return handleToolCall(toolName, toolArgs, ctx);
    }

    default:
      throw new Error(`Unknown method: ${method}`);
  }
}

function writeLine(output: Writable, line: string): Promise<void> {
  return new Promise((resolve, reject) => {
    output.write(`${line}\n`, error => (error ? reject(error) : resolve()));
  });
}

/**
 * Handles one input line and returns the response to write, or `null` when the line
 * gets no answer (blank, unparseable, or a notification).
 */
export async function processLine(line: string, ctx: ToolContext): Promise<JsonRpcResponse | null> {
  const trimmed = line.trim();
  if (!trimmed) {
    return null;
  }

  ctx.logger.debug(`Received: ${trimmed}`);

  let payload: unknown;
  try {
    payload = JSON.parse(trimmed);
  } catch (error) {
    // The id of a malformed request cannot be recovered, so nothing is sent back.
    ctx.logger.error(`Invalid JSON: ${errorMessage(error)}`, { line: trimmed });
    return null;
  }

  let request: JsonRpcRequest | null = null;
  try {
    const parsed = RequestSchema.safeParse(payload);
    if (!parsed.success) {
      throw new Error('Invalid request: expected a JSON-RPC request object');
    }
    request = parsed.data;

    const result = await handleRequest(request, ctx);
    if (result === NO_RESPONSE || isNotification(request)) {
      return null;
    }
    return { jsonrpc: '2.0', id: request.id ?? null, result };
  } catch (error) {
    ctx.logger.error(`Error processing request: ${errorMessage(error)}`, { stack: errorStack(error) });
    if (request && isNotification(request)) {
      return null;
    }
    const id: JsonRpcId = request?.id ?? null;
    return {
      jsonrpc: '2.0',
      id,
      error: {
        code: JsonRpcErrorCodes.INTERNAL_ERROR,
        message: errorMessage(error),
      },
    };
  }
}

export interface StdioServerOptions extends ToolContext {
  input: Readable;
  output: Writable;
}

/**
 * Reads JSON-RPC requests one line at a time and answers each before reading the next.
 * Resolves when the input ends.
 */
export async function runStdioServer({ input, output, ...ctx }: StdioServerOptions): Promise<void> {
  const rl = readline.createInterface({ input, crlfDelay: Infinity, terminal: false });

  ctx.logger.info(`${SERVER_NAME} ${SERVER_VERSION} starting`);

  for await (const line of rl) {
    const response = await processLine(line, ctx);
    if (response) {
      const serialized = JSON.stringify(response);
      ctx.logger.debug(`Sending: ${serialized}`);
      await writeLine(output, serialized);
    }
  }

  ctx.logger.info('Input closed, shutting down');
}
