/**
 * Model Context Protocol (MCP) over JSON-RPC 2.0.
 *
 * - Request: { jsonrpc: "2.0", id, method, params? }
 * - Response: { jsonrpc: "2.0", id, result } | { jsonrpc: "2.0", id, error }
 * - Notification: { jsonrpc: "2.0", method, params? } (no id, no response)
 *
 * Tool failures the caller can act on (bad arguments, index not ready,
 * timeout) come back as a tool result with `isError: true`; protocol
 * problems come back as JSON-RPC errors.
 */
import { z } from 'zod';
import { AppError, errorMessage } from '../utils/errors';
import { createLogger } from '../utils/logger';
import { McpTool, buildTools, isToolName } from './McpTools';
import { QueryService } from './QueryService';

const log = createLogger('McpProtocolHandler');

export const MCP_PROTOCOL_VERSION = '2025-06-18';
const JSONRPC_VERSION = '2.0';

export const JSONRPCErrorCode = {
  PARSE_ERROR: -32700,
  INVALID_REQUEST: -32600,
  METHOD_NOT_FOUND: -32601,
  INVALID_PARAMS: -32602,
  INTERNAL_ERROR: -32603
} as const;

type RequestId = string | number;

const requestSchema = z.object({
  jsonrpc: z.literal(JSONRPC_VERSION),
  id: z.union([z.string(), z.number()]).nullable().optional(),
  method: z.string().min(1),
  params: z.record(z.unknown()).optional()
});

const toolCallSchema = z.object({
  name: z.string(),
  arguments: z.record(z.unknown()).optional()
});

export interface JSONRPCSuccessResponse {
  jsonrpc: '2.0';
  id: RequestId;
  result: unknown;
}

export interface JSONRPCErrorResponse {
  jsonrpc: '2.0';
  id: RequestId | null;
  error: {
    code: number;
    message: string;
    data?: unknown;
  };
}

export type JSONRPCResponse = JSONRPCSuccessResponse | JSONRPCErrorResponse;

export interface ToolResult {
  content: Array<{ type: 'text'; text: string }>;
  isError?: boolean;
}

export interface ServerInfo {
  name: string;
  version: string;
}

class UnknownToolError extends Error {
  constructor(name: string) {
    super(`Unknown tool: ${name}`);
    this.name = 'UnknownToolError';
  }
}

export class McpProtocolHandler {
  private readonly tools: McpTool[];

  constructor(
    private readonly queryService: QueryService,
    private readonly serverInfo: ServerInfo = { name: 'pdf-hybrid-search', version: '1.0.0' }
  ) {
    this.tools = buildTools(queryService.defaultMaxChunks, queryService.maxChunksLimit);
  }

  listTools(): McpTool[] {
    return this.tools;
  }

  /**
   * Runs one tool. AppErrors become `isError` results; anything else is
   * rethrown and reported as an internal error.
   */
  async callTool(name: string, args: Record<string, unknown>): Promise<ToolResult> {
    log.debug(`Tool call ${name}`, args);
    if (!isToolName(name)) {
      throw new UnknownToolError(name);
    }

    // `question` is accepted as an alias of `query`
    const query = args.query ?? args.question;
    try {
      const payload = name === 'search_documents'
        ? await this.queryService.search(query, args.max_chunks)
        : await this.queryService.answer(query, args.max_chunks);
      return { content: [{ type: 'text', text: JSON.stringify(payload, null, 2) }] };
    } catch (error) {
      if (error instanceof AppError) {
        log.warn(`Tool ${name} failed: ${error.message}`);
        return {
          content: [{
            type: 'text',
            text: JSON.stringify({ error: error.code, message: error.message, retryable: error.retryable })
          }],
          isError: true
        };
      }
      throw error;
    }
  }

  /**
   * Handles a parsed JSON-RPC message. Returns null for notifications.
   */
  async handleRequest(message: unknown): Promise<JSONRPCResponse | null> {
    const parsed = requestSchema.safeParse(message);
    if (!parsed.success) {
      return this.errorResponse(null, JSONRPCErrorCode.INVALID_REQUEST, 'Invalid Request');
    }

    const request = parsed.data;
    if (request.id === undefined || request.id === null) {
      log.debug(`Notification ${request.method}`);
      return null;
    }
    const id = request.id;

    try {
      switch (request.method) {
        case 'initialize': {
          const requested = request.params?.protocolVersion;
          return this.successResponse(id, {
            protocolVersion: typeof requested === 'string' ? requested : MCP_PROTOCOL_VERSION,
            capabilities: { tools: { listChanged: false } },
            serverInfo: this.serverInfo
          });
        }
        case 'ping':
          return this.successResponse(id, {});
        case 'tools/list':
          return this.successResponse(id, { tools: this.listTools() });
        case 'tools/call': {
          const call = toolCallSchema.safeParse(request.params ?? {});
          if (!call.success) {
            return this.errorResponse(id, JSONRPCErrorCode.INVALID_PARAMS, 'Missing tool name');
          }
          const result = await this.callTool(call.data.name, call.data.arguments ?? {});
          return this.successResponse(id, result);
        }
        default:
          return this.errorResponse(id, JSONRPCErrorCode.METHOD_NOT_FOUND, `Method not found: ${request.method}`);
      }
    } catch (error) {
      if (error instanceof UnknownToolError) {
        return this.errorResponse(id, JSONRPCErrorCode.INVALID_PARAMS, error.message);
      }
      log.error(`MCP request ${request.method} failed: ${errorMessage(error)}`);
      return this.errorResponse(id, JSONRPCErrorCode.INTERNAL_ERROR, errorMessage(error));
    }
  }

  /**
   * Parses a raw request body and handles it. Returns null for
   * notifications.
   */
  async handleRawRequest(body: string): Promise<JSONRPCResponse | null> {
    let message: unknown;
    try {
      message = JSON.parse(body);
    } catch {
      return this.errorResponse(null, JSONRPCErrorCode.PARSE_ERROR, 'Parse error');
    }
    return this.handleRequest(message);
  }

  private successResponse(id: RequestId, result: unknown): JSONRPCSuccessResponse {
    return { jsonrpc: JSONRPC_VERSION, id, result };
  }

  private errorResponse(id: RequestId | null, code: number, message: string): JSONRPCErrorResponse {
    return { jsonrpc: JSONRPC_VERSION, id, error: { code, message } };
  }
}
