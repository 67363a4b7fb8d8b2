/**
 * One-shot JSON-RPC: a single `tools/list` or `tools/call` request piped on
 * stdin, answered once on stdout, without the MCP initialize handshake.
 */

import { z } from 'zod';
import type { ToolExposureMode } from '../config.js';
import { getTools, handleToolCall } from '../tools/index.js';

const JSON_RPC_PARSE_ERROR = -32700;
const JSON_RPC_INVALID_REQUEST = -32600;
const JSON_RPC_METHOD_NOT_FOUND = -32601;
const JSON_RPC_INVALID_PARAMS = -32602;

const RequestIdSchema = z.union([z.string(), z.number(), z.null()]);

const JsonRpcRequestSchema = z.object({
  jsonrpc: z.string().optional(),
  id: RequestIdSchema.optional(),
  method: z.string().optional(),
  params: z.record(z.string(), z.unknown()).optional(),
});

const ToolsCallParamsSchema = z.object({
  name: z.string().min(1),
  arguments: z.record(z.string(), z.unknown()).optional(),
});

type RequestId = z.infer<typeof RequestIdSchema>;

export type JsonRpcResponse =
  | { jsonrpc: '2.0'; id: RequestId; result: unknown }
  | { jsonrpc: '2.0'; id: RequestId; error: { code: number; message: string } };

function result(id: RequestId | undefined, value: unknown): JsonRpcResponse {
  return { jsonrpc: '2.0', id: id ?? null, result: value };
}

function failure(id: RequestId | undefined, code: number, message: string): JsonRpcResponse {
  return { jsonrpc: '2.0', id: id ?? null, error: { code, message } };
}

export async function handleJsonRpcText(text: string, mode: ToolExposureMode): Promise<JsonRpcResponse> {
  let raw: unknown;
  try {
    raw = JSON.parse(text.trim());
  } catch {
    return failure(null, JSON_RPC_PARSE_ERROR, 'Parse error');
  }

  const parsed = JsonRpcRequestSchema.safeParse(raw);
  if (!parsed.success) {
    return failure(null, JSON_RPC_INVALID_REQUEST, 'Invalid Request');
  }
  const request = parsed.data;

  if (request.method === 'tools/list') {
    return result(request.id, { tools: getTools(mode) });
  }

  if (request.method === 'tools/call') {
    const params = ToolsCallParamsSchema.safeParse(request.params ?? {});
    if (!params.success) {
      return failure(request.id, JSON_RPC_INVALID_PARAMS, 'Invalid params: tools/call requires name');
    }
    const response = await handleToolCall(params.data.name, params.data.arguments ?? {}, mode);
    return result(request.id, response);
  }

  return failure(request.id, JSON_RPC_METHOD_NOT_FOUND, `Method not found: ${request.method ?? '(missing)'}`);
}
