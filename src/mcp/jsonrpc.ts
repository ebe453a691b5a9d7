/**
 * JSON-RPC 2.0 framing for stdio tool servers.
 *
 * One JSON object per line in each direction. Requests carry an integer id,
 * notifications carry none. Responses are validated with Zod before the
 * client looks at them.
 */

import { z } from 'zod';
import type { ToolDefinition } from '../types.js';

export const JSONRPC_VERSION = '2.0';
export const PROTOCOL_VERSION = '2024-11-05';

// =============================================================================
// OUTGOING
// =============================================================================

export interface JsonRpcRequest {
  jsonrpc: typeof JSONRPC_VERSION;
  id: number;
  method: string;
  params?: Record<string, unknown>;
}

export interface JsonRpcNotification {
  jsonrpc: typeof JSONRPC_VERSION;
  method: string;
  params?: Record<string, unknown>;
}

export function encodeRequest(id: number, method: string, params?: Record<string, unknown>): string {
  const request: JsonRpcRequest = { jsonrpc: JSONRPC_VERSION, id, method };
  if (params !== undefined) request.params = params;
  return JSON.stringify(request) + '\n';
}

export function encodeNotification(method: string, params?: Record<string, unknown>): string {
  const notification: JsonRpcNotification = { jsonrpc: JSONRPC_VERSION, method };
  if (params !== undefined) notification.params = params;
  return JSON.stringify(notification) + '\n';
}

// =============================================================================
// INCOMING
// =============================================================================

const RpcErrorSchema = z.object({
  code: z.number(),
  message: z.string().default(''),
  data: z.unknown().optional(),
});

/**
 * Anything the server writes. `id` is absent on server notifications and
 * may be null on parse-error responses.
 */
const IncomingMessageSchema = z
  .object({
    jsonrpc: z.string().optional(),
    id: z.union([z.number(), z.string(), z.null()]).optional(),
    method: z.string().optional(),
    result: z.unknown().optional(),
    error: RpcErrorSchema.optional(),
  })
  .passthrough();

export type IncomingMessage = z.infer<typeof IncomingMessageSchema>;
export type RpcError = z.infer<typeof RpcErrorSchema>;

export type DecodedLine =
  | { type: 'message'; message: IncomingMessage }
  | { type: 'invalid'; error: Error };

/**
 * Parse one line of server output.
 */
export function decodeLine(line: string): DecodedLine {
  let raw: unknown;
  try {
    raw = JSON.parse(line);
  } catch (err) {
    return { type: 'invalid', error: err instanceof Error ? err : new Error(String(err)) };
  }

  const result = IncomingMessageSchema.safeParse(raw);
  if (!result.success) {
    return { type: 'invalid', error: new Error(result.error.issues.map((i) => i.message).join(', ')) };
  }
  return { type: 'message', message: result.data };
}

/**
 * Numeric id of a response, or undefined for notifications and null ids.
 */
export function responseId(message: IncomingMessage): number | undefined {
  if (typeof message.id === 'number') return message.id;
  if (typeof message.id === 'string' && /^\d+$/.test(message.id)) return Number(message.id);
  return undefined;
}

// =============================================================================
// RESULT PAYLOADS
// =============================================================================

const ToolDefinitionSchema = z
  .object({
    name: z.string().min(1),
    description: z.string().optional(),
    inputSchema: z.record(z.string(), z.unknown()).optional(),
  })
  .passthrough();

const ToolsListResultSchema = z.object({
  tools: z.array(ToolDefinitionSchema).default([]),
});

const ContentItemSchema = z
  .object({
    type: z.string(),
    text: z.string().optional(),
  })
  .passthrough();

const ToolCallResultSchema = z
  .object({
    content: z.array(ContentItemSchema).default([]),
    isError: z.boolean().optional(),
  })
  .passthrough();

export type ToolContentItem = z.infer<typeof ContentItemSchema>;

/**
 * Outcome of `tools/call`. `isError` results are tool-level failures the
 * model should see; they are returned, not thrown.
 */
export interface ToolCallResult {
  content: ToolContentItem[];
  isError: boolean;
}

export function parseToolsList(result: unknown): ToolDefinition[] | Error {
  const parsed = ToolsListResultSchema.safeParse(result ?? {});
  if (!parsed.success) {
    return new Error(`Invalid tools/list result: ${parsed.error.issues.map((i) => i.message).join(', ')}`);
  }
  return parsed.data.tools.map((tool) => ({
    name: tool.name,
    description: tool.description ?? '',
    inputSchema: tool.inputSchema ?? { type: 'object', properties: {} },
  }));
}

export function parseToolCallResult(result: unknown): ToolCallResult | Error {
  const parsed = ToolCallResultSchema.safeParse(result ?? {});
  if (!parsed.success) {
    return new Error(`Invalid tools/call result: ${parsed.error.issues.map((i) => i.message).join(', ')}`);
  }
  return { content: parsed.data.content, isError: parsed.data.isError ?? false };
}

/**
 * Flatten tool output for the conversation log: text items joined by
 * newlines, otherwise the JSON of the whole content array.
 */
export function renderToolContent(content: readonly ToolContentItem[]): string {
  const texts = content.flatMap((item) => (item.type === 'text' && item.text !== undefined ? [item.text] : []));
  if (texts.length > 0 && texts.length === content.length) {
    return texts.join('\n');
  }
  return JSON.stringify(content);
}
