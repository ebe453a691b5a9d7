/**
 * Core Types
 *
 * Conversation messages, tool calls and tool definitions shared by the
 * tool client, the provider adapters and the conversation engine.
 */

// =============================================================================
// MESSAGES
// =============================================================================

export type MessageRole = 'system' | 'user' | 'assistant' | 'tool';

/**
 * A structured request from the model to invoke a named tool.
 */
export interface ToolCall {
  /** Unique within one assistant message */
  id: string;
  name: string;
  arguments: Record<string, unknown>;
}

/**
 * One entry of the conversation log.
 */
export interface Message {
  role: MessageRole;
  content: string;
  /** Assistant messages only */
  toolCalls?: ToolCall[];
  /** Tool messages only: id of the originating call */
  toolCallId?: string;
  /** Tool messages only: name of the tool that produced the content */
  name?: string;
}

// =============================================================================
// TOOLS
// =============================================================================

/**
 * A tool as discovered from a tool server via `tools/list`.
 */
export interface ToolDefinition {
  name: string;
  description: string;
  inputSchema: Record<string, unknown>;
}

/**
 * OpenAI-compatible tool schema sent to model backends.
 */
export interface ToolSchema {
  type: 'function';
  function: {
    name: string;
    description: string;
    parameters: Record<string, unknown>;
  };
}

// =============================================================================
// TRACING
// =============================================================================

/**
 * Identifiers threaded through model and tool invocations for observability.
 * Opaque to the core logic.
 */
export interface TracingIds {
  userId: string;
  sessionId: string;
  traceId: string;
  messageId: string;
}

// =============================================================================
// HELPERS
// =============================================================================

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
