/**
 * Provider Types
 *
 * A provider adapter turns a model name plus settings into a ChatClient.
 * The registry wraps a ChatClient, the bound tool schemas and a trace
 * handler into a BoundModel the conversation engine calls once per AGENT step.
 */

import type { Settings } from '../config/settings.js';
import type { ModelTraceHandler } from '../observability/types.js';
import type { Message, ToolSchema } from '../types.js';
import type { CancellationToken } from '../utilities/cancellation.js';

// =============================================================================
// IDENTIFIERS
// =============================================================================

/**
 * Parsed form of "provider:model".
 */
export interface ProviderModelId {
  provider: string;
  model: string;
}

// =============================================================================
// CHAT CLIENTS
// =============================================================================

export interface ChatOptions {
  temperature: number;
  /** Streaming is not supported; always false */
  stream: false;
}

export interface ChatRequest {
  messages: readonly Message[];
  tools: readonly ToolSchema[];
}

export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
}

export interface ChatCompletion {
  /** Always an assistant message */
  message: Message;
  finishReason?: string;
  usage?: TokenUsage;
}

export interface ChatClient {
  readonly provider: string;
  readonly model: string;
  readonly options: Readonly<ChatOptions>;
  complete(request: ChatRequest, token: CancellationToken): Promise<ChatCompletion>;
}

/**
 * One implementation per provider kind, registered by name.
 */
export interface ProviderAdapter {
  readonly name: string;
  /** Settings that must be present for the provider to be usable */
  readonly requiredSettings: readonly string[];
  createClient(model: string, settings: Settings, options: ChatOptions): ChatClient;
}

// =============================================================================
// BOUND MODEL
// =============================================================================

/**
 * Anything that can supply tool schemas; ToolCatalog does.
 */
export interface ToolSchemaSource {
  toSchemas(): ToolSchema[];
}

/**
 * A ready-to-call model for one turn: chat client, tool schemas and an
 * observability handler carrying that turn's tracing ids.
 */
export interface BoundModel {
  readonly provider: string;
  readonly model: string;
  readonly tools: readonly ToolSchema[];
  readonly observer: ModelTraceHandler;
  invoke(messages: readonly Message[], token?: CancellationToken): Promise<Message>;
}

export interface ProviderStatus {
  name: string;
  configured: boolean;
  requiredSettings: readonly string[];
}
