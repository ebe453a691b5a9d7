/**
 * Model Provider Registry
 *
 * Maps "provider:model" identifiers to registered adapters, checks that the
 * provider's settings are present, and binds a chat client, the tool schemas
 * and a per-turn trace handler into a BoundModel.
 *
 * @example
 * ```typescript
 * const registry = createDefaultRegistry(settings, tracer);
 * const model = registry.create('azure:gpt-4o', catalog, tracingIds);
 * const reply = await model.invoke(messages);
 * ```
 */

import {
  ConfigurationError,
  InvalidModelIdentifierError,
  UnknownProviderError,
} from '../errors/index.js';
import type { Settings } from '../config/settings.js';
import type { ModelTraceHandler, ObservabilitySink } from '../observability/types.js';
import type { Message, ToolSchema, TracingIds } from '../types.js';
import { NONE_TOKEN, type CancellationToken } from '../utilities/cancellation.js';
import { createComponentLogger } from '../utilities/logger.js';
import { AzureOpenAIAdapter } from './adapters/azure.js';
import { OllamaAdapter } from './adapters/ollama.js';
import type {
  BoundModel,
  ChatClient,
  ChatOptions,
  ProviderAdapter,
  ProviderModelId,
  ProviderStatus,
  ToolSchemaSource,
} from './types.js';

const log = createComponentLogger('ModelProviderRegistry');

export const DEFAULT_TEMPERATURE = 0.1;

// =============================================================================
// IDENTIFIER PARSING
// =============================================================================

/**
 * Split "provider:model" on the first colon. Both halves must be non-empty;
 * the model part may itself contain colons (e.g. "ollama:llama3.2:1b").
 */
export function parseModelIdentifier(identifier: string): ProviderModelId {
  const separator = identifier.indexOf(':');
  if (separator === -1) {
    throw new InvalidModelIdentifierError(identifier, 'missing provider prefix');
  }

  const provider = identifier.slice(0, separator).trim();
  const model = identifier.slice(separator + 1).trim();
  if (provider === '') {
    throw new InvalidModelIdentifierError(identifier, 'empty provider');
  }
  if (model === '') {
    throw new InvalidModelIdentifierError(identifier, 'empty model name');
  }
  return { provider, model };
}

// =============================================================================
// BOUND MODEL
// =============================================================================

class BoundChatModel implements BoundModel {
  readonly provider: string;
  readonly model: string;
  readonly tools: readonly ToolSchema[];
  readonly observer: ModelTraceHandler;
  private readonly client: ChatClient;

  constructor(client: ChatClient, tools: readonly ToolSchema[], observer: ModelTraceHandler) {
    this.client = client;
    this.provider = client.provider;
    this.model = client.model;
    this.tools = tools;
    this.observer = observer;
  }

  async invoke(messages: readonly Message[], token: CancellationToken = NONE_TOKEN): Promise<Message> {
    const span = this.observer.startSpan('model.invoke', {
      'request.messages': messages.length,
      'request.tools': this.tools.length,
      temperature: this.client.options.temperature,
    });

    try {
      const completion = await this.client.complete({ messages, tools: this.tools }, token);
      span.attributes['response.tool_calls'] = completion.message.toolCalls?.length ?? 0;
      if (completion.usage) {
        span.attributes['usage.input_tokens'] = completion.usage.inputTokens;
        span.attributes['usage.output_tokens'] = completion.usage.outputTokens;
      }
      this.observer.endSpan(span);
      return completion.message;
    } catch (err) {
      this.observer.endSpan(span, err instanceof Error ? err : new Error(String(err)));
      throw err;
    }
  }
}

// =============================================================================
// REGISTRY
// =============================================================================

export interface ModelProviderRegistryOptions {
  temperature?: number;
}

export class ModelProviderRegistry {
  private adapters: Map<string, ProviderAdapter> = new Map();
  private readonly settings: Settings;
  private readonly sink: ObservabilitySink;
  private readonly chatOptions: ChatOptions;

  constructor(settings: Settings, sink: ObservabilitySink, options: ModelProviderRegistryOptions = {}) {
    this.settings = settings;
    this.sink = sink;
    this.chatOptions = { temperature: options.temperature ?? DEFAULT_TEMPERATURE, stream: false };
  }

  /**
   * Register an adapter under its name. A later registration replaces an
   * earlier one.
   */
  register(adapter: ProviderAdapter): this {
    if (this.adapters.has(adapter.name)) {
      log.debug('Replacing provider adapter', { provider: adapter.name });
    }
    this.adapters.set(adapter.name, adapter);
    return this;
  }

  has(provider: string): boolean {
    return this.adapters.has(provider);
  }

  /**
   * True only when the provider is registered and all its required
   * settings are present.
   */
  validateConfig(provider: string): boolean {
    const adapter = this.adapters.get(provider);
    if (!adapter) return false;
    return this.settings.missing(adapter.requiredSettings).length === 0;
  }

  /**
   * Build a ready-to-call model for one turn.
   *
   * @throws InvalidModelIdentifierError, UnknownProviderError, ConfigurationError
   */
  create(modelName: string, tools: ToolSchemaSource, tracingIds: TracingIds): BoundModel {
    const { provider, model, adapter } = this.resolve(modelName);

    const observer = this.sink.createHandler({
      provider,
      model,
      userId: tracingIds.userId,
      sessionId: tracingIds.sessionId,
      traceId: tracingIds.traceId,
      messageId: tracingIds.messageId,
    });

    const client = adapter.createClient(model, this.settings, this.chatOptions);
    const schemas = tools.toSchemas();

    log.debug('Created bound model', { provider, model, tools: schemas.length, messageId: tracingIds.messageId });
    return new BoundChatModel(client, schemas, observer);
  }

  /**
   * Check an identifier without building anything; used before tool
   * servers are spawned so configuration errors surface first.
   */
  assertUsable(modelName: string): ProviderModelId {
    const { provider, model } = this.resolve(modelName);
    return { provider, model };
  }

  listProviders(): ProviderStatus[] {
    return Array.from(this.adapters.values(), (adapter) => ({
      name: adapter.name,
      configured: this.validateConfig(adapter.name),
      requiredSettings: adapter.requiredSettings,
    }));
  }

  private resolve(modelName: string): ProviderModelId & { adapter: ProviderAdapter } {
    const { provider, model } = parseModelIdentifier(modelName);

    const adapter = this.adapters.get(provider);
    if (!adapter) {
      throw new UnknownProviderError(provider, this.listProviderNames());
    }

    const missing = this.settings.missing(adapter.requiredSettings);
    if (missing.length > 0) {
      throw ConfigurationError.forProvider(provider, missing);
    }
    return { provider, model, adapter };
  }

  private listProviderNames(): string[] {
    return Array.from(this.adapters.keys());
  }
}

/**
 * Registry with the built-in Azure OpenAI and Ollama adapters.
 */
export function createDefaultRegistry(
  settings: Settings,
  sink: ObservabilitySink,
  options: ModelProviderRegistryOptions = {}
): ModelProviderRegistry {
  return new ModelProviderRegistry(settings, sink, options)
    .register(new AzureOpenAIAdapter())
    .register(new OllamaAdapter());
}
