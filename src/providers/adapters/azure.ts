/**
 * Azure OpenAI Provider Adapter
 *
 * Chat completions against an Azure OpenAI deployment. The model part of
 * "azure:<model>" names the deployment.
 *
 * Settings: AZURE_OPENAI_API_KEY, AZURE_OPENAI_ENDPOINT (required),
 * AZURE_OPENAI_API_VERSION (optional).
 */

import { z } from 'zod';
import { ConfigurationError, ProviderError } from '../../errors/index.js';
import type { Settings } from '../../config/settings.js';
import type { Message, ToolCall, ToolSchema } from '../../types.js';
import type { CancellationToken } from '../../utilities/cancellation.js';
import type { ChatClient, ChatCompletion, ChatOptions, ChatRequest, ProviderAdapter } from '../types.js';
import { normalizeEndpoint, parseArguments, postJson } from './http.js';

export const DEFAULT_AZURE_API_VERSION = '2025-01-01-preview';

// =============================================================================
// AZURE OPENAI API TYPES
// =============================================================================

interface OpenAIMessage {
  role: 'system' | 'user' | 'assistant' | 'tool';
  content: string | null;
  name?: string;
  tool_calls?: OpenAIToolCall[];
  tool_call_id?: string;
}

interface OpenAIToolCall {
  id: string;
  type: 'function';
  function: {
    name: string;
    arguments: string;
  };
}

const ChatCompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullable().optional(),
          tool_calls: z
            .array(
              z.object({
                id: z.string(),
                type: z.string().optional(),
                function: z.object({
                  name: z.string(),
                  arguments: z.string().default(''),
                }),
              })
            )
            .nullable()
            .optional(),
        }),
        finish_reason: z.string().nullable().optional(),
      })
    )
    .min(1),
  usage: z
    .object({
      prompt_tokens: z.number(),
      completion_tokens: z.number(),
    })
    .optional(),
});

// =============================================================================
// CLIENT
// =============================================================================

export class AzureOpenAIChatClient implements ChatClient {
  readonly provider = 'azure';
  readonly model: string;
  readonly options: Readonly<ChatOptions>;

  private readonly apiKey: string;
  private readonly endpoint: string;
  private readonly apiVersion: string;

  constructor(model: string, config: { apiKey: string; endpoint: string; apiVersion?: string }, options: ChatOptions) {
    this.model = model;
    this.options = options;
    this.apiKey = config.apiKey;
    this.endpoint = normalizeEndpoint(config.endpoint);
    this.apiVersion = config.apiVersion ?? DEFAULT_AZURE_API_VERSION;
  }

  /**
   * Format: {endpoint}/openai/deployments/{deployment}/chat/completions?api-version={apiVersion}
   */
  buildUrl(): string {
    return `${this.endpoint}/openai/deployments/${encodeURIComponent(this.model)}/chat/completions?api-version=${this.apiVersion}`;
  }

  async complete(request: ChatRequest, token: CancellationToken): Promise<ChatCompletion> {
    const body: Record<string, unknown> = {
      messages: request.messages.map(toOpenAIMessage),
      temperature: this.options.temperature,
      stream: this.options.stream,
    };
    if (request.tools.length > 0) {
      body.tools = request.tools.map(toOpenAITool);
    }

    const data = await postJson({
      provider: this.provider,
      label: 'Azure OpenAI',
      url: this.buildUrl(),
      headers: { 'api-key': this.apiKey },
      body,
      token,
    });

    return this.parseResponse(data);
  }

  private parseResponse(data: unknown): ChatCompletion {
    const parsed = ChatCompletionSchema.safeParse(data);
    if (!parsed.success) {
      throw new ProviderError(
        `Azure OpenAI returned an unexpected response: ${parsed.error.issues.map((i) => i.message).join(', ')}`,
        this.provider,
        'INVALID_RESPONSE'
      );
    }

    const [choice] = parsed.data.choices;
    if (!choice) {
      throw new ProviderError('Azure OpenAI returned no choices', this.provider, 'INVALID_RESPONSE');
    }

    const toolCalls: ToolCall[] = (choice.message.tool_calls ?? []).map((tc) => ({
      id: tc.id,
      name: tc.function.name,
      arguments: parseArguments(tc.function.arguments, tc.function.name, this.provider),
    }));

    const message: Message = { role: 'assistant', content: choice.message.content ?? '' };
    if (toolCalls.length > 0) message.toolCalls = toolCalls;

    const usage = parsed.data.usage;
    return {
      message,
      finishReason: choice.finish_reason ?? undefined,
      usage: usage ? { inputTokens: usage.prompt_tokens, outputTokens: usage.completion_tokens } : undefined,
    };
  }
}

// =============================================================================
// CONVERSION
// =============================================================================

function toOpenAIMessage(message: Message): OpenAIMessage {
  if (message.role === 'tool') {
    return { role: 'tool', content: message.content, tool_call_id: message.toolCallId, name: message.name };
  }

  if (message.role === 'assistant' && message.toolCalls && message.toolCalls.length > 0) {
    return {
      role: 'assistant',
      content: message.content || null,
      tool_calls: message.toolCalls.map((tc) => ({
        id: tc.id,
        type: 'function',
        function: { name: tc.name, arguments: JSON.stringify(tc.arguments) },
      })),
    };
  }

  return { role: message.role, content: message.content };
}

function toOpenAITool(tool: ToolSchema): ToolSchema {
  return {
    type: 'function',
    function: {
      name: tool.function.name,
      description: tool.function.description,
      parameters: tool.function.parameters,
    },
  };
}

// =============================================================================
// ADAPTER
// =============================================================================

export class AzureOpenAIAdapter implements ProviderAdapter {
  readonly name = 'azure';
  readonly requiredSettings = ['AZURE_OPENAI_API_KEY', 'AZURE_OPENAI_ENDPOINT'] as const;

  createClient(model: string, settings: Settings, options: ChatOptions): ChatClient {
    const apiKey = settings.get('AZURE_OPENAI_API_KEY');
    const endpoint = settings.get('AZURE_OPENAI_ENDPOINT');
    if (apiKey === undefined || endpoint === undefined) {
      throw ConfigurationError.forProvider(this.name, settings.missing(this.requiredSettings));
    }
    return new AzureOpenAIChatClient(
      model,
      { apiKey, endpoint, apiVersion: settings.get('AZURE_OPENAI_API_VERSION') },
      options
    );
  }
}
