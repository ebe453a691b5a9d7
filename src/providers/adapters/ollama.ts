/**
 * Ollama Provider Adapter
 *
 * Local inference through Ollama's `/api/chat` endpoint with streaming off.
 * Ollama returns tool call arguments as objects and assigns no call ids,
 * so ids are generated here.
 *
 * Settings: OLLAMA_ENDPOINT (e.g. http://localhost:11434).
 */

import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import { ConfigurationError, ProviderError } from '../../errors/index.js';
import type { Settings } from '../../config/settings.js';
import type { Message, ToolCall } from '../../types.js';
import type { CancellationToken } from '../../utilities/cancellation.js';
import type { ChatClient, ChatCompletion, ChatOptions, ChatRequest, ProviderAdapter } from '../types.js';
import { normalizeEndpoint, parseArguments, postJson } from './http.js';

interface OllamaMessage {
  role: 'system' | 'user' | 'assistant' | 'tool';
  content: string;
  tool_calls?: Array<{ function: { name: string; arguments: Record<string, unknown> } }>;
  tool_name?: string;
}

const OllamaChatResponseSchema = z.object({
  message: z.object({
    content: z.string().default(''),
    tool_calls: z
      .array(
        z.object({
          function: z.object({
            name: z.string(),
            arguments: z.union([z.record(z.string(), z.unknown()), z.string()]).default({}),
          }),
        })
      )
      .optional(),
  }),
  done_reason: z.string().optional(),
  prompt_eval_count: z.number().optional(),
  eval_count: z.number().optional(),
});

export class OllamaChatClient implements ChatClient {
  readonly provider = 'ollama';
  readonly model: string;
  readonly options: Readonly<ChatOptions>;
  private readonly endpoint: string;

  constructor(model: string, endpoint: string, options: ChatOptions) {
    this.model = model;
    this.options = options;
    this.endpoint = normalizeEndpoint(endpoint);
  }

  async complete(request: ChatRequest, token: CancellationToken): Promise<ChatCompletion> {
    const body: Record<string, unknown> = {
      model: this.model,
      messages: request.messages.map(toOllamaMessage),
      stream: this.options.stream,
      options: { temperature: this.options.temperature },
    };
    if (request.tools.length > 0) {
      body.tools = request.tools;
    }

    const data = await postJson({
      provider: this.provider,
      label: 'Ollama',
      url: `${this.endpoint}/api/chat`,
      headers: {},
      body,
      token,
    });

    const parsed = OllamaChatResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new ProviderError(
        `Ollama returned an unexpected response: ${parsed.error.issues.map((i) => i.message).join(', ')}`,
        this.provider,
        'INVALID_RESPONSE'
      );
    }

    const { message: reply, done_reason, prompt_eval_count, eval_count } = parsed.data;
    const toolCalls: ToolCall[] = (reply.tool_calls ?? []).map((tc) => ({
      id: `call_${randomUUID()}`,
      name: tc.function.name,
      arguments: typeof tc.function.arguments === 'string'
        ? parseArguments(tc.function.arguments, tc.function.name, this.provider)
        : tc.function.arguments,
    }));

    const message: Message = { role: 'assistant', content: reply.content };
    if (toolCalls.length > 0) message.toolCalls = toolCalls;

    return {
      message,
      finishReason: done_reason,
      usage: prompt_eval_count !== undefined && eval_count !== undefined
        ? { inputTokens: prompt_eval_count, outputTokens: eval_count }
        : undefined,
    };
  }
}

function toOllamaMessage(message: Message): OllamaMessage {
  if (message.role === 'tool') {
    return { role: 'tool', content: message.content, tool_name: message.name };
  }
  if (message.role === 'assistant' && message.toolCalls && message.toolCalls.length > 0) {
    return {
      role: 'assistant',
      content: message.content,
      tool_calls: message.toolCalls.map((tc) => ({ function: { name: tc.name, arguments: tc.arguments } })),
    };
  }
  return { role: message.role, content: message.content };
}

export class OllamaAdapter implements ProviderAdapter {
  readonly name = 'ollama';
  readonly requiredSettings = ['OLLAMA_ENDPOINT'] as const;

  createClient(model: string, settings: Settings, options: ChatOptions): ChatClient {
    const endpoint = settings.get('OLLAMA_ENDPOINT');
    if (endpoint === undefined) {
      throw ConfigurationError.forProvider(this.name, ['OLLAMA_ENDPOINT']);
    }
    return new OllamaChatClient(model, endpoint, options);
  }
}
