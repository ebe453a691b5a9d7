/**
 * Mock Provider
 *
 * Scripted replies for tests and offline runs. Needs no settings.
 * Not part of the default registry; register it explicitly.
 *
 * @example
 * ```typescript
 * const mock = new MockAdapter([
 *   { toolCalls: [{ name: 'get_me', arguments: {} }] },
 *   { content: 'You are octocat.' },
 * ]);
 * registry.register(mock);
 * ```
 */

import { ProviderError } from '../../errors/index.js';
import type { Settings } from '../../config/settings.js';
import type { Message, ToolCall } from '../../types.js';
import type { CancellationToken } from '../../utilities/cancellation.js';
import type { ChatClient, ChatCompletion, ChatOptions, ChatRequest, ProviderAdapter } from '../types.js';

export interface MockReply {
  content?: string;
  toolCalls?: Array<{ id?: string; name: string; arguments?: Record<string, unknown> }>;
  /** Thrown instead of replying */
  error?: Error;
}

export type MockScript = MockReply[] | ((request: ChatRequest, callIndex: number) => MockReply);

/**
 * A request as the mock saw it, captured for assertions.
 */
export interface RecordedRequest {
  model: string;
  options: Readonly<ChatOptions>;
  messages: Message[];
  toolNames: string[];
}

export class MockAdapter implements ProviderAdapter {
  readonly name: string;
  readonly requiredSettings: readonly string[] = [];
  readonly requests: RecordedRequest[] = [];

  private readonly script: MockScript;
  private callIndex = 0;
  private nextCallId = 1;

  constructor(script: MockScript = [], name = 'mock') {
    this.script = script;
    this.name = name;
  }

  createClient(model: string, _settings: Settings, options: ChatOptions): ChatClient {
    return {
      provider: this.name,
      model,
      options,
      complete: (request, token) => this.complete(model, options, request, token),
    };
  }

  private async complete(
    model: string,
    options: Readonly<ChatOptions>,
    request: ChatRequest,
    token: CancellationToken
  ): Promise<ChatCompletion> {
    token.throwIfCancellationRequested();

    this.requests.push({
      model,
      options,
      messages: [...request.messages],
      toolNames: request.tools.map((tool) => tool.function.name),
    });

    const reply = this.nextReply(request);
    if (reply.error) throw reply.error;

    const toolCalls: ToolCall[] = (reply.toolCalls ?? []).map((tc) => ({
      id: tc.id ?? `call_${this.nextCallId++}`,
      name: tc.name,
      arguments: tc.arguments ?? {},
    }));

    const message: Message = { role: 'assistant', content: reply.content ?? '' };
    if (toolCalls.length > 0) message.toolCalls = toolCalls;
    return { message, finishReason: toolCalls.length > 0 ? 'tool_calls' : 'stop' };
  }

  private nextReply(request: ChatRequest): MockReply {
    const index = this.callIndex++;
    if (typeof this.script === 'function') {
      return this.script(request, index);
    }

    const reply = this.script[index];
    if (!reply) {
      throw new ProviderError(`Mock script exhausted after ${this.script.length} replies`, this.name, 'INVALID_RESPONSE');
    }
    return reply;
  }
}
