/**
 * Conversation Engine
 *
 * The AGENT/TOOLS state machine for one user turn:
 *
 *   AGENT  invoke the bound model with the full log, append its reply
 *          → TOOLS if the reply has tool calls, else → END
 *   TOOLS  run each call in emission order, append one tool message per call
 *          → AGENT
 *   END    the last assistant content is the answer
 *
 * Any error ends the turn. The engine returns a formatted error answer,
 * drops the partial log and reports the error kind to the model's trace
 * handler; it never throws.
 */

import {
  AgentError,
  ErrorCategory,
  LoopLimitExceededError,
  ProviderError,
  formatError,
  formatErrorForLog,
  wrapError,
} from '../errors/index.js';
import type { ToolInvocationOutput } from '../mcp/tool-catalog.js';
import type { BoundModel } from '../providers/types.js';
import type { Message, ToolCall } from '../types.js';
import {
  NONE_TOKEN,
  createLinkedToken,
  createTimeoutToken,
  type CancellationToken,
  type CancellationTokenSource,
} from '../utilities/cancellation.js';
import { createComponentLogger, type StructuredLogger } from '../utilities/logger.js';
import { ConversationLog } from './conversation-log.js';

export const DEFAULT_MAX_ITERATIONS = 25;

// =============================================================================
// TYPES
// =============================================================================

export type EngineState = 'AGENT' | 'TOOLS' | 'END';

/**
 * Source of the system message placed at the head of a new conversation.
 */
export interface SystemPromptSource {
  getSystemMessage(): string;
}

/**
 * Resolves and runs tool calls; ToolCatalog implements it.
 */
export interface ToolInvoker {
  invoke(name: string, args: Record<string, unknown>, token?: CancellationToken): Promise<ToolInvocationOutput>;
}

export interface ConversationEngineConfig {
  model: BoundModel;
  tools: ToolInvoker;
  prompts: SystemPromptSource;
  /** AGENT steps allowed per turn (default: 25) */
  maxIterations?: number;
  /** Whole-turn bound, linked with the caller's token */
  turnTimeoutMs?: number;
  logger?: StructuredLogger;
}

export interface TurnOptions {
  /** Earlier messages of the conversation, oldest first */
  history?: readonly Message[];
  token?: CancellationToken;
}

export type TurnResult =
  | { ok: true; answer: string; messages: Message[]; iterations: number }
  | { ok: false; answer: string; error: AgentError; iterations: number };

export type EngineEvent =
  | { type: 'state.changed'; from: EngineState; to: EngineState; iteration: number }
  | { type: 'model.reply'; iteration: number; content: string; toolCalls: number }
  | { type: 'tool.start'; call: ToolCall }
  | { type: 'tool.result'; call: ToolCall; isError: boolean; content: string }
  | { type: 'turn.error'; error: AgentError };

export type EngineEventListener = (event: EngineEvent) => void;

// =============================================================================
// ENGINE
// =============================================================================

export class ConversationEngine {
  private readonly model: BoundModel;
  private readonly tools: ToolInvoker;
  private readonly prompts: SystemPromptSource;
  private readonly maxIterations: number;
  private readonly turnTimeoutMs?: number;
  private readonly log: StructuredLogger;
  private listeners: EngineEventListener[] = [];
  private running = false;

  constructor(config: ConversationEngineConfig) {
    this.model = config.model;
    this.tools = config.tools;
    this.prompts = config.prompts;
    this.maxIterations = config.maxIterations ?? DEFAULT_MAX_ITERATIONS;
    this.turnTimeoutMs = config.turnTimeoutMs;
    this.log = (config.logger ?? createComponentLogger('ConversationEngine')).withTrace(
      config.model.observer.bindings.traceId
    );
  }

  get isRunning(): boolean {
    return this.running;
  }

  /**
   * Run one turn and return only the answer text.
   */
  async respond(userMessage: string, options: TurnOptions = {}): Promise<string> {
    const result = await this.run(userMessage, options);
    return result.answer;
  }

  /**
   * Run one turn to completion.
   */
  async run(userMessage: string, options: TurnOptions = {}): Promise<TurnResult> {
    if (this.running) {
      const error = new AgentError(
        'A turn is already in progress on this engine',
        'Internal',
        ErrorCategory.INTERNAL,
        false
      );
      this.emit({ type: 'turn.error', error });
      return { ok: false, answer: formatError(error), error, iterations: 0 };
    }

    this.running = true;
    const sources: CancellationTokenSource[] = [];
    let token = options.token ?? NONE_TOKEN;
    if (this.turnTimeoutMs !== undefined) {
      const timeout = createTimeoutToken(this.turnTimeoutMs, `Turn timed out after ${this.turnTimeoutMs}ms`);
      const linked = createLinkedToken(token, timeout.token);
      sources.push(timeout, linked);
      token = linked.token;
    }

    const progress = { iterations: 0 };
    try {
      return await this.drive(userMessage, options.history ?? [], token, progress);
    } catch (err) {
      const error = wrapError(err, { messageId: this.model.observer.bindings.messageId });
      this.log.warn('Turn failed', { kind: error.kind, error: formatErrorForLog(error), iterations: progress.iterations });
      this.model.observer.recordError(error.kind, error.message);
      this.emit({ type: 'turn.error', error });
      return { ok: false, answer: formatError(error), error, iterations: progress.iterations };
    } finally {
      for (const source of sources) source.dispose();
      this.running = false;
    }
  }

  on(listener: EngineEventListener): () => void {
    this.listeners.push(listener);
    return () => {
      const idx = this.listeners.indexOf(listener);
      if (idx >= 0) this.listeners.splice(idx, 1);
    };
  }

  // ===========================================================================
  // STATE MACHINE
  // ===========================================================================

  private async drive(
    userMessage: string,
    history: readonly Message[],
    token: CancellationToken,
    progress: { iterations: number }
  ): Promise<TurnResult> {
    const conversation = this.openLog(history, userMessage);
    let state: EngineState = 'AGENT';
    let pending: readonly ToolCall[] = [];

    for (;;) {
      switch (state) {
        case 'AGENT': {
          token.throwIfCancellationRequested();
          if (progress.iterations >= this.maxIterations) {
            throw new LoopLimitExceededError(this.maxIterations);
          }
          progress.iterations++;

          const reply = await this.model.invoke(conversation.messages, token);
          pending = reply.toolCalls ?? [];
          const duplicate = findDuplicateCallId(pending);
          if (duplicate !== undefined) {
            throw new ProviderError(
              `Model returned duplicate tool call id '${duplicate}'`,
              this.model.provider,
              'INVALID_RESPONSE'
            );
          }
          conversation.append({ ...reply, role: 'assistant' });

          this.emit({
            type: 'model.reply',
            iteration: progress.iterations,
            content: reply.content,
            toolCalls: pending.length,
          });
          state = this.transition(state, pending.length > 0 ? 'TOOLS' : 'END', progress.iterations);
          break;
        }

        case 'TOOLS': {
          for (const call of pending) {
            token.throwIfCancellationRequested();
            this.emit({ type: 'tool.start', call });
            this.log.debug('Invoking tool', { tool: call.name, callId: call.id });

            const output = await this.invokeTool(call, token);
            conversation.append({ role: 'tool', content: output.content, toolCallId: call.id, name: call.name });
            this.emit({ type: 'tool.result', call, isError: output.isError, content: output.content });
          }
          pending = [];
          state = this.transition(state, 'AGENT', progress.iterations);
          break;
        }

        case 'END': {
          const last = conversation.last();
          return {
            ok: true,
            answer: last?.content ?? '',
            messages: conversation.toArray(),
            iterations: progress.iterations,
          };
        }
      }
    }
  }

  /**
   * Run one tool call inside a `tool.invoke` span on the turn's trace handler.
   */
  private async invokeTool(call: ToolCall, token: CancellationToken): Promise<ToolInvocationOutput> {
    const { observer } = this.model;
    const span = observer.startSpan('tool.invoke', { 'tool.name': call.name, 'tool.call_id': call.id });
    try {
      const output = await this.tools.invoke(call.name, call.arguments, token);
      span.attributes['tool.is_error'] = output.isError;
      observer.endSpan(span);
      return output;
    } catch (err) {
      observer.endSpan(span, err instanceof Error ? err : new Error(String(err)));
      throw err;
    }
  }

  /**
   * Prior history plus the user message, with a system message at the
   * head unless the history already starts with one.
   */
  private openLog(history: readonly Message[], userMessage: string): ConversationLog {
    let conversation = new ConversationLog(history);
    if (!conversation.hasLeadingSystemMessage()) {
      conversation = new ConversationLog([{ role: 'system', content: this.prompts.getSystemMessage() }, ...history]);
    }
    conversation.append({ role: 'user', content: userMessage });
    return conversation;
  }

  private transition(from: EngineState, to: EngineState, iteration: number): EngineState {
    this.log.trace('State changed', { from, to, iteration });
    this.emit({ type: 'state.changed', from, to, iteration });
    return to;
  }

  private emit(event: EngineEvent): void {
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (err) {
        this.log.warn('Engine listener failed', { event: event.type, error: String(err) });
      }
    }
  }
}

function findDuplicateCallId(calls: readonly ToolCall[]): string | undefined {
  const seen = new Set<string>();
  for (const call of calls) {
    if (seen.has(call.id)) return call.id;
    seen.add(call.id);
  }
  return undefined;
}
