/**
 * Agent Session
 *
 * Per-user glue between the application context, the tool servers and the
 * conversation engine. A session:
 * - checks the model identifier and provider settings before spawning anything
 * - starts every configured tool server and stops them all on close()
 * - builds a fresh bound model for each message (new message id)
 * - keeps the conversation in memory between turns
 *
 * @example
 * ```typescript
 * const answer = await withAgentSession({ context, servers }, async (session) => {
 *   const result = await session.ask('Who am I?');
 *   return result.answer;
 * });
 * ```
 */

import { randomUUID } from 'node:crypto';
import type { AppContext } from '../context.js';
import type { ToolServerConfig } from '../config/tool-servers.js';
import { ConversationEngine, type EngineEventListener, type TurnResult } from '../engine/conversation-engine.js';
import { formatError, formatErrorForLog, wrapError } from '../errors/index.js';
import { ProcessToolClient, type ToolClientEventListener } from '../mcp/process-tool-client.js';
import { ToolCatalog } from '../mcp/tool-catalog.js';
import type { Message, TracingIds } from '../types.js';
import { NONE_TOKEN, type CancellationToken } from '../utilities/cancellation.js';
import type { StructuredLogger } from '../utilities/logger.js';

export interface AgentSessionOptions {
  context: AppContext;
  servers: readonly ToolServerConfig[];
  /** "provider:model"; defaults to MODEL_NAME */
  modelName?: string;
  userId?: string;
  sessionId?: string;
  /** Trace id shared by every turn of the session */
  traceId?: string;
  /** Keep messages between turns (default: true) */
  retainHistory?: boolean;
  maxIterations?: number;
  turnTimeoutMs?: number;
  /** Receives engine events of every turn */
  onEngineEvent?: EngineEventListener;
  /** Receives events of every tool server */
  onToolEvent?: ToolClientEventListener;
}

export interface AskOptions {
  token?: CancellationToken;
  /** Use another "provider:model" for this turn only */
  modelName?: string;
}

export class AgentSession {
  readonly userId: string;
  readonly sessionId: string;
  readonly traceId: string;
  readonly catalog: ToolCatalog;

  private readonly context: AppContext;
  private readonly clients: ProcessToolClient[];
  private readonly options: AgentSessionOptions;
  private readonly log: StructuredLogger;
  private modelName: string;
  private lastMessage: string | undefined;
  private conversation: Message[] = [];
  private busy = false;
  private closed = false;

  private constructor(options: AgentSessionOptions, clients: ProcessToolClient[], modelName: string, ids: Omit<TracingIds, 'messageId'>) {
    this.options = options;
    this.context = options.context;
    this.clients = clients;
    this.catalog = new ToolCatalog(clients);
    this.modelName = modelName;
    this.userId = ids.userId;
    this.sessionId = ids.sessionId;
    this.traceId = ids.traceId;
    this.log = options.context.logger.withContext({ sessionId: ids.sessionId });
  }

  /**
   * Validate the model, then start every tool server. If any server fails
   * to start, the ones already running are stopped before the error is
   * rethrown.
   */
  static async open(options: AgentSessionOptions, token: CancellationToken = NONE_TOKEN): Promise<AgentSession> {
    const { context } = options;
    const modelName = options.modelName ?? context.runtime.MODEL_NAME;
    context.registry.assertUsable(modelName);

    const started: ProcessToolClient[] = [];
    try {
      for (const server of options.servers) {
        const client = new ProcessToolClient(server, {
          requestTimeoutMs: server.requestTimeoutMs ?? context.runtime.TOOL_REQUEST_TIMEOUT_MS,
          shutdownGraceMs: context.runtime.TOOL_SHUTDOWN_GRACE_MS,
          logger: context.logger,
        });
        if (options.onToolEvent) client.on(options.onToolEvent);
        started.push(client);
        await client.start(token);
      }
    } catch (err) {
      await stopAll(started, context.logger).catch((stopErr: unknown) => {
        context.logger.debug('Cleanup after failed open also failed', { error: formatErrorForLog(stopErr) });
      });
      throw err;
    }

    return new AgentSession(options, started, modelName, {
      userId: options.userId ?? 'local-user',
      sessionId: options.sessionId ?? randomUUID(),
      traceId: options.traceId ?? randomUUID(),
    });
  }

  get model(): string {
    return this.modelName;
  }

  /** Message id of the most recent turn */
  get lastMessageId(): string | undefined {
    return this.lastMessage;
  }

  /** Conversation retained so far, oldest first */
  get history(): readonly Message[] {
    return this.conversation;
  }

  clearHistory(): void {
    this.conversation = [];
  }

  /**
   * Switch the model for later turns. Checked before it is stored.
   */
  setModel(modelName: string): void {
    this.context.registry.assertUsable(modelName);
    this.modelName = modelName;
  }

  /**
   * Run one turn. Never throws; failures come back as `ok: false`.
   */
  async ask(question: string, options: AskOptions = {}): Promise<TurnResult> {
    if (this.closed || this.busy) {
      const error = wrapError(
        new Error(this.closed ? 'Session is closed' : 'A turn is already in progress in this session')
      );
      return { ok: false, answer: formatError(error), error, iterations: 0 };
    }

    this.busy = true;
    try {
      const ids: TracingIds = {
        userId: this.userId,
        sessionId: this.sessionId,
        traceId: this.traceId,
        messageId: randomUUID(),
      };
      this.lastMessage = ids.messageId;

      let engine: ConversationEngine;
      try {
        const model = this.context.registry.create(options.modelName ?? this.modelName, this.catalog, ids);
        engine = new ConversationEngine({
          model,
          tools: this.catalog,
          prompts: this.context.prompts,
          maxIterations: this.options.maxIterations ?? this.context.runtime.AGENT_MAX_ITERATIONS,
          turnTimeoutMs: this.options.turnTimeoutMs ?? this.context.runtime.TURN_TIMEOUT_MS,
          logger: this.log,
        });
      } catch (err) {
        const error = wrapError(err);
        this.log.warn('Could not build model for turn', { error: formatErrorForLog(error) });
        return { ok: false, answer: formatError(error), error, iterations: 0 };
      }

      if (this.options.onEngineEvent) engine.on(this.options.onEngineEvent);

      const retain = this.options.retainHistory ?? true;
      const result = await engine.run(question, {
        history: retain ? this.conversation : [],
        token: options.token,
      });

      if (result.ok && retain) {
        this.conversation = result.messages;
      }
      return result;
    } finally {
      this.busy = false;
    }
  }

  /**
   * Stop every tool server. Safe to call more than once.
   */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await stopAll(this.clients, this.log);
  }
}

async function stopAll(clients: readonly ProcessToolClient[], log: StructuredLogger): Promise<void> {
  const results = await Promise.allSettled(clients.map((client) => client.stop()));
  const failures: unknown[] = [];
  results.forEach((result, i) => {
    if (result.status === 'rejected') {
      failures.push(result.reason);
      log.error('Failed to stop tool server', {
        server: clients[i]?.serverName,
        error: formatErrorForLog(result.reason),
      });
    }
  });
  if (failures.length > 0) {
    throw failures[0];
  }
}

/**
 * Open a session, run `fn`, and close the session on every exit path.
 */
export async function withAgentSession<T>(
  options: AgentSessionOptions,
  fn: (session: AgentSession) => Promise<T>,
  token: CancellationToken = NONE_TOKEN
): Promise<T> {
  const session = await AgentSession.open(options, token);
  try {
    return await fn(session);
  } finally {
    await session.close();
  }
}
