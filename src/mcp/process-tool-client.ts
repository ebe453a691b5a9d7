/**
 * Process Tool Client
 *
 * Owns one tool-server subprocess and talks newline-delimited JSON-RPC 2.0
 * with it over stdin/stdout.
 *
 * Lifecycle:
 *   start()  spawn → initialize (id 1) → notifications/initialized → tools/list (id 2)
 *   call()   tools/call (ids 3, 4, ...), one request outstanding at a time
 *   stop()   close stdin → SIGTERM → grace → SIGKILL → grace
 *
 * @example
 * ```typescript
 * const tools = await withToolClient(config, {}, async (client) => {
 *   const result = await client.call('get_me', {});
 *   return renderToolContent(result.content);
 * });
 * ```
 */

import { spawn, type ChildProcessWithoutNullStreams } from 'node:child_process';
import { existsSync } from 'node:fs';
import { createInterface, type Interface } from 'node:readline';
import {
  CancellationError,
  ProcessLifecycleError,
  ProtocolError,
  RequestTimeoutError,
  ToolExecutionError,
} from '../errors/index.js';
import type { ToolServerConfig } from '../config/tool-servers.js';
import type { ToolDefinition } from '../types.js';
import { NONE_TOKEN, type CancellationToken } from '../utilities/cancellation.js';
import { createComponentLogger, type StructuredLogger } from '../utilities/logger.js';
import {
  PROTOCOL_VERSION,
  decodeLine,
  encodeNotification,
  encodeRequest,
  parseToolCallResult,
  parseToolsList,
  responseId,
  type IncomingMessage,
  type ToolCallResult,
} from './jsonrpc.js';

// =============================================================================
// TYPES
// =============================================================================

export interface ProcessToolClientOptions {
  /** Bound on every response wait (default: 30000) */
  requestTimeoutMs?: number;
  /** Wait after SIGTERM, and again after SIGKILL (default: 2000) */
  shutdownGraceMs?: number;
  clientInfo?: { name: string; version: string };
  logger?: StructuredLogger;
}

export type ToolClientEvent =
  | { type: 'server.starting'; server: string; command: string }
  | { type: 'server.ready'; server: string; pid: number | undefined; toolCount: number }
  | { type: 'server.exited'; server: string; code: number | null; signal: string | null }
  | { type: 'tool.call'; server: string; tool: string; requestId: number }
  | { type: 'tool.result'; server: string; tool: string; isError: boolean; durationMs: number };

export type ToolClientEventListener = (event: ToolClientEvent) => void;

interface LineWaiter {
  resolve: (line: string) => void;
  reject: (error: Error) => void;
}

const DEFAULT_CLIENT_INFO = { name: 'toolbridge', version: '0.1.0' };

// =============================================================================
// PROCESS TOOL CLIENT
// =============================================================================

export class ProcessToolClient {
  readonly serverName: string;
  private readonly config: ToolServerConfig;
  private readonly requestTimeoutMs: number;
  private readonly shutdownGraceMs: number;
  private readonly clientInfo: { name: string; version: string };
  private readonly log: StructuredLogger;

  private child: ChildProcessWithoutNullStreams | null = null;
  private readline: Interface | null = null;
  private exitInfo: { code: number | null; signal: string | null } | null = null;
  private exitPromise: Promise<void> = Promise.resolve();
  private streamsClosed = false;
  private lines: string[] = [];
  private waiter: LineWaiter | null = null;
  private nextRequestId = 1;
  private toolList: ToolDefinition[] = [];
  private queue: Promise<unknown> = Promise.resolve();
  private stopping: Promise<void> | null = null;
  private listeners: ToolClientEventListener[] = [];

  constructor(config: ToolServerConfig, options: ProcessToolClientOptions = {}) {
    this.config = config;
    this.serverName = config.name;
    this.requestTimeoutMs = options.requestTimeoutMs ?? config.requestTimeoutMs ?? 30000;
    this.shutdownGraceMs = options.shutdownGraceMs ?? 2000;
    this.clientInfo = options.clientInfo ?? DEFAULT_CLIENT_INFO;
    this.log = (options.logger ?? createComponentLogger('ProcessToolClient')).withContext({ server: config.name });
  }

  /** Tools discovered by the last successful start() */
  get tools(): readonly ToolDefinition[] {
    return this.toolList;
  }

  get pid(): number | undefined {
    return this.child?.pid;
  }

  isAlive(): boolean {
    return this.child !== null && this.exitInfo === null;
  }

  // ===========================================================================
  // LIFECYCLE
  // ===========================================================================

  /**
   * Spawn the server, run the handshake and discover tools.
   * Any failure stops the process before rethrowing.
   */
  async start(token: CancellationToken = NONE_TOKEN): Promise<ToolDefinition[]> {
    if (this.child) {
      throw new ProcessLifecycleError(`Tool server "${this.serverName}" is already running`, this.serverName);
    }
    token.throwIfCancellationRequested();

    const { command } = this.config;
    if (isPathLike(command) && !existsSync(command)) {
      throw ProcessLifecycleError.binaryNotFound(this.serverName, command);
    }

    this.emit({ type: 'server.starting', server: this.serverName, command });
    this.spawnChild();

    try {
      const init = await this.request(
        'initialize',
        { protocolVersion: PROTOCOL_VERSION, capabilities: {}, clientInfo: this.clientInfo },
        token
      );
      if (init.error) {
        throw ProtocolError.handshakeFailed(this.serverName, 'initialize', init.error);
      }

      this.write(encodeNotification('notifications/initialized'));

      const listed = await this.request('tools/list', {}, token);
      if (listed.error) {
        throw ProtocolError.handshakeFailed(this.serverName, 'tools/list', listed.error);
      }
      const tools = parseToolsList(listed.result);
      if (tools instanceof Error) {
        throw new ProtocolError(tools.message, this.serverName, { method: 'tools/list' }, tools);
      }

      this.toolList = tools;
      this.log.info('Tool server ready', { pid: this.pid, tools: tools.length });
      this.emit({ type: 'server.ready', server: this.serverName, pid: this.pid, toolCount: tools.length });
      return tools;
    } catch (err) {
      try {
        await this.stop();
      } catch (stopErr) {
        this.log.error('Failed to stop tool server after start failure', {
          error: stopErr instanceof Error ? stopErr.message : String(stopErr),
        });
      }
      throw err;
    }
  }

  /**
   * Terminate the subprocess. Safe to call more than once.
   */
  stop(): Promise<void> {
    const child = this.child;
    if (!child) return Promise.resolve();
    if (this.stopping) return this.stopping;

    this.stopping = this.terminate(child).finally(() => {
      // a request still waiting here would otherwise sit until its deadline
      const info = this.exitInfo;
      this.failWaiter(ProcessLifecycleError.exited(this.serverName, info?.code ?? null, info?.signal ?? null));
      this.child = null;
      this.readline = null;
      this.stopping = null;
      this.lines = [];
    });
    return this.stopping;
  }

  private async terminate(child: ChildProcessWithoutNullStreams): Promise<void> {
    this.readline?.close();
    child.stdin.end();

    if (this.exitInfo) return;

    child.kill('SIGTERM');
    if (await this.waitForExit(this.shutdownGraceMs)) return;

    this.log.warn('Tool server ignored SIGTERM, sending SIGKILL', { pid: child.pid });
    child.kill('SIGKILL');
    if (await this.waitForExit(this.shutdownGraceMs)) return;

    throw ProcessLifecycleError.killTimeout(this.serverName, child.pid, this.shutdownGraceMs);
  }

  private waitForExit(ms: number): Promise<boolean> {
    return new Promise((resolve) => {
      const timer = setTimeout(() => resolve(false), ms);
      void this.exitPromise.then(() => {
        clearTimeout(timer);
        resolve(true);
      });
    });
  }

  // ===========================================================================
  // TOOL CALLS
  // ===========================================================================

  /**
   * Invoke a discovered tool. Tool-level failures (`isError`) are returned;
   * JSON-RPC `error` responses throw ToolExecutionError.
   */
  call(
    name: string,
    args: Record<string, unknown> = {},
    token: CancellationToken = NONE_TOKEN
  ): Promise<ToolCallResult> {
    if (!this.child) {
      return Promise.reject(ProcessLifecycleError.notStarted(this.serverName));
    }
    if (!this.toolList.some((tool) => tool.name === name)) {
      return Promise.reject(
        ToolExecutionError.unknownTool(name, this.toolList.map((tool) => tool.name))
      );
    }
    return this.enqueue(() => this.executeCall(name, args, token));
  }

  private async executeCall(
    name: string,
    args: Record<string, unknown>,
    token: CancellationToken
  ): Promise<ToolCallResult> {
    if (!this.isAlive()) {
      throw this.exitInfo
        ? ProcessLifecycleError.exited(this.serverName, this.exitInfo.code, this.exitInfo.signal)
        : ProcessLifecycleError.notStarted(this.serverName);
    }

    const startedAt = Date.now();
    this.emit({ type: 'tool.call', server: this.serverName, tool: name, requestId: this.nextRequestId });

    const response = await this.request('tools/call', { name, arguments: args }, token);
    if (response.error) {
      this.emit({ type: 'tool.result', server: this.serverName, tool: name, isError: true, durationMs: Date.now() - startedAt });
      throw ToolExecutionError.fromRpcError(name, response.error);
    }

    const result = parseToolCallResult(response.result);
    if (result instanceof Error) {
      throw new ProtocolError(result.message, this.serverName, { method: 'tools/call', tool: name }, result);
    }

    this.emit({ type: 'tool.result', server: this.serverName, tool: name, isError: result.isError, durationMs: Date.now() - startedAt });
    return result;
  }

  /**
   * Run tasks one after another.
   */
  private enqueue<T>(task: () => Promise<T>): Promise<T> {
    const run = this.queue.then(task, task);
    // failures reach the caller through `run`; the chain only orders work
    this.queue = run.catch(() => undefined);
    return run;
  }

  // ===========================================================================
  // EVENTS
  // ===========================================================================

  on(listener: ToolClientEventListener): () => void {
    this.listeners.push(listener);
    return () => {
      const idx = this.listeners.indexOf(listener);
      if (idx >= 0) this.listeners.splice(idx, 1);
    };
  }

  private emit(event: ToolClientEvent): void {
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (err) {
        this.log.warn('Tool client listener failed', { event: event.type, error: String(err) });
      }
    }
  }

  // ===========================================================================
  // TRANSPORT
  // ===========================================================================

  private spawnChild(): void {
    this.exitInfo = null;
    this.streamsClosed = false;
    this.lines = [];
    this.waiter = null;
    this.nextRequestId = 1;
    this.toolList = [];

    const child = spawn(this.config.command, this.config.args, {
      cwd: this.config.cwd,
      env: { ...process.env, ...this.config.env },
    });
    this.child = child;

    let markExited: () => void = () => undefined;
    this.exitPromise = new Promise<void>((resolve) => {
      markExited = resolve;
    });

    this.readline = createInterface({ input: child.stdout, crlfDelay: Infinity });
    this.readline.on('line', (line) => this.handleLine(line));

    child.stderr.on('data', (data: Buffer) => {
      this.log.debug('Tool server stderr', { output: data.toString().trimEnd() });
    });

    child.stdin.on('error', (err) => {
      this.log.debug('Tool server stdin error', { error: err.message });
    });

    child.on('error', (err) => {
      if (this.child !== child) return;
      this.log.error('Tool server process error', { error: err.message });
      const failure = new ProcessLifecycleError(
        `Tool server "${this.serverName}" process error: ${err.message}`,
        this.serverName,
        { command: this.config.command },
        err
      );
      if (child.pid === undefined) {
        // spawn itself failed; no exit event follows
        this.exitInfo = { code: null, signal: null };
        markExited();
      }
      this.failWaiter(failure);
    });

    child.on('exit', (code, signal) => {
      if (this.child === child) this.exitInfo = { code, signal };
      this.log.debug('Tool server exited', { code, signal });
      this.emit({ type: 'server.exited', server: this.serverName, code, signal });
      markExited();
    });

    // handlers of a replaced child (after stop and restart) leave state alone
    child.on('close', (code, signal) => {
      if (this.child !== child) return;
      this.streamsClosed = true;
      this.failWaiter(ProcessLifecycleError.exited(this.serverName, code, signal));
    });
  }

  private handleLine(line: string): void {
    if (line.trim() === '') return;
    const waiter = this.waiter;
    if (waiter) {
      waiter.resolve(line);
    } else {
      this.lines.push(line);
    }
  }

  private failWaiter(error: Error): void {
    this.waiter?.reject(error);
  }

  private write(payload: string): void {
    const child = this.child;
    if (!child || !child.stdin.writable) {
      throw ProcessLifecycleError.notStarted(this.serverName);
    }
    child.stdin.write(payload);
  }

  /**
   * Send one request and wait for its response. Lower ids (late replies to
   * abandoned requests) are dropped, notifications are skipped, and a
   * higher id is a protocol violation.
   */
  private async request(
    method: string,
    params: Record<string, unknown>,
    token: CancellationToken
  ): Promise<IncomingMessage> {
    token.throwIfCancellationRequested();

    const id = this.nextRequestId++;
    this.write(encodeRequest(id, method, params));
    this.log.trace('Sent request', { id, method });

    const deadline = Date.now() + this.requestTimeoutMs;

    for (;;) {
      const line = await this.nextLine(method, deadline, token);
      const decoded = decodeLine(line);
      if (decoded.type === 'invalid') {
        throw ProtocolError.malformedLine(this.serverName, line, decoded.error);
      }

      const message = decoded.message;
      const receivedId = responseId(message);

      if (receivedId === undefined) {
        if (message.error && message.id === null) {
          throw ProtocolError.handshakeFailed(this.serverName, method, message.error);
        }
        this.log.debug('Skipping server notification', { method: message.method });
        continue;
      }

      if (receivedId < id) {
        this.log.warn('Discarding stale response', { id: receivedId, expected: id });
        continue;
      }

      if (receivedId > id) {
        throw new ProtocolError(
          `Unexpected response id ${receivedId} (expected ${id})`,
          this.serverName,
          { method, expected: id, received: receivedId }
        );
      }

      return message;
    }
  }

  private nextLine(method: string, deadline: number, token: CancellationToken): Promise<string> {
    const queued = this.lines.shift();
    if (queued !== undefined) return Promise.resolve(queued);

    if (this.streamsClosed || (this.exitInfo !== null && this.child?.pid === undefined)) {
      const info = this.exitInfo;
      return Promise.reject(ProcessLifecycleError.exited(this.serverName, info?.code ?? null, info?.signal ?? null));
    }
    if (token.isCancellationRequested) {
      return Promise.reject(new CancellationError(token.cancellationReason));
    }

    return new Promise<string>((resolve, reject) => {
      const timer = setTimeout(() => {
        cleanup();
        reject(new RequestTimeoutError(this.serverName, method, this.requestTimeoutMs));
      }, Math.max(0, deadline - Date.now()));

      const registration = token.register((reason) => {
        cleanup();
        reject(new CancellationError(reason));
      });

      const cleanup = (): void => {
        clearTimeout(timer);
        registration.dispose();
        this.waiter = null;
      };

      this.waiter = {
        resolve: (line) => {
          cleanup();
          resolve(line);
        },
        reject: (error) => {
          cleanup();
          reject(error);
        },
      };
    });
  }
}

// =============================================================================
// HELPERS
// =============================================================================

/**
 * Commands given as paths are checked before spawning; bare names are
 * resolved by the OS through PATH.
 */
function isPathLike(command: string): boolean {
  return command.startsWith('/') || command.includes('/') || command.includes('\\');
}

/**
 * Start a client, run `fn`, and stop the client on every exit path.
 */
export async function withToolClient<T>(
  config: ToolServerConfig,
  options: ProcessToolClientOptions & { token?: CancellationToken },
  fn: (client: ProcessToolClient) => Promise<T>
): Promise<T> {
  const client = new ProcessToolClient(config, options);
  await client.start(options.token);
  try {
    return await fn(client);
  } finally {
    await client.stop();
  }
}
