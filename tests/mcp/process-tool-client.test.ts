/**
 * ProcessToolClient Tests
 *
 * Runs the client against tests/fixtures/fake-tool-server.mjs, a real
 * subprocess speaking line-delimited JSON-RPC.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { ToolServerConfig } from '../../src/config/tool-servers.js';
import {
  CancellationError,
  ProcessLifecycleError,
  ProtocolError,
  RequestTimeoutError,
  ToolExecutionError,
} from '../../src/errors/index.js';
import { renderToolContent } from '../../src/mcp/jsonrpc.js';
import {
  ProcessToolClient,
  withToolClient,
  type ProcessToolClientOptions,
  type ToolClientEvent,
} from '../../src/mcp/process-tool-client.js';
import { createCancellationTokenSource } from '../../src/utilities/cancellation.js';
import { MemorySink, StructuredLogger } from '../../src/utilities/logger.js';
import { fakeServer, isProcessRunning } from '../helpers/fake-tool-server.js';

// =============================================================================
// TEST SETUP
// =============================================================================

describe('ProcessToolClient', () => {
  let sink: MemorySink;
  let clients: ProcessToolClient[];

  const createClient = (config: ToolServerConfig, options: ProcessToolClientOptions = {}): ProcessToolClient => {
    const client = new ProcessToolClient(config, {
      logger: new StructuredLogger({ level: 'debug', sinks: [sink] }),
      shutdownGraceMs: 500,
      ...options,
    });
    clients.push(client);
    return client;
  };

  beforeEach(() => {
    sink = new MemorySink();
    clients = [];
  });

  afterEach(async () => {
    await Promise.all(clients.map((client) => client.stop()));
  });

  // ===========================================================================
  // START
  // ===========================================================================

  describe('start', () => {
    it('should complete the handshake and discover tools', async () => {
      const client = createClient(fakeServer());

      const tools = await client.start();

      expect(tools).toHaveLength(12);
      expect(tools[0]).toEqual({
        name: 'get_me',
        description: 'Get the authenticated user',
        inputSchema: { type: 'object', properties: {} },
      });
      expect(client.tools.map((t) => t.name)).toContain('echo');
      expect(client.isAlive()).toBe(true);
      expect(typeof client.pid).toBe('number');
    });

    it('should send initialize, initialized and tools/list in order', async () => {
      const client = createClient(fakeServer());
      await client.start();

      const result = await client.call('history');

      expect(JSON.parse(renderToolContent(result.content))).toEqual([
        { id: 1, method: 'initialize' },
        { id: null, method: 'notifications/initialized' },
        { id: 2, method: 'tools/list' },
        { id: 3, method: 'tools/call' },
      ]);
    });

    it('should emit starting and ready events', async () => {
      const client = createClient(fakeServer());
      const events: ToolClientEvent[] = [];
      client.on((event) => events.push(event));

      await client.start();

      expect(events.map((e) => e.type)).toEqual(['server.starting', 'server.ready']);
      expect(events[1]).toMatchObject({ type: 'server.ready', server: 'fake', toolCount: 12 });
    });

    it('should fail with ProcessLifecycleError when the binary does not exist', async () => {
      const client = createClient({ name: 'fake', command: '/nonexistent/tool-server', args: [], env: {} });

      await expect(client.start()).rejects.toThrow(ProcessLifecycleError);
      await expect(client.start()).rejects.toThrow('Tool server binary not found at /nonexistent/tool-server');
      expect(client.pid).toBeUndefined();
    });

    it('should fail with ProtocolError when initialize returns an error', async () => {
      const client = createClient(fakeServer('init-error'));
      const events: ToolClientEvent[] = [];
      client.on((event) => events.push(event));

      const error = await client.start().catch((err: unknown) => err);

      expect(error).toBeInstanceOf(ProtocolError);
      expect(error).toHaveProperty('message', 'initialize failed: Unsupported protocol (code -32600)');
      expect(client.pid).toBeUndefined();
      expect(events.some((e) => e.type === 'server.exited')).toBe(true);
    });

    it('should time out when the server never answers the handshake', async () => {
      const client = createClient(fakeServer('silent'), { requestTimeoutMs: 200 });

      const error = await client.start().catch((err: unknown) => err);

      expect(error).toBeInstanceOf(RequestTimeoutError);
      expect(error).toHaveProperty('message', 'Request timeout: initialize got no response within 200ms');
      expect(client.isAlive()).toBe(false);
    });

    it('should refuse to start twice', async () => {
      const client = createClient(fakeServer());
      await client.start();

      await expect(client.start()).rejects.toThrow('Tool server "fake" is already running');
    });

    it('should pass configured environment to the server', async () => {
      const client = createClient(fakeServer('normal', { GITHUB_PERSONAL_ACCESS_TOKEN: 'test-secret' }));
      await client.start();

      const result = await client.call('env', { name: 'GITHUB_PERSONAL_ACCESS_TOKEN' });

      expect(renderToolContent(result.content)).toBe('test-secret');
    });
  });

  // ===========================================================================
  // CALL
  // ===========================================================================

  describe('call', () => {
    it('should reject before start', async () => {
      const client = createClient(fakeServer());

      await expect(client.call('get_me')).rejects.toThrow(
        'Tool server "fake" is not running. Call start() first.'
      );
    });

    it('should return tool content', async () => {
      const client = createClient(fakeServer());
      await client.start();

      const result = await client.call('get_me', {});

      expect(result).toEqual({ content: [{ type: 'text', text: '{"login":"octocat"}' }], isError: false });
    });

    it('should forward arguments', async () => {
      const client = createClient(fakeServer());
      await client.start();

      const result = await client.call('echo', { text: 'hi' });

      expect(renderToolContent(result.content)).toBe('{"text":"hi"}');
    });

    it('should return isError results instead of throwing', async () => {
      const client = createClient(fakeServer());
      await client.start();

      const result = await client.call('fail_tool');

      expect(result).toEqual({ content: [{ type: 'text', text: 'boom' }], isError: true });
    });

    it('should throw ToolExecutionError for an RPC error response', async () => {
      const client = createClient(fakeServer());
      await client.start();

      const error = await client.call('explode').catch((err: unknown) => err);

      expect(error).toBeInstanceOf(ToolExecutionError);
      expect(error).toHaveProperty('message', 'Tool call failed: Internal failure (code -32603)');
      expect(error).toHaveProperty('toolName', 'explode');
    });

    it('should throw ToolExecutionError for an RPC error without a message', async () => {
      const client = createClient(fakeServer());
      await client.start();

      const error = await client.call('explode', { bare: true }).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(ToolExecutionError);
      expect(error).toHaveProperty('message', 'Tool call failed: no message (code -32000)');
    });

    it('should reject unknown tools without contacting the server', async () => {
      const client = createClient(fakeServer());
      await client.start();

      const error = await client.call('nope').catch((err: unknown) => err);

      expect(error).toBeInstanceOf(ToolExecutionError);
      expect(error).toHaveProperty('message', expect.stringMatching(/^Tool 'nope' not found\. Available tools: get_me, echo/));

      // The next request still gets id 3
      const history = await client.call('history');
      const received: Array<{ id: number | null }> = JSON.parse(renderToolContent(history.content));
      expect(received.map((m) => m.id)).toEqual([1, null, 2, 3]);
    });

    it('should skip server notifications', async () => {
      const client = createClient(fakeServer());
      await client.start();

      const result = await client.call('noisy');

      expect(renderToolContent(result.content)).toBe('quiet now');
      expect(sink.getEntries().some((e) => e.message === 'Skipping server notification')).toBe(true);
    });

    it('should time out and stay usable', async () => {
      const client = createClient(fakeServer(), { requestTimeoutMs: 300 });
      await client.start();

      await expect(client.call('hang')).rejects.toThrow(RequestTimeoutError);

      const result = await client.call('get_me');
      expect(renderToolContent(result.content)).toBe('{"login":"octocat"}');
    });

    it('should discard a late response to an abandoned request', async () => {
      const client = createClient(fakeServer(), { requestTimeoutMs: 300 });
      await client.start();

      await expect(client.call('late')).rejects.toThrow(RequestTimeoutError);
      const result = await client.call('get_me');

      expect(renderToolContent(result.content)).toBe('{"login":"octocat"}');
      const stale = sink.getEntries().find((e) => e.message === 'Discarding stale response');
      expect(stale?.level).toBe('warn');
      expect(stale?.data).toMatchObject({ server: 'fake', id: 3, expected: 4 });
    });

    it('should raise ProtocolError for a response with a higher id', async () => {
      const client = createClient(fakeServer());
      await client.start();

      const error = await client.call('wrong_id').catch((err: unknown) => err);

      expect(error).toBeInstanceOf(ProtocolError);
      expect(error).toHaveProperty('message', 'Unexpected response id 8 (expected 3)');
    });

    it('should raise ProtocolError for a line that is not JSON', async () => {
      const client = createClient(fakeServer());
      await client.start();

      const error = await client.call('bad_json').catch((err: unknown) => err);

      expect(error).toBeInstanceOf(ProtocolError);
      expect(error).toHaveProperty('message', 'Invalid JSON response: this is not json');
    });

    it('should raise ProcessLifecycleError when the server exits mid-call', async () => {
      const client = createClient(fakeServer());
      await client.start();

      const error = await client.call('crash').catch((err: unknown) => err);

      expect(error).toBeInstanceOf(ProcessLifecycleError);
      expect(error).toHaveProperty('message', 'Tool server "fake" exited unexpectedly (code: 3, signal: null)');
      expect(client.isAlive()).toBe(false);
      await expect(client.call('get_me')).rejects.toThrow(ProcessLifecycleError);
    });

    it('should stop waiting when the token is cancelled', async () => {
      const client = createClient(fakeServer());
      await client.start();
      const cts = createCancellationTokenSource();

      const pending = client.call('hang', {}, cts.token);
      setTimeout(() => cts.cancel('User pressed Ctrl+C'), 50);

      const error = await pending.catch((err: unknown) => err);
      expect(error).toBeInstanceOf(CancellationError);
      expect(error).toHaveProperty('message', 'User pressed Ctrl+C');
      cts.dispose();
    });

    it('should serialize concurrent calls', async () => {
      const client = createClient(fakeServer());
      await client.start();

      const [a, b] = await Promise.all([
        client.call('echo', { text: 'first' }),
        client.call('echo', { text: 'second' }),
      ]);

      expect(renderToolContent(a.content)).toBe('{"text":"first"}');
      expect(renderToolContent(b.content)).toBe('{"text":"second"}');
    });

    it('should emit call and result events', async () => {
      const client = createClient(fakeServer());
      await client.start();
      const events: ToolClientEvent[] = [];
      client.on((event) => events.push(event));

      await client.call('fail_tool');

      expect(events[0]).toEqual({ type: 'tool.call', server: 'fake', tool: 'fail_tool', requestId: 3 });
      expect(events[1]).toMatchObject({ type: 'tool.result', server: 'fake', tool: 'fail_tool', isError: true });
    });
  });

  // ===========================================================================
  // STOP
  // ===========================================================================

  describe('stop', () => {
    it('should leave no process behind', async () => {
      const client = createClient(fakeServer());
      await client.start();
      const pid = client.pid;
      expect(pid).toBeDefined();

      await client.stop();

      expect(client.pid).toBeUndefined();
      expect(client.isAlive()).toBe(false);
      if (pid !== undefined) expect(isProcessRunning(pid)).toBe(false);
    });

    it('should be safe to call more than once', async () => {
      const client = createClient(fakeServer());
      await client.start();

      await Promise.all([client.stop(), client.stop()]);
      await expect(client.stop()).resolves.toBeUndefined();
    });

    it('should be a no-op before start', async () => {
      const client = createClient(fakeServer());

      await expect(client.stop()).resolves.toBeUndefined();
    });

    it('should escalate to SIGKILL when SIGTERM is ignored', async () => {
      const client = createClient(fakeServer('ignore-sigterm'), { shutdownGraceMs: 300 });
      await client.start();
      const pid = client.pid;
      const events: ToolClientEvent[] = [];
      client.on((event) => events.push(event));

      await client.stop();

      expect(events).toContainEqual({ type: 'server.exited', server: 'fake', code: null, signal: 'SIGKILL' });
      expect(sink.getEntries().some((e) => e.message === 'Tool server ignored SIGTERM, sending SIGKILL')).toBe(true);
      if (pid !== undefined) expect(isProcessRunning(pid)).toBe(false);
    });

    it('should fail a waiting call with ProcessLifecycleError', async () => {
      const client = createClient(fakeServer(), { requestTimeoutMs: 8000 });
      await client.start();
      const startedAt = Date.now();

      const pending = client.call('hang').catch((err: unknown) => err);
      await new Promise((resolve) => setTimeout(resolve, 100));
      await client.stop();
      const error = await pending;

      expect(error).toBeInstanceOf(ProcessLifecycleError);
      expect(Date.now() - startedAt).toBeLessThan(4000);
    });

    it('should allow a restart after stop', async () => {
      const client = createClient(fakeServer());
      await client.start();
      await client.stop();

      const tools = await client.start();

      expect(tools).toHaveLength(12);
      const history = await client.call('history');
      const received: Array<{ id: number | null }> = JSON.parse(renderToolContent(history.content));
      expect(received.map((m) => m.id)).toEqual([1, null, 2, 3]);
    });
  });

  // ===========================================================================
  // withToolClient
  // ===========================================================================

  describe('withToolClient', () => {
    it('should stop the client after the callback', async () => {
      let captured: ProcessToolClient | undefined;

      const answer = await withToolClient(fakeServer(), { logger: new StructuredLogger({ sinks: [sink] }) }, async (client) => {
        captured = client;
        const result = await client.call('get_me');
        return renderToolContent(result.content);
      });

      expect(answer).toBe('{"login":"octocat"}');
      expect(captured?.isAlive()).toBe(false);
    });

    it('should stop the client when the callback throws', async () => {
      let captured: ProcessToolClient | undefined;

      await expect(
        withToolClient(fakeServer(), { logger: new StructuredLogger({ sinks: [sink] }) }, async (client) => {
          captured = client;
          throw new Error('callback failed');
        })
      ).rejects.toThrow('callback failed');
      expect(captured?.pid).toBeUndefined();
    });
  });
});
