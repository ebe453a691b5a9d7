/**
 * Application Context Tests
 */

import { describe, it, expect } from 'vitest';
import { Settings } from '../src/config/settings.js';
import { createAppContext } from '../src/context.js';
import { ConfigurationError } from '../src/errors/index.js';
import { MockAdapter } from '../src/providers/adapters/mock.js';
import { MemorySink, StructuredLogger } from '../src/utilities/logger.js';

describe('createAppContext', () => {
  it('should load the bundled prompts and built-in providers', () => {
    const context = createAppContext({
      settings: new Settings(),
      logger: new StructuredLogger({ level: 'silent' }),
    });

    expect(context.prompts.listQueries()).toContain('whoami');
    expect(context.registry.listProviders().map((p) => p.name)).toEqual(['azure', 'ollama']);
    expect(context.runtime.MODEL_NAME).toBe('azure:gpt-4o');
  });

  it('should register extra adapters', () => {
    const context = createAppContext({
      settings: new Settings(),
      logger: new StructuredLogger({ level: 'silent' }),
      adapters: [new MockAdapter()],
    });

    expect(context.registry.validateConfig('mock')).toBe(true);
  });

  it('should log invalid runtime settings as warnings', () => {
    const sink = new MemorySink();

    const context = createAppContext({
      settings: new Settings({ TOOL_REQUEST_TIMEOUT_MS: '-5' }),
      logger: new StructuredLogger({ sinks: [sink] }),
    });

    expect(context.runtime.TOOL_REQUEST_TIMEOUT_MS).toBe(30000);
    expect(sink.getEntries({ level: 'warn' })[0]?.message).toMatch(/^settings: TOOL_REQUEST_TIMEOUT_MS: /);
  });

  it('should fail for a missing prompt file', () => {
    expect(() =>
      createAppContext({
        settings: new Settings({ PROMPTS_FILE: '/nonexistent/prompts.yaml' }),
        logger: new StructuredLogger({ level: 'silent' }),
      })
    ).toThrow(ConfigurationError);
  });

  it('should clear the tracer on dispose', () => {
    const context = createAppContext({
      settings: new Settings(),
      logger: new StructuredLogger({ level: 'silent' }),
    });
    context.tracer.startSpan('a', 'trace-1');

    context.dispose();
    context.dispose();

    expect(context.tracer.getAllTraces()).toEqual([]);
  });
});
