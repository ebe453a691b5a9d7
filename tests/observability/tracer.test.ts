/**
 * Tracer Tests
 */

import { describe, it, expect } from 'vitest';
import { Tracer, formatSpans, formatTrace } from '../../src/observability/tracer.js';
import type { ObservabilityEvent, TraceBindings } from '../../src/observability/types.js';

const BINDINGS: TraceBindings = {
  provider: 'azure',
  model: 'gpt-4o',
  userId: 'user-1',
  sessionId: 'session-1',
  traceId: 'trace-1',
  messageId: 'message-1',
};

describe('Tracer', () => {
  describe('spans', () => {
    it('should group spans by trace id', () => {
      const tracer = new Tracer();

      const a = tracer.startSpan('a', 'trace-1');
      const b = tracer.startSpan('b', 'trace-1', { parentId: a.spanId });
      tracer.startSpan('c', 'trace-2');

      expect(tracer.getTrace('trace-1')?.spans.map((s) => s.name)).toEqual(['a', 'b']);
      expect(tracer.getSpan(b.spanId)?.parentId).toBe(a.spanId);
      expect(tracer.getAllTraces()).toHaveLength(2);
    });

    it('should record status and duration on end', () => {
      const tracer = new Tracer();
      const span = tracer.startSpan('work', 'trace-1');

      tracer.endSpan(span);

      expect(span.status).toEqual({ code: 'ok' });
      expect(span.duration).toBeGreaterThanOrEqual(0);
      expect(tracer.getTrace('trace-1')?.endTime).toBe(span.endTime);
    });

    it('should evict the oldest traces', () => {
      const tracer = new Tracer('toolbridge', 2);
      const first = tracer.startSpan('first', 'trace-1');
      tracer.startSpan('second', 'trace-2');
      tracer.startSpan('third', 'trace-3');

      expect(tracer.getTrace('trace-1')).toBeUndefined();
      expect(tracer.getSpan(first.spanId)).toBeUndefined();
      expect(tracer.getAllTraces().map((t) => t.traceId)).toEqual(['trace-2', 'trace-3']);
    });

    it('should cap the spans kept for one trace', () => {
      const tracer = new Tracer('toolbridge', 100, 3);
      const handler = tracer.createHandler(BINDINGS);
      const spans = Array.from({ length: 5 }, (_, i) => handler.startSpan(`span-${i}`));
      for (const span of spans) handler.endSpan(span);

      expect(tracer.getTrace('trace-1')?.spans.map((s) => s.name)).toEqual(['span-2', 'span-3', 'span-4']);
      expect(tracer.getSpan(spans[0]?.spanId ?? '')).toBeUndefined();
      expect(tracer.getSpan(spans[4]?.spanId ?? '')?.name).toBe('span-4');
    });

    it('should clear everything', () => {
      const tracer = new Tracer();
      tracer.startSpan('a', 'trace-1');

      tracer.clear();

      expect(tracer.getAllTraces()).toEqual([]);
    });
  });

  describe('createHandler', () => {
    it('should attach bindings to every span', () => {
      const tracer = new Tracer();
      const handler = tracer.createHandler(BINDINGS);

      const span = handler.startSpan('model.invoke', { 'request.messages': 2 });

      expect(span.traceId).toBe('trace-1');
      expect(span.kind).toBe('client');
      expect(span.attributes).toEqual({
        'service.name': 'toolbridge',
        provider: 'azure',
        model: 'gpt-4o',
        user_id: 'user-1',
        session_id: 'session-1',
        trace_id: 'trace-1',
        message_id: 'message-1',
        'request.messages': 2,
      });
    });

    it('should freeze the bindings', () => {
      const handler = new Tracer().createHandler(BINDINGS);

      expect(handler.bindings).toEqual(BINDINGS);
      expect(Object.isFrozen(handler.bindings)).toBe(true);
    });

    it('should end spans with an error', () => {
      const tracer = new Tracer();
      const handler = tracer.createHandler(BINDINGS);
      const span = handler.startSpan('model.invoke');

      handler.endSpan(span, new Error('timeout'));

      expect(span.status).toEqual({ code: 'error', message: 'timeout' });
      expect(span.events[0]?.name).toBe('exception');
    });

    it('should record error kinds', () => {
      const tracer = new Tracer();
      const events: ObservabilityEvent[] = [];
      tracer.on((event) => events.push(event));

      tracer.createHandler(BINDINGS).recordError('RequestTimeout', 'Request timeout');

      const span = tracer.getTrace('trace-1')?.spans[0];
      expect(span?.name).toBe('turn.error');
      expect(span?.attributes['error.kind']).toBe('RequestTimeout');
      expect(span?.status).toEqual({ code: 'error', message: 'Request timeout' });
      expect(events.map((e) => e.type)).toEqual(['span.start', 'span.end', 'error.recorded']);
    });
  });

  describe('getMessageSpans', () => {
    it('should return only the spans of one turn', () => {
      const tracer = new Tracer();
      tracer.createHandler(BINDINGS).startSpan('model.invoke');
      tracer.createHandler({ ...BINDINGS, messageId: 'message-2' }).startSpan('tool.invoke');

      expect(tracer.getMessageSpans('trace-1', 'message-2').map((s) => s.name)).toEqual(['tool.invoke']);
      expect(tracer.getMessageSpans('trace-9', 'message-1')).toEqual([]);
    });
  });

  describe('events', () => {
    it('should stop delivering after unsubscribe', () => {
      const tracer = new Tracer();
      const events: ObservabilityEvent[] = [];
      const unsubscribe = tracer.on((event) => events.push(event));

      tracer.startSpan('a', 'trace-1');
      unsubscribe();
      tracer.startSpan('b', 'trace-1');

      expect(events).toHaveLength(1);
    });

    it('should survive a failing listener', () => {
      const tracer = new Tracer();
      tracer.on(() => {
        throw new Error('listener broke');
      });

      expect(() => tracer.startSpan('a', 'trace-1')).not.toThrow();
    });
  });
});

describe('formatTrace', () => {
  it('should print one line per span', () => {
    const tracer = new Tracer();
    const done = tracer.startSpan('model.invoke', 'trace-1');
    const failed = tracer.startSpan('turn.error', 'trace-1');
    tracer.startSpan('tool.call', 'trace-1');
    tracer.endSpan(done);
    tracer.endSpan(failed, { code: 'error', message: 'x' });
    done.duration = 12;
    failed.duration = 0;

    const trace = tracer.getTrace('trace-1');
    expect(trace && formatTrace(trace)).toBe(
      'model.invoke [ok] (12ms)\nturn.error [error] (0ms)\ntool.call [-] (ongoing)'
    );
  });
});

describe('formatSpans', () => {
  it('should print the given spans only', () => {
    const tracer = new Tracer();
    const span = tracer.startSpan('tool.invoke', 'trace-1');
    tracer.endSpan(span);
    span.duration = 4;

    expect(formatSpans([span])).toBe('tool.invoke [ok] (4ms)');
    expect(formatSpans([])).toBe('');
  });
});
