/**
 * Tracer
 *
 * In-process span tracer. Each turn's trace id comes from the tracing ids
 * the session assigns, so spans from model and tool calls group under the
 * same trace as the session's other records.
 */

import { randomBytes } from 'node:crypto';
import type { ErrorKind } from '../errors/index.js';
import { createComponentLogger } from '../utilities/logger.js';
import type {
  ModelTraceHandler,
  ObservabilityEvent,
  ObservabilityEventListener,
  ObservabilitySink,
  Span,
  SpanAttributeValue,
  SpanKind,
  SpanStatus,
  Trace,
  TraceBindings,
} from './types.js';

const log = createComponentLogger('Tracer');

function generateSpanId(): string {
  return randomBytes(8).toString('hex');
}

// =============================================================================
// TRACER
// =============================================================================

export class Tracer implements ObservabilitySink {
  private spans: Map<string, Span> = new Map();
  private traces: Map<string, Trace> = new Map();
  private listeners: Set<ObservabilityEventListener> = new Set();
  private readonly serviceName: string;
  private readonly maxTraces: number;
  private readonly maxSpansPerTrace: number;

  /**
   * Traces are capped in number and each trace in spans; the oldest go first.
   */
  constructor(serviceName = 'toolbridge', maxTraces = 100, maxSpansPerTrace = 1000) {
    this.serviceName = serviceName;
    this.maxTraces = maxTraces;
    this.maxSpansPerTrace = maxSpansPerTrace;
  }

  // ===========================================================================
  // SPANS
  // ===========================================================================

  startSpan(
    name: string,
    traceId: string,
    options: { kind?: SpanKind; parentId?: string; attributes?: Record<string, SpanAttributeValue> } = {}
  ): Span {
    const span: Span = {
      traceId,
      spanId: generateSpanId(),
      parentId: options.parentId,
      name,
      kind: options.kind ?? 'internal',
      startTime: Date.now(),
      status: { code: 'unset' },
      attributes: { 'service.name': this.serviceName, ...options.attributes },
      events: [],
    };

    this.spans.set(span.spanId, span);
    const trace = this.traceFor(traceId, span.startTime);
    trace.spans.push(span);
    while (trace.spans.length > this.maxSpansPerTrace) {
      const dropped = trace.spans.shift();
      if (dropped) this.spans.delete(dropped.spanId);
    }
    this.emit({ type: 'span.start', span });
    return span;
  }

  endSpan(span: Span, status: SpanStatus = { code: 'ok' }): void {
    span.endTime = Date.now();
    span.duration = span.endTime - span.startTime;
    span.status = status;

    const trace = this.traces.get(span.traceId);
    if (trace) trace.endTime = span.endTime;

    this.emit({ type: 'span.end', span });
  }

  setError(span: Span, error: Error): void {
    span.status = { code: 'error', message: error.message };
    span.events.push({
      name: 'exception',
      timestamp: Date.now(),
      attributes: { 'exception.type': error.name, 'exception.message': error.message },
    });
  }

  // ===========================================================================
  // SINK
  // ===========================================================================

  /**
   * Handler bound to one turn's identity. Every span it opens carries the
   * bindings as attributes.
   */
  createHandler(bindings: TraceBindings): ModelTraceHandler {
    const frozen = Object.freeze({ ...bindings });
    const attributes: Record<string, SpanAttributeValue> = {
      provider: frozen.provider,
      model: frozen.model,
      user_id: frozen.userId,
      session_id: frozen.sessionId,
      trace_id: frozen.traceId,
      message_id: frozen.messageId,
    };

    return {
      bindings: frozen,
      startSpan: (name, extra) => this.startSpan(name, frozen.traceId, {
        kind: 'client',
        attributes: { ...attributes, ...extra },
      }),
      endSpan: (span, error) => {
        if (error) {
          this.setError(span, error);
          this.endSpan(span, { code: 'error', message: error.message });
        } else {
          this.endSpan(span);
        }
      },
      recordError: (kind: ErrorKind, message: string) => {
        const span = this.startSpan('turn.error', frozen.traceId, {
          attributes: { ...attributes, 'error.kind': kind },
        });
        this.endSpan(span, { code: 'error', message });
        this.emit({ type: 'error.recorded', traceId: frozen.traceId, kind, message });
      },
    };
  }

  // ===========================================================================
  // RETRIEVAL
  // ===========================================================================

  getTrace(traceId: string): Trace | undefined {
    return this.traces.get(traceId);
  }

  /** Spans of one turn, found by the message id its handler bound */
  getMessageSpans(traceId: string, messageId: string): Span[] {
    return this.traces.get(traceId)?.spans.filter((span) => span.attributes['message_id'] === messageId) ?? [];
  }

  getAllTraces(): Trace[] {
    return Array.from(this.traces.values());
  }

  getSpan(spanId: string): Span | undefined {
    return this.spans.get(spanId);
  }

  clear(): void {
    this.spans.clear();
    this.traces.clear();
  }

  // ===========================================================================
  // EVENTS
  // ===========================================================================

  on(listener: ObservabilityEventListener): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  private emit(event: ObservabilityEvent): void {
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (err) {
        log.error('Error in tracer listener', { error: String(err) });
      }
    }
  }

  private traceFor(traceId: string, startTime: number): Trace {
    const existing = this.traces.get(traceId);
    if (existing) return existing;

    const trace: Trace = { traceId, spans: [], startTime };
    this.traces.set(traceId, trace);
    this.evictOldTraces();
    return trace;
  }

  private evictOldTraces(): void {
    while (this.traces.size > this.maxTraces) {
      const oldest = this.traces.keys().next();
      if (oldest.done) return;
      const trace = this.traces.get(oldest.value);
      for (const span of trace?.spans ?? []) this.spans.delete(span.spanId);
      this.traces.delete(oldest.value);
    }
  }
}

// =============================================================================
// FORMATTING
// =============================================================================

/**
 * One line per span, in start order, for `--debug` output.
 */
export function formatTrace(trace: Trace): string {
  return formatSpans(trace.spans);
}

export function formatSpans(spans: readonly Span[]): string {
  return spans
    .map((span) => {
      const duration = span.duration !== undefined ? `${span.duration}ms` : 'ongoing';
      const status = span.status.code === 'error' ? 'error' : span.status.code === 'ok' ? 'ok' : '-';
      return `${span.name} [${status}] (${duration})`;
    })
    .join('\n');
}

export function createTracer(serviceName = 'toolbridge', maxTraces = 100, maxSpansPerTrace = 1000): Tracer {
  return new Tracer(serviceName, maxTraces, maxSpansPerTrace);
}
