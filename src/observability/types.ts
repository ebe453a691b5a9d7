/**
 * Observability types: spans, traces and the sink interface the provider
 * registry binds into each model handle.
 */

import type { ErrorKind } from '../errors/index.js';

export type SpanKind = 'internal' | 'client';

export type SpanAttributeValue = string | number | boolean;

export interface SpanStatus {
  code: 'unset' | 'ok' | 'error';
  message?: string;
}

export interface SpanEvent {
  name: string;
  timestamp: number;
  attributes?: Record<string, SpanAttributeValue>;
}

export interface Span {
  traceId: string;
  spanId: string;
  parentId?: string;
  name: string;
  kind: SpanKind;
  startTime: number;
  endTime?: number;
  duration?: number;
  status: SpanStatus;
  attributes: Record<string, SpanAttributeValue>;
  events: SpanEvent[];
}

export interface Trace {
  traceId: string;
  spans: Span[];
  startTime: number;
  endTime?: number;
}

export type ObservabilityEvent =
  | { type: 'span.start'; span: Span }
  | { type: 'span.end'; span: Span }
  | { type: 'error.recorded'; traceId: string; kind: ErrorKind; message: string };

export type ObservabilityEventListener = (event: ObservabilityEvent) => void;

/**
 * Identity metadata bound into a handler for one turn.
 */
export interface TraceBindings {
  provider: string;
  model: string;
  userId: string;
  sessionId: string;
  traceId: string;
  messageId: string;
}

/**
 * Per-turn observability attachment carried by a bound model.
 */
export interface ModelTraceHandler {
  readonly bindings: Readonly<TraceBindings>;
  startSpan(name: string, attributes?: Record<string, SpanAttributeValue>): Span;
  endSpan(span: Span, error?: Error): void;
  recordError(kind: ErrorKind, message: string): void;
}

/**
 * Creates model trace handlers from identity bindings.
 */
export interface ObservabilitySink {
  createHandler(bindings: TraceBindings): ModelTraceHandler;
}
