export { Tracer, createTracer, formatSpans, formatTrace } from './tracer.js';
export type {
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
