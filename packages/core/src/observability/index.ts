export { getTracer, startSpan, endSpan, SpanStatusCode } from './tracing.js';
