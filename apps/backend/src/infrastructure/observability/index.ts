// =============================================================================
// Observability Module - Public Exports
// =============================================================================
// Tracing helpers built on @opentelemetry/api. Spans are no-ops until the host
// process registers an OpenTelemetry SDK.

import { trace } from '@opentelemetry/api';

export { tracingMiddleware } from './hono-tracing.js';

export { SpanKind, SpanStatusCode } from '@opentelemetry/api';

/**
 * Create a tracer for a specific component
 *
 * @param name - Component name (e.g., 'llm-provider', 'embedding')
 * @param version - Component version (default: '1.0.0')
 */
export function createTracer(name: string, version: string = '1.0.0') {
  return trace.getTracer(name, version);
}
