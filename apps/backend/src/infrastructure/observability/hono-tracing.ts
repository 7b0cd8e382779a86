// =============================================================================
// Hono Tracing Middleware
// =============================================================================
// Creates OpenTelemetry spans for incoming HTTP requests in Hono.
// Propagates W3C trace context from incoming headers and injects trace ID
// into response headers for client-side correlation.

import { trace, SpanKind, SpanStatusCode, context, propagation } from '@opentelemetry/api';
import type { MiddlewareHandler } from 'hono';

const TRACER_NAME = 'hono-http';
const TRACER_VERSION = '1.0.0';

/**
 * Text map getter for extracting trace context from Hono request headers
 */
const headerGetter = {
  get(carrier: Headers, key: string): string | undefined {
    return carrier.get(key) ?? undefined;
  },
  keys(carrier: Headers): string[] {
    return [...carrier.keys()];
  },
};

/**
 * Tracing middleware for Hono
 *
 * @example
 * ```typescript
 * app.use('*', tracingMiddleware);
 * ```
 */
export const tracingMiddleware: MiddlewareHandler = async (c, next) => {
  const tracer = trace.getTracer(TRACER_NAME, TRACER_VERSION);

  const parentContext = propagation.extract(context.active(), c.req.raw.headers, headerGetter);
  const spanName = `${c.req.method} ${c.req.routePath || c.req.path}`;

  return context.with(parentContext, () =>
    tracer.startActiveSpan(
      spanName,
      {
        kind: SpanKind.SERVER,
        attributes: {
          'http.method': c.req.method,
          'http.target': c.req.path,
          'http.user_agent': c.req.header('user-agent') || '',
        },
      },
      async (span) => {
        try {
          c.header('x-trace-id', span.spanContext().traceId);

          await next();

          span.setAttribute('http.status_code', c.res.status);
          if (c.res.status >= 500) {
            span.setStatus({ code: SpanStatusCode.ERROR, message: `HTTP ${c.res.status}` });
          }
        } catch (error) {
          const err = error instanceof Error ? error : new Error(String(error));
          span.recordException(err);
          span.setStatus({ code: SpanStatusCode.ERROR, message: err.message });
          throw error;
        } finally {
          span.end();
        }
      }
    )
  );
};
