/**
 * Trace correlation for logs and batch spans.
 *
 * Without a registered OpenTelemetry SDK the API hands out no-op spans with
 * invalid ids; `getTraceContext` then reports none and log lines carry no
 * trace fields.
 */

import { SpanStatusCode, isSpanContextValid, trace, type Span } from '@opentelemetry/api';

const TRACER_NAME = 'catalog-loader';

export type SpanAttributes = Record<string, string | number | boolean>;

export type TraceContext = Readonly<{
  traceId: string | undefined;
  spanId: string | undefined;
}>;

export function getTraceContext(): TraceContext {
  const spanContext = trace.getActiveSpan()?.spanContext();
  if (!spanContext || !isSpanContextValid(spanContext)) {
    return { traceId: undefined, spanId: undefined };
  }
  return { traceId: spanContext.traceId, spanId: spanContext.spanId };
}

/** Runs `fn` as the active span; status follows the outcome, errors are rethrown. */
export function withSpan<T>(
  name: string,
  attributes: SpanAttributes,
  fn: (span: Span) => Promise<T>
): Promise<T> {
  return trace.getTracer(TRACER_NAME).startActiveSpan(name, { attributes }, async (span) => {
    try {
      const result = await fn(span);
      span.setStatus({ code: SpanStatusCode.OK });
      return result;
    } catch (error) {
      span.setStatus({
        code: SpanStatusCode.ERROR,
        message: error instanceof Error ? error.message : String(error),
      });
      if (error instanceof Error) span.recordException(error);
      throw error;
    } finally {
      span.end();
    }
  });
}
