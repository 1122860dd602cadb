/**
 * Ties log lines to the active OpenTelemetry span: the logger reads the trace
 * id from here and uses it as `log_id` when the caller supplies none.
 */

import {
  trace,
  context as otelContext,
  isSpanContextValid,
  SpanStatusCode,
} from '@opentelemetry/api';
import type { Span } from '@opentelemetry/api';

const TRACER_NAME = '@app/logger';

export type TraceContext = Readonly<{
  traceId: string | undefined;
  spanId: string | undefined;
  traceFlags: number | undefined;
}>;

/**
 * Get current trace context from active span. Non-recording spans with the
 * all-zero context count as no span.
 */
export function getTraceContext(): TraceContext {
  const activeSpan = trace.getActiveSpan();
  const spanContext = activeSpan?.spanContext();

  if (!spanContext || !isSpanContextValid(spanContext)) {
    return { traceId: undefined, spanId: undefined, traceFlags: undefined };
  }

  return {
    traceId: spanContext.traceId,
    spanId: spanContext.spanId,
    traceFlags: spanContext.traceFlags,
  };
}

/**
 * Run a function within a new span context (async version)
 */
export async function withSpan<T>(
  name: string,
  attributes: Record<string, string | number | boolean>,
  fn: (span: Span) => Promise<T>
): Promise<T> {
  const tracer = trace.getTracer(TRACER_NAME);
  const span = tracer.startSpan(name, { attributes });

  try {
    const result = await otelContext.with(trace.setSpan(otelContext.active(), span), () =>
      fn(span)
    );
    span.setStatus({ code: SpanStatusCode.OK });
    return result;
  } catch (error) {
    span.setStatus({
      code: SpanStatusCode.ERROR,
      message: error instanceof Error ? error.message : 'Unknown error',
    });
    span.recordException(error instanceof Error ? error : String(error));
    throw error;
  } finally {
    span.end();
  }
}

/**
 * Run a sync function within a new span context
 */
export function withSpanSync<T>(
  name: string,
  attributes: Record<string, string | number | boolean>,
  fn: (span: Span) => T
): T {
  const tracer = trace.getTracer(TRACER_NAME);
  const span = tracer.startSpan(name, { attributes });

  try {
    const result = otelContext.with(trace.setSpan(otelContext.active(), span), () => fn(span));
    span.setStatus({ code: SpanStatusCode.OK });
    return result;
  } catch (error) {
    span.setStatus({
      code: SpanStatusCode.ERROR,
      message: error instanceof Error ? error.message : 'Unknown error',
    });
    span.recordException(error instanceof Error ? error : String(error));
    throw error;
  } finally {
    span.end();
  }
}
