/**
 * OpenTelemetry Integration
 *
 * Spans around view rendering. The application registers its own SDK and
 * exporter; without one the API hands out no-op spans.
 *
 * Tracing is switched on with `OTEL_ENABLED=true`.
 *
 * @module
 */

import {
  trace,
  INVALID_SPAN_CONTEXT,
  SpanKind,
  SpanStatusCode,
  type Tracer,
  type Span,
  type Attributes,
} from '@opentelemetry/api';

export interface OTELConfig {
  enabled: boolean;
  /** From OTEL_SERVICE_NAME */
  serviceName: string;
}

const TRACER_NAME = 'view-partials';
const TRACER_VERSION = '0.1.0';

export function isOTELEnabled(): boolean {
  return process.env.OTEL_ENABLED === 'true';
}

/**
 * Current OTEL configuration from environment variables
 */
export function getOTELConfig(): OTELConfig {
  return {
    enabled: isOTELEnabled(),
    serviceName: process.env.OTEL_SERVICE_NAME ?? TRACER_NAME,
  };
}

let _tracer: Tracer | undefined;

export function getOTELTracer(): Tracer {
  if (!_tracer) {
    _tracer = trace.getTracer(TRACER_NAME, TRACER_VERSION);
  }
  return _tracer;
}

export interface CreateSpanOptions {
  kind?: SpanKind;
  attributes?: Attributes;
}

/**
 * Run a synchronous function inside a span that ends when it returns.
 * Errors are recorded on the span and rethrown.
 */
export function withSpanSync<T>(
  name: string,
  fn: (span: Span) => T,
  options: CreateSpanOptions = {},
): T {
  if (!isOTELEnabled()) {
    return fn(trace.wrapSpanContext(INVALID_SPAN_CONTEXT));
  }

  const span = getOTELTracer().startSpan(name, {
    kind: options.kind ?? SpanKind.INTERNAL,
    attributes: options.attributes,
  });

  try {
    const result = fn(span);
    span.setStatus({ code: SpanStatusCode.OK });
    return result;
  } catch (error) {
    if (error instanceof Error) {
      span.recordException(error);
    }
    span.setStatus({
      code: SpanStatusCode.ERROR,
      message: error instanceof Error ? error.message : String(error),
    });
    throw error;
  } finally {
    span.end();
  }
}

export { SpanKind, SpanStatusCode, type Span, type Attributes };
