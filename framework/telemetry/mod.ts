/**
 * Telemetry & Observability
 *
 * Structured logging and render tracing.
 */

export {
  Logger,
  getLogger,
  setLogger,
  formatPretty,
  isLogLevel,
  type LogLevel,
  type LogEntry,
  type LoggerOptions,
} from './logger.ts';

export {
  isOTELEnabled,
  getOTELConfig,
  getOTELTracer,
  withSpanSync,
  SpanKind,
  SpanStatusCode,
  type OTELConfig,
  type CreateSpanOptions,
  type Span as OTELSpan,
  type Attributes as OTELAttributes,
} from './otel.ts';
