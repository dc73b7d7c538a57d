/**
 * Telemetry & Observability
 *
 * Structured logging plus OpenTelemetry spans and request metrics.
 */

export {
  Logger,
  LOG_LEVELS,
  isLogLevel,
  toError,
  getLogger,
  setLogger,
  type LogLevel,
  type LogFormat,
  type LogEntry,
  type LoggerOptions,
} from './logger.ts';

export {
  isOTELEnabled,
  getOTELConfig,
  getOTELTracer,
  getOTELMeter,
  withSpan,
  recordHttpRequest,
  SpanKind,
  SpanStatusCode,
  type OTELConfig,
  type CreateSpanOptions,
  type HttpRequestAttributes,
  type Span as OTELSpan,
  type Attributes as OTELAttributes,
} from './otel.ts';
