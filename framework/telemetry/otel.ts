/**
 * OpenTelemetry Integration
 *
 * Thin layer over `@opentelemetry/api`. Nothing here registers an SDK: when
 * the host process installs one (and sets OTEL_ENABLED=true), connection spans
 * and request metrics are exported through it; otherwise every call is a
 * no-op.
 *
 * @module
 */

import {
  trace,
  metrics,
  context,
  SpanKind,
  SpanStatusCode,
  type Tracer,
  type Meter,
  type Span,
  type Context,
  type Attributes,
  type Counter,
  type Histogram,
} from '@opentelemetry/api';

import { toError } from './logger.ts';

// ============================================================================
// Configuration
// ============================================================================

export interface OTELConfig {
  /** Whether OTEL is enabled (from OTEL_ENABLED) */
  enabled: boolean;
  /** Service name for traces (from OTEL_SERVICE_NAME) */
  serviceName: string;
  /** OTLP endpoint (from OTEL_EXPORTER_OTLP_ENDPOINT) */
  endpoint?: string;
}

export function isOTELEnabled(): boolean {
  return process.env.OTEL_ENABLED === 'true';
}

export function getOTELConfig(): OTELConfig {
  return {
    enabled: isOTELEnabled(),
    serviceName: process.env.OTEL_SERVICE_NAME ?? 'ferry',
    endpoint: process.env.OTEL_EXPORTER_OTLP_ENDPOINT,
  };
}

// ============================================================================
// Tracer and Meter Access
// ============================================================================

let _tracer: Tracer | undefined;
let _meter: Meter | undefined;

export function getOTELTracer(name = 'ferry', version = '0.1.0'): Tracer {
  if (!_tracer) {
    _tracer = trace.getTracer(name, version);
  }
  return _tracer;
}

export function getOTELMeter(name = 'ferry', version = '0.1.0'): Meter {
  if (!_meter) {
    _meter = metrics.getMeter(name, version);
  }
  return _meter;
}

// ============================================================================
// Span Creation
// ============================================================================

export interface CreateSpanOptions {
  /** Span kind (default: INTERNAL) */
  kind?: SpanKind;
  attributes?: Attributes;
  /** Parent context (uses current context if not provided) */
  parentContext?: Context;
}

/**
 * Run `fn` inside a new span. The span is ended when `fn` settles; a
 * rejection is recorded on the span and rethrown.
 */
export async function withSpan<T>(
  name: string,
  fn: (span: Span) => Promise<T>,
  options: CreateSpanOptions = {},
): Promise<T> {
  if (!isOTELEnabled()) {
    const noopSpan = trace.getTracer('noop').startSpan('noop');
    try {
      return await fn(noopSpan);
    } finally {
      noopSpan.end();
    }
  }

  const tracer = getOTELTracer();
  const parentCtx = options.parentContext ?? context.active();

  return tracer.startActiveSpan(
    name,
    {
      kind: options.kind ?? SpanKind.INTERNAL,
      attributes: options.attributes,
    },
    parentCtx,
    async (span) => {
      try {
        const result = await fn(span);
        span.setStatus({ code: SpanStatusCode.OK });
        return result;
      } catch (error) {
        const cause = toError(error);
        span.recordException(cause);
        span.setStatus({
          code: SpanStatusCode.ERROR,
          message: cause.message,
        });
        throw error;
      } finally {
        span.end();
      }
    },
  );
}

// ============================================================================
// HTTP Metrics
// ============================================================================

export interface HttpRequestAttributes {
  method: string;
  route: string;
  statusCode: number;
  durationMs: number;
}

let httpRequestsTotal: Counter | null = null;
let httpRequestDuration: Histogram | null = null;

/**
 * Count a served request and record its duration.
 */
export function recordHttpRequest(attrs: HttpRequestAttributes): void {
  if (!isOTELEnabled()) return;

  if (!httpRequestsTotal || !httpRequestDuration) {
    const meter = getOTELMeter();
    httpRequestsTotal = meter.createCounter('http.server.requests', {
      description: 'Total number of HTTP requests served',
      unit: '{request}',
    });
    httpRequestDuration = meter.createHistogram('http.server.duration', {
      description: 'Time from request head parsed to response serialized',
      unit: 'ms',
    });
  }

  const attributes: Attributes = {
    'http.request.method': attrs.method,
    'http.route': attrs.route,
    'http.response.status_code': attrs.statusCode,
  };
  httpRequestsTotal.add(1, attributes);
  httpRequestDuration.record(attrs.durationMs, attributes);
}

export { SpanKind, SpanStatusCode, type Span, type Attributes };
