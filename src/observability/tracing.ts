/**
 * OpenTelemetry Tracing (Opt-in)
 *
 * Spans around HTTP requests, page fetches and whole export runs.
 * Spans go to whatever tracer provider the host process registered with
 * `@opentelemetry/api`; without one (or without OTEL_ENABLED) every helper
 * simply runs its callback.
 *
 * Enable via environment variables:
 * - OTEL_ENABLED=1
 */

import { trace, SpanStatusCode, SpanKind, Span } from '@opentelemetry/api';
import { v4 as uuidv4 } from 'uuid';

const TRACER_NAME = 'diigo-raindrop-export';

/**
 * Check if OpenTelemetry is enabled
 */
export function isOTelEnabled(): boolean {
  return process.env.OTEL_ENABLED === '1' || process.env.OTEL_ENABLED === 'true';
}

/**
 * Get the global tracer instance
 */
export function getTracer() {
  if (!isOTelEnabled()) {
    return null;
  }
  return trace.getTracer(TRACER_NAME);
}

/**
 * Generate a unique correlation ID for an export run
 */
export function generateCorrelationId(): string {
  return uuidv4();
}

/**
 * Execute a function within a span
 *
 * @param name - Span name
 * @param fn - Function to execute
 * @param attributes - Optional span attributes
 * @returns Result of fn
 */
export async function withSpan<T>(
  name: string,
  fn: (span: Span | null) => Promise<T>,
  attributes?: Record<string, string | number | boolean>
): Promise<T> {
  const tracer = getTracer();

  // If tracing disabled, execute without span
  if (!tracer) {
    return fn(null);
  }

  return tracer.startActiveSpan(name, async (span) => {
    try {
      if (attributes) {
        Object.entries(attributes).forEach(([key, value]) => {
          span.setAttribute(key, value);
        });
      }

      const result = await fn(span);
      span.setStatus({ code: SpanStatusCode.OK });
      return result;
    } catch (error: unknown) {
      const err = error instanceof Error ? error : new Error(String(error));
      span.recordException(err);
      span.setStatus({
        code: SpanStatusCode.ERROR,
        message: err.message,
      });
      throw error;
    } finally {
      span.end();
    }
  });
}

/**
 * Create a span for HTTP requests
 */
export async function withHttpSpan<T>(
  method: string,
  url: string,
  fn: (span: Span | null) => Promise<T>
): Promise<T> {
  return withSpan(`HTTP ${method}`, fn, {
    'http.method': method,
    'http.url': url,
    'span.kind': SpanKind.CLIENT,
  });
}

/**
 * Create a span for one page of a paginated fetch
 */
export async function withPageSpan<T>(
  start: number,
  count: number,
  fn: (span: Span | null) => Promise<T>
): Promise<T> {
  return withSpan('Fetch page', fn, {
    'page.start': start,
    'page.count': count,
  });
}

/**
 * Create a span for a whole export run
 */
export async function withExportSpan<T>(
  runId: string,
  fn: (span: Span | null) => Promise<T>
): Promise<T> {
  return withSpan('Export bookmarks', fn, {
    'export.run_id': runId,
  });
}
