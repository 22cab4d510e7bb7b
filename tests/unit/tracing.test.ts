/**
 * Tracing Unit Tests
 *
 * Runs against the @opentelemetry/api global with no provider registered,
 * so enabled helpers create non-recording spans.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { Span } from '@opentelemetry/api';
import * as tracing from '../../src/observability/tracing';

describe('Tracing', () => {
  beforeEach(() => {
    delete process.env.OTEL_ENABLED;
  });

  afterEach(() => {
    delete process.env.OTEL_ENABLED;
  });

  describe('Tracing State', () => {
    it('should be disabled by default', () => {
      expect(tracing.isOTelEnabled()).toBe(false);
      expect(tracing.getTracer()).toBeNull();
    });

    it.each(['1', 'true'])('should be enabled when OTEL_ENABLED=%s', (value) => {
      process.env.OTEL_ENABLED = value;

      expect(tracing.isOTelEnabled()).toBe(true);
      expect(tracing.getTracer()).not.toBeNull();
    });

    it('should be disabled when OTEL_ENABLED=0', () => {
      process.env.OTEL_ENABLED = '0';
      expect(tracing.isOTelEnabled()).toBe(false);
    });
  });

  describe('Correlation ID Generation', () => {
    it('should generate distinct UUIDs', () => {
      const id1 = tracing.generateCorrelationId();
      const id2 = tracing.generateCorrelationId();

      expect(id1).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
      expect(id1).not.toBe(id2);
    });
  });

  describe('Span Operations', () => {
    it('should run the callback without a span when disabled', async () => {
      const received: Array<Span | null> = [];

      const result = await tracing.withSpan('test-span', async (span) => {
        received.push(span);
        return 'test-result';
      });

      expect(result).toBe('test-result');
      expect(received).toEqual([null]);
    });

    it('should pass a span when enabled', async () => {
      process.env.OTEL_ENABLED = '1';
      const received: Array<Span | null> = [];

      const result = await tracing.withSpan(
        'test-span',
        async (span) => {
          received.push(span);
          return 42;
        },
        { 'test.attr': 'value' }
      );

      expect(result).toBe(42);
      expect(received).toHaveLength(1);
      expect(received[0]).not.toBeNull();
      expect(received[0]?.isRecording()).toBe(false);
    });

    it('should rethrow callback errors when enabled', async () => {
      process.env.OTEL_ENABLED = '1';

      await expect(
        tracing.withSpan('test-span', async () => {
          throw new Error('Test error');
        })
      ).rejects.toThrow('Test error');
    });

    it('should rethrow non-Error values unchanged', async () => {
      process.env.OTEL_ENABLED = '1';

      await expect(
        tracing.withSpan('test-span', () => Promise.reject('plain failure'))
      ).rejects.toBe('plain failure');
    });
  });

  describe('Specialized Span Functions', () => {
    beforeEach(() => {
      process.env.OTEL_ENABLED = '1';
    });

    it('should wrap HTTP requests', async () => {
      await expect(
        tracing.withHttpSpan('GET', 'https://api.diigo.test/v2/bookmarks', async () => 'ok')
      ).resolves.toBe('ok');
    });

    it('should wrap page fetches', async () => {
      await expect(tracing.withPageSpan(100, 100, async () => [1, 2])).resolves.toEqual([1, 2]);
    });

    it('should wrap export runs', async () => {
      await expect(tracing.withExportSpan('run-1', async () => 3)).resolves.toBe(3);
    });
  });
});
