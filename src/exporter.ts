// src/exporter.ts

import type { Bookmark, Credentials } from './core/normalizer/types';
import type { RaindropRow } from './core/transformer/types';
import type { Connector, CoreDeps } from './connectors/types';
import { HttpCore } from './core/http/HttpCore';
import { Normalizer } from './core/normalizer/Normalizer';
import { toRaindropRow } from './core/transformer/RaindropTransformer';
import { writeCsv } from './core/writer/CsvWriter';
import { Logger } from './observability/Logger';
import { MetricsCollector } from './observability/MetricsCollector';
import { generateCorrelationId, withExportSpan } from './observability/tracing';
import { DiigoConnector } from './connectors/diigo/DiigoConnector';
import { validateConfig } from './config/ConfigValidator';
import type { ExportConfig } from './config/ConfigValidator';
import { describeError } from './utils/errors';

export interface ExportResult {
  runId: string;
  outputPath: string;
  bookmarkCount: number;
  durationMs: number;
}

export class DiigoExporter {
  private core: CoreDeps;
  private connector: Connector;

  /**
   * Build every dependency before the connector that uses them
   */
  private constructor(
    private config: ExportConfig,
    readonly runId: string
  ) {
    const credentials: Credentials = Object.freeze({ ...config.credentials });

    const logger = new Logger(config.logging).child({ runId });
    const metrics = new MetricsCollector(config.metrics);
    const normalizer = new Normalizer();
    const http = new HttpCore(
      { timeout: config.api.timeout, qps: config.api.qps, userAgent: config.api.userAgent },
      metrics,
      logger
    );

    this.core = { logger, metrics, normalizer, http };
    this.connector = new DiigoConnector(this.core, {
      credentials,
      baseUrl: config.api.baseUrl,
      pageSize: config.api.pageSize,
    });
  }

  /**
   * Create an exporter
   *
   * Configuration is validated before anything else happens, so a bad
   * config never reaches the network.
   *
   * @param config - Credentials, API settings, output path, logging and metrics
   * @returns Exporter ready to run
   * @throws {ConfigError} If configuration is invalid
   *
   * @example
   * ```typescript
   * const exporter = DiigoExporter.init({
   *   credentials: { username: 'alice', password: 'test-password', apiKey: 'test-key' },
   *   api: { pageSize: 100 },
   *   output: { path: 'diigo_export.csv' },
   * });
   * await exporter.export();
   * ```
   */
  static init(config: unknown): DiigoExporter {
    const validated = validateConfig(config);
    const exporter = new DiigoExporter(validated, generateCorrelationId());

    exporter.core.logger.debug('Exporter initialized', {
      baseUrl: validated.api.baseUrl,
      pageSize: validated.api.pageSize,
      credentials: validated.credentials,
    });

    return exporter;
  }

  get logger(): Logger {
    return this.core.logger;
  }

  get metrics(): MetricsCollector {
    return this.core.metrics;
  }

  /**
   * Fetch the user's complete library
   *
   * @throws {ApiError} If any page request fails
   * @throws {ValidationError} If any record cannot be decoded
   */
  async fetchAll(): Promise<Bookmark[]> {
    const bookmarks = await this.connector.fetchAll();
    this.core.metrics.recordGauge('export_last_bookmark_count', bookmarks.length);
    return bookmarks;
  }

  toRows(bookmarks: readonly Bookmark[]): RaindropRow[] {
    return bookmarks.map(toRaindropRow);
  }

  /**
   * Fetch, transform and write the CSV. Nothing is written unless every
   * page was fetched and every record decoded.
   *
   * @param outputPath - Overrides `output.path` from the configuration
   */
  async export(outputPath: string = this.config.output.path): Promise<ExportResult> {
    return withExportSpan(this.runId, async () => {
      const startTime = Date.now();

      try {
        const bookmarks = await this.fetchAll();
        const rows = this.toRows(bookmarks);

        this.core.logger.info('Saving export', { outputPath, rowCount: rows.length });
        await writeCsv(rows, outputPath);
        this.core.metrics.incrementCounter('rows_written', {}, rows.length);

        const durationMs = Date.now() - startTime;
        this.core.metrics.recordLatency('export_duration', durationMs, { status: 'success' });
        this.core.logger.info('Export completed', { outputPath, bookmarkCount: bookmarks.length, durationMs });

        return { runId: this.runId, outputPath, bookmarkCount: bookmarks.length, durationMs };
      } catch (error) {
        this.core.metrics.recordLatency('export_duration', Date.now() - startTime, { status: 'failed' });
        this.core.logger.error('Export failed', { outputPath, ...describeError(error) });
        throw error;
      }
    });
  }
}
