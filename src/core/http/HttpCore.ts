// src/core/http/HttpCore.ts

import axios, { AxiosError, AxiosInstance } from 'axios';
import * as http from 'http';
import * as https from 'https';
import PQueue from 'p-queue';
import type { HttpCoreConfig, HttpRequestConfig, HttpResponse, QueryParams } from './types';
import type { MetricsCollector } from '../../observability/MetricsCollector';
import type { Logger } from '../../observability/Logger';
import {
  ApiClientError,
  ApiServerError,
  ConfigError,
  NetworkError,
  NetworkTimeoutError,
  RateLimitError,
} from '../../utils/errors';
import { withHttpSpan } from '../../observability/tracing';

const API_KEY_PARAM = 'key';

export class HttpCore {
  private axiosInstance: AxiosInstance;
  private queue: PQueue;
  private metrics: MetricsCollector;
  private logger: Logger;

  constructor(private config: HttpCoreConfig, metrics: MetricsCollector, logger: Logger) {
    this.metrics = metrics;
    this.logger = logger;

    this.axiosInstance = axios.create({
      timeout: config.timeout,
      httpAgent: new http.Agent({ keepAlive: true }),
      httpsAgent: new https.Agent({ keepAlive: true }),
    });

    this.queue = this.createQueue();
  }

  async get<T = unknown>(
    url: string,
    config: Omit<HttpRequestConfig, 'url' | 'method'> = {}
  ): Promise<HttpResponse<T>> {
    return this.request<T>({ ...config, url, method: 'GET' });
  }

  /**
   * Execute one request. Requests never overlap: each waits for the previous
   * one in the queue, so paginated callers observe responses in issue order.
   */
  async request<T = unknown>(config: HttpRequestConfig): Promise<HttpResponse<T>> {
    const method = config.method ?? 'GET';
    const requestId = this.generateRequestId();
    const query = this.buildQuery(config);

    this.metrics.incrementCounter('http_requests_total', { method, status: 'initiated' });

    this.logger.debug('HTTP request', {
      requestId,
      url: config.url,
      method,
      query: config.query,
      authenticated: config.credentials !== undefined,
    });

    const headers: Record<string, string> = {
      'X-Request-ID': requestId,
      'User-Agent': this.config.userAgent ?? 'diigo-raindrop-export/1.0',
      Accept: 'application/json',
      ...config.headers,
    };

    const execute = async (): Promise<HttpResponse<T>> => {
      return withHttpSpan(method, config.url, async () => {
        const startTime = Date.now();

        try {
          const axiosResponse = await this.axiosInstance.request<T>({
            url: config.url,
            method,
            headers,
            params: query,
            auth: config.credentials
              ? { username: config.credentials.username, password: config.credentials.password }
              : undefined,
            timeout: config.timeout ?? this.config.timeout,
            validateStatus: (status) => status >= 200 && status < 300,
          });

          this.metrics.incrementCounter('http_requests_total', {
            method,
            status: axiosResponse.status.toString(),
          });
          this.metrics.recordLatency('http_request_duration', Date.now() - startTime, {
            status: axiosResponse.status,
          });

          return {
            data: axiosResponse.data,
            status: axiosResponse.status,
            headers: this.toHeaderRecord(axiosResponse.headers),
          };
        } catch (error: unknown) {
          const errorStatus =
            axios.isAxiosError(error) && error.response ? error.response.status.toString() : 'error';

          this.metrics.incrementCounter('http_requests_total', { method, status: errorStatus });
          this.metrics.incrementCounter('http_errors', { status: errorStatus });

          throw this.transformError(error, config.url);
        }
      });
    };

    return this.queue.add(execute);
  }

  /**
   * Merge the API key into the caller's query. A caller-supplied `key`
   * would silently replace (or be replaced by) the credential, so it is refused.
   */
  private buildQuery(config: HttpRequestConfig): QueryParams | undefined {
    if (!config.credentials) {
      return config.query;
    }

    if (config.query && Object.prototype.hasOwnProperty.call(config.query, API_KEY_PARAM)) {
      throw new ConfigError(`Query parameter '${API_KEY_PARAM}' is reserved for the API key`, {
        url: config.url,
      });
    }

    return { [API_KEY_PARAM]: config.credentials.apiKey, ...config.query };
  }

  private createQueue(): PQueue {
    const { qps } = this.config;

    if (qps === undefined) {
      return new PQueue({ concurrency: 1 });
    }

    // Fractional QPS becomes one request per longer interval
    // e.g., 0.5 QPS = 1 request per 2000ms
    const intervalCap = qps >= 1 ? Math.floor(qps) : 1;
    const interval = qps >= 1 ? 1000 : Math.floor(1000 / qps);

    this.logger.debug('Rate limiter initialized', { qps, intervalCap, interval });

    return new PQueue({ concurrency: 1, intervalCap, interval });
  }

  private generateRequestId(): string {
    return `req_${Date.now()}_${Math.random().toString(36).substring(7)}`;
  }

  private toHeaderRecord(headers: object): Record<string, string> {
    const record: Record<string, string> = {};
    for (const [key, value] of Object.entries(headers)) {
      if (typeof value === 'string') {
        record[key.toLowerCase()] = value;
      }
    }
    return record;
  }

  private parseRetryAfter(value: unknown): number | undefined {
    if (typeof value !== 'string') return undefined;

    const seconds = parseInt(value, 10);
    if (!isNaN(seconds)) return seconds;

    const date = new Date(value);
    if (isNaN(date.getTime())) return undefined;
    return Math.max(0, Math.ceil((date.getTime() - Date.now()) / 1000));
  }

  private transformError(error: unknown, url: string): Error {
    if (!axios.isAxiosError(error)) {
      return error instanceof Error ? error : new NetworkError('Network error', { url, cause: error });
    }

    const axiosError: AxiosError = error;

    if (axiosError.response) {
      const { status, statusText, data, headers } = axiosError.response;

      this.logger.debug('HTTP error response', { url, status, statusText, data });

      if (status === 429) {
        return new RateLimitError(
          `Rate limit exceeded: HTTP 429`,
          this.parseRetryAfter(headers['retry-after']),
          data,
          { url }
        );
      }
      if (status >= 500) {
        return new ApiServerError(`Server error: HTTP ${status}`, status, data, { url });
      }
      return new ApiClientError(`Client error: HTTP ${status}`, status, data, { url });
    }

    if (axiosError.code === 'ECONNABORTED' || axiosError.code === 'ETIMEDOUT') {
      return new NetworkTimeoutError('Request timeout', { url });
    }
    return new NetworkError(`Network error: ${axiosError.message}`, { url, cause: axiosError.code });
  }
}
