// src/core/http/types.ts

import type { Credentials } from '../normalizer/types';

export type QueryParams = Record<string, string | number | boolean>;

export interface HttpRequestConfig {
  url: string;
  method?: 'GET';
  headers?: Record<string, string>;
  query?: QueryParams;
  credentials?: Credentials; // Adds the `key` query parameter and Basic auth
  timeout?: number;
}

export interface HttpResponse<T = unknown> {
  data: T;
  status: number;
  headers: Record<string, string>;
}

export interface HttpCoreConfig {
  timeout: number; // milliseconds
  qps?: number; // Queries per second, unlimited when absent
  userAgent?: string;
}
