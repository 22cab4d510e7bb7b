// src/connectors/types.ts

import type { Bookmark, Credentials } from '../core/normalizer/types';
import type { HttpCore } from '../core/http/HttpCore';
import type { Normalizer } from '../core/normalizer/Normalizer';
import type { Logger } from '../observability/Logger';
import type { MetricsCollector } from '../observability/MetricsCollector';

export interface Connector {
  readonly name: string;

  /** One page of bookmarks starting at offset `start` */
  fetchPage(start: number, count: number): Promise<Bookmark[]>;

  /** Every bookmark, pages concatenated in request order */
  fetchAll(): Promise<Bookmark[]>;
}

export interface ConnectorOptions {
  credentials: Credentials;
  baseUrl: string;
  pageSize: number;
}

export interface CoreDeps {
  http: HttpCore;
  normalizer: Normalizer;
  logger: Logger;
  metrics: MetricsCollector;
}
