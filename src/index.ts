// src/index.ts

export { DiigoExporter } from './exporter';
export type { ExportResult } from './exporter';
export type { Bookmark, Credentials, ZonedTimestamp } from './core/normalizer/types';
export type { RaindropRow } from './core/transformer/types';
export { RAINDROP_FIELDNAMES } from './core/transformer/types';
export type { Connector, ConnectorOptions } from './connectors/types';
export type { RawDiigoBookmark } from './connectors/diigo/types';
export { DiigoConnector } from './connectors/diigo/DiigoConnector';
export { toRaindropRow, buildFolder, buildNote, formatTags } from './core/transformer/RaindropTransformer';
export { parseDiigoTimestamp, formatIsoOffset } from './core/normalizer/timestamp';
export { renderCsv, writeCsv } from './core/writer/CsvWriter';
export { validateConfig, validateConfigSafe, MAX_PAGE_SIZE } from './config/ConfigValidator';
export type { ExportConfig, ExportConfigInput } from './config/ConfigValidator';
export { loadConfigFromEnv } from './config/env';

// Export error classes for error handling
export {
  ExportError,
  ConfigError,
  ApiError,
  ApiClientError,
  ApiServerError,
  RateLimitError,
  NetworkError,
  NetworkTimeoutError,
  ValidationError,
} from './utils/errors';
