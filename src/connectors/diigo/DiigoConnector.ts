import type { Connector, ConnectorOptions, CoreDeps } from '../types';
import type { Bookmark } from '../../core/normalizer/types';
import type { DiigoListParams } from './types';
import { ValidationError } from '../../utils/errors';
import { withPageSpan } from '../../observability/tracing';

/**
 * Diigo bookmark connector
 *
 * Reads a user's complete bookmark library from the Diigo API v2 list
 * endpoint. Pages are requested one at a time with a growing `start`
 * offset until the API answers with an empty page.
 *
 * @example
 * ```typescript
 * const connector = new DiigoConnector(deps, {
 *   credentials: { username: 'alice', password: 'test-password', apiKey: 'test-key' },
 *   baseUrl: 'https://www.diigo.com/api/v2/',
 *   pageSize: 100,
 * });
 * const bookmarks = await connector.fetchAll();
 * ```
 */
export class DiigoConnector implements Connector {
  readonly name = 'diigo' as const;
  private readonly endpoint: string;

  constructor(
    private deps: CoreDeps,
    private options: ConnectorOptions
  ) {
    this.endpoint = new URL('bookmarks', options.baseUrl).toString();
  }

  /**
   * Fetches one page of bookmarks
   *
   * @param start - Offset of the first bookmark
   * @param count - Page size (the API caps it at 100)
   * @returns Decoded bookmarks, in API order
   * @throws {ApiError} On any non-2xx response
   * @throws {ValidationError} If the page or any record fails to decode
   */
  async fetchPage(start: number, count: number): Promise<Bookmark[]> {
    return withPageSpan(start, count, async () => {
      const query: DiigoListParams = {
        user: this.options.credentials.username,
        start,
        count,
        filter: 'all',
      };

      const response = await this.deps.http.get<unknown>(this.endpoint, {
        query,
        credentials: this.options.credentials,
      });

      if (!Array.isArray(response.data)) {
        throw new ValidationError(
          `Expected a JSON array of bookmarks for page starting at ${start}`,
          'body',
          `page@${start}`,
          { received: typeof response.data }
        );
      }

      const bookmarks = this.deps.normalizer.normalize(response.data, start);

      this.deps.metrics.incrementCounter('pages_fetched');
      this.deps.metrics.incrementCounter('bookmarks_fetched', {}, bookmarks.length);

      return bookmarks;
    });
  }

  /**
   * Fetches every bookmark. Pages are strictly sequential; the first
   * failure aborts the whole fetch and nothing fetched so far is returned.
   */
  async fetchAll(): Promise<Bookmark[]> {
    const { pageSize } = this.options;
    const bookmarks: Bookmark[] = [];
    let start = 0;

    for (;;) {
      this.deps.logger.info('Fetching bookmarks page', {
        start,
        end: start + pageSize,
      });

      const page = await this.fetchPage(start, pageSize);
      if (page.length === 0) {
        break;
      }

      bookmarks.push(...page);
      start += pageSize;
    }

    this.deps.logger.info('Fetch completed', {
      bookmarkCount: bookmarks.length,
      pages: start / pageSize + 1,
    });

    return bookmarks;
  }
}
