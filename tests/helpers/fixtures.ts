// tests/helpers/fixtures.ts

import type { RawDiigoBookmark } from '../../src/connectors/diigo/types';
import type { Bookmark } from '../../src/core/normalizer/types';

export const TEST_CREDENTIALS = {
  username: 'alice',
  password: 'test-password',
  apiKey: 'test-key',
};

export function makeRawBookmark(overrides: Partial<RawDiigoBookmark> = {}): RawDiigoBookmark {
  return {
    url: 'https://example.com/article',
    title: 'Example article',
    desc: 'A description',
    tags: 'reading,web',
    created_at: '2024/11/14 05:48:28 +0000',
    updated_at: '2024/11/15 10:00:00 +0000',
    readlater: 'no',
    shared: 'yes',
    user: 'alice',
    comments: [],
    annotations: [],
    ...overrides,
  };
}

/**
 * `count` distinct records numbered from `offset`
 */
export function makePage(count: number, offset = 0): RawDiigoBookmark[] {
  return Array.from({ length: count }, (_, i) =>
    makeRawBookmark({
      url: `https://example.com/${offset + i}`,
      title: `Bookmark ${offset + i}`,
    })
  );
}

export function makeBookmark(overrides: Partial<Bookmark> = {}): Bookmark {
  return {
    url: 'https://example.com/article',
    title: 'Example article',
    description: 'A description',
    tags: [],
    createdAt: { epochMs: Date.UTC(2024, 10, 14, 5, 48, 28), offsetMinutes: 0 },
    readLater: false,
    private: false,
    annotations: new Map(),
    ...overrides,
  };
}

/**
 * Run `fn` and return what it threw
 */
export function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('Expected function to throw');
}
