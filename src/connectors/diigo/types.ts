/**
 * Diigo API v2 wire types (`GET /api/v2/bookmarks`)
 */

export type DiigoFlag = 'yes' | 'no';

export interface DiigoComment {
  content: string;
}

export interface DiigoAnnotation {
  content: string;
  comments: DiigoComment[];
}

/**
 * Raw bookmark object as returned by the list endpoint
 */
export interface RawDiigoBookmark {
  url: string;
  title: string | null;
  desc: string | null;
  tags: string; // Comma-joined, e.g. "typescript,tools"
  created_at: string; // e.g. "2024/11/14 05:48:28 +0000"
  updated_at?: string;
  readlater: DiigoFlag;
  shared: DiigoFlag;
  user?: string;
  comments: unknown[]; // Bookmark-level comments (unsupported)
  annotations: DiigoAnnotation[];
}

/**
 * Query accepted by the list endpoint (the API key is added by the transport)
 */
export interface DiigoListParams {
  user: string;
  start: number;
  count: number;
  filter: 'all' | 'public';
  [key: string]: string | number;
}
