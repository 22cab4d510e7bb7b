// src/core/transformer/types.ts

/**
 * One row of Raindrop.io's CSV import format
 */
export interface RaindropRow {
  url: string;
  folder: string;
  title: string;
  note: string;
  tags: string;
  created: string;
}

export const RAINDROP_FIELDNAMES = ['url', 'folder', 'title', 'note', 'tags', 'created'] as const satisfies ReadonlyArray<
  keyof RaindropRow
>;
