// src/core/transformer/RaindropTransformer.ts

import type { Bookmark } from '../normalizer/types';
import type { RaindropRow } from './types';
import { formatIsoOffset } from '../normalizer/timestamp';

export const ROOT_FOLDER = 'Diigo Import';
export const READ_LATER_FOLDER = 'Read Later';
export const PRIVATE_FOLDER = 'Private';
export const ANNOTATIONS_HEADER = '\n\nAnnotations:';

/**
 * Folder path: root, then Read Later, then Private, each only when flagged
 */
export function buildFolder(bookmark: Pick<Bookmark, 'readLater' | 'private'>): string {
  let folder = ROOT_FOLDER;
  if (bookmark.readLater) {
    folder += `/${READ_LATER_FOLDER}`;
  }
  if (bookmark.private) {
    folder += `/${PRIVATE_FOLDER}`;
  }
  return folder;
}

/**
 * Tags cell. Raindrop reads several tags from one cell when they are joined
 * with ", " and wrapped in quotes. Quotes inside a tag are doubled, and a
 * tag containing one is always wrapped so the doubling is read back.
 */
export function formatTags(tags: readonly string[]): string {
  if (tags.length === 0) {
    return '';
  }

  const needsEscape = tags.some((tag) => tag.includes('"'));
  if (tags.length === 1 && !needsEscape) {
    return tags[0];
  }

  const joined = tags.map((tag) => tag.replace(/"/g, '""')).join(', ');
  return `"${joined}"`;
}

/**
 * Markdown-style quote; blank lines inside the annotation keep the marker
 */
export function quoteAnnotation(annotation: string): string {
  return '>' + annotation.split('\n\n').join('\n> \n');
}

export function buildNote(bookmark: Pick<Bookmark, 'description' | 'annotations'>): string {
  let note = bookmark.description;

  if (bookmark.annotations.size === 0) {
    return note;
  }

  note += ANNOTATIONS_HEADER;
  for (const [annotation, comments] of bookmark.annotations) {
    const quoted = quoteAnnotation(annotation);
    for (const comment of comments) {
      note += `\n ${quoted}\n\n${comment}\n`;
    }
  }

  return note;
}

export function toRaindropRow(bookmark: Bookmark): RaindropRow {
  return {
    url: bookmark.url,
    folder: buildFolder(bookmark),
    title: bookmark.title,
    note: buildNote(bookmark),
    tags: formatTags(bookmark.tags),
    created: formatIsoOffset(bookmark.createdAt),
  };
}
