// src/core/normalizer/DiigoMapper.ts

import { z } from 'zod';
import type { Bookmark } from './types';
import { parseDiigoTimestamp } from './timestamp';
import { ValidationError } from '../../utils/errors';

const FlagSchema = z.enum(['yes', 'no'], {
  errorMap: () => ({ message: "Expected 'yes' or 'no'" }),
});

// Diigo sends null for a missing title or description
const NullableText = z
  .string()
  .nullable()
  .transform((value) => value ?? '');

export const DiigoAnnotationSchema = z.object({
  content: z.string(),
  comments: z.array(z.object({ content: z.string() })),
});

// One entry of the list endpoint's response
const DiigoBookmarkSchema = z.object({
  url: z.string(),
  title: NullableText,
  desc: NullableText,
  tags: z.string(),
  created_at: z.string(),
  readlater: FlagSchema,
  shared: FlagSchema,
  comments: z.array(z.unknown()),
  annotations: z.array(DiigoAnnotationSchema),
});

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Identifier used in error reports: the record's URL when it has one
 */
export function recordIdOf(raw: unknown, index: number): string {
  if (isRecord(raw) && typeof raw.url === 'string' && raw.url.length > 0) {
    return raw.url;
  }
  return `#${index}`;
}

/**
 * Split the comma-joined tag string. No trimming: Diigo does not pad tags.
 */
export function splitTags(raw: string): string[] {
  return raw === '' ? [] : raw.split(',');
}

/**
 * Build the annotation map. A repeated annotation text keeps its first
 * position and collects the comments of every occurrence.
 */
export function collectAnnotations(
  annotations: ReadonlyArray<z.infer<typeof DiigoAnnotationSchema>>
): Map<string, string[]> {
  const result = new Map<string, string[]>();

  for (const annotation of annotations) {
    const comments = annotation.comments.map((comment) => comment.content);
    const existing = result.get(annotation.content);
    if (existing) {
      existing.push(...comments);
    } else {
      result.set(annotation.content, comments);
    }
  }

  return result;
}

/**
 * Decode one raw list entry into a canonical bookmark
 *
 * @throws {ValidationError} naming the offending field and record
 */
export function mapDiigoBookmark(raw: unknown, recordId: string): Bookmark {
  const parsed = DiigoBookmarkSchema.safeParse(raw);

  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue.path.length > 0 ? issue.path.join('.') : 'record';
    const topLevel = issue.path[0];
    const value = isRecord(raw) && typeof topLevel === 'string' ? raw[topLevel] : raw;

    throw new ValidationError(`Invalid bookmark ${recordId}: ${field}: ${issue.message}`, field, recordId, {
      value,
    });
  }

  const record = parsed.data;

  if (record.comments.length > 0) {
    throw new ValidationError(
      `Bookmark ${recordId} has bookmark-level comments, which cannot be exported`,
      'comments',
      recordId,
      { count: record.comments.length }
    );
  }

  const createdAt = parseDiigoTimestamp(record.created_at);
  if (!createdAt) {
    throw new ValidationError(
      `Invalid bookmark ${recordId}: created_at: Expected 'YYYY/MM/DD HH:MM:SS +HHMM'`,
      'created_at',
      recordId,
      { value: record.created_at }
    );
  }

  return {
    url: record.url,
    title: record.title,
    description: record.desc,
    tags: splitTags(record.tags),
    createdAt,
    readLater: record.readlater === 'yes',
    private: record.shared === 'no',
    annotations: collectAnnotations(record.annotations),
  };
}
