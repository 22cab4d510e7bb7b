// src/core/normalizer/timestamp.ts

import type { ZonedTimestamp } from './types';

// e.g. 2024/11/14 05:48:28 +0000
const DIIGO_TIMESTAMP = /^(\d{4})\/(\d{2})\/(\d{2}) (\d{2}):(\d{2}):(\d{2}) ([+-])(\d{2})(\d{2})$/;

/**
 * Parse a Diigo `created_at` value.
 *
 * @returns The parsed timestamp, or null when the text does not match the
 * format or names an impossible date, time or offset
 */
export function parseDiigoTimestamp(text: string): ZonedTimestamp | null {
  const match = DIIGO_TIMESTAMP.exec(text);
  if (!match) return null;

  const [year, month, day, hour, minute, second, , offsetHours, offsetMins] = match
    .slice(1)
    .map((part) => parseInt(part, 10));
  const sign = match[7] === '-' ? -1 : 1;

  if (hour > 23 || minute > 59 || second > 59) return null;
  if (offsetHours > 23 || offsetMins > 59) return null;

  // setUTCFullYear, unlike Date.UTC, does not map years 0-99 onto 1900-1999
  const wallClock = new Date(0);
  wallClock.setUTCFullYear(year, month - 1, day);
  wallClock.setUTCHours(hour, minute, second, 0);
  const wallClockMs = wallClock.getTime();

  // 2024/02/30 rolls over into March; reject instead
  if (
    wallClock.getUTCFullYear() !== year ||
    wallClock.getUTCMonth() !== month - 1 ||
    wallClock.getUTCDate() !== day
  ) {
    return null;
  }

  const offsetMinutes = sign * (offsetHours * 60 + offsetMins);
  return { epochMs: wallClockMs - offsetMinutes * 60_000, offsetMinutes };
}

function pad(value: number, width = 2): string {
  return value.toString().padStart(width, '0');
}

/**
 * Render as `YYYY-MM-DDTHH:MM:SS±HH:MM` in the timestamp's own offset
 */
export function formatIsoOffset(timestamp: ZonedTimestamp): string {
  const local = new Date(timestamp.epochMs + timestamp.offsetMinutes * 60_000);
  const sign = timestamp.offsetMinutes < 0 ? '-' : '+';
  const absOffset = Math.abs(timestamp.offsetMinutes);

  const date = `${pad(local.getUTCFullYear(), 4)}-${pad(local.getUTCMonth() + 1)}-${pad(local.getUTCDate())}`;
  const time = `${pad(local.getUTCHours())}:${pad(local.getUTCMinutes())}:${pad(local.getUTCSeconds())}`;
  const offset = `${sign}${pad(Math.floor(absOffset / 60))}:${pad(absOffset % 60)}`;

  return `${date}T${time}${offset}`;
}
