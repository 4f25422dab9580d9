// src/core/extract/timestamp.ts
import { isValid, parse } from 'date-fns';
import { CREATED_AT_FORMAT, CREATED_AT_PATTERN } from '../config/constants.js';
import type { PostTimestamp } from '../types/index.js';

const OFFSET_PATTERN = /([+-])(\d{2})(\d{2}) \d{4}$/;

/** Parse a `created_at` value, keeping the UTC offset it was written in. */
export function parseCreatedAt(value: string): PostTimestamp | null {
  if (!CREATED_AT_PATTERN.test(value)) {
    return null;
  }

  const instant = parse(value, CREATED_AT_FORMAT, new Date());
  const offset = OFFSET_PATTERN.exec(value);
  if (!isValid(instant) || !offset) {
    return null;
  }

  const minutes = Number(offset[2]) * 60 + Number(offset[3]);
  return {
    instant,
    offsetMinutes: offset[1] === '-' ? -minutes : minutes,
  };
}

/** Render as `YYYY-MM-DD HH:MM:SS+HH:MM` in the timestamp's own offset. */
export function formatCreatedAt(timestamp: PostTimestamp): string {
  const local = new Date(timestamp.instant.getTime() + timestamp.offsetMinutes * 60_000).toISOString();
  const sign = timestamp.offsetMinutes < 0 ? '-' : '+';
  const absolute = Math.abs(timestamp.offsetMinutes);
  const hours = String(Math.floor(absolute / 60)).padStart(2, '0');
  const minutes = String(absolute % 60).padStart(2, '0');

  return `${local.slice(0, 10)} ${local.slice(11, 19)}${sign}${hours}:${minutes}`;
}
