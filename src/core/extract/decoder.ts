// src/core/extract/decoder.ts
import type { z } from 'zod';
import { RECORD_ROOT_KEY } from '../config/constants.js';
import { MissingFieldError, ParseError } from '../errors.js';
import type { RecordBlob } from '../types/index.js';
import {
  MediaFieldsSchema,
  PostFieldsSchema,
  TargetFieldsSchema,
  type MediaFields,
  type PostFields,
  type TargetFields,
} from './schema.js';

/** The consumed subset of one record. Apart from `created_at`, values keep their on-disk string form. */
export interface DecodedPost {
  fields: PostFields;
  target?: TargetFields;
  media?: MediaFields;
}

/**
 * Decode one record blob.
 *
 * Unparseable JSON raises {@link ParseError}. Any absent or malformed field,
 * including the root key itself, raises {@link MissingFieldError} naming the
 * first offending key.
 */
export function decodeRecord(blob: RecordBlob, rootKey: string = RECORD_ROOT_KEY): DecodedPost {
  const parsed = parseBlob(blob);
  const root = parsed[rootKey];

  if (!isRecord(root)) {
    throw new MissingFieldError(rootKey, root === undefined ? 'missing' : 'invalid');
  }

  const statusId = typeof root.status_id === 'string' ? root.status_id : undefined;
  const fields = decodeWith(PostFieldsSchema, root, statusId);

  const hasTarget = fields.is_quoted_tweet === 'true' || fields.is_reply_tweet === 'true';
  const target = hasTarget ? decodeWith(TargetFieldsSchema, root, statusId) : undefined;
  const media = fields.has_media === 'true' ? decodeWith(MediaFieldsSchema, root, statusId) : undefined;

  return { fields, target, media };
}

function parseBlob(blob: RecordBlob): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(blob.content);
  } catch (error) {
    throw new ParseError(blob.source, error instanceof Error ? error.message : String(error));
  }

  if (!isRecord(parsed)) {
    throw new ParseError(blob.source, 'top level is not a JSON object');
  }
  return parsed;
}

function decodeWith<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  root: Record<string, unknown>,
  statusId?: string
): T {
  const result = schema.safeParse(root);
  if (result.success) {
    return result.data;
  }

  const field = String(result.error.issues[0]?.path[0] ?? 'unknown');
  throw new MissingFieldError(field, root[field] === undefined ? 'missing' : 'invalid', statusId);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
