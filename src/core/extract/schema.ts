// src/core/extract/schema.ts
import { z } from 'zod';
import { parseCreatedAt } from './timestamp.js';

const flag = z.enum(['true', 'false']);
const decimalId = z.string().regex(/^\d+$/);

/** Fields every record must carry, in the order they are checked. */
export const PostFieldsSchema = z.object({
  status_id: decimalId,
  created_at: z.string().transform((value, ctx) => {
    const timestamp = parseCreatedAt(value);
    if (!timestamp) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Expected "Www Mmm DD HH:MM:SS +ZZZZ YYYY"' });
      return z.NEVER;
    }
    return timestamp;
  }),
  tweet_text: z.string(),
  full_url: z.string(),
  is_quoted_tweet: flag,
  is_reply_tweet: flag,
  has_media: flag,
});

// Quotes and replies only. The scraper writes the string "null" when it has no target.
export const TargetFieldsSchema = z.object({
  target_tweet_id: z.union([z.literal('null'), decimalId]).nullable(),
  target_tweet_url: z.string().nullable(),
});

export const MediaEntrySchema = z.object({
  type: z.string().optional(),
  url: z.string(),
});

export const MediaFieldsSchema = z.object({
  media_details: z.array(MediaEntrySchema),
});

export type PostFields = z.infer<typeof PostFieldsSchema>;
export type TargetFields = z.infer<typeof TargetFieldsSchema>;
export type MediaEntry = z.infer<typeof MediaEntrySchema>;
export type MediaFields = z.infer<typeof MediaFieldsSchema>;
