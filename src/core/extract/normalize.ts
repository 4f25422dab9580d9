// src/core/extract/normalize.ts
import type { PostMedia, PostRow } from '../types/index.js';
import type { DecodedPost } from './decoder.js';
import { classifyMediaUrl } from './media.js';

/** Coerce the string-typed fields of a decoded record into a table row. */
export function toPostRow(post: DecodedPost): PostRow {
  const { fields, target } = post;

  return {
    tweetId: BigInt(fields.status_id),
    createdAt: fields.created_at,
    tweetText: collapseLineBreaks(fields.tweet_text),
    tweetUrl: fields.full_url,
    isQuotedTweet: toBoolean(fields.is_quoted_tweet),
    isReplyTweet: toBoolean(fields.is_reply_tweet),
    targetTweetId: target ? toNullableId(target.target_tweet_id) : null,
    targetTweetUrl: target ? toNullableString(target.target_tweet_url) : null,
    hasMedia: toBoolean(fields.has_media),
  };
}

/**
 * Classify every attached media URL, keeping the order of `media_details`.
 * An unrecognised URL aborts with InvalidReferenceError.
 */
export function collectMedia(post: DecodedPost): PostMedia {
  const media: PostMedia = { imageIds: [], videoUrls: [] };

  for (const entry of post.media?.media_details ?? []) {
    const reference = classifyMediaUrl(entry.url);
    if (reference.kind === 'image') {
      media.imageIds.push(reference.id);
    } else {
      media.videoUrls.push(reference.url);
    }
  }

  return media;
}

export function collapseLineBreaks(text: string): string {
  return text.replace(/\r\n|\r|\n/g, ' ');
}

function toBoolean(value: 'true' | 'false'): boolean {
  return value === 'true';
}

function toNullableString(value: string | null): string | null {
  return value === null || value === 'null' ? null : value;
}

function toNullableId(value: string | null): bigint | null {
  const id = toNullableString(value);
  return id === null ? null : BigInt(id);
}
