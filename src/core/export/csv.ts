// src/core/export/csv.ts
import { stringify } from 'csv-stringify/sync';
import { CSV_COLUMNS, type CsvColumn } from '../config/constants.js';
import { formatCreatedAt } from '../extract/timestamp.js';
import type { PostRow } from '../types/index.js';

export function toCsvRecord(row: PostRow): Record<CsvColumn, string> {
  return {
    tweet_id: row.tweetId.toString(),
    created_at: formatCreatedAt(row.createdAt),
    tweet_text: row.tweetText,
    tweet_url: row.tweetUrl,
    is_quoted_tweet: String(row.isQuotedTweet),
    is_reply_tweet: String(row.isReplyTweet),
    target_tweet_id: row.targetTweetId?.toString() ?? '',
    target_tweet_url: row.targetTweetUrl ?? '',
    has_media: String(row.hasMedia),
  };
}

/** Render rows as CSV with a header line; `tweet_id` is the first column. */
export function formatCsv(rows: PostRow[]): string {
  return stringify(rows.map(toCsvRecord), {
    header: true,
    columns: [...CSV_COLUMNS],
  });
}
