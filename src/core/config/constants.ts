// src/core/config/constants.ts
export const RECORD_ROOT_KEY = 'tweet';
export const MAX_SKIPPED_RECORDS = 10; // abort once more than this many records are skipped

export const IMAGE_HOST_PREFIX = 'https://pbs.twimg.com/media/';
export const VIDEO_HOST_PREFIXES = [
  'https://video.twimg.com/amplify_video/',
  'https://video.twimg.com/ext_tw_video/',
] as const;
export const IMAGE_FETCH_TEMPLATE = 'https://pbs.twimg.com/media/{id}?format=jpg&name=orig';

// e.g. "Wed Mar 01 14:05:09 +0000 2023"
export const CREATED_AT_FORMAT = 'EEE MMM dd HH:mm:ss xx yyyy';
export const CREATED_AT_PATTERN = /^[A-Z][a-z]{2} [A-Z][a-z]{2} \d{2} \d{2}:\d{2}:\d{2} [+-]\d{4} \d{4}$/;

export const CSV_COLUMNS = [
  'tweet_id',
  'created_at',
  'tweet_text',
  'tweet_url',
  'is_quoted_tweet',
  'is_reply_tweet',
  'target_tweet_id',
  'target_tweet_url',
  'has_media',
] as const;

export type CsvColumn = (typeof CSV_COLUMNS)[number];

export const DEFAULT_CSV_OUTPUT = './tweets.csv';
