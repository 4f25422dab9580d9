// src/core/__tests__/fixtures.ts
import { mkdtempSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import type { RecordBlob } from '../types/index.js';

export const PLAIN_ID = '1631000000000000001';
export const REPLY_ID = '1631000000000000002';
export const QUOTE_ID = '1631000000000000003';

export const IMAGE_URL = 'https://pbs.twimg.com/media/FqAbC12xYz?format=jpg&name=small';
export const VIDEO_URL_1 = 'https://video.twimg.com/amplify_video/1631/vid/1280x720/arrival.mp4?tag=16';
export const VIDEO_URL_2 = 'https://video.twimg.com/ext_tw_video/1632/pu/vid/720x720/loop.mp4';

type TweetFields = Record<string, unknown>;

export function makeTweet(overrides: TweetFields = {}, omit: string[] = []): TweetFields {
  const tweet: TweetFields = {
    status_id: PLAIN_ID,
    created_at: 'Wed Mar 01 14:05:09 +0000 2023',
    tweet_text: 'Red Line trains are running with residual delays',
    full_url: `https://twitter.com/TransitDesk/status/${PLAIN_ID}`,
    is_quoted_tweet: 'false',
    is_reply_tweet: 'false',
    has_media: 'false',
    ...overrides,
  };
  for (const key of omit) {
    delete tweet[key];
  }
  return tweet;
}

export function toBlob(tweet: TweetFields, source = 'record.json', rootKey = 'tweet'): RecordBlob {
  return { source, content: JSON.stringify({ [rootKey]: tweet, scraped_at: '2023-03-05' }) };
}

export const PLAIN_TWEET = makeTweet();

export const REPLY_WITH_IMAGE = makeTweet({
  status_id: REPLY_ID,
  created_at: 'Thu Mar 02 08:15:00 +0000 2023',
  tweet_text: 'Shuttle buses replace service\nbetween Alewife and Harvard',
  full_url: `https://twitter.com/TransitDesk/status/${REPLY_ID}`,
  is_reply_tweet: 'true',
  target_tweet_id: '1630999999999999999',
  target_tweet_url: 'https://twitter.com/rider/status/1630999999999999999',
  has_media: 'true',
  media_details: [{ type: 'image', url: IMAGE_URL }],
});

export const QUOTE_WITH_VIDEOS = makeTweet({
  status_id: QUOTE_ID,
  created_at: 'Sat Mar 04 23:30:00 -0500 2023',
  tweet_text: 'Watch the new trains arrive',
  full_url: `https://twitter.com/TransitDesk/status/${QUOTE_ID}`,
  is_quoted_tweet: 'true',
  target_tweet_id: 'null',
  target_tweet_url: 'null',
  has_media: 'true',
  media_details: [
    { type: 'video', url: VIDEO_URL_1 },
    { type: 'video', url: VIDEO_URL_2 },
  ],
});

export function makeTmpDir(): string {
  return mkdtempSync(join(tmpdir(), 'tweetsheet-test-'));
}
