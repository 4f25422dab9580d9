// src/core/convert/__tests__/normalizer.test.ts
import { describe, it, expect } from '@jest/globals';
import { createNormalizeState, foldRecord, normalizeRecords } from '../normalizer.js';
import { InvalidReferenceError, ParseError, TooManyErrorsError } from '../../errors.js';
import type { RecordBlob } from '../../types/index.js';
import {
  IMAGE_URL,
  PLAIN_ID,
  PLAIN_TWEET,
  QUOTE_ID,
  QUOTE_WITH_VIDEOS,
  REPLY_ID,
  REPLY_WITH_IMAGE,
  VIDEO_URL_1,
  VIDEO_URL_2,
  makeTweet,
  toBlob,
} from '../../__tests__/fixtures.js';

function badBlobs(count: number): RecordBlob[] {
  return Array.from({ length: count }, (_, i) =>
    toBlob(makeTweet({ status_id: String(2000 + i) }, ['tweet_text']), `bad-${i}.json`)
  );
}

describe('normalizeRecords', () => {
  it('builds rows and a media mapping for the three tweet shapes', () => {
    const outcome = normalizeRecords([
      toBlob(PLAIN_TWEET, 'a.json'),
      toBlob(REPLY_WITH_IMAGE, 'b.json'),
      toBlob(QUOTE_WITH_VIDEOS, 'c.json'),
    ]);

    expect(outcome.ok).toBe(true);
    expect(outcome.rows.map(row => row.tweetId)).toEqual([BigInt(PLAIN_ID), BigInt(REPLY_ID), BigInt(QUOTE_ID)]);
    expect([...outcome.media.keys()]).toEqual([BigInt(REPLY_ID), BigInt(QUOTE_ID)]);
    expect(outcome.media.get(BigInt(REPLY_ID))).toEqual({ imageIds: ['FqAbC12xYz'], videoUrls: [] });
    expect(outcome.media.get(BigInt(QUOTE_ID))).toEqual({ imageIds: [], videoUrls: [VIDEO_URL_1, VIDEO_URL_2] });
    expect(outcome.skipped).toEqual([]);
  });

  it('never maps a tweet without media', () => {
    const outcome = normalizeRecords([toBlob(makeTweet({ has_media: 'false', media_details: [{ url: IMAGE_URL }] }))]);

    expect(outcome.rows).toHaveLength(1);
    expect(outcome.media.size).toBe(0);
  });

  it('maps every media entry of a media tweet', () => {
    const details = [{ url: IMAGE_URL }, { url: VIDEO_URL_1 }, { url: IMAGE_URL }];
    const outcome = normalizeRecords([toBlob(makeTweet({ has_media: 'true', media_details: details }))]);

    const refs = outcome.media.get(BigInt(PLAIN_ID));
    expect(refs).toEqual({ imageIds: ['FqAbC12xYz', 'FqAbC12xYz'], videoUrls: [VIDEO_URL_1] });
    expect((refs?.imageIds.length ?? 0) + (refs?.videoUrls.length ?? 0)).toBe(details.length);
  });

  it('skips a record missing tweet_text and counts it once', () => {
    const outcome = normalizeRecords([
      toBlob(PLAIN_TWEET, 'a.json'),
      toBlob(makeTweet({ status_id: '77', has_media: 'true', media_details: [{ url: IMAGE_URL }] }, ['tweet_text']), 'b.json'),
    ]);

    expect(outcome.ok).toBe(true);
    expect(outcome.rows.map(row => row.tweetId)).toEqual([BigInt(PLAIN_ID)]);
    expect(outcome.media.has(77n)).toBe(false);
    expect(outcome.skipped).toEqual([
      {
        source: 'b.json',
        statusId: '77',
        field: 'tweet_text',
        reason: 'missing',
        message: 'tweet 77 is missing key "tweet_text"',
      },
    ]);
  });

  it('tolerates ten skipped records', () => {
    const outcome = normalizeRecords([...badBlobs(10), toBlob(PLAIN_TWEET)]);

    expect(outcome.ok).toBe(true);
    expect(outcome.skipped).toHaveLength(10);
    expect(outcome.rows).toHaveLength(1);
  });

  it('stops at the eleventh skipped record', () => {
    const later: RecordBlob[] = [toBlob(PLAIN_TWEET, 'late.json'), { source: 'broken.json', content: '{' }];
    const outcome = normalizeRecords([...badBlobs(11), ...later]);

    expect(outcome.ok).toBe(false);
    expect(outcome.rows).toEqual([]);
    expect(outcome.skipped).toHaveLength(11);
    if (!outcome.ok) {
      expect(outcome.error).toBeInstanceOf(TooManyErrorsError);
      expect(outcome.error.skipped).toBe(11);
      expect(outcome.error.threshold).toBe(10);
      expect(outcome.error.message).toBe('Stopped after skipping 11 records (limit 10)');
    }
  });

  it('keeps rows accumulated before the breaker trips', () => {
    const outcome = normalizeRecords([toBlob(PLAIN_TWEET), ...badBlobs(3), toBlob(REPLY_WITH_IMAGE)], {
      maxSkipped: 2,
    });

    expect(outcome.ok).toBe(false);
    expect(outcome.rows.map(row => row.tweetId)).toEqual([BigInt(PLAIN_ID)]);
    expect(outcome.skipped).toHaveLength(3);
  });

  it('fails the whole run on malformed JSON', () => {
    expect(() => normalizeRecords([toBlob(PLAIN_TWEET), { source: 'x.json', content: 'not json' }])).toThrow(
      ParseError
    );
  });

  it('fails the whole run on an unknown media host', () => {
    const blob = toBlob(makeTweet({ has_media: 'true', media_details: [{ url: 'https://cdn.example.org/a.png' }] }));

    expect(() => normalizeRecords([blob])).toThrow(InvalidReferenceError);
  });

  it('reads the tweet from a custom root key', () => {
    const outcome = normalizeRecords([toBlob(PLAIN_TWEET, 'a.json', 'data')], { rootKey: 'data' });

    expect(outcome.rows).toHaveLength(1);
  });

  it('renders the row the way it was scraped', () => {
    const outcome = normalizeRecords([toBlob(QUOTE_WITH_VIDEOS)]);

    expect(outcome.rows[0]).toEqual({
      tweetId: BigInt(QUOTE_ID),
      createdAt: { instant: new Date('2023-03-05T04:30:00.000Z'), offsetMinutes: -300 },
      tweetText: 'Watch the new trains arrive',
      tweetUrl: `https://twitter.com/TransitDesk/status/${QUOTE_ID}`,
      isQuotedTweet: true,
      isReplyTweet: false,
      targetTweetId: null,
      targetTweetUrl: null,
      hasMedia: true,
    });
  });
});

describe('foldRecord', () => {
  it('threads one accumulator through successive records', () => {
    let state = createNormalizeState();
    state = foldRecord(state, toBlob(PLAIN_TWEET));
    state = foldRecord(state, toBlob(makeTweet({}, ['full_url'])));
    state = foldRecord(state, toBlob(REPLY_WITH_IMAGE));

    expect(state.rows).toHaveLength(2);
    expect(state.skipped.map(skip => skip.field)).toEqual(['full_url']);
    expect(state.media.size).toBe(1);
  });
});
