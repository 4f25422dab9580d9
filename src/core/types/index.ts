// src/core/types/index.ts

/** Raw bytes of one post file, tagged with where they came from. */
export interface RecordBlob {
  source: string;
  content: string;
}

export type MediaReference = ImageReference | VideoReference;

export interface ImageReference {
  kind: 'image';
  id: string;
}

export interface VideoReference {
  kind: 'video';
  url: string;
}

export interface PostTimestamp {
  instant: Date;
  offsetMinutes: number;
}

export interface PostRow {
  tweetId: bigint;
  createdAt: PostTimestamp;
  tweetText: string;
  tweetUrl: string;
  isQuotedTweet: boolean;
  isReplyTweet: boolean;
  targetTweetId: bigint | null;
  targetTweetUrl: string | null;
  hasMedia: boolean;
}

export interface PostMedia {
  imageIds: string[];
  videoUrls: string[];
}

/** Post id -> media references, only for posts with attached media. */
export type MediaMapping = Map<bigint, PostMedia>;

export type SkipReason = 'missing' | 'invalid';

export interface SkippedRecord {
  source: string;
  statusId?: string;
  field: string;
  reason: SkipReason;
  message: string;
}
