// src/core/convert/normalizer.ts
import { MAX_SKIPPED_RECORDS, RECORD_ROOT_KEY } from '../config/constants.js';
import { MissingFieldError, TooManyErrorsError } from '../errors.js';
import { decodeRecord } from '../extract/decoder.js';
import { collectMedia, toPostRow } from '../extract/normalize.js';
import type { MediaMapping, PostRow, RecordBlob, SkippedRecord } from '../types/index.js';

export interface NormalizeOptions {
  rootKey?: string;
  maxSkipped?: number;
}

export interface NormalizeState {
  rows: PostRow[];
  media: MediaMapping;
  skipped: SkippedRecord[];
}

export type NormalizeOutcome =
  | ({ ok: true } & NormalizeState)
  | ({ ok: false; error: TooManyErrorsError } & NormalizeState);

export function createNormalizeState(): NormalizeState {
  return { rows: [], media: new Map(), skipped: [] };
}

/**
 * Fold record blobs into rows, the media mapping and the list of skipped
 * records.
 *
 * Records with a missing or malformed field are skipped. Once more than
 * `maxSkipped` have been skipped the fold stops and returns a failed outcome
 * holding what was accumulated up to that point. Parse and media-reference
 * errors are not caught here.
 */
export function normalizeRecords(
  blobs: Iterable<RecordBlob>,
  options: NormalizeOptions = {}
): NormalizeOutcome {
  const rootKey = options.rootKey ?? RECORD_ROOT_KEY;
  const maxSkipped = options.maxSkipped ?? MAX_SKIPPED_RECORDS;

  let state = createNormalizeState();
  for (const blob of blobs) {
    state = foldRecord(state, blob, rootKey);

    if (state.skipped.length > maxSkipped) {
      return {
        ok: false,
        error: new TooManyErrorsError(state.skipped.length, maxSkipped),
        ...state,
      };
    }
  }

  return { ok: true, ...state };
}

export function foldRecord(
  state: NormalizeState,
  blob: RecordBlob,
  rootKey: string = RECORD_ROOT_KEY
): NormalizeState {
  let row: PostRow;
  let decoded: ReturnType<typeof decodeRecord>;

  try {
    decoded = decodeRecord(blob, rootKey);
    row = toPostRow(decoded);
  } catch (error) {
    if (error instanceof MissingFieldError) {
      state.skipped.push(toSkippedRecord(blob, error));
      return state;
    }
    throw error;
  }

  if (row.hasMedia) {
    state.media.set(row.tweetId, collectMedia(decoded));
  }
  state.rows.push(row);

  return state;
}

function toSkippedRecord(blob: RecordBlob, error: MissingFieldError): SkippedRecord {
  return {
    source: blob.source,
    statusId: error.statusId,
    field: error.field,
    reason: error.reason,
    message: error.message,
  };
}
