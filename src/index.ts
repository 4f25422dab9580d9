// src/index.ts
export { TweetsheetOrchestrator } from './core/orchestrator.js';
export { normalizeRecords, foldRecord } from './core/convert/normalizer.js';
export type { NormalizeOptions, NormalizeOutcome, NormalizeState } from './core/convert/normalizer.js';
export { decodeRecord } from './core/extract/decoder.js';
export { classifyMediaUrl, imageFetchUrl } from './core/extract/media.js';
export { toPostRow, collectMedia } from './core/extract/normalize.js';
export { formatCsv } from './core/export/csv.js';
export { serializeMediaMapping, parseMediaMapping } from './core/export/json.js';
export { readRecordBlobs } from './core/source/directory.js';
export { checkMissingImages, findMissingImages } from './core/validate/missing-media.js';
export { checkDayGaps, findDayGaps } from './core/validate/day-gaps.js';
export {
  ErrorCode,
  TweetsheetError,
  ParseError,
  MissingFieldError,
  InvalidReferenceError,
  TooManyErrorsError,
} from './core/errors.js';
export type * from './core/types/index.js';
export type { ConvertOptions, ConvertResult } from './core/export/types.js';
