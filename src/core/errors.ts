// src/core/errors.ts
import { ErrorCode } from './export/types.js';
import type { ConvertResult } from './export/types.js';
import type { SkipReason } from './types/index.js';

export { ErrorCode };

export class TweetsheetError extends Error {
  code: ErrorCode;
  suggestion?: string;
  context?: Record<string, unknown>;

  constructor(
    code: ErrorCode,
    message: string,
    suggestion?: string,
    context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'TweetsheetError';
    this.code = code;
    this.suggestion = suggestion;
    this.context = context;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class ParseError extends TweetsheetError {
  constructor(
    public readonly source: string,
    detail: string
  ) {
    super(
      ErrorCode.PARSE_FAILED,
      `Could not parse record ${source}: ${detail}`,
      'Check that the input directory holds one JSON object per post',
      { source }
    );
    this.name = 'ParseError';
  }
}

export class MissingFieldError extends TweetsheetError {
  constructor(
    public readonly field: string,
    public readonly reason: SkipReason,
    public readonly statusId?: string
  ) {
    const subject = statusId ? `tweet ${statusId}` : 'record with unknown id';
    const problem = reason === 'missing' ? 'is missing key' : 'has an invalid value for';
    super(ErrorCode.MISSING_FIELD, `${subject} ${problem} "${field}"`, undefined, {
      field,
      reason,
      statusId,
    });
    this.name = 'MissingFieldError';
  }
}

export class InvalidReferenceError extends TweetsheetError {
  constructor(
    public readonly url: string,
    detail?: string
  ) {
    super(
      ErrorCode.INVALID_REFERENCE,
      detail ? `Invalid media URL ${url}: ${detail}` : `Invalid media URL ${url}`,
      'The scraper produced a media host this tool does not recognise',
      { url }
    );
    this.name = 'InvalidReferenceError';
  }
}

export class TooManyErrorsError extends TweetsheetError {
  constructor(
    public readonly skipped: number,
    public readonly threshold: number
  ) {
    super(
      ErrorCode.TOO_MANY_ERRORS,
      `Stopped after skipping ${skipped} records (limit ${threshold})`,
      'Check that the input directory and --root-key are correct',
      { skipped, threshold }
    );
    this.name = 'TooManyErrorsError';
  }
}

export function createFailedResult(error: TweetsheetError): ConvertResult & { status: 'failed' } {
  return {
    status: 'failed',
    diagnostics: {
      warnings: [],
      error: {
        code: error.code,
        message: error.message,
        suggestion: error.suggestion,
      },
    },
  };
}
