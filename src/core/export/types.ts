// src/core/export/types.ts
export interface ConvertOptions {
  inputDir: string;
  outputPath: string;
  mediaOutputPath?: string;
  rootKey?: string;
  maxSkipped?: number;
  verbose?: boolean;
}

export interface ConvertPaths {
  csvPath: string;
  mediaPath?: string;
}

export interface ConvertStats {
  rows: number;
  skipped: number;
  mediaPosts: number;
  images: number;
  videos: number;
}

export interface ConvertResult {
  status: 'success' | 'failed';
  paths?: ConvertPaths;
  stats?: ConvertStats;
  diagnostics?: {
    warnings?: string[];
    error?: ConvertError;
  };
}

export interface ConvertError {
  code: ErrorCode;
  message: string;
  suggestion?: string;
}

export enum ErrorCode {
  PARSE_FAILED = 'parse_failed',
  MISSING_FIELD = 'missing_field',
  INVALID_REFERENCE = 'invalid_reference',
  TOO_MANY_ERRORS = 'too_many_errors',
  READ_FAILED = 'read_failed',
}
