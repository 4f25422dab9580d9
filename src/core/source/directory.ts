// src/core/source/directory.ts
import type { Dirent } from 'fs';
import * as fs from 'fs/promises';
import * as path from 'path';
import { ErrorCode, TweetsheetError } from '../errors.js';
import type { RecordBlob } from '../types/index.js';

/** Names of the `*.json` files (or links to them) directly inside `dir`, sorted. */
export async function listRecordFiles(dir: string): Promise<string[]> {
  let entries: Dirent[];
  try {
    entries = await fs.readdir(dir, { withFileTypes: true });
  } catch (error) {
    throw new TweetsheetError(
      ErrorCode.READ_FAILED,
      `Cannot read input directory ${dir}: ${error instanceof Error ? error.message : String(error)}`,
      'Pass the directory that holds the scraped tweet files',
      { dir }
    );
  }

  return entries
    .filter(entry => (entry.isFile() || entry.isSymbolicLink()) && entry.name.toLowerCase().endsWith('.json'))
    .map(entry => entry.name)
    .sort();
}

export async function readRecordBlobs(dir: string): Promise<RecordBlob[]> {
  const blobs: RecordBlob[] = [];

  for (const name of await listRecordFiles(dir)) {
    const file = path.join(dir, name);
    let content: string;
    try {
      content = await fs.readFile(file, 'utf-8');
    } catch (error) {
      throw new TweetsheetError(
        ErrorCode.READ_FAILED,
        `Cannot read record file ${file}: ${error instanceof Error ? error.message : String(error)}`,
        'Check that every *.json entry in the input directory is a readable file',
        { file }
      );
    }
    blobs.push({ source: name, content });
  }

  return blobs;
}
