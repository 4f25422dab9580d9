// src/core/validate/missing-media.ts
import * as fs from 'fs/promises';
import * as path from 'path';
import { ErrorCode, TweetsheetError } from '../errors.js';
import { parseMediaMapping, type MediaMappingFile } from '../export/json.js';
import { imageFetchUrl } from '../extract/media.js';

export interface MissingImagesReport {
  /** Distinct image ids referenced by the lookup */
  referenced: number;
  /** Referenced ids with no local file, in first-seen order */
  missing: string[];
}

export interface CheckMediaOptions {
  mappingPath: string;
  mediaDir: string;
  urlsOutputPath?: string;
}

/** Local files are matched on their name without extension. */
export function findMissingImages(
  mapping: MediaMappingFile,
  fileNames: Iterable<string>
): MissingImagesReport {
  const stems = new Set<string>();
  for (const name of fileNames) {
    stems.add(path.parse(name).name);
  }

  const seen = new Set<string>();
  const missing: string[] = [];
  for (const refs of Object.values(mapping)) {
    for (const id of refs.image_ids) {
      if (seen.has(id)) continue;
      seen.add(id);
      if (!stems.has(id)) {
        missing.push(id);
      }
    }
  }

  return { referenced: seen.size, missing };
}

export function formatFetchList(missing: string[]): string {
  return missing.map(id => `${imageFetchUrl(id)}\n`).join('');
}

export async function checkMissingImages(options: CheckMediaOptions): Promise<MissingImagesReport> {
  const mapping = parseMediaMapping(
    await readText(options.mappingPath),
    path.basename(options.mappingPath)
  );

  let fileNames: string[];
  try {
    fileNames = await fs.readdir(options.mediaDir);
  } catch (error) {
    throw new TweetsheetError(
      ErrorCode.READ_FAILED,
      `Cannot read media directory ${options.mediaDir}: ${error instanceof Error ? error.message : String(error)}`,
      undefined,
      { dir: options.mediaDir }
    );
  }

  const report = findMissingImages(mapping, fileNames);

  if (options.urlsOutputPath) {
    await fs.mkdir(path.dirname(options.urlsOutputPath), { recursive: true });
    await fs.writeFile(options.urlsOutputPath, formatFetchList(report.missing), 'utf-8');
  }

  return report;
}

async function readText(filePath: string): Promise<string> {
  try {
    return await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    throw new TweetsheetError(
      ErrorCode.READ_FAILED,
      `Cannot read ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
      undefined,
      { path: filePath }
    );
  }
}
