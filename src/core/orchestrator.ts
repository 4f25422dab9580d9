// src/core/orchestrator.ts
import * as fs from 'fs/promises';
import * as path from 'path';
import { normalizeRecords, type NormalizeState } from './convert/normalizer.js';
import { TweetsheetError, createFailedResult } from './errors.js';
import { formatCsv } from './export/csv.js';
import { formatJsonOutput, serializeMediaMapping } from './export/json.js';
import type { ConvertOptions, ConvertResult, ConvertStats } from './export/types.js';
import { readRecordBlobs } from './source/directory.js';

export class TweetsheetOrchestrator {
  async convert(options: ConvertOptions): Promise<ConvertResult> {
    try {
      const blobs = await readRecordBlobs(options.inputDir);
      if (options.verbose) {
        console.log(`[Convert] ${blobs.length} record files in ${options.inputDir}`);
      }

      const outcome = normalizeRecords(blobs, {
        rootKey: options.rootKey,
        maxSkipped: options.maxSkipped,
      });

      const warnings = outcome.skipped.map(skip => `${skip.source}: ${skip.message}`);
      warnings.forEach(warning => console.warn(`⊘ ${warning}`));

      const stats = buildStats(outcome);

      if (!outcome.ok) {
        console.error(`✗ ${outcome.error.message}`);
        const failed = createFailedResult(outcome.error);
        return {
          ...failed,
          stats,
          diagnostics: { ...failed.diagnostics, warnings },
        };
      }

      await writeOutput(options.outputPath, formatCsv(outcome.rows));
      if (options.verbose) {
        console.log(`[Convert] Table written: ${options.outputPath}`);
      }

      if (options.mediaOutputPath) {
        await writeOutput(
          options.mediaOutputPath,
          `${formatJsonOutput(serializeMediaMapping(outcome.media))}\n`
        );
        if (options.verbose) {
          console.log(`[Convert] Media lookup written: ${options.mediaOutputPath}`);
        }
      }

      console.log(`✓ ${stats.rows} rows, ${stats.skipped} records skipped`);

      return {
        status: 'success',
        paths: {
          csvPath: options.outputPath,
          mediaPath: options.mediaOutputPath,
        },
        stats,
        diagnostics: { warnings },
      };
    } catch (error) {
      if (error instanceof TweetsheetError) {
        console.error(`✗ ${error.message}`);
        return createFailedResult(error);
      }

      throw error;
    }
  }
}

function buildStats(state: NormalizeState): ConvertStats {
  let images = 0;
  let videos = 0;
  for (const refs of state.media.values()) {
    images += refs.imageIds.length;
    videos += refs.videoUrls.length;
  }

  return {
    rows: state.rows.length,
    skipped: state.skipped.length,
    mediaPosts: state.media.size,
    images,
    videos,
  };
}

async function writeOutput(filePath: string, content: string): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, content, 'utf-8');
}
