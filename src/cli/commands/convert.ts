// src/cli/commands/convert.ts
import { Command, InvalidArgumentError } from 'commander';
import {
  DEFAULT_CSV_OUTPUT,
  MAX_SKIPPED_RECORDS,
  RECORD_ROOT_KEY,
} from '../../core/config/constants.js';
import { formatJsonOutput } from '../../core/export/json.js';
import type { ConvertResult } from '../../core/export/types.js';
import { TweetsheetOrchestrator } from '../../core/orchestrator.js';

interface ConvertCommandOptions {
  out: string;
  mediaOut?: string;
  rootKey: string;
  maxSkipped: number;
  json: boolean;
  verbose: boolean;
}

export function parseCount(value: string): number {
  if (!/^\d+$/.test(value.trim())) {
    throw new InvalidArgumentError('Expected a non-negative integer.');
  }
  return Number.parseInt(value, 10);
}

export function registerConvertCommand(program: Command): void {
  program
    .command('convert')
    .description('Convert a directory of tweet JSON files into a CSV table')
    .argument('<input-dir>', 'Directory with one JSON file per tweet')
    .option('--out <file>', 'CSV output path', DEFAULT_CSV_OUTPUT)
    .option('--media-out <file>', 'Also write the tweet -> media lookup as JSON')
    .option('--root-key <key>', 'Property holding the tweet fields in each file', RECORD_ROOT_KEY)
    .option('--max-skipped <n>', 'Abort once more records than this are skipped', parseCount, MAX_SKIPPED_RECORDS)
    .option('--json', 'Print the result as JSON', false)
    .option('--verbose', 'Verbose output', false)
    .action(async (inputDir: string, options: ConvertCommandOptions) => {
      const orchestrator = new TweetsheetOrchestrator();

      let result: ConvertResult;
      try {
        result = await orchestrator.convert({
          inputDir,
          outputPath: options.out,
          mediaOutputPath: options.mediaOut,
          rootKey: options.rootKey,
          maxSkipped: options.maxSkipped,
          verbose: options.verbose,
        });
      } catch (error) {
        console.error('Error:', error instanceof Error ? error.message : error);
        process.exit(1);
      }

      if (options.json) {
        console.log(formatJsonOutput(result));
      }

      if (result.status !== 'success') {
        console.error('Failed:', result.diagnostics?.error?.message);
        if (result.diagnostics?.error?.suggestion) {
          console.error('Hint:', result.diagnostics.error.suggestion);
        }
        process.exit(1);
      }

      console.log('Table:', result.paths?.csvPath);
      if (result.paths?.mediaPath) {
        console.log('Media lookup:', result.paths.mediaPath);
      }
    });
}
