// src/cli/commands/check-media.ts
import { Command } from 'commander';
import { checkMissingImages, type MissingImagesReport } from '../../core/validate/missing-media.js';

export function registerCheckMediaCommand(program: Command): void {
  program
    .command('check-media')
    .description('Report images in the media lookup that have no local file')
    .argument('<mapping-file>', 'Media lookup JSON written by convert --media-out')
    .argument('<media-dir>', 'Directory of downloaded images')
    .option('--urls-out <file>', 'Write a fetch URL for each missing image')
    .action(async (mappingFile: string, mediaDir: string, options: { urlsOut?: string }) => {
      let report: MissingImagesReport;
      try {
        report = await checkMissingImages({
          mappingPath: mappingFile,
          mediaDir,
          urlsOutputPath: options.urlsOut,
        });
      } catch (error) {
        console.error('Error:', error instanceof Error ? error.message : error);
        process.exit(1);
      }

      console.log(`Missing images: ${report.missing.length} of ${report.referenced}`);
      if (options.urlsOut) {
        console.log('Fetch list:', options.urlsOut);
      }
    });
}
