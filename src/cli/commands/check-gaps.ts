// src/cli/commands/check-gaps.ts
import { Command } from 'commander';
import { checkDayGaps, type DayGapReport } from '../../core/validate/day-gaps.js';

export function registerCheckGapsCommand(program: Command): void {
  program
    .command('check-gaps')
    .description('Report calendar days without any tweet in a converted CSV')
    .argument('<csv-file>', 'CSV written by convert')
    .action(async (csvFile: string) => {
      let report: DayGapReport;
      try {
        report = await checkDayGaps(csvFile);
      } catch (error) {
        console.error('Error:', error instanceof Error ? error.message : error);
        process.exit(1);
      }

      if (report.firstDate === null) {
        console.log('No tweets found');
        return;
      }

      console.log(`Range: ${report.firstDate} to ${report.lastDate} (${report.dayCount} days)`);
      console.log(`Days without tweets: ${report.missingDates.length}`);
      report.missingDates.forEach(date => console.log(`  - ${date}`));
    });
}
