// src/core/validate/day-gaps.ts
import * as fs from 'fs/promises';
import * as path from 'path';
import { parse } from 'csv-parse/sync';
import { eachDayOfInterval, format, parseISO } from 'date-fns';
import { z } from 'zod';
import { ErrorCode, ParseError, TweetsheetError } from '../errors.js';

export interface DayGapReport {
  firstDate: string | null;
  lastDate: string | null;
  /** Calendar days from first to last, inclusive */
  dayCount: number;
  missingDates: string[];
}

const CALENDAR_DATE = /^\d{4}-\d{2}-\d{2}$/;

const PostDatesSchema = z.array(z.object({ created_at: z.string() }));

export function findDayGaps(dates: Iterable<string>): DayGapReport {
  const days = new Set(dates);
  if (days.size === 0) {
    return { firstDate: null, lastDate: null, dayCount: 0, missingDates: [] };
  }

  const sorted = [...days].sort();
  const firstDate = sorted[0];
  const lastDate = sorted[sorted.length - 1];

  const calendar = eachDayOfInterval({
    start: parseISO(firstDate),
    end: parseISO(lastDate),
  }).map(day => format(day, 'yyyy-MM-dd'));

  return {
    firstDate,
    lastDate,
    dayCount: calendar.length,
    missingDates: calendar.filter(day => !days.has(day)),
  };
}

/**
 * Calendar date of every row in a converted CSV. `created_at` is written in
 * the post's own offset, so its first ten characters are the local date.
 */
export function readPostDates(csv: string, source: string): string[] {
  const records: unknown = parse(csv, { columns: true, skip_empty_lines: true });
  const result = PostDatesSchema.safeParse(records);
  if (!result.success) {
    throw new ParseError(source, 'expected a created_at column');
  }

  return result.data.map((record, index) => {
    const date = record.created_at.slice(0, 10);
    if (!CALENDAR_DATE.test(date)) {
      throw new ParseError(source, `row ${index + 1} has no date in created_at: "${record.created_at}"`);
    }
    return date;
  });
}

export async function checkDayGaps(csvPath: string): Promise<DayGapReport> {
  let csv: string;
  try {
    csv = await fs.readFile(csvPath, 'utf-8');
  } catch (error) {
    throw new TweetsheetError(
      ErrorCode.READ_FAILED,
      `Cannot read ${csvPath}: ${error instanceof Error ? error.message : String(error)}`,
      undefined,
      { path: csvPath }
    );
  }

  return findDayGaps(readPostDates(csv, path.basename(csvPath)));
}
