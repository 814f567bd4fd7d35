import { writeFile } from 'fs/promises';
import { join } from 'path';
import { NoScheduleError } from '../../packages/shared/errors';
import type { Schedule } from '../../packages/shared/types';
import { scheduleToCsv } from './csv';
import { scheduleToMarkdown } from './markdown';

export type ExportFormat = 'csv' | 'markdown';

export const EXPORT_FILENAMES: Record<ExportFormat, string> = {
  csv: 'study_schedule.csv',
  markdown: 'study_schedule.md',
};

export type ExportOptions = {
  /** Directory to write the file to; nothing is written when omitted. */
  outputDir?: string;
  write?: (path: string, content: string) => Promise<void>;
};

export function describeSchedule(schedule: Schedule) {
  const { summary } = schedule;
  return {
    period: `${schedule.startDate} to ${schedule.endDate}`,
    totalHours: summary.totalStudyHours,
    studyDays: summary.studyDays,
    topicsScheduled: `${summary.topicsScheduled}/${summary.totalTopics}`,
    hoursPerSubject: summary.hoursPerSubject,
  };
}

export async function exportSchedule(
  schedule: Schedule | null,
  format: ExportFormat,
  options: ExportOptions = {},
) {
  if (!schedule) {
    throw new NoScheduleError();
  }

  let content: string;
  let rows: number | undefined;
  if (format === 'csv') {
    ({ content, rows } = scheduleToCsv(schedule));
  } else {
    content = scheduleToMarkdown(schedule);
  }

  let file: string | undefined;
  if (options.outputDir) {
    file = join(options.outputDir, EXPORT_FILENAMES[format]);
    const write = options.write ?? ((path: string, body: string) => writeFile(path, body, 'utf8'));
    await write(file, content);
  }

  return {
    format,
    content,
    rows,
    file,
    summary: describeSchedule(schedule),
    message: file ? `Full schedule saved to ${file}` : `Schedule exported as ${format}`,
  };
}
