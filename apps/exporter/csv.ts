import type { Schedule } from '../../packages/shared/types';
import { formatClock } from '../allocator/clock';

export const CSV_HEADER = ['Date', 'Day', 'Start', 'End', 'Subject', 'Topic', 'Minutes'];
const MAX_CSV_TITLE = 50;

function toMinute(clock: string): number {
  const [hours, minutes] = clock.split(':').map(Number);
  return hours * 60 + minutes;
}

// commas would shift columns; the format has no quoting
function cell(value: string): string {
  return value.replace(/,/g, ';').replace(/[\r\n]+/g, ' ');
}

export function scheduleToCsv(schedule: Schedule): { content: string; rows: number } {
  const lines = [CSV_HEADER.join(',')];
  for (const day of schedule.days) {
    for (const session of day.sessions) {
      const end = formatClock(toMinute(session.startTime) + session.durationMinutes);
      lines.push(
        [
          day.date,
          day.weekday,
          session.startTime,
          end,
          cell(session.subject),
          cell(session.title.slice(0, MAX_CSV_TITLE)),
          String(session.durationMinutes),
        ].join(','),
      );
    }
  }
  return { content: lines.join('\n'), rows: lines.length - 1 };
}
