import type { Schedule, SessionEntry } from '../../packages/shared/types';

const MAX_MARKDOWN_TITLE = 40;

function escapeCell(value: string): string {
  return value.replace(/\|/g, '\\|');
}

function shortTitle(title: string): string {
  return title.length > MAX_MARKDOWN_TITLE ? `${title.slice(0, MAX_MARKDOWN_TITLE)}...` : title;
}

export function formatDuration(session: Pick<SessionEntry, 'durationHours' | 'durationMinutes'>): string {
  return session.durationHours >= 1 ? `${session.durationHours.toFixed(1)}h` : `${session.durationMinutes}m`;
}

export function scheduleToMarkdown(schedule: Schedule): string {
  const { summary } = schedule;
  const lines = [
    '# Study Schedule',
    '',
    `**Period:** ${schedule.startDate} to ${schedule.endDate}`,
    `**Total Time:** ${summary.totalStudyHours} hours across ${summary.studyDays} days`,
    `**Topics:** ${summary.topicsScheduled}/${summary.totalTopics}`,
    '',
    '## Hours by Subject',
    '',
    '| Subject | Hours |',
    '|---------|------:|',
  ];

  const subjects = Object.keys(summary.hoursPerSubject).sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
  for (const subject of subjects) {
    lines.push(`| ${escapeCell(subject)} | ${summary.hoursPerSubject[subject]} |`);
  }

  lines.push('', '## Daily Plan', '');

  for (const day of schedule.days) {
    lines.push(`### ${day.weekday}, ${day.date} (${day.totalHours}h)`);
    lines.push('');
    lines.push('| Time | Subject | Topic | Duration |');
    lines.push('|------|---------|-------|----------|');
    for (const session of day.sessions) {
      lines.push(
        `| ${session.startTime} | ${escapeCell(session.subject)} | ${escapeCell(shortTitle(session.title))} | ${formatDuration(session)} |`,
      );
    }
    lines.push('');
  }

  return lines.join('\n');
}
