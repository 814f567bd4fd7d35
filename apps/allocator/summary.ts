import type { ScheduleDay, ScheduleSummary } from '../../packages/shared/types';
import { roundTo } from '../../packages/shared/utils';
import type { WorkingTopic } from './types';

// 0.1h: a topic counts as scheduled once it has lost more than this
const SCHEDULED_THRESHOLD_MINUTES = 6;

export function minutesToHours(minutes: number): number {
  return roundTo(minutes / 60, 2);
}

export function summarizeSchedule(days: ScheduleDay[], workingTopics: WorkingTopic[]): ScheduleSummary {
  const minutesBySubject = new Map<string, number>();
  let dayHours = 0;
  for (const day of days) {
    dayHours += day.totalHours;
    for (const session of day.sessions) {
      minutesBySubject.set(session.subject, (minutesBySubject.get(session.subject) ?? 0) + session.durationMinutes);
    }
  }

  const hoursPerSubject: Record<string, number> = {};
  for (const [subject, minutes] of minutesBySubject) {
    hoursPerSubject[subject] = minutesToHours(minutes);
  }

  return {
    // sum of the already rounded day totals
    totalStudyHours: roundTo(dayHours, 2),
    studyDays: days.length,
    hoursPerSubject,
    topicsScheduled: workingTopics.filter(
      (topic) => topic.totalMinutes - topic.remainingMinutes > SCHEDULED_THRESHOLD_MINUTES,
    ).length,
    totalTopics: workingTopics.length,
  };
}
