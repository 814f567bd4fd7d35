import { createHash } from 'crypto';
import { NoTopicsError, TooManyTopicsError } from '../../packages/shared/errors';
import type {
  AllocationPolicy,
  LearnerProfile,
  Schedule,
  ScheduleDay,
  Topic,
} from '../../packages/shared/types';
import { formatClock } from './clock';
import { addDays, daysInclusive, formatIsoDate, parseDateRange, weekdayName } from './dates';
import { createProportionalAllocator } from './proportional';
import { createRoundRobinAllocator } from './roundRobin';
import { minutesToHours, summarizeSchedule } from './summary';
import type { Allocator, PlannedSession, SubjectGroup } from './types';
import { demandScale, groupBySubject, toWorkingTopic } from './working';

export type AllocationOptions = {
  policy: AllocationPolicy;
  maxTopics: number;
  passFactor: number;
};

const allocatorFactories: Record<AllocationPolicy, (groups: SubjectGroup[]) => Allocator> = {
  proportional: createProportionalAllocator,
  round_robin: createRoundRobinAllocator,
};

export function scheduleId(startDate: string, endDate: string): string {
  return createHash('md5').update(`${startDate}_${endDate}`).digest('hex').slice(0, 8);
}

function toScheduleDay(date: Date, planned: PlannedSession[]): ScheduleDay {
  const totalMinutes = planned.reduce((sum, session) => sum + session.minutes, 0);
  return {
    date: formatIsoDate(date),
    weekday: weekdayName(date),
    totalHours: minutesToHours(totalMinutes),
    sessions: planned.map(({ topic, startMinute, minutes }) => ({
      topicId: topic.id,
      subject: topic.subject,
      title: topic.title,
      startTime: formatClock(startMinute),
      durationHours: minutesToHours(minutes),
      durationMinutes: minutes,
      complexity: topic.complexity,
    })),
  };
}

/**
 * Distributes every topic over the inclusive date range. Running out of days
 * is not an error: the summary's topicsScheduled/totalTopics shows the gap.
 */
export function generateSchedule(
  topics: Topic[],
  profile: LearnerProfile,
  startDate: string,
  endDate: string,
  options: AllocationOptions,
): Schedule {
  const { start, end } = parseDateRange(startDate, endDate);
  if (topics.length === 0) {
    throw new NoTopicsError();
  }
  if (topics.length > options.maxTopics) {
    throw new TooManyTopicsError(topics.length, options.maxTopics);
  }

  const totalDays = daysInclusive(start, end);
  const scale = demandScale(totalDays, profile.maxDailyDeepHours, topics);
  const workingTopics = topics.map((topic) => toWorkingTopic(topic, scale));
  const allocator = allocatorFactories[options.policy](groupBySubject(workingTopics));

  const limits = {
    dailyCapMinutes: Math.round(profile.maxDailyDeepHours * 60),
    maxSessionMinutes: Math.round(profile.maxSessionTime * 60),
    passFactor: options.passFactor,
  };

  const days: ScheduleDay[] = [];
  for (let offset = 0; offset < totalDays; offset++) {
    const planned = allocator.planDay(limits);
    if (planned === null) break;
    if (planned.length === 0) continue;
    days.push(toScheduleDay(addDays(start, offset), planned));
  }

  return {
    id: scheduleId(startDate, endDate),
    startDate: formatIsoDate(start),
    endDate: formatIsoDate(end),
    policy: allocator.policy,
    days,
    summary: summarizeSchedule(days, workingTopics),
  };
}
