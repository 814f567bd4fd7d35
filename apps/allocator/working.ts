import type { Topic } from '../../packages/shared/types';
import { roundTo } from '../../packages/shared/utils';
import type { SubjectGroup, WorkingTopic } from './types';

export const MAX_SCALE = 1.5;

/**
 * Ratio between available and needed hours, capped at 1.5. Spare capacity
 * stretches every topic (review buffer); a shortfall compresses every topic
 * so the tail of the list still gets time.
 */
export function demandScale(totalDays: number, maxDailyHours: number, topics: Topic[]): number {
  const totalAvailable = totalDays * maxDailyHours;
  const totalNeeded = topics.reduce((sum, topic) => sum + topic.estimatedHours, 0);
  if (totalNeeded <= 0) return 1;
  return Math.min(MAX_SCALE, totalAvailable / totalNeeded);
}

/**
 * Working copy of a topic at its scaled size, rounded to 0.1h. A topic scaled
 * below one minimum-length session is never booked.
 */
export function toWorkingTopic(topic: Topic, scale: number): WorkingTopic {
  const minutes = Math.round(roundTo(topic.estimatedHours * scale, 1) * 60);
  return {
    id: topic.id,
    subject: topic.subject,
    title: topic.title,
    complexity: topic.complexity,
    totalMinutes: minutes,
    remainingMinutes: minutes,
  };
}

/** Groups by subject in first-seen order, keeping document/section order within each. */
export function groupBySubject(topics: WorkingTopic[]): SubjectGroup[] {
  const groups = new Map<string, SubjectGroup>();
  for (const topic of topics) {
    let group = groups.get(topic.subject);
    if (!group) {
      group = { subject: topic.subject, topics: [], cursor: 0 };
      groups.set(topic.subject, group);
    }
    group.topics.push(topic);
  }
  return Array.from(groups.values());
}

export function outstandingMinutes(group: SubjectGroup): number {
  return group.topics.reduce((sum, topic) => sum + topic.remainingMinutes, 0);
}

/**
 * Upper bound on packing iterations for one day. Every productive iteration
 * books at least one minimum-length session, so the bound only bites on
 * inputs that would otherwise spin.
 */
export function iterationCap(itemCount: number, dailyCapMinutes: number, minSessionMinutes: number, passFactor: number) {
  return passFactor * (itemCount + Math.ceil(dailyCapMinutes / minSessionMinutes));
}
