import { DayClock, MIN_SESSION_MINUTES } from './clock';
import type { Allocator, DayLimits, PlannedSession, SubjectGroup, WorkingTopic } from './types';
import { iterationCap } from './working';

/** First topic of every subject, then every second topic, and so on. */
function interleave(groups: SubjectGroup[]): WorkingTopic[] {
  const pending = groups.map((group) =>
    group.topics.filter((topic) => topic.remainingMinutes >= MIN_SESSION_MINUTES),
  );
  const queue: WorkingTopic[] = [];
  const longest = Math.max(0, ...pending.map((topics) => topics.length));
  for (let i = 0; i < longest; i++) {
    for (const topics of pending) {
      if (i < topics.length) queue.push(topics[i]);
    }
  }
  return queue;
}

/**
 * Rotates through a queue of every unfinished topic, one session per turn,
 * re-queueing a topic while it still has work. No per-subject budget.
 */
export function createRoundRobinAllocator(groups: SubjectGroup[]): Allocator {
  return {
    policy: 'round_robin',

    planDay({ dailyCapMinutes, maxSessionMinutes, passFactor }: DayLimits): PlannedSession[] | null {
      const queue = interleave(groups);
      if (queue.length === 0) return null;

      const clock = new DayClock();
      const sessions: PlannedSession[] = [];
      const maxTurns = iterationCap(queue.length, dailyCapMinutes, MIN_SESSION_MINUTES, passFactor);
      let dayMinutes = 0;
      let turns = 0;

      while (queue.length > 0 && dailyCapMinutes - dayMinutes >= MIN_SESSION_MINUTES && turns < maxTurns) {
        turns += 1;
        const topic = queue.shift();
        if (!topic) break;

        const minutes = Math.floor(
          Math.min(maxSessionMinutes, topic.remainingMinutes, dailyCapMinutes - dayMinutes),
        );
        if (minutes < MIN_SESSION_MINUTES) continue;

        sessions.push({ topic, startMinute: clock.place(minutes), minutes });
        topic.remainingMinutes -= minutes;
        dayMinutes += minutes;
        if (topic.remainingMinutes >= MIN_SESSION_MINUTES) {
          queue.push(topic);
        }
      }

      return sessions;
    },
  };
}
