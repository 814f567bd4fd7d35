import { roundTo } from '../../packages/shared/utils';
import { DayClock, MIN_SESSION_MINUTES } from './clock';
import type { Allocator, DayLimits, PlannedSession, SubjectGroup, WorkingTopic } from './types';
import { iterationCap, outstandingMinutes } from './working';

function nextTopic(group: SubjectGroup): WorkingTopic | null {
  while (group.cursor < group.topics.length) {
    const candidate = group.topics[group.cursor];
    if (candidate.remainingMinutes >= MIN_SESSION_MINUTES) return candidate;
    group.cursor += 1;
  }
  return null;
}

type ActiveSubject = {
  group: SubjectGroup;
  outstanding: number;
  budgetMinutes: number;
  usedMinutes: number;
};

/**
 * Splits each day between subjects in proportion to their outstanding work,
 * then sweeps the subjects (largest backlog first) booking one session per
 * subject per sweep until nothing more fits.
 */
export function createProportionalAllocator(groups: SubjectGroup[]): Allocator {
  return {
    policy: 'proportional',

    planDay({ dailyCapMinutes, maxSessionMinutes, passFactor }: DayLimits): PlannedSession[] | null {
      const active: ActiveSubject[] = [];
      for (const group of groups) {
        const outstanding = outstandingMinutes(group);
        if (outstanding >= MIN_SESSION_MINUTES) {
          active.push({ group, outstanding, budgetMinutes: 0, usedMinutes: 0 });
        }
      }
      if (active.length === 0) return null;

      const totalOutstanding = active.reduce((sum, subject) => sum + subject.outstanding, 0);
      const dailyCapHours = dailyCapMinutes / 60;
      for (const subject of active) {
        const budgetHours = roundTo((subject.outstanding / totalOutstanding) * dailyCapHours, 2);
        subject.budgetMinutes = Math.round(budgetHours * 60);
      }
      // stable sort: ties keep subject order
      active.sort((a, b) => b.outstanding - a.outstanding);

      const clock = new DayClock();
      const sessions: PlannedSession[] = [];
      const maxSweeps = iterationCap(active.length, dailyCapMinutes, MIN_SESSION_MINUTES, passFactor);
      let dayMinutes = 0;
      let sweeps = 0;
      let progressed = true;

      while (progressed && dayMinutes < dailyCapMinutes && sweeps < maxSweeps) {
        progressed = false;
        sweeps += 1;

        for (const subject of active) {
          if (dayMinutes >= dailyCapMinutes) break;

          const budgetLeft = subject.budgetMinutes - subject.usedMinutes;
          if (budgetLeft < MIN_SESSION_MINUTES) continue;

          const topic = nextTopic(subject.group);
          if (!topic) continue;

          const minutes = Math.floor(
            Math.min(maxSessionMinutes, topic.remainingMinutes, budgetLeft, dailyCapMinutes - dayMinutes),
          );
          if (minutes < MIN_SESSION_MINUTES) continue;

          sessions.push({ topic, startMinute: clock.place(minutes), minutes });
          topic.remainingMinutes -= minutes;
          subject.usedMinutes += minutes;
          dayMinutes += minutes;
          if (topic.remainingMinutes < MIN_SESSION_MINUTES) {
            subject.group.cursor += 1;
          }
          progressed = true;
        }
      }

      return sessions;
    },
  };
}
