import type { AllocationPolicy } from '../../packages/shared/types';

/** Per-run copy of a topic, scaled to the available capacity. */
export type WorkingTopic = {
  id: string;
  subject: string;
  title: string;
  complexity: number;
  totalMinutes: number;
  remainingMinutes: number;
};

export type SubjectGroup = {
  subject: string;
  topics: WorkingTopic[];
  /** Index of the first topic that may still have work. */
  cursor: number;
};

export type DayLimits = {
  dailyCapMinutes: number;
  maxSessionMinutes: number;
  passFactor: number;
};

export type PlannedSession = {
  topic: WorkingTopic;
  startMinute: number;
  minutes: number;
};

export interface Allocator {
  readonly policy: AllocationPolicy;
  /**
   * Packs one day. Returns null once no topic has schedulable work left, and
   * an empty list for a day that produced nothing.
   */
  planDay(limits: DayLimits): PlannedSession[] | null;
}
