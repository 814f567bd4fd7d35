import { z } from 'zod';

export const topicSchema = z.object({
  id: z.string().min(1),
  subject: z.string().min(1),
  title: z.string(),
  pageRange: z.tuple([z.number().int(), z.number().int()]),
  estimatedHours: z.number().min(0.5).max(8),
  complexity: z.number().min(0.3).max(0.9),
});

export const documentRecordSchema = z.object({
  id: z.string().min(1),
  filename: z.string().min(1),
  subject: z.string().min(1),
  totalPages: z.number().int().nonnegative(),
  topicIds: z.array(z.string()),
});

export const learnerProfileSchema = z.object({
  maxDailyDeepHours: z.number().min(0.25).max(24).default(6),
  maxSessionTime: z.number().min(0.25).max(24).default(1.5),
  peakWindows: z.array(z.string().regex(/^\d{2}:\d{2}$/)).default(['17:00']),
  subjectConfidence: z.record(z.number().min(0).max(1)).default({}),
});

export const examSchema = z.object({
  subject: z.string().min(1),
  examDate: z.string().regex(/^\d{4}-\d{2}-\d{2}$/),
});

export const sessionEntrySchema = z.object({
  topicId: z.string(),
  subject: z.string(),
  title: z.string(),
  startTime: z.string().regex(/^\d{2}:\d{2}$/),
  durationHours: z.number().min(0.25),
  durationMinutes: z.number().int().min(15),
  complexity: z.number(),
});

export const scheduleDaySchema = z.object({
  date: z.string(),
  weekday: z.string(),
  sessions: z.array(sessionEntrySchema),
  totalHours: z.number().nonnegative(),
});

export const scheduleSummarySchema = z.object({
  totalStudyHours: z.number().nonnegative(),
  studyDays: z.number().int().nonnegative(),
  hoursPerSubject: z.record(z.number()),
  topicsScheduled: z.number().int().nonnegative(),
  totalTopics: z.number().int().nonnegative(),
});

export const allocationPolicySchema = z.enum(['proportional', 'round_robin']);

export const scheduleSchema = z.object({
  id: z.string(),
  startDate: z.string(),
  endDate: z.string(),
  policy: allocationPolicySchema,
  days: z.array(scheduleDaySchema),
  summary: scheduleSummarySchema,
});

export const plannerStateSchema = z.object({
  topics: z.array(topicSchema).default([]),
  documents: z.record(documentRecordSchema).default({}),
  profile: learnerProfileSchema.nullable().default(null),
  exams: z.array(examSchema).default([]),
  schedule: scheduleSchema.nullable().default(null),
  uploadedFiles: z.record(z.string()).default({}),
});

export type Topic = z.infer<typeof topicSchema>;
export type DocumentRecord = z.infer<typeof documentRecordSchema>;
export type LearnerProfile = z.infer<typeof learnerProfileSchema>;
export type Exam = z.infer<typeof examSchema>;
export type SessionEntry = z.infer<typeof sessionEntrySchema>;
export type ScheduleDay = z.infer<typeof scheduleDaySchema>;
export type ScheduleSummary = z.infer<typeof scheduleSummarySchema>;
export type AllocationPolicy = z.infer<typeof allocationPolicySchema>;
export type Schedule = z.infer<typeof scheduleSchema>;
export type PlannerState = z.infer<typeof plannerStateSchema>;

export const DEFAULT_PROFILE: LearnerProfile = {
  maxDailyDeepHours: 6,
  maxSessionTime: 1.5,
  peakWindows: ['17:00'],
  subjectConfidence: {},
};

export function createEmptyState(): PlannerState {
  return {
    topics: [],
    documents: {},
    profile: null,
    exams: [],
    schedule: null,
    uploadedFiles: {},
  };
}
