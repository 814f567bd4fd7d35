import { z } from 'zod';
import { allocationPolicySchema } from '../../../packages/shared/types';
import { generateSchedule } from '../../allocator/index';
import { formatIsoDate } from '../../allocator/dates';
import { exportSchedule } from '../../exporter/index';
import { currentProfile } from '../../survey/index';
import { type OperationMap, parseArgs } from './types';

const allocateArgsSchema = z.object({
  startDate: z.string().trim().min(1).optional(),
  endDate: z.string().trim().min(1),
  policy: allocationPolicySchema.optional(),
});

const exportArgsSchema = z.object({
  format: z.enum(['csv', 'markdown']).default('markdown'),
  write: z.boolean().default(false),
});

const scheduleHandlers: OperationMap = {
  async allocate(args, { state }, deps) {
    const { startDate, endDate, policy } = parseArgs(allocateArgsSchema, args);
    const schedule = generateSchedule(
      state.topics,
      currentProfile(state),
      startDate ?? formatIsoDate(deps.today()),
      endDate,
      {
        policy: policy ?? deps.defaultPolicy,
        maxTopics: deps.maxTopics,
        passFactor: deps.passFactor,
      },
    );
    state.schedule = schedule;

    const { summary } = schedule;
    return {
      scheduleId: schedule.id,
      policy: schedule.policy,
      period: `${schedule.startDate} to ${schedule.endDate}`,
      days: summary.studyDays,
      totalHours: summary.totalStudyHours,
      hoursBySubject: summary.hoursPerSubject,
      topicsScheduled: summary.topicsScheduled,
      totalTopics: summary.totalTopics,
      message: `Scheduled ${summary.topicsScheduled}/${summary.totalTopics} topics over ${summary.studyDays} days`,
    };
  },

  async export(args, { state }, deps) {
    const { format, write } = parseArgs(exportArgsSchema, args);
    return exportSchedule(state.schedule, format, {
      outputDir: write ? deps.exportDir : undefined,
      write: deps.writeFile,
    });
  },
};

export default scheduleHandlers;
