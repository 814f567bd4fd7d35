import { ValidationError } from '../../packages/shared/errors';
import type { Exam, PlannerState } from '../../packages/shared/types';
import { parseIsoDate } from '../allocator/dates';

/**
 * Records an exam date for a subject, replacing the date when the subject
 * already has one. Exam dates are informational; allocation ignores them.
 */
export function addOrUpdateExam(state: PlannerState, subject: string, examDate: string) {
  const name = subject.trim();
  if (!name) {
    throw new ValidationError('subject is required.');
  }
  parseIsoDate(examDate, 'exam date');
  const date = examDate.trim();

  const existing = state.exams.find((exam) => exam.subject === name);
  if (existing) {
    existing.examDate = date;
    return { updated: true, message: `Updated ${name} exam to ${date}` };
  }

  state.exams.push({ subject: name, examDate: date });
  return { updated: false, message: `Added ${name} exam on ${date}` };
}

export function listExams(state: PlannerState): Exam[] {
  return [...state.exams].sort((a, b) => (a.examDate < b.examDate ? -1 : a.examDate > b.examDate ? 1 : 0));
}
