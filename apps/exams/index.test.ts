import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { InvalidDateError, ValidationError } from '../../packages/shared/errors';
import { createEmptyState } from '../../packages/shared/types';
import { addOrUpdateExam, listExams } from './index';

describe('exams', () => {
  it('adds an exam and updates it by subject', () => {
    const state = createEmptyState();
    assert.deepEqual(addOrUpdateExam(state, 'Math', '2025-06-10'), {
      updated: false,
      message: 'Added Math exam on 2025-06-10',
    });
    assert.deepEqual(addOrUpdateExam(state, ' Math ', '2025-06-12'), {
      updated: true,
      message: 'Updated Math exam to 2025-06-12',
    });
    assert.deepEqual(state.exams, [{ subject: 'Math', examDate: '2025-06-12' }]);
  });

  it('lists exams by date', () => {
    const state = createEmptyState();
    addOrUpdateExam(state, 'Physics', '2025-06-20');
    addOrUpdateExam(state, 'History', '2025-06-03');
    addOrUpdateExam(state, 'Biology', '2025-06-20');
    assert.deepEqual(
      listExams(state).map((exam) => exam.subject),
      ['History', 'Physics', 'Biology'],
    );
    assert.deepEqual(
      state.exams.map((exam) => exam.subject),
      ['Physics', 'History', 'Biology'],
    );
  });

  it('rejects bad dates and empty subjects without changing state', () => {
    const state = createEmptyState();
    assert.throws(() => addOrUpdateExam(state, 'Math', '2025-13-01'), InvalidDateError);
    assert.throws(() => addOrUpdateExam(state, '  ', '2025-06-01'), ValidationError);
    assert.deepEqual(state.exams, []);
  });
});
