import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { createMemorySessionStore } from '../../packages/shared/sessionStore';
import { scheduleId } from '../allocator/index';
import { blankPages, createTextDocument } from '../segmenter/testUtils';
import { runOperation } from './dispatcher';
import type { OperationArgs, PlannerDeps } from './operations/index';

function createDeps(overrides: Partial<PlannerDeps> = {}) {
  const written: Array<[string, string]> = [];
  const deps: PlannerDeps = {
    today: () => new Date(Date.UTC(2025, 0, 6)),
    loader: {
      async readBytes() {
        return new Uint8Array();
      },
      async parsePdf(filename) {
        return createTextDocument({
          filename,
          pages: blankPages(12),
          outline: [
            { level: 1, title: 'Statics', page: 1 },
            { level: 1, title: 'Dynamics', page: 4 },
            { level: 1, title: 'Energy', page: 10 },
          ],
        });
      },
    },
    maxTopics: 400,
    passFactor: 3,
    defaultPolicy: 'proportional',
    exportDir: '/exports',
    writeFile: async (path, content) => {
      written.push([path, content]);
    },
    ...overrides,
  };
  return { deps, written };
}

function createRunner(deps: PlannerDeps) {
  const store = createMemorySessionStore();
  const run = (operation: string, input: OperationArgs = {}, sessionId = 'session-1') =>
    runOperation(store, deps, { sessionId, operation, input });
  return { store, run };
}

describe('runOperation', () => {
  it('segments, allocates and exports within one session', async () => {
    const { deps, written } = createDeps();
    const { run } = createRunner(deps);

    const segmented = await run('segment_and_weight', { filePath: '/books/physics.pdf', subject: 'Physics' });
    assert.equal(segmented.status, 'success');
    assert.equal(segmented.status === 'success' && segmented.topicsCreated, 3);

    const allocated = await run('allocate', { endDate: '2025-01-06' });
    assert.deepEqual(allocated, {
      status: 'success',
      scheduleId: scheduleId('2025-01-06', '2025-01-06'),
      policy: 'proportional',
      period: '2025-01-06 to 2025-01-06',
      days: 1,
      totalHours: 6,
      hoursBySubject: { Physics: 6 },
      topicsScheduled: 3,
      totalTopics: 3,
      message: 'Scheduled 3/3 topics over 1 days',
    });

    const exported = await run('export', { format: 'csv', write: true });
    assert.equal(exported.status, 'success');
    assert.equal(written.length, 1);
    assert.equal(written[0][0], '/exports/study_schedule.csv');
    assert.equal(exported.status === 'success' && exported.rows, 4);
  });

  it('keeps sessions apart', async () => {
    const { deps } = createDeps();
    const { run } = createRunner(deps);
    await run('segment_and_weight', { filePath: '/books/physics.pdf', subject: 'Physics' }, 'a');

    const other = await run('list_topics', {}, 'b');
    assert.equal(other.status === 'success' && other.totalTopics, 0);
    const mine = await run('list_topics', {}, 'a');
    assert.equal(mine.status === 'success' && mine.totalTopics, 3);
  });

  it('resets topics', async () => {
    const { deps } = createDeps();
    const { run } = createRunner(deps);
    await run('segment_and_weight', { filePath: '/books/physics.pdf', subject: 'Physics' });
    assert.deepEqual(await run('reset_topics'), { status: 'success', message: 'All topics cleared' });
    assert.deepEqual(await run('allocate', { endDate: '2025-01-08' }), {
      status: 'error',
      code: 'no_topics',
      message: 'No topics found. Process documents first.',
    });
  });

  it('segments an uploaded document by filename', async () => {
    const parsed: string[] = [];
    const { deps } = createDeps();
    const loader = {
      ...deps.loader,
      async parsePdf(filename: string, data: Uint8Array) {
        parsed.push(new TextDecoder().decode(data));
        return deps.loader.parsePdf(filename, data);
      },
    };
    const { run } = createRunner({ ...deps, loader });

    const uploaded = await run('upload_document', {
      filename: 'notes.pdf',
      contentBase64: Buffer.from('%PDF-1.7 test').toString('base64'),
    });
    assert.equal(uploaded.status === 'success' && uploaded.bytes, 13);

    const segmented = await run('segment_and_weight', { filename: 'notes.pdf', subject: 'Physics' });
    assert.equal(segmented.status, 'success');
    assert.deepEqual(parsed, ['%PDF-1.7 test']);
  });

  it('stores exams and the learner profile', async () => {
    const { deps } = createDeps();
    const { run } = createRunner(deps);

    await run('add_or_update_exam', { subject: 'Physics', examDate: '2025-02-01' });
    assert.deepEqual(await run('list_exams'), {
      status: 'success',
      exams: [{ subject: 'Physics', examDate: '2025-02-01' }],
    });

    const before = await run('get_profile');
    assert.equal(before.status === 'success' && before.surveyed, false);

    await run('submit_survey', { answers: { focus_duration: 'a', peak_time: 'c' } });
    await run('set_subject_confidence', { subject: 'Physics', confidence: 0.75 });
    assert.deepEqual(await run('get_profile'), {
      status: 'success',
      surveyed: true,
      profile: {
        maxDailyDeepHours: 4,
        maxSessionTime: 1.5,
        peakWindows: ['17:00'],
        subjectConfidence: { Physics: 0.75 },
      },
    });

    const questions = await run('get_survey_questions');
    assert.equal(questions.status === 'success' && questions.totalQuestions, 2);
  });

  it('uses the surveyed daily capacity when allocating', async () => {
    const { deps } = createDeps();
    const { run } = createRunner(deps);
    await run('segment_and_weight', { filePath: '/books/physics.pdf', subject: 'Physics' });
    await run('submit_survey', { answers: { focus_duration: 'a' } });

    const allocated = await run('allocate', { startDate: '2025-01-06', endDate: '2025-01-06', policy: 'round_robin' });
    assert.equal(allocated.status === 'success' && allocated.totalHours, 4);
    assert.equal(allocated.status === 'success' && allocated.policy, 'round_robin');
  });

  it('reports errors as result envelopes', async () => {
    const { deps } = createDeps();
    const { run } = createRunner(deps);

    assert.deepEqual(await run('export', { format: 'csv' }), {
      status: 'error',
      code: 'no_schedule',
      message: 'No schedule found. Generate a schedule first.',
    });
    assert.deepEqual(await run('fly_to_moon'), {
      status: 'error',
      code: 'unknown_operation',
      message: 'Unsupported operation: fly_to_moon',
    });
    assert.deepEqual(await run('toString'), {
      status: 'error',
      code: 'unknown_operation',
      message: 'Unsupported operation: toString',
    });
    assert.deepEqual(await run('segment_and_weight', { filePath: '/books/notes.docx', subject: 'Physics' }), {
      status: 'error',
      code: 'unsupported_file',
      message: 'Not a PDF: notes.docx',
    });

    const missingSubject = await run('segment_and_weight', { filePath: '/books/physics.pdf' });
    assert.equal(missingSubject.status === 'error' && missingSubject.code, 'invalid_input');

    const badDate = await run('allocate', { startDate: '2025-01-06', endDate: 'next week' });
    assert.equal(badDate.status === 'error' && badDate.code, 'invalid_date');
  });

  it('wraps unexpected failures and leaves the session unchanged', async () => {
    const { deps } = createDeps();
    const failing = createDeps({
      loader: {
        ...deps.loader,
        async parsePdf() {
          throw new Error('corrupt xref table');
        },
      },
    });
    const { run } = createRunner(failing.deps);

    const result = await run('segment_and_weight', { filePath: '/books/physics.pdf', subject: 'Physics' });
    assert.deepEqual(result, { status: 'error', code: 'internal_error', message: 'corrupt xref table' });
    const listing = await run('list_topics');
    assert.equal(listing.status === 'success' && listing.totalTopics, 0);
  });

  it('enforces the configured topic cap', async () => {
    const { deps } = createDeps({ maxTopics: 2 });
    const { run } = createRunner(deps);
    await run('segment_and_weight', { filePath: '/books/physics.pdf', subject: 'Physics' });
    const result = await run('allocate', { endDate: '2025-01-10' });
    assert.equal(result.status === 'error' && result.code, 'too_many_topics');
  });
});
