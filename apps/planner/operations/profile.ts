import { z } from 'zod';
import { addOrUpdateExam, listExams } from '../../exams/index';
import { currentProfile, getSurveyQuestions, setSubjectConfidence, submitSurvey } from '../../survey/index';
import { type OperationMap, parseArgs } from './types';

const examArgsSchema = z.object({
  subject: z.string().trim().min(1),
  examDate: z.string().trim().min(1),
});

const surveyArgsSchema = z.object({
  answers: z.record(z.string()),
});

const confidenceArgsSchema = z.object({
  subject: z.string().trim().min(1),
  confidence: z.number().finite(),
});

const profileHandlers: OperationMap = {
  async add_or_update_exam(args, { state }) {
    const { subject, examDate } = parseArgs(examArgsSchema, args);
    return addOrUpdateExam(state, subject, examDate);
  },

  async list_exams(_args, { state }) {
    return { exams: listExams(state) };
  },

  async get_survey_questions() {
    const questions = getSurveyQuestions();
    return { totalQuestions: questions.length, questions };
  },

  async submit_survey(args, { state }) {
    const { answers } = parseArgs(surveyArgsSchema, args);
    return submitSurvey(state, answers);
  },

  async set_subject_confidence(args, { state }) {
    const { subject, confidence } = parseArgs(confidenceArgsSchema, args);
    return setSubjectConfidence(state, subject, confidence);
  },

  async get_profile(_args, { state }) {
    return { profile: currentProfile(state), surveyed: state.profile !== null };
  },
};

export default profileHandlers;
