import { ValidationError } from '../../packages/shared/errors';
import { DEFAULT_PROFILE, type LearnerProfile, type PlannerState } from '../../packages/shared/types';
import { clamp } from '../../packages/shared/utils';

type ProfilePatch = Partial<Pick<LearnerProfile, 'maxDailyDeepHours' | 'peakWindows'>>;

type SurveyOption = {
  key: string;
  text: string;
  mapsTo: ProfilePatch;
};

type SurveyQuestion = {
  id: string;
  question: string;
  options: SurveyOption[];
};

export const SURVEY_QUESTIONS: SurveyQuestion[] = [
  {
    id: 'focus_duration',
    question: 'How long can you typically maintain deep focus before needing a break?',
    options: [
      { key: 'a', text: 'Less than 30 minutes', mapsTo: { maxDailyDeepHours: 4 } },
      { key: 'b', text: '30-60 minutes', mapsTo: { maxDailyDeepHours: 5 } },
      { key: 'c', text: '1-2 hours', mapsTo: { maxDailyDeepHours: 6 } },
      { key: 'd', text: 'More than 2 hours', mapsTo: { maxDailyDeepHours: 8 } },
    ],
  },
  {
    id: 'peak_time',
    question: 'When do you feel most mentally sharp?',
    options: [
      { key: 'a', text: 'Early morning (6am-10am)', mapsTo: { peakWindows: ['06:00'] } },
      { key: 'b', text: 'Late morning to afternoon (10am-3pm)', mapsTo: { peakWindows: ['10:00'] } },
      { key: 'c', text: 'Evening (5pm-9pm)', mapsTo: { peakWindows: ['17:00'] } },
      { key: 'd', text: 'Night (after 9pm)', mapsTo: { peakWindows: ['21:00'] } },
    ],
  },
];

export function getSurveyQuestions() {
  return SURVEY_QUESTIONS.map(({ id, question, options }) => ({
    id,
    question,
    options: options.map(({ key, text }) => ({ key, text })),
  }));
}

export function currentProfile(state: PlannerState): LearnerProfile {
  return state.profile ?? structuredClone(DEFAULT_PROFILE);
}

/**
 * Builds a profile from survey answers keyed by question id. Unanswered
 * questions keep the current value; subject confidence and session length
 * carry over untouched.
 */
export function calculateProfile(base: LearnerProfile, answers: Record<string, string>): LearnerProfile {
  const profile: LearnerProfile = {
    ...base,
    peakWindows: [...base.peakWindows],
    subjectConfidence: { ...base.subjectConfidence },
  };

  for (const [questionId, rawAnswer] of Object.entries(answers)) {
    const question = SURVEY_QUESTIONS.find((item) => item.id === questionId);
    if (!question) {
      throw new ValidationError(`Unknown question: ${questionId}`);
    }
    const answer = rawAnswer.trim().toLowerCase();
    const option = question.options.find((item) => item.key === answer);
    if (!option) {
      const keys = question.options.map((item) => item.key).join(', ');
      throw new ValidationError(`Invalid answer "${rawAnswer}" for ${questionId}. Please answer with: ${keys}`);
    }
    if (option.mapsTo.maxDailyDeepHours !== undefined) {
      profile.maxDailyDeepHours = option.mapsTo.maxDailyDeepHours;
    }
    if (option.mapsTo.peakWindows) {
      profile.peakWindows = [...option.mapsTo.peakWindows];
    }
  }

  return profile;
}

export function submitSurvey(state: PlannerState, answers: Record<string, string>) {
  const profile = calculateProfile(currentProfile(state), answers);
  state.profile = profile;
  return {
    profile,
    summary: `Daily Capacity: ${profile.maxDailyDeepHours} hours\nPeak Focus Time: ${profile.peakWindows[0] ?? 'none'}`,
  };
}

// stored on the profile; allocation does not read it yet
export function setSubjectConfidence(state: PlannerState, subject: string, confidence: number) {
  const name = subject.trim();
  if (!name) {
    throw new ValidationError('subject is required.');
  }
  const profile = currentProfile(state);
  const value = clamp(confidence, 0, 1);
  profile.subjectConfidence[name] = value;
  state.profile = profile;
  return {
    profile,
    message: `Set ${name} confidence to ${Math.round(value * 100)}%`,
  };
}
