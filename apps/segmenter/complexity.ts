import { roundTo } from '../../packages/shared/utils';

export const MIN_COMPLEXITY = 0.3;
export const MAX_COMPLEXITY = 0.9;
export const EMPTY_SAMPLE_COMPLEXITY = 0.5;

const BASE_COMPLEXITY = 0.4;
const MATH_SYMBOL_RE = /[∑∫∂∇≤≥≠±×÷√∞∈∀∃=]/g;
const FORMULA_RE = /\b[a-z]\s*=\s*[^,\n]{3,}/g;
const DEFINITION_RE = /\b(defined?|means?|refers?\s+to|is\s+called)\b/g;
const QUANTITATIVE_SUBJECTS = ['physics', 'math', 'calculus', 'chem'];

function countMatches(text: string, pattern: RegExp): number {
  return text.match(pattern)?.length ?? 0;
}

/**
 * Heuristic difficulty of a text sample, clamped to [0.3, 0.9].
 * Symbol-dense, formula-heavy or definition-heavy samples score higher,
 * as do quantitative subjects.
 */
export function estimateComplexity(sample: string, subject: string): number {
  if (!sample) return EMPTY_SAMPLE_COMPLEXITY;

  const lower = sample.toLowerCase();
  const mathSymbols = countMatches(sample, MATH_SYMBOL_RE);
  const formulas = countMatches(lower, FORMULA_RE);
  const definitions = countMatches(lower, DEFINITION_RE);

  let complexity = BASE_COMPLEXITY;
  if (mathSymbols > 3) complexity += 0.15;
  if (formulas > 2) complexity += 0.15;
  if (definitions > 3) complexity += 0.1;

  const subjectLower = subject.toLowerCase();
  if (QUANTITATIVE_SUBJECTS.some((keyword) => subjectLower.includes(keyword))) {
    complexity += 0.1;
  }

  return roundTo(Math.min(MAX_COMPLEXITY, Math.max(MIN_COMPLEXITY, complexity)), 2);
}
