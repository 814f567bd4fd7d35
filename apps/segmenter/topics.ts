import { createHash } from 'crypto';
import type { Topic } from '../../packages/shared/types';
import { clamp, roundTo } from '../../packages/shared/utils';
import { estimateComplexity } from './complexity';
import type { SectionMarker } from './types';

// 0.4h per page is 25 minutes of reading at baseline complexity
export const HOURS_PER_PAGE = 0.4;
export const MIN_TOPIC_HOURS = 0.5;
export const MAX_TOPIC_HOURS = 8;
export const MAX_TITLE_LENGTH = 60;

/**
 * Stable 8-character fingerprint of a document. Two uploads with the same
 * filename and page count collide.
 */
export function documentFingerprint(filename: string, totalPages: number): string {
  return createHash('md5').update(`${filename}_${totalPages}`).digest('hex').slice(0, 8);
}

export function topicId(docId: string, sectionIndex: number): string {
  return `${docId}_${String(sectionIndex).padStart(2, '0')}`;
}

export function estimateTopicHours(pages: number, complexity: number): number {
  const hours = roundTo(pages * HOURS_PER_PAGE * (0.5 + complexity), 1);
  return clamp(hours, MIN_TOPIC_HOURS, MAX_TOPIC_HOURS);
}

export type CreateTopicsInput = {
  sections: SectionMarker[];
  samples: string[];
  subject: string;
  filename: string;
  totalPages: number;
};

export function createTopics({ sections, samples, subject, filename, totalPages }: CreateTopicsInput): Topic[] {
  const docId = documentFingerprint(filename, totalPages);

  return sections.map((section, index) => {
    const startPage = section.page;
    const next = sections[index + 1];
    const endPage = next ? next.page - 1 : totalPages;
    const pages = Math.max(1, endPage - startPage + 1);
    const complexity = estimateComplexity(samples[index] ?? '', subject);

    return {
      id: topicId(docId, index),
      subject,
      title: section.title.slice(0, MAX_TITLE_LENGTH),
      pageRange: [startPage, endPage],
      estimatedHours: estimateTopicHours(pages, complexity),
      complexity,
    };
  });
}
