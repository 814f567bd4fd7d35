import type { DocumentRecord, PlannerState, Topic } from '../../packages/shared/types';
import { roundTo } from '../../packages/shared/utils';
import { extractStructure, sampleSections } from './structure';
import { createTopics, documentFingerprint } from './topics';
import type { DocumentSource, StructureTier } from './types';

export const TOPIC_PREVIEW_LIMIT = 15;

export type SegmentationResult = {
  document: DocumentRecord;
  topics: Topic[];
  tier: StructureTier;
};

export function segmentDocument(source: DocumentSource, subject: string): SegmentationResult {
  const { tier, sections } = extractStructure(source);
  const samples = sampleSections(source, sections);
  const topics = createTopics({
    sections,
    samples,
    subject,
    filename: source.filename,
    totalPages: source.pageCount,
  });

  return {
    tier,
    topics,
    document: {
      id: documentFingerprint(source.filename, source.pageCount),
      filename: source.filename,
      subject,
      totalPages: source.pageCount,
      topicIds: topics.map((topic) => topic.id),
    },
  };
}

/**
 * Appends the new topics after every existing one. Nothing is merged, so
 * re-processing a document without a reset duplicates its topics.
 */
export function recordSegmentation(state: PlannerState, result: SegmentationResult) {
  state.topics.push(...result.topics);
  state.documents[result.document.id] = result.document;
}

export function summarizeSegmentation({ document, topics }: SegmentationResult) {
  const totalHours = topics.reduce((sum, topic) => sum + topic.estimatedHours, 0);
  return {
    subject: document.subject,
    filename: document.filename,
    pages: document.totalPages,
    topicsCreated: topics.length,
    totalHours: roundTo(totalHours, 1),
    topics: topics.slice(0, TOPIC_PREVIEW_LIMIT).map((topic) => `${topic.title} (${topic.estimatedHours}h)`),
    message: `Found ${topics.length} topics requiring ${totalHours.toFixed(1)} hours total`,
  };
}

export type SubjectTopicGroup = {
  topics: Array<{ id: string; title: string; hours: number }>;
  totalHours: number;
};

export function listTopics(state: PlannerState) {
  const bySubject: Record<string, SubjectTopicGroup> = {};
  let totalHours = 0;

  for (const topic of state.topics) {
    if (!bySubject[topic.subject]) {
      bySubject[topic.subject] = { topics: [], totalHours: 0 };
    }
    const group = bySubject[topic.subject];
    group.topics.push({ id: topic.id, title: topic.title, hours: topic.estimatedHours });
    group.totalHours += topic.estimatedHours;
    totalHours += topic.estimatedHours;
  }

  for (const group of Object.values(bySubject)) {
    group.totalHours = roundTo(group.totalHours, 1);
  }

  return {
    totalTopics: state.topics.length,
    totalHours: roundTo(totalHours, 1),
    bySubject,
  };
}

/** Drops every topic and document record. There is no per-document reset. */
export function resetTopics(state: PlannerState) {
  state.topics = [];
  state.documents = {};
}
