import type { DocumentSource, DocumentStructure, SectionMarker, StructureTier } from './types';

/**
 * Titles that never denote study content. Outline entries are dropped on an
 * exact or substring match; scanned headings only on an exact match. A real
 * chapter such as "Appendix: Worked Examples" is dropped too.
 */
export const NON_CONTENT_TITLES: ReadonlySet<string> = new Set([
  'contents',
  'index',
  'bibliography',
  'references',
  'glossary',
  'acknowledgment',
  'preface',
  'foreword',
  'dedication',
  'about the author',
  'table of contents',
  'list of figures',
  'list of tables',
  'credits',
  'back cover',
  'front cover',
  'cover',
  'title page',
  'copyright',
  'copyright page',
  'appendix',
  'answers',
  'data sets',
  'websites',
  'odd-numbered',
  'even-numbered',
]);

export const HEADING_PATTERNS: readonly RegExp[] = [
  /^Chapter\s+\d+/i,
  /^Unit\s+\d+/i,
  /^Module\s+\d+/i,
  /^\d+\.\s+[A-Z][a-z]/,
];

export const MIN_OUTLINE_SECTIONS = 3;
export const MIN_HEADING_SECTIONS = 2;
export const HEADING_SCAN_LINES = 10;
export const SAMPLE_LENGTH = 1500;
const MIN_CHUNK_PAGES = 20;

function isNonContentTitle(lower: string) {
  if (NON_CONTENT_TITLES.has(lower)) return true;
  for (const skip of NON_CONTENT_TITLES) {
    if (lower.includes(skip)) return true;
  }
  return false;
}

function readPage(source: DocumentSource, pageIndex: number): string {
  try {
    return source.getPageText(pageIndex);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    console.warn(`Unreadable page ${pageIndex + 1} in ${source.filename}: ${message}`);
    return '';
  }
}

export function outlineSections(source: DocumentSource): SectionMarker[] {
  const sections: SectionMarker[] = [];
  for (const entry of source.outline) {
    const title = entry.title.trim();
    if (entry.level > 2 || title.length <= 2) continue;
    if (isNonContentTitle(title.toLowerCase())) continue;
    sections.push({ title, page: entry.page });
  }
  return sections;
}

export function scanHeadings(source: DocumentSource): SectionMarker[] {
  const sections: SectionMarker[] = [];
  const seen = new Set<string>();

  for (let pageIndex = 0; pageIndex < source.pageCount; pageIndex++) {
    const lines = readPage(source, pageIndex).split('\n').slice(0, HEADING_SCAN_LINES);
    for (const raw of lines) {
      const line = raw.trim();
      if (line.length <= 5 || line.length >= 80) continue;
      if (NON_CONTENT_TITLES.has(line.toLowerCase())) continue;
      if (!HEADING_PATTERNS.some((pattern) => pattern.test(line))) continue;
      // running headers repeat on every page; keep the first occurrence
      if (seen.has(line)) continue;
      seen.add(line);
      sections.push({ title: line, page: pageIndex + 1 });
    }
  }
  return sections;
}

export function chunkSections(pageCount: number): SectionMarker[] {
  const totalPages = Math.max(1, pageCount);
  const pagesPerChunk = Math.max(MIN_CHUNK_PAGES, Math.floor(totalPages / 10));
  const sections: SectionMarker[] = [];
  for (let start = 0; start < totalPages; start += pagesPerChunk) {
    const index = start / pagesPerChunk + 1;
    const end = Math.min(start + pagesPerChunk, totalPages);
    sections.push({ title: `Section ${index} (Pages ${start + 1}-${end})`, page: start + 1 });
  }
  return sections;
}

function sortAndDedupe(sections: SectionMarker[]): SectionMarker[] {
  const seen = new Set<string>();
  const unique: SectionMarker[] = [];
  for (const section of sections) {
    const key = `${section.page}\u0000${section.title}`;
    if (seen.has(key)) continue;
    seen.add(key);
    unique.push(section);
  }
  // Array.prototype.sort is stable, so equal pages keep discovery order
  return unique.sort((a, b) => a.page - b.page);
}

/**
 * Section boundaries of a document. The outline is used when it yields enough
 * entries; otherwise page headings are scanned and their results added; if the
 * document still has fewer than two sections it is cut into fixed page chunks.
 */
export function extractStructure(source: DocumentSource): DocumentStructure {
  const sections = outlineSections(source);
  let tier: StructureTier = 'outline';

  if (sections.length < MIN_OUTLINE_SECTIONS) {
    tier = 'headings';
    sections.push(...scanHeadings(source));
  }

  if (sections.length < MIN_HEADING_SECTIONS) {
    tier = 'chunks';
    console.warn(`No usable structure in ${source.filename}; splitting into page chunks.`);
    sections.push(...chunkSections(source.pageCount));
  }

  return { tier, sections: sortAndDedupe(sections) };
}

/** First characters of each section's start page, aligned with `sections`. */
export function sampleSections(source: DocumentSource, sections: SectionMarker[]): string[] {
  return sections.map((section) => {
    const pageIndex = section.page - 1;
    if (pageIndex < 0 || pageIndex >= source.pageCount) return '';
    return readPage(source, pageIndex).slice(0, SAMPLE_LENGTH);
  });
}
