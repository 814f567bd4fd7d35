export type OutlineEntry = {
  /** 1 = top level. */
  level: number;
  title: string;
  /** 1-based page number the entry points at. */
  page: number;
};

/**
 * Page-addressable view of a loaded document. `getPageText` takes a 0-based
 * index and may throw for a page that could not be read.
 */
export interface DocumentSource {
  filename: string;
  pageCount: number;
  outline: OutlineEntry[];
  getPageText(pageIndex: number): string;
}

export type SectionMarker = {
  title: string;
  page: number;
};

export type StructureTier = 'outline' | 'headings' | 'chunks';

export type DocumentStructure = {
  tier: StructureTier;
  sections: SectionMarker[];
};
