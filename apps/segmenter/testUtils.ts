import type { DocumentSource, OutlineEntry } from './types';

export type TextDocumentInput = {
  filename?: string;
  pages: Array<string | Error>;
  outline?: OutlineEntry[];
};

/** In-memory document; an Error in `pages` makes that page unreadable. */
export function createTextDocument({ filename = 'notes.pdf', pages, outline = [] }: TextDocumentInput): DocumentSource {
  return {
    filename,
    pageCount: pages.length,
    outline,
    getPageText(pageIndex: number) {
      const page = pages[pageIndex];
      if (page instanceof Error) throw page;
      return page ?? '';
    },
  };
}

export function blankPages(count: number): string[] {
  return Array.from({ length: count }, () => '');
}
