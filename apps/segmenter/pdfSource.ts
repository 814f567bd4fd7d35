import type { PDFDocumentProxy } from 'pdfjs-dist/types/src/display/api';
import type { DocumentSource, OutlineEntry } from './types';

type OutlineNode = {
  title: string;
  dest: string | unknown[] | null;
  items: OutlineNode[];
};

type PageRef = { num: number; gen: number };

function isPageRef(value: unknown): value is PageRef {
  return (
    typeof value === 'object' &&
    value !== null &&
    'num' in value &&
    'gen' in value &&
    typeof value.num === 'number' &&
    typeof value.gen === 'number'
  );
}

async function resolveDestinationPage(pdf: PDFDocumentProxy, dest: OutlineNode['dest']): Promise<number | null> {
  const explicit = typeof dest === 'string' ? await pdf.getDestination(dest) : dest;
  if (!Array.isArray(explicit) || explicit.length === 0) return null;
  const target: unknown = explicit[0];
  if (typeof target === 'number') return target + 1;
  if (isPageRef(target)) return (await pdf.getPageIndex(target)) + 1;
  return null;
}

async function flattenOutline(pdf: PDFDocumentProxy): Promise<OutlineEntry[]> {
  const roots: OutlineNode[] | null = await pdf.getOutline();
  const entries: OutlineEntry[] = [];

  async function visit(nodes: OutlineNode[], level: number) {
    for (const node of nodes) {
      try {
        const page = await resolveDestinationPage(pdf, node.dest);
        if (page !== null) {
          entries.push({ level, title: node.title, page });
        }
      } catch (err) {
        console.warn(`Skipping outline entry "${node.title}"`, err);
      }
      if (node.items?.length) await visit(node.items, level + 1);
    }
  }

  await visit(roots ?? [], 1);
  return entries;
}

async function readPageText(pdf: PDFDocumentProxy, pageNumber: number): Promise<string> {
  const page = await pdf.getPage(pageNumber);
  const content = await page.getTextContent();
  let text = '';
  for (const item of content.items) {
    if (!('str' in item)) continue;
    text += item.str;
    if (item.hasEOL) text += '\n';
  }
  return text;
}

/**
 * Loads a PDF into memory: every page's text plus the flattened outline.
 * Pages that fail to parse throw from `getPageText`, which the segmenter
 * degrades to an empty sample.
 */
export async function loadPdfSource(filename: string, data: Uint8Array): Promise<DocumentSource> {
  const { getDocument } = await import('pdfjs-dist/legacy/build/pdf.mjs');
  const pdf = await getDocument({ data, useSystemFonts: true, isEvalSupported: false }).promise;

  try {
    const pageTexts: Array<string | Error> = [];
    for (let pageNumber = 1; pageNumber <= pdf.numPages; pageNumber++) {
      try {
        pageTexts.push(await readPageText(pdf, pageNumber));
      } catch (err) {
        pageTexts.push(err instanceof Error ? err : new Error(String(err)));
      }
    }

    let outline: OutlineEntry[] = [];
    try {
      outline = await flattenOutline(pdf);
    } catch (err) {
      console.warn(`Outline of ${filename} could not be read`, err);
    }

    return {
      filename,
      pageCount: pdf.numPages,
      outline,
      getPageText(pageIndex) {
        const text = pageTexts[pageIndex];
        if (text instanceof Error) throw text;
        return text ?? '';
      },
    };
  } finally {
    await pdf.destroy();
  }
}
