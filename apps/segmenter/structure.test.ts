import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { chunkSections, extractStructure, outlineSections, sampleSections, scanHeadings } from './structure';
import { blankPages, createTextDocument } from './testUtils';

describe('outlineSections', () => {
  it('keeps top two levels and drops front and back matter', () => {
    const source = createTextDocument({
      pages: blankPages(30),
      outline: [
        { level: 1, title: 'Contents', page: 2 },
        { level: 1, title: '  Kinematics  ', page: 3 },
        { level: 2, title: 'Velocity', page: 5 },
        { level: 3, title: 'Worked example', page: 6 },
        { level: 1, title: 'Front Cover Art', page: 1 },
        { level: 1, title: 'IV', page: 8 },
        { level: 1, title: 'Dynamics', page: 12 },
        { level: 1, title: 'Appendix A: Tables', page: 28 },
      ],
    });

    assert.deepEqual(outlineSections(source), [
      { title: 'Kinematics', page: 3 },
      { title: 'Velocity', page: 5 },
      { title: 'Dynamics', page: 12 },
    ]);
  });
});

describe('scanHeadings', () => {
  it('matches heading patterns within the first lines of each page', () => {
    const source = createTextDocument({
      pages: [
        'Chapter 1 Motion\nSome text',
        'Physics Notes\nbody text\n1. Introduction to Forces',
        'Unit 3: Waves',
        '1. lowercase heading\nModule 4 Optics',
        'Chapter 1 Motion\nrepeated running header',
      ],
    });

    assert.deepEqual(scanHeadings(source), [
      { title: 'Chapter 1 Motion', page: 1 },
      { title: '1. Introduction to Forces', page: 2 },
      { title: 'Unit 3: Waves', page: 3 },
      { title: 'Module 4 Optics', page: 4 },
    ]);
  });

  it('ignores headings below the scanned lines', () => {
    const filler = Array.from({ length: 10 }, (_, i) => `line ${i}`).join('\n');
    const source = createTextDocument({ pages: [`${filler}\nChapter 9 Late`] });
    assert.deepEqual(scanHeadings(source), []);
  });

  it('skips pages that cannot be read', () => {
    const source = createTextDocument({
      pages: ['Chapter 1 Start', new Error('bad xref'), 'Chapter 2 Finish'],
    });
    assert.deepEqual(scanHeadings(source), [
      { title: 'Chapter 1 Start', page: 1 },
      { title: 'Chapter 2 Finish', page: 3 },
    ]);
  });
});

describe('chunkSections', () => {
  it('uses twenty page chunks for short documents', () => {
    assert.deepEqual(chunkSections(45), [
      { title: 'Section 1 (Pages 1-20)', page: 1 },
      { title: 'Section 2 (Pages 21-40)', page: 21 },
      { title: 'Section 3 (Pages 41-45)', page: 41 },
    ]);
  });

  it('uses a tenth of the page count for long documents', () => {
    const sections = chunkSections(250);
    assert.equal(sections.length, 10);
    assert.deepEqual(sections[9], { title: 'Section 10 (Pages 226-250)', page: 226 });
  });

  it('treats an empty document as a single page', () => {
    assert.deepEqual(chunkSections(0), [{ title: 'Section 1 (Pages 1-1)', page: 1 }]);
  });
});

describe('extractStructure', () => {
  it('uses the outline when it has enough entries', () => {
    const source = createTextDocument({
      pages: blankPages(20),
      outline: [
        { level: 1, title: 'Optics', page: 15 },
        { level: 1, title: 'Mechanics', page: 1 },
        { level: 1, title: 'Heat', page: 8 },
      ],
    });

    const structure = extractStructure(source);
    assert.equal(structure.tier, 'outline');
    assert.deepEqual(
      structure.sections.map((section) => section.page),
      [1, 8, 15],
    );
  });

  it('adds scanned headings to a sparse outline', () => {
    const pages = blankPages(10);
    pages[8] = 'Chapter 3 Waves';
    const source = createTextDocument({
      pages,
      outline: [
        { level: 1, title: 'Mechanics', page: 5 },
        { level: 1, title: 'Motion', page: 1 },
      ],
    });

    const structure = extractStructure(source);
    assert.equal(structure.tier, 'headings');
    assert.deepEqual(structure.sections, [
      { title: 'Motion', page: 1 },
      { title: 'Mechanics', page: 5 },
      { title: 'Chapter 3 Waves', page: 9 },
    ]);
  });

  it('falls back to page chunks when nothing else is found', () => {
    const structure = extractStructure(createTextDocument({ pages: blankPages(45) }));
    assert.equal(structure.tier, 'chunks');
    assert.equal(structure.sections.length, 3);
  });

  it('drops duplicate sections found by more than one tier', () => {
    const source = createTextDocument({
      pages: ['Chapter 1 Basics', '', 'Chapter 2 Advanced'],
      outline: [{ level: 1, title: 'Chapter 1 Basics', page: 1 }],
    });

    assert.deepEqual(extractStructure(source).sections, [
      { title: 'Chapter 1 Basics', page: 1 },
      { title: 'Chapter 2 Advanced', page: 3 },
    ]);
  });
});

describe('sampleSections', () => {
  it('returns the start page text of each section, truncated', () => {
    const source = createTextDocument({
      pages: ['x'.repeat(2000), new Error('unreadable'), 'short page'],
    });

    const samples = sampleSections(source, [
      { title: 'A', page: 1 },
      { title: 'B', page: 2 },
      { title: 'C', page: 3 },
      { title: 'D', page: 9 },
    ]);
    assert.equal(samples[0].length, 1500);
    assert.deepEqual(samples.slice(1), ['', 'short page', '']);
  });
});
