/**
 * Tests Chunker - Support Knowledge Assistant
 */

import { describe, it, expect } from 'vitest';
import { splitByHeadings, chunkByLength, INTRODUCTION_TITLE } from '@/ai/rag/chunker';

describe('splitByHeadings', () => {
  it('creates one section per heading with the text up to the next heading', () => {
    const text = [
      '# Title',
      '',
      '## Section A',
      'Content A',
      '',
      '## Section B',
      'Content B',
      '',
      '### Subsection B.1',
      'Content B.1',
    ].join('\n');

    const sections = splitByHeadings(text);

    expect(sections.map((s) => s.title)).toEqual(['Section A', 'Section B', 'Subsection B.1']);
    expect(sections.map((s) => s.content.trim())).toEqual(['Content A', 'Content B', 'Content B.1']);
  });

  it('titles text before the first heading "Introduction"', () => {
    const sections = splitByHeadings('Welcome text\n# Heading\nBody');

    expect(sections).toEqual([
      { title: INTRODUCTION_TITLE, content: 'Welcome text\n' },
      { title: 'Heading', content: 'Body\n' },
    ]);
  });

  it('drops sections with only whitespace', () => {
    const sections = splitByHeadings('# Empty\n   \n\n# Full\ntext');

    expect(sections).toEqual([{ title: 'Full', content: 'text\n' }]);
  });

  it('does not treat "#word" or seven hashes as headings', () => {
    const sections = splitByHeadings('#hashtag line\n####### not a heading');

    expect(sections).toHaveLength(1);
    expect(sections[0].title).toBe(INTRODUCTION_TITLE);
    expect(sections[0].content).toBe('#hashtag line\n####### not a heading\n');
  });

  it('does not treat a line of hashes and spaces as a heading', () => {
    const sections = splitByHeadings('#   \nbody text\n');

    expect(sections).toEqual([{ title: INTRODUCTION_TITLE, content: '#   \nbody text\n\n' }]);
  });

  it('handles CRLF line endings', () => {
    const sections = splitByHeadings('# Windows\r\nline one\r\nline two');

    expect(sections).toEqual([{ title: 'Windows', content: 'line one\nline two\n' }]);
  });

  it('returns nothing for an empty document', () => {
    expect(splitByHeadings('')).toEqual([]);
  });
});

describe('chunkByLength', () => {
  it('returns short text as a single chunk', () => {
    expect(chunkByLength('short', 500)).toEqual(['short']);
  });

  it('cuts long text without sentence ends at the hard boundary, with overlap and no overlap-only tail', () => {
    const chunks = chunkByLength('x'.repeat(1000), 100, 10);

    expect(chunks).toHaveLength(11);
    expect(chunks.every((c) => c.length === 100)).toBe(true);
  });

  it('cuts just after a sentence end found in the lookback window', () => {
    const text = 'A'.repeat(50) + '.' + 'B'.repeat(100);

    const chunks = chunkByLength(text, 100, 10);

    expect(chunks).toEqual(['A'.repeat(50) + '.', 'A'.repeat(9) + '.' + 'B'.repeat(90), 'B'.repeat(20)]);
  });

  it('never returns a chunk longer than maxLength + 1', () => {
    const text = 'One sentence here. Another one follows! Is this a question? '.repeat(40);

    const chunks = chunkByLength(text, 120, 20);

    expect(chunks.length).toBeGreaterThan(1);
    expect(chunks.every((c) => c.length <= 121)).toBe(true);
  });

  it('rejects an overlap that is not smaller than maxLength', () => {
    expect(() => chunkByLength('text', 10, 10)).toThrow(RangeError);
  });

  it('rejects a non-positive maxLength', () => {
    expect(() => chunkByLength('text', 0, 0)).toThrow(RangeError);
  });
});
