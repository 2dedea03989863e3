/**
 * Support Knowledge Assistant - Text Chunking
 * ===========================================
 * Heading-based section splitting plus a length-bounded sub-splitter.
 */

// ============================================
// CONFIGURATION
// ============================================

export const INTRODUCTION_TITLE = 'Introduction';
export const DEFAULT_MAX_LENGTH = 500;
export const DEFAULT_OVERLAP = 50;

// How far back from a hard cut we look for a sentence end
const SENTENCE_LOOKBACK = 100;
const SENTENCE_ENDINGS = new Set(['.', '!', '?', '\n']);
const HEADING_PATTERN = /^(#{1,6})\s+(\S.*)$/;

export interface Section {
  title: string;
  content: string;
}

// ============================================
// SECTION SPLITTING
// ============================================

/**
 * Split markdown into sections at headings (# through ######).
 * Text before the first heading is titled "Introduction"; whitespace-only sections are dropped.
 */
export function splitByHeadings(content: string): Section[] {
  const sections: Section[] = [];
  let currentTitle = INTRODUCTION_TITLE;
  let currentContent = '';

  for (const rawLine of content.split('\n')) {
    const line = rawLine.endsWith('\r') ? rawLine.slice(0, -1) : rawLine;
    const heading = HEADING_PATTERN.exec(line);

    if (heading) {
      if (currentContent.trim()) {
        sections.push({ title: currentTitle, content: currentContent });
      }
      currentTitle = heading[2].trim();
      currentContent = '';
    } else {
      currentContent += line + '\n';
    }
  }

  if (currentContent.trim()) {
    sections.push({ title: currentTitle, content: currentContent });
  }

  return sections;
}

// ============================================
// LENGTH-BOUNDED CHUNKING
// ============================================

/**
 * Cut text into overlapping pieces of at most maxLength characters (+1 when a
 * cut lands just after a sentence end found within the lookback window).
 */
export function chunkByLength(
  text: string,
  maxLength = DEFAULT_MAX_LENGTH,
  overlap = DEFAULT_OVERLAP
): string[] {
  if (!Number.isInteger(maxLength) || maxLength <= 0) {
    throw new RangeError(`maxLength must be a positive integer, got ${maxLength}`);
  }
  if (!Number.isInteger(overlap) || overlap < 0 || overlap >= maxLength) {
    throw new RangeError(`overlap must be in [0, maxLength), got ${overlap}`);
  }

  if (text.length <= maxLength) {
    return [text];
  }

  const chunks: string[] = [];
  let start = 0;

  while (start < text.length) {
    let end = start + maxLength;

    if (end < text.length) {
      // Never cut inside the overlap, or the next chunk would start where this one did
      const lowerBound = Math.max(end - SENTENCE_LOOKBACK, start + overlap);
      for (let i = end; i > lowerBound; i--) {
        if (SENTENCE_ENDINGS.has(text[i])) {
          end = i + 1;
          break;
        }
      }
    }

    const chunk = text.slice(start, end).trim();
    if (chunk) {
      chunks.push(chunk);
    }

    // Stop at the end of the text; a tail holding only the overlap is not emitted
    if (end >= text.length) {
      break;
    }

    start = Math.max(end - overlap, start + 1);
  }

  return chunks;
}
