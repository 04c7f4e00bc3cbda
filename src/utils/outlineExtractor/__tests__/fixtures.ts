/**
 * In-memory fragment builders for the outline pipeline tests.
 * Coordinates are top-left origin on a 612x792 (US Letter) page.
 */
import type { Fragment, HeadingCandidate, RawFragment, RawPage } from '../types';

export const LETTER_WIDTH = 612;
export const LETTER_HEIGHT = 792;

export function raw(text: string, overrides: Partial<RawFragment> = {}): RawFragment {
  const fontSize = overrides.fontSize ?? 11;
  return {
    text,
    fontSize,
    fontName: 'Helvetica',
    bold: false,
    italic: false,
    x: 72,
    y: 100,
    width: text.length * fontSize * 0.5,
    height: fontSize,
    ...overrides,
  };
}

export function fragment(text: string, overrides: Partial<Fragment> = {}): Fragment {
  const fontSize = overrides.fontSize ?? 11;
  return {
    text,
    page: 1,
    fontSize,
    fontName: 'Helvetica',
    bold: false,
    italic: false,
    x: 72,
    y: 100,
    width: text.length * fontSize * 0.5,
    height: fontSize,
    ...overrides,
  };
}

export function page(pageNumber: number, fragments: RawFragment[]): RawPage {
  return { pageNumber, width: LETTER_WIDTH, height: LETTER_HEIGHT, fragments };
}

/** `count` 11pt body lines at x=72, 16pt apart, starting at `startY`. */
export function bodyLines(startY: number, count: number): RawFragment[] {
  const lines: RawFragment[] = [];
  for (let i = 0; i < count; i++) {
    lines.push(raw(`Body text line ${i + 1} describing the quarterly results in detail.`, { y: startY + i * 16 }));
  }
  return lines;
}

export function candidate(
  text: string,
  bucket: number,
  sizeRank: number,
  overrides: Partial<Fragment> = {},
  score = 0.5,
): HeadingCandidate {
  return {
    fragment: fragment(text, { fontSize: bucket, ...overrides }),
    score,
    sizeRank,
    bucket,
  };
}
