/**
 * Fragment Collector
 *
 * Normalizes the parser's per-page fragment streams into one flat list of
 * line-level fragments. Parsers emit text at wildly different granularity
 * (per glyph, per word, per show-text operator); every later stage assumes
 * one fragment per visual line run.
 *
 * Consecutive fragments are merged when they share a baseline (vertical
 * offset under half an em), are separated by at most a word space, and sit in
 * the same 0.5pt size bin.
 */

import type { CollectedDocument, Fragment, PageGeometry, RawFragment, RawPage } from './types';
import { ParseError, UnreadableDocumentError } from './errors';
import { normalizeText, roundFontSize } from './fragmentUtils';

// ─── Constants ───────────────────────────────────────────────

/** Max vertical offset between fragments on one line, as a fraction of the smaller font size */
const BASELINE_TOLERANCE_EM = 0.5;

/** Max horizontal gap that still counts as a word space, in ems */
const WORD_GAP_EM = 1.0;

/** Gaps below this (in ems) mean the two fragments split a single word */
const TOUCH_GAP_EM = 0.15;

/** Overlap tolerated before two fragments are treated as separate (duplicate) runs */
const MAX_OVERLAP_EM = 0.5;

// ─── Line Builder ────────────────────────────────────────────

interface LineBuilder {
  text: string;
  page: number;
  fontSize: number;
  fontName: string;
  bold: boolean;
  italic: boolean;
  left: number;
  top: number;
  right: number;
  bottom: number;
  /** y of the most recently merged fragment */
  lastY: number;
}

function isUsable(raw: RawFragment): boolean {
  if (!raw.text || raw.text.trim().length === 0) return false;
  if (!Number.isFinite(raw.fontSize) || raw.fontSize <= 0) return false;
  return Number.isFinite(raw.x) && Number.isFinite(raw.y);
}

function startLine(raw: RawFragment, page: number): LineBuilder {
  const width = Number.isFinite(raw.width) && raw.width > 0 ? raw.width : 0;
  const height = Number.isFinite(raw.height) && raw.height > 0 ? raw.height : raw.fontSize;
  return {
    text: raw.text,
    page,
    fontSize: raw.fontSize,
    fontName: raw.fontName,
    bold: raw.bold,
    italic: raw.italic,
    left: raw.x,
    top: raw.y,
    right: raw.x + width,
    bottom: raw.y + height,
    lastY: raw.y,
  };
}

/**
 * Horizontal gap between the line's right edge and the next fragment,
 * or null when the fragment cannot continue the line.
 */
function continuationGap(line: LineBuilder, next: RawFragment): number | null {
  if (roundFontSize(line.fontSize) !== roundFontSize(next.fontSize)) return null;

  const em = Math.min(line.fontSize, next.fontSize);
  if (Math.abs(next.y - line.lastY) >= em * BASELINE_TOLERANCE_EM) return null;

  const gap = next.x - line.right;
  if (gap > em * WORD_GAP_EM) return null;
  if (gap < -em * MAX_OVERLAP_EM) return null;
  return gap;
}

function appendToLine(line: LineBuilder, next: RawFragment, gap: number): void {
  const em = Math.min(line.fontSize, next.fontSize);
  line.text = gap < em * TOUCH_GAP_EM
    ? line.text + next.text
    : `${line.text.trimEnd()} ${next.text.trimStart()}`;

  const width = Number.isFinite(next.width) && next.width > 0 ? next.width : 0;
  const height = Number.isFinite(next.height) && next.height > 0 ? next.height : next.fontSize;

  line.bold = line.bold && next.bold;
  line.italic = line.italic && next.italic;
  line.left = Math.min(line.left, next.x);
  line.top = Math.min(line.top, next.y);
  line.right = Math.max(line.right, next.x + width);
  line.bottom = Math.max(line.bottom, next.y + height);
  line.lastY = next.y;
}

function finishLine(line: LineBuilder): Fragment {
  return Object.freeze({
    text: normalizeText(line.text),
    page: line.page,
    fontSize: line.fontSize,
    fontName: line.fontName,
    bold: line.bold,
    italic: line.italic,
    x: line.left,
    y: line.top,
    width: line.right - line.left,
    height: line.bottom - line.top,
  });
}

// ─── Public API ──────────────────────────────────────────────

/** Merge one page's raw stream into line-level fragments, preserving stream order. */
export function collectPageFragments(page: RawPage): Fragment[] {
  const result: Fragment[] = [];
  let current: LineBuilder | null = null;

  for (const raw of page.fragments) {
    if (!isUsable(raw)) continue;

    if (current) {
      const gap = continuationGap(current, raw);
      if (gap !== null) {
        appendToLine(current, raw, gap);
        continue;
      }
      result.push(finishLine(current));
    }
    current = startLine(raw, page.pageNumber);
  }

  if (current) result.push(finishLine(current));
  return result;
}

/**
 * Flatten all pages into one page-tagged fragment list.
 *
 * @throws UnreadableDocumentError when there are no pages at all
 * @throws ParseError when pages exist but none yielded any text
 */
export function collectFragments(pages: readonly RawPage[]): CollectedDocument {
  if (pages.length === 0) {
    throw new UnreadableDocumentError('Document has no pages');
  }

  const fragments: Fragment[] = [];
  const geometry = new Map<number, PageGeometry>();

  for (const page of pages) {
    geometry.set(page.pageNumber, {
      pageNumber: page.pageNumber,
      width: page.width,
      height: page.height,
    });
    fragments.push(...collectPageFragments(page));
  }

  if (fragments.length === 0) {
    throw new ParseError(`No extractable text in ${pages.length} page(s)`);
  }

  return { fragments, pages: geometry };
}

// These are exported for unit testing only. Do not use in production code.
export const _testExports = {
  continuationGap,
  BASELINE_TOLERANCE_EM,
  WORD_GAP_EM,
  TOUCH_GAP_EM,
};
