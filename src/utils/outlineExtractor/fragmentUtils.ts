/**
 * Small geometry/typography helpers shared by the pipeline stages.
 */

import type { Fragment, PageGeometry } from './types';

/** Round to the nearest 0.5pt so renderer jitter (11.04 vs 10.98) lands in one bin. */
export function roundFontSize(size: number): number {
  return Math.round(size * 2) / 2;
}

/** Trimmed text with internal whitespace runs collapsed to single spaces. */
export function normalizeText(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * True when the fragment sits in the top or bottom margin band of its page.
 * Pages with unknown height never report a band hit.
 */
export function isInMarginBand(
  fragment: Fragment,
  geometry: PageGeometry | undefined,
  bandFraction: number,
): boolean {
  const pageHeight = geometry?.height;
  if (pageHeight === null || pageHeight === undefined || pageHeight <= 0) return false;
  if (bandFraction <= 0) return false;

  const band = pageHeight * bandFraction;
  const top = fragment.y;
  const bottom = fragment.y + fragment.height;
  return top < band || bottom > pageHeight - band;
}

/** Largest rounded font size per page. */
export function maxFontSizeByPage(fragments: readonly Fragment[]): Map<number, number> {
  const result = new Map<number, number>();
  for (const f of fragments) {
    const size = roundFontSize(f.fontSize);
    const current = result.get(f.page);
    if (current === undefined || size > current) result.set(f.page, size);
  }
  return result;
}

/** Reading order: page, then top-to-bottom, then left-to-right. */
export function compareByPosition(a: Fragment, b: Fragment): number {
  return a.page - b.page || a.y - b.y || a.x - b.x;
}
