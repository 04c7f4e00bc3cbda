/**
 * Heading Classifier
 *
 * Decides which fragments are heading candidates. Eligibility is a set of
 * hard filters (size bucket, length, margin band, alignment, not-the-title);
 * the score is a weighted sum of independent signals and only orders
 * candidates that share a size bucket. It never moves a fragment between
 * buckets or levels.
 */

import type { Configuration } from './config';
import type {
  CollectedDocument,
  FontProfile,
  Fragment,
  HeadingCandidate,
  PageGeometry,
  TitleResult,
} from './types';
import { bucketFor, isFlatProfile } from './FontProfiler';
import { isInMarginBand, maxFontSizeByPage, normalizeText, roundFontSize } from './fragmentUtils';

// ─── Constants ───────────────────────────────────────────────

/** Slack around the body-text left margin, in points */
const LEFT_MARGIN_TOLERANCE = 12;

/** Deepest indent (from the body margin) still treated as left-aligned: one inch */
const MAX_INDENT = 72;

/** A line is centered when its midpoint is within this fraction of page width from the page center */
const CENTER_TOLERANCE_FRACTION = 0.05;

/** All-caps bonus only applies to short text; long all-caps runs are usually legal boilerplate */
const ALL_CAPS_MAX_LENGTH = 60;

const NUMBERING_PATTERNS: readonly RegExp[] = [
  /^\d+(\.\d+)*\.?\s+\S/,            // 1. Intro / 1.1 Background / 2.3.1 Scope
  /^[IVXLC]+\.\s+\S/,                 // IV. Results
  /^(chapter|section|part|appendix)\b/i,
];

const SECTION_KEYWORDS: readonly string[] = [
  'abstract',
  'introduction',
  'background',
  'overview',
  'methodology',
  'methods',
  'results',
  'discussion',
  'conclusion',
  'conclusions',
  'summary',
  'references',
  'acknowledgements',
];

const KEYWORD_PATTERN = new RegExp(`\\b(${SECTION_KEYWORDS.join('|')})\\b`, 'i');

// ─── Score Signals ───────────────────────────────────────────
// Each signal is a pure function of the fragment (and profile where needed).

/** Up to 0.4, growing with how much larger than body text the fragment is */
export function sizeRatioSignal(fragment: Fragment, profile: FontProfile): number {
  if (profile.bodySize <= 0) return 0;
  const ratio = roundFontSize(fragment.fontSize) / profile.bodySize;
  return Math.max(0, Math.min(ratio - 1, 1)) * 0.4;
}

export function boldSignal(fragment: Fragment): number {
  return fragment.bold ? 0.3 : 0;
}

export function italicSignal(fragment: Fragment): number {
  return fragment.italic ? 0.05 : 0;
}

/** "1.", "1.1", "IV.", "Chapter", "Section", "Part", "Appendix" prefixes */
export function numberingSignal(fragment: Fragment): number {
  const text = fragment.text.trim();
  return NUMBERING_PATTERNS.some(p => p.test(text)) ? 0.2 : 0;
}

export function allCapsSignal(fragment: Fragment): number {
  const text = fragment.text.trim();
  if (text.length === 0 || text.length > ALL_CAPS_MAX_LENGTH) return 0;
  if (!/[A-Z]/.test(text)) return 0;
  return text === text.toUpperCase() ? 0.1 : 0;
}

/** Common section names: Introduction, Conclusion, References, ... */
export function keywordSignal(fragment: Fragment): number {
  return KEYWORD_PATTERN.test(fragment.text) ? 0.1 : 0;
}

/** Headings are typically a short phrase, not a single token or a sentence */
export function lengthSignal(fragment: Fragment): number {
  const length = fragment.text.trim().length;
  return length >= 10 && length <= 80 ? 0.1 : 0;
}

/** Combined heading likelihood in [0, 1]. */
export function scoreFragment(fragment: Fragment, profile: FontProfile): number {
  const total =
    sizeRatioSignal(fragment, profile) +
    boldSignal(fragment) +
    italicSignal(fragment) +
    numberingSignal(fragment) +
    allCapsSignal(fragment) +
    keywordSignal(fragment) +
    lengthSignal(fragment);
  return Math.min(total, 1);
}

// ─── Eligibility Filters ─────────────────────────────────────

function isWithinLengthBounds(
  fragment: Fragment,
  config: Pick<Configuration, 'minHeadingLength' | 'maxHeadingLength'>,
): boolean {
  const length = fragment.text.trim().length;
  return length >= config.minHeadingLength && length <= config.maxHeadingLength;
}

/**
 * Most common (rounded) left edge of body-size text per page. Pages without
 * body text fall back to the document-wide value; null when there is none.
 */
function computeBodyLeftMargins(
  fragments: readonly Fragment[],
  bodySize: number,
): { byPage: Map<number, number>; document: number | null } {
  const perPage = new Map<number, Map<number, number>>();
  const overall = new Map<number, number>();

  for (const f of fragments) {
    if (roundFontSize(f.fontSize) !== bodySize) continue;
    const x = Math.round(f.x);
    let counts = perPage.get(f.page);
    if (!counts) {
      counts = new Map();
      perPage.set(f.page, counts);
    }
    counts.set(x, (counts.get(x) ?? 0) + 1);
    overall.set(x, (overall.get(x) ?? 0) + 1);
  }

  const byPage = new Map<number, number>();
  for (const [page, counts] of perPage) {
    const mode = modeOf(counts);
    if (mode !== null) byPage.set(page, mode);
  }

  return { byPage, document: modeOf(overall) };
}

/** Key with the highest count; ties go to the smaller key. */
function modeOf(counts: Map<number, number>): number | null {
  let best: number | null = null;
  let bestCount = 0;
  for (const [key, count] of counts) {
    if (count > bestCount || (count === bestCount && best !== null && key < best)) {
      best = key;
      bestCount = count;
    }
  }
  return best;
}

/**
 * Left-aligned (or indented up to an inch) relative to the body margin, or
 * centered on the page. Right-aligned and floating text fails. Each check is
 * skipped when the information it needs is missing.
 */
function isAlignedWithBody(
  fragment: Fragment,
  leftMargin: number | null,
  geometry: PageGeometry | undefined,
): boolean {
  if (leftMargin === null) return true;

  if (fragment.x >= leftMargin - LEFT_MARGIN_TOLERANCE && fragment.x <= leftMargin + MAX_INDENT) {
    return true;
  }

  const pageWidth = geometry?.width;
  if (pageWidth === null || pageWidth === undefined || pageWidth <= 0) return true;

  const midpoint = fragment.x + fragment.width / 2;
  return Math.abs(midpoint - pageWidth / 2) <= pageWidth * CENTER_TOLERANCE_FRACTION;
}

// ─── Main Entry Point ────────────────────────────────────────

/**
 * Return heading candidates in document (collection) order.
 * An empty result is a valid outcome, not an error.
 *
 * @param title  fragments already claimed by the title are never headings
 */
export function classifyHeadings(
  doc: CollectedDocument,
  profile: FontProfile,
  config: Configuration,
  title?: TitleResult,
): HeadingCandidate[] {
  if (isFlatProfile(profile)) return [];

  const maxByPage = maxFontSizeByPage(doc.fragments);
  const margins = computeBodyLeftMargins(doc.fragments, profile.bodySize);
  const titleFragments = new Set<Fragment>(title?.fragments ?? []);
  const titleText = title ? normalizeText(title.title) : '';

  const candidates: HeadingCandidate[] = [];

  for (const fragment of doc.fragments) {
    const bucket = bucketFor(fragment.fontSize, profile);
    if (bucket === null) continue;

    if (!isWithinLengthBounds(fragment, config)) continue;

    if (titleFragments.has(fragment)) continue;
    if (titleText.length > 0 && normalizeText(fragment.text) === titleText) continue;

    const geometry = doc.pages.get(fragment.page);
    if (isInMarginBand(fragment, geometry, config.marginBandFraction)) {
      const isLargestOnPage = roundFontSize(fragment.fontSize) === maxByPage.get(fragment.page);
      if (!isLargestOnPage) continue;
    }

    const leftMargin = margins.byPage.get(fragment.page) ?? margins.document;
    if (!isAlignedWithBody(fragment, leftMargin, geometry)) continue;

    candidates.push({
      fragment,
      score: scoreFragment(fragment, profile),
      sizeRank: profile.candidateSizes.indexOf(bucket),
      bucket,
    });
  }

  return candidates;
}

// These are exported for unit testing only. Do not use in production code.
export const _testExports = {
  computeBodyLeftMargins,
  isAlignedWithBody,
  isWithinLengthBounds,
  modeOf,
};
