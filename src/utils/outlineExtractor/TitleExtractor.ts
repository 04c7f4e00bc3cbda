/**
 * Title Extractor
 *
 * The title is the largest text on page 1, outside the header/footer bands.
 * Multi-line titles are rejoined by taking the run of consecutive
 * largest-size lines in vertical order. Never throws: a page with nothing
 * usable yields an empty title.
 */

import type { Configuration } from './config';
import type { CollectedDocument, FontProfile, Fragment, TitleResult } from './types';
import { compareByPosition, isInMarginBand, normalizeText, roundFontSize } from './fragmentUtils';

const TITLE_PAGE = 1;

/** A vertical gap larger than this many font sizes ends a multi-line title */
const MAX_TITLE_LINE_GAP_EM = 2;

function emptyTitle(): TitleResult {
  return { title: '', fragments: [] };
}

export function extractTitle(
  doc: CollectedDocument,
  profile: FontProfile,
  config: Pick<Configuration, 'marginBandFraction' | 'maxHeadingLength'>,
): TitleResult {
  const pageFragments = doc.fragments
    .filter(f => f.page === TITLE_PAGE)
    .sort(compareByPosition);
  if (pageFragments.length === 0) return emptyTitle();

  const maxSize = Math.max(...pageFragments.map(f => roundFontSize(f.fontSize)));
  const largest = pageFragments.filter(f => roundFontSize(f.fontSize) === maxSize);

  const geometry = doc.pages.get(TITLE_PAGE);
  const outsideBands = largest.filter(f => !isInMarginBand(f, geometry, config.marginBandFraction));
  const candidates = new Set<Fragment>(outsideBands.length > 0 ? outsideBands : largest);

  // Nothing on the page stands out from body text: take one line, best effort.
  const singleLineOnly = maxSize <= profile.bodySize;

  const run: Fragment[] = [];
  for (const fragment of pageFragments) {
    if (run.length === 0) {
      if (candidates.has(fragment)) run.push(fragment);
      continue;
    }

    if (singleLineOnly || !candidates.has(fragment)) break;

    const previous = run[run.length - 1];
    const gap = fragment.y - (previous.y + previous.height);
    if (gap > fragment.fontSize * MAX_TITLE_LINE_GAP_EM) break;

    const joinedLength = normalizeText([...run, fragment].map(f => f.text).join(' ')).length;
    if (joinedLength > config.maxHeadingLength) break;

    run.push(fragment);
  }

  if (run.length === 0) return emptyTitle();
  return {
    title: normalizeText(run.map(f => f.text).join(' ')),
    fragments: run,
  };
}
