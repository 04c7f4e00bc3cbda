/**
 * Level Assigner
 *
 * Maps heading candidates onto H1..H3 by size bucket and restores reading
 * order. Bucket ranking is purely by size: the largest bucket present among
 * the candidates is H1, the next H2, everything smaller H3. Levels are never
 * padded: a document with one heading size only produces H1.
 */

import type { Configuration } from './config';
import type { HeadingCandidate, HeadingLevel, OutlineEntry } from './types';
import { HEADING_LEVELS } from './types';
import { compareByPosition, normalizeText } from './fragmentUtils';

/** Two candidates closer than this (both axes, points) are one extraction duplicate */
const DUPLICATE_POSITION_TOLERANCE = 1;

/** A candidate with its level, still carrying its fragment for ordering. */
export interface LeveledCandidate {
  candidate: HeadingCandidate;
  level: HeadingLevel;
}

/** Drop overlapping-extraction duplicates: same page, same spot. First wins. */
function dropPositionDuplicates(candidates: readonly HeadingCandidate[]): HeadingCandidate[] {
  const kept: HeadingCandidate[] = [];
  for (const c of candidates) {
    const duplicate = kept.some(k =>
      k.fragment.page === c.fragment.page &&
      Math.abs(k.fragment.x - c.fragment.x) <= DUPLICATE_POSITION_TOLERANCE &&
      Math.abs(k.fragment.y - c.fragment.y) <= DUPLICATE_POSITION_TOLERANCE
    );
    if (!duplicate) kept.push(c);
  }
  return kept;
}

/**
 * Same text repeated on one page (e.g. a heading echoed in a sidebar): keep
 * the one in the larger bucket, then the higher score, then the earliest.
 */
function dropTextDuplicates(candidates: readonly HeadingCandidate[]): HeadingCandidate[] {
  const best = new Map<string, HeadingCandidate>();
  for (const c of candidates) {
    const key = `${c.fragment.page}|${normalizeText(c.fragment.text).toLowerCase()}`;
    const existing = best.get(key);
    if (
      !existing ||
      c.sizeRank < existing.sizeRank ||
      (c.sizeRank === existing.sizeRank && c.score > existing.score)
    ) {
      best.set(key, c);
    }
  }
  const winners = new Set(best.values());
  return candidates.filter(c => winners.has(c));
}

/** Distinct buckets present among the candidates, largest first. */
function rankBuckets(candidates: readonly HeadingCandidate[]): number[] {
  return [...new Set(candidates.map(c => c.bucket))].sort((a, b) => b - a);
}

function levelForRank(rank: number, maxLevels: number): HeadingLevel {
  const capped = Math.min(rank, maxLevels - 1, HEADING_LEVELS.length - 1);
  return HEADING_LEVELS[capped];
}

/**
 * Deduplicate, level and order the candidates. The result is sorted by page,
 * then top-to-bottom, regardless of the order candidates arrived in.
 */
export function assignLevelsWithCandidates(
  candidates: readonly HeadingCandidate[],
  config: Pick<Configuration, 'maxLevels'>,
): LeveledCandidate[] {
  if (candidates.length === 0) return [];

  const unique = dropTextDuplicates(dropPositionDuplicates(candidates));
  const ranking = rankBuckets(unique);

  const leveled = unique.map(candidate => ({
    candidate,
    level: levelForRank(ranking.indexOf(candidate.bucket), config.maxLevels),
  }));

  // Array.prototype.sort is stable, so equal positions keep document order.
  return leveled.sort((a, b) => compareByPosition(a.candidate.fragment, b.candidate.fragment));
}

export function assignLevels(
  candidates: readonly HeadingCandidate[],
  config: Pick<Configuration, 'maxLevels'>,
): OutlineEntry[] {
  return assignLevelsWithCandidates(candidates, config).map(({ candidate, level }) => ({
    level,
    text: normalizeText(candidate.fragment.text),
    page: candidate.fragment.page,
  }));
}

// These are exported for unit testing only. Do not use in production code.
export const _testExports = {
  dropPositionDuplicates,
  dropTextDuplicates,
  rankBuckets,
  levelForRank,
};
