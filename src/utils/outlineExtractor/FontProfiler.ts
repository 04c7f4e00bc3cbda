/**
 * Font Profiler
 *
 * Builds the document-wide font-size histogram and derives the body text
 * size plus the set of larger "heading candidate" sizes.
 *
 * The histogram is weighted by character count, not fragment count: a
 * 40-line body paragraph outweighs twenty one-word captions, and a single
 * large heading does not get drowned out by the number of small fragments.
 */

import type { Configuration } from './config';
import type { Fragment, FontProfile } from './types';
import { roundFontSize } from './fragmentUtils';

export class FontProfiler {
  private histogram: Map<number, number> = new Map();

  /** Count a fragment's characters under its rounded font size. */
  register(fragment: Fragment): void {
    const chars = fragment.text.trim().length;
    if (chars === 0) return;
    const size = roundFontSize(fragment.fontSize);
    this.histogram.set(size, (this.histogram.get(size) ?? 0) + chars);
  }

  registerAll(fragments: readonly Fragment[]): this {
    for (const f of fragments) this.register(f);
    return this;
  }

  /**
   * The size carrying the most characters. Ties go to the smaller size,
   * since body text is rarely the larger of two equally common sizes.
   * Returns 0 when nothing has been registered.
   */
  getBodySize(): number {
    let bodySize = 0;
    let maxCount = 0;
    for (const [size, count] of this.histogram) {
      if (count > maxCount || (count === maxCount && size < bodySize)) {
        maxCount = count;
        bodySize = size;
      }
    }
    return bodySize;
  }

  getDistinctSizeCount(): number {
    return this.histogram.size;
  }

  getProfile(config: Pick<Configuration, 'headingSizeThreshold' | 'sizeBucketEpsilon'>): FontProfile {
    const bodySize = this.getBodySize();
    const sizeHistogram = new Map(this.histogram);

    // A flat document (one size) has nothing to rank headings against.
    if (this.histogram.size < 2) {
      return { bodySize, candidateSizes: [], sizeHistogram, sizeBuckets: new Map() };
    }

    const minCandidate = bodySize * config.headingSizeThreshold;
    const eligible = [...this.histogram.keys()].filter(s => s > bodySize && s >= minCandidate);
    const clusters = clusterSizes(eligible, config.sizeBucketEpsilon);

    const candidateSizes: number[] = [];
    const sizeBuckets = new Map<number, number>();
    for (const cluster of clusters) {
      const representative = cluster[0];
      candidateSizes.push(representative);
      for (const member of cluster) sizeBuckets.set(member, representative);
    }

    return { bodySize, candidateSizes, sizeHistogram, sizeBuckets };
  }
}

/**
 * Group sizes into buckets, largest first. A size joins the current bucket
 * when it is within `epsilon` of that bucket's largest member.
 */
function clusterSizes(sizes: number[], epsilon: number): number[][] {
  const sorted = [...new Set(sizes)].sort((a, b) => b - a);
  const clusters: number[][] = [];

  for (const size of sorted) {
    const last = clusters[clusters.length - 1];
    if (last !== undefined && last[0] - size <= epsilon) {
      last.push(size);
    } else {
      clusters.push([size]);
    }
  }

  return clusters;
}

export function buildFontProfile(
  fragments: readonly Fragment[],
  config: Pick<Configuration, 'headingSizeThreshold' | 'sizeBucketEpsilon'>,
): FontProfile {
  return new FontProfiler().registerAll(fragments).getProfile(config);
}

/** Candidate bucket a font size belongs to, or null when it is not heading-sized. */
export function bucketFor(fontSize: number, profile: FontProfile): number | null {
  return profile.sizeBuckets.get(roundFontSize(fontSize)) ?? null;
}

/** True when the profile leaves no room for headings. */
export function isFlatProfile(profile: FontProfile): boolean {
  return profile.candidateSizes.length === 0;
}

// These are exported for unit testing only. Do not use in production code.
export const _testExports = {
  clusterSizes,
};
