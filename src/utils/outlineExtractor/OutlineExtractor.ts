/**
 * Outline Extractor — one document, end to end
 *
 *   RawPage[] → collectFragments → buildFontProfile → extractTitle
 *             → classifyHeadings (title excluded) → assignLevels → OutputRecord
 *
 * Everything after PageAnalyzer is pure and synchronous; each call owns its
 * own intermediate values, so documents can be processed concurrently.
 */

import type { Configuration } from './config';
import type { HeadingLevel, OutlineResult, OutlineWarning, OutputRecord, RawPage } from './types';
import { collectFragments } from './FragmentCollector';
import { FontProfiler } from './FontProfiler';
import { extractTitle } from './TitleExtractor';
import { classifyHeadings } from './HeadingClassifier';
import { assignLevels } from './LevelAssigner';
import { extractPages } from './PageAnalyzer';
import type { ExtractOptions } from './PageAnalyzer';

/**
 * Run the classification pipeline over already-parsed pages.
 *
 * @throws UnreadableDocumentError when `pages` is empty
 * @throws ParseError when no page yields any text
 */
export function buildOutline(pages: readonly RawPage[], config: Configuration): OutlineResult {
  const doc = collectFragments(pages);

  const profiler = new FontProfiler().registerAll(doc.fragments);
  const profile = profiler.getProfile(config);
  const title = extractTitle(doc, profile, config);

  const warnings: OutlineWarning[] = [];
  if (profile.candidateSizes.length === 0) {
    const distinctSizes = profiler.getDistinctSizeCount();
    const message = distinctSizes < 2
      ? 'All text shares one font size; no headings can be ranked'
      : `No font size reaches ${config.headingSizeThreshold}x the body size (${profile.bodySize}pt)`;
    warnings.push({ kind: 'flat-document', message, distinctSizes });
    return { record: { title: title.title, outline: [] }, warnings };
  }

  const candidates = classifyHeadings(doc, profile, config, title);
  const outline = assignLevels(candidates, config);

  return { record: { title: title.title, outline }, warnings };
}

/**
 * Parse PDF bytes and build their outline. The pdfjs handle is released
 * before this resolves or rejects.
 */
export async function extractOutline(
  data: Uint8Array,
  config: Configuration,
  options: ExtractOptions = {},
): Promise<OutlineResult> {
  const pages = await extractPages(data, options);
  return buildOutline(pages, config);
}

/**
 * Deterministic JSON for an output record: keys in fixed order, two-space
 * indent, non-ASCII left as-is.
 */
export function serializeOutputRecord(record: OutputRecord): string {
  const ordered = {
    title: record.title,
    outline: record.outline.map(entry => ({
      level: entry.level,
      text: entry.text,
      page: entry.page,
    })),
  };
  return JSON.stringify(ordered, null, 2);
}

const LEVEL_INDENT: Record<HeadingLevel, string> = {
  H1: '',
  H2: '  ',
  H3: '    ',
};

/** Human-readable outline listing, one heading per line, indented by level. */
export function formatOutlineTree(record: OutputRecord): string {
  const lines = [`Title: ${record.title || '(none)'}`];
  if (record.outline.length === 0) {
    lines.push('(no headings)');
  }
  for (const entry of record.outline) {
    lines.push(`${LEVEL_INDENT[entry.level]}${entry.level} ${entry.text} (p. ${entry.page})`);
  }
  return lines.join('\n');
}
