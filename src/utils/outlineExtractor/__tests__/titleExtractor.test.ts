/**
 * Tier 1 Unit Tests: TitleExtractor
 */
import { describe, test, expect } from 'vitest';
import { extractTitle } from '../TitleExtractor';
import { collectFragments } from '../FragmentCollector';
import { buildFontProfile } from '../FontProfiler';
import { resolveConfiguration } from '../config';
import type { CollectedDocument, RawPage } from '../types';
import { bodyLines, fragment, page, raw } from './fixtures';

const config = resolveConfiguration({ concurrency: 1 });

function titleOf(pages: RawPage[], cfg = config) {
  const doc = collectFragments(pages);
  return extractTitle(doc, buildFontProfile(doc.fragments, cfg), cfg);
}

describe('extractTitle', () => {
  test('takes the largest text on page 1', () => {
    const result = titleOf([
      page(1, [raw('Section One', { fontSize: 18, y: 150 }), raw('Annual Report 2024', { fontSize: 24, y: 90 }), ...bodyLines(200, 8)]),
    ]);
    expect(result.title).toBe('Annual Report 2024');
    expect(result.fragments).toHaveLength(1);
  });

  test('joins consecutive largest-size lines into one title', () => {
    const result = titleOf([
      page(1, [
        raw('Quarterly Budget', { fontSize: 24, y: 100 }),
        raw('Planning Guide', { fontSize: 24, y: 130 }),
        ...bodyLines(200, 8),
      ]),
    ]);
    expect(result.title).toBe('Quarterly Budget Planning Guide');
    expect(result.fragments).toHaveLength(2);
  });

  test('a wide vertical gap ends the title', () => {
    const result = titleOf([
      page(1, [
        raw('Quarterly Budget', { fontSize: 24, y: 100 }),
        raw('Far Below', { fontSize: 24, y: 300 }),
        ...bodyLines(340, 8),
      ]),
    ]);
    expect(result.title).toBe('Quarterly Budget');
  });

  test('an intervening smaller line ends the title', () => {
    const result = titleOf([
      page(1, [
        raw('Quarterly Budget', { fontSize: 24, y: 100 }),
        raw('prepared by the finance team', { y: 126 }),
        raw('Planning Guide', { fontSize: 24, y: 140 }),
        ...bodyLines(200, 8),
      ]),
    ]);
    expect(result.title).toBe('Quarterly Budget');
  });

  test('stops joining once the title would exceed the maximum length', () => {
    const result = titleOf(
      [
        page(1, [
          raw('Quarterly Budget', { fontSize: 24, y: 100 }),
          raw('Planning Guide', { fontSize: 24, y: 130 }),
          ...bodyLines(200, 8),
        ]),
      ],
      { ...config, maxHeadingLength: 20 },
    );
    expect(result.title).toBe('Quarterly Budget');
  });

  test('skips largest-size text in the header band', () => {
    const result = titleOf([
      page(1, [
        raw('Company Confidential', { fontSize: 24, y: 10 }),
        raw('Strategy Update', { fontSize: 24, y: 150 }),
        ...bodyLines(200, 8),
      ]),
    ]);
    expect(result.title).toBe('Strategy Update');
  });

  test('falls back to band text when nothing else is largest', () => {
    const result = titleOf([
      page(1, [raw('Banner Title', { fontSize: 24, y: 10 }), ...bodyLines(200, 8)]),
    ]);
    expect(result.title).toBe('Banner Title');
  });

  test('a flat first page yields only its first line', () => {
    const result = titleOf([page(1, bodyLines(100, 3))]);
    expect(result.title).toBe('Body text line 1 describing the quarterly results in detail.');
    expect(result.fragments).toHaveLength(1);
  });

  test('no page-1 text yields an empty title', () => {
    const doc: CollectedDocument = {
      fragments: [fragment('Only on page two', { page: 2 })],
      pages: new Map([[2, { pageNumber: 2, width: 612, height: 792 }]]),
    };
    const result = extractTitle(doc, buildFontProfile(doc.fragments, config), config);
    expect(result).toEqual({ title: '', fragments: [] });
  });
});
