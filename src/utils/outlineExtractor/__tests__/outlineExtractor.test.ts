/**
 * Tier 2 Pipeline Tests: buildOutline over in-memory pages
 *
 * Whole-document behavior: title plus outline, running headers, flat
 * documents, ordering and serialization.
 */
import { describe, test, expect } from 'vitest';
import { buildOutline, formatOutlineTree, serializeOutputRecord } from '../OutlineExtractor';
import { resolveConfiguration } from '../config';
import { ParseError } from '../errors';
import type { OutputRecord, RawPage } from '../types';
import { bodyLines, page, raw } from './fixtures';

const config = resolveConfiguration({ concurrency: 1 });

function annualReport(): RawPage[] {
  return [
    page(1, [
      raw('Annual Report 2024', { fontSize: 24, bold: true, y: 68 }),
      raw('Section 1: Overview', { fontSize: 18, bold: true, y: 134 }),
      ...bodyLines(170, 16),
    ]),
    page(2, [
      raw('1.1 Background', { fontSize: 14, bold: true, y: 78 }),
      ...bodyLines(110, 16),
    ]),
  ];
}

function runningHeaderReport(): RawPage[] {
  const pages: RawPage[] = [];
  for (let n = 1; n <= 3; n++) {
    const fragments = [
      raw('Field Operations - Internal', { fontSize: 9, y: 23 }),
      raw(`Page ${n} of 3`, { fontSize: 9, y: 753 }),
    ];
    if (n === 1) fragments.push(raw('Field Operations Review', { fontSize: 20, bold: true, y: 82 }));
    if (n === 2) fragments.push(raw('Regional Summary', { fontSize: 16, bold: true, y: 86 }));
    fragments.push(...bodyLines(130, 12));
    pages.push(page(n, fragments));
  }
  return pages;
}

describe('buildOutline', () => {
  test('extracts the title and a two-level outline', () => {
    const { record, warnings } = buildOutline(annualReport(), config);
    expect(record).toEqual({
      title: 'Annual Report 2024',
      outline: [
        { level: 'H1', text: 'Section 1: Overview', page: 1 },
        { level: 'H2', text: '1.1 Background', page: 2 },
      ],
    });
    expect(warnings).toEqual([]);
  });

  test('running headers and footers never appear in the outline', () => {
    const { record } = buildOutline(runningHeaderReport(), config);
    expect(record).toEqual({
      title: 'Field Operations Review',
      outline: [{ level: 'H1', text: 'Regional Summary', page: 2 }],
    });
  });

  test('a flat document gives an empty outline, a best-effort title and a warning', () => {
    const { record, warnings } = buildOutline([page(1, bodyLines(100, 6)), page(2, bodyLines(100, 6))], config);
    expect(record).toEqual({
      title: 'Body text line 1 describing the quarterly results in detail.',
      outline: [],
    });
    expect(warnings).toEqual([
      {
        kind: 'flat-document',
        message: 'All text shares one font size; no headings can be ranked',
        distinctSizes: 1,
      },
    ]);
  });

  test('a small size bump below the threshold is reported as flat', () => {
    const { record, warnings } = buildOutline(
      [page(1, [raw('Slightly Larger', { fontSize: 11.5, y: 80 }), ...bodyLines(100, 6)])],
      config,
    );
    expect(record.outline).toEqual([]);
    expect(warnings.map(w => w.message)).toEqual(['No font size reaches 1.1x the body size (11pt)']);
    expect(warnings[0].distinctSizes).toBe(2);
  });

  test('headings shorter than the minimum length are dropped', () => {
    const { record } = buildOutline(
      [
        page(1, [raw('Field Guide', { fontSize: 24, y: 80 }), ...bodyLines(120, 8)]),
        page(2, [raw('AB', { fontSize: 16, y: 80 }), raw('ABC', { fontSize: 16, y: 120 }), ...bodyLines(160, 8)]),
      ],
      config,
    );
    expect(record.outline).toEqual([{ level: 'H1', text: 'ABC', page: 2 }]);
  });

  test('outline is ordered by page then vertical position', () => {
    const { record } = buildOutline(
      [
        page(1, [raw('Guide Title', { fontSize: 24, y: 80 }), ...bodyLines(200, 8), raw('Late Heading', { fontSize: 16, y: 400 }), raw('Early Heading', { fontSize: 16, y: 120 })]),
        page(2, [raw('Second Page Heading', { fontSize: 16, y: 90 }), ...bodyLines(120, 8)]),
      ],
      config,
    );
    expect(record.outline.map(e => [e.text, e.page])).toEqual([
      ['Early Heading', 1],
      ['Late Heading', 1],
      ['Second Page Heading', 2],
    ]);
  });

  test('throws ParseError when no page has text', () => {
    expect(() => buildOutline([page(1, []), page(2, [])], config)).toThrow(ParseError);
  });

  test('same input gives byte-identical JSON', () => {
    const first = serializeOutputRecord(buildOutline(annualReport(), config).record);
    const second = serializeOutputRecord(buildOutline(annualReport(), config).record);
    expect(second).toBe(first);
  });
});

describe('serializeOutputRecord', () => {
  test('writes keys in fixed order with two-space indent', () => {
    const record: OutputRecord = {
      outline: [{ page: 3, text: 'Überblick', level: 'H2' }],
      title: 'Jahresbericht',
    };
    expect(serializeOutputRecord(record)).toBe(
      [
        '{',
        '  "title": "Jahresbericht",',
        '  "outline": [',
        '    {',
        '      "level": "H2",',
        '      "text": "Überblick",',
        '      "page": 3',
        '    }',
        '  ]',
        '}',
      ].join('\n'),
    );
  });

  test('an empty outline serializes as an empty array', () => {
    expect(serializeOutputRecord({ title: '', outline: [] })).toBe('{\n  "title": "",\n  "outline": []\n}');
  });
});

describe('formatOutlineTree', () => {
  test('indents headings by level', () => {
    expect(
      formatOutlineTree({
        title: 'Annual Report 2024',
        outline: [
          { level: 'H1', text: 'Section 1: Overview', page: 1 },
          { level: 'H2', text: '1.1 Background', page: 2 },
          { level: 'H3', text: 'Scope', page: 2 },
        ],
      }),
    ).toBe(
      'Title: Annual Report 2024\n' +
      'H1 Section 1: Overview (p. 1)\n' +
      '  H2 1.1 Background (p. 2)\n' +
      '    H3 Scope (p. 2)',
    );
  });

  test('marks a missing title and an empty outline', () => {
    expect(formatOutlineTree({ title: '', outline: [] })).toBe('Title: (none)\n(no headings)');
  });
});
