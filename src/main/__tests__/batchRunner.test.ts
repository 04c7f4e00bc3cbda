/**
 * Batch runner tests: directory scan, per-document isolation, timeouts and
 * the concurrency bound. PDFs are stand-in files; a stub replaces the
 * pdfjs-backed extractor.
 */
import { describe, test, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdir, mkdtemp, readFile, readdir, rm, writeFile } from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import {
  batchExitCode,
  findOutputConflicts,
  listPdfFiles,
  outputFileName,
  runBatch,
  withTimeout,
} from '../batchRunner';
import type { DocumentExtractor } from '../batchRunner';
import { resolveConfiguration } from '../../utils/outlineExtractor/config';
import { UnreadableDocumentError } from '../../utils/outlineExtractor/errors';
import { serializeOutputRecord } from '../../utils/outlineExtractor/OutlineExtractor';
import type { OutlineResult } from '../../utils/outlineExtractor/types';

const okResult: OutlineResult = {
  record: { title: 'Stub Title', outline: [{ level: 'H1', text: 'Introduction', page: 1 }] },
  warnings: [],
};

/** Behaves according to the stand-in file's text: "ok", "fail", "flat" or "hang". */
const stubExtract: DocumentExtractor = async (data, _config, { signal }) => {
  const content = new TextDecoder().decode(data);
  if (content === 'fail') throw new UnreadableDocumentError('PDF structure is invalid: test');
  if (content === 'flat') {
    return {
      record: { title: 'Flat', outline: [] },
      warnings: [{ kind: 'flat-document', message: 'All text shares one font size; no headings can be ranked', distinctSizes: 1 }],
    };
  }
  if (content === 'hang') {
    const abortSignal = signal;
    if (!abortSignal) throw new Error('expected an abort signal');
    return new Promise<OutlineResult>((_, reject) => {
      abortSignal.addEventListener('abort', () => reject(abortSignal.reason), { once: true });
    });
  }
  return okResult;
};

let workDir: string;
let inputDir: string;
let outputDir: string;

async function writeInputs(files: Record<string, string>): Promise<void> {
  for (const [name, content] of Object.entries(files)) {
    await writeFile(path.join(inputDir, name), content);
  }
}

beforeEach(async () => {
  workDir = await mkdtemp(path.join(os.tmpdir(), 'outline-batch-'));
  inputDir = path.join(workDir, 'input');
  outputDir = path.join(workDir, 'output');
  await mkdir(inputDir, { recursive: true });
  vi.spyOn(console, 'log').mockImplementation(() => {});
  vi.spyOn(console, 'warn').mockImplementation(() => {});
  vi.spyOn(console, 'error').mockImplementation(() => {});
});

afterEach(async () => {
  vi.restoreAllMocks();
  await rm(workDir, { recursive: true, force: true });
});

describe('file naming', () => {
  test('outputFileName swaps the extension case-insensitively', () => {
    expect(outputFileName('report.pdf')).toBe('report.json');
    expect(outputFileName('SCAN.PDF')).toBe('SCAN.json');
    expect(outputFileName('my.notes.pdf')).toBe('my.notes.json');
  });

  test('listPdfFiles returns sorted *.pdf files in any case', async () => {
    await writeInputs({ 'c.pdf': 'ok', 'a.PDF': 'ok', 'b.pdf': 'ok', 'notes.txt': 'ok' });
    expect(await listPdfFiles(inputDir)).toEqual(['a.PDF', 'b.pdf', 'c.pdf']);
  });

  test('findOutputConflicts maps later inputs to the one keeping the name', () => {
    expect(findOutputConflicts(['Report.pdf', 'notes.pdf', 'report.PDF', 'report.pdf'])).toEqual(
      new Map([
        ['report.PDF', 'Report.pdf'],
        ['report.pdf', 'Report.pdf'],
      ]),
    );
    expect(findOutputConflicts(['a.pdf', 'b.pdf']).size).toBe(0);
  });
});

describe('runBatch', () => {
  test('creates missing directories and succeeds with nothing to do', async () => {
    const freshInput = path.join(workDir, 'fresh', 'input');
    const freshOutput = path.join(workDir, 'fresh', 'output');
    const summary = await runBatch({
      inputDir: freshInput,
      outputDir: freshOutput,
      config: resolveConfiguration(),
      extract: stubExtract,
    });
    expect(summary).toEqual({ total: 0, succeeded: [], failed: [], warnings: [] });
    expect(await readdir(freshInput)).toEqual([]);
    expect(await readdir(freshOutput)).toEqual([]);
    expect(batchExitCode(summary)).toBe(0);
  });

  test('writes JSON for successes and isolates failures', async () => {
    await writeInputs({ 'a.pdf': 'ok', 'b.pdf': 'fail', 'c.pdf': 'ok' });

    const summary = await runBatch({
      inputDir,
      outputDir,
      config: resolveConfiguration({ concurrency: 2 }),
      extract: stubExtract,
    });

    expect(summary.total).toBe(3);
    expect(summary.succeeded).toEqual(['a.pdf', 'c.pdf']);
    expect(summary.failed).toEqual([
      { file: 'b.pdf', error: 'UNREADABLE_DOCUMENT: PDF structure is invalid: test', code: 'UNREADABLE_DOCUMENT' },
    ]);
    expect((await readdir(outputDir)).sort()).toEqual(['a.json', 'c.json']);
    expect(await readFile(path.join(outputDir, 'a.json'), 'utf-8')).toBe(serializeOutputRecord(okResult.record));
    expect(batchExitCode(summary)).toBe(0);
  });

  test('inputs differing only in extension case fail instead of sharing one output', async () => {
    await writeInputs({ 'report.pdf': 'ok', 'report.PDF': 'ok', 'other.pdf': 'ok' });
    const extract = vi.fn<DocumentExtractor>(stubExtract);

    const summary = await runBatch({ inputDir, outputDir, config: resolveConfiguration(), extract });

    expect(summary.total).toBe(3);
    expect(summary.succeeded).toEqual(['other.pdf', 'report.PDF']);
    expect(summary.failed).toEqual([
      {
        file: 'report.pdf',
        error: 'OUTPUT_CONFLICT: Output report.json is already claimed by report.PDF',
        code: 'OUTPUT_CONFLICT',
      },
    ]);
    expect(extract).toHaveBeenCalledTimes(2);
    expect((await readdir(outputDir)).sort()).toEqual(['other.json', 'report.json']);
  });

  test('records warnings without failing the document', async () => {
    await writeInputs({ 'flat.pdf': 'flat' });

    const summary = await runBatch({ inputDir, outputDir, config: resolveConfiguration(), extract: stubExtract });
    expect(summary.succeeded).toEqual(['flat.pdf']);
    expect(summary.warnings.map(w => [w.file, w.warning.kind])).toEqual([['flat.pdf', 'flat-document']]);
    expect(await readFile(path.join(outputDir, 'flat.json'), 'utf-8')).toBe('{\n  "title": "Flat",\n  "outline": []\n}');
  });

  test('a document over its time budget fails without output', async () => {
    await writeInputs({ 'slow.pdf': 'hang' });

    const summary = await runBatch({
      inputDir,
      outputDir,
      config: resolveConfiguration({ documentTimeoutMs: 50 }),
      extract: stubExtract,
    });

    expect(summary.failed).toEqual([
      {
        file: 'slow.pdf',
        error: 'DOCUMENT_TIMEOUT: Document exceeded its 50ms processing budget',
        code: 'DOCUMENT_TIMEOUT',
      },
    ]);
    expect(await readdir(outputDir)).toEqual([]);
    expect(batchExitCode(summary)).toBe(1);
  });

  test('never runs more documents at once than the concurrency limit', async () => {
    await writeInputs({ '1.pdf': 'ok', '2.pdf': 'ok', '3.pdf': 'ok', '4.pdf': 'ok', '5.pdf': 'ok' });

    let inFlight = 0;
    let peak = 0;
    const extract = vi.fn<DocumentExtractor>(async () => {
      inFlight++;
      peak = Math.max(peak, inFlight);
      await new Promise(resolve => setTimeout(resolve, 10));
      inFlight--;
      return okResult;
    });

    const summary = await runBatch({
      inputDir,
      outputDir,
      config: resolveConfiguration({ concurrency: 2 }),
      extract,
    });

    expect(extract).toHaveBeenCalledTimes(5);
    expect(peak).toBeLessThanOrEqual(2);
    expect(summary.succeeded).toEqual(['1.pdf', '2.pdf', '3.pdf', '4.pdf', '5.pdf']);
  });
});

describe('withTimeout', () => {
  test('passes through a result that arrives in time', async () => {
    await expect(withTimeout(1000, async () => 'done')).resolves.toBe('done');
  });

  test('aborts the signal when the budget expires', async () => {
    const seen: { signal?: AbortSignal } = {};
    const pending = withTimeout(20, signal => {
      seen.signal = signal;
      return new Promise<string>(() => {});
    });
    await expect(pending).rejects.toThrow('Document exceeded its 20ms processing budget');
    expect(seen.signal?.aborted).toBe(true);
  });
});

describe('batchExitCode', () => {
  test('1 only when every document failed', () => {
    const failure = { file: 'x.pdf', error: 'boom', code: null };
    expect(batchExitCode({ total: 2, succeeded: [], failed: [failure, failure], warnings: [] })).toBe(1);
    expect(batchExitCode({ total: 2, succeeded: ['y.pdf'], failed: [failure], warnings: [] })).toBe(0);
    expect(batchExitCode({ total: 0, succeeded: [], failed: [], warnings: [] })).toBe(0);
  });
});
