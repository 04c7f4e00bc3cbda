/**
 * Batch Runner
 *
 * Walks an input directory, extracts every PDF through a bounded pool, and
 * writes one `<basename>.json` per successful document. A failing or
 * timed-out document is logged and recorded in the summary; it never stops
 * the batch and never leaves an output file behind.
 */

import { mkdir, readdir, readFile, writeFile } from 'fs/promises';
import path from 'path';
import type { Configuration } from '../utils/outlineExtractor/config';
import type { ExtractOptions } from '../utils/outlineExtractor/PageAnalyzer';
import type { OutlineErrorCode } from '../utils/outlineExtractor/errors';
import type { OutlineResult, OutlineWarning } from '../utils/outlineExtractor/types';
import { DocumentTimeoutError, OutlineError, OutputConflictError, describeError } from '../utils/outlineExtractor/errors';
import { extractOutline, serializeOutputRecord } from '../utils/outlineExtractor/OutlineExtractor';

export type DocumentExtractor = (
  data: Uint8Array,
  config: Configuration,
  options: ExtractOptions,
) => Promise<OutlineResult>;

export interface BatchOptions {
  inputDir: string;
  outputDir: string;
  config: Configuration;
  /** Replaces the pdfjs-backed extractor (tests) */
  extract?: DocumentExtractor;
  /** Called after a document's JSON has been written */
  onDocument?: (file: string, result: OutlineResult) => void;
}

export interface DocumentFailure {
  file: string;
  error: string;
  code: OutlineErrorCode | null;
}

export interface DocumentWarning {
  file: string;
  warning: OutlineWarning;
}

export interface BatchSummary {
  /** PDF files found in the input directory */
  total: number;
  /** Input file names whose JSON was written */
  succeeded: string[];
  failed: DocumentFailure[];
  warnings: DocumentWarning[];
}

/** `*.pdf` files (any case) directly inside `dir`, in sorted name order. */
export async function listPdfFiles(dir: string): Promise<string[]> {
  const entries = await readdir(dir, { withFileTypes: true });
  return entries
    .filter(entry => entry.isFile() && /\.pdf$/i.test(entry.name))
    .map(entry => entry.name)
    .sort();
}

/** `report.PDF` → `report.json` */
export function outputFileName(pdfName: string): string {
  return `${pdfName.replace(/\.pdf$/i, '')}.json`;
}

/**
 * Inputs whose output name collides, ignoring case, with an earlier input's
 * (`report.pdf` and `report.PDF`). Maps each losing file to the file that
 * keeps the name; the first in sorted order wins.
 */
export function findOutputConflicts(files: readonly string[]): Map<string, string> {
  const claimedBy = new Map<string, string>();
  const conflicts = new Map<string, string>();
  for (const file of files) {
    const key = outputFileName(file).toLowerCase();
    const owner = claimedBy.get(key);
    if (owner === undefined) {
      claimedBy.set(key, file);
    } else {
      conflicts.set(file, owner);
    }
  }
  return conflicts;
}

/**
 * Run `work` with a wall-clock budget. On expiry the signal handed to `work`
 * is aborted and the returned promise rejects with DocumentTimeoutError,
 * without waiting for `work` to notice.
 */
export async function withTimeout<T>(
  timeoutMs: number,
  work: (signal: AbortSignal) => Promise<T>,
): Promise<T> {
  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;

  const expired = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const err = new DocumentTimeoutError(timeoutMs);
      controller.abort(err);
      reject(err);
    }, timeoutMs);
  });

  try {
    return await Promise.race([work(controller.signal), expired]);
  } finally {
    clearTimeout(timer);
  }
}

/** Run `worker` over `items` with at most `limit` in flight. `worker` must not reject. */
async function runPool<T>(
  items: readonly T[],
  limit: number,
  worker: (item: T) => Promise<void>,
): Promise<void> {
  let next = 0;
  const lanes = Array.from({ length: Math.min(limit, items.length) }, async () => {
    while (next < items.length) {
      const item = items[next++];
      await worker(item);
    }
  });
  await Promise.all(lanes);
}

export async function runBatch(options: BatchOptions): Promise<BatchSummary> {
  const { inputDir, outputDir, config } = options;
  const extract = options.extract ?? extractOutline;

  await mkdir(inputDir, { recursive: true });
  await mkdir(outputDir, { recursive: true });

  const files = await listPdfFiles(inputDir);
  const summary: BatchSummary = { total: files.length, succeeded: [], failed: [], warnings: [] };

  if (files.length === 0) {
    console.warn(`[BatchRunner] No PDF files found in ${inputDir}`);
    return summary;
  }

  const conflicts = findOutputConflicts(files);
  for (const [file, owner] of conflicts) {
    const err = new OutputConflictError(`Output ${outputFileName(file)} is already claimed by ${owner}`);
    summary.failed.push({ file, error: describeError(err), code: err.code });
    console.error(`[BatchRunner] ${file} skipped: ${describeError(err)}`);
  }
  const runnable = files.filter(file => !conflicts.has(file));

  console.log(`[BatchRunner] Processing ${runnable.length} PDF(s) with concurrency ${config.concurrency}`);

  await runPool(runnable, config.concurrency, async file => {
    const started = Date.now();
    try {
      const data = await readFile(path.join(inputDir, file));
      const result = await withTimeout(config.documentTimeoutMs, signal =>
        extract(data, config, { signal }),
      );

      await writeFile(path.join(outputDir, outputFileName(file)), serializeOutputRecord(result.record), 'utf-8');

      for (const warning of result.warnings) {
        console.warn(`[BatchRunner] ${file}: ${warning.message}`);
        summary.warnings.push({ file, warning });
      }
      summary.succeeded.push(file);
      options.onDocument?.(file, result);
      console.log(
        `[BatchRunner] ${file}: ${result.record.outline.length} heading(s) in ${Date.now() - started}ms`,
      );
    } catch (err) {
      summary.failed.push({
        file,
        error: describeError(err),
        code: err instanceof OutlineError ? err.code : null,
      });
      console.error(`[BatchRunner] ${file} failed: ${describeError(err)}`);
    }
  });

  // Pool completion order is nondeterministic; report in input order.
  summary.succeeded.sort();
  const byFile = (a: { file: string }, b: { file: string }): number =>
    a.file < b.file ? -1 : a.file > b.file ? 1 : 0;
  summary.failed.sort(byFile);
  summary.warnings.sort(byFile);

  console.log(
    `[BatchRunner] Done: ${summary.succeeded.length} succeeded, ${summary.failed.length} failed`,
  );
  return summary;
}

/** 0 when something succeeded or there was nothing to do, 1 when every document failed. */
export function batchExitCode(summary: BatchSummary): number {
  if (summary.total === 0) return 0;
  return summary.succeeded.length > 0 ? 0 : 1;
}
