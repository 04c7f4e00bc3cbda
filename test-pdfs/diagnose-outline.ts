/**
 * Diagnose the outline pipeline — prints every stage for one PDF.
 * Usage: npx tsx test-pdfs/diagnose-outline.ts path/to/file.pdf [--threshold 1.2]
 */
import * as fs from 'fs';
import * as path from 'path';
import { extractPages } from '../src/utils/outlineExtractor/PageAnalyzer';
import { collectFragments } from '../src/utils/outlineExtractor/FragmentCollector';
import { FontProfiler } from '../src/utils/outlineExtractor/FontProfiler';
import { extractTitle } from '../src/utils/outlineExtractor/TitleExtractor';
import { classifyHeadings } from '../src/utils/outlineExtractor/HeadingClassifier';
import { assignLevelsWithCandidates } from '../src/utils/outlineExtractor/LevelAssigner';
import { resolveConfiguration } from '../src/utils/outlineExtractor/config';
import { formatOutlineTree } from '../src/utils/outlineExtractor/OutlineExtractor';

function readThreshold(args: string[]): number | undefined {
  const index = args.indexOf('--threshold');
  return index >= 0 ? Number(args[index + 1]) : undefined;
}

async function diagnose(pdfPath: string, threshold: number | undefined): Promise<void> {
  const absPath = path.resolve(pdfPath);
  console.log(`\n=== Outline Diagnostic: ${path.basename(absPath)} ===\n`);

  const config = resolveConfiguration({ headingSizeThreshold: threshold });
  const data = new Uint8Array(fs.readFileSync(absPath));

  // ─── Stage 1: Raw fragments ───
  const pages = await extractPages(data);
  for (const page of pages) {
    console.log(`Page ${page.pageNumber}: ${page.fragments.length} raw fragments, ${page.width}x${page.height}pt`);
  }

  // ─── Stage 2: Line-level fragments ───
  const doc = collectFragments(pages);
  console.log(`\nCollected ${doc.fragments.length} fragments`);
  for (const f of doc.fragments.slice(0, 40)) {
    const style = `${f.bold ? 'B' : '-'}${f.italic ? 'I' : '-'}`;
    console.log(
      `  p${f.page} y=${f.y.toFixed(1).padStart(6)} x=${f.x.toFixed(1).padStart(6)} ` +
      `${f.fontSize.toFixed(1).padStart(5)}pt ${style} ${f.fontName.padEnd(14)} "${f.text.substring(0, 50)}"`,
    );
  }
  if (doc.fragments.length > 40) console.log(`  ... ${doc.fragments.length - 40} more`);

  // ─── Stage 3: Font profile ───
  const profile = new FontProfiler().registerAll(doc.fragments).getProfile(config);
  console.log(`\nBody size: ${profile.bodySize}pt`);
  console.log('Size histogram (chars):');
  for (const [size, count] of [...profile.sizeHistogram].sort((a, b) => b[0] - a[0])) {
    const bucket = profile.sizeBuckets.get(size);
    console.log(`  ${String(size).padStart(5)}pt  ${String(count).padStart(6)}${bucket !== undefined ? `  -> bucket ${bucket}` : ''}`);
  }
  console.log(`Candidate sizes: [${profile.candidateSizes.join(', ')}]`);

  // ─── Stage 4: Title ───
  const title = extractTitle(doc, profile, config);
  console.log(`\nTitle: "${title.title}" (${title.fragments.length} line(s))`);

  // ─── Stage 5: Candidates and levels ───
  const candidates = classifyHeadings(doc, profile, config, title);
  console.log(`\n${candidates.length} heading candidate(s):`);
  const leveled = assignLevelsWithCandidates(candidates, config);
  for (const { candidate, level } of leveled) {
    console.log(
      `  ${level} p${candidate.fragment.page} bucket=${candidate.bucket} score=${candidate.score.toFixed(2)} "${candidate.fragment.text}"`,
    );
  }

  // ─── Stage 6: Outline ───
  const outline = leveled.map(({ candidate, level }) => ({
    level,
    text: candidate.fragment.text,
    page: candidate.fragment.page,
  }));
  console.log(`\n${formatOutlineTree({ title: title.title, outline })}`);
}

const pdfPath = process.argv[2];
if (!pdfPath) {
  console.error('Usage: npx tsx test-pdfs/diagnose-outline.ts <pdf> [--threshold n]');
  process.exitCode = 1;
} else {
  diagnose(pdfPath, readThreshold(process.argv.slice(3))).catch((err: unknown) => {
    console.error(err);
    process.exitCode = 1;
  });
}
