/**
 * Writes the sample PDFs to test-pdfs/out/ for manual runs of the CLI.
 * Usage: npx tsx test-pdfs/create-test-pdfs.ts [outputDir]
 */
import * as fs from 'fs';
import * as path from 'path';
import { fileURLToPath } from 'url';
import { SAMPLE_PDFS } from './samplePdfs';

async function main(): Promise<void> {
  const here = path.dirname(fileURLToPath(import.meta.url));
  const outDir = path.resolve(process.argv[2] ?? path.join(here, 'out'));
  fs.mkdirSync(outDir, { recursive: true });

  for (const [name, build] of Object.entries(SAMPLE_PDFS)) {
    const bytes = await build();
    const file = path.join(outDir, `${name}.pdf`);
    fs.writeFileSync(file, bytes);
    console.log(`Wrote ${file} (${bytes.length} bytes)`);
  }
}

main().catch((err: unknown) => {
  console.error(err);
  process.exitCode = 1;
});
