/**
 * pdf-outline entry point.
 *
 * Usage:
 *   npx tsx src/main/main.ts [inputDir] [outputDir] [--config file] [--print]
 */

import { runCli } from './cli';

runCli(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    console.error('[CLI] Fatal error:', err);
    process.exitCode = 1;
  });
