/**
 * Shared pdfjs-dist configuration for document loading under Node.
 *
 * standardFontDataUrl: the Foxit / Liberation font files shipped inside the
 * pdfjs-dist package, so PDFs that reference the standard 14 fonts
 * (Helvetica, Times, Courier, ...) without embedding them still get metrics.
 *
 * cMapUrl: the bundled CMap files for CJK font encoding.
 */

import { createRequire } from 'module';
import path from 'path';

const require = createRequire(import.meta.url);

/** Absolute path (with trailing separator) of a directory inside pdfjs-dist. */
function resolvePdfjsAssetDir(name: string): string | undefined {
  try {
    const root = path.dirname(require.resolve('pdfjs-dist/package.json'));
    return path.join(root, name) + path.sep;
  } catch {
    // Font/CMap data only improves metrics; text extraction works without it.
    return undefined;
  }
}

/** Base options to spread into every pdfjsLib.getDocument() call. */
export const PDFJS_DOCUMENT_OPTIONS = {
  standardFontDataUrl: resolvePdfjsAssetDir('standard_fonts'),
  cMapUrl: resolvePdfjsAssetDir('cmaps'),
  cMapPacked: true,
  isEvalSupported: false,
  useSystemFonts: false,
  /** pdfjs VerbosityLevel.ERRORS: keep font-substitution warnings out of batch logs */
  verbosity: 0,
} as const;
