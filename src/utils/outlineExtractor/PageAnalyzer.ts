/**
 * PageAnalyzer — PDF text fragment extraction
 *
 * The only I/O-bound stage of the pipeline. Opens the PDF bytes with
 * pdfjs-dist as a scoped handle, converts every page's text content into
 * RawFragments in a top-left coordinate system, and destroys the handle
 * before returning, whether extraction succeeded, failed or was aborted.
 *
 * Architecture:
 *   bytes → getDocument()                 → PDF handle (destroyed in finally)
 *   page  → getOperatorList()             → fonts resolved into commonObjs
 *   page  → getTextContent()              → convertTextItems() → RawFragment[]
 *   page  → getViewport({ scale: 1 })     → page width/height
 *
 * NO rendering. NO canvas. Pure data extraction.
 */

import * as pdfjsLib from 'pdfjs-dist/legacy/build/pdf.mjs';
import { PDFJS_DOCUMENT_OPTIONS } from '../pdfjsConfig';
import type { RawFragment, RawPage } from './types';
import { OutlineError, UnreadableDocumentError } from './errors';

type PdfDocument = Awaited<ReturnType<typeof pdfjsLib.getDocument>['promise']>;
type PdfPage = Awaited<ReturnType<PdfDocument['getPage']>>;

/** The parts of a pdfjs TextItem this module reads */
interface PdfTextItemLike {
  str: string;
  transform: number[];
  width: number;
  height: number;
  fontName: string;
}

/** Style facts about one pdfjs font id */
interface FontDetails {
  name: string;
  bold: boolean;
  italic: boolean;
}

// ─── Font Name Helpers ───────────────────────────────────────────

/** Map of common PDF font names to their family */
const FONT_MAP: Record<string, string> = {
  'ArialMT': 'Arial',
  'Arial-BoldMT': 'Arial',
  'Arial-ItalicMT': 'Arial',
  'Arial-BoldItalicMT': 'Arial',
  'TimesNewRomanPSMT': 'Times New Roman',
  'TimesNewRomanPS-BoldMT': 'Times New Roman',
  'TimesNewRomanPS-ItalicMT': 'Times New Roman',
  'TimesNewRomanPS-BoldItalicMT': 'Times New Roman',
  'CourierNewPSMT': 'Courier New',
  'Helvetica': 'Helvetica',
  'Helvetica-Bold': 'Helvetica',
  'Helvetica-Oblique': 'Helvetica',
  'Helvetica-BoldOblique': 'Helvetica',
  'Times-Roman': 'Times',
  'Times-Bold': 'Times',
  'Times-Italic': 'Times',
  'Times-BoldItalic': 'Times',
};

/**
 * Resolve a PDF font name ("ABCDEF+Arial-BoldMT") to its family ("Arial").
 * Returns an empty string for an empty name.
 */
function resolveFontFamily(pdfFontName: string): string {
  if (!pdfFontName) return '';

  // Strip subset prefix like "BCDFGH+"
  let name = pdfFontName.replace(/^[A-Z]{6}\+/, '');

  if (FONT_MAP[name]) return FONT_MAP[name];

  name = name.replace(
    /[-,](Bold|Italic|BoldItalic|Regular|Medium|Light|Semibold|Condensed|Narrow|Black|Heavy|Thin|ExtraBold|ExtraLight|Oblique|BoldOblique)$/i,
    '',
  );
  name = name.replace(/MT$/, '');
  name = name.replace(/PS$/, '');

  return name;
}

/** Detect bold from font name patterns */
function isBoldFont(fontName: string): boolean {
  const lower = fontName.toLowerCase();
  return (
    lower.includes('bold') ||
    lower.includes('black') ||
    lower.includes('heavy') ||
    lower.includes('semibold') ||
    lower.includes('-bd') ||
    lower.endsWith('bd')
  );
}

/** Detect italic from font name patterns */
function isItalicFont(fontName: string): boolean {
  const lower = fontName.toLowerCase();
  return lower.includes('italic') || lower.includes('oblique') || lower.includes('-it');
}

// ─── pdfjs Object Narrowing ──────────────────────────────────────

function isTextItem(item: unknown): item is PdfTextItemLike {
  if (typeof item !== 'object' || item === null) return false;
  return (
    'str' in item && typeof item.str === 'string' &&
    'transform' in item && Array.isArray(item.transform) &&
    'fontName' in item && typeof item.fontName === 'string' &&
    'width' in item && typeof item.width === 'number' &&
    'height' in item && typeof item.height === 'number'
  );
}

function readBoolean(value: object, key: string): boolean {
  return Reflect.get(value, key) === true;
}

/** Read name/bold/italic off a pdfjs font object (a FontFaceObject in commonObjs). */
function readFontObject(value: unknown): FontDetails | null {
  if (typeof value !== 'object' || value === null) return null;
  const name = 'name' in value && typeof value.name === 'string' ? value.name : '';
  return {
    name,
    bold: readBoolean(value, 'bold') || readBoolean(value, 'black'),
    italic: readBoolean(value, 'italic'),
  };
}

/** fontFamily from textContent.styles, which is all pdfjs offers when the font object is unavailable */
function readStyleFamily(styles: unknown, fontId: string): string {
  if (typeof styles !== 'object' || styles === null) return '';
  const style: unknown = Reflect.get(styles, fontId);
  if (typeof style !== 'object' || style === null) return '';
  return 'fontFamily' in style && typeof style.fontFamily === 'string' ? style.fontFamily : '';
}

// ─── Text Extraction ─────────────────────────────────────────────

/**
 * Resolve a pdfjs-internal font id ("g_d0_f1") to the PDF's real font name and
 * style flags. The font objects are only populated once the operator list
 * has been built for the page.
 */
function resolveFont(page: PdfPage, fontId: string, styles: unknown): FontDetails {
  let details: FontDetails | null = null;
  if (page.commonObjs.has(fontId)) {
    details = readFontObject(page.commonObjs.get(fontId));
  }

  const name = details?.name || readStyleFamily(styles, fontId) || fontId;
  return {
    name,
    bold: (details?.bold ?? false) || isBoldFont(name),
    italic: (details?.italic ?? false) || isItalicFont(name),
  };
}

/**
 * Convert pdfjs-dist text content items into RawFragments.
 *
 * pdfjs getTextContent() handles all the font encoding complexity:
 * CID maps, ToUnicode, ligatures, etc. We just extract position and formatting.
 */
function convertTextItems(
  items: readonly unknown[],
  pageHeight: number,
  fontFor: (fontId: string) => FontDetails,
): RawFragment[] {
  const results: RawFragment[] = [];

  for (const item of items) {
    if (!isTextItem(item)) continue;
    if (!item.str.trim()) continue;

    const transform = item.transform;
    if (transform.length < 6) continue;

    // Font size from the text matrix: sqrt(a^2 + b^2)
    const fontSize = Math.hypot(transform[0], transform[1]);
    if (!(fontSize > 0)) continue;

    const x = transform[4];
    const height = item.height > 0 ? item.height : fontSize;
    // pdfjs uses bottom-left origin; convert to top-left
    const y = pageHeight - transform[5] - height;
    const width = item.width > 0 ? item.width : item.str.length * fontSize * 0.5;

    const font = fontFor(item.fontName);

    results.push({
      text: item.str,
      fontSize,
      fontName: resolveFontFamily(font.name) || font.name,
      bold: font.bold,
      italic: font.italic,
      x,
      y,
      width,
      height,
    });
  }

  return results;
}

/** Extract one page's fragments and geometry. */
async function analyzePageText(page: PdfPage, pageNumber: number): Promise<RawPage> {
  const viewport = page.getViewport({ scale: 1 });

  try {
    // Populates page.commonObjs with the font objects (real names, bold/italic flags).
    await page.getOperatorList();
  } catch (err) {
    console.warn(`[PageAnalyzer] Font resolution failed on page ${pageNumber}, using style names:`, err);
  }

  const textContent = await page.getTextContent();
  const fontCache = new Map<string, FontDetails>();
  const fontFor = (fontId: string): FontDetails => {
    let cached = fontCache.get(fontId);
    if (!cached) {
      cached = resolveFont(page, fontId, textContent.styles);
      fontCache.set(fontId, cached);
    }
    return cached;
  };

  return {
    pageNumber,
    width: viewport.width > 0 ? viewport.width : null,
    height: viewport.height > 0 ? viewport.height : null,
    fragments: convertTextItems(textContent.items, viewport.height, fontFor),
  };
}

function toUnreadable(err: unknown): UnreadableDocumentError {
  const name = err instanceof Error ? err.name : '';
  const detail = err instanceof Error ? err.message : String(err);
  switch (name) {
    case 'PasswordException':
      return new UnreadableDocumentError('PDF is password-protected', { cause: err });
    case 'InvalidPDFException':
      return new UnreadableDocumentError(`PDF structure is invalid: ${detail}`, { cause: err });
    default:
      return new UnreadableDocumentError(`PDF could not be opened: ${detail}`, { cause: err });
  }
}

/** The part of a loaded pdfjs document the page loop reads */
interface PageSource {
  numPages: number;
  getPage(pageNumber: number): Promise<PdfPage>;
}

/**
 * Extract every page in order. A page that fails to load or yield its text
 * makes the whole document unreadable; an abort rejects with the signal's reason.
 */
async function readPages(pdf: PageSource, signal: AbortSignal | undefined): Promise<RawPage[]> {
  const pages: RawPage[] = [];
  for (let pageNumber = 1; pageNumber <= pdf.numPages; pageNumber++) {
    signal?.throwIfAborted();
    try {
      const page = await pdf.getPage(pageNumber);
      pages.push(await analyzePageText(page, pageNumber));
      page.cleanup();
    } catch (err) {
      signal?.throwIfAborted();
      if (err instanceof OutlineError) throw err;
      const detail = err instanceof Error ? err.message : String(err);
      throw new UnreadableDocumentError(`Page ${pageNumber} could not be read: ${detail}`, { cause: err });
    }
  }
  return pages;
}

// ─── Main Entry Point ────────────────────────────────────────────

export interface ExtractOptions {
  /** Aborting destroys the pdfjs handle and rejects with the signal's reason */
  signal?: AbortSignal;
}

/**
 * Parse PDF bytes into per-page fragment streams.
 *
 * @throws UnreadableDocumentError for corrupt, encrypted or zero-page PDFs, or a page that cannot be read
 */
export async function extractPages(data: Uint8Array, options: ExtractOptions = {}): Promise<RawPage[]> {
  const { signal } = options;
  signal?.throwIfAborted();

  // pdfjs rejects Node Buffers and may transfer what it is given: hand it a plain copy.
  const loadingTask = pdfjsLib.getDocument({ ...PDFJS_DOCUMENT_OPTIONS, data: new Uint8Array(data) });
  const onAbort = (): void => {
    loadingTask.destroy().catch((err: unknown) => {
      console.warn('[PageAnalyzer] Failed to release aborted document:', err);
    });
  };
  signal?.addEventListener('abort', onAbort, { once: true });

  try {
    let pdf: PdfDocument;
    try {
      pdf = await loadingTask.promise;
    } catch (err) {
      signal?.throwIfAborted();
      throw toUnreadable(err);
    }

    if (pdf.numPages === 0) {
      throw new UnreadableDocumentError('PDF has no pages');
    }

    return await readPages(pdf, signal);
  } finally {
    signal?.removeEventListener('abort', onAbort);
    await loadingTask.destroy();
  }
}

// ─── Test Exports ─────────────────────────────────────────────────
// These are exported for unit testing only. Do not use in production code.
export const _testExports = {
  resolveFontFamily,
  isBoldFont,
  isItalicFont,
  convertTextItems,
  readFontObject,
  toUnreadable,
  readPages,
};
