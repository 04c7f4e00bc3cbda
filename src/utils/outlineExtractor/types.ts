/**
 * Outline Extractor Type Definitions
 *
 * Unified type system for the font-metadata outline pipeline:
 *   PageAnalyzer (raw fragments) -> FragmentCollector (lines) -> FontProfiler
 *   -> TitleExtractor / HeadingClassifier -> LevelAssigner (outline)
 */

// ─── Collaborator Output (from PageAnalyzer) ───────────────────

/** A text run exactly as the PDF parser reported it. Top-left origin, PDF points. */
export interface RawFragment {
  text: string;
  fontSize: number;
  fontName: string;
  bold: boolean;
  italic: boolean;
  x: number;
  y: number;
  width: number;
  height: number;
}

/** One page of parser output, in content-stream order */
export interface RawPage {
  /** 1-based */
  pageNumber: number;
  /** Page width in points, null when the parser could not supply it */
  width: number | null;
  /** Page height in points, null when the parser could not supply it */
  height: number | null;
  fragments: RawFragment[];
}

// ─── Normalized Document (from FragmentCollector) ──────────────

/** A line-level text fragment tagged with its page */
export interface Fragment {
  readonly text: string;
  readonly page: number;
  readonly fontSize: number;
  readonly fontName: string;
  readonly bold: boolean;
  readonly italic: boolean;
  readonly x: number;
  readonly y: number;
  readonly width: number;
  readonly height: number;
}

export interface PageGeometry {
  readonly pageNumber: number;
  readonly width: number | null;
  readonly height: number | null;
}

export interface CollectedDocument {
  /** All fragments, ordered by page then content-stream order */
  readonly fragments: readonly Fragment[];
  readonly pages: ReadonlyMap<number, PageGeometry>;
}

// ─── Font Statistics (from FontProfiler) ───────────────────────

export interface FontProfile {
  /** Dominant (most characters) rounded font size */
  readonly bodySize: number;
  /** Heading-eligible bucket representatives, largest first, all > bodySize */
  readonly candidateSizes: readonly number[];
  /** Rounded font size -> total character count */
  readonly sizeHistogram: ReadonlyMap<number, number>;
  /** Rounded candidate size -> the candidateSizes entry whose bucket it belongs to */
  readonly sizeBuckets: ReadonlyMap<number, number>;
}

// ─── Classification (from HeadingClassifier) ───────────────────

export interface HeadingCandidate {
  fragment: Fragment;
  /** 0..1, only used to break ties inside a size bucket */
  score: number;
  /** Index of `bucket` in FontProfile.candidateSizes (0 = largest) */
  sizeRank: number;
  /** Representative size of the bucket this fragment fell into */
  bucket: number;
}

// ─── Output Record ─────────────────────────────────────────────

export type HeadingLevel = 'H1' | 'H2' | 'H3';

export const HEADING_LEVELS: readonly HeadingLevel[] = ['H1', 'H2', 'H3'];

export interface OutlineEntry {
  level: HeadingLevel;
  text: string;
  page: number;
}

/** Final per-document result; serialized verbatim to JSON */
export interface OutputRecord {
  title: string;
  outline: OutlineEntry[];
}

/** Title plus the fragments it was assembled from */
export interface TitleResult {
  title: string;
  fragments: Fragment[];
}

/** Non-fatal condition reported alongside an OutputRecord */
export interface FlatDocumentWarning {
  kind: 'flat-document';
  message: string;
  distinctSizes: number;
}

export type OutlineWarning = FlatDocumentWarning;

export interface OutlineResult {
  record: OutputRecord;
  warnings: OutlineWarning[];
}
