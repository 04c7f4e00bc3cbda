/**
 * Outline Extractor Module
 *
 * Title and H1-H3 heading extraction from PDF font and layout metadata:
 * - Text fragment extraction (pdfjs-dist)
 * - Line merging and font-size profiling
 * - Heading classification and level assignment
 * - Title detection on page 1
 */

// Types
export * from './types';

// Errors
export {
  OutlineError,
  UnreadableDocumentError,
  ParseError,
  DocumentTimeoutError,
  ConfigurationError,
  OutputConflictError,
  describeError,
} from './errors';
export type { OutlineErrorCode } from './errors';

// Configuration
export {
  DEFAULT_CONFIGURATION,
  resolveConfiguration,
  parseConfigurationFile,
  loadConfigurationFile,
} from './config';
export type { Configuration, ConfigurationOverrides } from './config';

// Pipeline stages
export { extractPages } from './PageAnalyzer';
export type { ExtractOptions } from './PageAnalyzer';
export { collectFragments, collectPageFragments } from './FragmentCollector';
export { FontProfiler, buildFontProfile, bucketFor, isFlatProfile } from './FontProfiler';
export {
  classifyHeadings,
  scoreFragment,
  sizeRatioSignal,
  boldSignal,
  italicSignal,
  numberingSignal,
  allCapsSignal,
  keywordSignal,
  lengthSignal,
} from './HeadingClassifier';
export { assignLevels, assignLevelsWithCandidates } from './LevelAssigner';
export type { LeveledCandidate } from './LevelAssigner';
export { extractTitle } from './TitleExtractor';

// Orchestration
export {
  buildOutline,
  extractOutline,
  serializeOutputRecord,
  formatOutlineTree,
} from './OutlineExtractor';
