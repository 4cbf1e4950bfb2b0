/**
 * Candidate Extraction
 *
 * Exports the extractor contract and the Gemini implementation.
 */

export {
  GeminiExtractor,
  parseCandidateText,
  DEFAULT_GEMINI_MODEL,
  DEFAULT_GEMINI_BASE_URL,
} from './gemini-extractor.js';
export type { GeminiExtractorOptions } from './gemini-extractor.js';

export { extractionFailure } from './extraction-types.js';
export type {
  CandidateExtractor,
  CandidateRecord,
  ExtractOptions,
  ExtractionFailure,
  ExtractionFailureKind,
  ExtractionResult,
} from './extraction-types.js';
