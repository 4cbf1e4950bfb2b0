/**
 * Extraction Types
 *
 * The extractor is an oracle: it returns a best-effort, unchecked guess.
 */

/**
 * Untrusted structured guess for a single message. Every field may be
 * missing or of the wrong type; only the normalizer decides what to keep.
 */
export interface CandidateRecord {
  amount?: unknown;
  description?: unknown;
  category?: unknown;
  type?: unknown;
}

export type ExtractionFailureKind = 'unreachable' | 'timeout' | 'malformed';

/**
 * Extraction failures are transient by default: the caller may retry.
 */
export interface ExtractionFailure {
  kind: ExtractionFailureKind;
  message: string;
  retryable: true;
  /**
   * Upstream HTTP status, when the oracle answered with an error
   */
  status?: number;
}

export type ExtractionResult =
  | { ok: true; candidate: CandidateRecord }
  | { ok: false; failure: ExtractionFailure };

export interface ExtractOptions {
  /**
   * Aborting the signal ends the call with a `timeout` failure
   */
  signal?: AbortSignal;
  /**
   * Canonical category labels the oracle may choose from
   */
  categoryHints?: readonly string[];
}

export interface CandidateExtractor {
  extract(rawText: string, options?: ExtractOptions): Promise<ExtractionResult>;
}

export function extractionFailure(
  kind: ExtractionFailureKind,
  message: string,
  status?: number
): ExtractionResult {
  return {
    ok: false,
    failure: { kind, message, retryable: true, ...(status !== undefined && { status }) },
  };
}
