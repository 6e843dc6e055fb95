/**
 * Shared error types for the subpair error system.
 *
 * - I (Input): Malformed or empty tracks
 * - C (Config): Invalid aligner configuration
 * - E (Provider): Embedding provider failures
 * - R (Runtime): Unexpected failures while running a stage
 */

/**
 * Error categories in the subpair system.
 */
export type ErrorCategory = 'input' | 'config' | 'provider' | 'runtime';

/**
 * Location information for an error.
 */
export interface ErrorLocation {
  /** File path (absolute) for errors raised while reading a file */
  filePath?: string;
  /** Which track the error refers to */
  track?: 'primary' | 'secondary';
  /** Entry index within the track */
  entryIndex?: number;
  /** Element context (e.g., "refinement.wideWindow", "stage dtwAlign") */
  context?: string;
}

/**
 * Base interface for all subpair errors.
 */
export interface SubpairError extends Error {
  /** Unique error code (e.g., 'I001', 'E002') */
  code: string;
  /** Error category for routing and display */
  category: ErrorCategory;
  /** Location information */
  location?: ErrorLocation;
  /** Suggested fix (optional) */
  suggestion?: string;
}

/**
 * Type guard to check if an error is a SubpairError.
 */
export function isSubpairError(error: unknown): error is SubpairError {
  if (!(error instanceof Error)) {
    return false;
  }
  const candidate: Partial<SubpairError> = error;
  return typeof candidate.code === 'string' && typeof candidate.category === 'string';
}
