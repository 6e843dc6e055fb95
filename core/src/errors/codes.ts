/**
 * Error code constants for the subpair engine.
 *
 * Code format: {Category}{Number}
 * - I: Input errors (I001-I099)
 * - C: Configuration errors (C001-C099)
 * - E: Embedding provider errors (E001-E099)
 * - R: Runtime errors (R001-R099)
 */

// =============================================================================
// Input Error Codes (I001-I099)
// =============================================================================

export const InputErrorCode = {
  EMPTY_TRACK: 'I001',
  INVALID_ENTRY_TIMING: 'I002',
  INVALID_ENTRY_TEXT: 'I003',
  MALFORMED_TRACK: 'I004',
  MALFORMED_ENTRY: 'I005',
} as const;

export type InputErrorCodeValue = (typeof InputErrorCode)[keyof typeof InputErrorCode];

// =============================================================================
// Configuration Error Codes (C001-C099)
// =============================================================================

export const ConfigErrorCode = {
  // C001-C009: Scalar settings
  INVALID_BATCH_SIZE: 'C001',
  INVALID_WINDOW_SIZE: 'C002',
  INVALID_THRESHOLD: 'C003',
  INVALID_PROBABILITY: 'C004',
  INVALID_DTW_SETTING: 'C005',

  // C010-C019: Progress weights
  INVALID_PROGRESS_WEIGHTS: 'C010',
  UNKNOWN_STAGE_WEIGHT: 'C011',

  // C020-C029: Config files
  INVALID_CONFIG_FILE_EXTENSION: 'C020',
  CONFIG_FILE_LOAD_FAILED: 'C021',
  INVALID_CONFIG_DOCUMENT: 'C022',
} as const;

export type ConfigErrorCodeValue = (typeof ConfigErrorCode)[keyof typeof ConfigErrorCode];

// =============================================================================
// Embedding Provider Error Codes (E001-E099)
// =============================================================================

export const ProviderErrorCode = {
  // E001-E009: Embedding responses
  EMBEDDING_CALL_FAILED: 'E001',
  EMBEDDING_BATCH_MISMATCH: 'E002',
  EMBEDDING_DIMENSION_MISMATCH: 'E003',
  EMBEDDING_INVALID_VALUE: 'E004',

  // E010-E019: Provider setup
  MISSING_API_KEY: 'E010',
  INVALID_PROVIDER_CONFIG: 'E011',
  UNKNOWN_PROVIDER: 'E012',
} as const;

export type ProviderErrorCodeValue = (typeof ProviderErrorCode)[keyof typeof ProviderErrorCode];

// =============================================================================
// Runtime Error Codes (R001-R099)
// =============================================================================

export const RuntimeErrorCode = {
  STAGE_FAILED: 'R001',
  UNKNOWN_MODE: 'R002',
} as const;

export type RuntimeErrorCodeValue = (typeof RuntimeErrorCode)[keyof typeof RuntimeErrorCode];

// =============================================================================
// Combined Types
// =============================================================================

/**
 * All error codes in the system.
 */
export type ErrorCode =
  | InputErrorCodeValue
  | ConfigErrorCodeValue
  | ProviderErrorCodeValue
  | RuntimeErrorCodeValue;

/**
 * Maps error code prefixes to their categories.
 */
export const ERROR_CODE_CATEGORIES = {
  I: 'input',
  C: 'config',
  E: 'provider',
  R: 'runtime',
} as const;

export type ErrorCodePrefix = keyof typeof ERROR_CODE_CATEGORIES;

function isErrorCodePrefix(value: string): value is ErrorCodePrefix {
  return value in ERROR_CODE_CATEGORIES;
}

/**
 * Gets the category for an error code.
 */
export function getErrorCategory(code: string): 'input' | 'config' | 'provider' | 'runtime' {
  const prefix = code.charAt(0);
  return isErrorCodePrefix(prefix) ? ERROR_CODE_CATEGORIES[prefix] : 'runtime';
}
