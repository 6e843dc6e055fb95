/**
 * Subpair Error System
 *
 * - I (Input): Malformed or empty tracks
 * - C (Config): Invalid aligner configuration
 * - E (Provider): Embedding provider failures
 * - R (Runtime): Unexpected failures while running a stage
 *
 * Cancellation is reported with CancelledError from ../cancellation.ts.
 */

// Types
export type { ErrorCategory, ErrorLocation, SubpairError } from './types.js';
export { isSubpairError } from './types.js';

// Error Codes
export {
  InputErrorCode,
  ConfigErrorCode,
  ProviderErrorCode,
  RuntimeErrorCode,
  ERROR_CODE_CATEGORIES,
  getErrorCategory,
} from './codes.js';
export type {
  InputErrorCodeValue,
  ConfigErrorCodeValue,
  ProviderErrorCodeValue,
  RuntimeErrorCodeValue,
  ErrorCode,
} from './codes.js';

// Helpers
export type { CreateErrorOptions } from './helpers.js';
export {
  createSubpairError,
  createInputError,
  createConfigError,
  createProviderError,
  createRuntimeError,
  formatError,
} from './helpers.js';
