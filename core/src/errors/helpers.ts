/**
 * Error creation helpers for the subpair error system.
 *
 * Provides factory functions for creating structured errors with
 * consistent formatting across all error categories.
 */

import type { ErrorLocation, SubpairError } from './types.js';
import { getErrorCategory } from './codes.js';

/**
 * Options for creating a subpair error.
 */
export interface CreateErrorOptions {
  /** Error code (e.g., 'I001', 'E002') */
  code: string;
  /** Error message */
  message: string;
  /** Location information */
  location?: ErrorLocation;
  /** Suggested fix */
  suggestion?: string;
  /** Original error that caused this error */
  cause?: unknown;
}

class SubpairErrorImpl extends Error implements SubpairError {
  code: string;
  category: SubpairError['category'];
  location?: ErrorLocation;
  suggestion?: string;

  constructor(options: CreateErrorOptions) {
    super(options.message, { cause: options.cause });
    this.name = 'SubpairError';
    this.code = options.code;
    this.category = getErrorCategory(options.code);
    this.location = options.location;
    this.suggestion = options.suggestion;
  }
}

/**
 * Creates a SubpairError with the given options.
 *
 * The category is inferred from the error code.
 */
export function createSubpairError(options: CreateErrorOptions): SubpairError {
  return new SubpairErrorImpl(options);
}

/**
 * Creates an input error (I-code).
 */
export function createInputError(
  code: string,
  message: string,
  options: {
    track?: 'primary' | 'secondary';
    entryIndex?: number;
    suggestion?: string;
  } = {},
): SubpairError {
  return createSubpairError({
    code,
    message,
    location: {
      track: options.track,
      entryIndex: options.entryIndex,
    },
    suggestion: options.suggestion,
  });
}

/**
 * Creates a configuration error (C-code).
 */
export function createConfigError(
  code: string,
  message: string,
  options: {
    filePath?: string;
    context?: string;
    suggestion?: string;
    cause?: unknown;
  } = {},
): SubpairError {
  return createSubpairError({
    code,
    message,
    location: {
      filePath: options.filePath,
      context: options.context,
    },
    suggestion: options.suggestion,
    cause: options.cause,
  });
}

/**
 * Creates an embedding provider error (E-code).
 */
export function createProviderError(
  code: string,
  message: string,
  options: {
    context?: string;
    suggestion?: string;
    cause?: unknown;
  } = {},
): SubpairError {
  return createSubpairError({
    code,
    message,
    location: options.context ? { context: options.context } : undefined,
    suggestion: options.suggestion,
    cause: options.cause,
  });
}

/**
 * Creates a runtime error (R-code).
 */
export function createRuntimeError(
  code: string,
  message: string,
  options: {
    context?: string;
    suggestion?: string;
    cause?: unknown;
  } = {},
): SubpairError {
  return createSubpairError({
    code,
    message,
    location: options.context ? { context: options.context } : undefined,
    suggestion: options.suggestion,
    cause: options.cause,
  });
}

// =============================================================================
// Error Formatting
// =============================================================================

/**
 * Formats a SubpairError for display.
 */
export function formatError(error: SubpairError): string {
  const parts: string[] = [];

  parts.push(`[${error.code}] ${error.message}`);

  if (error.location) {
    const loc = error.location;
    if (loc.filePath) {
      parts.push(`  File: ${loc.filePath}`);
    }
    if (loc.track) {
      const entry = loc.entryIndex !== undefined ? ` entry ${loc.entryIndex}` : '';
      parts.push(`  Track: ${loc.track}${entry}`);
    }
    if (loc.context) {
      parts.push(`  Context: ${loc.context}`);
    }
  }

  if (error.suggestion) {
    parts.push(`  Suggestion: ${error.suggestion}`);
  }

  return parts.join('\n');
}
