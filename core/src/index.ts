/**
 * Public entry point of @subpair/core.
 *
 *   import { createSubtitleAligner } from '@subpair/core';
 */

// Engine
export {
  createSubtitleAligner,
  type SubtitleAligner,
  type SubtitleAlignerOptions,
} from './orchestration/aligner.js';
export { combineFields, compareFields, countByOrigin } from './orchestration/combine.js';
export { ProgressTracker } from './orchestration/progress.js';

// Data model
export type {
  AlignInput,
  AlignOptions,
  AlignResult,
  AlignStage,
  AlignStats,
  AlignmentMode,
  EmbeddingProvider,
  FieldOrigin,
  LanguageDetector,
  LocalProgress,
  MergedField,
  ProgressCallback,
  ProgressEvent,
  StageId,
  StyleTable,
  SubtitleEntry,
  Token,
  TokenSpan,
  TokenizedEntry,
  Track,
  TrackRole,
} from './types.js';

// Configuration
export {
  ALIGNMENT_MODES,
  DEFAULT_ALIGNER_CONFIG,
  MODE_STAGES,
  STAGE_IDS,
  isAlignmentMode,
  isStageId,
  resolveAlignerConfig,
  validateAlignerConfig,
  validateStageWeights,
  type AlignerConfig,
  type AlignerConfigInput,
  type DtwConfig,
  type ExtendedCutConfig,
  type HmmParameters,
  type RefinementConfig,
  type StageWeights,
} from './config/aligner-config.js';
export { loadAlignerConfig, mergeConfigInputs, parseAlignerConfigDocument } from './config/config-loader.js';
export { deepMergeConfig, isPlainObject } from './config/config-utils.js';

// Stages, usable on their own
export {
  LINE_BREAK_MARKER,
  isDelimiter,
  restoreLine,
  tokenDisplayText,
  tokenizeEntries,
  tokenizeLine,
  type TokenizeOptions,
} from './tokenization/tokenizer.js';
export { buildTokenSequence, renderSpan, renderTokens, type TokenSequence } from './tokenization/token-sequence.js';
export {
  createScriptLanguageDetector,
  detectScriptLanguage,
  isSpaceSeparatedLanguage,
  sampleTrackText,
} from './language/script-detector.js';
export { createLanguageDetector, type CreateLanguageDetectorOptions } from './language/language-detector.js';
export { extractNonOverlap, intervalsOverlap, type NonOverlapResult } from './alignment/non-overlap.js';
export { EmbeddingStore, type EmbeddingStoreOptions } from './embedding/embedding-store.js';
export { alignTokens, type DtwResult } from './alignment/dtw.js';
export { refineWindows, type RefinerEntry } from './alignment/window-refiner.js';
export { smoothMask } from './alignment/hmm.js';
export { extractExtendedCut, type ExtendedCutResult } from './alignment/extended-cut.js';
export { cleanFields, cleanLineBreaks } from './alignment/newline-cleaner.js';

// Ambient
export * from './errors/index.js';
export { CancelledError, isCancelledError, throwIfCancelled } from './cancellation.js';
export { createLogger, resolveLogLevel, type Logger, type LogLevel, type LogMeta } from './logger.js';
export { loadEnv, type EnvLoaderOptions, type EnvLoaderResult } from './env-loader.js';
