import { ConfigErrorCode, createConfigError } from '../errors/index.js';
import type { AlignmentMode, StageId } from '../types.js';

// --- shapes ---

export interface RefinementConfig {
  wideWindow: number;       // first pass, W=3
  narrowWindow: number;     // cuts-mode second pass, W=2
  maxWindowTokens: number;  // wider windows only move boundaries within boundaryRadius
  boundaryRadius: number;
}

export interface DtwConfig {
  maxFullMatrixCells: number;
  bandRadius: number;
}

/** Two-state HMM used to smooth the aligned/unaligned mask. */
export interface HmmParameters {
  initialAligned: number;
  stayAligned: number;
  stayUnaligned: number;
  alignedEmitsMatch: number;
  unalignedEmitsMatch: number;
}

export interface ExtendedCutConfig {
  alignThreshold: number;
  trimThreshold: number;
  minRunLength: number;
  hmm: HmmParameters;
}

export type StageWeights = Partial<Record<StageId, number>>;

export interface AlignerConfig {
  batchSize: number;
  ignoreNonOverlapFilter: boolean;
  retainNewline: boolean;
  refinement: RefinementConfig;
  dtw: DtwConfig;
  extendedCut: ExtendedCutConfig;
  progressWeights: Record<AlignmentMode, StageWeights>;
}

/** Caller-facing shape: every field optional, merged onto the defaults. */
export interface AlignerConfigInput {
  batchSize?: number;
  ignoreNonOverlapFilter?: boolean;
  retainNewline?: boolean;
  refinement?: Partial<RefinementConfig>;
  dtw?: Partial<DtwConfig>;
  extendedCut?: Partial<Omit<ExtendedCutConfig, 'hmm'>> & { hmm?: Partial<HmmParameters> };
  /** A mode's map replaces the default map for that mode as a whole. */
  progressWeights?: Partial<Record<AlignmentMode, StageWeights>>;
}

// --- stage layout per mode ---

export const ALIGNMENT_MODES: readonly AlignmentMode[] = ['synced', 'mixed', 'cuts'];

export const STAGE_IDS: readonly StageId[] = [
  'extractNonOverlap',
  'dtwAlign',
  'refineWide',
  'extractExtended',
  'refineNarrow',
  'combine',
  'cleanup',
];

export const MODE_STAGES: Record<AlignmentMode, readonly StageId[]> = {
  synced: ['dtwAlign', 'refineWide', 'combine', 'cleanup'],
  mixed: ['extractNonOverlap', 'dtwAlign', 'refineWide', 'combine', 'cleanup'],
  cuts: ['dtwAlign', 'refineWide', 'extractExtended', 'refineNarrow', 'combine', 'cleanup'],
};

export function isAlignmentMode(value: unknown): value is AlignmentMode {
  return ALIGNMENT_MODES.some((mode) => mode === value);
}

export function isStageId(value: unknown): value is StageId {
  return STAGE_IDS.some((stage) => stage === value);
}

// --- defaults ---

export const DEFAULT_ALIGNER_CONFIG: AlignerConfig = {
  batchSize: 32,
  ignoreNonOverlapFilter: false,
  retainNewline: false,
  refinement: {
    wideWindow: 3,
    narrowWindow: 2,
    maxWindowTokens: 12,
    boundaryRadius: 3,
  },
  dtw: {
    maxFullMatrixCells: 4_000_000,
    bandRadius: 64,
  },
  extendedCut: {
    alignThreshold: 0.5,
    trimThreshold: 0.7,
    minRunLength: 1,
    hmm: {
      initialAligned: 0.9,
      stayAligned: 0.8,
      stayUnaligned: 0.8,
      alignedEmitsMatch: 0.97,
      unalignedEmitsMatch: 0.2,
    },
  },
  progressWeights: {
    synced: { dtwAlign: 0.5, refineWide: 0.4, combine: 0.05, cleanup: 0.05 },
    mixed: { extractNonOverlap: 0.05, dtwAlign: 0.45, refineWide: 0.4, combine: 0.05, cleanup: 0.05 },
    cuts: {
      dtwAlign: 0.35,
      refineWide: 0.3,
      extractExtended: 0.1,
      refineNarrow: 0.15,
      combine: 0.05,
      cleanup: 0.05,
    },
  },
};

const WEIGHT_SUM_TOLERANCE = 1e-6;

/**
 * Merges the input onto the defaults and validates the result.
 * Throws a config error (C0xx) on the first violation.
 */
export function resolveAlignerConfig(input: AlignerConfigInput = {}): AlignerConfig {
  const defaults = DEFAULT_ALIGNER_CONFIG;
  const hmmDefaults = defaults.extendedCut.hmm;
  const hmmInput = input.extendedCut?.hmm;

  const config: AlignerConfig = {
    batchSize: input.batchSize ?? defaults.batchSize,
    ignoreNonOverlapFilter: input.ignoreNonOverlapFilter ?? defaults.ignoreNonOverlapFilter,
    retainNewline: input.retainNewline ?? defaults.retainNewline,
    refinement: {
      wideWindow: input.refinement?.wideWindow ?? defaults.refinement.wideWindow,
      narrowWindow: input.refinement?.narrowWindow ?? defaults.refinement.narrowWindow,
      maxWindowTokens: input.refinement?.maxWindowTokens ?? defaults.refinement.maxWindowTokens,
      boundaryRadius: input.refinement?.boundaryRadius ?? defaults.refinement.boundaryRadius,
    },
    dtw: {
      maxFullMatrixCells: input.dtw?.maxFullMatrixCells ?? defaults.dtw.maxFullMatrixCells,
      bandRadius: input.dtw?.bandRadius ?? defaults.dtw.bandRadius,
    },
    extendedCut: {
      alignThreshold: input.extendedCut?.alignThreshold ?? defaults.extendedCut.alignThreshold,
      trimThreshold: input.extendedCut?.trimThreshold ?? defaults.extendedCut.trimThreshold,
      minRunLength: input.extendedCut?.minRunLength ?? defaults.extendedCut.minRunLength,
      hmm: {
        initialAligned: hmmInput?.initialAligned ?? hmmDefaults.initialAligned,
        stayAligned: hmmInput?.stayAligned ?? hmmDefaults.stayAligned,
        stayUnaligned: hmmInput?.stayUnaligned ?? hmmDefaults.stayUnaligned,
        alignedEmitsMatch: hmmInput?.alignedEmitsMatch ?? hmmDefaults.alignedEmitsMatch,
        unalignedEmitsMatch: hmmInput?.unalignedEmitsMatch ?? hmmDefaults.unalignedEmitsMatch,
      },
    },
    progressWeights: {
      synced: { ...(input.progressWeights?.synced ?? defaults.progressWeights.synced) },
      mixed: { ...(input.progressWeights?.mixed ?? defaults.progressWeights.mixed) },
      cuts: { ...(input.progressWeights?.cuts ?? defaults.progressWeights.cuts) },
    },
  };

  validateAlignerConfig(config);
  return config;
}

export function validateAlignerConfig(config: AlignerConfig): void {
  requirePositiveInteger(config.batchSize, 'batchSize', ConfigErrorCode.INVALID_BATCH_SIZE);

  requirePositiveInteger(config.refinement.wideWindow, 'refinement.wideWindow', ConfigErrorCode.INVALID_WINDOW_SIZE);
  requirePositiveInteger(config.refinement.narrowWindow, 'refinement.narrowWindow', ConfigErrorCode.INVALID_WINDOW_SIZE);
  requirePositiveInteger(
    config.refinement.maxWindowTokens,
    'refinement.maxWindowTokens',
    ConfigErrorCode.INVALID_WINDOW_SIZE,
  );
  requirePositiveInteger(
    config.refinement.boundaryRadius,
    'refinement.boundaryRadius',
    ConfigErrorCode.INVALID_WINDOW_SIZE,
  );

  requirePositiveInteger(config.dtw.maxFullMatrixCells, 'dtw.maxFullMatrixCells', ConfigErrorCode.INVALID_DTW_SETTING);
  requirePositiveInteger(config.dtw.bandRadius, 'dtw.bandRadius', ConfigErrorCode.INVALID_DTW_SETTING);

  const { alignThreshold, trimThreshold, minRunLength, hmm } = config.extendedCut;
  requireSimilarity(alignThreshold, 'extendedCut.alignThreshold');
  requireSimilarity(trimThreshold, 'extendedCut.trimThreshold');
  if (trimThreshold < alignThreshold) {
    throw createConfigError(
      ConfigErrorCode.INVALID_THRESHOLD,
      `extendedCut.trimThreshold (${trimThreshold}) must not be below extendedCut.alignThreshold (${alignThreshold}).`,
      { context: 'extendedCut', suggestion: 'The trim threshold is the stricter of the two thresholds.' },
    );
  }
  requirePositiveInteger(minRunLength, 'extendedCut.minRunLength', ConfigErrorCode.INVALID_THRESHOLD);

  for (const [key, value] of Object.entries(hmm)) {
    if (typeof value !== 'number' || !(value > 0 && value < 1)) {
      throw createConfigError(
        ConfigErrorCode.INVALID_PROBABILITY,
        `extendedCut.hmm.${key} must be a probability strictly between 0 and 1. Received: ${String(value)}`,
        { context: `extendedCut.hmm.${key}` },
      );
    }
  }

  for (const mode of ALIGNMENT_MODES) {
    validateStageWeights(mode, config.progressWeights[mode]);
  }
}

export function validateStageWeights(mode: AlignmentMode, weights: StageWeights): void {
  const present = MODE_STAGES[mode];
  let total = 0;

  for (const [stage, weight] of Object.entries(weights)) {
    const context = `progressWeights.${mode}.${stage}`;
    if (!isStageId(stage)) {
      throw createConfigError(ConfigErrorCode.UNKNOWN_STAGE_WEIGHT, `Unknown stage "${stage}" in ${context}.`, {
        context,
        suggestion: `Known stages: ${STAGE_IDS.join(', ')}.`,
      });
    }
    if (typeof weight !== 'number' || !Number.isFinite(weight) || weight < 0) {
      throw createConfigError(
        ConfigErrorCode.INVALID_PROGRESS_WEIGHTS,
        `${context} must be a finite, non-negative number. Received: ${String(weight)}`,
        { context },
      );
    }
    if (!present.includes(stage)) {
      if (weight !== 0) {
        throw createConfigError(
          ConfigErrorCode.UNKNOWN_STAGE_WEIGHT,
          `Stage "${stage}" does not run in ${mode} mode but has weight ${weight}.`,
          { context, suggestion: `Stages in ${mode} mode: ${present.join(', ')}.` },
        );
      }
      continue;
    }
    total += weight;
  }

  if (Math.abs(total - 1) > WEIGHT_SUM_TOLERANCE) {
    throw createConfigError(
      ConfigErrorCode.INVALID_PROGRESS_WEIGHTS,
      `Progress weights for ${mode} mode must sum to 1. Received: ${total}`,
      { context: `progressWeights.${mode}` },
    );
  }
}

function requirePositiveInteger(value: number, key: string, code: string): void {
  if (!Number.isInteger(value) || value < 1) {
    throw createConfigError(code, `${key} must be a positive integer. Received: ${String(value)}`, {
      context: key,
    });
  }
}

function requireSimilarity(value: number, key: string): void {
  if (typeof value !== 'number' || !(value >= -1 && value <= 1)) {
    throw createConfigError(
      ConfigErrorCode.INVALID_THRESHOLD,
      `${key} must be a cosine similarity between -1 and 1. Received: ${String(value)}`,
      { context: key },
    );
  }
}
