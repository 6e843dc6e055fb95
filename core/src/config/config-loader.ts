import { readFile } from 'node:fs/promises';
import { extname } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { ConfigErrorCode, createConfigError } from '../errors/index.js';
import type { AlignmentMode } from '../types.js';
import {
  ALIGNMENT_MODES,
  isStageId,
  resolveAlignerConfig,
  type AlignerConfig,
  type AlignerConfigInput,
  type StageWeights,
} from './aligner-config.js';
import { deepMergeConfig, flattenConfigValues, isPlainObject } from './config-utils.js';

const NUMBER_KEYS = [
  'batchSize',
  'refinement.wideWindow',
  'refinement.narrowWindow',
  'refinement.maxWindowTokens',
  'refinement.boundaryRadius',
  'dtw.maxFullMatrixCells',
  'dtw.bandRadius',
  'extendedCut.alignThreshold',
  'extendedCut.trimThreshold',
  'extendedCut.minRunLength',
  'extendedCut.hmm.initialAligned',
  'extendedCut.hmm.stayAligned',
  'extendedCut.hmm.stayUnaligned',
  'extendedCut.hmm.alignedEmitsMatch',
  'extendedCut.hmm.unalignedEmitsMatch',
] as const;

const BOOLEAN_KEYS = ['ignoreNonOverlapFilter', 'retainNewline'] as const;

type NumberKey = (typeof NUMBER_KEYS)[number];
type BooleanKey = (typeof BOOLEAN_KEYS)[number];

/**
 * Loads one or more YAML config files, later files overriding earlier ones,
 * then applies `overrides` and resolves the result against the defaults.
 */
export async function loadAlignerConfig(
  paths: string | readonly string[],
  overrides: AlignerConfigInput = {},
): Promise<AlignerConfig> {
  const files = typeof paths === 'string' ? [paths] : paths;
  let merged: Record<string, unknown> = {};
  for (const filePath of files) {
    merged = deepMergeConfig(merged, await readConfigDocument(filePath));
  }
  const fromFiles = parseAlignerConfigDocument(merged, files.join(', '));
  return resolveAlignerConfig(mergeConfigInputs(fromFiles, overrides));
}

async function readConfigDocument(filePath: string): Promise<Record<string, unknown>> {
  validateYamlExtension(filePath);
  let contents: string;
  let parsed: unknown;
  try {
    contents = await readFile(filePath, 'utf8');
    parsed = parseYaml(contents);
  } catch (error) {
    throw createConfigError(
      ConfigErrorCode.CONFIG_FILE_LOAD_FAILED,
      `Failed to read aligner config: ${error instanceof Error ? error.message : String(error)}`,
      { filePath, cause: error },
    );
  }
  if (parsed === null || parsed === undefined) {
    return {};
  }
  if (!isPlainObject(parsed)) {
    throw createConfigError(
      ConfigErrorCode.INVALID_CONFIG_DOCUMENT,
      'Aligner config must be a YAML mapping.',
      { filePath },
    );
  }
  return parsed;
}

function validateYamlExtension(filePath: string): void {
  const extension = extname(filePath).toLowerCase();
  if (extension === '.yaml' || extension === '.yml') {
    return;
  }
  throw createConfigError(
    ConfigErrorCode.INVALID_CONFIG_FILE_EXTENSION,
    `Aligner config files must be YAML (*.yaml or *.yml). Received: ${filePath}`,
    { filePath },
  );
}

/**
 * Checks a raw document's keys and value types and converts it into an
 * AlignerConfigInput. Value ranges are checked later by resolveAlignerConfig.
 */
export function parseAlignerConfigDocument(document: Record<string, unknown>, filePath?: string): AlignerConfigInput {
  const { progressWeights, ...rest } = document;
  const flat = flattenConfigValues(rest);

  for (const key of Object.keys(flat)) {
    if (!isKnownKey(key)) {
      throw createConfigError(ConfigErrorCode.INVALID_CONFIG_DOCUMENT, `Unknown aligner config key "${key}".`, {
        filePath,
        context: key,
      });
    }
  }

  const num = (key: NumberKey): number | undefined => {
    const value = flat[key];
    if (value === undefined) {
      return undefined;
    }
    if (typeof value !== 'number') {
      throw createConfigError(ConfigErrorCode.INVALID_CONFIG_DOCUMENT, `"${key}" must be a number.`, {
        filePath,
        context: key,
      });
    }
    return value;
  };
  const bool = (key: BooleanKey): boolean | undefined => {
    const value = flat[key];
    if (value === undefined) {
      return undefined;
    }
    if (typeof value !== 'boolean') {
      throw createConfigError(ConfigErrorCode.INVALID_CONFIG_DOCUMENT, `"${key}" must be true or false.`, {
        filePath,
        context: key,
      });
    }
    return value;
  };

  return pruneUndefined({
    batchSize: num('batchSize'),
    ignoreNonOverlapFilter: bool('ignoreNonOverlapFilter'),
    retainNewline: bool('retainNewline'),
    refinement: {
      wideWindow: num('refinement.wideWindow'),
      narrowWindow: num('refinement.narrowWindow'),
      maxWindowTokens: num('refinement.maxWindowTokens'),
      boundaryRadius: num('refinement.boundaryRadius'),
    },
    dtw: {
      maxFullMatrixCells: num('dtw.maxFullMatrixCells'),
      bandRadius: num('dtw.bandRadius'),
    },
    extendedCut: {
      alignThreshold: num('extendedCut.alignThreshold'),
      trimThreshold: num('extendedCut.trimThreshold'),
      minRunLength: num('extendedCut.minRunLength'),
      hmm: {
        initialAligned: num('extendedCut.hmm.initialAligned'),
        stayAligned: num('extendedCut.hmm.stayAligned'),
        stayUnaligned: num('extendedCut.hmm.stayUnaligned'),
        alignedEmitsMatch: num('extendedCut.hmm.alignedEmitsMatch'),
        unalignedEmitsMatch: num('extendedCut.hmm.unalignedEmitsMatch'),
      },
    },
    progressWeights: parseProgressWeights(progressWeights, filePath),
  });
}

function isKnownKey(key: string): key is NumberKey | BooleanKey {
  return NUMBER_KEYS.some((known) => known === key) || BOOLEAN_KEYS.some((known) => known === key);
}

function parseProgressWeights(
  value: unknown,
  filePath: string | undefined,
): Partial<Record<AlignmentMode, StageWeights>> | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (!isPlainObject(value)) {
    throw createConfigError(ConfigErrorCode.INVALID_CONFIG_DOCUMENT, '"progressWeights" must be a mapping.', {
      filePath,
      context: 'progressWeights',
    });
  }
  const result: Partial<Record<AlignmentMode, StageWeights>> = {};
  for (const [mode, weights] of Object.entries(value)) {
    const context = `progressWeights.${mode}`;
    const knownMode = ALIGNMENT_MODES.find((candidate) => candidate === mode);
    if (!knownMode || !isPlainObject(weights)) {
      throw createConfigError(
        ConfigErrorCode.INVALID_CONFIG_DOCUMENT,
        `"${context}" must be a stage-to-weight mapping for one of: ${ALIGNMENT_MODES.join(', ')}.`,
        { filePath, context },
      );
    }
    const stageWeights: StageWeights = {};
    for (const [stage, weight] of Object.entries(weights)) {
      if (!isStageId(stage)) {
        throw createConfigError(ConfigErrorCode.UNKNOWN_STAGE_WEIGHT, `Unknown stage "${stage}" in ${context}.`, {
          filePath,
          context: `${context}.${stage}`,
        });
      }
      if (typeof weight !== 'number') {
        throw createConfigError(ConfigErrorCode.INVALID_CONFIG_DOCUMENT, `"${context}.${stage}" must be a number.`, {
          filePath,
          context: `${context}.${stage}`,
        });
      }
      stageWeights[stage] = weight;
    }
    result[knownMode] = stageWeights;
  }
  return result;
}

/** Layers `override` onto `base`, section by section. */
export function mergeConfigInputs(base: AlignerConfigInput, overrideInput: AlignerConfigInput): AlignerConfigInput {
  const override = pruneUndefined(overrideInput);
  return pruneUndefined({
    ...base,
    ...override,
    refinement: { ...base.refinement, ...override.refinement },
    dtw: { ...base.dtw, ...override.dtw },
    extendedCut: {
      ...base.extendedCut,
      ...override.extendedCut,
      hmm: { ...base.extendedCut?.hmm, ...override.extendedCut?.hmm },
    },
    progressWeights: { ...base.progressWeights, ...override.progressWeights },
  });
}

/** Drops undefined leaves so that spreading never hides a default. */
function pruneUndefined<T extends object>(value: T): T {
  const result = { ...value };
  for (const [key, entry] of Object.entries(result)) {
    if (entry === undefined) {
      Reflect.deleteProperty(result, key);
    } else if (isPlainObject(entry)) {
      Reflect.set(result, key, pruneUndefined(entry));
    }
  }
  return result;
}
