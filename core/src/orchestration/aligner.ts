import { alignTokens, groupPairingByEntry } from '../alignment/dtw.js';
import { extractExtendedCut } from '../alignment/extended-cut.js';
import { cleanFields } from '../alignment/newline-cleaner.js';
import { extractNonOverlap, toPlaceholderField } from '../alignment/non-overlap.js';
import { refineWindows, type RefinerEntry } from '../alignment/window-refiner.js';
import { isCancelledError, throwIfCancelled } from '../cancellation.js';
import {
  isAlignmentMode,
  MODE_STAGES,
  resolveAlignerConfig,
  type AlignerConfig,
  type AlignerConfigInput,
} from '../config/aligner-config.js';
import { EmbeddingStore } from '../embedding/embedding-store.js';
import {
  createInputError,
  createRuntimeError,
  InputErrorCode,
  isSubpairError,
  RuntimeErrorCode,
} from '../errors/index.js';
import { createLanguageDetector } from '../language/language-detector.js';
import { isSpaceSeparatedLanguage, sampleTrackText } from '../language/script-detector.js';
import type { Logger } from '../logger.js';
import { NumericArena } from '../numeric/arena.js';
import { buildTokenSequence, renderEntryText, type TokenSequence } from '../tokenization/token-sequence.js';
import { tokenizeEntries } from '../tokenization/tokenizer.js';
import type {
  AlignInput,
  AlignOptions,
  AlignResult,
  AlignStage,
  AlignmentMode,
  EmbeddingProvider,
  LanguageDetector,
  LocalProgress,
  MergedField,
  StageId,
  TokenizedEntry,
  Track,
  TrackRole,
} from '../types.js';
import { combineFields, countByOrigin } from './combine.js';
import { ProgressTracker } from './progress.js';

export interface SubtitleAlignerOptions {
  embeddingProvider: EmbeddingProvider;
  /** Defaults to eld detection with a Unicode-script fallback */
  languageDetector?: LanguageDetector;
  config?: AlignerConfigInput;
  logger?: Partial<Logger>;
}

export interface SubtitleAligner {
  readonly config: AlignerConfig;
  align(input: AlignInput, options?: AlignOptions): Promise<AlignResult>;
}

const DEFAULT_MODE: AlignmentMode = 'mixed';

/** Stages that only make sense when both tracks still have entries to pair. */
const PAIRING_STAGES: readonly StageId[] = ['dtwAlign', 'refineWide', 'extractExtended', 'refineNarrow'];

/**
 * Creates an aligner bound to one embedding provider and one configuration.
 * The configuration is validated here; every `align` call owns its own
 * embedding cache, scratch buffers and progress state.
 */
export function createSubtitleAligner(options: SubtitleAlignerOptions): SubtitleAligner {
  const config = resolveAlignerConfig(options.config);
  const detector = options.languageDetector ?? createLanguageDetector({ logger: options.logger });
  const logger = options.logger ?? {};

  return {
    config,
    async align(input, alignOptions = {}) {
      const mode = alignOptions.mode ?? DEFAULT_MODE;
      if (!isAlignmentMode(mode)) {
        throw createRuntimeError(RuntimeErrorCode.UNKNOWN_MODE, `Unknown alignment mode "${String(mode)}".`, {
          suggestion: 'Use one of: synced, mixed, cuts.',
        });
      }
      validateTrack(input.primary, 'primary');
      validateTrack(input.secondary, 'secondary');

      const run = new AlignmentRun(input, mode, config, {
        provider: options.embeddingProvider,
        detector,
        logger,
        signal: alignOptions.signal,
        tracker: new ProgressTracker(config.progressWeights[mode], alignOptions.onProgress),
      });
      try {
        return await run.execute();
      } catch (error) {
        if (isCancelledError(error)) {
          logger.info?.('aligner.cancelled', { mode, stage: run.stage });
          throw error;
        }
        logger.error?.('aligner.failed', { mode, stage: run.stage, error: errorMessage(error) });
        if (isSubpairError(error)) {
          throw error;
        }
        throw createRuntimeError(RuntimeErrorCode.STAGE_FAILED, `Alignment failed during ${run.stage}: ${errorMessage(error)}`, {
          context: run.stage,
          cause: error,
        });
      } finally {
        run.dispose();
      }
    },
  };
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/** Checks the shape of each track as well as its content. */
function validateTrack(track: Track | undefined, role: TrackRole): void {
  const entries: unknown = track?.entries;
  if (!Array.isArray(entries)) {
    throw createInputError(InputErrorCode.MALFORMED_TRACK, `The ${role} track has no entry list.`, {
      track: role,
      suggestion: 'Pass each track as { entries: SubtitleEntry[], styles? }.',
    });
  }
  if (entries.length === 0) {
    throw createInputError(InputErrorCode.EMPTY_TRACK, `The ${role} track has no entries.`, { track: role });
  }
  entries.forEach((entry: unknown, entryIndex) => {
    if (!isRecord(entry)) {
      throw createInputError(InputErrorCode.MALFORMED_ENTRY, 'Entry must be an object with start, end and text.', {
        track: role,
        entryIndex,
      });
    }
    const { start, end, text } = entry;
    const validTiming =
      typeof start === 'number' && typeof end === 'number' && Number.isFinite(start) && Number.isFinite(end);
    if (!validTiming || start > end) {
      throw createInputError(
        InputErrorCode.INVALID_ENTRY_TIMING,
        `Entry has invalid timing (start ${String(start)}, end ${String(end)}).`,
        { track: role, entryIndex, suggestion: 'Times must be finite milliseconds with start <= end.' },
      );
    }
    if (typeof text !== 'string') {
      throw createInputError(InputErrorCode.INVALID_ENTRY_TEXT, 'Entry text must be a string.', {
        track: role,
        entryIndex,
      });
    }
  });
}

interface RunContext {
  provider: EmbeddingProvider;
  detector: LanguageDetector;
  logger: Partial<Logger>;
  signal?: AbortSignal;
  tracker: ProgressTracker;
}

/** State of one `align` call. Nothing here outlives the call. */
class AlignmentRun {
  stage: AlignStage = 'init';

  private readonly stages: readonly StageId[];
  private readonly store: EmbeddingStore;
  private readonly arena = new NumericArena();

  constructor(
    private readonly input: AlignInput,
    private readonly mode: AlignmentMode,
    private readonly config: AlignerConfig,
    private readonly context: RunContext,
  ) {
    this.stages = MODE_STAGES[mode];
    this.store = new EmbeddingStore({
      provider: context.provider,
      batchSize: config.batchSize,
      signal: context.signal,
      logger: context.logger,
    });
  }

  async execute(): Promise<AlignResult> {
    const { input, config, context, mode } = this;
    const { logger, signal, tracker } = context;

    tracker.start();
    throwIfCancelled(signal);
    const primaryLanguage = await context.detector.detect(sampleTrackText(input.primary.entries));
    const secondaryLanguage = await context.detector.detect(sampleTrackText(input.secondary.entries));
    const primary = tokenizeEntries(input.primary.entries, isSpaceSeparatedLanguage(primaryLanguage));
    const secondary = tokenizeEntries(input.secondary.entries, isSpaceSeparatedLanguage(secondaryLanguage));
    logger.debug?.('aligner.init', {
      mode,
      primaryLanguage,
      secondaryLanguage,
      primaryEntries: primary.length,
      secondaryEntries: secondary.length,
    });

    const placeholders: MergedField[] = [];
    let primaryResidual = primary;
    let secondaryResidual = secondary;

    if (this.has('extractNonOverlap')) {
      if (config.ignoreNonOverlapFilter) {
        this.skip('extractNonOverlap');
      } else {
        await this.runStage('extractNonOverlap', (report) => {
          const options = { signal, batchSize: config.batchSize };
          const fromPrimary = extractNonOverlap(primary, input.secondary.entries, 'primary', {
            ...options,
            onProgress: (fraction) => report(fraction / 2),
          });
          const fromSecondary = extractNonOverlap(secondary, input.primary.entries, 'secondary', {
            ...options,
            onProgress: (fraction) => report(0.5 + fraction / 2),
          });
          placeholders.push(...fromPrimary.fields, ...fromSecondary.fields);
          primaryResidual = fromPrimary.residual;
          secondaryResidual = fromSecondary.residual;
        });
      }
    }

    let aligned: MergedField[] = [];
    let extended: MergedField[] = [];
    // nothing to pair when either side has no tokens left
    if (countTokens(primaryResidual) === 0 || countTokens(secondaryResidual) === 0) {
      logger.info?.('aligner.degenerate', {
        mode,
        primaryResidual: primaryResidual.length,
        secondaryResidual: secondaryResidual.length,
      });
      for (const stage of PAIRING_STAGES) {
        if (this.has(stage)) {
          this.skip(stage);
        }
      }
      placeholders.push(
        ...primaryResidual.map((entry) => toPlaceholderField(entry, 'primary')),
        ...secondaryResidual
          .filter((entry) => entry.tokens.length > 0)
          .map((entry) => toPlaceholderField(entry, 'secondary')),
      );
    } else {
      ({ aligned, extended } = await this.pair(primaryResidual, secondaryResidual));
    }

    const combined = await this.runStage('combine', (report) => {
      const fields = combineFields(aligned, extended, placeholders);
      report(1);
      return fields;
    });
    const fields = await this.runStage('cleanup', (report) =>
      cleanFields(combined, {
        retainNewline: config.retainNewline,
        batchSize: config.batchSize,
        signal,
        onProgress: report,
      }),
    );

    this.stage = 'done';
    tracker.finish();
    const stats = {
      mode,
      primaryLanguage,
      secondaryLanguage,
      primaryTokens: countTokens(primary),
      secondaryTokens: countTokens(secondary),
      fieldsByOrigin: countByOrigin(fields),
    };
    logger.info?.('aligner.complete', { ...stats, fields: fields.length, embeddings: this.store.size });
    return {
      fields,
      primaryStyles: input.primary.styles ?? {},
      secondaryStyles: input.secondary.styles ?? {},
      stats,
    };
  }

  dispose(): void {
    this.arena.release();
  }

  private async pair(
    primary: readonly TokenizedEntry[],
    secondary: readonly TokenizedEntry[],
  ): Promise<{ aligned: MergedField[]; extended: MergedField[] }> {
    const { config, store, arena } = this;
    const { logger, signal } = this.context;
    const primarySequence = buildTokenSequence(primary);
    const secondarySequence = buildTokenSequence(secondary);

    let entries = await this.runStage('dtwAlign', async (report): Promise<RefinerEntry[]> => {
      const result = await alignTokens(
        primarySequence.tokens.map((token) => token.text),
        secondarySequence.tokens.map((token) => token.text),
        {
          store,
          arena,
          maxFullMatrixCells: config.dtw.maxFullMatrixCells,
          bandRadius: config.dtw.bandRadius,
          signal,
          onProgress: report,
          logger,
        },
      );
      const spans = groupPairingByEntry(result.pairing, primarySequence.spans);
      return primary.map((entry, index) => ({
        primary: entry,
        primaryText: renderEntryText(entry),
        span: spans[index] ?? { start: 0, end: 0 },
        secondaryText: '',
        score: 0,
      }));
    });

    let stageNumber = 1;
    const refine = async (stage: StageId, pool: RefinerEntry[], window: number): Promise<RefinerEntry[]> =>
      this.runStage(stage, async (report) => {
        const result = await refineWindows(pool, {
          secondary: secondarySequence,
          store,
          window,
          maxWindowTokens: config.refinement.maxWindowTokens,
          boundaryRadius: config.refinement.boundaryRadius,
          stageNumber,
          signal,
          onProgress: report,
          logger,
        });
        stageNumber = result.stageNumber;
        return result.entries;
      });

    entries = await refine('refineWide', entries, config.refinement.wideWindow);

    let extended: MergedField[] = [];
    if (this.has('extractExtended')) {
      const cut = await this.runStage('extractExtended', (report) =>
        extractExtendedCut(entries, { config: config.extendedCut, store, arena, signal, onProgress: report, logger }),
      );
      extended = cut.extended;
      entries = await refine('refineNarrow', cut.pool, config.refinement.narrowWindow);
    }

    return { aligned: entries.map((entry) => toAlignedField(entry, secondarySequence, this.input)), extended };
  }

  private has(stage: StageId): boolean {
    return this.stages.includes(stage);
  }

  private skip(stage: StageId): void {
    this.context.logger.debug?.('aligner.stage.skipped', { stage, mode: this.mode });
    this.context.tracker.complete(stage);
  }

  private async runStage<T>(stage: StageId, work: (report: LocalProgress) => T | Promise<T>): Promise<T> {
    const { logger, signal, tracker } = this.context;
    throwIfCancelled(signal);
    this.stage = stage;
    logger.debug?.('aligner.stage.start', { stage, mode: this.mode });
    const result = await work(tracker.stage(stage));
    throwIfCancelled(signal);
    tracker.complete(stage);
    logger.debug?.('aligner.stage.complete', { stage, mode: this.mode, percent: tracker.percent });
    return result;
  }
}

/**
 * Entries left with no secondary text are reported as primary-only; they
 * keep their place in the count of paired entries.
 */
function toAlignedField(entry: RefinerEntry, secondary: TokenSequence, input: AlignInput): MergedField {
  const { entry: source, sourceIndex } = entry.primary;
  const firstToken = secondary.tokens[entry.span.start];
  const secondaryStyle =
    entry.secondaryText.length > 0 && firstToken ? input.secondary.entries[firstToken.entryIndex]?.style : undefined;
  return {
    start: source.start,
    end: source.end,
    primaryText: entry.primaryText,
    secondaryText: entry.secondaryText,
    primaryStyle: source.style,
    secondaryStyle,
    score: entry.score,
    origin: entry.secondaryText.length > 0 ? 'aligned' : 'primary-only',
    sourceIndex,
  };
}

function countTokens(entries: readonly TokenizedEntry[]): number {
  return entries.reduce((total, entry) => total + entry.tokens.length, 0);
}
