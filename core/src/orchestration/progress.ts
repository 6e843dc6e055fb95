import type { StageWeights } from '../config/aligner-config.js';
import type { AlignStage, LocalProgress, ProgressCallback, StageId } from '../types.js';

const STAGE_MESSAGES: Record<AlignStage, string> = {
  init: 'Preparing tracks',
  extractNonOverlap: 'Separating non-overlapping entries',
  dtwAlign: 'Aligning tokens',
  refineWide: 'Refining alignment',
  extractExtended: 'Detecting extended-cut entries',
  refineNarrow: 'Refining remaining alignment',
  combine: 'Combining fields',
  cleanup: 'Cleaning line breaks',
  done: 'Alignment complete',
};

/**
 * Cumulative progress over a mode's stages. Each stage owns its weight;
 * reported percentages are clamped to [0, 100] and never decrease.
 */
export class ProgressTracker {
  private completed = 0;
  private lastPercent = 0;

  constructor(
    private readonly weights: StageWeights,
    private readonly onProgress?: ProgressCallback,
  ) {}

  get percent(): number {
    return this.lastPercent;
  }

  start(): void {
    this.emit('init', 0);
  }

  /** Returns the local reporter for `stage`; fractions outside [0, 1] are clamped. */
  stage(stage: StageId): LocalProgress {
    const weight = this.weights[stage] ?? 0;
    const base = this.completed;
    this.emit(stage, base * 100);
    return (fraction) => {
      const local = Math.min(1, Math.max(0, fraction));
      this.emit(stage, (base + weight * local) * 100);
    };
  }

  /** Credits the whole weight of a stage, whether it ran or was skipped. */
  complete(stage: StageId): void {
    this.completed += this.weights[stage] ?? 0;
    this.emit(stage, this.completed * 100);
  }

  finish(): void {
    this.completed = 1;
    this.emit('done', 100);
  }

  private emit(stage: AlignStage, raw: number): void {
    const percent = Math.max(this.lastPercent, Math.min(100, Math.max(0, raw)));
    this.lastPercent = percent;
    this.onProgress?.({ stage, percent, message: STAGE_MESSAGES[stage] });
  }
}
