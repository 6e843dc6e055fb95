import type { HmmParameters } from '../config/aligner-config.js';
import type { NumericArena } from '../numeric/arena.js';

export const UNALIGNED = 0;
export const ALIGNED = 1;

/**
 * Most likely aligned/unaligned state sequence for an observed match mask
 * (1 = the entry matched its secondary text). Computed in log space.
 * Ties resolve to the aligned state.
 */
export function smoothMask(mask: ArrayLike<number>, params: HmmParameters, arena: NumericArena): Uint8Array {
  const length = mask.length;
  const states = new Uint8Array(length);
  if (length === 0) {
    return states;
  }

  const logInitial = [Math.log(1 - params.initialAligned), Math.log(params.initialAligned)];
  // transition[from][to]
  const logTransition = [
    [Math.log(params.stayUnaligned), Math.log(1 - params.stayUnaligned)],
    [Math.log(1 - params.stayAligned), Math.log(params.stayAligned)],
  ];
  // emission[state][observation]
  const logEmission = [
    [Math.log(1 - params.unalignedEmitsMatch), Math.log(params.unalignedEmitsMatch)],
    [Math.log(1 - params.alignedEmitsMatch), Math.log(params.alignedEmitsMatch)],
  ];
  const emit = (state: number, position: number): number =>
    logEmission[state]?.[mask[position] ? 1 : 0] ?? Number.NEGATIVE_INFINITY;
  const transition = (from: number, to: number): number => logTransition[from]?.[to] ?? Number.NEGATIVE_INFINITY;

  const scoreUnaligned = arena.float64('hmm.unaligned', length);
  const scoreAligned = arena.float64('hmm.aligned', length);
  const fromUnaligned = arena.uint8('hmm.back.unaligned', length);
  const fromAligned = arena.uint8('hmm.back.aligned', length);

  scoreUnaligned[0] = (logInitial[UNALIGNED] ?? 0) + emit(UNALIGNED, 0);
  scoreAligned[0] = (logInitial[ALIGNED] ?? 0) + emit(ALIGNED, 0);

  for (let t = 1; t < length; t += 1) {
    const previousUnaligned = scoreUnaligned[t - 1] ?? Number.NEGATIVE_INFINITY;
    const previousAligned = scoreAligned[t - 1] ?? Number.NEGATIVE_INFINITY;

    const toUnalignedFromU = previousUnaligned + transition(UNALIGNED, UNALIGNED);
    const toUnalignedFromA = previousAligned + transition(ALIGNED, UNALIGNED);
    fromUnaligned[t] = toUnalignedFromA >= toUnalignedFromU ? ALIGNED : UNALIGNED;
    scoreUnaligned[t] = Math.max(toUnalignedFromU, toUnalignedFromA) + emit(UNALIGNED, t);

    const toAlignedFromU = previousUnaligned + transition(UNALIGNED, ALIGNED);
    const toAlignedFromA = previousAligned + transition(ALIGNED, ALIGNED);
    fromAligned[t] = toAlignedFromA >= toAlignedFromU ? ALIGNED : UNALIGNED;
    scoreAligned[t] = Math.max(toAlignedFromU, toAlignedFromA) + emit(ALIGNED, t);
  }

  let state =
    (scoreAligned[length - 1] ?? Number.NEGATIVE_INFINITY) >= (scoreUnaligned[length - 1] ?? Number.NEGATIVE_INFINITY)
      ? ALIGNED
      : UNALIGNED;
  for (let t = length - 1; t >= 0; t -= 1) {
    states[t] = state;
    if (t > 0) {
      state = (state === ALIGNED ? fromAligned[t] : fromUnaligned[t]) ?? ALIGNED;
    }
  }
  return states;
}

/** Maximal runs of `value` as half-open [start, end) index ranges. */
export function runsOf(states: ArrayLike<number>, value: number): Array<[number, number]> {
  const runs: Array<[number, number]> = [];
  let start = -1;
  for (let index = 0; index <= states.length; index += 1) {
    const matches = index < states.length && states[index] === value;
    if (matches && start < 0) {
      start = index;
    } else if (!matches && start >= 0) {
      runs.push([start, index]);
      start = -1;
    }
  }
  return runs;
}
