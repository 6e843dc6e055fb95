export class CancelledError extends Error {
  public readonly isCancelled = true;
  constructor(message = 'Alignment cancelled by caller') {
    super(message);
    this.name = 'CancelledError';
  }
}

export function isCancelledError(error: unknown): error is CancelledError {
  return error instanceof CancelledError;
}

/**
 * Polled between batches by every stage. The signal is the only cancellation
 * handle shared with the caller.
 */
export function throwIfCancelled(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new CancelledError();
  }
}
