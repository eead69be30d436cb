/**
 * Synchronous progress sink handed to long-running operations. Implementations
 * must return quickly; the run does not wait on anything they start.
 */
export interface ProgressObserver<TEvent> {
  onProgress(event: TEvent): void;
}

export function noopObserver<TEvent>(): ProgressObserver<TEvent> {
  return { onProgress: () => undefined };
}

export function isCancelled(signal: AbortSignal | undefined): boolean {
  return signal?.aborted ?? false;
}
