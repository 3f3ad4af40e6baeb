import { OperationCancelledError } from '../../types/errors';

export interface CancellableOptions {
  signal?: AbortSignal;
}

export function throwIfCancelled(
  signal: AbortSignal | undefined,
  operation: string,
  context?: Record<string, unknown>
): void {
  if (signal?.aborted) {
    throw new OperationCancelledError(operation, context);
  }
}

/**
 * Resolve on the next macrotask so pending I/O (abort events included) runs
 */
export function yieldToEventLoop(): Promise<void> {
  return new Promise(resolve => setImmediate(resolve));
}
