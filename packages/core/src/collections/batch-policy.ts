/**
 * Batch notification policy for multi-item operations.
 *
 * - **coarse**: the whole batch is applied, then a single `reset` is raised.
 * - **fine**: every item goes through the container's single-item path and
 *   raises its own event.
 *
 * Either way an empty batch raises nothing.
 *
 * @module collections/batch-policy
 */

export type BatchPolicy = 'coarse' | 'fine';

export interface BatchOptions {
  /**
   * Raise one event per item for range operations instead of a single
   * `reset` (default: false). Fixed for the lifetime of the container.
   */
  notifyOnEachInRange?: boolean;
}

export function resolveBatchPolicy(options: BatchOptions = {}): BatchPolicy {
  return options.notifyOnEachInRange ? 'fine' : 'coarse';
}

/**
 * Apply `items` according to `policy`.
 *
 * @param single - Single-item operation, used for every item under `fine`
 * @param bulk - Applies all items and raises one coarse notification
 */
export function applyBatch<T>(
  policy: BatchPolicy,
  items: readonly T[],
  single: (item: T) => void,
  bulk: (items: readonly T[]) => void
): void {
  if (items.length === 0) return;

  if (policy === 'fine') {
    for (const item of items) {
      single(item);
    }
    return;
  }

  bulk(items);
}
