import { ObservableContainer } from '@ripplekit/core';
import { ExclusiveGuard, type GuardOptions } from './exclusive-guard.js';

/**
 * Base for the guarded containers.
 *
 * Storage reads and writes run inside {@link ExclusiveGuard} sections;
 * notifications are raised after the section ends, so an observer may see
 * a change that a later call has already superseded.
 *
 * Iteration copies the contents under the guard and walks the copy. An
 * iterator (or an async loop awaiting between items) never observes later
 * mutations and never holds the guard.
 */
export abstract class ConcurrentContainer<T> extends ObservableContainer<T> {
  protected readonly guard: ExclusiveGuard;

  protected constructor(defaultName: string, options: GuardOptions) {
    super();
    this.guard = new ExclusiveGuard({ name: options.name ?? defaultName, logger: options.logger });
  }

  get count(): number {
    return this.guard.run('count', () => this.size());
  }

  /** Point-in-time copy of the contents, in iteration order */
  snapshot(): T[] {
    return this.guard.run('snapshot', () => this.copyContents());
  }

  [Symbol.iterator](): Iterator<T> {
    return this.snapshot()[Symbol.iterator]();
  }

  override toArray(): T[] {
    return this.snapshot();
  }

  /** Size of the backing storage; called inside the guard */
  protected abstract size(): number;

  /** Copy of the backing storage; called inside the guard */
  protected abstract copyContents(): T[];
}
