import { ExclusiveGuard, type GuardOptions } from './exclusive-guard.js';

/**
 * Updater passed to {@link ConcurrentObject.update}. Returning a value
 * replaces the stored one; returning nothing keeps the (possibly mutated)
 * current instance.
 */
export type Updater<T> = (current: T) => T | void;

/**
 * A single guarded slot.
 *
 * @typeParam T - The stored value type
 *
 * @example
 * ```typescript
 * const settings = new ConcurrentObject({ retries: 1 });
 *
 * settings.update((current) => {
 *   current.retries++;
 * });
 * settings.update((current) => ({ ...current, retries: 0 }));
 * ```
 */
export class ConcurrentObject<T> {
  protected readonly guard: ExclusiveGuard;
  private current: T;

  constructor(value: T, options: GuardOptions = {}) {
    this.current = value;
    this.guard = new ExclusiveGuard({ name: options.name ?? 'ConcurrentObject', logger: options.logger });
  }

  get value(): T {
    return this.tryGetValue();
  }

  set value(next: T) {
    this.addOrUpdate(next);
  }

  tryGetValue(): T {
    return this.guard.run('read', () => this.current);
  }

  /** Replace the stored value */
  addOrUpdate(next: T): void {
    this.guard.run('write', () => {
      this.current = next;
    });
  }

  /**
   * Run `updater` against the stored value inside the guard.
   *
   * @returns The value stored afterwards
   */
  update(updater: Updater<T>): T {
    return this.guard.run('update', () => {
      const next = updater(this.current);
      if (next !== undefined) this.current = next;
      return this.current;
    });
  }
}
