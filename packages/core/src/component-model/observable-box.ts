import type { EqualityComparer } from '../types/compare.js';
import { ObservableObject } from './observable-object.js';

/**
 * Options for {@link ObservableBox}
 */
export interface BoxOptions<T> {
  /** Notify on every write, even when the value is unchanged (default: false) */
  alwaysNotify?: boolean;
  /** Equality gating notifications (default: `Object.is`) */
  equals?: EqualityComparer<T>;
  /** Property name reported on `propertyChanged$` (default: `"value"`) */
  name?: string;
}

/**
 * A single observable slot.
 *
 * Writing raises a named property change unless the new value equals the
 * current one; with `alwaysNotify` every write notifies.
 *
 * @typeParam T - The value type
 *
 * @example
 * ```typescript
 * const status = createBox('idle');
 *
 * status.propertyChanged$.subscribe(() => console.log(status.value));
 *
 * status.value = 'idle';    // nothing
 * status.value = 'loading'; // logs "loading"
 * ```
 */
export class ObservableBox<T> extends ObservableObject {
  private current: T;
  private readonly config: Required<BoxOptions<T>>;

  constructor(initialValue: T, options: BoxOptions<T> = {}) {
    super();
    this.current = initialValue;
    this.config = {
      alwaysNotify: options.alwaysNotify ?? false,
      equals: options.equals ?? Object.is,
      name: options.name ?? 'value',
    };
  }

  get value(): T {
    return this.current;
  }

  set value(next: T) {
    this.set(next);
  }

  /** Whether every write notifies */
  get alwaysNotify(): boolean {
    return this.config.alwaysNotify;
  }

  /** Property name reported by this box */
  get name(): string {
    return this.config.name;
  }

  get(): T {
    return this.current;
  }

  /**
   * Store `next`.
   *
   * @returns Whether a notification fired
   */
  set(next: T): boolean {
    return this.setProperty(this.config.name, this.current, next, (value) => (this.current = value), {
      always: this.config.alwaysNotify,
      equals: this.config.equals,
    });
  }

  /** Complete the notification channels */
  dispose(): void {
    this.completeNotifications();
  }

  override toString(): string {
    return String(this.current);
  }
}

/** Box that notifies only when the value changes */
export function createBox<T>(initialValue: T, options: Omit<BoxOptions<T>, 'alwaysNotify'> = {}): ObservableBox<T> {
  return new ObservableBox(initialValue, { ...options, alwaysNotify: false });
}

/** Box that notifies on every write */
export function createAlwaysBox<T>(
  initialValue: T,
  options: Omit<BoxOptions<T>, 'alwaysNotify'> = {}
): ObservableBox<T> {
  return new ObservableBox(initialValue, { ...options, alwaysNotify: true });
}
