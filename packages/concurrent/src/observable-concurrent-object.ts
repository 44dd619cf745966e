import { ObservableObject } from '@ripplekit/core';
import { type Updater, ConcurrentObject } from './concurrent-object.js';
import type { GuardOptions } from './exclusive-guard.js';

const VALUE_PROPERTY = 'value';

/**
 * {@link ConcurrentObject} that raises a `value` property change after every
 * write or update, once the guard has been released.
 *
 * @typeParam T - The stored value type
 */
export class ObservableConcurrentObject<T> extends ObservableObject {
  private readonly inner: ConcurrentObject<T>;

  constructor(value: T, options: GuardOptions = {}) {
    super();
    this.inner = new ConcurrentObject(value, {
      name: options.name ?? 'ObservableConcurrentObject',
      logger: options.logger,
    });
  }

  get value(): T {
    return this.inner.tryGetValue();
  }

  set value(next: T) {
    this.inner.addOrUpdate(next);
    this.raisePropertyChanged(VALUE_PROPERTY);
  }

  update(updater: Updater<T>): T {
    const result = this.inner.update(updater);
    this.raisePropertyChanged(VALUE_PROPERTY);
    return result;
  }

  /** Announce a change made to the stored instance outside of `update` */
  override raisePropertyChanged(name: string): void {
    super.raisePropertyChanged(name);
  }
}
