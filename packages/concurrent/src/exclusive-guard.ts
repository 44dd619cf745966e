import { ReentrantAccessError, type RippleLogger, createLogger } from '@ripplekit/core';

/**
 * Options for {@link ExclusiveGuard}
 */
export interface GuardOptions {
  /** Name used in errors and log entries (default: `"guard"`) */
  name?: string;
  /** Logger receiving re-entry warnings */
  logger?: RippleLogger;
}

/**
 * Mutual exclusion for a container's backing storage.
 *
 * Sections run synchronously and to completion, so no other caller can
 * interleave with one. The only way to reach the storage while a section is
 * running is from inside it (an equality function or updater calling back
 * into the same container); that re-entry is rejected with
 * {@link ReentrantAccessError} instead of seeing half-applied state.
 *
 * @example
 * ```typescript
 * const guard = new ExclusiveGuard({ name: 'orders' });
 * const size = guard.run('count', () => items.length);
 * ```
 */
export class ExclusiveGuard {
  private holder: string | null = null;
  private readonly name: string;
  private readonly logger: RippleLogger;

  constructor(options: GuardOptions = {}) {
    this.name = options.name ?? 'guard';
    this.logger = options.logger ?? createLogger({ module: 'guard' });
  }

  /** Whether a section is currently running */
  get isHeld(): boolean {
    return this.holder !== null;
  }

  /**
   * Run `fn` as the only holder of the guard and return its result. The
   * guard is released however `fn` exits.
   *
   * @throws ReentrantAccessError if called from inside another section of
   * this guard
   */
  run<R>(operation: string, fn: () => R): R {
    if (this.holder !== null) {
      this.logger.warn('Re-entrant access rejected', {
        guard: this.name,
        operation,
        holder: this.holder,
      });
      throw new ReentrantAccessError(this.name, operation, this.holder);
    }

    this.holder = operation;
    try {
      return fn();
    } finally {
      this.holder = null;
    }
  }
}
