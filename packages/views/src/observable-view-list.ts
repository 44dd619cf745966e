/**
 * Reactive view engine.
 *
 * An {@link ObservableViewList} keeps a filtered, projected and optionally
 * sorted copy of a source container. Any change to the source rebuilds the
 * copy synchronously, inside the source's notification, so the view is
 * current by the time the mutating call returns.
 *
 * A rebuild either completes or leaves the view exactly as it was. When a
 * filter, selector or comparer throws during a rebuild triggered by the
 * source, the source's mutating call still returns normally: the view keeps
 * its last good contents, reports itself `stale`, logs the error and
 * publishes it on `refreshFailed$`. The next successful rebuild clears the
 * stale flag. Rebuilds requested directly (`attachFilter`, `refresh`, ...)
 * rethrow to the caller instead.
 *
 * @module observable-view-list
 */

import {
  type Comparer,
  type ComparerLike,
  CollectionChanges,
  CountProperty,
  IndexOutOfRangeError,
  ObjectDisposedError,
  ObservableContainer,
  type ObservableSource,
  type RippleLogger,
  createLogger,
  defaultComparer,
  requireArgument,
  toComparer,
} from '@ripplekit/core';
import { type Observable, Subject, type Subscription } from 'rxjs';
import type { ViewFilter, ViewOptions, ViewSelector, ViewStats } from './types.js';

const MAX_TIMING_SAMPLES = 100;

/**
 * A read-only derived list over an {@link ObservableSource}.
 *
 * The filter applies to source items, the comparer to projected items.
 * Both persist across rebuilds until reset. Every rebuild raises `Count`
 * followed by a single `reset`.
 *
 * @typeParam TSource - Item type of the source
 * @typeParam TResult - Item type of the view
 *
 * @example
 * ```typescript
 * const numbers = new ObservableList([1, 2, 3]);
 * const labels = new ObservableViewList(numbers, (n) => `Item ${n}`);
 *
 * labels.attachFilter((n) => n >= 2);
 * numbers.add(4);
 * labels.toArray(); // ['Item 2', 'Item 3', 'Item 4']
 *
 * labels.dispose();
 * ```
 */
export class ObservableViewList<TSource, TResult = TSource> extends ObservableContainer<TResult> {
  private readonly source: ObservableSource<TSource>;
  private readonly selector: ViewSelector<TSource, TResult>;
  private readonly sourceSubscription: Subscription;
  private readonly name: string;
  private readonly logger: RippleLogger;
  private readonly refreshFailed$$ = new Subject<unknown>();
  private view: TResult[] = [];
  private currentFilter: ViewFilter<TSource> | null = null;
  private currentComparer: Comparer<TResult> | null = null;
  private refreshTimes: number[] = [];
  private refreshCount = 0;
  private failedRefreshCount = 0;
  private lastRefreshed = 0;
  private stale = false;

  /** Errors thrown by rebuilds that the source triggered */
  readonly refreshFailed$: Observable<unknown> = this.refreshFailed$$.asObservable();

  constructor(
    source: ObservableSource<TSource> | null | undefined,
    selector: ViewSelector<TSource, TResult> | null | undefined,
    options: ViewOptions = {}
  ) {
    super();
    this.source = requireArgument(source, 'source');
    this.selector = requireArgument(selector, 'selector');
    this.name = options.name ?? 'view';
    this.logger = options.logger ?? createLogger({ module: 'views' });

    this.sourceSubscription = this.source.collectionChanged$.subscribe(() => this.followSource());
    this.rebuild();
  }

  get count(): number {
    return this.view.length;
  }

  /** Whether the last source-triggered rebuild failed */
  get isStale(): boolean {
    return this.stale;
  }

  /** Currently attached filter, or `null` */
  get filter(): ViewFilter<TSource> | null {
    return this.currentFilter;
  }

  /** Currently attached comparer, or `null` */
  get comparer(): Comparer<TResult> | null {
    return this.currentComparer;
  }

  [Symbol.iterator](): Iterator<TResult> {
    return this.view[Symbol.iterator]();
  }

  /**
   * @throws IndexOutOfRangeError if `index` is outside `[0, count)`
   */
  get(index: number): TResult {
    if (!Number.isInteger(index) || index < 0 || index >= this.view.length) {
      throw new IndexOutOfRangeError('index', index, this.view.length);
    }
    return this.view[index];
  }

  /** Keep only source items matching `predicate`, then rebuild */
  attachFilter(predicate: ViewFilter<TSource> | null | undefined): void {
    this.assertNotDisposed('attachFilter');
    this.rebuild(requireArgument(predicate, 'predicate'), this.currentComparer);
  }

  /** Drop the filter, then rebuild */
  resetFilter(): void {
    this.assertNotDisposed('resetFilter');
    this.rebuild(null, this.currentComparer);
  }

  /**
   * Sort the view with `comparer` (or the default ordering) and keep that
   * order for later rebuilds. Raises a single `reset`; the count does not
   * change.
   */
  attachSort(comparer?: ComparerLike<TResult>): void {
    this.assertNotDisposed('attachSort');
    const compare = comparer === undefined ? defaultComparer : toComparer(comparer);
    const sorted = this.view.slice().sort(compare);
    this.currentComparer = compare;
    this.view = sorted;
    this.notify(CollectionChanges.reset());
  }

  /** Drop the sort order and rebuild in source order */
  resetSort(): void {
    this.assertNotDisposed('resetSort');
    this.rebuild(this.currentFilter, null);
  }

  /** Rebuild from the source with the current filter and sort order */
  refresh(): void {
    this.assertNotDisposed('refresh');
    this.rebuild();
  }

  getStats(): ViewStats {
    const avgRefreshTimeMs =
      this.refreshTimes.length > 0
        ? this.refreshTimes.reduce((sum, t) => sum + t, 0) / this.refreshTimes.length
        : 0;

    return {
      name: this.name,
      count: this.view.length,
      refreshCount: this.refreshCount,
      failedRefreshCount: this.failedRefreshCount,
      lastRefreshed: this.lastRefreshed,
      avgRefreshTimeMs,
      filtered: this.currentFilter !== null,
      sorted: this.currentComparer !== null,
      stale: this.stale,
      disposed: this.isDisposed,
    };
  }

  /**
   * Stop following the source and complete the view's channels. The
   * contents stay readable but frozen. Safe to call more than once.
   */
  override dispose(): void {
    if (this.isDisposed) return;
    this.sourceSubscription.unsubscribe();
    this.refreshFailed$$.complete();
    super.dispose();
    this.logger.debug('View disposed', { name: this.name, count: this.view.length });
  }

  // ── Private ──────────────────────────────────────────────────────────

  private followSource(): void {
    try {
      this.rebuild();
    } catch (error) {
      this.stale = true;
      this.failedRefreshCount++;
      this.logger.error('Refresh failed', error, { name: this.name, count: this.view.length });
      this.refreshFailed$$.next(error);
    }
  }

  /**
   * Compute the contents for `filter` and `comparer`, then commit all three
   * together. Nothing is assigned if computing throws.
   */
  private rebuild(
    filter: ViewFilter<TSource> | null = this.currentFilter,
    comparer: Comparer<TResult> | null = this.currentComparer
  ): void {
    const start = performance.now();
    const end = this.logger.time('refresh');

    const next: TResult[] = [];
    for (const item of this.source) {
      if (filter === null || filter(item)) {
        next.push(this.selector(item));
      }
    }
    if (comparer !== null) {
      next.sort(comparer);
    }

    this.currentFilter = filter;
    this.currentComparer = comparer;
    this.view = next;
    this.stale = false;

    this.recordRefresh(performance.now() - start);
    end({ name: this.name, count: next.length });

    this.raisePropertyChanged(CountProperty);
    this.notify(CollectionChanges.reset());
  }

  private recordRefresh(elapsed: number): void {
    this.refreshCount++;
    this.lastRefreshed = Date.now();
    this.refreshTimes.push(elapsed);
    if (this.refreshTimes.length > MAX_TIMING_SAMPLES) {
      this.refreshTimes = this.refreshTimes.slice(-MAX_TIMING_SAMPLES);
    }
  }

  private assertNotDisposed(operation: string): void {
    if (this.isDisposed) throw new ObjectDisposedError('ObservableViewList', operation);
  }
}
