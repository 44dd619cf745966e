/**
 * Registry for named reactive views.
 *
 * @module view-manager
 */

import {
  DuplicateKeyError,
  KeyNotFoundError,
  ObjectDisposedError,
  type ObservableSource,
  type RippleLogger,
  createLogger,
} from '@ripplekit/core';
import { type Observable, Subject, takeUntil } from 'rxjs';
import { ObservableViewList } from './observable-view-list.js';
import type { ManagedView, ViewEvent, ViewSelector, ViewStats } from './types.js';

/**
 * Options for {@link ViewManager}
 */
export interface ViewManagerOptions {
  /** Logger shared with every view the manager creates */
  logger?: RippleLogger;
}

/**
 * Creates, tracks and disposes named views.
 *
 * @example
 * ```typescript
 * const manager = createViewManager();
 *
 * const open = manager.createView('open-orders', orders, (o) => o.id);
 * open.attachFilter((o) => o.status === 'open');
 *
 * manager.events().subscribe((event) => console.log(event.type, event.name));
 * manager.stats(); // [{ name: 'open-orders', count: ..., ... }]
 *
 * manager.dropView('open-orders');
 * ```
 */
export class ViewManager {
  private readonly views = new Map<string, ManagedView>();
  private readonly eventSubject = new Subject<ViewEvent>();
  private readonly destroy$ = new Subject<void>();
  private readonly logger: RippleLogger;
  private disposed = false;

  constructor(options: ViewManagerOptions = {}) {
    this.logger = options.logger ?? createLogger({ module: 'views' });
  }

  /** Number of registered views */
  get size(): number {
    return this.views.size;
  }

  /**
   * Create a view over `source` and register it under `name`.
   *
   * @throws DuplicateKeyError if a view with that name is registered
   * @throws ObjectDisposedError if the manager has been disposed
   */
  createView<TSource, TResult>(
    name: string,
    source: ObservableSource<TSource>,
    selector: ViewSelector<TSource, TResult>
  ): ObservableViewList<TSource, TResult> {
    if (this.disposed) throw new ObjectDisposedError('ViewManager', 'createView');
    if (this.views.has(name)) throw new DuplicateKeyError(name);

    const view = new ObservableViewList(source, selector, {
      name,
      logger: this.logger.child(name),
    });
    this.views.set(name, view);

    this.logger.debug('View created', { name, count: view.count });
    this.eventSubject.next({ type: 'view:created', name });
    return view;
  }

  /** Look up a registered view */
  getView(name: string): ManagedView | undefined {
    return this.views.get(name);
  }

  hasView(name: string): boolean {
    return this.views.has(name);
  }

  /**
   * Dispose the view registered under `name` and forget it.
   *
   * @throws KeyNotFoundError if no view has that name
   */
  dropView(name: string): void {
    const view = this.views.get(name);
    if (!view) throw new KeyNotFoundError(name);

    view.dispose();
    this.views.delete(name);

    this.logger.debug('View dropped', { name });
    this.eventSubject.next({ type: 'view:dropped', name });
  }

  /** Statistics for every registered view */
  stats(): ViewStats[] {
    return Array.from(this.views.values(), (view) => view.getStats());
  }

  /** Lifecycle events until the manager is disposed */
  events(): Observable<ViewEvent> {
    return this.eventSubject.asObservable().pipe(takeUntil(this.destroy$));
  }

  /** Dispose and forget every registered view; the manager stays usable */
  disposeAll(): void {
    for (const name of Array.from(this.views.keys())) {
      this.dropView(name);
    }
  }

  /**
   * Dispose every view and complete the event stream. No views can be
   * created afterwards.
   */
  dispose(): void {
    if (this.disposed) return;
    this.disposeAll();
    this.disposed = true;

    this.destroy$.next();
    this.destroy$.complete();
    this.eventSubject.complete();
  }
}

export function createViewManager(options?: ViewManagerOptions): ViewManager {
  return new ViewManager(options);
}
