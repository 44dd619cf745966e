import type { ObservableSource, RippleLogger } from '@ripplekit/core';

/** Projection applied to every source item that passes the filter */
export type ViewSelector<TSource, TResult> = (item: TSource) => TResult;

/** Predicate over source items */
export type ViewFilter<TSource> = (item: TSource) => boolean;

/**
 * Options for a reactive view.
 */
export interface ViewOptions {
  /** Name used in log entries and by {@link ViewManager} (default: `"view"`) */
  name?: string;
  /** Logger receiving debug entries for refreshes and disposal */
  logger?: RippleLogger;
}

/**
 * Statistics about a reactive view.
 */
export interface ViewStats {
  /** View name */
  name: string;
  /** Number of items currently in the view */
  count: number;
  /** Number of rebuilds since construction, including the initial one */
  refreshCount: number;
  /** Number of source-triggered rebuilds that threw */
  failedRefreshCount: number;
  /** Timestamp of the last rebuild */
  lastRefreshed: number;
  /** Average time (ms) spent rebuilding, over the last 100 rebuilds */
  avgRefreshTimeMs: number;
  /** Whether a filter is attached */
  filtered: boolean;
  /** Whether a sort order is attached */
  sorted: boolean;
  /** Whether the last source-triggered rebuild failed */
  stale: boolean;
  /** Whether the view has been disposed */
  disposed: boolean;
}

/**
 * Lifecycle events emitted by {@link ViewManager}.
 */
export type ViewEvent =
  | { type: 'view:created'; name: string }
  | { type: 'view:dropped'; name: string };

/**
 * Anything {@link withView} can dispose.
 */
export interface ViewHandle {
  dispose(): void;
}

/**
 * Type-erased view held by {@link ViewManager}.
 */
export interface ManagedView extends ObservableSource<unknown>, ViewHandle {
  readonly isDisposed: boolean;
  refresh(): void;
  getStats(): ViewStats;
}
