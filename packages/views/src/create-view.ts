import type { ObservableSource } from '@ripplekit/core';
import { ObservableViewList } from './observable-view-list.js';
import type { ViewHandle, ViewOptions, ViewSelector } from './types.js';

function isViewSelector<TSource, TResult>(
  value: ViewSelector<TSource, TResult> | ViewOptions | undefined
): value is ViewSelector<TSource, TResult> {
  return typeof value === 'function';
}

/**
 * Create a view over `source`, projected through `selector` when given.
 *
 * @example
 * ```typescript
 * const names = createView(people, (p) => p.name, { name: 'names' });
 * const same = createView(tags);
 * ```
 */
export function createView<T>(source: ObservableSource<T>, options?: ViewOptions): ObservableViewList<T, T>;
export function createView<TSource, TResult>(
  source: ObservableSource<TSource>,
  selector: ViewSelector<TSource, TResult>,
  options?: ViewOptions
): ObservableViewList<TSource, TResult>;
export function createView<TSource, TResult>(
  source: ObservableSource<TSource>,
  selectorOrOptions?: ViewSelector<TSource, TResult> | ViewOptions,
  options?: ViewOptions
): ObservableViewList<TSource, TResult> | ObservableViewList<TSource, TSource> {
  if (isViewSelector(selectorOrOptions)) {
    return new ObservableViewList(source, selectorOrOptions, options);
  }
  return new ObservableViewList(source, (item: TSource) => item, selectorOrOptions);
}

/**
 * Run `fn` with `view` and dispose the view afterwards, whether `fn`
 * returns, throws, resolves or rejects.
 *
 * @example
 * ```typescript
 * const top = withView(createView(scores), (view) => {
 *   view.attachSort((a, b) => b - a);
 *   return view.get(0);
 * });
 * ```
 */
export function withView<V extends ViewHandle, R>(view: V, fn: (view: V) => Promise<R>): Promise<R>;
export function withView<V extends ViewHandle, R>(view: V, fn: (view: V) => R): R;
export function withView<V extends ViewHandle, R>(
  view: V,
  fn: (view: V) => R | Promise<R>
): R | Promise<R> {
  let result: R | Promise<R>;
  try {
    result = fn(view);
  } catch (error) {
    view.dispose();
    throw error;
  }

  if (result instanceof Promise) {
    return result.finally(() => view.dispose());
  }
  view.dispose();
  return result;
}
