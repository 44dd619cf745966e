// Types
export type {
  ManagedView,
  ViewEvent,
  ViewFilter,
  ViewHandle,
  ViewOptions,
  ViewSelector,
  ViewStats,
} from './types.js';

// View
export { ObservableViewList } from './observable-view-list.js';
export { createView, withView } from './create-view.js';

// View Manager
export { ViewManager, createViewManager, type ViewManagerOptions } from './view-manager.js';
