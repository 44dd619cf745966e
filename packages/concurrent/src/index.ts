// Guard
export { ExclusiveGuard, type GuardOptions } from './exclusive-guard.js';

// Containers
export { ConcurrentContainer } from './concurrent-container.js';
export { ObservableConcurrentDictionary } from './observable-concurrent-dictionary.js';
export { ObservableConcurrentList } from './observable-concurrent-list.js';
export { ObservableConcurrentQueue } from './observable-concurrent-queue.js';
export { ObservableConcurrentStack } from './observable-concurrent-stack.js';

// Value cells
export { ConcurrentObject, type Updater } from './concurrent-object.js';
export { ObservableConcurrentObject } from './observable-concurrent-object.js';

export {
  found,
  notFound,
  type ConcurrentCollectionOptions,
  type ConcurrentDictionaryOptions,
  type ConcurrentSequenceOptions,
  type TryResult,
} from './types.js';
