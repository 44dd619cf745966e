export {
  checkIndex,
  checkInsertIndex,
  checkRange,
  requireArgument,
  requireItems,
} from './arguments.js';
export { applyBatch, resolveBatchPolicy, type BatchOptions, type BatchPolicy } from './batch-policy.js';
export { FifoBuffer } from './fifo-buffer.js';
export { ObservableArray } from './observable-array.js';
export { ObservableCollection } from './observable-collection.js';
export { ObservableContainer, type NotifyFlags } from './observable-container.js';
export { ObservableDictionary, toPair, type DictionarySeed } from './observable-dictionary.js';
export { ObservableHashSet } from './observable-hash-set.js';
export { ObservableList } from './observable-list.js';
export { ObservableQueue } from './observable-queue.js';
export { ObservableStack } from './observable-stack.js';
export type {
  CollectionOptions,
  DictionaryOptions,
  ListOptions,
  RandomSource,
  SequenceOptions,
} from './types.js';
