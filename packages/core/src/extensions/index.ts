export { lastIndex, shuffle, shuffleInPlace } from './collection-utils.js';
export {
  toObservableCollection,
  toObservableDictionary,
  toObservableHashSet,
  toObservableList,
  toObservableQueue,
  toObservableStack,
} from './conversions.js';
