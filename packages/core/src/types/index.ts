export {
  CollectionChanges,
  pair,
  type AddChange,
  type CollectionChange,
  type CollectionChangeType,
  type KeyValuePair,
  type MoveChange,
  type RemoveChange,
  type ReplaceChange,
  type ResetChange,
} from './change.js';

export {
  CountProperty,
  IndexerProperty,
  isSameProperty,
  namedProperty,
  propertyName,
  type CountPropertyId,
  type IndexerPropertyId,
  type NamedPropertyId,
  type PropertyId,
} from './property.js';

export {
  defaultComparer,
  defaultEquals,
  toComparer,
  type Comparer,
  type ComparerLike,
  type ComparerObject,
  type EqualityComparer,
} from './compare.js';

export type { ObservableSource, ReadOnlyList } from './source.js';
