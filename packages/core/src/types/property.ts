/**
 * Identifiers carried on the property-changed channel.
 *
 * Containers report their size and indexer; value boxes and
 * {@link ObservableObject} subclasses report named properties.
 *
 * @module types/property
 */

/** The container's size changed */
export interface CountPropertyId {
  readonly kind: 'count';
}

/** Some indexed value changed */
export interface IndexerPropertyId {
  readonly kind: 'indexer';
}

/** An arbitrary named property changed */
export interface NamedPropertyId {
  readonly kind: 'named';
  readonly name: string;
}

export type PropertyId = CountPropertyId | IndexerPropertyId | NamedPropertyId;

export const CountProperty: CountPropertyId = Object.freeze({ kind: 'count' });

export const IndexerProperty: IndexerPropertyId = Object.freeze({ kind: 'indexer' });

export function namedProperty(name: string): NamedPropertyId {
  return { kind: 'named', name };
}

/**
 * Display name of a property identifier: `"Count"`, `"Item[]"` or the
 * property's own name.
 */
export function propertyName(id: PropertyId): string {
  switch (id.kind) {
    case 'count':
      return 'Count';
    case 'indexer':
      return 'Item[]';
    case 'named':
      return id.name;
  }
}

/** Check whether two identifiers refer to the same property */
export function isSameProperty(a: PropertyId, b: PropertyId): boolean {
  if (a.kind === 'named' && b.kind === 'named') return a.name === b.name;
  return a.kind === b.kind;
}
