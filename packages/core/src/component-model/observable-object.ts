import { type Observable, Subject, type Subscription } from 'rxjs';
import type { EqualityComparer } from '../types/compare.js';
import { namedProperty, type NamedPropertyId, type PropertyId } from '../types/property.js';

/**
 * Options for {@link ObservableObject.setProperty}
 */
export interface SetPropertyOptions<T> {
  /** Notify even when the new value equals the current one */
  always?: boolean;
  /** Equality deciding whether anything changed (default: `Object.is`) */
  equals?: EqualityComparer<T>;
  /**
   * Runs after the new value is assigned and before `propertyChanged$`
   * fires. A throw propagates to the caller; the value stays assigned.
   */
  onChanged?: () => void;
}

/**
 * Base class for objects that announce changes to their named properties.
 *
 * Subclasses keep their own fields and route writes through
 * {@link setProperty}, which raises `propertyChanging$`, assigns, runs the
 * optional callback and raises `propertyChanged$`.
 *
 * @example
 * ```typescript
 * class Person extends ObservableObject {
 *   private _name = '';
 *
 *   get name(): string {
 *     return this._name;
 *   }
 *
 *   set name(next: string) {
 *     this.setProperty('name', this._name, next, (v) => (this._name = v));
 *   }
 * }
 * ```
 */
export abstract class ObservableObject {
  private readonly propertyChanging$$ = new Subject<NamedPropertyId>();
  private readonly propertyChanged$$ = new Subject<PropertyId>();

  /** Raised before a property takes its new value */
  readonly propertyChanging$: Observable<NamedPropertyId> = this.propertyChanging$$.asObservable();

  /** Raised after a property took its new value */
  readonly propertyChanged$: Observable<PropertyId> = this.propertyChanged$$.asObservable();

  onPropertyChanged(handler: (property: PropertyId) => void): Subscription {
    return this.propertyChanged$.subscribe(handler);
  }

  /**
   * Assign `next` through `assign` when it differs from `current`.
   *
   * @returns Whether the property was assigned and notified
   */
  protected setProperty<T>(
    name: string,
    current: T,
    next: T,
    assign: (value: T) => void,
    options: SetPropertyOptions<T> = {}
  ): boolean {
    const equals = options.equals ?? Object.is;
    if (!options.always && equals(current, next)) return false;

    this.raisePropertyChanging(name);
    assign(next);
    options.onChanged?.();
    this.raisePropertyChanged(name);
    return true;
  }

  /** Same as {@link setProperty} with `always: true` */
  protected setPropertyAlways<T>(
    name: string,
    current: T,
    next: T,
    assign: (value: T) => void,
    onChanged?: () => void
  ): boolean {
    return this.setProperty(name, current, next, assign, { always: true, onChanged });
  }

  protected raisePropertyChanging(name: string): void {
    this.propertyChanging$$.next(namedProperty(name));
  }

  protected raisePropertyChanged(name: string): void {
    this.propertyChanged$$.next(namedProperty(name));
  }

  /** Complete both channels */
  protected completeNotifications(): void {
    this.propertyChanging$$.complete();
    this.propertyChanged$$.complete();
  }
}
