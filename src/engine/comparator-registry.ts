import { ConfigurationError } from '../core/errors'

/**
 * Orders two values: negative, zero (equal) or positive. Declared with a method so a
 * Comparator<string> can be registered where a Comparator<unknown> is stored.
 */
export interface Comparator<T> {
  readonly description?: string
  compare(left: T, right: T): number
}

export type ComparatorScope =
  | { kind: 'actual' }
  | { kind: 'element' }
  | { kind: 'type'; typeName: string }
  | { kind: 'field'; path: string }

export function scopeKey(scope: ComparatorScope): string {
  switch (scope.kind) {
    case 'actual':
    case 'element':
      return scope.kind
    case 'type':
      return `type:${scope.typeName}`
    case 'field':
      return `field:${scope.path}`
  }
}

/**
 * Name used to look up type-scoped comparators: the constructor name for objects, typeof otherwise
 */
export function typeNameOf(value: unknown): string {
  if (value === null) {
    return 'null'
  }
  if (typeof value === 'object') {
    const prototype: unknown = Object.getPrototypeOf(value)
    if (prototype === null) {
      return 'Object'
    }
    return constructorNameOf(value)
  }
  return typeof value
}

/**
 * Name of the constructor an object was built by, 'Object' when its prototype chain has none
 */
export function constructorNameOf(value: object): string {
  const constructor: unknown = Reflect.get(value, 'constructor')
  return typeof constructor === 'function' && constructor.name !== '' ? constructor.name : 'Object'
}

/**
 * Immutable set of comparators keyed by scope
 */
export class ComparatorRegistry {
  static readonly EMPTY = new ComparatorRegistry(new Map())

  private constructor(private readonly entries: ReadonlyMap<string, Comparator<unknown>>) {}

  get size(): number {
    return this.entries.size
  }

  with(scope: ComparatorScope, comparator: Comparator<unknown>): ComparatorRegistry {
    const entries = new Map(this.entries)
    entries.set(scopeKey(scope), comparator)
    return new ComparatorRegistry(entries)
  }

  without(scope: ComparatorScope): ComparatorRegistry {
    const key = scopeKey(scope)
    if (!this.entries.has(key)) {
      return this
    }
    const entries = new Map(this.entries)
    entries.delete(key)
    return new ComparatorRegistry(entries)
  }

  get(scope: ComparatorScope): Comparator<unknown> | undefined {
    return this.entries.get(scopeKey(scope))
  }

  /**
   * Comparator for a field path, falling back to the comparator registered for the value's type
   */
  forField(path: string, value: unknown): Comparator<unknown> | undefined {
    return this.get({ kind: 'field', path }) ?? this.forType(value)
  }

  forType(value: unknown): Comparator<unknown> | undefined {
    return this.get({ kind: 'type', typeName: typeNameOf(value) })
  }

  keys(): string[] {
    return Array.from(this.entries.keys())
  }

  equals(other: ComparatorRegistry): boolean {
    if (other.entries.size !== this.entries.size) {
      return false
    }
    for (const [key, comparator] of this.entries) {
      if (other.entries.get(key) !== comparator) {
        return false
      }
    }
    return true
  }
}

export function comparatorOf<T>(compare: (left: T, right: T) => number, description?: string): Comparator<T> {
  return { description, compare }
}

export const caseInsensitiveComparator: Comparator<string> = comparatorOf(
  (left, right) => left.localeCompare(right, undefined, { sensitivity: 'accent' }),
  'case-insensitive string comparator',
)

export function isComparator(value: unknown): value is Comparator<unknown> {
  return typeof value === 'object' && value !== null && 'compare' in value && typeof value.compare === 'function'
}

export function requireComparator(value: unknown, method: string): Comparator<unknown> {
  if (!isComparator(value)) {
    throw new ConfigurationError(`${method} expects a comparator with a compare(left, right) method`)
  }
  return value
}
