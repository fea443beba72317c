import { ErrorAssert } from './error-assert'
import { ListAssert } from './list-assert'
import { MapAssert } from './map-assert'
import { NumberAssert } from './number-assert'
import { ObjectAssert } from './object-assert'
import { StringAssert } from './string-assert'

/**
 * Hard assertions: the first failing check throws immediately
 */
export function assertThat(actual: number): NumberAssert
export function assertThat(actual: string): StringAssert
export function assertThat<E>(actual: readonly E[]): ListAssert<E>
export function assertThat<K, V>(actual: ReadonlyMap<K, V>): MapAssert<K, V>
export function assertThat(actual: Error): ErrorAssert
export function assertThat<T>(actual: T): ObjectAssert<T>
export function assertThat(
  actual: unknown,
): NumberAssert | StringAssert | ListAssert<unknown> | MapAssert<unknown, unknown> | ErrorAssert | ObjectAssert<unknown> {
  if (typeof actual === 'number') {
    return new NumberAssert(actual)
  }
  if (typeof actual === 'string') {
    return new StringAssert(actual)
  }
  if (Array.isArray(actual)) {
    return new ListAssert<unknown>(actual)
  }
  if (actual instanceof Map) {
    return new MapAssert<unknown, unknown>(actual)
  }
  if (actual instanceof Error) {
    return new ErrorAssert(actual)
  }
  return new ObjectAssert(actual)
}
