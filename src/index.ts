/**
 * Basic usage:
 * ```ts
 * import { assertSoftly } from 'softly'
 *
 * assertSoftly((softly) => {
 *   softly.assertThat(user.name).as('name').startsWith('Ada')
 *   softly.assertThat(user.roles).first().isEqualTo('admin')
 *   softly.assertThat(user.age).isGreaterThan(17)
 * })
 * ```
 */

export { SoftAssertions, assertSoftly } from './soft-assertions'
export type { ErrorType } from './soft-assertions'

export * from './engine'
export * from './assertions'

export {
  AggregateFailure,
  AssertionFailure,
  CheckFailure,
  ConfigurationError,
  NavigationFailure,
  messageOf,
  toError,
} from './core/errors'
export {
  STANDARD_REPRESENTATION,
  StandardRepresentation,
  UNICODE_REPRESENTATION,
  UnicodeRepresentation,
  isRepresentation,
  representationNamed,
} from './core/representation'
export type { Representation } from './core/representation'
export * from './core/config'
export * from './core/types/config'
export type { CapturedFailure, FailureDraft, FailureKind, InvocationKind, InvocationRecord } from './core/types/failures'

export * from './reporting'
export { Logger, logger, resolveLogLevel } from './logger'
