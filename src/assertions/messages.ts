/**
 * Failure message templates shared by the assertion families. Arguments are already
 * rendered with the active representation.
 */

export function expecting(actual: string, clause: string): string {
  return `Expecting actual:\n  ${actual}\n${clause}`
}

export function shouldBeEqual(actual: string, expected: string): string {
  return `expected: ${expected}\n but was: ${actual}`
}

export function shouldHaveSize(actual: string, actualSize: number, expectedSize: number): string {
  return `Expected size: ${expectedSize} but was: ${actualSize} in:\n${actual}`
}

export const SHOULD_NOT_BE_NULL = 'Expecting actual not to be null'

export const SHOULD_NOT_BE_EMPTY = 'Expecting actual not to be empty'

export function comparisonSuffix(description: string | undefined): string {
  return `\nwhen comparing values using ${description ?? 'a custom comparator'}`
}
