import { CapturedFailure } from '../core/types/failures'

/**
 * Builds the message of an aggregate failure. Each captured message is kept verbatim,
 * multi-line content included:
 *
 * ```
 * Multiple Failures (2 failures)
 * -- failure 1 --
 * [age] expected: 10
 *  but was: 33
 * -- failure 2 --
 * boom
 * ```
 */
export function formatAggregateMessage(failures: readonly CapturedFailure[], header: string): string {
  const count = failures.length === 1 ? '1 failure' : `${failures.length} failures`
  const lines = [`${header} (${count})`]

  failures.forEach((failure, index) => {
    lines.push(`-- failure ${index + 1} --`)
    lines.push(failure.message)
  })

  return lines.join('\n')
}
