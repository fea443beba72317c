import { describe, it, expect, jest } from '@jest/globals'
import { CLIReporter } from './cli-reporter'
import { CapturedFailure } from '../../core/types/failures'

const failures: CapturedFailure[] = [
  { sequence: 1, kind: 'check', method: 'isEqualTo', message: 'expected: 10\n but was: 33', cause: undefined },
  { sequence: 2, kind: 'navigation', method: 'first', message: 'Expecting actual not to be empty', cause: undefined },
]

describe('CLIReporter', () => {
  it('should report a clean session', () => {
    expect(new CLIReporter({ showColors: false }).generate([])).toBe('✓ All soft assertions passed')
  })

  it('should list every failure with indented message lines', () => {
    const output = new CLIReporter({ showColors: false }).generate(failures)

    expect(output).toBe(
      [
        '✗ 2 soft assertion(s) failed',
        '',
        '1) isEqualTo [check]',
        '   expected: 10',
        '    but was: 33',
        '2) first [navigation]',
        '   Expecting actual not to be empty',
      ].join('\n'),
    )
  })

  it('should truncate long messages', () => {
    const long: CapturedFailure = { ...failures[0], message: 'a\nb\nc\nd' }

    const output = new CLIReporter({ showColors: false, maxMessageLines: 2 }).generate([long])

    expect(output.split('\n').slice(2)).toEqual(['1) isEqualTo [check]', '   a', '   b', '   … 2 more line(s)'])
  })

  it('should print the report to the console', () => {
    const log = jest.spyOn(console, 'log').mockImplementation(() => undefined)

    new CLIReporter({ showColors: false }).print([])

    expect(log).toHaveBeenCalledWith('✓ All soft assertions passed')
    log.mockRestore()
  })
})
