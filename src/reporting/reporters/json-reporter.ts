import { CapturedFailure } from '../../core/types/failures'

export interface JSONReporterOptions {
  prettyPrint?: boolean
  includeCauses?: boolean
}

/**
 * Machine-readable shape of a soft-assertion session's failures
 */
export interface JSONReport {
  session: {
    id: string
    passed: boolean
    failureCount: number
  }

  failures: Array<{
    sequence: number
    kind: CapturedFailure['kind']
    method: string
    label?: string
    message: string
    cause?: {
      name: string
      message: string
    }
  }>

  meta: {
    generatedAt: string // ISO string
    generator: string
  }
}

/**
 * JSON reporter for CI tools and dashboards consuming soft-assertion results
 */
export class JSONReporter {
  private options: Required<JSONReporterOptions>

  constructor(options: JSONReporterOptions = {}) {
    this.options = {
      prettyPrint: options.prettyPrint ?? false,
      includeCauses: options.includeCauses ?? true,
    }
  }

  generate(sessionId: string, failures: readonly CapturedFailure[]): string {
    const report = this.createReport(sessionId, failures)

    if (this.options.prettyPrint) {
      return JSON.stringify(report, null, 2)
    }

    return JSON.stringify(report)
  }

  createReport(sessionId: string, failures: readonly CapturedFailure[]): JSONReport {
    return {
      session: {
        id: sessionId,
        passed: failures.length === 0,
        failureCount: failures.length,
      },

      failures: failures.map((failure) => {
        const entry: JSONReport['failures'][0] = {
          sequence: failure.sequence,
          kind: failure.kind,
          method: failure.method,
          label: failure.label,
          message: failure.message,
        }

        if (this.options.includeCauses && failure.cause instanceof Error) {
          entry.cause = { name: failure.cause.name, message: failure.cause.message }
        }

        return entry
      }),

      meta: {
        generatedAt: new Date().toISOString(),
        generator: 'softly-json-reporter',
      },
    }
  }
}
