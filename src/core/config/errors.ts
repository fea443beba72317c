import { ZodError } from 'zod'
import { ConfigurationError } from '../errors'

type ValidationIssues = ZodError['issues']

/**
 * Soft-assertion settings that failed validation, from the environment or from session overrides.
 * The message lists every issue, one `path: problem` line each.
 */
export class ConfigValidationError extends ConfigurationError {
  constructor(
    message: string,
    public readonly validationErrors: ValidationIssues,
  ) {
    super(`${message}\n${summarise(validationErrors)}`)
    this.name = 'ConfigValidationError'
  }

  getErrorSummary(): string {
    return summarise(this.validationErrors)
  }
}

function summarise(issues: ValidationIssues): string {
  return issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('\n')
}
