import { ZodError } from 'zod'
import { SoftAssertionsConfig, SoftAssertionsConfigSchema } from '../types/config'
import { ConfigValidationError } from './errors'

/**
 * Validates a raw configuration object and fills in defaults
 * @throws ConfigValidationError if validation fails
 */
export default function validateConfig(config: unknown): SoftAssertionsConfig {
  try {
    return SoftAssertionsConfigSchema.parse(config)
  } catch (error) {
    if (error instanceof ZodError) {
      throw new ConfigValidationError('Soft assertions configuration is invalid', error.issues)
    }
    throw error
  }
}
