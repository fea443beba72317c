import { SoftAssertionsConfig, SoftAssertionsConfigInput } from '../types/config'
import validateConfig from './validate'

export const ENV_PREFIX = 'SOFT_ASSERT_'

export interface LoadConfigOptions {
  env?: NodeJS.ProcessEnv
  overrides?: SoftAssertionsConfigInput
}

const envMappings = {
  REPRESENTATION: 'representation',
  FAILURE_HEADER: 'failureHeader',
  LOG_LEVEL: 'logLevel',
} as const satisfies Record<string, keyof SoftAssertionsConfig>

/**
 * Resolves configuration with the following precedence:
 * 1. Schema defaults (lowest priority)
 * 2. Environment variables (SOFT_ASSERT_*)
 * 3. Explicit overrides (highest priority)
 */
export function loadConfig(options: LoadConfigOptions = {}): SoftAssertionsConfig {
  const { env = process.env, overrides = {} } = options

  return validateConfig({
    ...loadConfigFromEnv(env),
    ...withoutUndefined(overrides),
  })
}

export function loadConfigFromEnv(env: NodeJS.ProcessEnv): Record<string, string> {
  const config: Record<string, string> = {}

  for (const [suffix, key] of Object.entries(envMappings)) {
    const value = env[`${ENV_PREFIX}${suffix}`]
    if (value !== undefined && value !== '') {
      config[key] = value
    }
  }

  return config
}

function withoutUndefined(input: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(input).filter(([, value]) => value !== undefined))
}
