export { loadConfig, loadConfigFromEnv, ENV_PREFIX } from './load'
export type { LoadConfigOptions } from './load'
export { default as validateConfig } from './validate'
export { ConfigValidationError } from './errors'
