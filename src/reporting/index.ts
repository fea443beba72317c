/**
 * Reporting module
 * Turns captured failures into aggregate messages, terminal listings and JSON
 */

export { formatAggregateMessage } from './aggregate-message'
export { CLIReporter } from './reporters/cli-reporter'
export type { CLIReporterOptions } from './reporters/cli-reporter'
export { JSONReporter } from './reporters/json-reporter'
export type { JSONReport, JSONReporterOptions } from './reporters/json-reporter'
