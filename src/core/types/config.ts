import { z } from 'zod'

export const LogLevelSchema = z.enum(['silent', 'error', 'warn', 'info', 'debug'])

export type LogLevel = z.infer<typeof LogLevelSchema>

export const RepresentationNameSchema = z.enum(['standard', 'unicode'])

export type RepresentationName = z.infer<typeof RepresentationNameSchema>

// Settings shared by every soft-assertion session
export const SoftAssertionsConfigSchema = z.object({
  representation: RepresentationNameSchema.default('standard'),
  failureHeader: z.string().min(1).default('Multiple Failures'), // First line of the aggregate failure message
  logLevel: LogLevelSchema.default('warn'),
})

export type SoftAssertionsConfig = z.infer<typeof SoftAssertionsConfigSchema>

export type SoftAssertionsConfigInput = z.input<typeof SoftAssertionsConfigSchema>
