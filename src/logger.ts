import pc from 'picocolors'
import { LogLevel, LogLevelSchema } from './core/types/config'

const LEVEL_WEIGHTS: Record<LogLevel, number> = {
  silent: 0,
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
}

type WritableLevel = Exclude<LogLevel, 'silent'>

const LEVEL_TAGS: Record<WritableLevel, string> = {
  error: pc.red('error'),
  warn: pc.yellow('warn'),
  info: pc.cyan('info'),
  debug: pc.gray('debug'),
}

/**
 * Minimal leveled logger writing to stderr so it never mixes with test reporter output
 */
export class Logger {
  constructor(
    private level: LogLevel,
    private readonly write: (line: string) => void = (line) => process.stderr.write(`${line}\n`),
  ) {}

  setLevel(level: LogLevel): void {
    this.level = level
  }

  getLevel(): LogLevel {
    return this.level
  }

  isEnabled(level: WritableLevel): boolean {
    return LEVEL_WEIGHTS[level] <= LEVEL_WEIGHTS[this.level]
  }

  debug(message: string, ...details: unknown[]): void {
    this.log('debug', message, details)
  }

  info(message: string, ...details: unknown[]): void {
    this.log('info', message, details)
  }

  warn(message: string, ...details: unknown[]): void {
    this.log('warn', message, details)
  }

  error(message: string, ...details: unknown[]): void {
    this.log('error', message, details)
  }

  private log(level: WritableLevel, message: string, details: unknown[]): void {
    if (!this.isEnabled(level)) {
      return
    }

    const suffix = details.length > 0 ? ` ${details.map(formatDetail).join(' ')}` : ''
    this.write(`${pc.dim('[softly]')} ${LEVEL_TAGS[level]} ${message}${suffix}`)
  }
}

function formatDetail(detail: unknown): string {
  if (detail instanceof Error) {
    return detail.stack ?? `${detail.name}: ${detail.message}`
  }
  if (typeof detail === 'string') {
    return detail
  }
  try {
    return JSON.stringify(detail)
  } catch {
    return String(detail)
  }
}

export function resolveLogLevel(value: string | undefined): LogLevel {
  const parsed = LogLevelSchema.safeParse(value)
  return parsed.success ? parsed.data : 'warn'
}

export const logger = new Logger(resolveLogLevel(process.env.SOFT_ASSERT_LOG_LEVEL))
