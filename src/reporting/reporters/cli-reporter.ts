import pc from 'picocolors'
import { CapturedFailure } from '../../core/types/failures'

export interface CLIReporterOptions {
  showColors?: boolean
  maxMessageLines?: number
}

type Color = 'green' | 'red' | 'yellow' | 'dim'

/**
 * Human-readable listing of captured failures for terminals
 */
export class CLIReporter {
  private options: Required<CLIReporterOptions>

  constructor(options: CLIReporterOptions = {}) {
    this.options = {
      showColors: options.showColors ?? true,
      maxMessageLines: options.maxMessageLines ?? 20,
    }
  }

  generate(failures: readonly CapturedFailure[]): string {
    if (failures.length === 0) {
      return this.colorize('✓ All soft assertions passed', 'green')
    }

    const lines = [this.colorize(`✗ ${failures.length} soft assertion(s) failed`, 'red'), '']

    for (const failure of failures) {
      lines.push(this.formatFailure(failure))
    }

    return lines.join('\n')
  }

  print(failures: readonly CapturedFailure[]): void {
    // eslint-disable-next-line no-console
    console.log(this.generate(failures))
  }

  private formatFailure(failure: CapturedFailure): string {
    const heading = `${failure.sequence}) ${failure.method} ${this.colorize(`[${failure.kind}]`, this.kindColor(failure))}`
    const messageLines = failure.message.split('\n')
    const shown = messageLines.slice(0, this.options.maxMessageLines)

    if (messageLines.length > shown.length) {
      shown.push(this.colorize(`… ${messageLines.length - shown.length} more line(s)`, 'dim'))
    }

    return [heading, ...shown.map((line) => `   ${line}`)].join('\n')
  }

  private kindColor(failure: CapturedFailure): Color {
    return failure.kind === 'navigation' ? 'yellow' : 'red'
  }

  private colorize(text: string, color: Color): string {
    if (!this.options.showColors) {
      return text
    }

    switch (color) {
      case 'green':
        return pc.green(text)
      case 'red':
        return pc.red(text)
      case 'yellow':
        return pc.yellow(text)
      case 'dim':
        return pc.dim(text)
    }
  }
}
