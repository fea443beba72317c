import { inspect } from 'node:util'
import { RepresentationName } from './types/config'

/**
 * Turns values into the text used inside failure messages
 */
export interface Representation {
  readonly name: string
  toStringOf(value: unknown): string
}

export class StandardRepresentation implements Representation {
  readonly name: string = 'standard'

  toStringOf(value: unknown): string {
    if (typeof value === 'string') {
      return this.formatString(value)
    }
    if (value === null || value === undefined || typeof value === 'number' || typeof value === 'boolean') {
      return String(value)
    }
    if (typeof value === 'bigint') {
      return `${value}n`
    }
    if (Array.isArray(value)) {
      return `[${value.map((element: unknown) => this.toStringOf(element)).join(', ')}]`
    }
    if (value instanceof Map) {
      const entries = Array.from(value.entries(), ([key, entry]: [unknown, unknown]) => {
        return `${this.toStringOf(key)}=${this.toStringOf(entry)}`
      })
      return `{${entries.join(', ')}}`
    }
    if (value instanceof Error) {
      return `${value.name}: ${this.formatString(value.message)}`
    }
    return inspect(value, { depth: 4, breakLength: Infinity })
  }

  protected formatString(value: string): string {
    return JSON.stringify(value)
  }
}

/**
 * Escapes every non-ASCII character of strings as \uXXXX
 */
export class UnicodeRepresentation extends StandardRepresentation {
  readonly name: string = 'unicode'

  protected formatString(value: string): string {
    return super.formatString(value).replace(/[^\x20-\x7e]/g, (char) => {
      return `\\u${char.charCodeAt(0).toString(16).padStart(4, '0')}`
    })
  }
}

export const STANDARD_REPRESENTATION: Representation = new StandardRepresentation()

export const UNICODE_REPRESENTATION: Representation = new UnicodeRepresentation()

export function representationNamed(name: RepresentationName): Representation {
  return name === 'unicode' ? UNICODE_REPRESENTATION : STANDARD_REPRESENTATION
}

export function isRepresentation(value: unknown): value is Representation {
  return (
    typeof value === 'object' &&
    value !== null &&
    'toStringOf' in value &&
    typeof value.toStringOf === 'function' &&
    'name' in value &&
    typeof value.name === 'string'
  )
}
