import { format } from 'node:util'
import { Representation, STANDARD_REPRESENTATION } from '../core/representation'
import { Comparator, ComparatorRegistry, ComparatorScope } from './comparator-registry'

export interface MessageOverride {
  readonly template: string
  readonly args: readonly unknown[]
}

/**
 * The part of the chain state that wrapped assertion objects act on themselves
 */
export interface AssertionConfiguration {
  readonly comparators: ComparatorRegistry
  readonly representation: Representation
}

interface ChainStateFields {
  readonly label?: string
  readonly messageOverride?: MessageOverride
  readonly representation: Representation
  readonly comparators: ComparatorRegistry
}

/**
 * Contextual overrides of one chain position: label, one-shot message override,
 * representation and comparators. Every transition returns a new value, so a state
 * handed to a navigated proxy can never be changed through its ancestor.
 */
export class ChainState {
  private constructor(private readonly fields: ChainStateFields) {}

  static initial(representation: Representation = STANDARD_REPRESENTATION): ChainState {
    return new ChainState({ representation, comparators: ComparatorRegistry.EMPTY })
  }

  get label(): string | undefined {
    return this.fields.label
  }

  get messageOverride(): MessageOverride | undefined {
    return this.fields.messageOverride
  }

  get representation(): Representation {
    return this.fields.representation
  }

  get comparators(): ComparatorRegistry {
    return this.fields.comparators
  }

  withLabel(label: string): ChainState {
    return new ChainState({ ...this.fields, label })
  }

  withMessageOverride(template: string, args: readonly unknown[] = []): ChainState {
    return new ChainState({ ...this.fields, messageOverride: { template, args: [...args] } })
  }

  consumeMessageOverride(): ChainState {
    if (!this.fields.messageOverride) {
      return this
    }
    return new ChainState({ ...this.fields, messageOverride: undefined })
  }

  withComparator(scope: ComparatorScope, comparator: Comparator<unknown>): ChainState {
    return new ChainState({ ...this.fields, comparators: this.fields.comparators.with(scope, comparator) })
  }

  withoutComparator(scope: ComparatorScope): ChainState {
    return new ChainState({ ...this.fields, comparators: this.fields.comparators.without(scope) })
  }

  withRepresentation(representation: Representation): ChainState {
    return new ChainState({ ...this.fields, representation })
  }

  fork(): ChainState {
    return new ChainState({ ...this.fields })
  }

  /**
   * Message recorded for a failure at this position: the override when one is pending,
   * otherwise the assertion's own message, prefixed with the label
   */
  resolveMessage(defaultMessage: string): string {
    const override = this.fields.messageOverride
    const message = override ? formatOverride(override) : defaultMessage
    return this.fields.label === undefined ? message : `[${this.fields.label}] ${message}`
  }

  configuration(): AssertionConfiguration {
    return { comparators: this.fields.comparators, representation: this.fields.representation }
  }

  hasSameConfigurationAs(other: ChainState): boolean {
    return (
      this.fields.representation === other.fields.representation &&
      this.fields.comparators.equals(other.fields.comparators)
    )
  }
}

export function formatOverride(override: MessageOverride): string {
  return override.args.length === 0 ? override.template : format(override.template, ...override.args)
}
