import { format } from 'node:util'
import { ConfigurationError } from '../core/errors'
import { isRepresentation } from '../core/representation'
import { ChainState } from './chain-state'
import { requireComparator } from './comparator-registry'
import { configures, returnsValue } from './contract'

function requireText(value: unknown, method: string): string {
  if (typeof value !== 'string') {
    throw new ConfigurationError(`${method} expects a string but received ${typeof value}`)
  }
  return value
}

function formatText(template: string, args: readonly unknown[]): string {
  return args.length === 0 ? template : format(template, ...args)
}

const describedAs = configures((state, [label, ...args]) => {
  return state.withLabel(formatText(requireText(label, 'as'), args))
})

const overridingErrorMessage = configures((state, [template, ...args]) => {
  return state.withMessageOverride(requireText(template, 'overridingErrorMessage'), args)
})

/**
 * Declarations of the chain-configuration methods every assertion family shares.
 * They change the proxy's chain state instead of running on the wrapped object.
 */
export const chainConfigurationMethods = {
  as: describedAs,
  describedAs,
  overridingErrorMessage,
  withFailMessage: overridingErrorMessage,
  usingComparator: configures((state, [comparator]) => {
    return state.withComparator({ kind: 'actual' }, requireComparator(comparator, 'usingComparator'))
  }),
  usingDefaultComparator: configures((state) => state.withoutComparator({ kind: 'actual' })),
  usingElementComparator: configures((state, [comparator]) => {
    return state.withComparator({ kind: 'element' }, requireComparator(comparator, 'usingElementComparator'))
  }),
  usingComparatorForType: configures((state, [typeName, comparator]) => {
    return state.withComparator(
      { kind: 'type', typeName: requireText(typeName, 'usingComparatorForType') },
      requireComparator(comparator, 'usingComparatorForType'),
    )
  }),
  usingComparatorForField: configures((state, [path, comparator]) => {
    return state.withComparator(
      { kind: 'field', path: requireText(path, 'usingComparatorForField') },
      requireComparator(comparator, 'usingComparatorForField'),
    )
  }),
  withRepresentation: configures((state: ChainState, [representation]) => {
    if (!isRepresentation(representation)) {
      throw new ConfigurationError('withRepresentation expects a representation with a toStringOf(value) method')
    }
    return state.withRepresentation(representation)
  }),
  applyConfiguration: returnsValue(),
}
