import { ConfigurationError } from '../core/errors'
import { AssertionConfiguration, ChainState } from './chain-state'

/**
 * What every wrapped assertion object must offer: a way to receive the comparators and
 * representation carried by the chain state
 */
export interface ConfigurableAssertion {
  applyConfiguration(configuration: AssertionConfiguration): void
}

export type DeclaredReturn =
  | { readonly kind: 'self' }
  | { readonly kind: 'assertion'; readonly contract: () => AssertionContract }
  | { readonly kind: 'value' }

export type ChainStateUpdate = (state: ChainState, args: readonly unknown[]) => ChainState

export interface MethodDeclaration {
  readonly returns: DeclaredReturn
  // Only allowed on self-returning methods: the proxy applies it instead of calling the delegate
  readonly configure?: ChainStateUpdate
}

export type MethodNames<C> = {
  [K in keyof C]-?: C[K] extends (...args: never[]) => unknown ? K : never
}[keyof C] &
  string

export type MethodTable<C> = { readonly [K in MethodNames<C>]: MethodDeclaration }

/**
 * Static description of one assertion family: its prototype and how each public method returns
 */
export interface AssertionContract<C extends ConfigurableAssertion = ConfigurableAssertion> {
  readonly name: string
  readonly prototype: C
  readonly methods: ReadonlyMap<string, MethodDeclaration>
}

export interface ContractDefinition<C extends ConfigurableAssertion> {
  name: string
  prototype: C
  methods: MethodTable<C> & Readonly<Record<string, MethodDeclaration>>
}

const SELF: DeclaredReturn = Object.freeze({ kind: 'self' })
const VALUE: DeclaredReturn = Object.freeze({ kind: 'value' })

export function returnsSelf(): MethodDeclaration {
  return { returns: SELF }
}

export function returnsValue(): MethodDeclaration {
  return { returns: VALUE }
}

export function navigatesTo(contract: () => AssertionContract): MethodDeclaration {
  return { returns: { kind: 'assertion', contract } }
}

export function configures(configure: ChainStateUpdate): MethodDeclaration {
  return { returns: SELF, configure }
}

export function defineContract<C extends ConfigurableAssertion>(definition: ContractDefinition<C>): AssertionContract<C> {
  const methods = new Map<string, MethodDeclaration>()

  for (const [name, declaration] of Object.entries(definition.methods)) {
    if (declaration.configure && declaration.returns.kind !== 'self') {
      throw new ConfigurationError(`${definition.name}.${name} configures the chain state but does not return itself`)
    }
    methods.set(name, declaration)
  }

  return Object.freeze({ name: definition.name, prototype: definition.prototype, methods })
}

export function isContractInstance<C extends ConfigurableAssertion>(
  value: unknown,
  contract: AssertionContract<C>,
): value is C {
  return typeof value === 'object' && value !== null && Object.prototype.isPrototypeOf.call(contract.prototype, value)
}
