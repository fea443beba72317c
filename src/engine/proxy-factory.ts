import { ConfigurationError, messageOf } from '../core/errors'
import { CapturedFailure, FailureDraft, FailureKind, InvocationRecord } from '../core/types/failures'
import { logger } from '../logger'
import { ChainState } from './chain-state'
import {
  AssertionContract,
  ChainStateUpdate,
  ConfigurableAssertion,
  MethodDeclaration,
  isContractInstance,
} from './contract'
import { constructorNameOf } from './comparator-registry'
import { InvocationClassifier, createInvocationClassifier } from './invocation-classifier'

/**
 * Where proxies record deferred failures; implemented by the session
 */
export interface FailureSink {
  record(draft: FailureDraft): CapturedFailure
}

interface ActiveBinding<A extends ConfigurableAssertion> {
  readonly tag: 'active'
  readonly delegate: A
  readonly contract: AssertionContract
  state: ChainState
}

interface PoisonedBinding {
  readonly tag: 'poisoned'
  readonly contract: AssertionContract
}

export type ProxyBinding<A extends ConfigurableAssertion> = ActiveBinding<A> | PoisonedBinding

interface PendingCall {
  invocation: InvocationRecord
  declaration: MethodDeclaration
  member: Function
}

/**
 * Wraps assertion objects into proxies that implement the same contract and defer
 * every check and navigation failure to the session's failure sink.
 *
 * Responsibilities:
 * - Look up each call in the contract's method table and classify it
 * - Run checks, record failures and keep the chain on the same proxy
 * - Run navigations eagerly and wrap their result with a forked chain state
 * - Hand out poisoned proxies for branches whose navigation failed
 * - Leave terminal calls and undeclared members uninstrumented
 */
export class AssertionProxyFactory {
  constructor(
    private readonly sink: FailureSink,
    private readonly classifier: InvocationClassifier = createInvocationClassifier(),
  ) {}

  wrap<A extends C, C extends ConfigurableAssertion>(delegate: A, contract: AssertionContract<C>, state: ChainState): A {
    if (delegate === null || delegate === undefined) {
      throw new ConfigurationError(`Cannot create a soft ${contract.name} without an assertion object to wrap`)
    }
    if (!isContractInstance(delegate, contract)) {
      throw new ConfigurationError(`Cannot wrap ${describeValue(delegate)} as a soft ${contract.name}`)
    }

    const binding: ActiveBinding<A> = { tag: 'active', delegate, contract, state }
    return new Proxy(delegate, this.createHandler(binding))
  }

  /**
   * Stand-in for a branch whose navigation failed: every declared method is a no-op returning
   * the stand-in itself. The failure was already captured by the navigation call.
   */
  poisoned<C extends ConfigurableAssertion>(contract: AssertionContract<C>): C {
    const standIn: C = Object.create(contract.prototype)
    return new Proxy(standIn, this.createHandler<C>({ tag: 'poisoned', contract }))
  }

  private createHandler<A extends ConfigurableAssertion>(binding: ProxyBinding<A>): ProxyHandler<A> {
    if (binding.tag === 'poisoned') {
      return {
        get: (_target, property, receiver: unknown) => {
          if (typeof property === 'string' && binding.contract.methods.has(property)) {
            return () => receiver
          }
          return undefined
        },
        set: () => true,
      }
    }

    const active: ActiveBinding<A> = binding
    return {
      get: (target, property, receiver: unknown) => {
        const member: unknown = Reflect.get(target, property, target)
        const declaration = typeof property === 'string' ? active.contract.methods.get(property) : undefined

        if (typeof property !== 'string' || declaration === undefined || typeof member !== 'function') {
          return typeof member === 'function' ? member.bind(target) : member
        }

        const method = property
        return (...args: unknown[]) => {
          const kind = this.classifier.classify(declaration.returns, active.contract)
          return this.dispatch(active, { invocation: { method, args, kind }, declaration, member }, receiver)
        }
      },
    }
  }

  private dispatch<A extends ConfigurableAssertion>(
    binding: ActiveBinding<A>,
    call: PendingCall,
    receiver: unknown,
  ): unknown {
    const { invocation, declaration } = call
    const declared = declaration.returns

    if (invocation.kind === 'navigation' && declared.kind === 'assertion') {
      return this.runNavigation(binding, call, declared.contract(), receiver)
    }
    if (invocation.kind === 'check') {
      if (declaration.configure) {
        this.configure(binding, declaration.configure, invocation.args)
      } else {
        this.runCheck(binding, call)
      }
      return receiver
    }
    return Reflect.apply(call.member, binding.delegate, invocation.args)
  }

  private runCheck<A extends ConfigurableAssertion>(binding: ActiveBinding<A>, call: PendingCall): void {
    try {
      Reflect.apply(call.member, binding.delegate, call.invocation.args)
    } catch (error) {
      this.capture(binding, call.invocation, error)
    }
  }

  private runNavigation<A extends ConfigurableAssertion>(
    binding: ActiveBinding<A>,
    call: PendingCall,
    target: AssertionContract,
    receiver: unknown,
  ): unknown {
    const { invocation, declaration } = call
    let result: unknown

    try {
      result = Reflect.apply(call.member, binding.delegate, invocation.args)
    } catch (error) {
      this.capture(binding, invocation, error)
      logger.debug(`${binding.contract.name}.${invocation.method} failed, continuing on a poisoned ${target.name}`)
      return this.poisoned(target)
    }

    const resultKind = result === binding.delegate ? 'receiver' : 'other'
    if (this.classifier.classify(declaration.returns, binding.contract, resultKind) === 'check') {
      return receiver
    }

    if (!isContractInstance(result, target)) {
      throw new ConfigurationError(
        `${binding.contract.name}.${invocation.method} is declared to return a ${target.name} ` +
          `but returned ${describeValue(result)}`,
      )
    }

    // A pending override moves to the navigated assertion; the origin no longer owns it
    const state = binding.state.fork()
    binding.state = binding.state.consumeMessageOverride()
    result.applyConfiguration(state.configuration())
    return this.wrap(result, target, state)
  }

  private configure<A extends ConfigurableAssertion>(
    binding: ActiveBinding<A>,
    update: ChainStateUpdate,
    args: readonly unknown[],
  ): void {
    const next = update(binding.state, args)
    const configurationChanged = !next.hasSameConfigurationAs(binding.state)
    binding.state = next

    if (configurationChanged) {
      binding.delegate.applyConfiguration(next.configuration())
    }
  }

  private capture<A extends ConfigurableAssertion>(
    binding: ActiveBinding<A>,
    invocation: InvocationRecord,
    error: unknown,
  ): void {
    const { state } = binding
    const failure = this.sink.record({
      kind: failureKindOf(invocation),
      method: invocation.method,
      label: state.label,
      message: state.resolveMessage(messageOf(error)),
      cause: error,
    })
    binding.state = state.consumeMessageOverride()

    logger.debug(`Captured ${failure.kind} failure #${failure.sequence} from ${binding.contract.name}.${failure.method}`)
  }
}

function failureKindOf(invocation: InvocationRecord): FailureKind {
  return invocation.kind === 'navigation' ? 'navigation' : 'check'
}

function describeValue(value: unknown): string {
  if (value === null || value === undefined) {
    return String(value)
  }
  if (typeof value === 'object') {
    return `an instance of ${constructorNameOf(value)}`
  }
  return `a ${typeof value}`
}

export function createAssertionProxyFactory(sink: FailureSink): AssertionProxyFactory {
  return new AssertionProxyFactory(sink)
}
