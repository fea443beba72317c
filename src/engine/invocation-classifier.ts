import { InvocationKind } from '../core/types/failures'
import { AssertionContract, DeclaredReturn } from './contract'

/**
 * What the call actually returned: the wrapped object itself, something else, or not known
 * yet because the call has not run
 */
export type ResultKind = 'receiver' | 'other' | 'unknown'

/**
 * Decides how a chained call is dispatched from its declared return alone:
 * - check: the fluent self return, failures are deferred and the chain stays on the same object
 * - navigation: another assertion contract, run eagerly and wrapped again
 * - terminal: a raw value, run uninstrumented
 *
 * A navigation whose declared contract is the enclosing one and that hands back its own
 * receiver is a self return, and self return wins.
 */
export class InvocationClassifier {
  classify(declared: DeclaredReturn, enclosing: AssertionContract, resultKind: ResultKind = 'unknown'): InvocationKind {
    switch (declared.kind) {
      case 'self':
        return 'check'
      case 'assertion':
        return resultKind === 'receiver' && declared.contract() === enclosing ? 'check' : 'navigation'
      case 'value':
        return 'terminal'
    }
  }
}

export function createInvocationClassifier(): InvocationClassifier {
  return new InvocationClassifier()
}
