/**
 * Soft-assertion engine
 * Intercepts chained assertion calls, defers their failures and reports them at the end of a session
 */

export { Session, beginSession } from './session'
export type { SessionStatus } from './session'
export { assertAll } from './session-aggregator'
export type { DrainableSession } from './session-aggregator'
export { ErrorCollector } from './error-collector'
export { ChainState, formatOverride } from './chain-state'
export type { AssertionConfiguration, MessageOverride } from './chain-state'
export {
  ComparatorRegistry,
  caseInsensitiveComparator,
  comparatorOf,
  constructorNameOf,
  isComparator,
  scopeKey,
  typeNameOf,
} from './comparator-registry'
export type { Comparator, ComparatorScope } from './comparator-registry'
export { InvocationClassifier, createInvocationClassifier } from './invocation-classifier'
export type { ResultKind } from './invocation-classifier'
export { AssertionProxyFactory, createAssertionProxyFactory } from './proxy-factory'
export type { FailureSink, ProxyBinding } from './proxy-factory'
export { chainConfigurationMethods } from './chain-configuration'
export {
  configures,
  defineContract,
  isContractInstance,
  navigatesTo,
  returnsSelf,
  returnsValue,
} from './contract'
export type {
  AssertionContract,
  ChainStateUpdate,
  ConfigurableAssertion,
  ContractDefinition,
  DeclaredReturn,
  MethodDeclaration,
  MethodNames,
  MethodTable,
} from './contract'
