/**
 * Assertion families
 * Fluent checks per value type, each with the contract the soft-assertion engine dispatches on
 */

export { assertThat } from './assert-that'
export { AbstractAssert, abstractAssertMethods } from './abstract-assert'
export type { AssertionInfo, AssertionType } from './abstract-assert'
export { ObjectAssert, objectAssertContract, readPropertyPath } from './object-assert'
export { NumberAssert, numberAssertContract, numberAssertMethods } from './number-assert'
export { StringAssert, stringAssertContract } from './string-assert'
export { ListAssert, ListSizeAssert, listAssertContract, listSizeAssertContract } from './list-assert'
export { MapAssert, mapAssertContract } from './map-assert'
export { ErrorAssert, errorAssertContract } from './error-assert'
