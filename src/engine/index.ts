export { verifyResource, resolveResource, type VerifyResourceOptions } from './dispatcher.js';
export {
  buildRegistry,
  createDispatcher,
  getDispatcher,
  getRegistry,
  initRegistry,
  resetRegistry,
  type DispatcherOptions,
  type ResourceDispatcher,
} from './registry.js';
export { evaluateExpectation, formatValue, isStructuredExpectation } from './expectation.js';
export { resolveMember, readMember, type MemberKind } from './members.js';
export { bindArguments, filterReservedChecks, type BoundArguments, type DeclaredCheck } from './binder.js';
export { resolveComparator, listComparators, type Comparator } from './comparators.js';
export { snakeToCamel, camelToSnake } from './naming.js';
export * from './errors.js';
export * from './types.js';
