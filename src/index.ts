// =======================
// 核心导出
// =======================

export { TripleStore } from './tripleStore.js';

// =======================
// 数据模型
// =======================

export { Entity, newEntity } from './model/entity.js';
export type { EntityInit, EntityJSON } from './model/entity.js';
export { Predicate, definePredicate, newPredicate } from './model/predicate.js';
export type { PredicateOptions, Validator } from './model/predicate.js';
export { Triple, isObjectTerm, isSubject, sameTerm } from './model/triple.js';
export type { Literal, ObjectTerm, Subject, Term } from './model/triple.js';
export {
  formatIdentifier,
  isIdentifier,
  namespacedIdentifier,
  parseIdentifier,
  randomIdentifier,
} from './model/identifier.js';
export type { Identifier } from './model/identifier.js';
export { literalIdentifier } from './model/literal.js';

// =======================
// 存储与查询
// =======================

export { AXIS_PARAMETERS, INDEX_AXES, mix } from './storage/compositeKey.js';
export type { AxisParameters, CompositeKey, IndexAxis } from './storage/compositeKey.js';
export type { IndexEngineStats, InsertResult, TripleInput } from './storage/indexEngine.js';
export type {
  Filter,
  PredicateObjects,
  SelectResult,
  SubjectColumns,
  TriplePattern,
} from './query/queryEvaluator.js';
export { Variable, variable } from './query/pattern/match.js';
export type { Binding, Clause } from './query/pattern/match.js';
export type { ConsistencyCheckResult, IndexError } from './maintenance/check.js';

// =======================
// 配置与错误
// =======================

export {
  assertTripleStoreOptions,
  isTripleStoreOptions,
} from './types/openOptions.js';
export type { TripleStoreOptions } from './types/openOptions.js';
export {
  AmbiguousResultError,
  ConcurrentMutationError,
  EmptyQueryError,
  EmptyStoreError,
  InvalidArgumentError,
  InvalidIdentifierError,
  NoResultError,
  TripleStoreError,
  UnknownSubjectError,
  ValidationError,
} from './errors.js';
