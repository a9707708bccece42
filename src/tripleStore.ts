import { checkConsistency, type ConsistencyCheckResult } from './maintenance/check.js';
import type { Entity } from './model/entity.js';
import type { Predicate, Validator } from './model/predicate.js';
import type { ObjectTerm, Subject, Triple } from './model/triple.js';
import type { Binding, Clause } from './query/pattern/match.js';
import {
  QueryEvaluator,
  type Filter,
  type PredicateObjects,
  type SelectResult,
  type SubjectColumns,
  type TriplePattern,
} from './query/queryEvaluator.js';
import { IndexEngine, type IndexEngineStats, type TripleInput } from './storage/indexEngine.js';
import { ValidationRegistry } from './storage/validation.js';
import {
  assertTripleStoreOptions,
  resolveTripleStoreOptions,
  type TripleStoreOptions,
} from './types/openOptions.js';

/**
 * TripleStore - 嵌入式语义三元组库
 *
 * 以 128 位标识符区分实体与谓词，三元组可以作为另一条事实的主语（具体化），
 * 双项绑定的查询经 SP/PO/OS 复合键索引近似 O(1) 定位。
 *
 * @example
 * ```typescript
 * const store = TripleStore.create();
 * const name = definePredicate('name');
 *
 * const [head] = store.createSubjectsWith([[name, ['head']]]);
 * store.get([[name, 'head']]); // head
 * store.attributesOf(head); // Map { name => Set { 'head' } }
 * ```
 */
export class TripleStore implements Iterable<Triple> {
  private constructor(
    private readonly engine: IndexEngine,
    private readonly evaluator: QueryEvaluator,
    private readonly validation: ValidationRegistry,
  ) {}

  static create(options: TripleStoreOptions = {}): TripleStore {
    assertTripleStoreOptions(options);
    const resolved = resolveTripleStoreOptions(options);
    const validation = new ValidationRegistry();
    const engine = new IndexEngine(validation, resolved);
    return new TripleStore(engine, new QueryEvaluator(engine, resolved.idSource), validation);
  }

  get size(): number {
    return this.engine.size;
  }

  // ===================
  // 写入
  // ===================

  /**
   * 插入三元组并返回存储中的规范实例；已存在时为空操作
   */
  insert(subject: Subject, predicate: Predicate, object: ObjectTerm): Triple {
    return this.engine.insert(subject, predicate, object).triple;
  }

  insertTriple(triple: Triple): Triple {
    const [result] = this.engine.insertMany([triple]);
    return result.triple;
  }

  /**
   * 原子批量插入：任一三元组被拒绝则整批不生效
   */
  insertMany(triples: Iterable<TripleInput>): Triple[] {
    return this.engine.insertMany(triples).map((result) => result.triple);
  }

  /**
   * 为谓词注册校验器，替换此前注册的校验器；只影响之后的插入
   */
  setCheck(predicate: Predicate, validator: Validator): void {
    this.validation.set(predicate, validator);
  }

  clearCheck(predicate: Predicate): boolean {
    return this.validation.delete(predicate);
  }

  createSubjectsWith(columns: SubjectColumns): Entity[] {
    return this.evaluator.createSubjectsWith(columns);
  }

  addAll(subjects: Iterable<Subject>, objects: Iterable<ObjectTerm>, predicate: Predicate): Triple[] {
    return this.evaluator.addAll(subjects, objects, predicate);
  }

  setAll(subjects: Iterable<Subject>, predobjects: PredicateObjects): Triple[] {
    return this.evaluator.setAll(subjects, predobjects);
  }

  // ===================
  // 读取
  // ===================

  contains(triple: TripleInput): boolean {
    return this.engine.contains(triple);
  }

  /** contains 的别名 */
  has(triple: TripleInput): boolean {
    return this.engine.contains(triple);
  }

  iterate(): Iterator<Triple> {
    return this.engine.iterate();
  }

  [Symbol.iterator](): Iterator<Triple> {
    return this.engine.iterate();
  }

  attributesOf(subject: Subject): Map<Predicate, Set<ObjectTerm>> {
    return this.engine.attributesOf(subject);
  }

  lastAdded(): Entity {
    return this.engine.lastAdded();
  }

  getAll(filter: Filter): Set<Subject> {
    return this.evaluator.getAll(filter);
  }

  get(filter: Filter): Subject {
    return this.evaluator.get(filter);
  }

  getWhich(predicate: Predicate, object: ObjectTerm): Set<Subject> {
    return this.evaluator.getWhich(predicate, object);
  }

  select(pattern: { subject: Subject; predicate: Predicate; object?: undefined }): Set<ObjectTerm>;
  select(pattern: { subject?: undefined; predicate: Predicate; object: ObjectTerm }): Set<Subject>;
  select(pattern: { subject: Subject; predicate?: undefined; object: ObjectTerm }): Set<Predicate>;
  select(pattern: TriplePattern): SelectResult;
  select(pattern: TriplePattern): SelectResult {
    return this.evaluator.select(pattern);
  }

  triples(pattern: TriplePattern = {}): Set<Triple> {
    return this.evaluator.triples(pattern);
  }

  /** @experimental 变量绑定查询仍处于实验阶段 */
  match(clauses: readonly Clause[]): Binding[] {
    return this.evaluator.match(clauses);
  }

  // ===================
  // 维护
  // ===================

  stats(): IndexEngineStats {
    return this.engine.stats();
  }

  check(): ConsistencyCheckResult {
    return checkConsistency(this.engine);
  }

  toString(): string {
    let out = '';
    for (const triple of this.engine.iterate()) {
      out += `${String(triple.subject)} ${String(triple.predicate)} ${String(triple.object)}\n`;
    }
    return out;
  }
}
