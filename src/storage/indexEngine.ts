import { EmptyStoreError, InvalidArgumentError, UnknownSubjectError } from '../errors.js';
import { Entity } from '../model/entity.js';
import type { Identifier } from '../model/identifier.js';
import { LiteralHasher } from '../model/literal.js';
import { Predicate } from '../model/predicate.js';
import {
  Triple,
  encodeTripleKey,
  isObjectTerm,
  isSubject,
  type ObjectTerm,
  type Subject,
  type Term,
} from '../model/triple.js';
import type { ResolvedTripleStoreOptions } from '../types/openOptions.js';
import { WriteGuard } from '../utils/lock.js';
import type { CompositeKey, IndexAxis } from './compositeKey.js';
import { TripleIndexes, type TermPosition } from './tripleIndexes.js';
import { TripleSet, type EncodedTriple } from './tripleSet.js';
import type { ValidationRegistry } from './validation.js';

export type TripleInput = Triple | readonly [Subject, Predicate, ObjectTerm];

export interface InsertResult {
  triple: Triple;
  /** false 表示三元组已存在，本次插入为空操作 */
  added: boolean;
}

export interface IndexEngineStats {
  triples: number;
  subjects: number;
  predicates: number;
  objects: number;
  keys: Record<IndexAxis, number>;
  cachedLiterals: number;
}

export type EngineOptions = Pick<
  ResolvedTripleStoreOptions,
  'literalCacheSize' | 'verifyIndexHits' | 'requireAssertedReification' | 'warnOnDuplicate'
>;

/**
 * 索引引擎：持有规范三元组集合、SP/PO/OS 复合键索引与插入日志。
 *
 * 写入路径：编码 → 校验 → 在同一写锁内更新全部索引。
 * 校验全部通过之前不做任何修改，被拒绝的写入不会留下痕迹。
 */
export class IndexEngine {
  private readonly set = new TripleSet();
  private readonly indexes = new TripleIndexes();
  private readonly entities = new Map<Identifier, Entity>();
  private readonly predicateTable = new Map<Identifier, Predicate>();
  private readonly literals: LiteralHasher;
  private readonly guard = new WriteGuard();
  private lastSubject: Entity | null = null;

  constructor(
    private readonly validation: ValidationRegistry,
    private readonly options: EngineOptions,
  ) {
    this.literals = new LiteralHasher(options.literalCacheSize);
  }

  get size(): number {
    return this.set.size;
  }

  identify(term: Term): Identifier {
    if (term instanceof Entity || term instanceof Predicate || term instanceof Triple) {
      return term.id;
    }
    return this.literals.identify(term);
  }

  // ===================
  // 写入
  // ===================

  insert(subject: Subject, predicate: Predicate, object: ObjectTerm): InsertResult {
    const [result] = this.insertMany([[subject, predicate, object]]);
    return result;
  }

  /**
   * 批量插入：先编码并校验全部三元组，再统一写入。任一失败则整批不生效。
   */
  insertMany(inputs: Iterable<TripleInput>): InsertResult[] {
    return this.guard.run('insert', () => {
      const pending = new Map<string, EncodedTriple>();
      const prepared: EncodedTriple[] = [];
      for (const input of inputs) {
        const encoded = this.encode(input, pending);
        this.validation.assert(encoded.triple.predicate, encoded.triple.object);
        if (!pending.has(encoded.key)) pending.set(encoded.key, encoded);
        prepared.push(encoded);
      }
      return prepared.map((encoded) => this.apply(encoded));
    });
  }

  // ===================
  // 读取
  // ===================

  contains(input: TripleInput): boolean {
    const [subject, predicate, object] = input instanceof Triple ? unpack(input) : input;
    return this.set.has(this.identify(subject), predicate.id, this.identify(object));
  }

  /**
   * 返回存储中的规范三元组实例（若存在）
   */
  find(subject: Subject, predicate: Predicate, object: ObjectTerm): Triple | undefined {
    const key = encodeTripleKey(this.identify(subject), predicate.id, this.identify(object));
    return this.set.get(key)?.triple;
  }

  *iterate(): Generator<Triple, void, undefined> {
    for (const encoded of this.set.iterate()) {
      yield encoded.triple;
    }
  }

  encodedTriples(): Iterable<EncodedTriple> {
    return this.set.iterate();
  }

  /** SP 索引：(s, p, ?) */
  objectsOf(subject: Subject, predicate: Predicate): Set<ObjectTerm> {
    const subjectId = this.identify(subject);
    const out = new Set<ObjectTerm>();
    for (const [objectId, object] of this.indexes.objects(subjectId, predicate.id)) {
      if (this.confirmed(subjectId, predicate.id, objectId)) out.add(object);
    }
    return out;
  }

  /** PO 索引：(?, p, o) */
  subjectsOf(predicate: Predicate, object: ObjectTerm): Set<Subject> {
    const objectId = this.identify(object);
    const out = new Set<Subject>();
    for (const [subjectId, subject] of this.indexes.subjects(predicate.id, objectId)) {
      if (this.confirmed(subjectId, predicate.id, objectId)) out.add(subject);
    }
    return out;
  }

  /** OS 索引：(s, ?, o) */
  predicatesOf(subject: Subject, object: ObjectTerm): Set<Predicate> {
    const subjectId = this.identify(subject);
    const objectId = this.identify(object);
    const out = new Set<Predicate>();
    for (const [predicateId, predicate] of this.indexes.predicates(objectId, subjectId)) {
      if (this.confirmed(subjectId, predicateId, objectId)) out.add(predicate);
    }
    return out;
  }

  triplesWith(position: TermPosition, term: Term): Triple[] {
    return this.indexes.withTerm(position, this.identify(term)).map((encoded) => encoded.triple);
  }

  /**
   * 主语的全部属性：谓词 → 宾语集合。结果可直接传给 setAll。
   */
  attributesOf(subject: Subject): Map<Predicate, Set<ObjectTerm>> {
    const attributes = new Map<Predicate, Set<ObjectTerm>>();
    for (const { triple } of this.indexes.withTerm('S', this.identify(subject))) {
      const objects = attributes.get(triple.predicate);
      if (objects) {
        objects.add(triple.object);
      } else {
        attributes.set(triple.predicate, new Set([triple.object]));
      }
    }
    return attributes;
  }

  /**
   * 最近一次净新增、且以实体为主语的三元组的主语
   */
  lastAdded(): Entity {
    if (this.lastSubject === null) {
      throw new EmptyStoreError();
    }
    return this.lastSubject;
  }

  indexSnapshot(axis: IndexAxis): Map<CompositeKey, Set<Identifier>> {
    return this.indexes.snapshot(axis);
  }

  stats(): IndexEngineStats {
    return {
      triples: this.set.size,
      subjects: this.indexes.primaryCount('S'),
      predicates: this.indexes.primaryCount('P'),
      objects: this.indexes.primaryCount('O'),
      keys: {
        SP: this.indexes.keyCount('SP'),
        PO: this.indexes.keyCount('PO'),
        OS: this.indexes.keyCount('OS'),
      },
      cachedLiterals: this.literals.cached,
    };
  }

  // ===================
  // 内部
  // ===================

  private confirmed(subjectId: Identifier, predicateId: Identifier, objectId: Identifier): boolean {
    return !this.options.verifyIndexHits || this.set.has(subjectId, predicateId, objectId);
  }

  private encode(input: TripleInput, pending: ReadonlyMap<string, EncodedTriple>): EncodedTriple {
    const [subject, predicate, object] = input instanceof Triple ? unpack(input) : input;

    if (!isSubject(subject)) {
      throw new InvalidArgumentError(`主语必须是实体或三元组: ${String(subject)}`);
    }
    if (!(predicate instanceof Predicate)) {
      throw new InvalidArgumentError(`谓词必须是 Predicate 实例: ${String(predicate)}`);
    }
    if (!isObjectTerm(object)) {
      throw new InvalidArgumentError(`不支持的宾语: ${String(object)}`);
    }

    const canonicalSubject = this.canonicalSubject(subject, pending);
    const canonicalPredicate = this.predicateTable.get(predicate.id) ?? predicate;
    const canonicalObject = this.canonicalObject(object, pending);

    const subjectId = this.identify(canonicalSubject);
    const objectId = this.identify(canonicalObject);
    const key = encodeTripleKey(subjectId, canonicalPredicate.id, objectId);
    const existing = this.set.get(key) ?? pending.get(key);
    if (existing) {
      return existing;
    }

    const reuse =
      input instanceof Triple &&
      input.subject === canonicalSubject &&
      input.predicate === canonicalPredicate &&
      input.object === canonicalObject;
    return {
      subjectId,
      predicateId: canonicalPredicate.id,
      objectId,
      key,
      triple: reuse ? input : new Triple(canonicalSubject, canonicalPredicate, canonicalObject),
    };
  }

  private canonicalSubject(subject: Subject, pending: ReadonlyMap<string, EncodedTriple>): Subject {
    if (subject instanceof Entity) {
      return this.entities.get(subject.id) ?? subject;
    }
    const stored = this.set.get(subject.key) ?? pending.get(subject.key);
    if (stored) {
      return stored.triple;
    }
    if (this.options.requireAssertedReification) {
      throw new UnknownSubjectError(String(subject));
    }
    return subject;
  }

  private canonicalObject(object: ObjectTerm, pending: ReadonlyMap<string, EncodedTriple>): ObjectTerm {
    if (object instanceof Entity) {
      return this.entities.get(object.id) ?? object;
    }
    if (object instanceof Predicate) {
      return this.predicateTable.get(object.id) ?? object;
    }
    if (object instanceof Triple) {
      return (this.set.get(object.key) ?? pending.get(object.key))?.triple ?? object;
    }
    return object;
  }

  private apply(encoded: EncodedTriple): InsertResult {
    if (!this.set.add(encoded)) {
      const stored = this.set.get(encoded.key) ?? encoded;
      if (this.options.warnOnDuplicate) {
        console.warn(`[TriStore] 忽略重复三元组 ${String(stored.triple)}`);
      }
      return { triple: stored.triple, added: false };
    }

    const { subject, predicate, object } = encoded.triple;
    if (subject instanceof Entity) this.internEntity(subject);
    if (object instanceof Entity) this.internEntity(object);
    this.internPredicate(predicate);
    if (object instanceof Predicate) this.internPredicate(object);

    this.indexes.add(encoded);
    if (subject instanceof Entity) {
      this.lastSubject = subject;
    }
    return { triple: encoded.triple, added: true };
  }

  private internEntity(entity: Entity): void {
    if (!this.entities.has(entity.id)) this.entities.set(entity.id, entity);
  }

  private internPredicate(predicate: Predicate): void {
    if (!this.predicateTable.has(predicate.id)) this.predicateTable.set(predicate.id, predicate);
  }
}

function unpack(triple: Triple): [Subject, Predicate, ObjectTerm] {
  return [triple.subject, triple.predicate, triple.object];
}
