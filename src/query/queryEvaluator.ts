import {
  AmbiguousResultError,
  EmptyQueryError,
  InvalidArgumentError,
  NoResultError,
} from '../errors.js';
import { Entity } from '../model/entity.js';
import type { Identifier } from '../model/identifier.js';
import type { Predicate } from '../model/predicate.js';
import type { ObjectTerm, Subject, Triple } from '../model/triple.js';
import type { IndexEngine, TripleInput } from '../storage/indexEngine.js';
import { matchClauses, type Binding, type Clause } from './pattern/match.js';

/** 谓词 → 宾语；Map 或键值对序列 */
export type Filter = Iterable<readonly [Predicate, ObjectTerm]>;

/** 谓词 → 宾语集合；attributesOf 的返回值即属此类 */
export type PredicateObjects = Iterable<readonly [Predicate, Iterable<ObjectTerm>]>;

/** 谓词 → 按行排列的宾语序列 */
export type SubjectColumns = Iterable<readonly [Predicate, readonly ObjectTerm[]]>;

export interface TriplePattern {
  subject?: Subject;
  predicate?: Predicate;
  object?: ObjectTerm;
}

export type SelectResult = Set<ObjectTerm> | Set<Subject> | Set<Predicate> | Set<Triple>;

/**
 * 查询求值器
 *
 * 把绑定/未绑定的三元组模式与“谓词:宾语”过滤条件翻译为索引查找与集合交运算。
 */
export class QueryEvaluator {
  constructor(
    private readonly engine: IndexEngine,
    private readonly idSource: () => Identifier,
  ) {}

  // ===================
  // 过滤查询
  // ===================

  getWhich(predicate: Predicate, object: ObjectTerm): Set<Subject> {
    return this.engine.subjectsOf(predicate, object);
  }

  /**
   * 满足全部“谓词:宾语”条件的主语集合
   */
  getAll(filter: Filter): Set<Subject> {
    const clauses = [...filter];
    if (clauses.length === 0) {
      throw new EmptyQueryError();
    }

    // 从最小集合开始求交
    const sets = clauses
      .map(([predicate, object]) => this.getWhich(predicate, object))
      .sort((a, b) => a.size - b.size);
    const [smallest, ...rest] = sets;
    const result = new Set<Subject>();
    for (const subject of smallest) {
      if (rest.every((set) => set.has(subject))) {
        result.add(subject);
      }
    }
    return result;
  }

  get(filter: Filter): Subject {
    const result = this.getAll(filter);
    if (result.size > 1) {
      throw new AmbiguousResultError(result.size);
    }
    const [only] = result;
    if (only === undefined) {
      throw new NoResultError();
    }
    return only;
  }

  // ===================
  // 模式查询
  // ===================

  select(pattern: { subject: Subject; predicate: Predicate; object?: undefined }): Set<ObjectTerm>;
  select(pattern: { subject?: undefined; predicate: Predicate; object: ObjectTerm }): Set<Subject>;
  select(pattern: { subject: Subject; predicate?: undefined; object: ObjectTerm }): Set<Predicate>;
  select(pattern: TriplePattern): SelectResult;
  /**
   * 两项绑定时返回补全模式的第三项集合（走对应的复合键索引），
   * 其余情况返回三元组集合。
   */
  select(pattern: TriplePattern): SelectResult {
    const { subject, predicate, object } = pattern;
    if (subject !== undefined && predicate !== undefined && object === undefined) {
      return this.engine.objectsOf(subject, predicate);
    }
    if (subject === undefined && predicate !== undefined && object !== undefined) {
      return this.engine.subjectsOf(predicate, object);
    }
    if (subject !== undefined && predicate === undefined && object !== undefined) {
      return this.engine.predicatesOf(subject, object);
    }
    return this.triples(pattern);
  }

  /**
   * 匹配模式的三元组集合；未绑定任何项时返回全部三元组
   */
  triples(pattern: TriplePattern): Set<Triple> {
    const { subject, predicate, object } = pattern;
    const out = new Set<Triple>();
    const collect = (s: Subject, p: Predicate, o: ObjectTerm): void => {
      const triple = this.engine.find(s, p, o);
      if (triple) out.add(triple);
    };

    if (subject !== undefined && predicate !== undefined && object !== undefined) {
      collect(subject, predicate, object);
    } else if (subject !== undefined && predicate !== undefined) {
      for (const o of this.engine.objectsOf(subject, predicate)) collect(subject, predicate, o);
    } else if (predicate !== undefined && object !== undefined) {
      for (const s of this.engine.subjectsOf(predicate, object)) collect(s, predicate, object);
    } else if (subject !== undefined && object !== undefined) {
      for (const p of this.engine.predicatesOf(subject, object)) collect(subject, p, object);
    } else if (subject !== undefined) {
      for (const triple of this.engine.triplesWith('S', subject)) out.add(triple);
    } else if (predicate !== undefined) {
      for (const triple of this.engine.triplesWith('P', predicate)) out.add(triple);
    } else if (object !== undefined) {
      for (const triple of this.engine.triplesWith('O', object)) out.add(triple);
    } else {
      for (const triple of this.engine.iterate()) out.add(triple);
    }
    return out;
  }

  match(clauses: readonly Clause[]): Binding[] {
    return matchClauses(this, clauses);
  }

  // ===================
  // 批量写入
  // ===================

  /**
   * 按“行”创建新实体
   *
   * 长度为 1 的序列广播到每个新实体；更长的序列按位置对应各行，且长度必须一致。
   */
  createSubjectsWith(columns: SubjectColumns): Entity[] {
    const entries = [...columns];
    if (entries.length === 0) {
      return [];
    }

    const lengths = new Set<number>();
    for (const [predicate, values] of entries) {
      if (values.length === 0) {
        throw new InvalidArgumentError(`谓词 ${predicate.name} 的宾语序列为空`);
      }
      if (values.length > 1) lengths.add(values.length);
    }
    if (lengths.size > 1) {
      throw new InvalidArgumentError(`宾语序列长度不一致: ${[...lengths].join(', ')}`);
    }
    const [rows = 1] = lengths;

    const subjects = Array.from({ length: rows }, () => new Entity({ id: this.idSource() }));
    const batch: TripleInput[] = [];
    subjects.forEach((subject, row) => {
      for (const [predicate, values] of entries) {
        batch.push([subject, predicate, values.length === 1 ? values[0] : values[row]]);
      }
    });
    this.engine.insertMany(batch);
    return subjects;
  }

  /**
   * 主语 × 宾语 的笛卡尔积，统一使用同一谓词
   */
  addAll(subjects: Iterable<Subject>, objects: Iterable<ObjectTerm>, predicate: Predicate): Triple[] {
    const objectList = [...objects];
    const batch: TripleInput[] = [];
    for (const subject of subjects) {
      for (const object of objectList) {
        batch.push([subject, predicate, object]);
      }
    }
    return this.engine.insertMany(batch).map((result) => result.triple);
  }

  /**
   * 为每个主语写入全部“谓词:宾语”组合，可用于把一个实体的属性复制到其他实体
   */
  setAll(subjects: Iterable<Subject>, predobjects: PredicateObjects): Triple[] {
    const pairs: Array<readonly [Predicate, ObjectTerm]> = [];
    for (const [predicate, objects] of predobjects) {
      for (const object of objects) pairs.push([predicate, object]);
    }
    const batch: TripleInput[] = [];
    for (const subject of subjects) {
      for (const [predicate, object] of pairs) {
        batch.push([subject, predicate, object]);
      }
    }
    return this.engine.insertMany(batch).map((result) => result.triple);
  }
}
