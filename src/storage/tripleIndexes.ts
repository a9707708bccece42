import type { Identifier } from '../model/identifier.js';
import type { Predicate } from '../model/predicate.js';
import type { ObjectTerm, Subject } from '../model/triple.js';
import { mix, type CompositeKey, type IndexAxis } from './compositeKey.js';
import type { EncodedTriple } from './tripleSet.js';

export type TermPosition = 'S' | 'P' | 'O';

type TermBuckets<T> = Map<CompositeKey, Map<Identifier, T>>;

const EMPTY_BUCKET: ReadonlyMap<Identifier, never> = new Map<Identifier, never>();
const EMPTY_LIST: readonly EncodedTriple[] = [];

/**
 * 派生索引
 *
 * - SP：mix_SP(主语, 谓词) → 宾语集合
 * - PO：mix_PO(谓词, 宾语) → 主语集合
 * - OS：mix_OS(宾语, 主语) → 谓词集合
 * - S/P/O：单项桶，供仅绑定一项的扫描使用
 *
 * 索引是规范集合的纯函数，只能随规范集合同步追加。
 */
export class TripleIndexes {
  private readonly sp: TermBuckets<ObjectTerm> = new Map();
  private readonly po: TermBuckets<Subject> = new Map();
  private readonly os: TermBuckets<Predicate> = new Map();
  private readonly primary = new Map<TermPosition, Map<Identifier, EncodedTriple[]>>([
    ['S', new Map()],
    ['P', new Map()],
    ['O', new Map()],
  ]);

  constructor(seed: Iterable<EncodedTriple> = []) {
    for (const encoded of seed) {
      this.add(encoded);
    }
  }

  add(encoded: EncodedTriple): void {
    const { subjectId, predicateId, objectId, triple } = encoded;
    insertIntoBucket(this.sp, mix(subjectId, predicateId, 'SP'), objectId, triple.object);
    insertIntoBucket(this.po, mix(predicateId, objectId, 'PO'), subjectId, triple.subject);
    insertIntoBucket(this.os, mix(objectId, subjectId, 'OS'), predicateId, triple.predicate);
    this.appendPrimary('S', subjectId, encoded);
    this.appendPrimary('P', predicateId, encoded);
    this.appendPrimary('O', objectId, encoded);
  }

  objects(subjectId: Identifier, predicateId: Identifier): ReadonlyMap<Identifier, ObjectTerm> {
    return this.sp.get(mix(subjectId, predicateId, 'SP')) ?? EMPTY_BUCKET;
  }

  subjects(predicateId: Identifier, objectId: Identifier): ReadonlyMap<Identifier, Subject> {
    return this.po.get(mix(predicateId, objectId, 'PO')) ?? EMPTY_BUCKET;
  }

  predicates(objectId: Identifier, subjectId: Identifier): ReadonlyMap<Identifier, Predicate> {
    return this.os.get(mix(objectId, subjectId, 'OS')) ?? EMPTY_BUCKET;
  }

  withTerm(position: TermPosition, id: Identifier): readonly EncodedTriple[] {
    return this.primary.get(position)?.get(id) ?? EMPTY_LIST;
  }

  primaryCount(position: TermPosition): number {
    return this.primary.get(position)?.size ?? 0;
  }

  keyCount(axis: IndexAxis): number {
    return this.buckets(axis).size;
  }

  /**
   * 复制某一轴的键 → 剩余项标识符集合，用于一致性校验
   */
  snapshot(axis: IndexAxis): Map<CompositeKey, Set<Identifier>> {
    const out = new Map<CompositeKey, Set<Identifier>>();
    for (const [key, bucket] of this.buckets(axis)) {
      out.set(key, new Set(bucket.keys()));
    }
    return out;
  }

  private buckets(axis: IndexAxis): ReadonlyMap<CompositeKey, ReadonlyMap<Identifier, unknown>> {
    switch (axis) {
      case 'SP':
        return this.sp;
      case 'PO':
        return this.po;
      case 'OS':
        return this.os;
    }
  }

  private appendPrimary(position: TermPosition, id: Identifier, encoded: EncodedTriple): void {
    const buckets = this.primary.get(position);
    if (!buckets) {
      return;
    }
    const list = buckets.get(id);
    if (list) {
      list.push(encoded);
    } else {
      buckets.set(id, [encoded]);
    }
  }
}

function insertIntoBucket<T>(
  buckets: TermBuckets<T>,
  key: CompositeKey,
  id: Identifier,
  term: T,
): void {
  const bucket = buckets.get(key);
  if (bucket) {
    if (!bucket.has(id)) bucket.set(id, term);
    return;
  }
  buckets.set(key, new Map([[id, term]]));
}
