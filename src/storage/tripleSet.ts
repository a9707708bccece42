import type { Identifier } from '../model/identifier.js';
import { encodeTripleKey, type Triple } from '../model/triple.js';

export interface EncodedTriple {
  subjectId: Identifier;
  predicateId: Identifier;
  objectId: Identifier;
  key: string;
  triple: Triple;
}

/**
 * 规范三元组集合 + 插入顺序日志
 *
 * 日志只记录净新增的三元组；重复插入不会改变顺序。
 */
export class TripleSet {
  private readonly triples: EncodedTriple[] = [];
  private readonly keys = new Map<string, EncodedTriple>();

  get size(): number {
    return this.triples.length;
  }

  add(encoded: EncodedTriple): boolean {
    if (this.keys.has(encoded.key)) {
      return false;
    }
    this.keys.set(encoded.key, encoded);
    this.triples.push(encoded);
    return true;
  }

  has(subjectId: Identifier, predicateId: Identifier, objectId: Identifier): boolean {
    return this.keys.has(encodeTripleKey(subjectId, predicateId, objectId));
  }

  get(key: string): EncodedTriple | undefined {
    return this.keys.get(key);
  }

  // 按插入顺序惰性遍历；开始时截取长度，遍历期间的追加不可见
  *iterate(): Generator<EncodedTriple, void, undefined> {
    const end = this.triples.length;
    for (let i = 0; i < end; i += 1) {
      yield this.triples[i];
    }
  }
}
