import { describe, it, expect } from 'vitest';

import { createSplitMix64, seededIdentifiers } from '@/benchmark/random.js';
import { Entity } from '@/model/entity.js';
import { definePredicate } from '@/model/predicate.js';
import type { ObjectTerm } from '@/model/triple.js';
import { TripleStore } from '@/tripleStore.js';

describe('索引与规范集合保持一致', () => {
  it('随机写入后每个双项绑定查询都与全表扫描一致', () => {
    const idSource = seededIdentifiers(2024n);
    const rand = createSplitMix64(7n);
    const pick = <T>(items: readonly T[]): T => items[Number(rand() % BigInt(items.length))];

    const store = TripleStore.create({ idSource });
    const entities = Array.from(
      { length: 12 },
      (_, i) => new Entity({ id: idSource(), name: `e${i}` }),
    );
    const predicates = Array.from({ length: 4 }, (_, i) => definePredicate(`p${i}`));
    const objects: ObjectTerm[] = [...entities.slice(0, 6), 'a', 'b', 1, 2, true];

    for (let i = 0; i < 300; i++) {
      store.insert(pick(entities), pick(predicates), pick(objects));
    }

    const all = [...store];
    for (const subject of entities) {
      for (const predicate of predicates) {
        const expected = new Set(
          all.filter((t) => t.subject === subject && t.predicate === predicate).map((t) => t.object),
        );
        expect(store.select({ subject, predicate })).toEqual(expected);
      }
    }
    for (const predicate of predicates) {
      for (const object of objects) {
        const expected = new Set(
          all.filter((t) => t.predicate === predicate && t.object === object).map((t) => t.subject),
        );
        expect(store.select({ predicate, object })).toEqual(expected);
      }
    }
    for (const subject of entities) {
      for (const object of objects) {
        const expected = new Set(
          all.filter((t) => t.subject === subject && t.object === object).map((t) => t.predicate),
        );
        expect(store.select({ subject, object })).toEqual(expected);
      }
    }

    const stats = store.stats();
    expect(stats.triples).toBe(all.length);
    expect(new Set(all.map((t) => t.key)).size).toBe(all.length);
    expect(store.check()).toEqual({ ok: true, errors: [] });
  });
});
