import { describe, it, expect, vi, afterEach } from 'vitest';

import {
  ConcurrentMutationError,
  EmptyStoreError,
  InvalidArgumentError,
  UnknownSubjectError,
  ValidationError,
} from '@/errors.js';
import { Entity, newEntity } from '@/model/entity.js';
import { definePredicate } from '@/model/predicate.js';
import { Triple } from '@/model/triple.js';
import { IndexEngine, type EngineOptions } from '@/storage/indexEngine.js';
import { ValidationRegistry } from '@/storage/validation.js';

function createEngine(overrides: Partial<EngineOptions> = {}): {
  engine: IndexEngine;
  validation: ValidationRegistry;
} {
  const validation = new ValidationRegistry();
  const engine = new IndexEngine(validation, {
    literalCacheSize: 16,
    verifyIndexHits: true,
    requireAssertedReification: true,
    warnOnDuplicate: false,
    ...overrides,
  });
  return { engine, validation };
}

describe('IndexEngine 写入', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('插入后可通过三个复合键方向查到', () => {
    const { engine } = createEngine();
    const alice = newEntity('alice');
    const bob = newEntity('bob');
    const knows = definePredicate('knows');

    const result = engine.insert(alice, knows, bob);
    expect(result.added).toBe(true);
    expect(engine.size).toBe(1);
    expect(engine.objectsOf(alice, knows)).toEqual(new Set([bob]));
    expect(engine.subjectsOf(knows, bob)).toEqual(new Set([alice]));
    expect(engine.predicatesOf(alice, bob)).toEqual(new Set([knows]));
    expect(engine.contains([alice, knows, bob])).toBe(true);
    expect(engine.contains(new Triple(bob, knows, alice))).toBe(false);
  });

  it('重复插入是空操作，返回已存储的规范实例', () => {
    const { engine } = createEngine();
    const alice = newEntity('alice', 1n);
    const name = definePredicate('name');

    const first = engine.insert(alice, name, 'Alice');
    const again = engine.insert(new Entity({ id: 1n }), name, 'Alice');
    expect(again.added).toBe(false);
    expect(again.triple).toBe(first.triple);
    expect(engine.size).toBe(1);
    expect(engine.stats().keys).toEqual({ SP: 1, PO: 1, OS: 1 });
  });

  it('返回的项是规范实例：同一标识符的实体只保留首次插入的对象', () => {
    const { engine } = createEngine();
    const name = definePredicate('name');
    const first = newEntity('first', 5n);
    engine.insert(first, name, 'x');
    engine.insert(new Entity({ id: 5n, name: 'copy' }), name, 'y');

    const [subject] = engine.subjectsOf(name, 'y');
    expect(subject).toBe(first);
  });

  it('warnOnDuplicate 开启时重复插入输出警告', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const { engine } = createEngine({ warnOnDuplicate: true });
    const s = newEntity('s');
    const p = definePredicate('p');
    engine.insert(s, p, 1);
    engine.insert(s, p, 1);
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn).toHaveBeenCalledWith('[TriStore] 忽略重复三元组 (s p 1)');
  });

  it('非法的项抛出 InvalidArgumentError 且不留下痕迹', () => {
    const { engine } = createEngine();
    const s = newEntity('s');
    const p = definePredicate('p');
    expect(() => engine.insert(s, p, Number.NaN)).toThrow(InvalidArgumentError);
    expect(() => engine.insertMany([[s, p, 1], [s, p, Number.NaN]])).toThrow(InvalidArgumentError);
    expect(engine.size).toBe(0);
  });

  it('批量插入是原子的：任一校验失败整批不生效', () => {
    const { engine, validation } = createEngine();
    const s = newEntity('s');
    const age = definePredicate('age');
    validation.set(age, (v) => typeof v === 'number');

    expect(() =>
      engine.insertMany([
        [s, age, 1],
        [s, age, 2],
        [s, age, 'three'],
      ]),
    ).toThrow(ValidationError);
    expect(engine.size).toBe(0);
    expect(engine.stats().keys).toEqual({ SP: 0, PO: 0, OS: 0 });
    expect(() => engine.lastAdded()).toThrow(EmptyStoreError);
  });

  it('同一批次内的重复三元组只写入一次', () => {
    const { engine } = createEngine();
    const s = newEntity('s');
    const p = definePredicate('p');
    const results = engine.insertMany([
      [s, p, 'a'],
      [s, p, 'a'],
    ]);
    expect(results.map((r) => r.added)).toEqual([true, false]);
    expect(results[0].triple).toBe(results[1].triple);
    expect(engine.size).toBe(1);
  });

  it('校验器内部再次写入抛出 ConcurrentMutationError', () => {
    const { engine, validation } = createEngine();
    const s = newEntity('s');
    const p = definePredicate('p');
    validation.set(p, () => {
      engine.insert(s, definePredicate('q'), 1);
      return true;
    });
    expect(() => engine.insert(s, p, 1)).toThrow(ConcurrentMutationError);
    expect(engine.size).toBe(0);
    // 写锁已释放
    validation.delete(p);
    expect(engine.insert(s, p, 1).added).toBe(true);
  });
});

describe('IndexEngine 具体化', () => {
  it('以已存在的三元组作为主语', () => {
    const { engine } = createEngine();
    const alice = newEntity('alice');
    const age = definePredicate('age');
    const source = definePredicate('source');

    const fact = engine.insert(alice, age, 30).triple;
    const meta = engine.insert(new Triple(alice, age, 30), source, 'census').triple;
    expect(meta.subject).toBe(fact);
    expect(engine.objectsOf(fact, source)).toEqual(new Set(['census']));
  });

  it('未断言的三元组作为主语时抛出 UnknownSubjectError', () => {
    const { engine } = createEngine();
    const fact = new Triple(newEntity('a'), definePredicate('p'), 1);
    expect(() => engine.insert(fact, definePredicate('q'), 2)).toThrow(UnknownSubjectError);
    expect(engine.size).toBe(0);
  });

  it('同一批次中先断言的三元组可以被后续三元组具体化', () => {
    const { engine } = createEngine();
    const a = newEntity('a');
    const p = definePredicate('p');
    const q = definePredicate('q');
    const fact = new Triple(a, p, 1);
    const [first, second] = engine.insertMany([fact, [fact, q, 2]]);
    expect(first.triple).toBe(fact);
    expect(second.triple.subject).toBe(fact);
    expect(engine.size).toBe(2);
  });

  it('requireAssertedReification 关闭时允许未断言的主语', () => {
    const { engine } = createEngine({ requireAssertedReification: false });
    const fact = new Triple(newEntity('a'), definePredicate('p'), 1);
    const q = definePredicate('q');
    engine.insert(fact, q, 2);
    expect(engine.size).toBe(1);
    expect(engine.contains([fact, q, 2])).toBe(true);
  });
});

describe('IndexEngine 读取', () => {
  it('attributesOf 按谓词分组宾语', () => {
    const { engine } = createEngine();
    const e = newEntity('e');
    const tag = definePredicate('tag');
    const name = definePredicate('name');
    engine.insertMany([
      [e, tag, 'a'],
      [e, name, 'E'],
      [e, tag, 'b'],
    ]);
    expect(engine.attributesOf(e)).toEqual(
      new Map<unknown, unknown>([
        [tag, new Set(['a', 'b'])],
        [name, new Set(['E'])],
      ]),
    );
    expect(engine.attributesOf(newEntity('other')).size).toBe(0);
  });

  it('lastAdded 返回最近一次净新增三元组的实体主语', () => {
    const { engine } = createEngine();
    const a = newEntity('a');
    const b = newEntity('b');
    const p = definePredicate('p');
    expect(() => engine.lastAdded()).toThrow(EmptyStoreError);

    engine.insert(a, p, 1);
    const fact = engine.insert(b, p, 1).triple;
    expect(engine.lastAdded()).toBe(b);

    // 重复插入不改变 lastAdded
    engine.insert(a, p, 1);
    expect(engine.lastAdded()).toBe(b);

    // 以三元组为主语的写入不改变 lastAdded
    engine.insert(fact, p, 2);
    expect(engine.lastAdded()).toBe(b);
  });

  it('iterate 按插入顺序返回三元组', () => {
    const { engine } = createEngine();
    const s = newEntity('s');
    const p = definePredicate('p');
    engine.insertMany([
      [s, p, 3],
      [s, p, 1],
      [s, p, 2],
    ]);
    expect([...engine.iterate()].map((t) => t.object)).toEqual([3, 1, 2]);
  });

  it('triplesWith 扫描单项桶', () => {
    const { engine } = createEngine();
    const s = newEntity('s');
    const p = definePredicate('p');
    const q = definePredicate('q');
    engine.insertMany([
      [s, p, 1],
      [s, q, 1],
    ]);
    expect(engine.triplesWith('P', q).map(String)).toEqual(['(s q 1)']);
    expect(engine.triplesWith('O', 1)).toHaveLength(2);
  });

  it('stats 汇总各类计数', () => {
    const { engine } = createEngine();
    const s = newEntity('s');
    const t = newEntity('t');
    const p = definePredicate('p');
    engine.insertMany([
      [s, p, t],
      [t, p, 'x'],
      [s, p, 'x'],
    ]);
    expect(engine.stats()).toEqual({
      triples: 3,
      subjects: 2,
      predicates: 1,
      objects: 2,
      keys: { SP: 2, PO: 2, OS: 3 },
      cachedLiterals: 1,
    });
  });
});
