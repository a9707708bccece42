import { describe, it, expect, vi } from 'vitest';

import { newEntity } from '@/model/entity.js';
import { definePredicate } from '@/model/predicate.js';
import { Triple } from '@/model/triple.js';
import { variable, Variable } from '@/query/pattern/match.js';
import { TripleStore } from '@/tripleStore.js';

describe('match 变量绑定模式匹配', () => {
  const store = TripleStore.create();
  const knows = definePredicate('knows');
  const age = definePredicate('age');
  const alice = newEntity('alice');
  const bob = newEntity('bob');
  const carol = newEntity('carol');
  store.insertMany([
    [alice, knows, bob],
    [bob, knows, carol],
    [carol, knows, carol],
    [bob, age, 30],
    [carol, age, 25],
  ]);

  it('首次调用输出一次实验性警告', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    store.match([[variable('x'), knows, bob]]);
    store.match([[variable('x'), knows, bob]]);
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn.mock.calls[0][0]).toBe(
      '[TriStore][EXPERIMENTAL] 功能「变量绑定模式匹配 match()」仍处于实验阶段，未来版本可能发生调整。',
    );
    warn.mockRestore();
  });

  it('变量渲染为 ?name', () => {
    expect(String(variable('who'))).toBe('?who');
    expect(variable('who')).toBeInstanceOf(Variable);
  });

  it('单条子句绑定变量', () => {
    expect(store.match([[alice, knows, variable('friend')]])).toEqual([{ friend: bob }]);
  });

  it('多条子句按已有绑定连接', () => {
    const x = variable('x');
    const y = variable('y');
    const rows = store.match([
      [alice, knows, x],
      [x, knows, y],
      [y, age, variable('a')],
    ]);
    expect(rows).toEqual([{ x: bob, y: carol, a: 25 }]);
  });

  it('同一子句中重复的变量必须取相同的值', () => {
    const x = variable('x');
    expect(store.match([[x, knows, x]])).toEqual([{ x: carol }]);
  });

  it('谓词位置也可以是变量', () => {
    const p = variable('p');
    const rows = store.match([[bob, p, variable('o')]]);
    expect(rows).toHaveLength(2);
    expect(rows.map((row) => row.p)).toEqual([knows, age]);
  });

  it('绑定到非主语的值不能作为后续子句的主语', () => {
    const a = variable('a');
    expect(store.match([[bob, age, a], [a, knows, variable('z')]])).toEqual([]);
  });

  it('可以匹配具体化的三元组', () => {
    const local = TripleStore.create();
    const source = definePredicate('source');
    const fact = local.insert(alice, knows, bob);
    local.insert(new Triple(alice, knows, bob), source, 'diary');
    const rows = local.match([[variable('t'), source, 'diary']]);
    expect(rows).toHaveLength(1);
    expect(rows[0].t).toBe(fact);
  });

  it('变量名与对象原型属性同名时照常绑定', () => {
    const rows = store.match([[variable('constructor'), knows, bob]]);
    expect(rows).toHaveLength(1);
    expect(Object.entries(rows[0])).toEqual([['constructor', alice]]);

    const joined = store.match([
      [variable('toString'), knows, variable('hasOwnProperty')],
      [variable('hasOwnProperty'), age, 30],
    ]);
    expect(joined).toHaveLength(1);
    expect(Object.entries(joined[0])).toEqual([
      ['toString', alice],
      ['hasOwnProperty', bob],
    ]);
  });

  it('空子句列表返回一个空绑定', () => {
    expect(store.match([])).toEqual([{}]);
  });
});
