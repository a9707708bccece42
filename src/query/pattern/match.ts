import { Predicate } from '../../model/predicate.js';
import {
  isSubject,
  sameTerm,
  type ObjectTerm,
  type Subject,
  type Term,
  type Triple,
} from '../../model/triple.js';
import { warnExperimental } from '../../utils/experimental.js';
import type { TriplePattern } from '../queryEvaluator.js';

/**
 * 模式变量，例如 variable('x') 渲染为 ?x
 */
export class Variable {
  constructor(readonly name: string) {}

  toString(): string {
    return `?${this.name}`;
  }
}

export function variable(name: string): Variable {
  return new Variable(name);
}

export type Clause = readonly [Subject | Variable, Predicate | Variable, ObjectTerm | Variable];

export type Binding = Record<string, Term>;

export interface PatternSource {
  triples(pattern: TriplePattern): Set<Triple>;
}

type Slot = { bound: Term } | { variable: string };

/**
 * 变量绑定的合取模式匹配
 *
 * 逐条子句求值：用已有绑定替换变量后走索引查找，再用结果扩展绑定；
 * 不能在某子句上扩展的绑定被淘汰。
 */
export function matchClauses(source: PatternSource, clauses: readonly Clause[]): Binding[] {
  warnExperimental('变量绑定模式匹配 match()');

  // 内部用 Map 保存绑定，变量名不会与对象原型上的属性冲突
  let bindings: Array<Map<string, Term>> = [new Map()];
  for (const [s, p, o] of clauses) {
    const next: Array<Map<string, Term>> = [];
    for (const binding of bindings) {
      const subjectSlot = resolve(s, binding);
      const predicateSlot = resolve(p, binding);
      const objectSlot = resolve(o, binding);

      const pattern: TriplePattern = {};
      if ('bound' in subjectSlot) {
        if (!isSubject(subjectSlot.bound)) continue;
        pattern.subject = subjectSlot.bound;
      }
      if ('bound' in predicateSlot) {
        if (!(predicateSlot.bound instanceof Predicate)) continue;
        pattern.predicate = predicateSlot.bound;
      }
      if ('bound' in objectSlot) {
        pattern.object = objectSlot.bound;
      }

      for (const triple of source.triples(pattern)) {
        const extended = extend(binding, [
          [subjectSlot, triple.subject],
          [predicateSlot, triple.predicate],
          [objectSlot, triple.object],
        ]);
        if (extended) next.push(extended);
      }
    }
    bindings = next;
  }
  return bindings.map((binding) => Object.fromEntries(binding));
}

function resolve(position: Term | Variable, binding: ReadonlyMap<string, Term>): Slot {
  if (!(position instanceof Variable)) {
    return { bound: position };
  }
  const value = binding.get(position.name);
  return value === undefined ? { variable: position.name } : { bound: value };
}

// 同一子句中重复出现的变量必须取相同的值
function extend(
  binding: ReadonlyMap<string, Term>,
  slots: Array<[Slot, Term]>,
): Map<string, Term> | null {
  const out = new Map(binding);
  for (const [slot, value] of slots) {
    if (!('variable' in slot)) continue;
    const previous = out.get(slot.variable);
    if (previous !== undefined && !sameTerm(previous, value)) {
      return null;
    }
    out.set(slot.variable, value);
  }
  return out;
}
