import { randomIdentifier, type Identifier } from './identifier.js';
import type { ObjectTerm } from './triple.js';

export type Validator = (value: ObjectTerm) => boolean;

export interface PredicateOptions {
  /** 默认取关系种类名 */
  name?: string;
  /** 构造时附带的校验器，缺省接受任何宾语 */
  validate?: Validator;
  /** 关系的外部定义，例如词汇表中的 IRI */
  url?: string;
}

/**
 * 谓词：一种关系。与实体一样持有 128 位标识符，可直接作为复合键的一项。
 *
 * 通常每种关系只声明一次并在各处复用；存储本身不维护全局谓词表。
 */
export class Predicate {
  readonly id: Identifier = randomIdentifier();
  readonly name: string;
  readonly url?: string;
  private readonly check?: Validator;

  constructor(
    readonly kind: string,
    options: PredicateOptions = {},
  ) {
    this.name = options.name ?? kind;
    this.url = options.url;
    this.check = options.validate;
  }

  validate(value: ObjectTerm): boolean {
    return this.check ? this.check(value) : true;
  }

  equals(other: unknown): boolean {
    return other instanceof Predicate && other.id === this.id;
  }

  toString(): string {
    return this.name;
  }
}

export function definePredicate(kind: string, options?: PredicateOptions): Predicate {
  return new Predicate(kind, options);
}

export function newPredicate(kind: string, name?: string, url?: string): Predicate {
  return new Predicate(kind, { name, url });
}
