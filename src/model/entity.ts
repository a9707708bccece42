import {
  formatIdentifier,
  namespacedIdentifier,
  parseIdentifier,
  randomIdentifier,
  type Identifier,
} from './identifier.js';

export interface EntityInit {
  name?: string;
  /** 显式标识符；缺省时随机生成 */
  id?: Identifier | string | number;
  url?: string;
}

export interface EntityJSON {
  id: string;
  name?: string;
  url?: string;
}

/**
 * 实体：以 128 位标识符区分的项
 *
 * 相等性只取决于标识符。独立构造的两个实体即使同名也互不相等，
 * 而以相同标识符构造的实体视为同一个实体。
 */
export class Entity {
  readonly id: Identifier;
  readonly name?: string;
  readonly url?: string;

  constructor(init: EntityInit = {}) {
    this.id = init.id === undefined ? randomIdentifier() : parseIdentifier(init.id);
    this.name = init.name;
    this.url = init.url;
  }

  /**
   * 由字符串派生决定性实体：相同文本得到相等的实体
   */
  static fromValue(text: string): Entity {
    return new Entity({ name: text, id: namespacedIdentifier('entity', text) });
  }

  equals(other: unknown): boolean {
    return other instanceof Entity && other.id === this.id;
  }

  toString(): string {
    return this.name ?? `_${formatIdentifier(this.id).slice(0, 5)}`;
  }

  toJSON(): EntityJSON {
    const json: EntityJSON = { id: formatIdentifier(this.id) };
    if (this.name !== undefined) json.name = this.name;
    if (this.url !== undefined) json.url = this.url;
    return json;
  }
}

export function newEntity(name?: string, id?: Identifier | string | number, url?: string): Entity {
  return new Entity({ name, id, url });
}
