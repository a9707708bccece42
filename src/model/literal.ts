import { LRUCache } from 'lru-cache';

import { namespacedIdentifier, type Identifier } from './identifier.js';

export type Literal = string | number | boolean;

export const DEFAULT_LITERAL_CACHE_SIZE = 4096;

export function isLiteral(value: unknown): value is Literal {
  return typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean';
}

// 类型标签保证 "1"、1 与 true 互不相同
function literalText(value: Literal): string {
  return `${typeof value}:${String(value)}`;
}

/**
 * 将字面量宾语映射到 128 位键空间，使其能参与 PO/OS 复合键
 */
export function literalIdentifier(value: Literal): Identifier {
  return namespacedIdentifier('literal', literalText(value));
}

/**
 * 带 LRU 缓存的字面量标识符计算
 */
export class LiteralHasher {
  private readonly cache: LRUCache<string, Identifier>;

  constructor(cacheSize = DEFAULT_LITERAL_CACHE_SIZE) {
    this.cache = new LRUCache<string, Identifier>({ max: cacheSize });
  }

  get cached(): number {
    return this.cache.size;
  }

  identify(value: Literal): Identifier {
    const text = literalText(value);
    const hit = this.cache.get(text);
    if (hit !== undefined) {
      return hit;
    }
    const id = namespacedIdentifier('literal', text);
    this.cache.set(text, id);
    return id;
  }
}
