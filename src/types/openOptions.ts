import { randomIdentifier, type Identifier } from '../model/identifier.js';
import { DEFAULT_LITERAL_CACHE_SIZE } from '../model/literal.js';

/**
 * TriStore 创建选项
 *
 * 这些选项控制存储的校验严格程度、缓存容量与诊断输出。
 */
export interface TripleStoreOptions {
  /**
   * 字面量标识符缓存容量
   *
   * 字面量宾语（字符串、数字、布尔值）需要先哈希为 128 位标识符才能参与 PO/OS 复合键，
   * 缓存避免对高频字面量重复计算摘要。
   *
   * @default 4096
   * @minimum 1
   * @maximum 1000000
   */
  literalCacheSize?: number;

  /**
   * 复合键命中后回查规范集合
   *
   * 复合键是 128 位的非密码学摘要，理论上存在碰撞。开启时每个命中项都会与规范集合核对，
   * 保证索引不会返回未存储的三元组；代价与结果集大小成正比。
   *
   * @default true
   */
  verifyIndexHits?: boolean;

  /**
   * 具体化主语必须已存在
   *
   * 以三元组作为主语时，要求该三元组已经被断言（或在同一批次中先于它断言）。
   *
   * @default true
   */
  requireAssertedReification?: boolean;

  /**
   * 重复插入时输出警告
   *
   * 可通过环境变量 `TRISTORE_WARN_DUPLICATES=1` 全局开启。
   *
   * @default false
   */
  warnOnDuplicate?: boolean;

  /**
   * 新实体的标识符来源
   *
   * createSubjectsWith 等批量操作创建实体时调用；测试中可注入可复现的序列。
   *
   * @default randomIdentifier
   */
  idSource?: () => Identifier;
}

export type ResolvedTripleStoreOptions = Required<TripleStoreOptions>;

/**
 * 判断输入是否符合 TriStore 创建选项的基本约束
 */
export function isTripleStoreOptions(value: unknown): value is TripleStoreOptions {
  if (value === null || typeof value !== 'object') {
    return false;
  }

  const options = value as Record<string, unknown>;

  const ensureOptionalBoolean = (key: keyof TripleStoreOptions): boolean => {
    if (!(key in options) || options[key] === undefined) return true;
    return typeof options[key] === 'boolean';
  };

  if ('literalCacheSize' in options && options.literalCacheSize !== undefined) {
    const candidate = options.literalCacheSize;
    if (
      typeof candidate !== 'number' ||
      !Number.isInteger(candidate) ||
      candidate < 1 ||
      candidate > 1_000_000
    ) {
      return false;
    }
  }

  if (!ensureOptionalBoolean('verifyIndexHits')) {
    return false;
  }

  if (!ensureOptionalBoolean('requireAssertedReification')) {
    return false;
  }

  if (!ensureOptionalBoolean('warnOnDuplicate')) {
    return false;
  }

  if ('idSource' in options && options.idSource !== undefined) {
    if (typeof options.idSource !== 'function') {
      return false;
    }
  }

  return true;
}

/**
 * 断言输入符合 TriStore 创建选项要求
 */
export function assertTripleStoreOptions(
  value: unknown,
  message?: string,
): asserts value is TripleStoreOptions {
  if (!isTripleStoreOptions(value)) {
    throw new TypeError(message ?? 'TriStore 创建选项格式错误');
  }
}

export function resolveTripleStoreOptions(
  options: TripleStoreOptions = {},
  env: NodeJS.ProcessEnv = process.env,
): ResolvedTripleStoreOptions {
  return {
    literalCacheSize: options.literalCacheSize ?? DEFAULT_LITERAL_CACHE_SIZE,
    verifyIndexHits: options.verifyIndexHits ?? true,
    requireAssertedReification: options.requireAssertedReification ?? true,
    warnOnDuplicate: options.warnOnDuplicate ?? env.TRISTORE_WARN_DUPLICATES === '1',
    idSource: options.idSource ?? randomIdentifier,
  };
}
