/**
 * TriStore 错误类型
 *
 * 所有错误均为局部、可恢复的条件：失败的写入或查询不会破坏索引一致性。
 */
export class TripleStoreError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TripleStoreError';
  }
}

/** 显式提供的标识符不是合法的 128 位值 */
export class InvalidIdentifierError extends TripleStoreError {
  constructor(public readonly input: unknown) {
    super(`非法的 128 位标识符: ${String(input)}`);
    this.name = 'InvalidIdentifierError';
  }
}

/** 谓词校验器拒绝了宾语 */
export class ValidationError extends TripleStoreError {
  constructor(
    public readonly predicate: string,
    public readonly value: unknown,
    cause?: unknown,
  ) {
    super(
      `宾语 ${String(value)} 不满足谓词 ${predicate} 的约束`,
      cause === undefined ? undefined : { cause },
    );
    this.name = 'ValidationError';
  }
}

/** 过滤查询未给出任何约束 */
export class EmptyQueryError extends TripleStoreError {
  constructor() {
    super('过滤条件为空：无约束扫描请使用 triples({})');
    this.name = 'EmptyQueryError';
  }
}

export class NoResultError extends TripleStoreError {
  constructor() {
    super('没有匹配全部条件的主语');
    this.name = 'NoResultError';
  }
}

export class AmbiguousResultError extends TripleStoreError {
  constructor(public readonly count: number) {
    super(`匹配结果不唯一：共 ${count} 个主语`);
    this.name = 'AmbiguousResultError';
  }
}

export class EmptyStoreError extends TripleStoreError {
  constructor() {
    super('存储中尚无以实体为主语的三元组');
    this.name = 'EmptyStoreError';
  }
}

/** 以三元组为主语（具体化）时，该三元组必须已存在于存储中 */
export class UnknownSubjectError extends TripleStoreError {
  constructor(public readonly subject: string) {
    super(`作为主语的三元组 ${subject} 不在存储中`);
    this.name = 'UnknownSubjectError';
  }
}

export class InvalidArgumentError extends TripleStoreError {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidArgumentError';
  }
}

/** 写入期间再次发起写入（例如校验器内部调用 insert） */
export class ConcurrentMutationError extends TripleStoreError {
  constructor(
    public readonly operation: string,
    public readonly holder: string,
  ) {
    super(`写入 ${operation} 被拒绝：${holder} 正持有写锁`);
    this.name = 'ConcurrentMutationError';
  }
}
