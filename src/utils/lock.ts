import { ConcurrentMutationError } from '../errors.js';

export interface LockHandle {
  release(): void;
}

/**
 * 进程内单写者守卫
 *
 * 规范集合、三个复合键索引与插入日志作为一个互斥单元：
 * 写入期间再次发起的写入（例如校验器回调内调用 insert）直接拒绝。
 */
export class WriteGuard {
  private holder: string | null = null;

  get held(): boolean {
    return this.holder !== null;
  }

  acquire(operation: string): LockHandle {
    if (this.holder !== null) {
      throw new ConcurrentMutationError(operation, this.holder);
    }
    this.holder = operation;
    let released = false;
    return {
      release: () => {
        if (released) return;
        released = true;
        this.holder = null;
      },
    };
  }

  run<T>(operation: string, fn: () => T): T {
    const handle = this.acquire(operation);
    try {
      return fn();
    } finally {
      handle.release();
    }
  }
}
