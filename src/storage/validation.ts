import { ConcurrentMutationError, ValidationError } from '../errors.js';
import type { Identifier } from '../model/identifier.js';
import type { Predicate, Validator } from '../model/predicate.js';
import type { ObjectTerm } from '../model/triple.js';

/**
 * 谓词 → 校验器
 *
 * 解析顺序：注册表中的校验器 → 谓词自带的 validate → 接受。
 * 校验器只在插入时看到宾语，不会回溯校验已有三元组。
 */
export class ValidationRegistry {
  private readonly checks = new Map<Identifier, Validator>();

  set(predicate: Predicate, validator: Validator): void {
    this.checks.set(predicate.id, validator);
  }

  delete(predicate: Predicate): boolean {
    return this.checks.delete(predicate.id);
  }

  has(predicate: Predicate): boolean {
    return this.checks.has(predicate.id);
  }

  resolve(predicate: Predicate): Validator {
    return this.checks.get(predicate.id) ?? ((value) => predicate.validate(value));
  }

  assert(predicate: Predicate, value: ObjectTerm): void {
    let accepted: boolean;
    try {
      accepted = this.resolve(predicate)(value);
    } catch (error) {
      if (error instanceof ConcurrentMutationError) throw error;
      throw new ValidationError(predicate.name, value, error);
    }
    if (!accepted) {
      throw new ValidationError(predicate.name, value);
    }
  }
}
