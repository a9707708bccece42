import { Entity } from './entity.js';
import { namespacedIdentifier, type Identifier } from './identifier.js';
import { isLiteral, literalIdentifier, type Literal } from './literal.js';
import { Predicate } from './predicate.js';

export type { Literal } from './literal.js';

/** 主语：实体，或被具体化的三元组 */
export type Subject = Entity | Triple;
export type ObjectTerm = Entity | Predicate | Triple | Literal;
export type Term = Subject | Predicate | ObjectTerm;

export function isSubject(value: unknown): value is Subject {
  return value instanceof Entity || value instanceof Triple;
}

export function isObjectTerm(value: unknown): value is ObjectTerm {
  return (
    value instanceof Entity ||
    value instanceof Predicate ||
    value instanceof Triple ||
    (isLiteral(value) && !(typeof value === 'number' && Number.isNaN(value)))
  );
}

export function termId(term: Term): Identifier {
  if (term instanceof Entity || term instanceof Predicate || term instanceof Triple) {
    return term.id;
  }
  return literalIdentifier(term);
}

export function sameTerm(a: Term, b: Term): boolean {
  if (isLiteral(a) || isLiteral(b)) {
    return a === b;
  }
  return a.id === b.id && a.constructor === b.constructor;
}

export function encodeTripleKey(
  subjectId: Identifier,
  predicateId: Identifier,
  objectId: Identifier,
): string {
  return `${subjectId.toString(16)}:${predicateId.toString(16)}:${objectId.toString(16)}`;
}

/**
 * 三元组 (主语, 谓词, 宾语)
 *
 * 三元组自身拥有由三项标识符派生的决定性标识符，
 * 因此可以作为另一条事实的主语（具体化）或宾语。
 */
export class Triple {
  private cachedKey?: string;
  private cachedId?: Identifier;

  constructor(
    readonly subject: Subject,
    readonly predicate: Predicate,
    readonly object: ObjectTerm,
  ) {}

  get key(): string {
    this.cachedKey ??= encodeTripleKey(
      termId(this.subject),
      this.predicate.id,
      termId(this.object),
    );
    return this.cachedKey;
  }

  get id(): Identifier {
    this.cachedId ??= namespacedIdentifier('triple', this.key);
    return this.cachedId;
  }

  equals(other: unknown): boolean {
    return other instanceof Triple && other.key === this.key;
  }

  *[Symbol.iterator](): Generator<Term, void, undefined> {
    yield this.subject;
    yield this.predicate;
    yield this.object;
  }

  toString(): string {
    return `(${String(this.subject)} ${String(this.predicate)} ${String(this.object)})`;
  }
}
