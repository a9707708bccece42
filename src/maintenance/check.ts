import { INDEX_AXES, type CompositeKey, type IndexAxis } from '../storage/compositeKey.js';
import type { IndexEngine } from '../storage/indexEngine.js';
import { TripleIndexes } from '../storage/tripleIndexes.js';

export interface IndexError {
  axis: IndexAxis;
  key: string;
  term?: string;
  reason: 'missing_entry' | 'orphan_entry' | 'orphan_key';
}

export interface ConsistencyCheckResult {
  ok: boolean;
  errors: IndexError[];
}

/**
 * 从规范集合重建期望索引，与引擎当前索引逐轴比对（双向）
 */
export function checkConsistency(engine: IndexEngine): ConsistencyCheckResult {
  const expected = new TripleIndexes(engine.encodedTriples());
  const errors: IndexError[] = [];
  for (const axis of INDEX_AXES) {
    errors.push(...compareAxis(axis, expected.snapshot(axis), engine.indexSnapshot(axis)));
  }
  return { ok: errors.length === 0, errors };
}

export function compareAxis(
  axis: IndexAxis,
  expected: ReadonlyMap<CompositeKey, ReadonlySet<bigint>>,
  actual: ReadonlyMap<CompositeKey, ReadonlySet<bigint>>,
): IndexError[] {
  const errors: IndexError[] = [];
  for (const [key, terms] of expected) {
    const present = actual.get(key);
    for (const term of terms) {
      if (!present?.has(term)) {
        errors.push({ axis, key: hex(key), term: hex(term), reason: 'missing_entry' });
      }
    }
  }
  for (const [key, terms] of actual) {
    const wanted = expected.get(key);
    if (!wanted) {
      errors.push({ axis, key: hex(key), reason: 'orphan_key' });
      continue;
    }
    for (const term of terms) {
      if (!wanted.has(term)) {
        errors.push({ axis, key: hex(key), term: hex(term), reason: 'orphan_entry' });
      }
    }
  }
  return errors;
}

function hex(value: bigint): string {
  return value.toString(16).padStart(32, '0');
}
