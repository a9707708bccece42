import { Entity } from '../model/entity.js';
import { definePredicate } from '../model/predicate.js';
import { TripleStore } from '../tripleStore.js';
import { seededIdentifiers } from './random.js';
import type { BenchmarkResult, ThroughputConfig } from './types.js';

function timed(name: string, operations: number, dataSize: number, fn: () => void): BenchmarkResult {
  const start = performance.now();
  fn();
  const executionTime = performance.now() - start;
  return {
    name,
    operations,
    executionTime,
    operationsPerSecond: executionTime > 0 ? (operations / executionTime) * 1000 : operations,
    dataSize,
  };
}

/**
 * 插入与双项绑定查询的吞吐量
 */
export function runThroughputBenchmark(config: ThroughputConfig = {}): BenchmarkResult[] {
  const subjectCount = config.subjects ?? 1000;
  const fanout = config.fanout ?? 4;
  const idSource = seededIdentifiers(config.seed ?? 42n);
  const store = TripleStore.create({ idSource });

  const predicates = Array.from({ length: fanout }, (_, i) => definePredicate(`p${i}`));
  const subjects = Array.from({ length: subjectCount }, () => new Entity({ id: idSource() }));
  const total = subjectCount * fanout;

  const results: BenchmarkResult[] = [];
  results.push(
    timed('insert', total, total, () => {
      subjects.forEach((subject, i) => {
        predicates.forEach((predicate, j) => {
          store.insert(subject, predicate, `v${(i + j) % 97}`);
        });
      });
    }),
  );
  results.push(
    timed('lookup SP (s, p, ?)', total, store.size, () => {
      for (const subject of subjects) {
        for (const predicate of predicates) store.select({ subject, predicate });
      }
    }),
  );
  results.push(
    timed('lookup PO (?, p, o)', fanout * 97, store.size, () => {
      for (const predicate of predicates) {
        for (let v = 0; v < 97; v += 1) store.select({ predicate, object: `v${v}` });
      }
    }),
  );
  return results;
}
