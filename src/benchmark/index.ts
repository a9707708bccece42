/**
 * 基准测试工具入口
 *
 * 雪崩统计与吞吐量测试，供 tristore-bench 命令行与测试使用。
 */

export type {
  AvalancheConfig,
  AvalancheReport,
  BenchmarkResult,
  ThroughputConfig,
} from './types.js';

export { measureAvalanche, hammingDistance, popcount } from './avalanche.js';
export { runThroughputBenchmark } from './throughput.js';
export { createSplitMix64, seededIdentifiers } from './random.js';
