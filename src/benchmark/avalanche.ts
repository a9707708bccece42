import { mix } from '../storage/compositeKey.js';
import type { IndexAxis } from '../storage/compositeKey.js';
import { seededIdentifiers } from './random.js';
import type { AvalancheConfig, AvalancheReport } from './types.js';

const DEFAULT_TRIALS = 1024;
const DEFAULT_SEED = 0x5eedn;

export function popcount(value: bigint): number {
  let count = 0;
  let v = value < 0n ? -value : value;
  while (v > 0n) {
    v &= v - 1n;
    count += 1;
  }
  return count;
}

export function hammingDistance(a: bigint, b: bigint): number {
  return popcount(a ^ b);
}

/**
 * 测量某一轴的雪崩效应：随机输入对上翻转一个输入比特，统计输出翻转的比特数
 */
export function measureAvalanche(axis: IndexAxis, config: AvalancheConfig = {}): AvalancheReport {
  const trials = config.trials ?? DEFAULT_TRIALS;
  const operand = config.operand ?? 'left';
  const nextId = seededIdentifiers(config.seed ?? DEFAULT_SEED);

  const samples: number[] = [];
  for (let i = 0; i < trials; i += 1) {
    const a = nextId();
    const b = nextId();
    const flip = 1n << BigInt(config.bit ?? i % 128);
    const base = mix(a, b, axis);
    const flipped = operand === 'left' ? mix(a ^ flip, b, axis) : mix(a, b ^ flip, axis);
    samples.push(hammingDistance(base, flipped));
  }

  const mean = samples.reduce((sum, x) => sum + x, 0) / Math.max(samples.length, 1);
  const variance =
    samples.reduce((sum, x) => sum + (x - mean) ** 2, 0) / Math.max(samples.length, 1);
  return {
    axis,
    operand,
    trials,
    mean,
    stdDev: Math.sqrt(variance),
    min: samples.length > 0 ? Math.min(...samples) : 0,
    max: samples.length > 0 ? Math.max(...samples) : 0,
  };
}
