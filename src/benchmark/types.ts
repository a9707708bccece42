/**
 * 基准测试类型定义
 */
import type { IndexAxis } from '../storage/compositeKey.js';

/**
 * 吞吐量测试结果
 */
export interface BenchmarkResult {
  /** 测试名称 */
  name: string;
  /** 操作次数 */
  operations: number;
  /** 执行时间（毫秒） */
  executionTime: number;
  /** 每秒操作数 */
  operationsPerSecond: number;
  /** 测试数据量（三元组数） */
  dataSize: number;
}

/**
 * 雪崩效应统计：单比特翻转后输出中被翻转的比特数
 */
export interface AvalancheReport {
  axis: IndexAxis;
  operand: 'left' | 'right';
  trials: number;
  /** 期望接近 64（128 位输出的一半） */
  mean: number;
  stdDev: number;
  min: number;
  max: number;
}

export interface AvalancheConfig {
  trials?: number;
  seed?: bigint;
  operand?: 'left' | 'right';
  /** 固定翻转的比特位；缺省时按试验序号轮转 0..127 */
  bit?: number;
}

export interface ThroughputConfig {
  /** 主语数量 */
  subjects?: number;
  /** 每个主语的三元组数 */
  fanout?: number;
  seed?: bigint;
}
