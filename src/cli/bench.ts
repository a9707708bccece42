#!/usr/bin/env node
/**
 * tristore-bench：复合键与索引的基准测试命令行工具
 */

import { realpathSync } from 'node:fs';
import { pathToFileURL } from 'node:url';

import { Command, InvalidArgumentError } from 'commander';

import { measureAvalanche } from '../benchmark/avalanche.js';
import { runThroughputBenchmark } from '../benchmark/throughput.js';
import { INDEX_AXES, type IndexAxis } from '../storage/compositeKey.js';

function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('需要正整数');
  }
  return parsed;
}

function parseSeed(value: string): bigint {
  try {
    return BigInt(value);
  } catch {
    throw new InvalidArgumentError('种子必须是整数');
  }
}

function parseAxes(value: string): IndexAxis[] {
  const axes = value.split(',').map((axis) => axis.trim().toUpperCase());
  const valid = INDEX_AXES.filter((axis) => axes.includes(axis));
  if (valid.length !== axes.length) {
    throw new InvalidArgumentError(`轴只能是 ${INDEX_AXES.join(',')}`);
  }
  return valid;
}

/**
 * 创建基准测试 CLI 程序
 */
export function createBenchCli(): Command {
  const program = new Command();

  program.name('tristore-bench').description('TriStore 复合键与索引基准测试工具').version('0.1.0');

  program
    .command('avalanche')
    .description('统计 RMX 复合键的雪崩效应（单比特翻转后输出翻转的比特数）')
    .option('-t, --trials <n>', '每个轴、每个操作数的试验次数', parsePositiveInt, 1024)
    .option('-s, --seed <n>', '随机种子', parseSeed, 0x5eedn)
    .option('-a, --axes <list>', '逗号分隔的轴', parseAxes, [...INDEX_AXES])
    .option('--json', '以 JSON 输出')
    .action((options: { trials: number; seed: bigint; axes: IndexAxis[]; json?: boolean }) => {
      const reports = options.axes.flatMap((axis) =>
        (['left', 'right'] as const).map((operand) =>
          measureAvalanche(axis, { trials: options.trials, seed: options.seed, operand }),
        ),
      );
      if (options.json) {
        console.log(JSON.stringify(reports, null, 2));
        return;
      }
      console.log('📊 RMX 雪崩统计（理想值 64 / 128）');
      for (const r of reports) {
        console.log(
          `   ${r.axis} ${r.operand.padEnd(5)} mean=${r.mean.toFixed(2)} σ=${r.stdDev.toFixed(2)} min=${r.min} max=${r.max}`,
        );
      }
    });

  program
    .command('throughput')
    .description('插入与双项绑定查询吞吐量')
    .option('-n, --subjects <n>', '主语数量', parsePositiveInt, 1000)
    .option('-f, --fanout <n>', '每个主语的谓词数', parsePositiveInt, 4)
    .option('-s, --seed <n>', '随机种子', parseSeed, 42n)
    .action((options: { subjects: number; fanout: number; seed: bigint }) => {
      const results = runThroughputBenchmark(options);
      for (const r of results) {
        console.log(
          `   ${r.name.padEnd(22)} ${r.operations} ops in ${r.executionTime.toFixed(1)}ms (${Math.round(r.operationsPerSecond)} ops/s)`,
        );
      }
    });

  return program;
}

function isEntryPoint(): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  try {
    return import.meta.url === pathToFileURL(realpathSync(entry)).href;
  } catch {
    return false;
  }
}

if (isEntryPoint()) {
  createBenchCli().parse(process.argv);
}
