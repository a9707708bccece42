import { MASK64, high64, low64, type Identifier } from '../model/identifier.js';

/**
 * RMX（Rotate-Mask-XOR）复合键
 *
 * 把两个 128 位项折叠为一个 128 位键：
 * 1. 每个输入拆成高/低 64 位，分别经 fmix64 终结器混合；
 * 2. 以黄金比例乘子只对右操作数加权后与左操作数异或折叠（保证不对称）；
 * 3. 按索引轴做一轮循环移位 + 掩码异或，高半部分吸收低半部分的掩码视图，反之亦然；
 * 4. 两半各再经一次 fmix64 并拼接。
 *
 * 所有运算按 64 位取模，函数是全函数，不会失败。非密码学用途。
 */

export type IndexAxis = 'SP' | 'PO' | 'OS';
export type CompositeKey = bigint;

export interface AxisParameters {
  axis: IndexAxis;
  /** 奇数，与 64 互素 */
  rotateHigh: number;
  rotateLow: number;
  maskHigh: bigint;
  maskLow: bigint;
  seedHigh: bigint;
  seedLow: bigint;
}

export const INDEX_AXES: readonly IndexAxis[] = ['SP', 'PO', 'OS'];

const GOLDEN = 0x9e3779b97f4a7c15n;
const FMIX_C1 = 0xff51afd7ed558ccdn;
const FMIX_C2 = 0xc4ceb9fe1a85ec53n;

export const AXIS_PARAMETERS: Readonly<Record<IndexAxis, AxisParameters>> = {
  // 奇偶位交错
  SP: {
    axis: 'SP',
    rotateHigh: 19,
    rotateLow: 23,
    maskHigh: 0xaaaaaaaaaaaaaaaan,
    maskLow: 0x5555555555555555n,
    seedHigh: 0x2545f4914f6cdd1dn,
    seedLow: 0x9fb21c651e98df25n,
  },
  // 2 位一组
  PO: {
    axis: 'PO',
    rotateHigh: 29,
    rotateLow: 37,
    maskHigh: 0xccccccccccccccccn,
    maskLow: 0x3333333333333333n,
    seedHigh: 0xd6e8feb86659fd93n,
    seedLow: 0xa0761d6478bd642fn,
  },
  // 半字节
  OS: {
    axis: 'OS',
    rotateHigh: 41,
    rotateLow: 13,
    maskHigh: 0xf0f0f0f0f0f0f0f0n,
    maskLow: 0x0f0f0f0f0f0f0f0fn,
    seedHigh: 0xe7037ed1a0b428dbn,
    seedLow: 0x8ebc6af09c88c6e3n,
  },
};

export function fmix64(x: bigint): bigint {
  let v = x & MASK64;
  v ^= v >> 33n;
  v = (v * FMIX_C1) & MASK64;
  v ^= v >> 33n;
  v = (v * FMIX_C2) & MASK64;
  v ^= v >> 33n;
  return v;
}

export function rotl64(x: bigint, n: number): bigint {
  const value = x & MASK64;
  const shift = BigInt(((n % 64) + 64) % 64);
  if (shift === 0n) {
    return value;
  }
  return ((value << shift) | (value >> (64n - shift))) & MASK64;
}

export function mix(a: Identifier, b: Identifier, axis: IndexAxis): CompositeKey {
  const params = AXIS_PARAMETERS[axis];

  const aHigh = fmix64(high64(a));
  const aLow = fmix64(low64(a));
  const bHigh = fmix64(high64(b));
  const bLow = fmix64(low64(b));

  const high = aHigh ^ ((bLow * GOLDEN) & MASK64);
  const low = aLow ^ ((bHigh * GOLDEN) & MASK64);

  const rotatedHigh = rotl64(high, params.rotateHigh) ^ (low & params.maskHigh);
  const rotatedLow = rotl64(low, params.rotateLow) ^ (high & params.maskLow);

  return (fmix64(rotatedHigh ^ params.seedHigh) << 64n) | fmix64(rotatedLow ^ params.seedLow);
}
