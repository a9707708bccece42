import { createHash, randomBytes } from 'node:crypto';

import { InvalidIdentifierError } from '../errors.js';

/**
 * 128 位无符号标识符，取值范围 [0, 2^128)
 */
export type Identifier = bigint;

export const MAX_IDENTIFIER: Identifier = (1n << 128n) - 1n;
export const MASK64 = 0xffffffffffffffffn;

const HEX_32 = /^[0-9a-f]{32}$/i;
const UUID_TEXT = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

// 决定性标识符的固定命名空间（RFC 4122 URL 命名空间）
const NAMESPACE = Buffer.from('6ba7b8119dad11d180b400c04fd430c8', 'hex');

export function isIdentifier(value: unknown): value is Identifier {
  return typeof value === 'bigint' && value >= 0n && value <= MAX_IDENTIFIER;
}

function fromBytes(bytes: Uint8Array): Identifier {
  let value = 0n;
  for (const byte of bytes.subarray(0, 16)) {
    value = (value << 8n) | BigInt(byte);
  }
  return value;
}

export function randomIdentifier(): Identifier {
  return fromBytes(randomBytes(16));
}

/**
 * 解析显式提供的标识符
 *
 * 接受范围内的 bigint、非负安全整数、32 位十六进制串或 8-4-4-4-12 形式的 UUID 文本。
 */
export function parseIdentifier(input: unknown): Identifier {
  if (isIdentifier(input)) {
    return input;
  }
  if (typeof input === 'number' && Number.isSafeInteger(input) && input >= 0) {
    return BigInt(input);
  }
  if (typeof input === 'string') {
    const compact = UUID_TEXT.test(input) ? input.replace(/-/g, '') : input;
    if (HEX_32.test(compact)) {
      return BigInt(`0x${compact}`);
    }
  }
  throw new InvalidIdentifierError(input);
}

export function formatIdentifier(id: Identifier): string {
  const hex = id.toString(16).padStart(32, '0');
  return `${hex.slice(0, 8)}-${hex.slice(8, 12)}-${hex.slice(12, 16)}-${hex.slice(16, 20)}-${hex.slice(20)}`;
}

/**
 * 由命名空间与文本派生决定性标识符（SHA-1 摘要取前 16 字节）
 */
export function namespacedIdentifier(namespace: string, text: string): Identifier {
  const digest = createHash('sha1').update(NAMESPACE).update(`${namespace}:${text}`, 'utf8').digest();
  return fromBytes(digest);
}

export function high64(id: Identifier): bigint {
  return (id >> 64n) & MASK64;
}

export function low64(id: Identifier): bigint {
  return id & MASK64;
}
