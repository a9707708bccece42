import { MASK64, type Identifier } from '../model/identifier.js';

/**
 * splitmix64：可复现的 64 位序列
 */
export function createSplitMix64(seed: bigint): () => bigint {
  let state = seed & MASK64;
  return () => {
    state = (state + 0x9e3779b97f4a7c15n) & MASK64;
    let z = state;
    z = ((z ^ (z >> 30n)) * 0xbf58476d1ce4e5b9n) & MASK64;
    z = ((z ^ (z >> 27n)) * 0x94d049bb133111ebn) & MASK64;
    return z ^ (z >> 31n);
  };
}

/**
 * 可复现的 128 位标识符来源，可直接作为 idSource
 */
export function seededIdentifiers(seed: bigint): () => Identifier {
  const next = createSplitMix64(seed);
  return () => (next() << 64n) | next();
}
