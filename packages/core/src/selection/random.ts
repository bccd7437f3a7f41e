/**
 * Injectable randomness for sampling
 */

/**
 * Uniform source in [0, 1), same contract as Math.random
 */
export type RandomSource = () => number;

const MASK_64 = 0xffffffffffffffffn;

/**
 * xorshift128+ generator
 */
class XorShift128Plus {
  private state0: bigint;
  private state1: bigint;

  constructor(seed: bigint) {
    this.state0 = (seed ^ 0x853c49e6748fea9bn) & MASK_64;
    this.state1 = (seed ^ 0xda3e39cb94b95bdbn) & MASK_64;
  }

  next(): bigint {
    let s1 = this.state0;
    const s0 = this.state1;
    this.state0 = s0;
    s1 ^= (s1 << 23n) & MASK_64;
    s1 ^= s1 >> 17n;
    s1 ^= s0;
    s1 ^= s0 >> 26n;
    this.state1 = s1;
    return (this.state0 + this.state1) & MASK_64;
  }
}

/**
 * Reproducible random source: the same seed always yields the same sequence
 *
 * @param seed - Integer seed (fractional parts are dropped)
 */
export function createSeededRandom(seed: number | bigint): RandomSource {
  const seedBits = BigInt.asUintN(64, typeof seed === 'bigint' ? seed : BigInt(Math.trunc(seed)));
  const rng = new XorShift128Plus(seedBits);
  // Top 53 bits give a uniformly spaced double in [0, 1)
  return () => Number(rng.next() >> 11n) / 2 ** 53;
}

/**
 * Uniform integer in [0, bound)
 */
export function randomIndex(bound: number, random: RandomSource): number {
  return Math.min(Math.floor(random() * bound), bound - 1);
}
