/**
 * Source of uniform draws in [0, 1).
 */
export interface RandomSource {
  next(): number;
}

export const RANDOM_SOURCE = Symbol('RANDOM_SOURCE');

export class MathRandomSource implements RandomSource {
  next(): number {
    return Math.random();
  }
}

/**
 * mulberry32 generator, used when GENERATOR_SEED is set.
 */
export class SeededRandomSource implements RandomSource {
  private state: number;

  constructor(seed: number) {
    this.state = seed >>> 0;
  }

  next(): number {
    this.state = (this.state + 0x6d2b79f5) >>> 0;
    let t = this.state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  }
}
