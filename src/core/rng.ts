/**
 * Pseudo-random sources for pattern sampling.
 * The seeded generator makes a pattern reproducible from its seed; it uses a
 * simple xoshiro128** algorithm.
 */

export interface RandomSource {
  /** Returns an integer in [0, max) */
  int(max: number): number;
}

export class SeededRNG implements RandomSource {
  private state: Uint32Array;

  constructor(readonly seed: number) {
    // Initialize state from seed using splitmix-style mixing
    this.state = new Uint32Array(4);
    let s = seed >>> 0;
    for (let i = 0; i < 4; i++) {
      s = (s + 0x9e3779b9) >>> 0;
      let z = s;
      z = Math.imul(z ^ (z >>> 16), 0x85ebca6b) >>> 0;
      z = Math.imul(z ^ (z >>> 13), 0xc2b2ae35) >>> 0;
      z = (z ^ (z >>> 16)) >>> 0;
      this.state[i] = z;
    }
  }

  /** Returns a float in [0, 1) */
  random(): number {
    const result = Math.imul(this.rotl(Math.imul(this.state[1], 5), 7), 9);
    const t = this.state[1] << 9;

    this.state[2] ^= this.state[0];
    this.state[3] ^= this.state[1];
    this.state[1] ^= this.state[2];
    this.state[0] ^= this.state[3];
    this.state[2] ^= t;
    this.state[3] = this.rotl(this.state[3], 11);

    return (result >>> 0) / 0x100000000;
  }

  int(max: number): number {
    return Math.floor(this.random() * max);
  }

  private rotl(x: number, k: number): number {
    return ((x << k) | (x >>> (32 - k))) >>> 0;
  }
}

/** Unseeded source backed by Math.random, for interactive sessions. */
export const mathRandomSource: RandomSource = {
  int(max: number): number {
    return Math.floor(Math.random() * max);
  },
};
