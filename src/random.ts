export type Seed = number;

// mulberry32 over a single 32-bit state word
function createGenerator(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

function entropySeed(): number {
  return Math.floor(Math.random() * 4294967296);
}

/**
 * Seeded pseudorandom stream. Every environment and policy owns one, so runs are reproducible
 * from their seeds alone.
 */
export class Rng {
  private next: () => number;

  constructor(seed?: Seed) {
    this.next = createGenerator(seed ?? entropySeed());
  }

  reseed(seed?: Seed) {
    this.next = createGenerator(seed ?? entropySeed());
  }

  /** Uniform draw in [0, 1). */
  random(): number {
    return this.next();
  }

  /** Uniform integer in [0, maxExclusive). */
  nextInt(maxExclusive: number): number {
    return Math.floor(this.random() * maxExclusive);
  }

  /** Fisher-Yates shuffle of a copy of `items`. */
  shuffle<T>(items: readonly T[]): T[] {
    const shuffled = [...items];
    for (let i = shuffled.length - 1; i > 0; i--) {
      const j = this.nextInt(i + 1);
      [shuffled[i], shuffled[j]] = [shuffled[j], shuffled[i]];
    }
    return shuffled;
  }

  normal(mean = 0, std = 1): number {
    // Box-Muller; 1 - u keeps the log argument in (0, 1]
    const u1 = 1 - this.random();
    const u2 = this.random();
    const z = Math.sqrt(-2 * Math.log(u1)) * Math.cos(2 * Math.PI * u2);
    return mean + std * z;
  }

  /** Marsaglia-Tsang sampler, boosted for shape < 1. */
  gamma(shape: number, scale = 1): number {
    if (!(shape > 0) || !(scale > 0)) {
      throw new RangeError(`gamma requires shape > 0 and scale > 0, got ${shape}, ${scale}`);
    }
    if (shape < 1) {
      return this.gamma(shape + 1, scale) * Math.pow(1 - this.random(), 1 / shape);
    }

    const d = shape - 1 / 3;
    const c = 1 / Math.sqrt(9 * d);

    for (;;) {
      const x = this.normal();
      const v = 1 + c * x;
      if (v <= 0) continue;

      const v3 = v * v * v;
      const u = 1 - this.random();
      if (u < 1 - 0.0331 * x * x * x * x) {
        return d * v3 * scale;
      }
      if (Math.log(u) < 0.5 * x * x + d * (1 - v3 + Math.log(v3))) {
        return d * v3 * scale;
      }
    }
  }

  beta(alpha: number, beta: number): number {
    const x = this.gamma(alpha);
    const y = this.gamma(beta);
    return x / (x + y);
  }
}
