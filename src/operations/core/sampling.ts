/**
 * Random sources and sampling without replacement
 *
 * Two choices in a conversion are random: which base of a biallelic site is
 * coded "0", and which sites survive a site cap. Each takes its own
 * {@link RandomSource} so tests can pin one without touching the other.
 */

/**
 * Uniform source of numbers in [0, 1), shaped like `Math.random`
 */
export type RandomSource = () => number;

/**
 * Independent random sources for the two randomized stages
 */
export interface RandomSources {
  readonly polarity: RandomSource;
  readonly cap: RandomSource;
}

// Fallback state for a zero seed, which would keep xorshift32 at zero forever
const ZERO_SEED_STATE = 0x9e3779b9;
// Mixed into the seed to start the cap stream away from the polarity stream
const CAP_STREAM_SALT = 0x5bd1e995;

/**
 * Create seeded random number generator using the xorshift32 algorithm
 *
 * @example
 * ```typescript
 * const random = createSeededRandom(42);
 * random(); // same value on every run
 * ```
 */
export function createSeededRandom(seed: number): RandomSource {
  let state = seed >>> 0 || ZERO_SEED_STATE;

  return () => {
    state ^= state << 13;
    state ^= state >>> 17;
    state ^= state << 5;
    // Convert to [0, 1) range
    return (state >>> 0) / 0x100000000;
  };
}

/**
 * Random sources for one conversion run
 *
 * Without a seed both stages draw from `Math.random`.
 */
export function createRandomSources(seed?: number): RandomSources {
  if (seed === undefined) {
    return { polarity: Math.random, cap: Math.random };
  }
  return {
    polarity: createSeededRandom(seed),
    cap: createSeededRandom(seed ^ CAP_STREAM_SALT),
  };
}

/**
 * Random sampler using a partial Fisher-Yates shuffle
 *
 * Draws `sampleSize` distinct items uniformly without replacement. Only the
 * first `sampleSize` slots of a working copy are shuffled.
 *
 * @example
 * ```typescript
 * const sampler = new RandomSampler<number>(3, createSeededRandom(7));
 * sampler.sample([0, 1, 2, 3, 4, 5]); // three distinct positions
 * ```
 */
export class RandomSampler<T> {
  constructor(
    private readonly sampleSize: number,
    private readonly random: RandomSource = Math.random
  ) {
    if (!Number.isInteger(sampleSize) || sampleSize <= 0) {
      throw new Error("Sample size must be a positive integer");
    }
  }

  /**
   * Sample items; returns every item when fewer than `sampleSize` are given
   */
  sample(source: readonly T[]): T[] {
    const items = [...source];
    const actualSampleSize = Math.min(this.sampleSize, items.length);

    for (let i = 0; i < actualSampleSize; i++) {
      // Pick random element from remaining unshuffled portion
      const j = i + Math.floor(this.random() * (items.length - i));

      const current = items[i];
      const selected = items[j];
      if (current !== undefined && selected !== undefined) {
        items[i] = selected;
        items[j] = current;
      }
    }

    return items.slice(0, actualSampleSize);
  }
}
