/**
 * Random number sources.
 *
 * Everything that shuffles or rolls takes an `Rng` with the same contract
 * as Math.random (a value in [0, 1)). Seeded generators make whole
 * matches reproducible from a single number.
 */

export type Rng = () => number;

/** Xorshift32 generator (13/17/5 shifts) over unsigned 32-bit state. */
export class Xorshift32 {
  #state: number;

  constructor(seed: number) {
    this.#state = seed >>> 0;
  }

  get state(): number {
    return this.#state;
  }

  nextUint32(): number {
    let x = this.#state >>> 0;
    x ^= (x << 13) >>> 0;
    x ^= x >>> 17;
    x ^= (x << 5) >>> 0;
    this.#state = x >>> 0;
    return this.#state;
  }
}

// xorshift never leaves the all-zero state
const ZERO_SEED_REPLACEMENT = 0x9e3779b9;

/** Create a deterministic rng from a seed. */
export function createSeededRng(seed: number): Rng {
  const normalized = seed >>> 0;
  const generator = new Xorshift32(
    normalized === 0 ? ZERO_SEED_REPLACEMENT : normalized,
  );
  return () => generator.nextUint32() / 4294967296;
}

/**
 * Fisher-Yates shuffle, in place.
 *
 * @returns The same array reference.
 */
export function shuffle<T>(items: T[], rng: Rng = Math.random): T[] {
  for (let i = items.length - 1; i > 0; i--) {
    const j = Math.floor(rng() * (i + 1));
    [items[i], items[j]] = [items[j], items[i]];
  }
  return items;
}
