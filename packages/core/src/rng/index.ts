// ============================================================================
// CARDLEAGUE - Seeded Random Number Generator
// ============================================================================
// One generator per league, advanced in command order. Its state is stored in
// the league so a reloaded save continues the exact same sequence.

// xmur3-style string hash to a 32-bit start state
function hashSeed(seed: string): number {
  let h = 1779033703 ^ seed.length;
  for (let i = 0; i < seed.length; i++) {
    h = Math.imul(h ^ seed.charCodeAt(i), 3432918353);
    h = (h << 13) | (h >>> 19);
  }
  h = Math.imul(h ^ (h >>> 16), 2246822507);
  h = Math.imul(h ^ (h >>> 13), 3266489909);
  return (h ^ (h >>> 16)) >>> 0;
}

export class SeededRNG {
  private state: number;

  constructor(seed: string, state?: number) {
    this.state = state ?? hashSeed(seed);
  }

  /** Restore a generator from a serialized state; falls back to the seed */
  static deserialize(seed: string, serialized: string | null | undefined): SeededRNG {
    if (serialized) {
      const state = Number.parseInt(serialized, 10);
      if (Number.isFinite(state)) {
        return new SeededRNG(seed, state >>> 0);
      }
    }
    return new SeededRNG(seed);
  }

  serialize(): string {
    return String(this.state >>> 0);
  }

  /** Next unsigned 32-bit integer (mulberry32) */
  next(): number {
    this.state = (this.state + 0x6d2b79f5) >>> 0;
    let t = this.state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return (t ^ (t >>> 14)) >>> 0;
  }

  /** Float in [0, 1) */
  float(): number {
    return this.next() / 4294967296;
  }

  /** Integer in [min, max] inclusive */
  int(min: number, max: number): number {
    return min + Math.floor(this.float() * (max - min + 1));
  }

  /** Float in [min, max) */
  range(min: number, max: number): number {
    return min + this.float() * (max - min);
  }

  chance(probability: number): boolean {
    return this.float() < probability;
  }

  /** Standard normal sample (Box-Muller) */
  normal(): number {
    const u = 1 - this.float();
    const v = this.float();
    return Math.sqrt(-2 * Math.log(u)) * Math.cos(2 * Math.PI * v);
  }

  pick<T>(items: readonly T[]): T {
    if (items.length === 0) {
      throw new RangeError('Cannot pick from an empty list');
    }
    return items[this.int(0, items.length - 1)];
  }

  /** Fisher-Yates copy; the input is left untouched */
  shuffle<T>(items: readonly T[]): T[] {
    const result = [...items];
    for (let i = result.length - 1; i > 0; i--) {
      const j = this.int(0, i);
      [result[i], result[j]] = [result[j], result[i]];
    }
    return result;
  }
}
