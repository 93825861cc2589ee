//worldcore/utils/Rng.ts
// Seeded PRNG for the demo simulation and tests. Same seed, same sequence.

export class Rng {
  private state: number;

  constructor(seed: string | number) {
    this.state = typeof seed === "number" ? (seed >>> 0) || 1 : Rng.hashString(seed);
  }

  static hashString(str: string): number {
    let h = 1779033703 ^ str.length;
    for (let i = 0; i < str.length; i++) {
      h = Math.imul(h ^ str.charCodeAt(i), 3432918353);
      h = (h << 13) | (h >>> 19);
    }
    return (h >>> 0) || 1;
  }

  // mulberry32
  next(): number {
    let t = (this.state += 0x6d2b79f5);
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), 61 | t);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  }

  range(min: number, max: number): number {
    return min + (max - min) * this.next();
  }

  int(min: number, maxInclusive: number): number {
    return min + Math.floor(this.next() * (maxInclusive - min + 1));
  }

  chance(p: number): boolean {
    return this.next() < p;
  }

  pick<T>(list: readonly T[]): T {
    if (list.length === 0) {
      throw new Error("Rng.pick called with empty list");
    }
    const item = list[this.int(0, list.length - 1)];
    if (item === undefined) throw new Error("Rng.pick index out of range");
    return item;
  }

  /** Independent stream derived from this one, e.g. one per entity. */
  fork(label: string): Rng {
    return new Rng((Rng.hashString(label) ^ Math.floor(this.next() * 4294967296)) >>> 0);
  }
}
