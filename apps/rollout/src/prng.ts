// Deterministic PRNG for rollouts. Do NOT use Math.random().
export class Prng {
  private a: number;

  constructor(seed: number) {
    // Ensure 32-bit unsigned seed.
    this.a = seed >>> 0;
    if (this.a === 0) this.a = 0x6d2b79f5; // avoid a trivial all-zero seed state
  }

  // Mulberry32
  nextU32(): number {
    let t = (this.a += 0x6d2b79f5);
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return (t ^ (t >>> 14)) >>> 0;
  }

  /** Uniform in [0, 1). */
  next(): number {
    return this.nextU32() / 4294967296;
  }

  int(minInclusive: number, maxExclusive: number): number {
    if (!Number.isInteger(minInclusive) || !Number.isInteger(maxExclusive)) {
      throw new Error("Prng.int bounds must be integers");
    }
    if (maxExclusive <= minInclusive) {
      throw new Error("Prng.int maxExclusive must be > minInclusive");
    }
    const span = maxExclusive - minInclusive;
    return minInclusive + (this.nextU32() % span);
  }

  /** Uniform in [min, max]. */
  float(min: number, max: number): number {
    return min + this.next() * (max - min);
  }

  /** Uniform in [min, max], both inclusive. */
  bigint(min: bigint, max: bigint): bigint {
    if (max < min) throw new Error("Prng.bigint max must be >= min");
    const span = max - min + 1n;
    const draw = (BigInt(this.nextU32()) << 32n) | BigInt(this.nextU32());
    return min + (draw % span);
  }

  pick<T>(items: readonly T[]): T {
    if (items.length === 0) throw new Error("Prng.pick needs a non-empty list");
    return items[this.int(0, items.length)]!;
  }

  shuffleInPlace<T>(arr: T[]): void {
    for (let i = arr.length - 1; i > 0; i--) {
      const j = this.int(0, i + 1);
      const tmp = arr[i]!;
      arr[i] = arr[j]!;
      arr[j] = tmp;
    }
  }
}
