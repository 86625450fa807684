/**
 * xorshift32 generator with uint32 state. The same seed always yields the
 * same sequence, which keeps seeded payloads reproducible across runs.
 */
export class XorShift32 {
  private x: number;

  constructor(seed: number) {
    const s = seed >>> 0;
    // An all-zero state never leaves zero.
    this.x = s === 0 ? 0x9e3779b9 : s;
  }

  next(): number {
    let x = this.x >>> 0;
    x ^= (x << 13) >>> 0;
    x ^= x >>> 17;
    x ^= (x << 5) >>> 0;
    this.x = x >>> 0;
    return this.x;
  }

  /** Float in [0, 1). */
  nextFloat01(): number {
    return this.next() / 0x100000000;
  }

  /** Integer in [min, max], both inclusive. */
  nextInt(min: number, max: number): number {
    return min + Math.floor(this.nextFloat01() * (max - min + 1));
  }
}
