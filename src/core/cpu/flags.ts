import type { Byte } from './types';

// FL layout: 00000LGE
export const FL_L = 1 << 2;
export const FL_G = 1 << 1;
export const FL_E = 1 << 0;

/**
 * Comparison flags. Exactly one of L/G/E is set after any comparison, all
 * clear before the first one. The only way to change them is a whole
 * comparison, so there is no per-bit setter.
 */
export class Flags {
  private bits: Byte = 0;

  get value(): Byte { return this.bits; }
  get less(): boolean { return (this.bits & FL_L) !== 0; }
  get greater(): boolean { return (this.bits & FL_G) !== 0; }
  get equal(): boolean { return (this.bits & FL_E) !== 0; }

  setFromComparison(a: Byte, b: Byte): void {
    const x = a & 0xFF, y = b & 0xFF;
    this.bits = x === y ? FL_E : x < y ? FL_L : FL_G;
  }

  reset(): void { this.bits = 0; }
}
