import { PIECES, type PieceKind } from './types';
import { XorShift32 } from './rng';
import type { PieceGenerator } from './generator';

/** Independent uniform draw over the seven pieces. */
export class RandomGenerator implements PieceGenerator {
  private rng: XorShift32;

  constructor(seed: number) {
    this.rng = new XorShift32(seed);
  }

  reset(seed: number): void {
    this.rng = new XorShift32(seed);
  }

  next(): PieceKind {
    return PIECES[this.rng.nextInt(PIECES.length)];
  }
}
