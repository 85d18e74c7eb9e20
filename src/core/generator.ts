import type { PieceKind } from './types';

export interface PieceGenerator {
  next(): PieceKind;
  reset(seed: number): void;
}

export type GeneratorFactory = (seed: number) => PieceGenerator;
