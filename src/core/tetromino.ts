import type { PieceKind, Rotation, Shape } from './types';

// Spawn orientation of each piece inside its bounding box.
export const BASE_SHAPES: Readonly<Record<PieceKind, Shape>> = {
  I: [
    [0, 0, 0, 0],
    [1, 1, 1, 1],
    [0, 0, 0, 0],
    [0, 0, 0, 0],
  ],
  J: [
    [1, 0, 0],
    [1, 1, 1],
    [0, 0, 0],
  ],
  L: [
    [0, 0, 1],
    [1, 1, 1],
    [0, 0, 0],
  ],
  O: [
    [0, 0, 0],
    [0, 1, 1],
    [0, 1, 1],
  ],
  S: [
    [0, 1, 1],
    [1, 1, 0],
    [0, 0, 0],
  ],
  T: [
    [0, 1, 0],
    [1, 1, 1],
    [0, 0, 0],
  ],
  Z: [
    [1, 1, 0],
    [0, 1, 1],
    [0, 0, 0],
  ],
};

/**
 * Quarter turn clockwise of an n x n matrix:
 * `result[j][n - 1 - i] = source[i][j]`.
 */
export function rotateClockwise(source: Shape): Shape {
  const n = source.length;
  const result: (0 | 1)[][] = Array.from({ length: n }, () =>
    Array<0 | 1>(n).fill(0),
  );
  for (let i = 0; i < n; i++) {
    for (let j = 0; j < n; j++) {
      result[j][n - 1 - i] = source[i][j];
    }
  }
  return result;
}

export function rotateShape(base: Shape, r: Rotation): Shape {
  let shape = base;
  for (let i = 0; i < r; i++) shape = rotateClockwise(shape);
  return shape;
}

const ROTATIONS: readonly Rotation[] = [0, 1, 2, 3];

export function rotAdd(r: Rotation, dir: -1 | 1): Rotation {
  return ROTATIONS[(r + dir + 4) % 4];
}

export function isRotation(value: unknown): value is Rotation {
  return value === 0 || value === 1 || value === 2 || value === 3;
}
