import { describe, expect, it } from 'vitest';
import {
  cellsOf,
  colorOf,
  createPiece,
  moveDown,
  moveLeft,
  moveRight,
  rotate,
  shapeOf,
} from '../core/piece';
import { PIECE_COLORS } from '../core/palette';
import { BASE_SHAPES, rotateClockwise } from '../core/tetromino';
import { PIECES } from '../core/types';

describe('rotateClockwise', () => {
  it('turns the horizontal I into a vertical bar in column 2', () => {
    expect(rotateClockwise(BASE_SHAPES.I)).toEqual([
      [0, 0, 1, 0],
      [0, 0, 1, 0],
      [0, 0, 1, 0],
      [0, 0, 1, 0],
    ]);
  });

  it('points the T to the right after one turn', () => {
    expect(rotateClockwise(BASE_SHAPES.T)).toEqual([
      [0, 1, 0],
      [0, 1, 1],
      [0, 1, 0],
    ]);
  });

  it('does not modify its input', () => {
    const before = BASE_SHAPES.L.map((row) => [...row]);
    rotateClockwise(BASE_SHAPES.L);
    expect(BASE_SHAPES.L).toEqual(before);
  });
});

describe('piece', () => {
  it('spawns centered at the top in spawn orientation', () => {
    expect(createPiece('I')).toEqual({ k: 'I', r: 0, x: 3, y: 0 });
    expect(createPiece('O')).toEqual({ k: 'O', r: 0, x: 3, y: 0 });
    expect(createPiece('T')).toEqual({ k: 'T', r: 0, x: 3, y: 0 });
  });

  it.each(PIECES)('returns %s to its spawn shape after four turns', (k) => {
    const piece = createPiece(k);
    const base = shapeOf(piece);
    for (let i = 0; i < 4; i++) rotate(piece);
    expect(piece.r).toBe(0);
    expect(shapeOf(piece)).toEqual(base);
  });

  it('derives the shape from the rotation alone', () => {
    const piece = createPiece('S');
    rotate(piece);
    rotate(piece);
    expect(shapeOf(piece)).toEqual(
      rotateClockwise(rotateClockwise(BASE_SHAPES.S)),
    );
    expect(shapeOf(piece, 0)).toEqual(BASE_SHAPES.S);
  });

  it('maps filled cells to grid coordinates', () => {
    expect(cellsOf(createPiece('T'))).toEqual([
      [4, 0],
      [3, 1],
      [4, 1],
      [5, 1],
    ]);
    expect(cellsOf(createPiece('T'), 0, -1, 2)).toEqual([
      [3, 2],
      [2, 3],
      [3, 3],
      [4, 3],
    ]);
  });

  it('moves by one cell unconditionally', () => {
    const piece = { k: 'J' as const, r: 0 as const, x: 0, y: 0 };
    moveLeft(piece);
    expect(piece.x).toBe(-1);
    moveRight(piece);
    moveRight(piece);
    expect(piece.x).toBe(1);
    moveDown(piece);
    expect(piece.y).toBe(1);
  });

  it('has a fixed color per type', () => {
    expect(colorOf(createPiece('Z'))).toBe(PIECE_COLORS.Z);
    expect(new Set(Object.values(PIECE_COLORS)).size).toBe(7);
  });
});
