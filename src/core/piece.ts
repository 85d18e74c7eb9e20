import { COLS, SPAWN_Y } from './constants';
import { PIECE_COLORS } from './palette';
import { BASE_SHAPES, rotAdd, rotateShape } from './tetromino';
import type { ActivePiece, PieceKind, Rotation, Shape, Vec2 } from './types';

export function createPiece(k: PieceKind): ActivePiece {
  const width = BASE_SHAPES[k][0].length;
  return { k, r: 0, x: Math.floor((COLS - width) / 2), y: SPAWN_Y };
}

/** The piece's shape at rotation `r`, derived from its spawn shape. */
export function shapeOf(piece: ActivePiece, r: Rotation = piece.r): Shape {
  return rotateShape(BASE_SHAPES[piece.k], r);
}

export function colorOf(piece: ActivePiece): number {
  return PIECE_COLORS[piece.k];
}

/** Grid coordinates `[x, y]` of every filled cell. */
export function cellsOf(
  piece: ActivePiece,
  r: Rotation = piece.r,
  dx = 0,
  dy = 0,
): Vec2[] {
  const shape = shapeOf(piece, r);
  const out: Vec2[] = [];
  for (let i = 0; i < shape.length; i++) {
    for (let j = 0; j < shape[i].length; j++) {
      if (shape[i][j] === 1) out.push([piece.x + j + dx, piece.y + i + dy]);
    }
  }
  return out;
}

// The mutators below are unconditional; callers check legality first.

export function rotate(piece: ActivePiece): void {
  piece.r = rotAdd(piece.r, 1);
}

export function moveLeft(piece: ActivePiece): void {
  piece.x -= 1;
}

export function moveRight(piece: ActivePiece): void {
  piece.x += 1;
}

export function moveDown(piece: ActivePiece): void {
  piece.y += 1;
}
