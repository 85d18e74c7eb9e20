import { COLS, LINE_SCORES, ROWS } from './constants';
import { cellsOf, colorOf } from './piece';
import type { ActivePiece, Board } from './types';

export interface RowClearResult {
  /** Indices of the completed rows, as they were before clearing. */
  rows: number[];
  points: number;
}

export function makeBoard(): Board {
  return Array.from({ length: ROWS }, () => Array(COLS).fill(null));
}

/**
 * Rows above the board (y < 0) are only checked against the side walls, so
 * pieces may spawn or rotate partly above the top.
 */
export function canMove(
  board: Board,
  piece: ActivePiece,
  dx: number,
  dy: number,
): boolean {
  for (const [cx, cy] of cellsOf(piece, piece.r, dx, dy)) {
    if (cx < 0 || cx >= COLS || cy >= ROWS) return false;
    if (cy >= 0 && board[cy][cx] != null) return false;
  }
  return true;
}

export function isCollision(board: Board, piece: ActivePiece): boolean {
  return !canMove(board, piece, 0, 0);
}

/** Cells above row 0 are dropped. */
export function lockPiece(board: Board, piece: ActivePiece): void {
  const color = colorOf(piece);
  for (const [cx, cy] of cellsOf(piece)) {
    if (cy >= 0 && cy < ROWS && cx >= 0 && cx < COLS) board[cy][cx] = color;
  }
}

export function isRowComplete(board: Board, row: number): boolean {
  return board[row].every((c) => c != null);
}

/** Removes `row`, shifting every row above it down by one. */
export function clearRow(board: Board, row: number): void {
  for (let y = row; y > 0; y--) {
    board[y] = [...board[y - 1]];
  }
  board[0] = Array(COLS).fill(null);
}

export function scoreForRows(count: number): number {
  return LINE_SCORES[count] ?? count * 100;
}

export function checkCompletedRows(board: Board): RowClearResult {
  const rows: number[] = [];
  for (let y = 0; y < ROWS; y++) {
    if (isRowComplete(board, y)) rows.push(y);
  }
  // Top to bottom: clearing row r only moves rows above r, so the
  // remaining (larger) indices still point at the same rows.
  for (const y of rows) clearRow(board, y);
  return { rows, points: rows.length > 0 ? scoreForRows(rows.length) : 0 };
}

/** The lowest row the piece can reach by falling straight down. */
export function findDropPosition(board: Board, piece: ActivePiece): number {
  let dropY = piece.y;
  while (canMove(board, piece, 0, dropY - piece.y + 1)) dropY++;
  return dropY;
}
