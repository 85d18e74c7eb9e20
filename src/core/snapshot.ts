import { COLS, ROWS } from './constants';
import { isPieceColor } from './palette';
import { isRotation } from './tetromino';
import {
  isPieceKind,
  type Board,
  type GameSnapshot,
  type PieceSnapshot,
} from './types';

export const EMPTY_CELL_CODE = 0;

export class SnapshotError extends Error {
  constructor(
    readonly path: string,
    message: string,
  ) {
    super(`Invalid snapshot at ${path}: ${message}`);
    this.name = 'SnapshotError';
  }
}

export function encodeBoard(board: Board): number[] {
  return board.flatMap((row) => row.map((c) => c ?? EMPTY_CELL_CODE));
}

export function decodeBoard(grid: readonly number[]): Board {
  return Array.from({ length: ROWS }, (_, y) =>
    grid
      .slice(y * COLS, (y + 1) * COLS)
      .map((code) => (code === EMPTY_CELL_CODE ? null : code)),
  );
}

type Fields = Record<string, unknown>;

function isObject(value: unknown): value is Fields {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function requireObject(value: unknown, path: string): Fields {
  if (!isObject(value)) throw new SnapshotError(path, 'expected an object');
  return value;
}

function requireInt(value: unknown, path: string, min = -Infinity): number {
  if (typeof value !== 'number' || !Number.isInteger(value) || value < min) {
    throw new SnapshotError(
      path,
      min === 0 ? 'expected a non-negative integer' : 'expected an integer',
    );
  }
  return value;
}

function requireBool(value: unknown, path: string): boolean {
  if (typeof value !== 'boolean') {
    throw new SnapshotError(path, 'expected a boolean');
  }
  return value;
}

function parseGrid(value: unknown): number[] {
  if (!Array.isArray(value) || value.length !== ROWS * COLS) {
    throw new SnapshotError('grid', `expected ${ROWS * COLS} cells`);
  }
  return value.map((code: unknown, i) => {
    if (
      typeof code !== 'number' ||
      (code !== EMPTY_CELL_CODE && !isPieceColor(code))
    ) {
      throw new SnapshotError(`grid[${i}]`, 'unknown cell color');
    }
    return code;
  });
}

function parsePiece(value: unknown): PieceSnapshot | null {
  if (value === null) return null;
  const fields = requireObject(value, 'current');
  if (!isPieceKind(fields.type)) {
    throw new SnapshotError('current.type', 'unknown piece type');
  }
  if (!isRotation(fields.rotation)) {
    throw new SnapshotError('current.rotation', 'expected 0..3');
  }
  return {
    type: fields.type,
    rotation: fields.rotation,
    x: requireInt(fields.x, 'current.x'),
    y: requireInt(fields.y, 'current.y'),
  };
}

/**
 * Validates an untrusted snapshot in full. Throws `SnapshotError` on the
 * first problem found; never returns a partially valid result.
 */
export function parseGameSnapshot(value: unknown): GameSnapshot {
  const fields = requireObject(value, '$');
  if (!isPieceKind(fields.nextType)) {
    throw new SnapshotError('nextType', 'unknown piece type');
  }
  return {
    grid: parseGrid(fields.grid),
    score: requireInt(fields.score, 'score', 0),
    highScore: requireInt(fields.highScore, 'highScore', 0),
    isGameOver: requireBool(fields.isGameOver, 'isGameOver'),
    isPaused: requireBool(fields.isPaused, 'isPaused'),
    current: parsePiece(fields.current ?? null),
    nextType: fields.nextType,
  };
}

export function serializeSnapshot(snapshot: GameSnapshot): string {
  return JSON.stringify(snapshot);
}

export function deserializeSnapshot(text: string): GameSnapshot {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    throw new SnapshotError(
      '$',
      err instanceof Error ? err.message : 'malformed JSON',
    );
  }
  return parseGameSnapshot(parsed);
}
