import { COLS, ROWS } from '../core/constants';
import type { GameLogger } from '../core/game';
import type { PieceGenerator } from '../core/generator';
import { PIECE_COLORS } from '../core/palette';
import type { Clock, Scheduler } from '../core/runner';
import { isPieceKind, type GameSnapshot, type PieceKind } from '../core/types';

/** Cycles through a fixed list of pieces. */
export class SequenceGenerator implements PieceGenerator {
  private i = 0;

  constructor(private kinds: PieceKind[]) {}

  next(): PieceKind {
    const k = this.kinds[this.i % this.kinds.length];
    this.i++;
    return k;
  }

  reset(_seed: number): void {
    this.i = 0;
  }
}

export class ManualClock implements Clock {
  constructor(private t = 0) {}

  now(): number {
    return this.t;
  }

  advance(ms: number): void {
    this.t += ms;
  }
}

/** Accepts schedules and never runs them; ticks are driven by hand. */
export const idleScheduler: Scheduler = {
  schedule: () => () => undefined,
};

export const silentLogger: GameLogger = {
  info: () => undefined,
  warn: () => undefined,
};

export function emptyGrid(): number[] {
  return Array<number>(ROWS * COLS).fill(0);
}

/**
 * Builds a flat grid from text rows aligned to the bottom of the board.
 * Piece letters become that piece's color; anything else is empty.
 */
export function gridFrom(lines: string[]): number[] {
  const grid = emptyGrid();
  const top = ROWS - lines.length;
  lines.forEach((line, i) => {
    for (let x = 0; x < COLS; x++) {
      const ch = line.charAt(x);
      if (isPieceKind(ch)) grid[(top + i) * COLS + x] = PIECE_COLORS[ch];
    }
  });
  return grid;
}

export function snapshotOf(
  overrides: Partial<GameSnapshot> = {},
): GameSnapshot {
  return {
    grid: emptyGrid(),
    score: 0,
    highScore: 0,
    isGameOver: false,
    isPaused: false,
    current: null,
    nextType: 'T',
    ...overrides,
  };
}
