export const PIECES = ['I', 'J', 'L', 'O', 'S', 'T', 'Z'] as const;
export type PieceKind = (typeof PIECES)[number];

export type Rotation = 0 | 1 | 2 | 3;
export type Vec2 = readonly [number, number];

/** Square 0/1 occupancy matrix, indexed [row][col]. */
export type Shape = ReadonlyArray<ReadonlyArray<0 | 1>>;

/** A locked cell holds the color of the piece that locked there. */
export type Cell = number | null;
export type Board = Cell[][];

export interface ActivePiece {
  k: PieceKind;
  r: Rotation;
  x: number;
  y: number; // can be negative after rotating near the top
}

export interface PieceSnapshot {
  type: PieceKind;
  rotation: Rotation;
  x: number;
  y: number;
}

export interface GameSnapshot {
  /** Row-major, ROWS * COLS entries; 0 is an empty cell. */
  grid: number[];
  score: number;
  highScore: number;
  isGameOver: boolean;
  isPaused: boolean;
  current: PieceSnapshot | null;
  nextType: PieceKind;
}

export interface GameView {
  board: ReadonlyArray<ReadonlyArray<Cell>>;
  current: {
    kind: PieceKind;
    color: number;
    cells: Vec2[];
    ghostY: number;
    ghostCells: Vec2[];
  } | null;
  next: { kind: PieceKind; shape: Shape };
  score: number;
  highScore: number;
  isGameOver: boolean;
  isPaused: boolean;
  pointerX: number | null;
}

export function isPieceKind(value: unknown): value is PieceKind {
  return typeof value === 'string' && PIECES.some((k) => k === value);
}
