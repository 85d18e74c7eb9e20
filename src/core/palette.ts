import type { PieceKind } from './types';

export type PiecePalette = Readonly<Record<PieceKind, number>>;

/** Color written into the board when a piece locks. */
export const PIECE_COLORS: PiecePalette = {
  I: 0x00b7b7,
  J: 0x0000b7,
  L: 0xb75b00,
  O: 0xffbf00,
  S: 0x00b700,
  T: 0x8e44ad,
  Z: 0xb70000,
};

export const PIECE_HIGHLIGHT_COLORS: PiecePalette = {
  I: 0x00ffff,
  J: 0x0000ff,
  L: 0xff7f00,
  O: 0xffff40,
  S: 0x00ff00,
  T: 0x9b59b6,
  Z: 0xff0000,
};

const KIND_BY_COLOR = new Map<number, PieceKind>(
  Object.entries(PIECE_COLORS).flatMap(([kind, color]) =>
    isKindKey(kind) ? [[color, kind] as const] : [],
  ),
);

function isKindKey(key: string): key is PieceKind {
  return key in PIECE_COLORS;
}

export function isPieceColor(value: number): boolean {
  return KIND_BY_COLOR.has(value);
}

export function highlightOf(color: number): number {
  const kind = KIND_BY_COLOR.get(color);
  return kind === undefined ? color : PIECE_HIGHLIGHT_COLORS[kind];
}
