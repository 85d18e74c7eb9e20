import type { Graphics } from 'pixi.js';
import {
  BOARD_CELL_PX,
  BOARD_X,
  BOARD_Y,
  COLS,
  LEFT_ZONE,
  PREVIEW_COLS,
  PREVIEW_HEIGHT,
  PREVIEW_LABEL_HEIGHT,
  PREVIEW_ROWS,
  PREVIEW_WIDTH,
  PREVIEW_X,
  PREVIEW_Y,
  RIGHT_ZONE,
  ROWS,
} from '../core/constants';
import { PIECE_COLORS, highlightOf } from '../core/palette';
import type { GameView, Shape, Vec2 } from '../core/types';

const BOARD_FILL = 0x0b0f14;
const PANEL_FILL = 0x0b0f14;
const LABEL_FILL = 0x121a24;
const BORDER_COLOR = 0x1f2a37;
const GRID_COLOR = 0xffffff;
const GRID_ALPHA = 0.5;
const OUTLINE_COLOR = 0x000000;
const GHOST_ALPHA = 80 / 255;
const GLOSS_ALPHA = 0.25;
// Fraction of a cell left in the base color around the highlight.
const BLOCK_INSET = 0.18;
const LEFT_ZONE_COLOR = 0xff0000;
const RIGHT_ZONE_COLOR = 0x0000ff;
const ZONE_ALPHA = 0.4;
const POINTER_COLOR = 0xffffff;

const BOARD_BORDER = 3;
const PANEL_BORDER = 3;

export class PixiRenderer {
  private showZones = true;

  constructor(
    private gfx: Graphics,
    private cell = BOARD_CELL_PX,
    private boardX = BOARD_X,
    private boardY = BOARD_Y,
  ) {}

  setShowZones(enabled: boolean): void {
    this.showZones = enabled;
  }

  render(view: GameView): void {
    const { gfx, cell, boardX, boardY } = this;

    gfx.clear();

    gfx
      .rect(
        boardX - BOARD_BORDER,
        boardY - BOARD_BORDER,
        COLS * cell + BOARD_BORDER * 2,
        ROWS * cell + BOARD_BORDER * 2,
      )
      .fill(BORDER_COLOR);
    gfx.rect(boardX, boardY, COLS * cell, ROWS * cell).fill(BOARD_FILL);

    for (let y = 0; y < ROWS; y++) {
      for (let x = 0; x < COLS; x++) {
        const color = view.board[y][x];
        if (color == null) continue;
        this.drawBlock(boardX, boardY, x, y, color);
      }
    }

    const piece = view.current;
    if (piece && !view.isGameOver) {
      const ghostColor = highlightOf(piece.color);
      for (const [x, y] of visible(piece.ghostCells)) {
        gfx
          .rect(boardX + x * cell, boardY + y * cell, cell, cell)
          .fill({ color: ghostColor, alpha: GHOST_ALPHA });
      }
      for (const [x, y] of visible(piece.cells)) {
        this.drawBlock(boardX, boardY, x, y, piece.color);
      }
    }

    this.renderGridlines();
    this.renderPreview(view);
    if (this.showZones) this.renderZones(view.pointerX);
  }

  private renderGridlines(): void {
    const { gfx, cell, boardX, boardY } = this;
    const style = { color: GRID_COLOR, alpha: GRID_ALPHA };
    for (let x = 0; x <= COLS; x++) {
      gfx.rect(boardX + x * cell - 1, boardY, 2, ROWS * cell).fill(style);
    }
    for (let y = 0; y <= ROWS; y++) {
      gfx.rect(boardX, boardY + y * cell - 1, COLS * cell, 2).fill(style);
    }
  }

  private renderPreview(view: GameView): void {
    const { gfx } = this;

    gfx
      .rect(
        PREVIEW_X - PANEL_BORDER,
        PREVIEW_Y - PANEL_BORDER,
        PREVIEW_WIDTH + PANEL_BORDER * 2,
        PREVIEW_HEIGHT + PANEL_BORDER * 2,
      )
      .fill(BORDER_COLOR);
    gfx
      .rect(PREVIEW_X, PREVIEW_Y, PREVIEW_WIDTH, PREVIEW_HEIGHT)
      .fill(PANEL_FILL);
    gfx
      .rect(PREVIEW_X, PREVIEW_Y, PREVIEW_WIDTH, PREVIEW_LABEL_HEIGHT)
      .fill(LABEL_FILL);

    const { shape, kind } = view.next;
    const bounds = getShapeBounds(shape);
    const dx = (PREVIEW_COLS - bounds.width) / 2 - bounds.minX;
    const dy = (PREVIEW_ROWS - bounds.height) / 2 - bounds.minY;
    for (let i = 0; i < shape.length; i++) {
      for (let j = 0; j < shape[i].length; j++) {
        if (shape[i][j] !== 1) continue;
        this.drawBlock(
          PREVIEW_X,
          PREVIEW_Y + PREVIEW_LABEL_HEIGHT,
          j + dx,
          i + dy,
          PIECE_COLORS[kind],
        );
      }
    }
  }

  /** Boundary lines of the left/right pointer zones across the board. */
  private renderZones(pointerX: number | null): void {
    const { gfx, cell, boardX, boardY } = this;
    const width = COLS * cell;
    const height = ROWS * cell;
    gfx
      .rect(boardX + LEFT_ZONE * width - 1, boardY, 2, height)
      .fill({ color: LEFT_ZONE_COLOR, alpha: ZONE_ALPHA });
    gfx
      .rect(boardX + RIGHT_ZONE * width - 1, boardY, 2, height)
      .fill({ color: RIGHT_ZONE_COLOR, alpha: ZONE_ALPHA });
    if (pointerX === null) return;
    const px = boardX + Math.min(1, Math.max(0, pointerX)) * width;
    gfx.circle(px, boardY + height + cell / 2, cell / 4).fill(POINTER_COLOR);
  }

  private drawBlock(
    originX: number,
    originY: number,
    x: number,
    y: number,
    color: number,
  ): void {
    const { gfx, cell } = this;
    const px = originX + x * cell;
    const py = originY + y * cell;
    const inner = highlightRect(px, py, cell);
    gfx.rect(px, py, cell, cell).fill(color);
    gfx
      .rect(inner.x, inner.y, inner.size, inner.size)
      .fill(highlightOf(color));
    gfx
      .rect(px + 2, py + 2, cell - 4, cell / 2 - 2)
      .fill({ color: 0xffffff, alpha: GLOSS_ALPHA });
    gfx.rect(px, py, cell, cell).stroke({ color: OUTLINE_COLOR, width: 2 });
  }
}

/** Highlighted square inside a block, leaving a rim of the base color. */
export function highlightRect(
  px: number,
  py: number,
  cell: number,
): { x: number; y: number; size: number } {
  const inset = Math.round(cell * BLOCK_INSET);
  return { x: px + inset, y: py + inset, size: cell - inset * 2 };
}

function visible(cells: readonly Vec2[]): Vec2[] {
  return cells.filter(([, y]) => y >= 0);
}

function getShapeBounds(shape: Shape): {
  minX: number;
  minY: number;
  width: number;
  height: number;
} {
  let minX = Infinity;
  let maxX = -Infinity;
  let minY = Infinity;
  let maxY = -Infinity;
  for (let y = 0; y < shape.length; y++) {
    for (let x = 0; x < shape[y].length; x++) {
      if (shape[y][x] !== 1) continue;
      minX = Math.min(minX, x);
      maxX = Math.max(maxX, x);
      minY = Math.min(minY, y);
      maxY = Math.max(maxY, y);
    }
  }
  return { minX, minY, width: maxX - minX + 1, height: maxY - minY + 1 };
}
