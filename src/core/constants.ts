export const COLS = 10;
export const ROWS = 20;

// Layout
export const OUTER_MARGIN = 40;
export const BOARD_CELL_PX = 28;
export const PANEL_GAP = 16;

export const PREVIEW_COLS = 5;
export const PREVIEW_ROWS = 4;
export const PREVIEW_LABEL_HEIGHT = BOARD_CELL_PX;

export const BOARD_WIDTH = COLS * BOARD_CELL_PX;
export const BOARD_HEIGHT = ROWS * BOARD_CELL_PX;

export const BOARD_X = OUTER_MARGIN;
export const BOARD_Y = OUTER_MARGIN;

export const PREVIEW_X = BOARD_X + BOARD_WIDTH + PANEL_GAP;
export const PREVIEW_Y = BOARD_Y;
export const PREVIEW_WIDTH = PREVIEW_COLS * BOARD_CELL_PX;
export const PREVIEW_HEIGHT =
  PREVIEW_LABEL_HEIGHT + PREVIEW_ROWS * BOARD_CELL_PX;

export const PLAY_WIDTH = PREVIEW_X + PREVIEW_WIDTH + OUTER_MARGIN;
export const PLAY_HEIGHT = OUTER_MARGIN + BOARD_HEIGHT + OUTER_MARGIN;

// Timing
export const DEFAULT_TICK_MS = 500;
export const DEFAULT_DROP_COOLDOWN_MS = 5000;
export const DEFAULT_MOVE_DELAY_MS = 150;
export const DEFAULT_ROTATE_COOLDOWN_MS = 800;
export const DEFAULT_HARD_DROP_COOLDOWN_MS = 1500;
export const DEFAULT_GESTURE_DEBOUNCE_MS = 1000;

// Pointer zones, as fractions of the normalized 0..1 range.
export const LEFT_ZONE = 0.4;
export const RIGHT_ZONE = 0.6;

export const LINE_SCORES: Readonly<Record<number, number>> = {
  1: 100,
  2: 300,
  3: 500,
  4: 800,
};

export const SETTINGS_STORAGE_KEY = 'gesturetris.settings';
export const HIGH_SCORE_STORAGE_KEY = 'gesturetris.highScore';
export const SNAPSHOT_STORAGE_KEY = 'gesturetris.snapshot';

export const SPAWN_Y = 0;
