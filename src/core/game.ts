import { LEFT_ZONE, RIGHT_ZONE } from './constants';
import {
  canMove,
  checkCompletedRows,
  findDropPosition,
  isCollision,
  lockPiece,
  makeBoard,
} from './board';
import type { GeneratorFactory, PieceGenerator } from './generator';
import {
  cellsOf,
  colorOf,
  createPiece,
  moveDown,
  moveLeft,
  moveRight,
  rotate as rotatePiece,
} from './piece';
import { RandomGenerator } from './randomGenerator';
import {
  GravityTimer,
  systemClock,
  type Clock,
  type Scheduler,
} from './runner';
import {
  DEFAULT_SETTINGS,
  mergeSettings,
  type TimingSettings,
} from './settings';
import { decodeBoard, encodeBoard, parseGameSnapshot } from './snapshot';
import { BASE_SHAPES } from './tetromino';
import type {
  ActivePiece,
  Board,
  Cell,
  GameSnapshot,
  GameView,
  PieceKind,
} from './types';

export type GameEvent =
  | { type: 'spawn'; kind: PieceKind }
  | { type: 'lock'; kind: PieceKind }
  | { type: 'rowsCleared'; rows: number[]; points: number }
  | { type: 'highScore'; value: number }
  | { type: 'gameOver'; score: number }
  | { type: 'state' };

export type GameListener = (event: GameEvent) => void;

export type GameLogger = Pick<Console, 'info' | 'warn'>;

export interface GameConfig {
  seed?: number;
  timing?: Partial<TimingSettings>;
  clock?: Clock;
  scheduler?: Scheduler;
  generatorFactory?: GeneratorFactory;
  logger?: GameLogger;
}

// Cooldown timestamps start here so the first action of each kind passes.
const NEVER = -Infinity;

/**
 * Owns the board, the falling piece and every timer gating gravity and
 * player actions. All mutation goes through the methods below, one call at
 * a time; rejected actions leave state untouched and return false.
 */
export class GameController {
  private board: Board = makeBoard();
  private current: ActivePiece | null = null;
  private next: PieceKind;

  private _score = 0;
  private _highScore = 0;
  private gameOver = false;
  private paused = false;

  private lastLockAt = NEVER;
  private lastHardDropAt = NEVER;
  private lastRotateAt = NEVER;
  private lastMoveAt = NEVER;
  private pointerX: number | null = null;

  private timing: TimingSettings;
  private readonly clock: Clock;
  private readonly generator: PieceGenerator;
  private readonly gravity: GravityTimer;
  private readonly log: GameLogger;
  private readonly listeners = new Set<GameListener>();

  constructor(cfg: GameConfig = {}) {
    this.timing = mergeSettings(DEFAULT_SETTINGS, {
      timing: cfg.timing,
    }).timing;
    this.clock = cfg.clock ?? systemClock;
    this.log = cfg.logger ?? console;

    const makeGenerator =
      cfg.generatorFactory ?? ((seed) => new RandomGenerator(seed));
    this.generator = makeGenerator(cfg.seed ?? Date.now());
    this.next = this.generator.next();

    this.gravity = new GravityTimer({
      periodMs: this.timing.tickMs,
      scheduler: cfg.scheduler,
      isRunning: () => !this.paused && !this.gameOver,
      onTick: () => this.tick(),
    });
  }

  get score(): number {
    return this._score;
  }

  get highScore(): number {
    return this._highScore;
  }

  get isGameOver(): boolean {
    return this.gameOver;
  }

  get isPaused(): boolean {
    return this.paused;
  }

  /** Whether the gravity clock currently has a tick chain. */
  get isRunning(): boolean {
    return this.gravity.running;
  }

  get currentPiece(): Readonly<ActivePiece> | null {
    return this.current;
  }

  get nextPiece(): PieceKind {
    return this.next;
  }

  get lastPointerX(): number | null {
    return this.pointerX;
  }

  getCell(x: number, y: number): Cell {
    return this.board[y]?.[x] ?? null;
  }

  /** Landing row of the current piece, for the ghost preview. */
  ghostY(): number | null {
    return this.current ? findDropPosition(this.board, this.current) : null;
  }

  subscribe(listener: GameListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  setTiming(patch: Partial<TimingSettings>): void {
    this.timing = mergeSettings(
      { ...DEFAULT_SETTINGS, timing: this.timing },
      { timing: patch },
    ).timing;
    this.gravity.setPeriod(this.timing.tickMs);
  }

  /** Only ever raises the high score. */
  setHighScore(value: number): void {
    if (Number.isFinite(value) && value > this._highScore) {
      this._highScore = Math.trunc(value);
      this.log.info(`[Game] High score set to ${this._highScore}`);
    }
  }

  start(): void {
    if (this.current === null) this.spawn();
    this.paused = false;
    this.gravity.start();
    this.log.info('[Game] Started');
    this.emit({ type: 'state' });
  }

  pause(): void {
    this.paused = true;
    this.gravity.stop();
    this.log.info('[Game] Paused');
    this.emit({ type: 'state' });
  }

  reset(seed?: number): void {
    this.gravity.stop();
    if (seed !== undefined) this.generator.reset(seed);

    this.board = makeBoard();
    this._score = 0;
    this.gameOver = false;
    this.paused = true;
    this.current = null;
    this.next = this.generator.next();
    this.resetCooldowns();

    this.log.info(`[Game] Reset, high score preserved: ${this._highScore}`);
    this.emit({ type: 'state' });
  }

  /** One gravity evaluation; the gravity clock calls this every period. */
  tick(): void {
    if (this.paused || this.gameOver) return;
    if (this.current === null) {
      this.spawn();
      return;
    }

    const now = this.clock.now();
    if (now - this.lastLockAt < this.timing.dropCooldownMs) return;

    if (canMove(this.board, this.current, 0, 1)) {
      moveDown(this.current);
    } else {
      this.lockAndSpawn(this.current, now);
    }
  }

  /**
   * Pointer-driven lateral move. `x` is the normalized horizontal position:
   * below LEFT_ZONE moves left, above RIGHT_ZONE moves right, anything in
   * between is a dead zone.
   */
  moveLateral(x: number, isPointing: boolean): boolean {
    this.pointerX = isPointing ? x : null;
    const piece = this.current;
    if (this.paused || this.gameOver || piece === null || !isPointing) {
      return false;
    }

    const now = this.clock.now();
    if (now - this.lastMoveAt < this.timing.moveDelayMs) return false;

    if (x < LEFT_ZONE) {
      if (!canMove(this.board, piece, -1, 0)) return false;
      moveLeft(piece);
    } else if (x > RIGHT_ZONE) {
      if (!canMove(this.board, piece, 1, 0)) return false;
      moveRight(piece);
    } else {
      return false;
    }
    this.lastMoveAt = now;
    return true;
  }

  /** Rotates clockwise without kicks; a colliding rotation is undone. */
  rotate(): boolean {
    const piece = this.current;
    if (this.paused || this.gameOver || piece === null) return false;

    const now = this.clock.now();
    if (now - this.lastRotateAt < this.timing.rotateCooldownMs) return false;

    const original = piece.r;
    rotatePiece(piece);
    if (isCollision(this.board, piece)) {
      piece.r = original;
      return false;
    }
    this.lastRotateAt = now;
    return true;
  }

  hardDrop(): boolean {
    const piece = this.current;
    if (this.paused || this.gameOver || piece === null) return false;

    const now = this.clock.now();
    if (now - this.lastHardDropAt < this.timing.hardDropCooldownMs) {
      return false;
    }

    piece.y = findDropPosition(this.board, piece);
    this.lockAndSpawn(piece, now);
    this.lastHardDropAt = now;
    return true;
  }

  save(): GameSnapshot {
    const piece = this.current;
    return {
      grid: encodeBoard(this.board),
      score: this._score,
      highScore: this._highScore,
      isGameOver: this.gameOver,
      isPaused: this.paused,
      current: piece && {
        type: piece.k,
        rotation: piece.r,
        x: piece.x,
        y: piece.y,
      },
      nextType: this.next,
    };
  }

  /**
   * Replaces the whole game state. The snapshot is validated first and a
   * `SnapshotError` leaves the current state untouched.
   */
  restore(snapshot: GameSnapshot): void {
    const s = parseGameSnapshot(snapshot);

    this.gravity.stop();
    this.board = decodeBoard(s.grid);
    this._score = s.score;
    this._highScore = s.highScore;
    this.gameOver = s.isGameOver;
    this.paused = s.isPaused;
    this.current = s.current && {
      k: s.current.type,
      r: s.current.rotation,
      x: s.current.x,
      y: s.current.y,
    };
    this.next = s.nextType;
    this.resetCooldowns();

    if (!this.paused && !this.gameOver) this.gravity.start();
    this.log.info(`[Game] Restored snapshot, score ${this._score}`);
    this.emit({ type: 'state' });
  }

  view(): GameView {
    const piece = this.current;
    let current: GameView['current'] = null;
    if (piece) {
      const ghostY = findDropPosition(this.board, piece);
      current = {
        kind: piece.k,
        color: colorOf(piece),
        cells: cellsOf(piece),
        ghostY,
        ghostCells: cellsOf(piece, piece.r, 0, ghostY - piece.y),
      };
    }
    return {
      board: this.board,
      current,
      next: { kind: this.next, shape: BASE_SHAPES[this.next] },
      score: this._score,
      highScore: this._highScore,
      isGameOver: this.gameOver,
      isPaused: this.paused,
      pointerX: this.pointerX,
    };
  }

  /** Stops the gravity clock for good; the controller is not reused. */
  dispose(): void {
    this.gravity.stop();
    this.listeners.clear();
  }

  private spawn(): void {
    this.current = createPiece(this.next);
    this.next = this.generator.next();
    this.pointerX = null;
    this.emit({ type: 'spawn', kind: this.current.k });
  }

  private lockAndSpawn(piece: ActivePiece, now: number): void {
    lockPiece(this.board, piece);
    this.lastLockAt = now;
    this.emit({ type: 'lock', kind: piece.k });

    const { rows, points } = checkCompletedRows(this.board);
    if (rows.length > 0) {
      this.log.info(`[Game] Cleared ${rows.length} row(s) for ${points}`);
      this.emit({ type: 'rowsCleared', rows, points });
      this.addScore(points);
    }

    this.spawn();
    if (this.current !== null && isCollision(this.board, this.current)) {
      this.gameOver = true;
      this.gravity.stop();
      this.log.info(`[Game] Game over, final score ${this._score}`);
      this.emit({ type: 'gameOver', score: this._score });
    }
  }

  private addScore(points: number): void {
    this._score += points;
    if (this._score > this._highScore) {
      this._highScore = this._score;
      this.log.info(`[Game] New high score: ${this._highScore}`);
      this.emit({ type: 'highScore', value: this._highScore });
    }
  }

  private resetCooldowns(): void {
    this.lastLockAt = NEVER;
    this.lastHardDropAt = NEVER;
    this.lastRotateAt = NEVER;
    this.lastMoveAt = NEVER;
    this.pointerX = null;
  }

  private emit(event: GameEvent): void {
    for (const listener of this.listeners) listener(event);
  }
}
