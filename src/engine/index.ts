import { createMemoryHighScoreStore } from "../app/high-score";
import { debugLog } from "../utils/debug";

import { createEngineConfig } from "./config";
import {
  canPlacePiece,
  clearLines,
  cloneBoard,
  createEmptyBoard,
  lockPiece,
} from "./core/board";
import { createRandomRng } from "./core/rng/random";
import { createActivePiece } from "./core/spawning";
import { EventLog } from "./events";
import { tryRotateDirection, tryShift } from "./gameplay/movement";
import { LifecycleService } from "./lifecycle.machine";
import { applyLineClear } from "./scoring/score";
import { selectRenderBoard, selectRenderRows } from "./selectors/board-render";
import { tickDurationMs } from "./utils/tick";

import type { HighScoreStore } from "../app/high-score";
import type { EngineConfig } from "./config";
import type { PieceRandomGenerator } from "./core/rng/interface";
import type { ActivePiece, Board, Cell, PieceId } from "./core/types";
import type { DomainEvent } from "./events";
import type { LifecycleState } from "./lifecycle.machine";
import type { ScoreState } from "./scoring/score";

export type EngineOptions = {
  config?: Partial<EngineConfig>;
  rng?: PieceRandomGenerator;
  highScoreStore?: HighScoreStore;
};

type EngineState = {
  readonly board: Board;
  readonly piece: ActivePiece;
  readonly queue: ReadonlyArray<PieceId>;
  readonly rng: PieceRandomGenerator;
  readonly score: ScoreState;
  readonly highScore: number;
};

const INITIAL_SCORE: ScoreState = { level: 1, linesCleared: 0, score: 0 };

/**
 * Falling-block engine.
 *
 * Owns the board, the falling piece, the preview queue, scoring and the
 * lifecycle. Every call runs to completion synchronously; what happened is
 * recorded as DomainEvents for the caller to drain. Timing is external: the
 * driving loop decides when to call tick() and can ask tickDurationMs() how
 * long to wait.
 */
export class Engine {
  readonly cfg: EngineConfig;
  private state: EngineState;
  private readonly lifecycle = new LifecycleService();
  private readonly events = new EventLog();
  private readonly store: HighScoreStore;

  constructor(options: EngineOptions = {}) {
    this.cfg = createEngineConfig(options.config);
    this.store = options.highScoreStore ?? createMemoryHighScoreStore();

    const dealt = dealOpening(
      options.rng ?? createRandomRng(),
      this.cfg.previewCount,
    );
    this.state = {
      board: createEmptyBoard(this.cfg.width, this.cfg.height),
      highScore: loadHighScore(this.store),
      piece: createActivePiece(dealt.current, this.cfg.width),
      queue: dealt.queue,
      rng: dealt.rng,
      score: INITIAL_SCORE,
    };
  }

  /**
   * Start from a prepared board and falling piece. Board dimensions override
   * any width/height in the options.
   */
  static fromBoard(
    board: Board,
    piece: ActivePiece,
    options: EngineOptions = {},
  ): Engine {
    const engine = new Engine({
      ...options,
      config: { ...options.config, height: board.height, width: board.width },
    });
    engine.state = { ...engine.state, board: cloneBoard(board), piece };
    return engine;
  }

  /** A copy of the stored board; only lock and line clears change the real one */
  get board(): Board {
    return cloneBoard(this.state.board);
  }

  get piece(): ActivePiece {
    return this.state.piece;
  }

  get queue(): ReadonlyArray<PieceId> {
    return this.state.queue;
  }

  get score(): number {
    return this.state.score.score;
  }

  get linesCleared(): number {
    return this.state.score.linesCleared;
  }

  get level(): number {
    return this.state.score.level;
  }

  get highScore(): number {
    return this.state.highScore;
  }

  get status(): LifecycleState {
    return this.lifecycle.state;
  }

  isGameOver(): boolean {
    return this.lifecycle.state === "gameOver";
  }

  private get playing(): boolean {
    return this.lifecycle.state === "playing";
  }

  isValid(piece: ActivePiece): boolean {
    return canPlacePiece(this.state.board, piece);
  }

  move(dx: number, dy: number): boolean {
    if (!this.playing) return false;
    if (!Number.isInteger(dx) || !Number.isInteger(dy)) return false;

    const result = tryShift(this.state.board, this.state.piece, dx, dy);
    if (!result.moved) return false;

    this.state = { ...this.state, piece: result.piece };
    this.events.push({ kind: "PieceMoved" });
    return true;
  }

  rotate(clockwise: boolean): boolean {
    if (!this.playing) return false;

    const result = tryRotateDirection(
      this.state.board,
      this.state.piece,
      clockwise ? "CW" : "CCW",
    );
    if (!result.rotated) return false;

    if (result.kicked) {
      debugLog("rotation", "kicked", { x: result.piece.x, y: result.piece.y });
    }
    this.state = { ...this.state, piece: result.piece };
    this.events.push({ kind: "PieceRotated" });
    return true;
  }

  /** Write the falling piece into the board */
  lock(): void {
    this.state = {
      ...this.state,
      board: lockPiece(this.state.board, this.state.piece),
    };
    this.events.push({ kind: "PieceLocked" });
  }

  /** Remove complete rows, compacting the rest downward; returns the count */
  clearLines(): number {
    const result = clearLines(this.state.board);
    if (result.cleared > 0) {
      this.state = { ...this.state, board: result.board };
      this.events.push({ count: result.cleared, kind: "LinesCleared" });
    }
    return result.cleared;
  }

  addScore(lines: number): void {
    const { leveledUp, next } = applyLineClear(
      this.state.score,
      lines,
      this.cfg.linesPerLevel,
    );
    this.state = { ...this.state, score: next };
    if (leveledUp) {
      this.events.push({ kind: "LevelUp", level: next.level });
    }
  }

  /**
   * Activate the front of the preview queue and refill it with one draw.
   * A piece that does not fit ends the game.
   */
  spawn(): void {
    if (!this.playing) return;

    const [next, ...rest] = this.state.queue;
    if (next === undefined) {
      throw new Error("Preview queue is empty");
    }
    const drawn = this.state.rng.getNextPiece();
    const piece = createActivePiece(next, this.cfg.width);
    this.state = {
      ...this.state,
      piece,
      queue: [...rest, drawn.piece],
      rng: drawn.newRng,
    };

    if (!this.isValid(piece)) {
      this.topOut();
    }
  }

  softDrop(): void {
    if (!this.playing) return;
    if (!this.move(0, 1)) {
      this.lockAndSpawn();
    }
  }

  hardDrop(): void {
    if (!this.playing) return;

    const mark = this.events.mark();
    while (this.move(0, 1)) {
      // keep falling
    }
    this.events.discardSince(mark, "PieceMoved");
    this.lockAndSpawn();
  }

  /** One gravity step; the caller's timer decides when */
  tick(): void {
    if (!this.playing) return;
    this.softDrop();
  }

  tickDurationMs(): number {
    return tickDurationMs(this.state.score.level, this.cfg);
  }

  togglePause(): void {
    const from = this.lifecycle.state;
    if (!this.lifecycle.send({ type: "TOGGLE_PAUSE" })) return;
    this.events.push({ kind: from === "playing" ? "Paused" : "Unpaused" });
  }

  /** New game with the same generator lineage; allowed from any state */
  restart(): void {
    this.lifecycle.send({ type: "RESTART" });
    this.events.clear();

    const dealt = dealOpening(this.state.rng, this.cfg.previewCount);
    this.state = {
      ...this.state,
      board: createEmptyBoard(this.cfg.width, this.cfg.height),
      piece: createActivePiece(dealt.current, this.cfg.width),
      queue: dealt.queue,
      rng: dealt.rng,
      score: INITIAL_SCORE,
    };
    this.events.push({ kind: "GameRestarted" });
  }

  renderView(): Board {
    return selectRenderBoard(this.state.board, this.state.piece);
  }

  renderRows(): Array<Array<Cell>> {
    return selectRenderRows(this.state.board, this.state.piece);
  }

  drainEvents(): Array<DomainEvent> {
    return this.events.drain();
  }

  private lockAndSpawn(): void {
    this.lock();
    const lines = this.clearLines();
    if (lines > 0) {
      this.addScore(lines);
    }
    this.spawn();
  }

  private topOut(): void {
    this.lifecycle.send({ type: "TOP_OUT" });
    this.events.push({ kind: "GameOver" });
    debugLog("lifecycle", "game over", { score: this.state.score.score });

    if (this.state.score.score > this.state.highScore) {
      this.state = { ...this.state, highScore: this.state.score.score };
      try {
        this.store.save(this.state.highScore);
      } catch (err) {
        debugLog("highscore", "save failed", err);
      }
    }
  }
}

function loadHighScore(store: HighScoreStore): number {
  try {
    return store.load();
  } catch (err) {
    debugLog("highscore", "load failed", err);
    return 0;
  }
}

// Fill the preview queue first, then draw the piece that starts falling
function dealOpening(
  rng: PieceRandomGenerator,
  previewCount: number,
): { queue: Array<PieceId>; current: PieceId; rng: PieceRandomGenerator } {
  const queued = rng.getNextPieces(previewCount);
  const current = queued.newRng.getNextPiece();
  return { current: current.piece, queue: queued.pieces, rng: current.newRng };
}

export { createEngineConfig, DEFAULT_ENGINE_CONFIG } from "./config";
export type { EngineConfig } from "./config";
export type { DomainEvent, DomainEventKind } from "./events";
export type { LifecycleState } from "./lifecycle.machine";
export type { PieceRandomGenerator } from "./core/rng/interface";
export { SequenceRng } from "./core/rng/sequence";
export { createRandomRng, UniformRng } from "./core/rng/random";
export * from "./core/types";
