/**
 * @fileoverview Shared test helper functions for engine tests
 */

import { createMemoryHighScoreStore } from "@/app/high-score";
import { withCell } from "@/engine/core/board";
import { SequenceRng } from "@/engine/core/rng/sequence";
import {
  type ActivePiece,
  type Board,
  type PieceId,
  type Rot,
  createGridCoord,
} from "@/engine/core/types";
import { type DomainEvent } from "@/engine/events";
import { Engine, type EngineOptions } from "@/engine";

/**
 * Creates an ActivePiece at the specified position with proper branded types.
 */
export function createTestPiece(
  id: PieceId = "T",
  x = 4,
  y = 0,
  rot: Rot = "spawn",
): ActivePiece {
  return {
    id,
    rot,
    x: createGridCoord(x),
    y: createGridCoord(y),
  };
}

/**
 * Fill every cell of row y, optionally leaving some columns empty.
 */
export function fillBoardRow(
  board: Board,
  y: number,
  gaps: ReadonlyArray<number> = [],
  kind: PieceId = "I",
): Board {
  let next = board;
  for (let x = 0; x < board.width; x++) {
    if (!gaps.includes(x)) next = withCell(next, x, y, kind);
  }
  return next;
}

export function setBoardCells(
  board: Board,
  cells: ReadonlyArray<{ x: number; y: number; kind?: PieceId }>,
): Board {
  return cells.reduce(
    (acc, { kind, x, y }) => withCell(acc, x, y, kind ?? "I"),
    board,
  );
}

/**
 * Engine around a prepared board, dealing from a fixed sequence, with an
 * in-memory high score store.
 */
export function createScenarioEngine(
  board: Board,
  piece: ActivePiece,
  sequence: ReadonlyArray<PieceId> = ["O"],
  options: EngineOptions = {},
): Engine {
  return Engine.fromBoard(board, piece, {
    highScoreStore: createMemoryHighScoreStore(),
    rng: new SequenceRng(sequence),
    ...options,
  });
}

/**
 * Fresh game on an empty default board dealing from a fixed sequence.
 */
export function createSequenceEngine(
  sequence: ReadonlyArray<PieceId>,
  options: EngineOptions = {},
): Engine {
  return new Engine({
    highScoreStore: createMemoryHighScoreStore(),
    rng: new SequenceRng(sequence),
    ...options,
  });
}

export function findEvents<K extends DomainEvent["kind"]>(
  events: ReadonlyArray<DomainEvent>,
  kind: K,
): Array<Extract<DomainEvent, { kind: K }>> {
  return events.filter(
    (e): e is Extract<DomainEvent, { kind: K }> => e.kind === kind,
  );
}
