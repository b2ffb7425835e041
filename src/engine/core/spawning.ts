import { type ActivePiece, type PieceId, createGridCoord } from "./types";

/**
 * Spawn anchor column: one left of centre, so the 3-wide kinds sit centred
 * on a 10-wide board.
 */
export function spawnColumn(boardWidth: number): number {
  return Math.floor(boardWidth / 2) - 1;
}

/**
 * Create a new active piece at spawn position (top row, rotation "spawn")
 */
export function createActivePiece(
  pieceId: PieceId,
  boardWidth: number,
): ActivePiece {
  return {
    id: pieceId,
    rot: "spawn",
    x: createGridCoord(spawnColumn(boardWidth)),
    y: createGridCoord(0),
  };
}

/**
 * Create a piece anchored at an arbitrary position, rotation "spawn"
 */
export function createPieceAt(pieceId: PieceId, x: number, y: number): ActivePiece {
  return {
    id: pieceId,
    rot: "spawn",
    x: createGridCoord(x),
    y: createGridCoord(y),
  };
}
