// Rotation with wall kicks
//
// One fixed kick list is shared by every kind and every transition. When the
// in-place rotation collides, the rotated piece is nudged by each offset in
// order and the first placement that fits wins. Offsets are in board
// coordinates, so (0, -1) moves the piece one row up.
//
// Rotation states: spawn (0°) → right (90°) → two (180°) → left (270°) → spawn

import { canPlacePiece, translatePiece } from "./board";
import {
  type ActivePiece,
  type Board,
  type Offset,
  type Rot,
  ROTATIONS,
} from "./types";

export const WALL_KICKS: ReadonlyArray<Offset> = [
  [1, 0],
  [-1, 0],
  [0, -1],
  [2, 0],
  [-2, 0],
];

// Get the next rotation state for a direction
export function getNextRotation(currentRot: Rot, direction: "CW" | "CCW"): Rot {
  const index = ROTATIONS.indexOf(currentRot);
  const step = direction === "CW" ? 1 : ROTATIONS.length - 1;
  return ROTATIONS[(index + step) % ROTATIONS.length] ?? currentRot;
}

/**
 * Result of attempting a rotation with kick information
 */
export type RotateResult = {
  piece: ActivePiece | null;
  kickIndex: number; // -1 if failed, 0 for in-place, 1+ for WALL_KICKS[kickIndex - 1]
};

/**
 * Rotate in place, falling back to WALL_KICKS in order, and report which
 * attempt succeeded
 */
export function tryRotateWithKickInfo(
  piece: ActivePiece,
  targetRot: Rot,
  board: Board,
): RotateResult {
  const rotated: ActivePiece = { ...piece, rot: targetRot };
  if (canPlacePiece(board, rotated)) {
    return { kickIndex: 0, piece: rotated };
  }

  for (let i = 0; i < WALL_KICKS.length; i++) {
    const kickOffset = WALL_KICKS[i];
    if (!kickOffset) continue;

    const kickedPiece = translatePiece(rotated, kickOffset[0], kickOffset[1]);
    if (canPlacePiece(board, kickedPiece)) {
      return { kickIndex: i + 1, piece: kickedPiece };
    }
  }

  return { kickIndex: -1, piece: null };
}
