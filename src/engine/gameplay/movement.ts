import { tryMove } from "../core/board";
import { getNextRotation, tryRotateWithKickInfo } from "../core/kicks";
import { type ActivePiece, type Board } from "../core/types";

type MoveResult = {
  piece: ActivePiece;
  moved: boolean;
};

type RotateResult = {
  piece: ActivePiece;
  rotated: boolean;
  kicked: boolean;
};

export function tryShift(
  board: Board,
  piece: ActivePiece,
  dx: number,
  dy: number,
): MoveResult {
  const movedPiece = tryMove(board, piece, dx, dy);
  if (!movedPiece) {
    return { moved: false, piece };
  }
  return { moved: true, piece: movedPiece };
}

export function tryRotateDirection(
  board: Board,
  piece: ActivePiece,
  direction: "CW" | "CCW",
): RotateResult {
  const targetRot = getNextRotation(piece.rot, direction);
  const result = tryRotateWithKickInfo(piece, targetRot, board);

  if (result.piece === null) {
    return { kicked: false, piece, rotated: false };
  }

  return { kicked: result.kickIndex > 0, piece: result.piece, rotated: true };
}
