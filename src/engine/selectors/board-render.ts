import { boardRows, lockPiece } from "../core/board";

import type { ActivePiece, Board, Cell } from "../core/types";

/**
 * The board as a renderer should draw it: stored cells with the falling
 * piece's in-bounds blocks written on top as its kind.
 *
 * Pure. Safe in any lifecycle state, including gameOver where the piece may
 * overlap stored cells.
 */
export function selectRenderBoard(board: Board, piece: ActivePiece): Board {
  return lockPiece(board, piece);
}

/**
 * Same projection as rows of cells, row 0 on top.
 */
export function selectRenderRows(
  board: Board,
  piece: ActivePiece,
): Array<Array<Cell>> {
  return boardRows(selectRenderBoard(board, piece));
}
