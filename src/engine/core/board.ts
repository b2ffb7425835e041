import { PIECES } from "./pieces";
import {
  type ActivePiece,
  type Board,
  type BoardCells,
  type Cell,
  type CellValue,
  type GridCoord,
  type PieceId,
  DEFAULT_BOARD_HEIGHT,
  DEFAULT_BOARD_WIDTH,
  createBoardCells,
  createCellValue,
  createGridCoord,
  gridCoordAsNumber,
  idx,
  idxSafe,
  isCellBlocked,
  isInBounds,
} from "./types";

export function createEmptyBoard(
  width: number = DEFAULT_BOARD_WIDTH,
  height: number = DEFAULT_BOARD_HEIGHT,
): Board {
  return {
    cells: createBoardCells(width, height),
    height,
    width,
  };
}

// Absolute block positions of a piece: anchor + offsets of its rotation state
export function pieceBlocks(
  piece: ActivePiece,
): ReadonlyArray<readonly [GridCoord, GridCoord]> {
  const px = gridCoordAsNumber(piece.x);
  const py = gridCoordAsNumber(piece.y);
  return PIECES[piece.id].cells[piece.rot].map(
    ([dx, dy]) => [createGridCoord(px + dx), createGridCoord(py + dy)] as const,
  );
}

// Check if a piece can be placed at a given position
export function canPlacePiece(board: Board, piece: ActivePiece): boolean {
  for (const [x, y] of pieceBlocks(piece)) {
    if (isCellBlocked(board, x, y)) {
      return false;
    }
  }

  return true;
}

export function translatePiece(
  piece: ActivePiece,
  dx: number,
  dy: number,
): ActivePiece {
  return {
    ...piece,
    x: createGridCoord(gridCoordAsNumber(piece.x) + dx),
    y: createGridCoord(gridCoordAsNumber(piece.y) + dy),
  };
}

// Return a new position if valid; otherwise null. Keeps callers pure and branchy.
export function tryMove(
  board: Board,
  piece: ActivePiece,
  dx: number,
  dy: number,
): ActivePiece | null {
  const moved = translatePiece(piece, dx, dy);
  return canPlacePiece(board, moved) ? moved : null;
}

// Convert piece ID to cell value
const PIECE_VALUES: Readonly<Record<PieceId, CellValue>> = {
  I: createCellValue(1),
  J: createCellValue(6),
  L: createCellValue(7),
  O: createCellValue(2),
  S: createCellValue(4),
  T: createCellValue(3),
  Z: createCellValue(5),
};

const VALUE_PIECES: ReadonlyArray<Cell> = [
  null,
  "I",
  "O",
  "T",
  "S",
  "Z",
  "J",
  "L",
];

export function getPieceValue(pieceId: PieceId): CellValue {
  return PIECE_VALUES[pieceId];
}

function cellFromValue(value: number): Cell {
  return VALUE_PIECES[value] ?? null;
}

function copyCells(board: Board): BoardCells {
  const newCells = createBoardCells(board.width, board.height);
  newCells.set(board.cells);
  return newCells;
}

// Independent copy; writes to its cells never reach the source board
export function cloneBoard(board: Board): Board {
  return { ...board, cells: copyCells(board) };
}

// Bounds-checked read; throws when (x, y) lies outside the board
export function cellAt(board: Board, x: number, y: number): Cell {
  const index = idxSafe(board, createGridCoord(x), createGridCoord(y));
  return cellFromValue(board.cells[index] ?? 0);
}

// Pure write of a single cell, mostly for building scenarios
export function withCell(
  board: Board,
  x: number,
  y: number,
  cell: Cell,
): Board {
  const newCells = copyCells(board);
  const index = idxSafe(board, createGridCoord(x), createGridCoord(y));
  newCells[index] = cell === null ? 0 : getPieceValue(cell);
  return { ...board, cells: newCells };
}

// Write the piece's blocks into the board. Blocks outside the board are skipped.
export function lockPiece(board: Board, piece: ActivePiece): Board {
  const newCells = copyCells(board);
  const value = getPieceValue(piece.id);

  for (const [x, y] of pieceBlocks(piece)) {
    if (!isInBounds(board, x, y)) continue;
    newCells[idx(board, x, y)] = value;
  }

  return { ...board, cells: newCells };
}

export function isRowComplete(board: Board, y: number): boolean {
  return filledCountInRow(board, y) === board.width;
}

export function filledCountInRow(board: Board, y: number): number {
  let filled = 0;
  for (let x = 0; x < board.width; x++) {
    if (cellAt(board, x, y) !== null) filled++;
  }
  return filled;
}

export function totalFilledCells(board: Board): number {
  let filled = 0;
  for (const value of board.cells) {
    if (value !== 0) filled++;
  }
  return filled;
}

/**
 * Remove every complete row and let the rows above fall.
 *
 * Scans top to bottom. A complete row is dropped and an empty row enters at
 * the top, after which the same index is examined again because a new row has
 * shifted into it. The end state equals collapsing all complete rows at once,
 * each remaining row moving down by the number of cleared rows beneath it.
 */
export function clearLines(board: Board): { board: Board; cleared: number } {
  const rows: Array<Uint8Array> = [];
  for (let y = 0; y < board.height; y++) {
    rows.push(board.cells.slice(y * board.width, (y + 1) * board.width));
  }

  let cleared = 0;
  let y = 0;
  while (y < rows.length) {
    const row = rows[y];
    if (row !== undefined && row.every((v) => v !== 0)) {
      rows.splice(y, 1);
      rows.unshift(new Uint8Array(board.width));
      cleared++;
    } else {
      y++;
    }
  }

  if (cleared === 0) return { board, cleared };

  const newCells = createBoardCells(board.width, board.height);
  rows.forEach((row, rowIndex) => newCells.set(row, rowIndex * board.width));
  return { board: { ...board, cells: newCells }, cleared };
}

// Rows of cells for renderers and tests; row 0 is the top
export function boardRows(board: Board): Array<Array<Cell>> {
  const rows: Array<Array<Cell>> = [];
  for (let y = 0; y < board.height; y++) {
    const row: Array<Cell> = [];
    for (let x = 0; x < board.width; x++) {
      row.push(cellFromValue(board.cells[y * board.width + x] ?? 0));
    }
    rows.push(row);
  }
  return rows;
}

// Build a board from rows of cells; every row must match the board width
export function boardFromRows(rows: ReadonlyArray<ReadonlyArray<Cell>>): Board {
  const height = rows.length;
  const width = rows[0]?.length ?? 0;
  if (height === 0 || width === 0) {
    throw new Error("boardFromRows: rows must not be empty");
  }

  const cells = createBoardCells(width, height);
  rows.forEach((row, y) => {
    if (row.length !== width) {
      throw new Error(
        `boardFromRows: row ${String(y)} has ${String(row.length)} cells, expected ${String(width)}`,
      );
    }
    row.forEach((cell, x) => {
      cells[y * width + x] = cell === null ? 0 : getPieceValue(cell);
    });
  });

  return { cells, height, width };
}
