// Conventional board dimensions; both are configurable per engine
export const DEFAULT_BOARD_WIDTH = 10 as const;
export const DEFAULT_BOARD_HEIGHT = 20 as const; // rows 0..19, row 0 on top

// Grid coordinates - for board positions (must be integers, may be negative)
declare const GridCoordBrand: unique symbol;
export type GridCoord = number & { readonly [GridCoordBrand]: true };
export const gridCoordAsNumber = (g: GridCoord): number => g as number;

// Cell values - 0=empty, 1-7=tetrominos
declare const CellValueBrand: unique symbol;
export type CellValue = (0 | 1 | 2 | 3 | 4 | 5 | 6 | 7) & {
  readonly [CellValueBrand]: true;
};

// GridCoord constructors and guards
export function createGridCoord(value: number): GridCoord {
  if (!Number.isInteger(value)) {
    throw new Error("GridCoord must be an integer");
  }
  return value as GridCoord;
}

export function isGridCoord(n: unknown): n is GridCoord {
  return typeof n === "number" && Number.isInteger(n);
}

// CellValue constructors and guards
export function createCellValue(value: number): CellValue {
  if (!Number.isInteger(value) || value < 0 || value > 7) {
    throw new Error("CellValue must be an integer from 0 to 7");
  }
  return value as CellValue;
}

export function isCellValue(n: unknown): n is CellValue {
  return typeof n === "number" && Number.isInteger(n) && n >= 0 && n <= 7;
}

// Row-major storage, width * height entries
declare const BoardCellsBrand: unique symbol;
export type BoardCells = Uint8Array & { readonly [BoardCellsBrand]: true };

export function createBoardCells(width: number, height: number): BoardCells {
  return new Uint8Array(width * height) as BoardCells;
}

export type Board = {
  readonly width: number;
  readonly height: number;
  readonly cells: BoardCells; // values 0..7 (0=empty, 1-7=tetrominos)
};

// Index of (x, y) in row-major storage. Callers must have bounds-checked.
export function idx(board: Board, x: GridCoord, y: GridCoord): number {
  return gridCoordAsNumber(y) * board.width + gridCoordAsNumber(x);
}

export function isInBounds(board: Board, x: GridCoord, y: GridCoord): boolean {
  const xNum = gridCoordAsNumber(x);
  const yNum = gridCoordAsNumber(y);
  return xNum >= 0 && xNum < board.width && yNum >= 0 && yNum < board.height;
}

// Safe indexer with bounds checking
export function idxSafe(board: Board, x: GridCoord, y: GridCoord): number {
  if (!isInBounds(board, x, y)) {
    throw new Error("idxSafe: out-of-bounds");
  }
  return idx(board, x, y);
}

// Out of bounds on any side counts as blocked; there is no hidden zone above row 0
export function isCellBlocked(
  board: Board,
  x: GridCoord,
  y: GridCoord,
): boolean {
  if (!isInBounds(board, x, y)) return true;
  return board.cells[idx(board, x, y)] !== 0;
}

// Pieces and rotation
export const PIECE_IDS = ["I", "O", "T", "S", "Z", "J", "L"] as const;
export type PieceId = (typeof PIECE_IDS)[number];

// Clockwise order: spawn → right → two → left → spawn
export const ROTATIONS = ["spawn", "right", "two", "left"] as const;
export type Rot = (typeof ROTATIONS)[number];

export type Offset = readonly [number, number];

export type TetrominoShape = {
  id: PieceId;
  cells: Record<Rot, ReadonlyArray<Offset>>;
};

export type ActivePiece = {
  readonly id: PieceId;
  readonly rot: Rot;
  readonly x: GridCoord;
  readonly y: GridCoord;
};

// A presentation-neutral cell: the originating kind, or null when empty
export type Cell = PieceId | null;
