export * from "./engine";
export {
  boardFromRows,
  boardRows,
  canPlacePiece,
  cellAt,
  clearLines,
  cloneBoard,
  createEmptyBoard,
  filledCountInRow,
  isRowComplete,
  lockPiece,
  pieceBlocks,
  totalFilledCells,
  withCell,
} from "./engine/core/board";
export { PIECES } from "./engine/core/pieces";
export { WALL_KICKS } from "./engine/core/kicks";
export { createActivePiece, createPieceAt } from "./engine/core/spawning";
export { EventLog } from "./engine/events";
export {
  LINE_CLEAR_POINTS,
  SCORE_DOUBLE,
  SCORE_SINGLE,
  SCORE_TETRIS,
  SCORE_TRIPLE,
} from "./engine/scoring/score";
export {
  HIGH_SCORE_FILE,
  createFileHighScoreStore,
  createMemoryHighScoreStore,
  parseHighScore,
  type HighScoreStore,
} from "./app/high-score";
