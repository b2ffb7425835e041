import { type PieceId } from "../types";

/**
 * Source of upcoming pieces.
 *
 * Generators are immutable: every draw hands back the piece together with the
 * advanced generator, and the caller keeps the new one. An engine therefore
 * follows a single generator lineage for its whole lifetime, restarts
 * included, and tests can replay a lineage from any earlier value.
 */
export type PieceRandomGenerator = {
  /**
   * Get the next piece from this generator
   */
  getNextPiece(): {
    piece: PieceId;
    newRng: PieceRandomGenerator;
  };

  /**
   * Get multiple pieces at once (for preview queue refills)
   */
  getNextPieces(count: number): {
    pieces: Array<PieceId>;
    newRng: PieceRandomGenerator;
  };
};

// Shared fold for generators that only know how to draw one piece
export function drawPieces(
  rng: PieceRandomGenerator,
  count: number,
): { pieces: Array<PieceId>; newRng: PieceRandomGenerator } {
  const pieces: Array<PieceId> = [];
  let current = rng;
  for (let i = 0; i < count; i++) {
    const result = current.getNextPiece();
    pieces.push(result.piece);
    current = result.newRng;
  }
  return { newRng: current, pieces };
}
