import { type PieceId } from "../types";

import { type PieceRandomGenerator, drawPieces } from "./interface";

/**
 * Generator that cycles through a caller-supplied list, wrapping at its end.
 * Meant for reproducible scenarios: the same list always deals the same game.
 */
export class SequenceRng implements PieceRandomGenerator {
  private readonly sequence: ReadonlyArray<PieceId>;

  constructor(
    sequence: ReadonlyArray<PieceId>,
    private readonly index = 0,
  ) {
    if (sequence.length === 0) throw new Error("Sequence must not be empty");
    this.sequence = [...sequence];
  }

  /** Position of the next draw within the list */
  get cursor(): number {
    return this.index % this.sequence.length;
  }

  getNextPiece(): { piece: PieceId; newRng: PieceRandomGenerator } {
    const piece = this.sequence[this.cursor];
    if (piece === undefined) throw new Error("Sequence index out of bounds");
    return {
      newRng: new SequenceRng(this.sequence, this.cursor + 1),
      piece,
    };
  }

  getNextPieces(count: number): {
    pieces: Array<PieceId>;
    newRng: PieceRandomGenerator;
  } {
    return drawPieces(this, count);
  }
}
