import { type PieceRandomGenerator } from "@/engine/core/rng/interface";
import { SequenceRng } from "@/engine/core/rng/sequence";
import { type PieceId } from "@/engine/core/types";

describe("@/engine/core/rng/sequence — cycling list", () => {
  test("deals the list in order and wraps at its end", () => {
    let rng: PieceRandomGenerator = new SequenceRng(["I", "O", "T"]);
    const dealt: Array<PieceId> = [];
    for (let i = 0; i < 7; i++) {
      const result = rng.getNextPiece();
      dealt.push(result.piece);
      expect(result.newRng).toBeInstanceOf(SequenceRng);
      rng = result.newRng;
    }

    expect(dealt).toEqual(["I", "O", "T", "I", "O", "T", "I"]);
  });

  test("drawing does not change the generator it was called on", () => {
    const rng = new SequenceRng(["S", "Z"]);
    rng.getNextPiece();
    rng.getNextPiece();

    expect(rng.cursor).toBe(0);
    expect(rng.getNextPiece().piece).toBe("S");
  });

  test("getNextPieces(k) continues from the current position", () => {
    const first = new SequenceRng(["J", "L", "T"]).getNextPiece();
    const batch = first.newRng.getNextPieces(4);

    expect(first.piece).toBe("J");
    expect(batch.pieces).toEqual(["L", "T", "J", "L"]);
    expect(batch.newRng.getNextPiece().piece).toBe("T");
  });

  test("getNextPieces(0) returns nothing and an equivalent generator", () => {
    const rng = new SequenceRng(["O"]);
    const result = rng.getNextPieces(0);

    expect(result.pieces).toEqual([]);
    expect(result.newRng).toBe(rng);
  });

  test("a starting index positions the cursor modulo the list length", () => {
    const rng = new SequenceRng(["I", "O", "T"], 5);
    expect(rng.cursor).toBe(2);
    expect(rng.getNextPiece().piece).toBe("T");
  });

  test("the caller's array is copied", () => {
    const source: Array<PieceId> = ["I", "O"];
    const rng = new SequenceRng(source);
    source[0] = "Z";

    expect(rng.getNextPiece().piece).toBe("I");
  });

  test("rejects an empty list", () => {
    expect(() => new SequenceRng([])).toThrow("Sequence must not be empty");
  });
});
