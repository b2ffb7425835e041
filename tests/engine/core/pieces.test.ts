import { PIECES } from "@/engine/core/pieces";
import { PIECE_IDS, ROTATIONS } from "@/engine/core/types";

describe("@/engine/core/pieces — shape catalog", () => {
  test("every kind has four rotation states of four distinct cells", () => {
    for (const id of PIECE_IDS) {
      const shape = PIECES[id];
      expect(shape.id).toBe(id);
      for (const rot of ROTATIONS) {
        const cells = shape.cells[rot];
        expect(cells).toHaveLength(4);
        const unique = new Set(cells.map(([x, y]) => `${String(x)},${String(y)}`));
        expect(unique.size).toBe(4);
      }
    }
  });

  test("offsets are never negative", () => {
    for (const id of PIECE_IDS) {
      for (const rot of ROTATIONS) {
        for (const [dx, dy] of PIECES[id].cells[rot]) {
          expect(dx).toBeGreaterThanOrEqual(0);
          expect(dy).toBeGreaterThanOrEqual(0);
        }
      }
    }
  });

  test("I lies flat in spawn and stands upright when rotated right", () => {
    expect(PIECES.I.cells.spawn).toEqual([
      [0, 0],
      [1, 0],
      [2, 0],
      [3, 0],
    ]);
    expect(PIECES.I.cells.right).toEqual([
      [0, 0],
      [0, 1],
      [0, 2],
      [0, 3],
    ]);
  });

  test("O is the same square in every state", () => {
    for (const rot of ROTATIONS) {
      expect(PIECES.O.cells[rot]).toEqual(PIECES.O.cells.spawn);
    }
  });

  test("T spawns pointing up", () => {
    expect(PIECES.T.cells.spawn).toEqual([
      [1, 0],
      [0, 1],
      [1, 1],
      [2, 1],
    ]);
  });

  test("S and Z have two distinct layouts", () => {
    expect(PIECES.S.cells.two).toEqual(PIECES.S.cells.spawn);
    expect(PIECES.S.cells.left).toEqual(PIECES.S.cells.right);
    expect(PIECES.Z.cells.two).toEqual(PIECES.Z.cells.spawn);
    expect(PIECES.Z.cells.left).toEqual(PIECES.Z.cells.right);
  });
});
