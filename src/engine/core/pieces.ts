import { type PieceId, type TetrominoShape } from "./types";

// Literal tables per rotation state. Some kinds only have two distinct
// layouts, and the kick outcomes depend on these exact offsets, so nothing
// here is derived by rotating another state.
export const PIECES: Record<PieceId, TetrominoShape> = {
  I: {
    cells: {
      left: [
        [0, 0],
        [0, 1],
        [0, 2],
        [0, 3],
      ],
      right: [
        [0, 0],
        [0, 1],
        [0, 2],
        [0, 3],
      ],
      spawn: [
        [0, 0],
        [1, 0],
        [2, 0],
        [3, 0],
      ],
      two: [
        [0, 0],
        [1, 0],
        [2, 0],
        [3, 0],
      ],
    },
    id: "I",
  },
  J: {
    cells: {
      left: [
        [1, 0],
        [1, 1],
        [0, 2],
        [1, 2],
      ],
      right: [
        [0, 0],
        [1, 0],
        [0, 1],
        [0, 2],
      ],
      spawn: [
        [0, 0],
        [0, 1],
        [1, 1],
        [2, 1],
      ],
      two: [
        [0, 0],
        [1, 0],
        [2, 0],
        [2, 1],
      ],
    },
    id: "J",
  },
  L: {
    cells: {
      left: [
        [0, 0],
        [1, 0],
        [1, 1],
        [1, 2],
      ],
      right: [
        [0, 0],
        [0, 1],
        [0, 2],
        [1, 2],
      ],
      spawn: [
        [2, 0],
        [0, 1],
        [1, 1],
        [2, 1],
      ],
      two: [
        [0, 0],
        [1, 0],
        [2, 0],
        [0, 1],
      ],
    },
    id: "L",
  },
  O: {
    cells: {
      left: [
        [0, 0],
        [1, 0],
        [0, 1],
        [1, 1],
      ],
      right: [
        [0, 0],
        [1, 0],
        [0, 1],
        [1, 1],
      ],
      spawn: [
        [0, 0],
        [1, 0],
        [0, 1],
        [1, 1],
      ],
      two: [
        [0, 0],
        [1, 0],
        [0, 1],
        [1, 1],
      ],
    },
    id: "O",
  },
  S: {
    cells: {
      left: [
        [0, 0],
        [0, 1],
        [1, 1],
        [1, 2],
      ],
      right: [
        [0, 0],
        [0, 1],
        [1, 1],
        [1, 2],
      ],
      spawn: [
        [1, 0],
        [2, 0],
        [0, 1],
        [1, 1],
      ],
      two: [
        [1, 0],
        [2, 0],
        [0, 1],
        [1, 1],
      ],
    },
    id: "S",
  },
  T: {
    cells: {
      left: [
        [1, 0],
        [0, 1],
        [1, 1],
        [1, 2],
      ],
      right: [
        [0, 0],
        [0, 1],
        [1, 1],
        [0, 2],
      ],
      spawn: [
        [1, 0],
        [0, 1],
        [1, 1],
        [2, 1],
      ],
      two: [
        [0, 0],
        [1, 0],
        [2, 0],
        [1, 1],
      ],
    },
    id: "T",
  },
  Z: {
    cells: {
      left: [
        [1, 0],
        [0, 1],
        [1, 1],
        [0, 2],
      ],
      right: [
        [1, 0],
        [0, 1],
        [1, 1],
        [0, 2],
      ],
      spawn: [
        [0, 0],
        [1, 0],
        [1, 1],
        [2, 1],
      ],
      two: [
        [0, 0],
        [1, 0],
        [1, 1],
        [2, 1],
      ],
    },
    id: "Z",
  },
};
