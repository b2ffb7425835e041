import { PIECE_IDS, type PieceId } from "../types";

import { type PieceRandomGenerator, drawPieces } from "./interface";

// Simple string hash (FNV-1a, 32-bit) for stable seeds
export function hashString(str: string): number {
  let h = 0x811c9dc5;
  for (let i = 0; i < str.length; i++) {
    h ^= str.charCodeAt(i);
    h = Math.imul(h, 0x01000193);
  }
  return h >>> 0; // unsigned 32-bit
}

// Linear congruential step over unsigned 32-bit state
function nextRandom(state: number): number {
  return (Math.imul(state, 1664525) + 1013904223) >>> 0;
}

/**
 * Uniform generator: every draw picks one of the seven kinds independently,
 * with no bag or history. Deterministic for a given seed.
 */
export class UniformRng implements PieceRandomGenerator {
  constructor(private readonly state: number) {}

  getNextPiece(): { piece: PieceId; newRng: PieceRandomGenerator } {
    const next = nextRandom(this.state);
    // Use high bits mapped to [0, 7) to reduce modulo bias
    const i = Math.floor((next / 4294967296) * PIECE_IDS.length);
    const piece = PIECE_IDS[i];
    if (piece === undefined) throw new Error("Random index out of bounds");
    return { newRng: new UniformRng(next), piece };
  }

  getNextPieces(count: number): {
    pieces: Array<PieceId>;
    newRng: PieceRandomGenerator;
  } {
    return drawPieces(this, count);
  }
}

/**
 * Create a uniform generator. Without a seed one is drawn from Math.random,
 * so separate games deal differently.
 */
export function createRandomRng(seed?: string): PieceRandomGenerator {
  const source = seed ?? Math.random().toString(36).slice(2);
  return new UniformRng(hashString(source));
}
