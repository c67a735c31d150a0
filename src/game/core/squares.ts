import { MAX_COORD, MIN_COORD, type Square } from '../types';

const FILE_LETTERS = 'abcdefgh';

export function isCoordinate(value: number): boolean {
  return Number.isInteger(value) && value >= MIN_COORD && value <= MAX_COORD;
}

export function isSquare(square: Square): boolean {
  return isCoordinate(square.file) && isCoordinate(square.rank);
}

/**
 * Algebraic notation for a square: {file: 5, rank: 4} -> "e4".
 * Returns null for coordinates off the board.
 */
export function formatSquare(square: Square): string | null {
  if (!isSquare(square)) {
    return null;
  }
  return `${FILE_LETTERS[square.file - 1]}${square.rank}`;
}

/**
 * Parse algebraic notation ("e4"). Returns null for anything that is not
 * exactly one file letter a-h followed by one rank digit 1-8.
 */
export function parseSquare(notation: string): Square | null {
  const match = /^([a-h])([1-8])$/.exec(notation);
  if (!match || match[1] === undefined || match[2] === undefined) {
    return null;
  }
  return {
    file: FILE_LETTERS.indexOf(match[1]) + 1,
    rank: Number(match[2])
  };
}

/**
 * Scan-order index: a1 = 0, a2 = 1 ... a8 = 7, b1 = 8 ... h8 = 63.
 */
export function squareIndex(square: Square): number {
  return (square.file - 1) * MAX_COORD + (square.rank - 1);
}
