import type { Color, Square } from './chessTypes';

export const FILES = ['a', 'b', 'c', 'd', 'e', 'f', 'g', 'h'] as const;
export const RANKS = [1, 2, 3, 4, 5, 6, 7, 8] as const;

export type FileIndex = 0 | 1 | 2 | 3 | 4 | 5 | 6 | 7;
export type RankIndex = 0 | 1 | 2 | 3 | 4 | 5 | 6 | 7;

export function isSquare(x: unknown): x is Square {
  return typeof x === 'number' && Number.isInteger(x) && x >= 0 && x < 64;
}

export function fileOf(square: Square): FileIndex {
  return (square % 8) as FileIndex;
}

export function rankOf(square: Square): RankIndex {
  return Math.floor(square / 8) as RankIndex;
}

export function makeSquare(file: number, rank: number): Square | null {
  if (!Number.isInteger(file) || !Number.isInteger(rank)) return null;
  if (file < 0 || file > 7 || rank < 0 || rank > 7) return null;
  return rank * 8 + file;
}

/**
 * Steps `df` files and `dr` ranks away from `square`.
 * Returns null when the step leaves the board.
 */
export function offsetSquare(square: Square, df: number, dr: number): Square | null {
  return makeSquare(fileOf(square) + df, rankOf(square) + dr);
}

/** Rank delta of a pawn step for `color`. */
export function pawnDirection(color: Color): 1 | -1 {
  return color === 'w' ? 1 : -1;
}

/** Back rank index for `color` (0 for white, 7 for black). */
export function homeRank(color: Color): RankIndex {
  return color === 'w' ? 0 : 7;
}

/** Rank a pawn of `color` promotes on. */
export function promotionRank(color: Color): RankIndex {
  return color === 'w' ? 7 : 0;
}

export function parseFile(ch: string): FileIndex | null {
  if (typeof ch !== 'string' || ch.length !== 1) return null;
  const f = FILES.findIndex((x) => x === ch.toLowerCase());
  return f < 0 ? null : (f as FileIndex);
}

/** Ranks are numbered 1..8; the result is the 0-based index. */
export function parseRank(n: number): RankIndex | null {
  if (!Number.isInteger(n) || n < 1 || n > 8) return null;
  return (n - 1) as RankIndex;
}

export function oppositeFile(file: FileIndex): FileIndex {
  return (7 - file) as FileIndex;
}

export function oppositeRank(rank: RankIndex): RankIndex {
  return (7 - rank) as RankIndex;
}

/** Inclusive, ordered run from `from` to `to`. Descends when `to < from`. */
function indexRange(from: FileIndex, to: FileIndex): FileIndex[] {
  const dir = to >= from ? 1 : -1;
  const out: FileIndex[] = [];
  for (let i: number = from; ; i += dir) {
    out.push(i as FileIndex);
    if (i === to) break;
  }
  return out;
}

export function fileRange(from: FileIndex, to: FileIndex): FileIndex[] {
  return indexRange(from, to);
}

export function rankRange(from: RankIndex, to: RankIndex): RankIndex[] {
  return indexRange(from, to);
}

/** Exclusive counterpart of `fileRange`. */
export function filesBetween(a: FileIndex, b: FileIndex): FileIndex[] {
  return indexRange(a, b).slice(1, -1);
}

export function ranksBetween(a: RankIndex, b: RankIndex): RankIndex[] {
  return indexRange(a, b).slice(1, -1);
}

export function toAlgebraic(square: Square): string {
  const f = FILES[fileOf(square)];
  const r = (rankOf(square) + 1).toString();
  return `${f}${r}`;
}

export function parseAlgebraicSquare(text: string): Square | null {
  if (typeof text !== 'string') return null;
  const t = text.trim().toLowerCase();
  if (t.length !== 2) return null;

  const f = parseFile(t[0]);
  const r = parseRank(Number(t[1]));
  if (f === null || r === null) return null;
  return makeSquare(f, r);
}

/**
 * Mirrors a square vertically (rank flip).
 */
export function mirrorRank(square: Square): Square {
  return (7 - rankOf(square)) * 8 + fileOf(square);
}

/**
 * Mirrors a square horizontally (file flip).
 */
export function mirrorFile(square: Square): Square {
  return rankOf(square) * 8 + (7 - fileOf(square));
}

/** 180° board rotation: a1 <-> h8. */
export function rotateSquare(square: Square): Square {
  return 63 - square;
}

/** a1 is dark. */
export function squareColor(square: Square): 'light' | 'dark' {
  return (fileOf(square) + rankOf(square)) % 2 === 0 ? 'dark' : 'light';
}
