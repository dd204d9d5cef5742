import type { Color, PieceType, Position, Square } from './chessTypes';
import { oppositeColor } from './chessTypes';
import { findKing, getPiece } from './board';
import { ChessRuleError } from './errors';
import { offsetSquare } from './square';

export const KNIGHT_DELTAS = [
  [1, 2],
  [2, 1],
  [2, -1],
  [1, -2],
  [-1, -2],
  [-2, -1],
  [-2, 1],
  [-1, 2]
] as const;

export const KING_DELTAS = [
  [1, 0],
  [-1, 0],
  [0, 1],
  [0, -1],
  [1, 1],
  [1, -1],
  [-1, 1],
  [-1, -1]
] as const;

export const ROOK_DIRS = KING_DELTAS.slice(0, 4);
export const BISHOP_DIRS = KING_DELTAS.slice(4);

/**
 * Attack detection.
 *
 * Lists the squares of `byColor` pieces attacking `square`.
 *
 * Notes:
 * - This function is purely geometric: it does not consider pins or king safety.
 * - Pawns attack their diagonals whether or not anything stands there.
 * - Castling never attacks.
 */
export function attackersOf(position: Position, square: Square, byColor: Color): Square[] {
  const board = position.board;
  const found: Square[] = [];

  const check = (from: Square | null, types: readonly PieceType[]) => {
    if (from === null) return;
    const p = getPiece(board, from);
    if (p && p.color === byColor && types.includes(p.type)) found.push(from);
  };

  // Pawn attacks (reverse lookup from target square): white pawns sit one rank below.
  const pawnRank = byColor === 'w' ? -1 : 1;
  check(offsetSquare(square, -1, pawnRank), ['p']);
  check(offsetSquare(square, 1, pawnRank), ['p']);

  for (const [df, dr] of KNIGHT_DELTAS) check(offsetSquare(square, df, dr), ['n']);
  for (const [df, dr] of KING_DELTAS) check(offsetSquare(square, df, dr), ['k']);

  // Sliding attacks: rook/queen (orthogonal) and bishop/queen (diagonal)
  const slide = (dirs: ReadonlyArray<readonly [number, number]>, types: readonly PieceType[]) => {
    for (const [df, dr] of dirs) {
      let sq = offsetSquare(square, df, dr);
      while (sq !== null && getPiece(board, sq) === null) {
        sq = offsetSquare(sq, df, dr);
      }
      check(sq, types);
    }
  };
  slide(ROOK_DIRS, ['r', 'q']);
  slide(BISHOP_DIRS, ['b', 'q']);

  return found;
}

export function isSquareAttacked(position: Position, square: Square, byColor: Color): boolean {
  return attackersOf(position, square, byColor).length > 0;
}

/** Square of the `color` king; throws when there is none. */
export function requireKing(position: Position, color: Color): Square {
  const sq = findKing(position.board, color);
  if (sq === null) throw ChessRuleError.noKing(color);
  return sq;
}

export function isInCheck(position: Position, color: Color): boolean {
  return isSquareAttacked(position, requireKing(position, color), oppositeColor(color));
}
