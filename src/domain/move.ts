import type { CastleSide, Color, Move, MoveInput, Square } from './chessTypes';
import { homeRank, rotateSquare } from './square';

export function makeMove(from: Square, to: Square, promotion?: MoveInput['promotion']): Move {
  return promotion ? { from, to, promotion } : { from, to };
}

/** Structural equality over from/to/promotion; flags are ignored. */
export function movesEqual(a: MoveInput, b: MoveInput): boolean {
  return a.from === b.from && a.to === b.to && (a.promotion ?? null) === (b.promotion ?? null);
}

/** Maps a move through a 180° rotation of the board. */
export function rotateMove(move: Move): Move {
  return { ...move, from: rotateSquare(move.from), to: rotateSquare(move.to) };
}

/** Swaps start and end. */
export function reverseMove(move: MoveInput): Move {
  return { from: move.to, to: move.from };
}

/** The king's displacement for castling on `side`. */
export function castleMove(color: Color, side: CastleSide): Move {
  const rank = homeRank(color);
  const from = rank * 8 + 4;
  const to = side === 'k' ? from + 2 : from - 2;
  return { from, to, isCastle: true, castleSide: side };
}

/** Rook start and end squares for a castle by `color` on `side`. */
export function castleRookSquares(color: Color, side: CastleSide): { from: Square; to: Square } {
  const rank = homeRank(color);
  return side === 'k' ? { from: rank * 8 + 7, to: rank * 8 + 5 } : { from: rank * 8, to: rank * 8 + 3 };
}
