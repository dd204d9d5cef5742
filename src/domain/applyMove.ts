import type { Board, CastlingRights, Color, Move, Piece, Position, Square } from './chessTypes';
import { oppositeColor } from './chessTypes';
import { getPiece, setPiece } from './board';
import { ChessRuleError } from './errors';
import { castleRookSquares } from './move';
import { fileOf, makeSquare, offsetSquare, pawnDirection, promotionRank, rankOf } from './square';

/**
 * Position transition without legality checks.
 *
 * The legal-move filter simulates every candidate through `applyMove`, and real play
 * goes through `nextPosition` (position.ts), which validates first and then calls it.
 */

function clearCastlingForColor(c: CastlingRights, color: Color): CastlingRights {
  return color === 'w' ? { ...c, wK: false, wQ: false } : { ...c, bK: false, bQ: false };
}

/** A rook leaving or being taken on a home corner loses that side's right. */
function clearCastlingForCorner(c: CastlingRights, square: Square): CastlingRights {
  switch (square) {
    case 0:
      return { ...c, wQ: false };
    case 7:
      return { ...c, wK: false };
    case 56:
      return { ...c, bQ: false };
    case 63:
      return { ...c, bK: false };
    default:
      return c;
  }
}

/** Fills in castle / en passant flags so callers can pass simple from/to moves. */
export function normalizeMove(position: Position, move: Move): Move {
  const moving = getPiece(position.board, move.from);
  if (!moving) return move;

  const df = fileOf(move.to) - fileOf(move.from);
  if (moving.type === 'k' && !move.isCastle && Math.abs(df) === 2 && rankOf(move.to) === rankOf(move.from)) {
    return { ...move, isCastle: true, castleSide: df > 0 ? 'k' : 'q' };
  }

  if (
    moving.type === 'p' &&
    !move.isEnPassant &&
    Math.abs(df) === 1 &&
    move.to === position.enPassantTarget &&
    getPiece(position.board, move.to) === null
  ) {
    return { ...move, isEnPassant: true };
  }
  return move;
}

/** Square of the piece `move` captures, or null when nothing is taken. */
function captureSquare(position: Position, move: Move, moving: Piece): Square | null {
  if (move.isCastle) return null;
  if (move.isEnPassant) return offsetSquare(move.to, 0, -pawnDirection(moving.color));
  return getPiece(position.board, move.to) ? move.to : null;
}

export function capturedPiece(position: Position, inputMove: Move): Piece | null {
  const moving = getPiece(position.board, inputMove.from);
  if (!moving) return null;
  const sq = captureSquare(position, normalizeMove(position, inputMove), moving);
  return sq === null ? null : getPiece(position.board, sq);
}

function enPassantTargetAfter(moving: Piece, from: Square, to: Square): Square | null {
  if (moving.type !== 'p') return null;
  if (fileOf(to) !== fileOf(from) || Math.abs(rankOf(to) - rankOf(from)) !== 2) return null;
  return makeSquare(fileOf(from), (rankOf(from) + rankOf(to)) / 2);
}

/**
 * Apply a move and return the next position.
 *
 * Assumptions:
 * - The caller provides a pseudo-legal move (typically from `generatePseudoLegalMoves`).
 * - A pawn reaching the last rank carries its promotion kind.
 */
export function applyMove(position: Position, inputMove: Move): Position {
  const moving = getPiece(position.board, inputMove.from);
  if (!moving) throw ChessRuleError.illegalMove(inputMove, 'no piece on the start square');

  const move = normalizeMove(position, inputMove);
  const capSq = captureSquare(position, move, moving);
  const captured = capSq === null ? null : getPiece(position.board, capSq);

  let board: Board = setPiece(position.board, move.from, null);
  if (capSq !== null) board = setPiece(board, capSq, null);

  // Castling: the rook jumps over the king.
  if (move.isCastle && move.castleSide) {
    const rook = castleRookSquares(moving.color, move.castleSide);
    board = setPiece(setPiece(board, rook.to, getPiece(board, rook.from)), rook.from, null);
  }

  // Place piece (promotion or normal)
  if (moving.type === 'p' && rankOf(move.to) === promotionRank(moving.color)) {
    if (!move.promotion) throw ChessRuleError.missingPromotion(move);
    board = setPiece(board, move.to, { color: moving.color, type: move.promotion });
  } else {
    board = setPiece(board, move.to, moving);
  }

  // Castling rights updates
  let castling = position.castling;
  if (moving.type === 'k') castling = clearCastlingForColor(castling, moving.color);
  if (moving.type === 'r') castling = clearCastlingForCorner(castling, move.from);
  if (captured && captured.type === 'r') castling = clearCastlingForCorner(castling, move.to);

  const isResetting = captured !== null || moving.type === 'p';

  return {
    board,
    sideToMove: oppositeColor(position.sideToMove),
    castling,
    enPassantTarget: enPassantTargetAfter(moving, move.from, move.to),
    halfmoveClock: isResetting ? 0 : position.halfmoveClock + 1,
    // Fullmove number increments after black moves.
    fullmoveNumber: position.sideToMove === 'b' ? position.fullmoveNumber + 1 : position.fullmoveNumber
  };
}
