import type { Move, MoveInput, Position, Square } from './chessTypes';
import { oppositeColor } from './chessTypes';
import { applyMove } from './applyMove';
import { isInCheck, isSquareAttacked } from './attack';
import { movesEqual } from './move';
import { fileOf, filesBetween, makeSquare, rankOf } from './square';
import { generatePseudoLegalMoves } from './movegen';

/** Squares the king crosses and lands on while castling. */
function castlePathSquares(from: Square, to: Square): Square[] {
  const rank = rankOf(from);
  const files = [...filesBetween(fileOf(from), fileOf(to)), fileOf(to)];
  return files.flatMap((f) => {
    const sq = makeSquare(f, rank);
    return sq === null ? [] : [sq];
  });
}

function isCastleLegal(position: Position, move: Move): boolean {
  if (!move.isCastle) return true;
  const enemy = oppositeColor(position.sideToMove);

  // King cannot castle out of check.
  if (isInCheck(position, position.sideToMove)) return false;

  // King cannot pass through or land on attacked squares.
  return castlePathSquares(move.from, move.to).every((sq) => !isSquareAttacked(position, sq, enemy));
}

/**
 * Legal move generation.
 *
 * Filters pseudo-legal moves by king safety:
 * - a move is legal if after making it, your king is not in check.
 * - castling additionally requires not being in check and not passing through check.
 */
export function generateLegalMoves(position: Position, fromSquare?: Square): Move[] {
  const color = position.sideToMove;
  return generatePseudoLegalMoves(position, fromSquare).filter((m) => {
    if (m.isCastle && !isCastleLegal(position, m)) return false;
    // After a move, the mover's king must not be in check.
    return !isInCheck(applyMove(position, m), color);
  });
}

/** The generated legal move matching from/to/promotion, if any. */
export function findLegalMove(position: Position, move: MoveInput): Move | null {
  return generateLegalMoves(position, move.from).find((m) => movesEqual(m, move)) ?? null;
}

export function isLegalMove(position: Position, move: MoveInput): boolean {
  return findLegalMove(position, move) !== null;
}

export function hasLegalMoves(position: Position): boolean {
  return generateLegalMoves(position).length > 0;
}
