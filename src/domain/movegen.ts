import type { CastleSide, Move, Position, Square } from './chessTypes';
import { PROMOTION_PIECE_TYPES } from './chessTypes';
import { getPiece } from './board';
import { BISHOP_DIRS, KING_DELTAS, KNIGHT_DELTAS, ROOK_DIRS } from './attack';
import { castleMove, castleRookSquares } from './move';
import { filesBetween, fileOf, homeRank, makeSquare, offsetSquare, pawnDirection, promotionRank, rankOf } from './square';

/**
 * Pseudo-legal move generation.
 *
 * Pseudo-legal means: piece movement rules are respected, but king safety is NOT checked.
 * (Filtering to legal moves happens in legalMoves.ts.)
 */

type Dirs = ReadonlyArray<readonly [number, number]>;

function pushMove(moves: Move[], from: Square, to: Square, opts?: Partial<Move>) {
  moves.push({ from, to, ...opts });
}

function addPawnTarget(moves: Move[], position: Position, from: Square, to: Square, opts?: Partial<Move>) {
  const piece = getPiece(position.board, from);
  if (piece && rankOf(to) === promotionRank(piece.color)) {
    for (const promotion of PROMOTION_PIECE_TYPES) pushMove(moves, from, to, { ...opts, promotion });
  } else {
    pushMove(moves, from, to, opts);
  }
}

function addPawnMoves(position: Position, from: Square, moves: Move[]) {
  const piece = getPiece(position.board, from);
  if (!piece || piece.type !== 'p') return;

  const dir = pawnDirection(piece.color);
  const startRank = piece.color === 'w' ? 1 : 6;

  // Single push
  const one = offsetSquare(from, 0, dir);
  if (one !== null && getPiece(position.board, one) === null) {
    addPawnTarget(moves, position, from, one);

    // Double push from starting rank (only if single push is clear)
    const two = offsetSquare(from, 0, dir * 2);
    if (rankOf(from) === startRank && two !== null && getPiece(position.board, two) === null) {
      pushMove(moves, from, two);
    }
  }

  // Captures (diagonals)
  for (const df of [-1, 1]) {
    const cap = offsetSquare(from, df, dir);
    if (cap === null) continue;
    const target = getPiece(position.board, cap);
    if (target && target.color !== piece.color) {
      addPawnTarget(moves, position, from, cap);
    } else if (target === null && cap === position.enPassantTarget) {
      // The double-stepped pawn stands behind the target square.
      const behind = offsetSquare(cap, 0, -dir);
      const victim = behind === null ? null : getPiece(position.board, behind);
      if (victim && victim.type === 'p' && victim.color !== piece.color) {
        pushMove(moves, from, cap, { isEnPassant: true });
      }
    }
  }
}

function addStepMoves(position: Position, from: Square, moves: Move[], deltas: Dirs) {
  const piece = getPiece(position.board, from);
  if (!piece) return;

  for (const [df, dr] of deltas) {
    const to = offsetSquare(from, df, dr);
    if (to === null) continue;
    const target = getPiece(position.board, to);
    if (!target || target.color !== piece.color) {
      pushMove(moves, from, to);
    }
  }
}

function addSlidingMoves(position: Position, from: Square, moves: Move[], directions: Dirs) {
  const piece = getPiece(position.board, from);
  if (!piece) return;

  for (const [df, dr] of directions) {
    let to = offsetSquare(from, df, dr);
    while (to !== null) {
      const target = getPiece(position.board, to);
      if (!target) {
        pushMove(moves, from, to);
      } else {
        if (target.color !== piece.color) {
          pushMove(moves, from, to);
        }
        break; // blocked
      }
      to = offsetSquare(to, df, dr);
    }
  }
}

function castlingRight(position: Position, side: CastleSide): boolean {
  const c = position.castling;
  if (position.sideToMove === 'w') return side === 'k' ? c.wK : c.wQ;
  return side === 'k' ? c.bK : c.bQ;
}

/**
 * Castling candidates (no check validation here; see legalMoves.ts).
 *
 * Requires the right to be held, king and rook on their home squares and every
 * square between them empty.
 */
function addCastleCandidates(position: Position, from: Square, moves: Move[]) {
  const king = getPiece(position.board, from);
  if (!king || king.type !== 'k') return;

  const rank = homeRank(king.color);
  if (from !== makeSquare(4, rank)) return;

  for (const side of ['k', 'q'] as const) {
    if (!castlingRight(position, side)) continue;
    const rookSq = castleRookSquares(king.color, side).from;
    const rook = getPiece(position.board, rookSq);
    if (!rook || rook.type !== 'r' || rook.color !== king.color) continue;

    const path = filesBetween(fileOf(from), fileOf(rookSq));
    const clear = path.every((f) => {
      const sq = makeSquare(f, rank);
      return sq !== null && getPiece(position.board, sq) === null;
    });
    if (clear) moves.push(castleMove(king.color, side));
  }
}

function addMovesFromSquare(position: Position, from: Square, moves: Move[]) {
  const piece = getPiece(position.board, from);
  if (!piece) return;
  if (piece.color !== position.sideToMove) return;

  switch (piece.type) {
    case 'p':
      addPawnMoves(position, from, moves);
      break;
    case 'n':
      addStepMoves(position, from, moves, KNIGHT_DELTAS);
      break;
    case 'b':
      addSlidingMoves(position, from, moves, BISHOP_DIRS);
      break;
    case 'r':
      addSlidingMoves(position, from, moves, ROOK_DIRS);
      break;
    case 'q':
      addSlidingMoves(position, from, moves, KING_DELTAS);
      break;
    case 'k':
      addStepMoves(position, from, moves, KING_DELTAS);
      addCastleCandidates(position, from, moves);
      break;
  }
}

/**
 * Generates pseudo-legal moves for the current side to move.
 *
 * If `fromSquare` is provided, only moves from that square are generated.
 */
export function generatePseudoLegalMoves(position: Position, fromSquare?: Square): Move[] {
  const moves: Move[] = [];
  if (typeof fromSquare === 'number') {
    addMovesFromSquare(position, fromSquare, moves);
    return moves;
  }

  for (let sq = 0; sq < 64; sq++) {
    addMovesFromSquare(position, sq, moves);
  }
  return moves;
}
