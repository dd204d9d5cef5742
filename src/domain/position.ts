import type { CastlingRights, Color, Move, MoveInput, Piece, PieceType, Position, Variant } from './chessTypes';
import { isPromotionPieceType, oppositeColor, piecesEqual } from './chessTypes';
import { createBoard, getPiece, squaresOf } from './board';
import { applyMove, capturedPiece } from './applyMove';
import { isInCheck } from './attack';
import type { Result } from './errors';
import { ChessRuleError } from './errors';
import { generateLegalMoves } from './legalMoves';
import { isSquare, offsetSquare, pawnDirection, rankOf } from './square';

export const STARTING_CASTLING_RIGHTS: CastlingRights = {
  wK: true,
  wQ: true,
  bK: true,
  bQ: true
};

export const NO_CASTLING_RIGHTS: CastlingRights = {
  wK: false,
  wQ: false,
  bK: false,
  bQ: false
};

/**
 * Opening position for `variant`.
 *
 * The upside-down variant has no castling: neither king starts next to its own rooks' home corners.
 */
export function createInitialPosition(variant: Variant = 'standard'): Position {
  return {
    board: createBoard(variant),
    sideToMove: 'w',
    castling: variant === 'standard' ? { ...STARTING_CASTLING_RIGHTS } : { ...NO_CASTLING_RIGHTS },
    enPassantTarget: null,
    halfmoveClock: 0,
    fullmoveNumber: 1
  };
}

export type PositionResult = Result<Position>;

const PIECE_TYPES: readonly PieceType[] = ['p', 'n', 'b', 'r', 'q', 'k'];

function isPiece(x: unknown): x is Piece {
  if (typeof x !== 'object' || x === null || !('color' in x) || !('type' in x)) return false;
  const { color, type } = x;
  return (color === 'w' || color === 'b') && PIECE_TYPES.some((t) => t === type);
}

function colorName(c: Color): string {
  return c === 'w' ? 'white' : 'black';
}

function validateEnPassant(fields: Position): string | null {
  const ep = fields.enPassantTarget;
  if (ep === null) return null;
  if (!isSquare(ep)) return 'en passant target is not a square';

  const dir = pawnDirection(fields.sideToMove);
  const expectedRank = fields.sideToMove === 'w' ? 5 : 2;
  if (rankOf(ep) !== expectedRank) return `en passant target must be on rank ${expectedRank + 1}`;

  const pawnSq = offsetSquare(ep, 0, -dir);
  const originSq = offsetSquare(ep, 0, dir);
  const pawn = pawnSq === null ? null : getPiece(fields.board, pawnSq);
  if (!piecesEqual(pawn, { color: oppositeColor(fields.sideToMove), type: 'p' })) {
    return 'en passant target has no double-stepped pawn in front of it';
  }
  if (getPiece(fields.board, ep) !== null || (originSq !== null && getPiece(fields.board, originSq) !== null)) {
    return 'en passant squares must be empty';
  }
  return null;
}

/**
 * Builds a position from structured fields (as produced by a FEN reader or a caller),
 * performing structural validation only.
 */
export function tryCreatePosition(fields: Position): PositionResult {
  if (!Array.isArray(fields.board) || fields.board.length !== 64) {
    return { ok: false, error: 'Board must have exactly 64 squares' };
  }
  if (!fields.board.every((p) => p === null || isPiece(p))) {
    return { ok: false, error: 'Board contains an invalid piece' };
  }
  const board = fields.board.map((p) => (p ? { color: p.color, type: p.type } : null));

  if (fields.sideToMove !== 'w' && fields.sideToMove !== 'b') {
    return { ok: false, error: 'Side to move must be "w" or "b"' };
  }

  for (const color of ['w', 'b'] as const) {
    const kings = squaresOf(board, { color, type: 'k' }).length;
    if (kings !== 1) return { ok: false, error: `Expected exactly one ${colorName(color)} king, found ${kings}` };
  }

  const backRankPawn = board.some((p, sq) => p?.type === 'p' && (rankOf(sq) === 0 || rankOf(sq) === 7));
  if (backRankPawn) return { ok: false, error: 'Pawns cannot stand on the first or last rank' };

  const candidate: Position = {
    board,
    sideToMove: fields.sideToMove,
    castling: {
      wK: fields.castling.wK === true,
      wQ: fields.castling.wQ === true,
      bK: fields.castling.bK === true,
      bQ: fields.castling.bQ === true
    },
    enPassantTarget: fields.enPassantTarget,
    halfmoveClock: fields.halfmoveClock,
    fullmoveNumber: fields.fullmoveNumber
  };

  const epError = validateEnPassant(candidate);
  if (epError) return { ok: false, error: `Invalid en passant target: ${epError}` };

  if (!Number.isInteger(candidate.halfmoveClock) || candidate.halfmoveClock < 0) {
    return { ok: false, error: 'Invalid halfmove clock' };
  }
  if (!Number.isInteger(candidate.fullmoveNumber) || candidate.fullmoveNumber < 1) {
    return { ok: false, error: 'Invalid fullmove number' };
  }

  const waiting = oppositeColor(candidate.sideToMove);
  if (isInCheck(candidate, waiting)) {
    return { ok: false, error: `The ${colorName(waiting)} king is in check but it is not ${colorName(waiting)}'s move` };
  }

  return { ok: true, value: candidate };
}

export function createPosition(fields: Position): Position {
  const r = tryCreatePosition(fields);
  if (!r.ok) throw new Error(r.error);
  return r.value;
}

export function positionsEqual(a: Position, b: Position): boolean {
  return (
    a.sideToMove === b.sideToMove &&
    a.enPassantTarget === b.enPassantTarget &&
    a.halfmoveClock === b.halfmoveClock &&
    a.fullmoveNumber === b.fullmoveNumber &&
    a.castling.wK === b.castling.wK &&
    a.castling.wQ === b.castling.wQ &&
    a.castling.bK === b.castling.bK &&
    a.castling.bQ === b.castling.bQ &&
    a.board.every((p, sq) => piecesEqual(p, getPiece(b.board, sq)))
  );
}

export type Transition = {
  position: Position;
  /** The executed move with castle / en passant / capture details filled in. */
  move: Move;
};

export type TransitionResult = Result<Transition, ChessRuleError>;

/**
 * Successor of `position` after `move`.
 *
 * `promotion` overrides `move.promotion` when both are given. Fails when the move is
 * not legal here, when a promoting move lacks a valid kind, or when a kind is given
 * for a move that does not promote.
 */
export function nextPosition(position: Position, move: MoveInput, promotion?: PieceType): TransitionResult {
  const requested: PieceType | undefined = promotion ?? move.promotion;
  const moving = getPiece(position.board, move.from);
  if (!moving) return { ok: false, error: ChessRuleError.illegalMove(move, 'no piece on the start square') };
  if (moving.color !== position.sideToMove) {
    return { ok: false, error: ChessRuleError.illegalMove(move, `it is ${colorName(position.sideToMove)}'s move`) };
  }

  const candidates = generateLegalMoves(position, move.from).filter((m) => m.to === move.to);
  if (candidates.length === 0) {
    return { ok: false, error: ChessRuleError.illegalMove(move, 'not a legal move in this position') };
  }

  let chosen: Move | undefined;
  if (candidates.some((m) => m.promotion !== undefined)) {
    if (requested === undefined) return { ok: false, error: ChessRuleError.missingPromotion(move) };
    if (!isPromotionPieceType(requested)) return { ok: false, error: ChessRuleError.invalidPromotion(move, requested) };
    chosen = candidates.find((m) => m.promotion === requested);
  } else {
    if (requested !== undefined) return { ok: false, error: ChessRuleError.invalidPromotion(move, requested) };
    chosen = candidates[0];
  }
  if (!chosen) return { ok: false, error: ChessRuleError.illegalMove(move, 'not a legal move in this position') };

  return {
    ok: true,
    value: {
      position: applyMove(position, chosen),
      move: { ...chosen, captured: capturedPiece(position, chosen) }
    }
  };
}
