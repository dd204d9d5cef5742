/**
 * Core chess domain types.
 *
 * Keep these types presentation-agnostic and JSON-serializable.
 */

/** Color: white ('w') or black ('b'). */
export type Color = 'w' | 'b';

/**
 * Piece types are stored in lowercase, similar to FEN, but without color.
 * - p pawn
 * - n knight
 * - b bishop
 * - r rook
 * - q queen
 * - k king
 */
export type PieceType = 'p' | 'n' | 'b' | 'r' | 'q' | 'k';

/** Piece kinds a pawn may promote to. */
export type PromotionPieceType = Exclude<PieceType, 'k' | 'p'>;

export const PROMOTION_PIECE_TYPES: readonly PromotionPieceType[] = ['q', 'r', 'b', 'n'];

export type Piece = {
  color: Color;
  type: PieceType;
};

/**
 * 0–63 square index.
 *
 * Convention:
 * - 0 = a1
 * - 7 = h1
 * - 8 = a2
 * - 63 = h8
 */
export type Square = number;

export type CastlingRights = {
  /** White king-side (K). */
  wK: boolean;
  /** White queen-side (Q). */
  wQ: boolean;
  /** Black king-side (k). */
  bK: boolean;
  /** Black queen-side (q). */
  bQ: boolean;
};

/** 'k' is king-side, 'q' is queen-side. */
export type CastleSide = 'k' | 'q';

/**
 * A displacement from one square to another.
 *
 * Only from/to (+promotion) take part in equality. The flags are filled in by move
 * generation and by the position transition.
 */
export type Move = {
  from: Square;
  to: Square;
  /** Promotion piece type when the move promotes a pawn. */
  promotion?: PromotionPieceType;

  /** True for castling moves. */
  isCastle?: boolean;
  /** If isCastle, side is 'k' (king-side) or 'q' (queen-side). */
  castleSide?: CastleSide;

  /** True for en passant captures. */
  isEnPassant?: boolean;

  /** Captured piece, filled in once the move has been executed. */
  captured?: Piece | null;
};

/** Minimal move shape accepted from callers. */
export type MoveInput = Pick<Move, 'from' | 'to' | 'promotion'>;

export type Board = Array<Piece | null>;

/** How a board is populated. `null` means an empty board. */
export type Variant = 'standard' | 'upsideDown';

/**
 * Immutable snapshot of a game between two plies.
 */
export type Position = {
  board: Board;
  sideToMove: Color;
  castling: CastlingRights;
  /** En passant target square, or null if none. */
  enPassantTarget: Square | null;
  /** Halfmove clock for the 50-move rule. */
  halfmoveClock: number;
  /** Fullmove number (starts at 1). */
  fullmoveNumber: number;
};

export function oppositeColor(c: Color): Color {
  return c === 'w' ? 'b' : 'w';
}

export function isPromotionPieceType(x: unknown): x is PromotionPieceType {
  return x === 'q' || x === 'r' || x === 'b' || x === 'n';
}

export function piecesEqual(a: Piece | null, b: Piece | null): boolean {
  if (a === null || b === null) return a === b;
  return a.color === b.color && a.type === b.type;
}
