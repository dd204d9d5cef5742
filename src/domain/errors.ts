import type { Color, MoveInput } from './chessTypes';
import { toAlgebraic } from './square';

export type ChessRuleErrorKind =
  /** The move is not in the legal set for the position. */
  | 'illegalMove'
  /** A pawn reached the last rank without a promotion kind. */
  | 'missingPromotion'
  /** Promotion kind outside n/b/r/q, or a kind given for a non-promoting move. */
  | 'invalidPromotion'
  /** A query needed a king that is not on the board. */
  | 'noKing'
  /** The game already has a result. */
  | 'gameOver';

export type Result<T, E = string> = { ok: true; value: T } | { ok: false; error: E };

function describeMove(move: MoveInput): string {
  return `${toAlgebraic(move.from)}${toAlgebraic(move.to)}${move.promotion ?? ''}`;
}

/**
 * Rule violation raised by the engine.
 *
 * A failed operation leaves every value it was given untouched, so callers can
 * catch this and submit a different move.
 */
export class ChessRuleError extends Error {
  readonly kind: ChessRuleErrorKind;
  readonly move: MoveInput | null;

  constructor(kind: ChessRuleErrorKind, message: string, move: MoveInput | null = null) {
    super(message);
    this.name = 'ChessRuleError';
    this.kind = kind;
    this.move = move;
    Object.setPrototypeOf(this, ChessRuleError.prototype);
  }

  static illegalMove(move: MoveInput, reason: string): ChessRuleError {
    return new ChessRuleError('illegalMove', `Illegal move ${describeMove(move)}: ${reason}`, move);
  }

  static missingPromotion(move: MoveInput): ChessRuleError {
    return new ChessRuleError('missingPromotion', `Move ${describeMove(move)} requires a promotion piece`, move);
  }

  static invalidPromotion(move: MoveInput, given: unknown): ChessRuleError {
    return new ChessRuleError('invalidPromotion', `Cannot promote with "${String(given)}" on ${describeMove(move)}`, move);
  }

  static noKing(color: Color): ChessRuleError {
    return new ChessRuleError('noKing', `No ${color === 'w' ? 'white' : 'black'} king on the board`);
  }
}
