import type { MoveInput, PromotionPieceType, Square } from '../chessTypes';
import { isPromotionPieceType } from '../chessTypes';
import { parseAlgebraicSquare, toAlgebraic } from '../square';

/**
 * UCI move notation helpers.
 *
 * Examples:
 * - e2e4
 * - e7e8q (promotion)
 */

export function moveToUci(move: MoveInput): string {
  const from = toAlgebraic(move.from);
  const to = toAlgebraic(move.to);
  const promo = move.promotion ?? '';
  return `${from}${to}${promo}`;
}

export type ParsedUciMove = {
  from: Square;
  to: Square;
  promotion?: PromotionPieceType;
};

export function parseUciMove(text: string): ParsedUciMove | null {
  if (typeof text !== 'string') return null;
  const t = text.trim().toLowerCase();
  if (t.length !== 4 && t.length !== 5) return null;

  const from = parseAlgebraicSquare(t.slice(0, 2));
  const to = parseAlgebraicSquare(t.slice(2, 4));
  if (from === null || to === null) return null;

  if (t.length === 4) return { from, to };
  const p = t[4];
  return isPromotionPieceType(p) ? { from, to, promotion: p } : null;
}
