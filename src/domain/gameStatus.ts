import type { Color, Piece, Position, Square } from './chessTypes';
import { oppositeColor } from './chessTypes';
import { boardEntries } from './board';
import { generateLegalMoves } from './legalMoves';
import { isInCheck } from './attack';
import { squareColor } from './square';

export type DrawKind = 'drawInsufficientMaterial' | 'drawFiftyMove';

export type GameStatus =
  | { kind: 'inProgress' }
  | { kind: 'checkmate'; winner: Color }
  | { kind: 'stalemate' }
  | { kind: DrawKind };

/**
 * A draw condition checked after every move, once the side to move is known to
 * have at least one legal move.
 */
export type DrawRule = {
  kind: DrawKind;
  applies: (position: Position) => boolean;
};

function isInsufficientMaterialMinimumSet(position: Position): boolean {
  const nonKingPieces: Array<{ piece: Piece; square: Square }> = [];
  for (const [square, piece] of boardEntries(position.board)) {
    if (!piece || piece.type === 'k') continue;
    nonKingPieces.push({ piece, square });
  }

  if (nonKingPieces.length === 0) return true; // K vs K

  // Any pawns, rooks, or queens mean sufficient material.
  if (nonKingPieces.some(({ piece }) => piece.type === 'p' || piece.type === 'r' || piece.type === 'q')) {
    return false;
  }

  const [a, b] = nonKingPieces;
  if (nonKingPieces.length === 1) {
    return a.piece.type === 'n' || a.piece.type === 'b'; // K+N vs K, K+B vs K
  }

  if (nonKingPieces.length === 2) {
    // K+B vs K+B (bishops on same color)
    if (a.piece.type === 'b' && b.piece.type === 'b' && a.piece.color !== b.piece.color) {
      return squareColor(a.square) === squareColor(b.square);
    }
  }

  return false;
}

export const insufficientMaterialRule: DrawRule = {
  kind: 'drawInsufficientMaterial',
  applies: isInsufficientMaterialMinimumSet
};

/** 100 half-moves (50 per side) without a capture or pawn move. */
export const fiftyMoveRule: DrawRule = {
  kind: 'drawFiftyMove',
  applies: (position) => position.halfmoveClock >= 100
};

export const DRAW_RULES: Record<DrawKind, DrawRule> = {
  drawInsufficientMaterial: insufficientMaterialRule,
  drawFiftyMove: fiftyMoveRule
};

export function getGameStatus(position: Position, drawRules: readonly DrawRule[] = [insufficientMaterialRule]): GameStatus {
  const legal = generateLegalMoves(position);
  if (legal.length === 0) {
    // No legal moves: checkmate if in check, else stalemate.
    const stm = position.sideToMove;
    if (isInCheck(position, stm)) {
      return { kind: 'checkmate', winner: oppositeColor(stm) };
    }
    return { kind: 'stalemate' };
  }

  const draw = drawRules.find((rule) => rule.applies(position));
  return draw ? { kind: draw.kind } : { kind: 'inProgress' };
}

export function isGameOver(status: GameStatus): boolean {
  return status.kind !== 'inProgress';
}

export type GameResult = '1-0' | '0-1' | '1/2-1/2' | '*';

/** Result of a finished game. */
export type FinalResult = Exclude<GameResult, '*'>;

export function resultOf(status: GameStatus): GameResult {
  switch (status.kind) {
    case 'inProgress':
      return '*';
    case 'checkmate':
      return status.winner === 'w' ? '1-0' : '0-1';
    default:
      return '1/2-1/2';
  }
}

export function parseGameResult(text: string): FinalResult | null {
  const t = text.trim();
  return t === '1-0' || t === '0-1' || t === '1/2-1/2' ? t : null;
}

/** Score for `color`: 1 for a win, 0 for a loss, 0.5 for a draw. */
export function resultValueFor(result: FinalResult, color: Color): number {
  if (result === '1/2-1/2') return 0.5;
  const winner: Color = result === '1-0' ? 'w' : 'b';
  return winner === color ? 1 : 0;
}
