import type { Board, CastlingRights, Position } from '../chessTypes';
import { createEmptyBoard, pieceFromChar, pieceToChar } from '../board';
import type { Result } from '../errors';
import { tryCreatePosition } from '../position';
import { makeSquare, parseAlgebraicSquare, toAlgebraic } from '../square';

export type FenParseResult = Result<Position>;

export const STARTING_FEN = 'rnbqkbnr/pppppppp/8/8/8/8/PPPPPPPP/RNBQKBNR w KQkq - 0 1';

/** Placement field only (ranks 8..1 separated by '/'). */
export function boardToFEN(board: Board): string {
  const ranks: string[] = [];

  for (let r = 7; r >= 0; r--) {
    let empty = 0;
    let out = '';
    for (let f = 0; f < 8; f++) {
      const p = board[r * 8 + f];
      if (!p) {
        empty++;
      } else {
        if (empty > 0) {
          out += String(empty);
          empty = 0;
        }
        out += pieceToChar(p);
      }
    }
    if (empty > 0) out += String(empty);
    ranks.push(out);
  }

  return ranks.join('/');
}

/** Convert a Position to a FEN string. */
export function toFEN(position: Position): string {
  let castling = '';
  if (position.castling.wK) castling += 'K';
  if (position.castling.wQ) castling += 'Q';
  if (position.castling.bK) castling += 'k';
  if (position.castling.bQ) castling += 'q';
  if (castling === '') castling = '-';

  const ep = position.enPassantTarget === null ? '-' : toAlgebraic(position.enPassantTarget);

  return `${boardToFEN(position.board)} ${position.sideToMove} ${castling} ${ep} ${position.halfmoveClock} ${position.fullmoveNumber}`;
}

function parsePlacement(placement: string): Result<Board> {
  const ranks = placement.split('/');
  if (ranks.length !== 8) return { ok: false, error: 'FEN placement must have 8 ranks' };

  const board = createEmptyBoard();
  // FEN ranks go from 8 to 1; our squares are a1=0 .. h8=63.
  for (let r = 0; r < 8; r++) {
    const rankIndex = 7 - r;
    let file = 0;
    for (const ch of ranks[r]) {
      if (ch >= '1' && ch <= '8') {
        file += Number(ch);
        if (file > 8) return { ok: false, error: `Too many squares in rank ${rankIndex + 1}` };
        continue;
      }

      const p = pieceFromChar(ch);
      if (!p) return { ok: false, error: `Invalid piece char "${ch}" in rank ${rankIndex + 1}` };
      const sq = makeSquare(file, rankIndex);
      if (sq === null) return { ok: false, error: `Too many squares in rank ${rankIndex + 1}` };
      board[sq] = p;
      file++;
    }
    if (file !== 8) return { ok: false, error: `Rank ${rankIndex + 1} does not have 8 files` };
  }
  return { ok: true, value: board };
}

function parseCastling(text: string): CastlingRights | null {
  const castling: CastlingRights = { wK: false, wQ: false, bK: false, bQ: false };
  if (text === '-') return castling;
  for (const ch of text) {
    if (ch === 'K') castling.wK = true;
    else if (ch === 'Q') castling.wQ = true;
    else if (ch === 'k') castling.bK = true;
    else if (ch === 'q') castling.bQ = true;
    else return null;
  }
  return castling;
}

/**
 * Parse a FEN string into a Position.
 *
 * Only the text format is checked here; structural checks (kings, en passant
 * consistency, side not to move in check) are done by `tryCreatePosition`.
 */
export function tryParseFEN(fen: string): FenParseResult {
  if (typeof fen !== 'string' || fen.trim().length === 0) return { ok: false, error: 'FEN must be a non-empty string' };

  const parts = fen.trim().split(/\s+/);
  if (parts.length < 2) return { ok: false, error: 'FEN must have at least 2 fields (placement + active color)' };

  const [placement, active, castlingStr = '-', epStr = '-', halfStr = '0', fullStr = '1'] = parts;

  if (active !== 'w' && active !== 'b') return { ok: false, error: 'FEN active color must be "w" or "b"' };

  const board = parsePlacement(placement);
  if (!board.ok) return board;

  const castling = parseCastling(castlingStr);
  if (!castling) return { ok: false, error: `Invalid castling rights "${castlingStr}"` };

  let enPassantTarget: Position['enPassantTarget'] = null;
  if (epStr !== '-') {
    enPassantTarget = parseAlgebraicSquare(epStr);
    if (enPassantTarget === null) return { ok: false, error: `Invalid en passant target "${epStr}"` };
  }

  const halfmoveClock = Number(halfStr);
  const fullmoveNumber = Number(fullStr);
  if (!Number.isInteger(halfmoveClock) || halfmoveClock < 0) return { ok: false, error: 'Invalid halfmove clock' };
  if (!Number.isInteger(fullmoveNumber) || fullmoveNumber < 1) return { ok: false, error: 'Invalid fullmove number' };

  return tryCreatePosition({
    board: board.value,
    sideToMove: active,
    castling,
    enPassantTarget,
    halfmoveClock,
    fullmoveNumber
  });
}

export function fromFEN(fen: string): Position {
  const r = tryParseFEN(fen);
  if (!r.ok) throw new Error(r.error);
  return r.value;
}
