import type { Board, Color, Piece, PieceType, Square, Variant } from './chessTypes';
import { piecesEqual } from './chessTypes';
import type { Result } from './errors';
import { homeRank, makeSquare, mirrorFile, mirrorRank } from './square';

const BACK_RANK: readonly PieceType[] = ['r', 'n', 'b', 'q', 'k', 'b', 'n', 'r'];
const PIECE_TYPES: readonly PieceType[] = ['p', 'n', 'b', 'r', 'q', 'k'];

/** FEN letter for a piece: uppercase for white. */
export function pieceToChar(p: Piece): string {
  return p.color === 'w' ? p.type.toUpperCase() : p.type;
}

export function pieceFromChar(ch: string): Piece | null {
  const lower = ch.toLowerCase();
  const type = PIECE_TYPES.find((t) => t === lower);
  if (!type) return null;
  return { color: ch === lower ? 'b' : 'w', type };
}

export function createEmptyBoard(): Board {
  return Array.from({ length: 64 }, () => null);
}

export function getPiece(board: Board, square: Square): Piece | null {
  return board[square] ?? null;
}

export function setPiece(board: Board, square: Square, piece: Piece | null): Board {
  const next = board.slice();
  next[square] = piece;
  return next;
}

export function removePiece(board: Board, square: Square): Board {
  return setPiece(board, square, null);
}

/** Exchanges the contents of two squares. Either may be empty. */
export function swapPieces(board: Board, a: Square, b: Square): Board {
  const next = board.slice();
  next[a] = getPiece(board, b);
  next[b] = getPiece(board, a);
  return next;
}

function placeMutable(board: Board, file: number, rank: number, p: Piece) {
  const sq = makeSquare(file, rank);
  if (sq === null) throw new Error(`Invalid square (file=${file}, rank=${rank})`);
  board[sq] = p;
}

function placeArmy(board: Board, color: Color) {
  const back = homeRank(color);
  const pawns = color === 'w' ? 1 : 6;
  BACK_RANK.forEach((type, file) => placeMutable(board, file, back, { color, type }));
  for (let file = 0; file < 8; file++) {
    placeMutable(board, file, pawns, { color, type: 'p' });
  }
}

/**
 * Standard chess starting position.
 *
 * Board convention is 0=a1..63=h8.
 */
export function createStartingBoard(): Board {
  const b = createEmptyBoard();
  placeArmy(b, 'w');
  placeArmy(b, 'b');
  return b;
}

/**
 * Builds a board for `variant`, or an empty one when no variant is given.
 *
 * 'upsideDown' swaps the armies' starting squares: white occupies ranks 7-8.
 */
export function createBoard(variant: Variant | null = 'standard'): Board {
  if (variant === null) return createEmptyBoard();
  const standard = createStartingBoard();
  if (variant === 'standard') return standard;
  return flipBoardVertically(standard);
}

/**
 * Board from eight rows of eight cells, rank 8 first. A cell is a FEN piece letter,
 * or a space or '.' for an empty square.
 */
export function boardFromGrid(rows: ReadonlyArray<string | readonly string[]>): Result<Board> {
  if (rows.length !== 8) return { ok: false, error: `Expected 8 rows, got ${rows.length}` };

  const board = createEmptyBoard();
  for (let row = 0; row < 8; row++) {
    const cells = [...rows[row]];
    const rank = 7 - row;
    if (cells.length !== 8) return { ok: false, error: `Row for rank ${rank + 1} must have 8 cells` };

    for (let file = 0; file < 8; file++) {
      const cell = cells[file];
      if (cell === ' ' || cell === '.') continue;
      const p = pieceFromChar(cell);
      if (!p) return { ok: false, error: `Invalid piece "${cell}" on rank ${rank + 1}` };
      placeMutable(board, file, rank, p);
    }
  }
  return { ok: true, value: board };
}

/** Rank 1 becomes rank 8 and so on. */
export function flipBoardVertically(board: Board): Board {
  return board.map((_, sq) => getPiece(board, mirrorRank(sq)));
}

/** File a becomes file h and so on. */
export function flipBoardHorizontally(board: Board): Board {
  return board.map((_, sq) => getPiece(board, mirrorFile(sq)));
}

/**
 * All 64 squares with their contents, in rank-major order (a1, b1 .. h1, a2 .. h8).
 */
export function* boardEntries(board: Board): Generator<[Square, Piece | null]> {
  for (let sq = 0; sq < 64; sq++) {
    yield [sq, getPiece(board, sq)];
  }
}

export function listPieces(board: Board, color?: Color): Piece[] {
  const out: Piece[] = [];
  for (const [, p] of boardEntries(board)) {
    if (p && (color === undefined || p.color === color)) out.push(p);
  }
  return out;
}

export function countPieces(board: Board, color?: Color): number {
  return listPieces(board, color).length;
}

/** Squares holding a piece equal to `piece`. */
export function squaresOf(board: Board, piece: Piece): Square[] {
  const out: Square[] = [];
  for (const [sq, p] of boardEntries(board)) {
    if (piecesEqual(p, piece)) out.push(sq);
  }
  return out;
}

export function findKing(board: Board, color: Color): Square | null {
  return squaresOf(board, { color, type: 'k' })[0] ?? null;
}

/** Content-only equality: how a board was built does not matter. */
export function boardsEqual(a: Board, b: Board): boolean {
  for (let sq = 0; sq < 64; sq++) {
    if (!piecesEqual(getPiece(a, sq), getPiece(b, sq))) return false;
  }
  return true;
}
