import type { Position, TransitionResult } from '../index';
import {
  ChessRuleError,
  createEmptyBoard,
  createInitialPosition,
  createPosition,
  fromFEN,
  getPiece,
  isInCheck,
  nextPosition,
  positionsEqual,
  setPiece,
  STARTING_FEN,
  tryCreatePosition
} from '../index';
import { boardOf, mkPosition, sq } from './testUtils';

function errorKind(r: TransitionResult): string | null {
  return r.ok ? null : r.error.kind;
}

function expectPosition(r: TransitionResult): Position {
  if (!r.ok) throw r.error;
  return r.value.position;
}

describe('tryCreatePosition', () => {
  const kings = { e1: 'K', e8: 'k' };

  it('accepts a well-formed position and copies its board', () => {
    const board = boardOf(kings);
    const r = tryCreatePosition(mkPosition({ board }));
    expect(r.ok).toBe(true);

    board[sq('d4')] = { color: 'w', type: 'q' };
    if (r.ok) expect(getPiece(r.value.board, sq('d4'))).toBeNull();
  });

  it('rejects a board that is not 64 squares', () => {
    const r = tryCreatePosition(mkPosition({ board: createEmptyBoard().slice(1) }));
    expect(r).toEqual({ ok: false, error: 'Board must have exactly 64 squares' });
  });

  it('requires exactly one king per side', () => {
    expect(tryCreatePosition(mkPosition({ board: boardOf({ e8: 'k' }) }))).toEqual({
      ok: false,
      error: 'Expected exactly one white king, found 0'
    });
    expect(tryCreatePosition(mkPosition({ board: boardOf({ e1: 'K', e8: 'k', a8: 'k' }) }))).toEqual({
      ok: false,
      error: 'Expected exactly one black king, found 2'
    });
  });

  it('rejects pawns on the first or last rank', () => {
    const r = tryCreatePosition(mkPosition({ board: boardOf({ ...kings, a1: 'P' }) }));
    expect(r).toEqual({ ok: false, error: 'Pawns cannot stand on the first or last rank' });
  });

  it('validates the en passant target', () => {
    const wrongRank = tryCreatePosition(mkPosition({ board: boardOf(kings), enPassantTarget: sq('e3') }));
    expect(wrongRank).toEqual({ ok: false, error: 'Invalid en passant target: en passant target must be on rank 6' });

    const noPawn = tryCreatePosition(mkPosition({ board: boardOf(kings), enPassantTarget: sq('d6') }));
    expect(noPawn).toEqual({
      ok: false,
      error: 'Invalid en passant target: en passant target has no double-stepped pawn in front of it'
    });

    const ok = tryCreatePosition(mkPosition({ board: boardOf({ ...kings, d5: 'p' }), enPassantTarget: sq('d6') }));
    expect(ok.ok).toBe(true);

    const black = tryCreatePosition(
      mkPosition({ board: boardOf({ ...kings, c4: 'P' }), sideToMove: 'b', enPassantTarget: sq('c3') })
    );
    expect(black.ok).toBe(true);
  });

  it('validates the clocks', () => {
    expect(tryCreatePosition(mkPosition({ board: boardOf(kings), halfmoveClock: -1 }))).toEqual({
      ok: false,
      error: 'Invalid halfmove clock'
    });
    expect(tryCreatePosition(mkPosition({ board: boardOf(kings), fullmoveNumber: 0 }))).toEqual({
      ok: false,
      error: 'Invalid fullmove number'
    });
  });

  it('rejects a position where the side not to move is in check', () => {
    const r = tryCreatePosition(mkPosition({ board: boardOf({ ...kings, e2: 'R' }) }));
    expect(r).toEqual({ ok: false, error: "The black king is in check but it is not black's move" });
    expect(() => createPosition(mkPosition({ board: boardOf({ ...kings, e2: 'R' }) }))).toThrow(
      "The black king is in check but it is not black's move"
    );
  });
});

describe('positionsEqual', () => {
  it('compares every field', () => {
    const start = createInitialPosition();
    expect(positionsEqual(start, fromFEN(STARTING_FEN))).toBe(true);
    expect(positionsEqual(start, { ...start, halfmoveClock: 1 })).toBe(false);
    expect(positionsEqual(start, { ...start, castling: { ...start.castling, bQ: false } })).toBe(false);
    expect(positionsEqual(start, { ...start, board: setPiece(start.board, sq('e2'), null) })).toBe(false);
  });
});

describe('nextPosition', () => {
  const start = createInitialPosition();

  it('plays a legal move and returns the executed move', () => {
    const r = nextPosition(start, { from: sq('e2'), to: sq('e4') });
    expect(r.ok && r.value.move).toEqual({ from: sq('e2'), to: sq('e4'), captured: null });
    expect(expectPosition(r).enPassantTarget).toBe(sq('e3'));
  });

  it('does not modify its input', () => {
    nextPosition(start, { from: sq('g1'), to: sq('f3') });
    expect(positionsEqual(start, createInitialPosition())).toBe(true);
  });

  it('rejects illegal moves', () => {
    expect(errorKind(nextPosition(start, { from: sq('e2'), to: sq('e5') }))).toBe('illegalMove');
    expect(errorKind(nextPosition(start, { from: sq('e4'), to: sq('e5') }))).toBe('illegalMove');

    const wrongSide = nextPosition(start, { from: sq('e7'), to: sq('e5') });
    expect(wrongSide.ok).toBe(false);
    if (!wrongSide.ok) {
      expect(wrongSide.error).toBeInstanceOf(ChessRuleError);
      expect(wrongSide.error.message).toBe("Illegal move e7e5: it is white's move");
    }
  });

  it('rejects a promotion kind on a move that does not promote', () => {
    expect(errorKind(nextPosition(start, { from: sq('e2'), to: sq('e4') }, 'q'))).toBe('invalidPromotion');
  });

  describe('promotion with check', () => {
    const fen = '2K1r3/3P1k2/8/8/8/8/8/2R5 w - - 0 1';
    const position = fromFEN(fen);
    const d7 = sq('d7');

    it('starts with white in check', () => {
      expect(isInCheck(position, 'w')).toBe(true);
    });

    it('requires a valid promotion kind', () => {
      expect(errorKind(nextPosition(position, { from: d7, to: sq('d8') }))).toBe('missingPromotion');
      expect(errorKind(nextPosition(position, { from: d7, to: sq('d8') }, 'k'))).toBe('invalidPromotion');
      expect(errorKind(nextPosition(position, { from: d7, to: sq('d8') }, 'p'))).toBe('invalidPromotion');
    });

    it('capturing on e8 checks only along queen and bishop lines', () => {
      const checks = (['q', 'r', 'b', 'n'] as const).map((kind) => {
        const next = expectPosition(nextPosition(position, { from: d7, to: sq('e8') }, kind));
        return [kind, isInCheck(next, 'b')];
      });
      expect(checks).toEqual([
        ['q', true],
        ['r', false],
        ['b', true],
        ['n', false]
      ]);
    });

    it('blocking on d8 with a knight gives check', () => {
      const knight = expectPosition(nextPosition(position, { from: d7, to: sq('d8'), promotion: 'n' }));
      expect(isInCheck(knight, 'b')).toBe(true);
      expect(isInCheck(knight, 'w')).toBe(false);

      const queen = expectPosition(nextPosition(position, { from: d7, to: sq('d8'), promotion: 'q' }));
      expect(isInCheck(queen, 'b')).toBe(false);
    });

    it('the explicit promotion argument wins over the move field', () => {
      const next = expectPosition(nextPosition(position, { from: d7, to: sq('d8'), promotion: 'q' }, 'n'));
      expect(getPiece(next.board, sq('d8'))).toEqual({ color: 'w', type: 'n' });
    });

    it('records the captured rook', () => {
      const r = nextPosition(position, { from: d7, to: sq('e8'), promotion: 'q' });
      expect(r.ok && r.value.move.captured).toEqual({ color: 'b', type: 'r' });
    });
  });
});
