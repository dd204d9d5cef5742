import {
  createInitialPosition,
  fiftyMoveRule,
  getGameStatus,
  insufficientMaterialRule,
  isGameOver,
  parseGameResult,
  resultOf,
  resultValueFor
} from '../index';
import { boardOf, mkPosition } from './testUtils';

describe('game end detection', () => {
  it('the starting position is in progress', () => {
    const status = getGameStatus(createInitialPosition());
    expect(status).toEqual({ kind: 'inProgress' });
    expect(isGameOver(status)).toBe(false);
    expect(resultOf(status)).toBe('*');
  });

  it('detects checkmate (KQ vs K)', () => {
    const s = mkPosition({ board: boardOf({ f6: 'K', g7: 'Q', h8: 'k' }), sideToMove: 'b' });
    const status = getGameStatus(s);
    expect(status).toEqual({ kind: 'checkmate', winner: 'w' });
    expect(resultOf(status)).toBe('1-0');
  });

  it('detects back-rank mate for black', () => {
    const s = mkPosition({ board: boardOf({ g1: 'K', f2: 'P', g2: 'P', h2: 'P', a1: 'r', a8: 'k' }) });
    const status = getGameStatus(s);
    expect(status).toEqual({ kind: 'checkmate', winner: 'b' });
    expect(resultOf(status)).toBe('0-1');
  });

  it('detects stalemate (KQ vs K)', () => {
    const s = mkPosition({ board: boardOf({ f7: 'K', g6: 'Q', h8: 'k' }), sideToMove: 'b' });
    const status = getGameStatus(s);
    expect(status).toEqual({ kind: 'stalemate' });
    expect(isGameOver(status)).toBe(true);
    expect(resultOf(status)).toBe('1/2-1/2');
  });

  it('draw: K vs K', () => {
    const s = mkPosition({ board: boardOf({ e1: 'K', e8: 'k' }) });
    expect(getGameStatus(s)).toEqual({ kind: 'drawInsufficientMaterial' });
  });

  it('draw: K+N vs K', () => {
    const s = mkPosition({ board: boardOf({ e1: 'K', b1: 'N', e8: 'k' }) });
    expect(getGameStatus(s)).toEqual({ kind: 'drawInsufficientMaterial' });
  });

  it('draw: K+B vs K', () => {
    const s = mkPosition({ board: boardOf({ e1: 'K', c1: 'B', e8: 'k' }) });
    expect(getGameStatus(s)).toEqual({ kind: 'drawInsufficientMaterial' });
  });

  it('draw: K+B vs K+B when bishops are on the same color squares', () => {
    // c1 and f8 are both dark.
    const s = mkPosition({ board: boardOf({ e1: 'K', c1: 'B', e8: 'k', f8: 'b' }) });
    expect(getGameStatus(s)).toEqual({ kind: 'drawInsufficientMaterial' });
  });

  it('does not declare insufficient material for opposite-colored bishops', () => {
    const s = mkPosition({ board: boardOf({ e1: 'K', c1: 'B', e8: 'k', c8: 'b' }) });
    expect(getGameStatus(s).kind).toBe('inProgress');
  });

  it('a lone pawn is enough material', () => {
    const s = mkPosition({ board: boardOf({ e1: 'K', a2: 'P', e8: 'k' }) });
    expect(insufficientMaterialRule.applies(s)).toBe(false);
  });

  it('draw rules can be disabled', () => {
    const s = mkPosition({ board: boardOf({ e1: 'K', e8: 'k' }) });
    expect(getGameStatus(s, [])).toEqual({ kind: 'inProgress' });
  });

  it('the fifty-move rule applies at 100 half-moves when enabled', () => {
    const board = boardOf({ e1: 'K', a1: 'R', e8: 'k' });
    expect(getGameStatus(mkPosition({ board, halfmoveClock: 100 }))).toEqual({ kind: 'inProgress' });
    expect(getGameStatus(mkPosition({ board, halfmoveClock: 99 }), [fiftyMoveRule])).toEqual({ kind: 'inProgress' });
    expect(getGameStatus(mkPosition({ board, halfmoveClock: 100 }), [fiftyMoveRule])).toEqual({ kind: 'drawFiftyMove' });
  });

  it('checkmate takes precedence over the draw rules', () => {
    const s = mkPosition({ board: boardOf({ f6: 'K', g7: 'Q', h8: 'k' }), sideToMove: 'b', halfmoveClock: 120 });
    expect(getGameStatus(s, [fiftyMoveRule, insufficientMaterialRule])).toEqual({ kind: 'checkmate', winner: 'w' });
  });
});

describe('game results', () => {
  it('parses the three final results', () => {
    expect(parseGameResult('1-0')).toBe('1-0');
    expect(parseGameResult('0-1')).toBe('0-1');
    expect(parseGameResult(' 1/2-1/2 ')).toBe('1/2-1/2');
    expect(parseGameResult('*')).toBeNull();
    expect(parseGameResult('draw')).toBeNull();
  });

  it('scores a result for each side', () => {
    expect(resultValueFor('1-0', 'w')).toBe(1);
    expect(resultValueFor('1-0', 'b')).toBe(0);
    expect(resultValueFor('0-1', 'b')).toBe(1);
    expect(resultValueFor('0-1', 'w')).toBe(0);
    expect(resultValueFor('1/2-1/2', 'w')).toBe(0.5);
    expect(resultValueFor('1/2-1/2', 'b')).toBe(0.5);
  });
});
