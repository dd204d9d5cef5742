import { createInitialPosition, fromFEN, perft, perftDivide } from '../index';

describe('perft', () => {
  const start = createInitialPosition();

  it('matches the known node counts from the starting position', () => {
    expect(perft(start, 0)).toBe(1);
    expect(perft(start, 1)).toBe(20);
    expect(perft(start, 2)).toBe(400);
    expect(perft(start, 3)).toBe(8902);
  });

  it('divides the count per first move', () => {
    const divided = perftDivide(start, 2);
    expect(divided.size).toBe(20);
    expect(divided.get('e2e4')).toBe(20);
    expect(divided.get('g1f3')).toBe(20);
    expect([...divided.values()].reduce((a, b) => a + b, 0)).toBe(400);
  });

  it('counts castling and promotions', () => {
    // Both kings can castle either way; 26 moves for white.
    expect(perft(fromFEN('r3k2r/8/8/8/8/8/8/R3K2R w KQkq - 0 1'), 1)).toBe(26);
    // Four promotions plus three king moves.
    expect(perft(fromFEN('7k/P7/8/8/8/8/8/K7 w - - 0 1'), 1)).toBe(7);
  });
});
