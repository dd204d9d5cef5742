import type { Position } from './chessTypes';
import { applyMove } from './applyMove';
import { generateLegalMoves } from './legalMoves';
import { moveToUci } from './notation/uci';

/**
 * Counts the leaf nodes of the legal move tree `depth` plies deep.
 *
 * Comparing these counts with published values is the usual way to verify a
 * move generator.
 */
export function perft(position: Position, depth: number): number {
  if (depth <= 0) return 1;
  const moves = generateLegalMoves(position);
  if (depth === 1) return moves.length;

  let nodes = 0;
  for (const m of moves) {
    nodes += perft(applyMove(position, m), depth - 1);
  }
  return nodes;
}

/** Per-move breakdown of `perft`, keyed by UCI move text. */
export function perftDivide(position: Position, depth: number): Map<string, number> {
  const out = new Map<string, number>();
  if (depth <= 0) return out;
  for (const m of generateLegalMoves(position)) {
    out.set(moveToUci(m), perft(applyMove(position, m), depth - 1));
  }
  return out;
}
