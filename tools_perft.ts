import { STARTING_FEN, tryParseFEN } from './src/domain/notation/fen';
import { perft, perftDivide } from './src/domain/perft';

/**
 * Move-generator check: prints perft node counts for a position.
 *
 * Usage: node dist/tools_perft.js <depth> [fen] [--divide]
 */

function fail(msg: string): never {
  console.error(msg);
  process.exitCode = 1;
  throw new Error(msg);
}

function main() {
  const args = process.argv.slice(2);
  const divide = args.includes('--divide');
  const [depthStr, ...fenParts] = args.filter((a) => a !== '--divide');

  const depth = Number(depthStr ?? '1');
  if (!Number.isInteger(depth) || depth < 1) fail(`Invalid depth: ${String(depthStr)}`);

  const fen = fenParts.length > 0 ? fenParts.join(' ') : STARTING_FEN;
  const parsed = tryParseFEN(fen);
  if (!parsed.ok) fail(`Invalid FEN: ${parsed.error}`);

  if (divide) {
    let total = 0;
    for (const [uci, nodes] of perftDivide(parsed.value, depth)) {
      console.log(`${uci}: ${nodes}`);
      total += nodes;
    }
    console.log(`\nNodes searched: ${total}`);
    return;
  }

  for (let d = 1; d <= depth; d++) {
    console.log(`perft(${d}) = ${perft(parsed.value, d)}`);
  }
}

main();
