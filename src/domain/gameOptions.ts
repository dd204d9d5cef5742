import type { Position, Variant } from './chessTypes';
import type { DrawKind, DrawRule } from './gameStatus';
import { DRAW_RULES, insufficientMaterialRule } from './gameStatus';

export type GameOptions = {
  /** Board population used when no start position is given. */
  variant: Variant;
  /** Start position; overrides `variant`. */
  position: Position | null;
  /** Draw conditions consulted in order after every move. */
  drawRules: readonly DrawRule[];
};

export const DEFAULT_GAME_OPTIONS: GameOptions = {
  variant: 'standard',
  position: null,
  drawRules: [insufficientMaterialRule]
};

export function resolveGameOptions(partial?: Partial<GameOptions>): GameOptions {
  return {
    variant: partial?.variant ?? DEFAULT_GAME_OPTIONS.variant,
    position: partial?.position ?? DEFAULT_GAME_OPTIONS.position,
    drawRules: partial?.drawRules ?? DEFAULT_GAME_OPTIONS.drawRules
  };
}

const DRAW_PARAM_NAMES = new Map<string, DrawKind>([
  ['insufficient', 'drawInsufficientMaterial'],
  ['insufficientMaterial', 'drawInsufficientMaterial'],
  ['fifty', 'drawFiftyMove'],
  ['fiftyMove', 'drawFiftyMove']
]);

/**
 * Parses a comma-separated list of draw rules, e.g. "insufficientMaterial,fiftyMove".
 * "none" disables draw rules. Returns null for unknown names.
 */
export function parseDrawRulesParam(param: string | null): DrawRule[] | null {
  if (param === null) return null;
  const t = param.trim();
  if (t === 'none') return [];
  const out: DrawRule[] = [];
  for (const name of t.split(',').map((s) => s.trim())) {
    const kind = DRAW_PARAM_NAMES.get(name);
    if (!kind) return null;
    if (!out.includes(DRAW_RULES[kind])) out.push(DRAW_RULES[kind]);
  }
  return out;
}

export function parseVariantParam(param: string | null): Variant | null {
  if (param === 'standard' || param === 'upsideDown') return param;
  return null;
}
