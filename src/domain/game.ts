import type { Color, Move, MoveInput, Piece, PieceType, Position, Square } from './chessTypes';
import { isInCheck } from './attack';
import type { Result } from './errors';
import { ChessRuleError } from './errors';
import type { GameOptions } from './gameOptions';
import { resolveGameOptions } from './gameOptions';
import type { GameResult, GameStatus } from './gameStatus';
import { getGameStatus, isGameOver, resultOf } from './gameStatus';
import { generateLegalMoves, isLegalMove } from './legalMoves';
import { createInitialPosition, createPosition, nextPosition } from './position';

export type HistoryEntry = {
  /** Position before the move. */
  position: Position;
  /** The executed move; `captured` is always filled in. */
  move: Move;
};

export type ExecuteResult = Result<Move, ChessRuleError>;

/**
 * A game in progress: the current position plus undo/redo history.
 *
 * Positions are immutable snapshots, so undo simply reinstates the stored one.
 * A Game is single-writer; callers sharing one must serialize execute/undo/redo.
 */
export class Game {
  readonly options: GameOptions;
  readonly startPosition: Position;

  private current: Position;
  private currentStatus: GameStatus;
  private readonly past: HistoryEntry[] = [];
  private future: Move[] = [];

  /**
   * A given start position is validated and copied, so later changes to the
   * caller's object do not reach the game. Throws when it fails validation.
   */
  constructor(options?: Partial<GameOptions>) {
    const resolved = resolveGameOptions(options);
    this.startPosition = resolved.position ? createPosition(resolved.position) : createInitialPosition(resolved.variant);
    this.options = { ...resolved, position: resolved.position ? this.startPosition : null };
    this.current = this.startPosition;
    this.currentStatus = getGameStatus(this.current, this.options.drawRules);
  }

  /** Replays `moves` from the configured start position; throws on the first illegal one. */
  static fromMoves(moves: readonly MoveInput[], options?: Partial<GameOptions>): Game {
    const game = new Game(options);
    for (const m of moves) game.execute(m);
    return game;
  }

  get position(): Position {
    return this.current;
  }

  get status(): GameStatus {
    return this.currentStatus;
  }

  get sideToMove(): Color {
    return this.current.sideToMove;
  }

  get isOver(): boolean {
    return isGameOver(this.currentStatus);
  }

  get result(): GameResult {
    return resultOf(this.currentStatus);
  }

  get history(): readonly HistoryEntry[] {
    return this.past;
  }

  get playedMoves(): Move[] {
    return this.past.map((e) => e.move);
  }

  get moveCount(): number {
    return this.past.length;
  }

  /** True when the side to move is in check. */
  isInCheck(): boolean {
    return isInCheck(this.current, this.current.sideToMove);
  }

  availableMoves(): Move[] {
    return generateLegalMoves(this.current);
  }

  movesFrom(square: Square): Move[] {
    return generateLegalMoves(this.current, square);
  }

  isLegal(move: MoveInput): boolean {
    return isLegalMove(this.current, move);
  }

  /** Pieces taken so far, optionally only those of `color`. */
  capturedPieces(color?: Color): Piece[] {
    const out: Piece[] = [];
    for (const { move } of this.past) {
      if (move.captured && (color === undefined || move.captured.color === color)) out.push(move.captured);
    }
    return out;
  }

  tryExecute(move: MoveInput, promotion?: PieceType): ExecuteResult {
    const r = this.advance(move, promotion);
    if (r.ok) this.future = [];
    return r;
  }

  /**
   * Plays `move` (with `promotion` when a pawn reaches the last rank) and returns the
   * executed move. Throws ChessRuleError and leaves the game unchanged when the move
   * cannot be played.
   */
  execute(move: MoveInput, promotion?: PieceType): Move {
    const r = this.tryExecute(move, promotion);
    if (!r.ok) throw r.error;
    return r.value;
  }

  moveToUndo(): Move | null {
    return this.past[this.past.length - 1]?.move ?? null;
  }

  moveToRedo(): Move | null {
    return this.future[this.future.length - 1] ?? null;
  }

  /** Takes back the last move and returns it, or null at the start of the game. */
  undoMove(): Move | null {
    const entry = this.past.pop();
    if (!entry) return null;
    this.current = entry.position;
    this.currentStatus = getGameStatus(this.current, this.options.drawRules);
    this.future.push(entry.move);
    return entry.move;
  }

  /** Replays the last undone move and returns it, or null when there is nothing to redo. */
  redoMove(): Move | null {
    const move = this.moveToRedo();
    if (!move) return null;
    const r = this.advance(move, move.promotion);
    if (!r.ok) throw r.error;
    this.future.pop();
    return r.value;
  }

  private advance(move: MoveInput, promotion?: PieceType): ExecuteResult {
    if (this.isOver) {
      return { ok: false, error: new ChessRuleError('gameOver', `The game is over (${this.currentStatus.kind})`, move) };
    }
    const r = nextPosition(this.current, move, promotion);
    if (!r.ok) return r;

    this.past.push({ position: this.current, move: r.value.move });
    this.current = r.value.position;
    this.currentStatus = getGameStatus(this.current, this.options.drawRules);
    return { ok: true, value: r.value.move };
  }
}
