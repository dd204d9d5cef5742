export type {
  Board,
  CastleSide,
  CastlingRights,
  Color,
  Move,
  MoveInput,
  Piece,
  PieceType,
  Position,
  PromotionPieceType,
  Square,
  Variant
} from './chessTypes';

export { PROMOTION_PIECE_TYPES, isPromotionPieceType, oppositeColor, piecesEqual } from './chessTypes';

export type { FileIndex, RankIndex } from './square';
export {
  FILES,
  RANKS,
  fileOf,
  fileRange,
  filesBetween,
  homeRank,
  isSquare,
  makeSquare,
  mirrorFile,
  mirrorRank,
  offsetSquare,
  oppositeFile,
  oppositeRank,
  parseAlgebraicSquare,
  parseFile,
  parseRank,
  pawnDirection,
  promotionRank,
  rankOf,
  rankRange,
  ranksBetween,
  rotateSquare,
  squareColor,
  toAlgebraic
} from './square';

export {
  boardEntries,
  boardFromGrid,
  boardsEqual,
  countPieces,
  createBoard,
  createEmptyBoard,
  createStartingBoard,
  findKing,
  flipBoardHorizontally,
  flipBoardVertically,
  getPiece,
  listPieces,
  pieceFromChar,
  pieceToChar,
  removePiece,
  setPiece,
  squaresOf,
  swapPieces
} from './board';

export { castleMove, castleRookSquares, makeMove, movesEqual, reverseMove, rotateMove } from './move';

export type { ChessRuleErrorKind, Result } from './errors';
export { ChessRuleError } from './errors';

export type { PositionResult, Transition, TransitionResult } from './position';
export {
  NO_CASTLING_RIGHTS,
  STARTING_CASTLING_RIGHTS,
  createInitialPosition,
  createPosition,
  nextPosition,
  positionsEqual,
  tryCreatePosition
} from './position';

export { attackersOf, isInCheck, isSquareAttacked, requireKing } from './attack';
export { generatePseudoLegalMoves } from './movegen';
export { findLegalMove, generateLegalMoves, hasLegalMoves, isLegalMove } from './legalMoves';
export { applyMove, capturedPiece, normalizeMove } from './applyMove';

export type { DrawKind, DrawRule, FinalResult, GameResult, GameStatus } from './gameStatus';
export {
  DRAW_RULES,
  fiftyMoveRule,
  getGameStatus,
  insufficientMaterialRule,
  isGameOver,
  parseGameResult,
  resultOf,
  resultValueFor
} from './gameStatus';

export type { GameOptions } from './gameOptions';
export { DEFAULT_GAME_OPTIONS, parseDrawRulesParam, parseVariantParam, resolveGameOptions } from './gameOptions';

export type { ExecuteResult, HistoryEntry } from './game';
export { Game } from './game';

export { perft, perftDivide } from './perft';

export type { FenParseResult } from './notation/fen';
export { STARTING_FEN, boardToFEN, fromFEN, toFEN, tryParseFEN } from './notation/fen';
export type { ParsedUciMove } from './notation/uci';
export { moveToUci, parseUciMove } from './notation/uci';
