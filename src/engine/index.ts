export { Game } from "./game";
export {
  cellIndex,
  inBounds,
  neighbours,
  mineCountForArea,
  checkSize,
  checkDimensions,
  createGrid,
  placeMines,
  neighbourMineCount,
} from "./board";
export { createRng, randomIndex } from "./rng";
export type { RandomSource } from "./rng";
export { BoardError } from "./errors";
export type { BoardErrorCode } from "./errors";
export { renderBoard, cellGlyph, GLYPHS } from "./render";
export type {
  CellState,
  CellKind,
  BoardLevel,
  BoardSize,
  DensityCurve,
  GameOptions,
  Pos,
} from "./types";
export {
  GamePhase,
  DEFAULT_OPTIONS,
  DEFAULT_DENSITY,
  BOARD_LEVELS,
  isBoardLevel,
  unknown,
  known,
  flagged,
  questioned,
  counted,
} from "./types";
