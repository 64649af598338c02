export { Board } from './Board.ts';
export type {
  CellValue,
  Digit,
  EliminationResult
} from './Cell.ts';
export {
  Cell,
  DIGITS,
  PLACEHOLDER_GLYPH
} from './Cell.ts';
export {
  InvalidAssignmentError,
  OverwriteError,
  ParseError,
  SudokuError,
  UnsolvableError
} from './errors.ts';
export type {
  Point,
  Unit,
  UnitType
} from './geometry.ts';
export {
  adjacentCells,
  allPoints,
  allUnits,
  formatPoint
} from './geometry.ts';
export type { BoardSpec } from './loader.ts';
export {
  listBoardFiles,
  loadBoard,
  loadBoardSpec
} from './loader.ts';
export { renderBoardLines } from './renderer.ts';
export type {
  SolveObserver,
  SolveOptions
} from './solver.ts';
export { solve } from './solver.ts';
export type {
  Guess,
  GuessStrategy
} from './strategies/GuessStrategy.ts';
export { MostConstrainedGuessStrategy } from './strategies/MostConstrainedGuessStrategy.ts';
