export { SeededRng, randomSeed } from "./prng.js";
export {
  SIZE,
  BOX,
  emptyGrid,
  cloneGrid,
  boxOrigin,
  arePeers,
  peersOf,
  getCandidates,
  isValidPlacement,
  countSolutions,
  solve,
  findConflicts,
  isSolved,
} from "./solver.js";
export type { SudokuGrid } from "./solver.js";
export { DIFFICULTIES, CLUE_COUNTS, isDifficulty } from "./difficulty.js";
export type { Difficulty } from "./difficulty.js";
export {
  generatePuzzle,
  generateSolvedGrid,
  GenerationError,
  DEFAULT_MAX_ATTEMPTS,
  DEFAULT_STEP_BUDGET,
} from "./generator.js";
export type { GenerateOptions, GeneratedPuzzle, RemovalPolicy } from "./generator.js";
export { Board, inRange, isBoardSnapshot, isMove } from "./board.js";
export type {
  BoardSnapshot,
  Cell,
  CellRef,
  Move,
  MoveRejection,
  MoveResult,
  PlaceOptions,
} from "./board.js";
export { MoveHistory } from "./history.js";
export type { UndoResult } from "./history.js";
export { isRecord, isDigit, isCellValue } from "./guards.js";
export { renderBoard, toGridString, parseGridString, formatMove } from "./ui.js";
