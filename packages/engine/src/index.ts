export { systemClock, Stopwatch } from "./clock.js";
export type { Clock } from "./clock.js";

export { GameSession, SessionState, isSavedGame } from "./session.js";
export type {
  BoardView,
  SavedGame,
  SessionMoveResult,
  SessionOptions,
  SessionRejection,
  TransitionResult,
} from "./session.js";

export { step } from "./input.js";
export type { Direction, InputEvent, InputEventType } from "./input.js";

export {
  emptyStatistics,
  emptyDifficultyStats,
  recordCompletion,
  isDifficultyStats,
  parseStatistics,
} from "./statistics.js";
export type { CompletionRecord, DifficultyStats, Statistics } from "./statistics.js";

export { StatisticsRepository, STATISTICS_KEY } from "./repositories/StatisticsRepository.js";
export { SavedGameRepository, SAVED_GAME_KEY } from "./repositories/SavedGameRepository.js";
export { StatisticsService } from "./services/StatisticsService.js";
export { SavedGameService } from "./services/SavedGameService.js";

export { GameController, DEFAULT_LOCALE } from "./controller.js";
export type {
  CellView,
  CompletionSummary,
  ControllerOptions,
  ControllerRejection,
  DispatchResult,
  RenderSnapshot,
  Screen,
} from "./controller.js";
