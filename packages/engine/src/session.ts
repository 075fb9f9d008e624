import {
  Board,
  BoardSnapshot,
  Difficulty,
  GeneratedPuzzle,
  Move,
  MoveHistory,
  MoveRejection,
  PlaceOptions,
  SudokuGrid,
  isBoardSnapshot,
  isDifficulty,
  isMove,
  isRecord,
} from "@numplace/game-sudoku";
import { Clock, Stopwatch, systemClock } from "./clock.js";

export enum SessionState {
  NEW = "new",
  IN_PROGRESS = "in_progress",
  PAUSED = "paused",
  COMPLETE = "complete",
}

export type SessionRejection =
  | MoveRejection
  | "empty_history"
  | "not_started"
  | "paused"
  | "complete";

export type SessionMoveResult =
  | { ok: true; move: Move; completed: boolean }
  | { ok: false; reason: SessionRejection };

export type TransitionResult =
  | { ok: true; state: SessionState }
  | { ok: false; reason: "invalid_transition"; from: SessionState };

/** A partially played game as written to disk */
export interface SavedGame {
  version: 1;
  difficulty: Difficulty;
  seed: string;
  board: BoardSnapshot;
  history: Move[];
  elapsedMs: number;
  /** ISO-8601 */
  savedAt: string;
}

export interface SessionOptions {
  clock?: Clock;
  placeOptions?: PlaceOptions;
}

/** The board queries a session exposes; mutation goes through the session */
export type BoardView = Pick<
  Board,
  "cell" | "grid" | "validate" | "conflicts" | "completedDigits" | "isComplete" | "emptyCount" | "clueCount"
>;

/**
 * One game from first move to completion.
 *
 * New -> InProgress <-> Paused, and InProgress -> Complete once a
 * placement fills the board without conflicts. Board operations are only
 * accepted while InProgress.
 */
export class GameSession {
  readonly difficulty: Difficulty;
  readonly seed: string;
  private readonly _board: Board;
  private readonly history: MoveHistory;
  private readonly stopwatch: Stopwatch;
  private readonly placeOptions: PlaceOptions;
  private _state: SessionState;

  private constructor(
    board: Board,
    difficulty: Difficulty,
    seed: string,
    history: MoveHistory,
    state: SessionState,
    elapsedMs: number,
    options: SessionOptions
  ) {
    this._board = board;
    this.difficulty = difficulty;
    this.seed = seed;
    this.history = history;
    this._state = state;
    this.stopwatch = new Stopwatch(options.clock ?? systemClock, elapsedMs);
    this.placeOptions = options.placeOptions ?? {};
  }

  static fromPuzzle(generated: GeneratedPuzzle, options: SessionOptions = {}): GameSession {
    return GameSession.fromGrid(generated.puzzle, generated.difficulty, generated.seed, options);
  }

  static fromGrid(
    puzzle: SudokuGrid,
    difficulty: Difficulty,
    seed: string,
    options: SessionOptions = {}
  ): GameSession {
    return new GameSession(
      Board.fromPuzzle(puzzle),
      difficulty,
      seed,
      new MoveHistory(),
      SessionState.NEW,
      0,
      options
    );
  }

  /** A restored session starts Paused, or Complete if the board already is. */
  static fromSaved(saved: SavedGame, options: SessionOptions = {}): GameSession {
    const board = Board.fromSnapshot(saved.board);
    return new GameSession(
      board,
      saved.difficulty,
      saved.seed,
      new MoveHistory(saved.history),
      board.isComplete() ? SessionState.COMPLETE : SessionState.PAUSED,
      saved.elapsedMs,
      options
    );
  }

  get state(): SessionState {
    return this._state;
  }

  get board(): BoardView {
    return this._board;
  }

  elapsedMs(): number {
    return this.stopwatch.elapsedMs();
  }

  canUndo(): boolean {
    return this._state === SessionState.IN_PROGRESS && this.history.canUndo();
  }

  start(): TransitionResult {
    if (this._state !== SessionState.NEW) return this.invalid();
    this._state = SessionState.IN_PROGRESS;
    this.stopwatch.start();
    return { ok: true, state: this._state };
  }

  pause(): TransitionResult {
    if (this._state !== SessionState.IN_PROGRESS) return this.invalid();
    this._state = SessionState.PAUSED;
    this.stopwatch.stop();
    return { ok: true, state: this._state };
  }

  resume(): TransitionResult {
    if (this._state !== SessionState.PAUSED) return this.invalid();
    this._state = SessionState.IN_PROGRESS;
    this.stopwatch.start();
    return { ok: true, state: this._state };
  }

  place(row: number, col: number, value: number): SessionMoveResult {
    const blocked = this.blockedReason();
    if (blocked) return { ok: false, reason: blocked };

    const result = this._board.place(row, col, value, this.placeOptions);
    if (!result.ok) return result;
    this.history.push(result.move);

    const completed = this._board.isComplete();
    if (completed) {
      this._state = SessionState.COMPLETE;
      this.stopwatch.stop();
    }
    return { ok: true, move: result.move, completed };
  }

  clear(row: number, col: number): SessionMoveResult {
    return this.place(row, col, 0);
  }

  toggleNote(row: number, col: number, digit: number): SessionMoveResult {
    const blocked = this.blockedReason();
    if (blocked) return { ok: false, reason: blocked };

    const result = this._board.toggleNote(row, col, digit);
    if (!result.ok) return result;
    this.history.push(result.move);
    return { ok: true, move: result.move, completed: false };
  }

  undo(): SessionMoveResult {
    const blocked = this.blockedReason();
    if (blocked) return { ok: false, reason: blocked };

    const result = this.history.undo(this._board);
    if (!result.ok) return result;
    return { ok: true, move: result.move, completed: false };
  }

  toSaved(savedAt: Date): SavedGame {
    return {
      version: 1,
      difficulty: this.difficulty,
      seed: this.seed,
      board: this._board.toSnapshot(),
      history: this.history.toJSON(),
      elapsedMs: this.stopwatch.elapsedMs(),
      savedAt: savedAt.toISOString(),
    };
  }

  private blockedReason(): SessionRejection | null {
    switch (this._state) {
      case SessionState.IN_PROGRESS:
        return null;
      case SessionState.NEW:
        return "not_started";
      case SessionState.PAUSED:
        return "paused";
      case SessionState.COMPLETE:
        return "complete";
    }
  }

  private invalid(): TransitionResult {
    return { ok: false, reason: "invalid_transition", from: this._state };
  }
}

export function isSavedGame(value: unknown): value is SavedGame {
  if (!isRecord(value)) return false;
  const { board, history } = value;
  if (!isBoardSnapshot(board) || !Array.isArray(history) || !history.every(isMove)) return false;
  // No recorded move may touch a clue
  if (history.some((move) => board.fixed[move.row][move.col])) return false;
  return (
    value.version === 1 &&
    isDifficulty(value.difficulty) &&
    typeof value.seed === "string" &&
    typeof value.elapsedMs === "number" &&
    Number.isFinite(value.elapsedMs) &&
    value.elapsedMs >= 0 &&
    typeof value.savedAt === "string"
  );
}
