import type { Logger } from "@numplace/core";
import {
  CellRef,
  Difficulty,
  GenerateOptions,
  GenerationError,
  SIZE,
  arePeers,
  generatePuzzle,
  inRange,
  randomSeed,
} from "@numplace/game-sudoku";
import { Clock, systemClock } from "./clock.js";
import { Direction, InputEvent, step } from "./input.js";
import { SavedGameService } from "./services/SavedGameService.js";
import { StatisticsService } from "./services/StatisticsService.js";
import { GameSession, SessionOptions, SessionRejection, SessionState } from "./session.js";
import { Statistics } from "./statistics.js";

export const DEFAULT_LOCALE = "en_US";

export type ControllerRejection =
  | SessionRejection
  | "invalid_transition"
  | "no_game"
  | "no_selection"
  | "no_saved_game"
  | "generation_failed";

export type DispatchResult = { ok: true } | { ok: false; reason: ControllerRejection };

export type Screen = "menu" | "board";

export interface CellView {
  row: number;
  col: number;
  value: number;
  fixed: boolean;
  notes: readonly number[];
  selected: boolean;
  /** Shares a row, column or box with the selected cell */
  peer: boolean;
  /** Holds the same non-zero value as the selected cell */
  sameValue: boolean;
  conflict: boolean;
}

export interface CompletionSummary {
  difficulty: Difficulty;
  elapsedMs: number;
  newRecord: boolean;
}

export interface RenderSnapshot {
  screen: Screen;
  /** null on the menu */
  cells: CellView[][] | null;
  selected: CellRef | null;
  completedDigits: number[];
  elapsedMs: number;
  difficulty: Difficulty | null;
  state: SessionState | null;
  notesMode: boolean;
  canUndo: boolean;
  locale: string;
  hasSavedGame: boolean;
  statistics: Statistics;
  lastCompletion: CompletionSummary | null;
}

export interface ControllerOptions {
  statistics: StatisticsService;
  savedGames: SavedGameService;
  clock?: Clock;
  /** Supplies the seed for a new game when the event carries none */
  seedSource?: () => string;
  /** Generator settings other than the seed */
  generation?: Omit<GenerateOptions, "seed">;
  /** Remove a placed digit from its peers' notes (default true) */
  autoClearNotes?: boolean;
  locale?: string;
  log?: Logger;
}

const OK: DispatchResult = { ok: true };

function reject(reason: ControllerRejection): DispatchResult {
  return { ok: false, reason };
}

/**
 * Turns input events into session calls, keeps selection and notes mode,
 * persists on pause, menu and completion, and renders snapshots for the UI.
 * Events dispatched while another is still running wait for it to finish.
 */
export class GameController {
  private readonly statistics: StatisticsService;
  private readonly savedGames: SavedGameService;
  private readonly clock: Clock;
  private readonly seedSource: () => string;
  private readonly generation: Omit<GenerateOptions, "seed">;
  private readonly sessionOptions: SessionOptions;
  private readonly log?: Logger;

  private session: GameSession | null = null;
  private selected: CellRef | null = null;
  private notesMode = false;
  private locale: string;
  private lastCompletion: CompletionSummary | null = null;
  /** Tail of the dispatch chain; settles when the latest event has */
  private pending: Promise<unknown> = Promise.resolve();

  private constructor(options: ControllerOptions) {
    this.statistics = options.statistics;
    this.savedGames = options.savedGames;
    this.clock = options.clock ?? systemClock;
    this.seedSource = options.seedSource ?? randomSeed;
    this.generation = options.generation ?? {};
    this.sessionOptions = {
      clock: this.clock,
      placeOptions: { clearPeerNotes: options.autoClearNotes ?? true },
    };
    this.locale = options.locale ?? DEFAULT_LOCALE;
    this.log = options.log;
  }

  /** Loads statistics and checks for a saved game before the first event. */
  static async create(options: ControllerOptions): Promise<GameController> {
    await options.statistics.load();
    await options.savedGames.load();
    return new GameController(options);
  }

  async dispatch(event: InputEvent): Promise<DispatchResult> {
    const run = this.pending.then(() => this.handle(event));
    // A failed event rejects its own caller and leaves the chain usable
    this.pending = run.then(
      () => undefined,
      () => undefined
    );
    const result = await run;
    if (!result.ok) {
      this.log?.debug({ event: event.type, reason: result.reason }, "Input rejected");
    }
    return result;
  }

  snapshot(): RenderSnapshot {
    const session = this.session;
    return {
      screen: session ? "board" : "menu",
      cells: session ? this.cellViews(session) : null,
      selected: this.selected ? { ...this.selected } : null,
      completedDigits: session ? session.board.completedDigits() : [],
      elapsedMs: session ? session.elapsedMs() : 0,
      difficulty: session ? session.difficulty : null,
      state: session ? session.state : null,
      notesMode: this.notesMode,
      canUndo: session ? session.canUndo() : false,
      locale: this.locale,
      hasSavedGame: this.savedGames.exists,
      statistics: this.statistics.current(),
      lastCompletion: this.lastCompletion ? { ...this.lastCompletion } : null,
    };
  }

  private async handle(event: InputEvent): Promise<DispatchResult> {
    switch (event.type) {
      case "select":
        return this.select(event.row, event.col);
      case "digit":
        return this.enter(event.digit);
      case "clear":
        return this.enter(0);
      case "arrow":
        return this.arrow(event.direction);
      case "toggle-notes":
        this.notesMode = !this.notesMode;
        return OK;
      case "pause-toggle":
        return this.togglePause();
      case "undo":
        return this.undo();
      case "new-game":
        return this.newGame(event.difficulty, event.seed ?? this.seedSource());
      case "resume-saved":
        return this.resumeSaved();
      case "language":
        this.locale = event.locale;
        return OK;
      case "menu":
        return this.toMenu();
      case "reset-stats":
        await this.statistics.reset();
        return OK;
    }
  }

  private activeSession(): GameSession | ControllerRejection {
    if (!this.session) return "no_game";
    if (this.session.state === SessionState.PAUSED) return "paused";
    return this.session;
  }

  private select(row: number, col: number): DispatchResult {
    const session = this.activeSession();
    if (typeof session === "string") return reject(session);
    if (!inRange(row, col)) return reject("out_of_range");
    this.selected = { row, col };
    return OK;
  }

  private arrow(direction: Direction): DispatchResult {
    const session = this.activeSession();
    if (typeof session === "string") return reject(session);
    this.selected = this.selected
      ? step(this.selected.row, this.selected.col, direction, SIZE)
      : { row: 0, col: 0 };
    return OK;
  }

  /** A digit (or 0 to clear) for the selected cell, as a note in notes mode */
  private async enter(digit: number): Promise<DispatchResult> {
    const session = this.activeSession();
    if (typeof session === "string") return reject(session);
    if (!this.selected) return reject("no_selection");

    const { row, col } = this.selected;
    const result =
      this.notesMode && digit !== 0
        ? session.toggleNote(row, col, digit)
        : session.place(row, col, digit);
    if (!result.ok) return reject(result.reason);

    if (result.completed) await this.complete(session);
    return OK;
  }

  private undo(): DispatchResult {
    if (!this.session) return reject("no_game");
    const result = this.session.undo();
    return result.ok ? OK : reject(result.reason);
  }

  private async togglePause(): Promise<DispatchResult> {
    const session = this.session;
    if (!session) return reject("no_game");

    if (session.state === SessionState.PAUSED) {
      const resumed = session.resume();
      return resumed.ok ? OK : reject(resumed.reason);
    }
    const paused = session.pause();
    if (!paused.ok) return reject(paused.reason);
    await this.savedGames.save(session, new Date(this.clock.now()));
    return OK;
  }

  private newGame(difficulty: Difficulty, seed: string): DispatchResult {
    let session: GameSession;
    try {
      const generated = generatePuzzle(difficulty, { ...this.generation, seed });
      session = GameSession.fromPuzzle(generated, this.sessionOptions);
      this.log?.info(
        { difficulty, seed, clues: generated.clues, attempts: generated.attempts },
        "Generated puzzle"
      );
    } catch (err) {
      if (err instanceof GenerationError) {
        this.log?.warn({ err, difficulty, seed }, "Puzzle generation failed");
        return reject("generation_failed");
      }
      throw err;
    }

    session.start();
    this.enterBoard(session);
    return OK;
  }

  private async resumeSaved(): Promise<DispatchResult> {
    const session = await this.savedGames.restore(this.sessionOptions);
    if (!session) return reject("no_saved_game");
    session.resume();
    this.enterBoard(session);
    return OK;
  }

  /** Leaves the board; an unfinished game is paused and saved first. */
  private async toMenu(): Promise<DispatchResult> {
    const session = this.session;
    if (session && session.state !== SessionState.COMPLETE) {
      session.pause();
      await this.savedGames.save(session, new Date(this.clock.now()));
    }
    this.session = null;
    this.selected = null;
    return OK;
  }

  private async complete(session: GameSession): Promise<void> {
    const elapsedMs = session.elapsedMs();
    const { newRecord } = await this.statistics.record(session.difficulty, elapsedMs);
    await this.savedGames.discard();
    this.lastCompletion = { difficulty: session.difficulty, elapsedMs, newRecord };
  }

  private enterBoard(session: GameSession): void {
    this.session = session;
    this.selected = null;
    this.notesMode = false;
    this.lastCompletion = null;
  }

  private cellViews(session: GameSession): CellView[][] {
    const board = session.board;
    const conflicts = new Set(board.conflicts().map(({ row, col }) => row * SIZE + col));
    const selected = this.selected;
    const selectedValue = selected ? board.cell(selected.row, selected.col).value : 0;

    const rows: CellView[][] = [];
    for (let row = 0; row < SIZE; row++) {
      const line: CellView[] = [];
      for (let col = 0; col < SIZE; col++) {
        const cell = board.cell(row, col);
        const isSelected = selected !== null && selected.row === row && selected.col === col;
        line.push({
          row,
          col,
          value: cell.value,
          fixed: cell.fixed,
          notes: cell.notes,
          selected: isSelected,
          peer: selected !== null && !isSelected && arePeers(selected.row, selected.col, row, col),
          sameValue: selectedValue !== 0 && cell.value === selectedValue,
          conflict: conflicts.has(row * SIZE + col),
        });
      }
      rows.push(line);
    }
    return rows;
  }
}
