import { isCellValue, isDigit, isRecord } from "./guards.js";
import {
  SIZE,
  SudokuGrid,
  cloneGrid,
  findConflicts,
  isSolved,
  isValidPlacement,
  peersOf,
} from "./solver.js";

export interface CellRef {
  row: number;
  col: number;
}

/** A read-only view of one cell */
export interface Cell {
  /** 0 = empty */
  readonly value: number;
  /** Clue cells are given by the puzzle and can never change */
  readonly fixed: boolean;
  /** Candidate digits marked by the player, ascending */
  readonly notes: readonly number[];
}

/** A change to a single cell, with everything needed to take it back */
export interface Move {
  readonly kind: "value" | "note";
  readonly row: number;
  readonly col: number;
  readonly prevValue: number;
  readonly newValue: number;
  readonly prevNotes: readonly number[];
  /** Peers that had `newValue` removed from their notes by this move */
  readonly clearedPeerNotes: readonly CellRef[];
}

export type MoveRejection =
  | "out_of_range"
  | "invalid_value"
  | "fixed_cell"
  | "cell_filled";

export type MoveResult =
  | { ok: true; move: Move }
  | { ok: false; reason: MoveRejection };

export interface PlaceOptions {
  /** Remove the placed digit from peers' notes (default true) */
  clearPeerNotes?: boolean;
}

/** Plain JSON form of a board */
export interface BoardSnapshot {
  values: number[][];
  fixed: boolean[][];
  notes: number[][][];
}

export function inRange(row: number, col: number): boolean {
  return (
    Number.isInteger(row) &&
    Number.isInteger(col) &&
    row >= 0 &&
    row < SIZE &&
    col >= 0 &&
    col < SIZE
  );
}

function sortedNotes(notes: Iterable<number>): number[] {
  return [...notes].sort((a, b) => a - b);
}

/**
 * The 9x9 playing grid: clue cells, player-entered values and notes.
 * Player values may conflict with each other; conflicts are reported by
 * `conflicts()`, not prevented.
 */
export class Board {
  private readonly values: SudokuGrid;
  private readonly fixed: boolean[][];
  private readonly notes: Set<number>[][];

  private constructor(values: SudokuGrid, fixed: boolean[][], notes: Set<number>[][]) {
    this.values = values;
    this.fixed = fixed;
    this.notes = notes;
  }

  /** A board whose non-zero cells are all clues */
  static fromPuzzle(puzzle: SudokuGrid): Board {
    return new Board(
      cloneGrid(puzzle),
      puzzle.map((row) => row.map((v) => v !== 0)),
      puzzle.map((row) => row.map(() => new Set<number>()))
    );
  }

  static fromSnapshot(snapshot: BoardSnapshot): Board {
    return new Board(
      cloneGrid(snapshot.values),
      snapshot.fixed.map((row) => [...row]),
      snapshot.notes.map((row) => row.map((n) => new Set(n)))
    );
  }

  toSnapshot(): BoardSnapshot {
    return {
      values: cloneGrid(this.values),
      fixed: this.fixed.map((row) => [...row]),
      notes: this.notes.map((row) => row.map((n) => sortedNotes(n))),
    };
  }

  clone(): Board {
    return Board.fromSnapshot(this.toSnapshot());
  }

  cell(row: number, col: number): Cell {
    if (!inRange(row, col)) {
      throw new RangeError(`Cell (${row}, ${col}) is outside the board`);
    }
    return {
      value: this.values[row][col],
      fixed: this.fixed[row][col],
      notes: sortedNotes(this.notes[row][col]),
    };
  }

  /** Current values as a grid (a copy) */
  grid(): SudokuGrid {
    return cloneGrid(this.values);
  }

  /** Only the clue cells, everything else 0 */
  puzzle(): SudokuGrid {
    return this.values.map((row, r) => row.map((v, c) => (this.fixed[r][c] ? v : 0)));
  }

  clueCount(): number {
    return this.fixed.flat().filter(Boolean).length;
  }

  emptyCount(): number {
    return this.values.flat().filter((v) => v === 0).length;
  }

  /**
   * Whether `value` could go at (row, col) without repeating a digit in the
   * row, column or box. Never mutates the board.
   */
  validate(row: number, col: number, value: number): boolean {
    if (!inRange(row, col) || !isDigit(value)) return false;
    return isValidPlacement(this.values, row, col, value);
  }

  /**
   * Writes `value` into a player cell (0 clears it) and wipes its notes.
   */
  place(row: number, col: number, value: number, options: PlaceOptions = {}): MoveResult {
    if (!inRange(row, col)) return { ok: false, reason: "out_of_range" };
    if (value !== 0 && !isDigit(value)) return { ok: false, reason: "invalid_value" };
    if (this.fixed[row][col]) return { ok: false, reason: "fixed_cell" };

    const prevValue = this.values[row][col];
    const prevNotes = sortedNotes(this.notes[row][col]);
    const clearedPeerNotes: CellRef[] = [];

    this.values[row][col] = value;
    this.notes[row][col].clear();

    if (value !== 0 && options.clearPeerNotes !== false) {
      for (const [r, c] of peersOf(row, col)) {
        if (this.notes[r][c].delete(value)) clearedPeerNotes.push({ row: r, col: c });
      }
    }

    return {
      ok: true,
      move: { kind: "value", row, col, prevValue, newValue: value, prevNotes, clearedPeerNotes },
    };
  }

  /** Adds `digit` to the notes of an empty player cell, or removes it if present. */
  toggleNote(row: number, col: number, digit: number): MoveResult {
    if (!inRange(row, col)) return { ok: false, reason: "out_of_range" };
    if (!isDigit(digit)) return { ok: false, reason: "invalid_value" };
    if (this.fixed[row][col]) return { ok: false, reason: "fixed_cell" };
    if (this.values[row][col] !== 0) return { ok: false, reason: "cell_filled" };

    const notes = this.notes[row][col];
    const prevNotes = sortedNotes(notes);
    if (!notes.delete(digit)) notes.add(digit);

    return {
      ok: true,
      move: { kind: "note", row, col, prevValue: 0, newValue: 0, prevNotes, clearedPeerNotes: [] },
    };
  }

  /** Puts back the state `move` replaced. Moves must be reverted newest first. */
  revert(move: Move): void {
    const { row, col } = move;
    this.values[row][col] = move.prevValue;
    this.notes[row][col] = new Set(move.prevNotes);
    for (const peer of move.clearedPeerNotes) {
      this.notes[peer.row][peer.col].add(move.newValue);
    }
  }

  /** Every filled cell is in place and nothing repeats */
  isComplete(): boolean {
    return isSolved(this.values);
  }

  /** Cells whose value repeats in their row, column or box */
  conflicts(): CellRef[] {
    return findConflicts(this.values).map(([row, col]) => ({ row, col }));
  }

  /** Digits that appear nine times without any conflict */
  completedDigits(): number[] {
    const conflicted = new Set(this.conflicts().map(({ row, col }) => row * SIZE + col));
    const counts = new Map<number, number>();
    for (let r = 0; r < SIZE; r++) {
      for (let c = 0; c < SIZE; c++) {
        const v = this.values[r][c];
        if (v !== 0 && !conflicted.has(r * SIZE + c)) {
          counts.set(v, (counts.get(v) ?? 0) + 1);
        }
      }
    }
    const result: number[] = [];
    for (let v = 1; v <= SIZE; v++) {
      if (counts.get(v) === SIZE) result.push(v);
    }
    return result;
  }
}

function isGridOf<T>(value: unknown, cell: (v: unknown) => v is T): value is T[][] {
  return (
    Array.isArray(value) &&
    value.length === SIZE &&
    value.every((row) => Array.isArray(row) && row.length === SIZE && row.every(cell))
  );
}

function isNoteList(v: unknown): v is number[] {
  return Array.isArray(v) && v.every(isDigit);
}

function isBoolean(v: unknown): v is boolean {
  return typeof v === "boolean";
}

export function isBoardSnapshot(value: unknown): value is BoardSnapshot {
  if (!isRecord(value)) return false;
  const { values, fixed, notes } = value;
  if (!isGridOf(values, isCellValue) || !isGridOf(fixed, isBoolean) || !isGridOf(notes, isNoteList)) {
    return false;
  }
  // A clue is never blank, and a filled cell carries no notes
  for (let r = 0; r < SIZE; r++) {
    for (let c = 0; c < SIZE; c++) {
      if (fixed[r][c] && values[r][c] === 0) return false;
      if (values[r][c] !== 0 && notes[r][c].length > 0) return false;
    }
  }
  return true;
}

function isCellRef(v: unknown): v is CellRef {
  if (!isRecord(v)) return false;
  const { row, col } = v;
  return typeof row === "number" && typeof col === "number" && inRange(row, col);
}

export function isMove(value: unknown): value is Move {
  if (!isRecord(value)) return false;
  const m = value;
  return (
    (m.kind === "value" || m.kind === "note") &&
    isCellRef(m) &&
    isCellValue(m.prevValue) &&
    isCellValue(m.newValue) &&
    isNoteList(m.prevNotes) &&
    Array.isArray(m.clearedPeerNotes) &&
    m.clearedPeerNotes.every(isCellRef)
  );
}
