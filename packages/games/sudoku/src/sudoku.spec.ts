import { strict as assert } from "assert";
import { SeededRng } from "./prng.js";
import {
  SudokuGrid,
  cloneGrid,
  countSolutions,
  emptyGrid,
  findConflicts,
  getCandidates,
  isSolved,
  isValidPlacement,
  peersOf,
  solve,
} from "./solver.js";
import { GenerationError, generatePuzzle } from "./generator.js";
import { CLUE_COUNTS, DIFFICULTIES, isDifficulty } from "./difficulty.js";
import { Board, Move, MoveResult, isBoardSnapshot, isMove } from "./board.js";
import { MoveHistory } from "./history.js";
import { formatMove, parseGridString, renderBoard, toGridString } from "./ui.js";

/** A valid solved grid built from the shifted-row pattern */
const SOLVED: SudokuGrid = Array.from({ length: 9 }, (_, r) =>
  Array.from({ length: 9 }, (_, c) => ((r * 3 + Math.floor(r / 3) + c) % 9) + 1)
);

function moveOf(result: MoveResult): Move {
  if (!result.ok) throw new assert.AssertionError({ message: `move rejected: ${result.reason}` });
  return result.move;
}

function puzzleWithBlanks(...cells: [number, number][]): SudokuGrid {
  const grid = cloneGrid(SOLVED);
  for (const [r, c] of cells) grid[r][c] = 0;
  return grid;
}

describe("SeededRng", () => {
  it("produces deterministic output for the same seed", () => {
    const a = new SeededRng("test-seed");
    const b = new SeededRng("test-seed");
    for (let i = 0; i < 100; i++) {
      assert.equal(a.next(), b.next());
    }
  });

  it("produces different output for different seeds", () => {
    const a = new SeededRng("seed-a");
    const b = new SeededRng("seed-b");
    let same = 0;
    for (let i = 0; i < 100; i++) {
      if (a.next() === b.next()) same++;
    }
    assert.ok(same < 10, "Expected mostly different values");
  });

  it("shuffle is deterministic", () => {
    const arr1 = new SeededRng("shuffle").shuffle([1, 2, 3, 4, 5, 6, 7, 8, 9]);
    const arr2 = new SeededRng("shuffle").shuffle([1, 2, 3, 4, 5, 6, 7, 8, 9]);
    assert.deepEqual(arr1, arr2);
    assert.deepEqual([...arr1].sort(), [1, 2, 3, 4, 5, 6, 7, 8, 9]);
  });

  it("derive appends the label to the seed", () => {
    assert.equal(new SeededRng("base").derive(3).seed, "base#3");
  });
});

describe("Solver", () => {
  it("getCandidates returns correct values for empty grid", () => {
    assert.deepEqual(getCandidates(emptyGrid(), 0, 0), [1, 2, 3, 4, 5, 6, 7, 8, 9]);
  });

  it("getCandidates excludes row/col/box values", () => {
    const grid = emptyGrid();
    grid[0][1] = 5; // same row
    grid[3][0] = 3; // same col
    grid[1][1] = 7; // same box
    assert.deepEqual(getCandidates(grid, 0, 0), [1, 2, 4, 6, 8, 9]);
  });

  it("isValidPlacement detects conflicts", () => {
    const grid = emptyGrid();
    grid[0][0] = 5;
    assert.equal(isValidPlacement(grid, 0, 1, 5), false); // same row
    assert.equal(isValidPlacement(grid, 1, 0, 5), false); // same col
    assert.equal(isValidPlacement(grid, 1, 1, 5), false); // same box
    assert.equal(isValidPlacement(grid, 0, 1, 3), true); // no conflict
  });

  it("isValidPlacement ignores the target cell itself", () => {
    assert.equal(isValidPlacement(SOLVED, 4, 4, SOLVED[4][4]), true);
  });

  it("peersOf lists the 20 peers of a cell", () => {
    const peers = peersOf(4, 4);
    assert.equal(peers.length, 20);
    assert.ok(!peers.some(([r, c]) => r === 4 && c === 4));
  });

  it("isSolved rejects incomplete grid", () => {
    assert.equal(isSolved(emptyGrid()), false);
  });

  it("isSolved accepts a valid solution", () => {
    assert.equal(isSolved(SOLVED), true);
  });

  it("countSolutions caps at the limit", () => {
    assert.equal(countSolutions(SOLVED), 1);
    assert.equal(countSolutions(emptyGrid(), 2), 2);
  });

  it("countSolutions is 0 when the clues already conflict", () => {
    const grid = emptyGrid();
    grid[0][0] = 4;
    grid[0][8] = 4;
    assert.equal(countSolutions(grid), 0);
  });

  it("solve fills the blanks", () => {
    assert.deepEqual(solve(puzzleWithBlanks([0, 0], [4, 4], [8, 8])), SOLVED);
  });

  it("findConflicts lists both cells of a repeat", () => {
    const grid = emptyGrid();
    grid[2][2] = 6;
    grid[2][7] = 6;
    assert.deepEqual(findConflicts(grid), [
      [2, 2],
      [2, 7],
    ]);
  });
});

describe("Generator", () => {
  it("generates a valid puzzle with a unique solution", () => {
    const { puzzle, solution } = generatePuzzle("medium", { seed: "gen-test" });
    assert.equal(isSolved(solution), true);
    assert.deepEqual(findConflicts(puzzle), []);
    assert.equal(countSolutions(puzzle, 2), 1);
  });

  it("is deterministic: same seed produces same puzzle", () => {
    const a = generatePuzzle("medium", { seed: "determinism" });
    const b = generatePuzzle("medium", { seed: "determinism" });
    assert.deepEqual(a.puzzle, b.puzzle);
    assert.deepEqual(a.solution, b.solution);
  });

  it("clues match the solution they were cut from", () => {
    const { puzzle, solution } = generatePuzzle("easy", { seed: "clues" });
    for (let r = 0; r < 9; r++) {
      for (let c = 0; c < 9; c++) {
        if (puzzle[r][c] !== 0) assert.equal(puzzle[r][c], solution[r][c]);
      }
    }
  });

  for (const difficulty of DIFFICULTIES) {
    it(`${difficulty} puzzles have exactly ${CLUE_COUNTS[difficulty]} clues and one solution`, () => {
      const result = generatePuzzle(difficulty, { seed: `${difficulty}-count` });
      const clues = result.puzzle.flat().filter((v) => v !== 0).length;
      assert.equal(clues, CLUE_COUNTS[difficulty]);
      assert.equal(result.clues, CLUE_COUNTS[difficulty]);
      assert.deepEqual(findConflicts(result.puzzle), []);
      assert.equal(countSolutions(result.puzzle, 2), 1);
    });
  }

  it("a 30-clue puzzle leaves 51 empty cells and one solution", () => {
    const { puzzle } = generatePuzzle("easy", { seed: "thirty", clues: 30 });
    assert.equal(Board.fromPuzzle(puzzle).emptyCount(), 51);
    assert.equal(countSolutions(puzzle, 2), 1);
  });

  it("relaxed policy removes down to the clue count without solving", () => {
    const result = generatePuzzle("expert", { seed: "relaxed", policy: "relaxed", clues: 21 });
    assert.equal(result.policy, "relaxed");
    assert.equal(result.attempts, 1);
    assert.equal(result.puzzle.flat().filter((v) => v !== 0).length, 21);
    assert.deepEqual(findConflicts(result.puzzle), []);
  });

  it("throws GenerationError once the attempts are used up", () => {
    assert.throws(
      () => generatePuzzle("easy", { seed: "budget", stepBudget: 5, maxAttempts: 3 }),
      (err: unknown) =>
        err instanceof GenerationError &&
        err.attempts === 3 &&
        err.seed === "budget" &&
        err.lastFailure === "step budget exhausted"
    );
  });

  it("rejects impossible clue counts", () => {
    assert.throws(() => generatePuzzle("easy", { seed: "x", clues: 82 }), RangeError);
  });

  it("isDifficulty accepts only known levels", () => {
    assert.equal(isDifficulty("expert"), true);
    assert.equal(isDifficulty("extreme"), false);
    assert.equal(isDifficulty(2), false);
  });
});

describe("Board", () => {
  it("treats the puzzle's digits as fixed clues", () => {
    const board = Board.fromPuzzle(puzzleWithBlanks([0, 0]));
    assert.deepEqual(board.cell(0, 0), { value: 0, fixed: false, notes: [] });
    assert.deepEqual(board.cell(0, 1), { value: 2, fixed: true, notes: [] });
    assert.equal(board.clueCount(), 80);
    assert.equal(board.emptyCount(), 1);
  });

  it("validate checks row, column and box without mutating", () => {
    const board = Board.fromPuzzle(puzzleWithBlanks([0, 0], [0, 1]));
    assert.equal(board.validate(0, 0, 1), true);
    assert.equal(board.validate(0, 0, 2), false); // 2 sits at (3,0)
    assert.equal(board.validate(0, 0, 3), false); // 3 sits at (0,2)
    assert.equal(board.validate(0, 0, 0), false);
    assert.equal(board.validate(9, 0, 1), false);
    assert.equal(board.cell(0, 0).value, 0);
  });

  it("place rejects clues, bad coordinates and bad digits", () => {
    const board = Board.fromPuzzle(puzzleWithBlanks([0, 0]));
    assert.deepEqual(board.place(0, 2, 1), { ok: false, reason: "fixed_cell" });
    assert.deepEqual(board.place(9, 0, 1), { ok: false, reason: "out_of_range" });
    assert.deepEqual(board.place(0, -1, 1), { ok: false, reason: "out_of_range" });
    assert.deepEqual(board.place(0, 0, 10), { ok: false, reason: "invalid_value" });
  });

  it("place writes the value, clears the cell's notes and records the move", () => {
    const board = Board.fromPuzzle(puzzleWithBlanks([0, 0]));
    board.toggleNote(0, 0, 1);
    board.toggleNote(0, 0, 7);
    const result = board.place(0, 0, 1);
    assert.deepEqual(result, {
      ok: true,
      move: {
        kind: "value",
        row: 0,
        col: 0,
        prevValue: 0,
        newValue: 1,
        prevNotes: [1, 7],
        clearedPeerNotes: [],
      },
    });
    assert.deepEqual(board.cell(0, 0), { value: 1, fixed: false, notes: [] });
  });

  it("place removes the digit from peers' notes", () => {
    const board = Board.fromPuzzle(puzzleWithBlanks([0, 0], [0, 1], [1, 0]));
    board.toggleNote(0, 1, 1);
    board.toggleNote(1, 0, 1);
    board.toggleNote(1, 0, 4);
    const move = moveOf(board.place(0, 0, 1));
    assert.deepEqual(move.clearedPeerNotes, [
      { row: 0, col: 1 },
      { row: 1, col: 0 },
    ]);
    assert.deepEqual(board.cell(0, 1).notes, []);
    assert.deepEqual(board.cell(1, 0).notes, [4]);
  });

  it("place can leave peers' notes alone", () => {
    const board = Board.fromPuzzle(puzzleWithBlanks([0, 0], [0, 1]));
    board.toggleNote(0, 1, 1);
    board.place(0, 0, 1, { clearPeerNotes: false });
    assert.deepEqual(board.cell(0, 1).notes, [1]);
  });

  it("place then undo restores the exact prior state", () => {
    const board = Board.fromPuzzle(puzzleWithBlanks([0, 0], [0, 1], [1, 0], [4, 4]));
    const history = new MoveHistory();
    for (const [r, c, d] of [
      [0, 1, 1],
      [1, 0, 1],
      [1, 0, 7],
      [0, 0, 3],
    ]) {
      history.push(moveOf(board.toggleNote(r, c, d)));
    }
    const before = board.toSnapshot();

    history.push(moveOf(board.place(0, 0, 1)));
    assert.notDeepEqual(board.toSnapshot(), before);

    assert.equal(history.undo(board).ok, true);
    assert.deepEqual(board.toSnapshot(), before);
  });

  it("toggleNote twice restores the original notes", () => {
    const board = Board.fromPuzzle(puzzleWithBlanks([0, 0]));
    board.toggleNote(0, 0, 4);
    const before = board.cell(0, 0).notes;
    board.toggleNote(0, 0, 5);
    assert.deepEqual(board.cell(0, 0).notes, [4, 5]);
    board.toggleNote(0, 0, 5);
    assert.deepEqual(board.cell(0, 0).notes, before);
  });

  it("toggleNote never touches filled or fixed cells", () => {
    const board = Board.fromPuzzle(puzzleWithBlanks([0, 0]));
    board.place(0, 0, 1);
    assert.deepEqual(board.toggleNote(0, 0, 3), { ok: false, reason: "cell_filled" });
    assert.deepEqual(board.toggleNote(0, 2, 3), { ok: false, reason: "fixed_cell" });
    assert.deepEqual(board.toggleNote(0, 0, 0), { ok: false, reason: "invalid_value" });
    assert.deepEqual(board.cell(0, 0).notes, []);
  });

  it("isComplete only once every cell is filled without repeats", () => {
    const board = Board.fromPuzzle(puzzleWithBlanks([0, 0], [0, 1]));
    board.place(0, 0, 1);
    assert.equal(board.isComplete(), false);
    board.place(0, 1, 2);
    assert.equal(board.isComplete(), true);
  });

  it("a full board with a repeat is not complete", () => {
    const board = Board.fromPuzzle(puzzleWithBlanks([0, 0], [0, 1]));
    board.place(0, 0, 2);
    board.place(0, 1, 1);
    assert.equal(board.emptyCount(), 0);
    assert.equal(board.isComplete(), false);
  });

  it("conflicts and completedDigits reflect repeats", () => {
    const board = Board.fromPuzzle(puzzleWithBlanks([0, 0], [0, 1]));
    assert.deepEqual(board.completedDigits(), [3, 4, 5, 6, 7, 8, 9]);
    board.place(0, 0, 2);
    assert.deepEqual(board.conflicts(), [
      { row: 0, col: 0 },
      { row: 3, col: 0 },
    ]);
    assert.deepEqual(board.completedDigits(), [3, 4, 5, 6, 7, 8, 9]);
  });

  it("snapshots round-trip and are validated", () => {
    const board = Board.fromPuzzle(puzzleWithBlanks([0, 0], [5, 5]));
    board.toggleNote(5, 5, 2);
    const snapshot = JSON.parse(JSON.stringify(board.toSnapshot()));
    assert.equal(isBoardSnapshot(snapshot), true);
    assert.deepEqual(Board.fromSnapshot(snapshot).toSnapshot(), board.toSnapshot());

    assert.equal(isBoardSnapshot(null), false);
    assert.equal(isBoardSnapshot({ values: [], fixed: [], notes: [] }), false);
    const blankClue = board.toSnapshot();
    blankClue.values[0][1] = 0;
    assert.equal(isBoardSnapshot(blankClue), false);
    const notedValue = board.toSnapshot();
    notedValue.notes[0][1] = [3];
    assert.equal(isBoardSnapshot(notedValue), false);
  });

  it("isMove recognises recorded moves", () => {
    const board = Board.fromPuzzle(puzzleWithBlanks([0, 0]));
    const move = moveOf(board.place(0, 0, 1));
    assert.equal(isMove(JSON.parse(JSON.stringify(move))), true);
    assert.equal(isMove({ row: 0, col: 0 }), false);
  });
});

describe("MoveHistory", () => {
  it("reports an empty history instead of failing", () => {
    const board = Board.fromPuzzle(puzzleWithBlanks([0, 0]));
    const history = new MoveHistory();
    assert.equal(history.canUndo(), false);
    assert.deepEqual(history.undo(board), { ok: false, reason: "empty_history" });
  });

  it("undoes newest first", () => {
    const board = Board.fromPuzzle(puzzleWithBlanks([0, 0]));
    const history = new MoveHistory();
    for (const value of [5, 1]) {
      history.push(moveOf(board.place(0, 0, value)));
    }
    assert.equal(history.size, 2);
    history.undo(board);
    assert.equal(board.cell(0, 0).value, 5);
    history.undo(board);
    assert.equal(board.cell(0, 0).value, 0);
    assert.equal(history.size, 0);
  });
});

describe("ui", () => {
  it("renderBoard draws rows with box separators", () => {
    const lines = renderBoard(SOLVED).split("\n");
    assert.equal(lines.length, 14);
    assert.equal(lines[0], "    1 2 3   4 5 6   7 8 9");
    assert.equal(lines[1], "  +-------+-------+-------+");
    assert.equal(lines[2], "1 | 1 2 3 | 4 5 6 | 7 8 9 |");
    assert.equal(lines[6], "4 | 2 3 4 | 5 6 7 | 8 9 1 |");
  });

  it("renderBoard shows blanks as dots", () => {
    const lines = renderBoard(puzzleWithBlanks([0, 0], [0, 4])).split("\n");
    assert.equal(lines[2], "1 | . 2 3 | 4 . 6 | 7 8 9 |");
  });

  it("grid strings round-trip", () => {
    const grid = puzzleWithBlanks([0, 0]);
    const text = toGridString(grid);
    assert.equal(text.length, 81);
    assert.equal(text.slice(0, 9), ".23456789");
    assert.deepEqual(parseGridString(text), grid);
    assert.equal(parseGridString("123"), null);
  });

  it("formatMove produces readable strings", () => {
    const base = { row: 2, col: 4, prevValue: 0, prevNotes: [], clearedPeerNotes: [] };
    assert.equal(formatMove({ ...base, kind: "value", newValue: 7 }), "place 7 at (3,5)");
    assert.equal(formatMove({ ...base, kind: "value", newValue: 0 }), "clear (3,5)");
    assert.equal(formatMove({ ...base, kind: "note", newValue: 0 }), "note at (3,5)");
  });
});
