import { SeededRng } from "./prng.js";
import { CLUE_COUNTS, Difficulty } from "./difficulty.js";
import {
  SIZE,
  SudokuGrid,
  cloneGrid,
  countSolutions,
  emptyGrid,
  getCandidates,
} from "./solver.js";

/**
 * How cells are removed from the solved grid.
 * - `strict`: a cell is only removed if the puzzle stays uniquely solvable.
 * - `relaxed`: cells are removed at random with no uniqueness check.
 */
export type RemovalPolicy = "strict" | "relaxed";

export interface GenerateOptions {
  seed: string;
  policy?: RemovalPolicy;
  /** Overrides the clue count of the difficulty */
  clues?: number;
  /** Attempts (each with a derived seed) before giving up */
  maxAttempts?: number;
  /** Backtracking steps allowed per attempt when filling the grid */
  stepBudget?: number;
}

export interface GeneratedPuzzle {
  puzzle: SudokuGrid;
  solution: SudokuGrid;
  difficulty: Difficulty;
  seed: string;
  policy: RemovalPolicy;
  clues: number;
  attempts: number;
}

export const DEFAULT_MAX_ATTEMPTS = 25;
export const DEFAULT_STEP_BUDGET = 100_000;

export class GenerationError extends Error {
  constructor(
    readonly seed: string,
    readonly difficulty: Difficulty,
    readonly attempts: number,
    readonly lastFailure: string
  ) {
    super(
      `Unable to generate a ${difficulty} puzzle from seed "${seed}" after ${attempts} attempts (${lastFailure})`
    );
    this.name = "GenerationError";
  }
}

type AttemptResult =
  | { ok: true; puzzle: SudokuGrid; solution: SudokuGrid }
  | { ok: false; failure: string };

/**
 * Generate a complete valid Sudoku grid using backtracking
 * with randomized candidate ordering (driven by PRNG for determinism).
 * Returns null when the step budget runs out first.
 */
export function generateSolvedGrid(
  rng: SeededRng,
  stepBudget: number = DEFAULT_STEP_BUDGET
): SudokuGrid | null {
  const grid = emptyGrid();
  let steps = 0;

  function fill(pos: number): boolean | null {
    if (pos === SIZE * SIZE) return true;
    if (++steps > stepBudget) return null;
    const row = Math.floor(pos / SIZE);
    const col = pos % SIZE;

    const candidates = rng.shuffle(getCandidates(grid, row, col));

    for (const v of candidates) {
      grid[row][col] = v;
      const filled = fill(pos + 1);
      if (filled !== false) return filled;
    }
    grid[row][col] = 0;
    return false;
  }

  return fill(0) ? grid : null;
}

function shuffledPositions(rng: SeededRng): [number, number][] {
  const positions: [number, number][] = [];
  for (let r = 0; r < SIZE; r++) {
    for (let c = 0; c < SIZE; c++) {
      positions.push([r, c]);
    }
  }
  return rng.shuffle(positions);
}

function attempt(
  rng: SeededRng,
  targetClues: number,
  policy: RemovalPolicy,
  stepBudget: number
): AttemptResult {
  const solution = generateSolvedGrid(rng, stepBudget);
  if (!solution) return { ok: false, failure: "step budget exhausted" };

  const puzzle = cloneGrid(solution);
  let cluesRemaining = SIZE * SIZE;

  for (const [r, c] of shuffledPositions(rng)) {
    if (cluesRemaining <= targetClues) break;

    const saved = puzzle[r][c];
    puzzle[r][c] = 0;

    if (policy === "strict" && countSolutions(puzzle, 2) !== 1) {
      // Removing this cell creates multiple solutions; restore it
      puzzle[r][c] = saved;
    } else {
      cluesRemaining--;
    }
  }

  if (cluesRemaining !== targetClues) {
    return { ok: false, failure: `stuck at ${cluesRemaining} clues` };
  }
  return { ok: true, puzzle, solution };
}

/**
 * Generate a Sudoku puzzle by removing cells from a solved grid until exactly
 * the difficulty's clue count is left. Failed attempts are retried with seeds
 * derived from `options.seed`; the first attempt uses the seed as given.
 *
 * @throws GenerationError when every attempt fails.
 */
export function generatePuzzle(
  difficulty: Difficulty,
  options: GenerateOptions
): GeneratedPuzzle {
  const policy = options.policy ?? "strict";
  const clues = options.clues ?? CLUE_COUNTS[difficulty];
  const maxAttempts = options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS;
  const stepBudget = options.stepBudget ?? DEFAULT_STEP_BUDGET;

  if (!Number.isInteger(clues) || clues < 0 || clues > SIZE * SIZE) {
    throw new RangeError(`Invalid clue count: ${clues}`);
  }

  const base = new SeededRng(options.seed);
  let lastFailure = "no attempts made";

  for (let i = 0; i < maxAttempts; i++) {
    const rng = i === 0 ? base : base.derive(i);
    const result = attempt(rng, clues, policy, stepBudget);
    if (result.ok) {
      return {
        puzzle: result.puzzle,
        solution: result.solution,
        difficulty,
        seed: options.seed,
        policy,
        clues,
        attempts: i + 1,
      };
    }
    lastFailure = result.failure;
  }

  throw new GenerationError(options.seed, difficulty, maxAttempts, lastFailure);
}
