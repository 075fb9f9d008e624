export type SudokuGrid = number[][]; // 9x9, values 0 (empty) or 1-9

export const SIZE = 9;
export const BOX = 3;

/** A fresh 9x9 grid of zeros */
export function emptyGrid(): SudokuGrid {
  return Array.from({ length: SIZE }, () => Array<number>(SIZE).fill(0));
}

/** Clone a 9x9 grid */
export function cloneGrid(grid: readonly (readonly number[])[]): SudokuGrid {
  return grid.map((row) => [...row]);
}

/** Top-left corner of the box containing (row, col) */
export function boxOrigin(row: number, col: number): [number, number] {
  return [Math.floor(row / BOX) * BOX, Math.floor(col / BOX) * BOX];
}

/** Whether two cells share a row, column or box (a cell is not its own peer) */
export function arePeers(r1: number, c1: number, r2: number, c2: number): boolean {
  if (r1 === r2 && c1 === c2) return false;
  if (r1 === r2 || c1 === c2) return true;
  const [br1, bc1] = boxOrigin(r1, c1);
  const [br2, bc2] = boxOrigin(r2, c2);
  return br1 === br2 && bc1 === bc2;
}

/** All 20 peers of (row, col), in row-major order */
export function peersOf(row: number, col: number): [number, number][] {
  const result: [number, number][] = [];
  for (let r = 0; r < SIZE; r++) {
    for (let c = 0; c < SIZE; c++) {
      if (arePeers(row, col, r, c)) result.push([r, c]);
    }
  }
  return result;
}

/** Find candidate digits for cell (row, col) */
export function getCandidates(
  grid: SudokuGrid,
  row: number,
  col: number
): number[] {
  const used = new Set<number>();

  // Row
  for (let c = 0; c < SIZE; c++) if (grid[row][c]) used.add(grid[row][c]);
  // Column
  for (let r = 0; r < SIZE; r++) if (grid[r][col]) used.add(grid[r][col]);
  // 3x3 box
  const [br, bc] = boxOrigin(row, col);
  for (let r = br; r < br + BOX; r++) {
    for (let c = bc; c < bc + BOX; c++) {
      if (grid[r][c]) used.add(grid[r][c]);
    }
  }

  const result: number[] = [];
  for (let v = 1; v <= SIZE; v++) {
    if (!used.has(v)) result.push(v);
  }
  return result;
}

/**
 * Check if placing value at (row, col) is valid. The cell itself is skipped,
 * so re-checking a digit that is already in place does not conflict with itself.
 */
export function isValidPlacement(
  grid: SudokuGrid,
  row: number,
  col: number,
  value: number
): boolean {
  for (let c = 0; c < SIZE; c++) {
    if (c !== col && grid[row][c] === value) return false;
  }
  for (let r = 0; r < SIZE; r++) {
    if (r !== row && grid[r][col] === value) return false;
  }
  const [br, bc] = boxOrigin(row, col);
  for (let r = br; r < br + BOX; r++) {
    for (let c = bc; c < bc + BOX; c++) {
      if ((r !== row || c !== col) && grid[r][c] === value) return false;
    }
  }
  return true;
}

/**
 * Picks the empty cell with the fewest candidates, or null when the grid is full.
 * A cell with no candidates at all is returned immediately (dead end).
 */
function mostConstrainedCell(
  grid: SudokuGrid
): { row: number; col: number; candidates: number[] } | null {
  let best: { row: number; col: number; candidates: number[] } | null = null;
  for (let r = 0; r < SIZE; r++) {
    for (let c = 0; c < SIZE; c++) {
      if (grid[r][c] !== 0) continue;
      const candidates = getCandidates(grid, r, c);
      if (!best || candidates.length < best.candidates.length) {
        best = { row: r, col: c, candidates };
        if (candidates.length <= 1) return best;
      }
    }
  }
  return best;
}

/**
 * Count solutions up to `limit`. Returns the count (capped at limit).
 * Used to verify unique solution during puzzle generation.
 */
export function countSolutions(grid: SudokuGrid, limit: number = 2): number {
  const g = cloneGrid(grid);
  let count = 0;

  function solve(): boolean {
    const cell = mostConstrainedCell(g);
    if (!cell) {
      count++;
      return count >= limit;
    }
    for (const v of cell.candidates) {
      g[cell.row][cell.col] = v;
      if (solve()) return true;
      g[cell.row][cell.col] = 0;
    }
    return false;
  }

  if (findConflicts(g).length > 0) return 0;
  solve();
  return count;
}

/** Returns the first solution found, or null if the grid has none. */
export function solve(grid: SudokuGrid): SudokuGrid | null {
  const g = cloneGrid(grid);
  if (findConflicts(g).length > 0) return null;

  function fill(): boolean {
    const cell = mostConstrainedCell(g);
    if (!cell) return true;
    for (const v of cell.candidates) {
      g[cell.row][cell.col] = v;
      if (fill()) return true;
    }
    g[cell.row][cell.col] = 0;
    return false;
  }

  return fill() ? g : null;
}

/**
 * Every non-empty cell whose value also appears in one of its peers,
 * in row-major order.
 */
export function findConflicts(grid: SudokuGrid): [number, number][] {
  const result: [number, number][] = [];
  for (let r = 0; r < SIZE; r++) {
    for (let c = 0; c < SIZE; c++) {
      const val = grid[r][c];
      if (val !== 0 && !isValidPlacement(grid, r, c, val)) {
        result.push([r, c]);
      }
    }
  }
  return result;
}

/** Check if the grid is completely and correctly solved */
export function isSolved(grid: SudokuGrid): boolean {
  for (let r = 0; r < SIZE; r++) {
    for (let c = 0; c < SIZE; c++) {
      if (grid[r][c] === 0) return false;
    }
  }
  // Verify all rows
  for (let r = 0; r < SIZE; r++) {
    const rowSet = new Set(grid[r]);
    if (rowSet.size !== SIZE) return false;
  }
  // Verify all columns
  for (let c = 0; c < SIZE; c++) {
    const colSet = new Set<number>();
    for (let r = 0; r < SIZE; r++) colSet.add(grid[r][c]);
    if (colSet.size !== SIZE) return false;
  }
  // Verify all 3x3 boxes
  for (let br = 0; br < SIZE; br += BOX) {
    for (let bc = 0; bc < SIZE; bc += BOX) {
      const boxSet = new Set<number>();
      for (let r = br; r < br + BOX; r++) {
        for (let c = bc; c < bc + BOX; c++) {
          boxSet.add(grid[r][c]);
        }
      }
      if (boxSet.size !== SIZE) return false;
    }
  }
  return true;
}
