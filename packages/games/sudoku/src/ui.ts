import { Move } from "./board.js";
import { SIZE, SudokuGrid, emptyGrid } from "./solver.js";

const RULE = "  +-------+-------+-------+";

/**
 * Render a grid as ASCII with box separators; blanks are drawn as ".".
 *
 *     1 2 3   4 5 6   7 8 9
 *   +-------+-------+-------+
 * 1 | 5 3 . | . 7 . | . . . |
 */
export function renderBoard(grid: SudokuGrid): string {
  const lines: string[] = [];
  lines.push("    1 2 3   4 5 6   7 8 9");
  lines.push(RULE);

  for (let r = 0; r < SIZE; r++) {
    if (r > 0 && r % 3 === 0) {
      lines.push(RULE);
    }
    let row = `${r + 1} |`;
    for (let c = 0; c < SIZE; c++) {
      if (c > 0 && c % 3 === 0) row += " |";
      const val = grid[r][c];
      row += val === 0 ? " ." : ` ${val}`;
    }
    row += " |";
    lines.push(row);
  }
  lines.push(RULE);

  return lines.join("\n");
}

/** 81 characters, row-major, "." for blanks */
export function toGridString(grid: SudokuGrid): string {
  return grid.map((row) => row.map((v) => (v === 0 ? "." : String(v))).join("")).join("");
}

/**
 * Parse an 81-character grid string ("0" or "." for blanks, whitespace ignored),
 * or return null if it is not one.
 */
export function parseGridString(raw: string): SudokuGrid | null {
  const compact = raw.replace(/\s+/g, "");
  if (!/^[0-9.]{81}$/.test(compact)) return null;
  const grid = emptyGrid();
  for (let i = 0; i < compact.length; i++) {
    const ch = compact[i];
    grid[Math.floor(i / SIZE)][i % SIZE] = ch === "." ? 0 : parseInt(ch, 10);
  }
  return grid;
}

/** Human-readable move, 1-based coordinates (e.g. "place 7 at (3,5)"). */
export function formatMove(move: Move): string {
  const at = `(${move.row + 1},${move.col + 1})`;
  if (move.kind === "note") return `note at ${at}`;
  if (move.newValue === 0) return `clear ${at}`;
  return `place ${move.newValue} at ${at}`;
}
