import type { Difficulty } from "@numplace/game-sudoku";

export type Direction = "up" | "down" | "left" | "right";

export type InputEvent =
  | { type: "select"; row: number; col: number }
  | { type: "digit"; digit: number }
  | { type: "clear" }
  | { type: "arrow"; direction: Direction }
  | { type: "toggle-notes" }
  | { type: "pause-toggle" }
  | { type: "undo" }
  | { type: "new-game"; difficulty: Difficulty; seed?: string }
  | { type: "resume-saved" }
  | { type: "language"; locale: string }
  | { type: "menu" }
  | { type: "reset-stats" };

export type InputEventType = InputEvent["type"];

const DELTAS: Record<Direction, [number, number]> = {
  up: [-1, 0],
  down: [1, 0],
  left: [0, -1],
  right: [0, 1],
};

/** Moves one cell in `direction`, wrapping around the edges of a size x size grid. */
export function step(
  row: number,
  col: number,
  direction: Direction,
  size: number
): { row: number; col: number } {
  const [dr, dc] = DELTAS[direction];
  return {
    row: (row + dr + size) % size,
    col: (col + dc + size) % size,
  };
}
