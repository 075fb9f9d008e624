export const DIFFICULTIES = ["easy", "medium", "hard", "expert"] as const;

export type Difficulty = (typeof DIFFICULTIES)[number];

/** Number of clues left on the board for each difficulty */
export const CLUE_COUNTS: Record<Difficulty, number> = {
  easy: 46,
  medium: 38,
  hard: 30,
  expert: 26,
};

export function isDifficulty(value: unknown): value is Difficulty {
  return typeof value === "string" && DIFFICULTIES.some((difficulty) => difficulty === value);
}
