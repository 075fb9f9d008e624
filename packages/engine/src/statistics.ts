import { DIFFICULTIES, Difficulty, isRecord } from "@numplace/game-sudoku";

export interface DifficultyStats {
  completed: number;
  /** null until the first completion */
  bestMs: number | null;
  totalMs: number;
  averageMs: number | null;
}

export type Statistics = Record<Difficulty, DifficultyStats>;

export interface CompletionRecord {
  stats: Statistics;
  newRecord: boolean;
}

export function emptyDifficultyStats(): DifficultyStats {
  return { completed: 0, bestMs: null, totalMs: 0, averageMs: null };
}

export function emptyStatistics(): Statistics {
  return {
    easy: emptyDifficultyStats(),
    medium: emptyDifficultyStats(),
    hard: emptyDifficultyStats(),
    expert: emptyDifficultyStats(),
  };
}

/**
 * Folds one finished game into the statistics. Returns a new object; the
 * input is left untouched.
 */
export function recordCompletion(
  stats: Statistics,
  difficulty: Difficulty,
  elapsedMs: number
): CompletionRecord {
  const ms = Math.max(0, Math.round(elapsedMs));
  const prev = stats[difficulty];
  const completed = prev.completed + 1;
  const totalMs = prev.totalMs + ms;
  const newRecord = prev.bestMs === null || ms < prev.bestMs;

  return {
    stats: {
      ...stats,
      [difficulty]: {
        completed,
        bestMs: newRecord ? ms : prev.bestMs,
        totalMs,
        averageMs: Math.floor(totalMs / completed),
      },
    },
    newRecord,
  };
}

function isCount(v: unknown): v is number {
  return typeof v === "number" && Number.isInteger(v) && v >= 0;
}

function isOptionalCount(v: unknown): v is number | null {
  return v === null || isCount(v);
}

export function isDifficultyStats(value: unknown): value is DifficultyStats {
  if (!isRecord(value)) return false;
  const { completed, bestMs, totalMs, averageMs } = value;
  if (!isCount(completed) || !isCount(totalMs)) return false;
  if (!isOptionalCount(bestMs) || !isOptionalCount(averageMs)) return false;
  return completed === 0 ? bestMs === null : bestMs !== null;
}

/**
 * Reads persisted statistics. Difficulties that are missing from the file
 * start from zero; anything malformed makes the whole value unreadable.
 */
export function parseStatistics(value: unknown): Statistics | null {
  if (!isRecord(value)) return null;
  const stats = emptyStatistics();
  for (const difficulty of DIFFICULTIES) {
    const entry = value[difficulty];
    if (entry === undefined) continue;
    if (!isDifficultyStats(entry)) return null;
    stats[difficulty] = { ...entry };
  }
  return stats;
}
