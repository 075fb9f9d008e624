import { formatDuration } from "@numplace/core";
import { DIFFICULTIES } from "@numplace/game-sudoku";
import type { Statistics } from "@numplace/engine";
import type { Translator } from "./i18n.js";

function formatMs(ms: number | null): string {
  return ms === null ? "-" : formatDuration(ms);
}

/** One block per difficulty: its name, then the count, best and average time */
export function formatStatistics(stats: Statistics, translator: Translator): string[] {
  const lines: string[] = [];
  for (const difficulty of DIFFICULTIES) {
    const entry = stats[difficulty];
    lines.push(`  ${translator.t(`difficulty_${difficulty}`)}`);
    lines.push(`    ${translator.t("stats_games_count")}: ${entry.completed}`);
    lines.push(`    ${translator.t("stats_best_time")}: ${formatMs(entry.bestMs)}`);
    lines.push(`    ${translator.t("stats_avg_time")}: ${formatMs(entry.averageMs)}`);
  }
  return lines;
}
