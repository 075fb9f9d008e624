import type { Logger } from "@numplace/core";
import type { Difficulty } from "@numplace/game-sudoku";
import { StatisticsRepository } from "../repositories/StatisticsRepository.js";
import { CompletionRecord, Statistics, emptyStatistics, recordCompletion } from "../statistics.js";

/** In-memory statistics, written through to the repository on every change. */
export class StatisticsService {
  private stats: Statistics = emptyStatistics();

  constructor(
    private readonly repository: StatisticsRepository,
    private readonly log?: Logger
  ) {}

  async load(): Promise<Statistics> {
    this.stats = await this.repository.load();
    return this.current();
  }

  current(): Statistics {
    return structuredClone(this.stats);
  }

  async record(difficulty: Difficulty, elapsedMs: number): Promise<CompletionRecord> {
    const result = recordCompletion(this.stats, difficulty, elapsedMs);
    await this.repository.save(result.stats);
    this.stats = result.stats;
    this.log?.info(
      { difficulty, elapsedMs, newRecord: result.newRecord, completed: result.stats[difficulty].completed },
      "Recorded completed game"
    );
    return { stats: this.current(), newRecord: result.newRecord };
  }

  async reset(): Promise<Statistics> {
    const cleared = emptyStatistics();
    await this.repository.save(cleared);
    this.stats = cleared;
    this.log?.info("Statistics reset");
    return this.current();
  }
}
