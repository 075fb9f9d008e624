import type { KeyValueStore, Logger } from "@numplace/core";
import { Statistics, emptyStatistics, parseStatistics } from "../statistics.js";

export const STATISTICS_KEY = "statistics";

export class StatisticsRepository {
  constructor(
    private readonly store: KeyValueStore,
    private readonly log?: Logger
  ) {}

  /** Missing or unreadable data loads as zero statistics. */
  async load(): Promise<Statistics> {
    const raw = await this.store.read(STATISTICS_KEY);
    if (raw === undefined) return emptyStatistics();

    const stats = parseStatistics(raw);
    if (!stats) {
      this.log?.warn({ key: STATISTICS_KEY }, "Ignoring malformed statistics");
      return emptyStatistics();
    }
    return stats;
  }

  async save(stats: Statistics): Promise<void> {
    await this.store.write(STATISTICS_KEY, stats);
  }
}
