import { JsonFileStore, Logger } from "@numplace/core";
import {
  SavedGameRepository,
  SavedGameService,
  StatisticsRepository,
  StatisticsService,
} from "@numplace/engine";
import { ConfigData } from "./config/index.js";

export interface Services {
  store: JsonFileStore;
  statistics: StatisticsService;
  savedGames: SavedGameService;
}

export function createServices(config: ConfigData, log: Logger): Services {
  const store = new JsonFileStore(config.dataDir, log);
  return {
    store,
    statistics: new StatisticsService(new StatisticsRepository(store, log), log),
    savedGames: new SavedGameService(new SavedGameRepository(store, log), log),
  };
}
