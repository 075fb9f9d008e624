import { homedir } from "node:os";
import { join } from "node:path";
import type { LogLevel } from "@numplace/core";
import type { Difficulty } from "@numplace/game-sudoku";

export interface ConfigData {
  /** Where saved games, statistics and the log file live */
  dataDir: string;
  locale: string;
  /** Difficulty of a new game when none is given */
  difficulty: Difficulty;
  logLevel: LogLevel;
}

/** Config values as written by hand: in the file, the environment or on the command line */
export type RawConfig = Partial<Record<keyof ConfigData, string>>;

export const CONFIG_KEYS: (keyof ConfigData)[] = ["dataDir", "locale", "difficulty", "logLevel"];

export const CONFIG_DIR = join(homedir(), ".numplace");

export const DEFAULTS: ConfigData = {
  dataDir: CONFIG_DIR,
  locale: "en_US",
  difficulty: "easy",
  logLevel: "info",
};

export const ENV_MAP: Record<keyof ConfigData, string> = {
  dataDir: "NUMPLACE_DATA_DIR",
  locale: "NUMPLACE_LOCALE",
  difficulty: "NUMPLACE_DIFFICULTY",
  logLevel: "LOG_LEVEL",
};
