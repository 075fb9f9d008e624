import { InvalidArgumentError } from "commander";
import { DIFFICULTIES, Difficulty, isDifficulty } from "@numplace/game-sudoku";
import { LOCALES, Locale, isLocale } from "../i18n.js";

export function parseDifficultyOption(value: string): Difficulty {
  if (!isDifficulty(value)) {
    throw new InvalidArgumentError(`Expected one of: ${DIFFICULTIES.join(", ")}.`);
  }
  return value;
}

export function parseLocaleOption(value: string): Locale {
  if (!isLocale(value)) {
    throw new InvalidArgumentError(`Expected one of: ${LOCALES.join(", ")}.`);
  }
  return value;
}
