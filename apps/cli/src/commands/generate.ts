import { Command } from "commander";
import {
  Difficulty,
  RemovalPolicy,
  generatePuzzle,
  randomSeed,
  renderBoard,
  toGridString,
} from "@numplace/game-sudoku";
import { resolveConfig } from "../config/index.js";
import { openLog } from "../logger.js";
import { parseDifficultyOption } from "./options.js";

interface GenerateOpts {
  difficulty?: Difficulty;
  seed?: string;
  relaxed?: boolean;
  solution?: boolean;
}

export function registerGenerateCommand(program: Command): void {
  program
    .command("generate")
    .description("Print a new puzzle")
    .option("-d, --difficulty <level>", "easy, medium, hard or expert", parseDifficultyOption)
    .option("-s, --seed <seed>", "Seed for a reproducible puzzle")
    .option("--relaxed", "Remove cells without keeping the solution unique")
    .option("--solution", "Print the solution as well")
    .action(async (opts: GenerateOpts) => {
      const config = await resolveConfig();
      const log = await openLog(config);

      const difficulty = opts.difficulty ?? config.difficulty;
      const seed = opts.seed ?? randomSeed();
      const policy: RemovalPolicy = opts.relaxed ? "relaxed" : "strict";

      const puzzle = generatePuzzle(difficulty, { seed, policy });
      log.info({ difficulty, seed, policy, attempts: puzzle.attempts }, "Generated puzzle from the command line");

      console.log(`Difficulty: ${difficulty}  Seed: ${seed}  Clues: ${puzzle.clues}  Policy: ${policy}`);
      console.log(renderBoard(puzzle.puzzle));
      console.log(toGridString(puzzle.puzzle));
      if (opts.solution) {
        console.log("");
        console.log(renderBoard(puzzle.solution));
      }
    });
}
