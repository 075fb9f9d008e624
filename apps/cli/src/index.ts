import dotenv from "dotenv";
dotenv.config({ quiet: true });

import { program } from "commander";
import React from "react";
import { render } from "ink";
import type { Difficulty } from "@numplace/game-sudoku";
import { GameController } from "@numplace/engine";
import { App } from "./tui/App.js";
import { resolveConfig, setCliOverride } from "./config/index.js";
import { registerConfigCommand } from "./commands/config.js";
import { registerGenerateCommand } from "./commands/generate.js";
import { registerStatsCommand } from "./commands/stats.js";
import { parseDifficultyOption, parseLocaleOption } from "./commands/options.js";
import { Locale, loadCatalogs } from "./i18n.js";
import { openLog } from "./logger.js";
import { createServices } from "./services.js";

interface PlayOpts {
  difficulty?: Difficulty;
  seed?: string;
  locale?: Locale;
}

program
  .name("numplace")
  .description("Sudoku in the terminal")
  .version("0.1.0", "-v, --version");

registerConfigCommand(program);
registerGenerateCommand(program);
registerStatsCommand(program);

program
  .command("play")
  .description("Play in the terminal; starts a game right away when -d or -s is given")
  .option("-d, --difficulty <level>", "easy, medium, hard or expert", parseDifficultyOption)
  .option("-s, --seed <seed>", "Seed for a reproducible puzzle")
  .option("-l, --locale <locale>", "Language of the interface", parseLocaleOption)
  .action(async (opts: PlayOpts) => {
    if (opts.locale) setCliOverride("locale", opts.locale);
    if (opts.difficulty) setCliOverride("difficulty", opts.difficulty);

    const config = await resolveConfig();
    const log = await openLog(config);
    const catalogs = await loadCatalogs();
    const { statistics, savedGames } = createServices(config, log);

    const controller = await GameController.create({
      statistics,
      savedGames,
      locale: config.locale,
      log,
    });
    log.info({ dataDir: config.dataDir, locale: config.locale }, "Starting interactive game");

    if (opts.difficulty || opts.seed) {
      const result = await controller.dispatch({
        type: "new-game",
        difficulty: config.difficulty,
        seed: opts.seed,
      });
      if (!result.ok) {
        throw new Error(`Could not start a game: ${result.reason}`);
      }
    }

    const app = render(
      React.createElement(App, {
        controller,
        catalogs,
        defaultDifficulty: config.difficulty,
        dataDir: config.dataDir,
        log,
      }),
    );
    await app.waitUntilExit();

    // Leaving the UI with a game open saves it, as the menu does
    await controller.dispatch({ type: "menu" });
  });

program.parseAsync().catch((err: unknown) => {
  console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
});
