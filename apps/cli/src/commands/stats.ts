import { Command } from "commander";
import { resolveConfig } from "../config/index.js";
import { createTranslator, loadCatalogs } from "../i18n.js";
import { openLog } from "../logger.js";
import { createServices } from "../services.js";
import { formatStatistics } from "../statsTable.js";

export function registerStatsCommand(program: Command): void {
  const statsCmd = program
    .command("stats")
    .description("Show statistics of completed games");

  statsCmd.action(async () => {
    const config = await resolveConfig();
    const log = await openLog(config);
    const { statistics } = createServices(config, log);
    const translator = createTranslator(await loadCatalogs(), config.locale);

    const stats = await statistics.load();
    console.log(`\n${translator.t("stats_title")}`);
    console.log("──────────────────────");
    for (const line of formatStatistics(stats, translator)) {
      console.log(line);
    }
    console.log("");
  });

  statsCmd
    .command("reset")
    .description("Reset all statistics")
    .action(async () => {
      const config = await resolveConfig();
      const log = await openLog(config);
      const { statistics } = createServices(config, log);
      const translator = createTranslator(await loadCatalogs(), config.locale);

      await statistics.reset();
      console.log(translator.t("stats_reset_done"));
    });
}
