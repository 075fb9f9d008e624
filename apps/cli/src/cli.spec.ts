import { strict as assert } from "assert";
import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { emptyStatistics } from "@numplace/engine";
import { DEFAULTS } from "./config/defaults.js";
import { readConfigFile, updateConfigFile } from "./config/configFile.js";
import { getSource, parseConfigValue, resolveConfig } from "./config/resolve.js";
import {
  Catalogs,
  DEFAULT_LOCALE,
  LOCALES,
  createTranslator,
  isLocale,
  loadCatalogs,
  nextLocale,
} from "./i18n.js";
import { formatStatistics } from "./statsTable.js";

describe("config", () => {
  let dir: string;
  let configPath: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "numplace-config-"));
    configPath = join(dir, "config.json");
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("should fall back to defaults without a file, env or overrides", async () => {
    const resolved = await resolveConfig({ configPath, env: {}, overrides: {} });
    assert.deepEqual(resolved, DEFAULTS);
  });

  it("should layer file, environment and command line", async () => {
    await writeFile(
      configPath,
      JSON.stringify({ locale: "pl_PL", difficulty: "hard", logLevel: "loud" }),
    );
    const warnings: string[] = [];

    const resolved = await resolveConfig({
      configPath,
      env: { NUMPLACE_DIFFICULTY: "expert", LOG_LEVEL: "" },
      overrides: { dataDir: "/tmp/numplace-test" },
      warn: (message) => warnings.push(message),
    });

    assert.deepEqual(resolved, {
      dataDir: "/tmp/numplace-test",
      locale: "pl_PL",
      difficulty: "expert",
      logLevel: "info",
    });
    assert.deepEqual(warnings, ['Ignoring invalid logLevel "loud" from config file']);
  });

  it("should ignore invalid environment values", async () => {
    const warnings: string[] = [];
    const resolved = await resolveConfig({
      configPath,
      env: { NUMPLACE_LOCALE: "xx_XX" },
      overrides: {},
      warn: (message) => warnings.push(message),
    });
    assert.equal(resolved.locale, "en_US");
    assert.deepEqual(warnings, ['Ignoring invalid locale "xx_XX" from NUMPLACE_LOCALE']);
  });

  it("should keep only known string keys from the file", async () => {
    await writeFile(configPath, JSON.stringify({ locale: "es_ES", difficulty: 3, serverUrl: "x" }));
    assert.deepEqual(await readConfigFile(configPath), { locale: "es_ES" });
  });

  it("should update one key and keep the others", async () => {
    await writeFile(configPath, JSON.stringify({ locale: "nb_NO" }));
    await updateConfigFile("difficulty", "medium", configPath);

    const raw = await readFile(configPath, "utf-8");
    assert.equal(raw, '{\n  "locale": "nb_NO",\n  "difficulty": "medium"\n}\n');
  });

  it("should validate values per key", () => {
    assert.equal(parseConfigValue("difficulty", "expert"), "expert");
    assert.equal(parseConfigValue("difficulty", "impossible"), null);
    assert.equal(parseConfigValue("logLevel", "debug"), "debug");
    assert.equal(parseConfigValue("locale", "es_ES"), "es_ES");
    assert.equal(parseConfigValue("dataDir", "/var/lib/numplace"), "/var/lib/numplace");
  });

  it("should report where a value comes from", () => {
    assert.equal(getSource("locale", {}, {}), "default");
    assert.equal(getSource("locale", { locale: "pl_PL" }, {}), "config file");
    assert.equal(
      getSource("locale", { locale: "pl_PL" }, { NUMPLACE_LOCALE: "nb_NO" }),
      "env: NUMPLACE_LOCALE",
    );
  });
});

describe("i18n", () => {
  let catalogs: Catalogs;

  before(async () => {
    catalogs = await loadCatalogs();
  });

  it("should ship the same keys for every locale", () => {
    const expected = Object.keys(catalogs[DEFAULT_LOCALE]).sort();
    for (const locale of LOCALES) {
      assert.deepEqual(Object.keys(catalogs[locale]).sort(), expected, locale);
    }
  });

  it("should fill placeholders", () => {
    const { t } = createTranslator(catalogs, "en_US");
    assert.equal(t("game_time", { time: "01:05" }), "Time: 01:05");
    assert.equal(t("menu_language", { language: "English" }), "Language: English");
  });

  it("should translate into the selected locale", () => {
    assert.equal(createTranslator(catalogs, "pl_PL").t("menu_new_game"), "Nowa gra");
    assert.equal(createTranslator(catalogs, "nb_NO").t("difficulty_hard"), "Vanskelig");
    assert.equal(createTranslator(catalogs, "es_ES").t("win_record"), "¡Nuevo récord!");
  });

  it("should fall back to English, then to the key", () => {
    const partial: Catalogs = { ...catalogs, pl_PL: { menu_exit: "Wyjście" } };
    const { t } = createTranslator(partial, "pl_PL");
    assert.equal(t("menu_exit"), "Wyjście");
    assert.equal(t("menu_continue"), "Continue");
    assert.equal(t("no_such_key"), "no_such_key");
  });

  it("should treat an unknown locale as the default", () => {
    const translator = createTranslator(catalogs, "fr_FR");
    assert.equal(translator.locale, "en_US");
    assert.equal(translator.t("menu_stats"), "Statistics");
  });

  it("should leave unknown placeholders alone", () => {
    const { t } = createTranslator(catalogs, "en_US");
    assert.equal(t("game_time", { constructor: "x" }), "Time: {time}");
  });

  it("should cycle through the locales", () => {
    assert.equal(nextLocale("en_US"), "pl_PL");
    assert.equal(nextLocale("es_ES"), "en_US");
    assert.equal(nextLocale("fr_FR"), "en_US");
    assert.equal(isLocale("nb_NO"), true);
    assert.equal(isLocale("no_NO"), false);
  });
});

describe("formatStatistics", () => {
  it("should print one block per difficulty", async () => {
    const translator = createTranslator(await loadCatalogs(), "en_US");
    const stats = emptyStatistics();
    stats.easy = { completed: 2, bestMs: 65_000, totalMs: 150_000, averageMs: 75_000 };

    const lines = formatStatistics(stats, translator);
    assert.equal(lines.length, 16);
    assert.deepEqual(lines.slice(0, 8), [
      "  Easy",
      "    Games completed: 2",
      "    Best time: 01:05",
      "    Average time: 01:15",
      "  Medium",
      "    Games completed: 0",
      "    Best time: -",
      "    Average time: -",
    ]);
  });
});
