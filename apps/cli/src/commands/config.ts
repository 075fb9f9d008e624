import { Command } from "commander";
import { createInterface } from "node:readline";
import {
  resolveConfig,
  readConfigFile,
  writeConfigFile,
  updateConfigFile,
  getConfigPath,
  getSource,
  parseConfigValue,
  CONFIG_KEYS,
  ConfigData,
  RawConfig,
} from "../config/index.js";
import { LOCALES } from "../i18n.js";
import { DIFFICULTIES } from "@numplace/game-sudoku";

function createPrompter() {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  let closed = false;
  rl.once("close", () => {
    closed = true;
  });

  return {
    ask(prompt: string): Promise<string> {
      if (closed) return Promise.resolve("");
      return new Promise((resolve) => {
        rl.question(prompt, (answer) => resolve(answer));
        rl.once("close", () => resolve(""));
      });
    },
    close() {
      if (!closed) rl.close();
    },
  };
}

function isValidKey(key: string): key is keyof ConfigData {
  return CONFIG_KEYS.some((k) => k === key);
}

function fail(message: string): never {
  console.error(`Error: ${message}`);
  process.exit(1);
}

/** Accepted values for `key`, for error messages */
function describeValues(key: keyof ConfigData): string {
  switch (key) {
    case "locale":
      return LOCALES.join(", ");
    case "difficulty":
      return DIFFICULTIES.join(", ");
    case "logLevel":
      return "trace, debug, info, warn, error, fatal";
    case "dataDir":
      return "any directory path";
  }
}

export function registerConfigCommand(program: Command): void {
  const configCmd = program
    .command("config")
    .description(`Manage configuration (${getConfigPath()})`);

  configCmd.action(async () => {
    await runWizard();
  });

  configCmd
    .command("set <key> <value>")
    .description("Set a config value")
    .action(async (key: string, value: string) => {
      if (!isValidKey(key)) {
        fail(`Unknown config key: "${key}". Valid keys: ${CONFIG_KEYS.join(", ")}`);
      }
      if (parseConfigValue(key, value) === null) {
        fail(`Invalid value for ${key}: "${value}". Expected one of: ${describeValues(key)}`);
      }
      await updateConfigFile(key, value);
      console.log(`Set ${key} = ${value}`);
    });

  configCmd
    .command("get <key>")
    .description("Get a config value")
    .action(async (key: string) => {
      if (!isValidKey(key)) {
        fail(`Unknown config key: "${key}". Valid keys: ${CONFIG_KEYS.join(", ")}`);
      }
      const resolved = await resolveConfig();
      console.log(resolved[key]);
    });

  configCmd
    .command("list")
    .description("List all config values with sources")
    .action(async () => {
      await printConfigList();
    });
}

export async function runWizard(): Promise<void> {
  const existing = await readConfigFile();
  const current = await resolveConfig();
  const prompter = createPrompter();

  console.log("\nnumplace configuration");
  console.log("──────────────────────\n");

  try {
    const data: RawConfig = { ...existing };
    for (const key of CONFIG_KEYS) {
      const answer = (await prompter.ask(`${key} [${current[key]}]: `)).trim();
      if (!answer) continue;
      if (parseConfigValue(key, answer) === null) {
        console.log(`  Skipping invalid ${key}; expected one of: ${describeValues(key)}`);
        continue;
      }
      data[key] = answer;
    }

    await writeConfigFile(data);
    console.log(`\nConfig saved to ${getConfigPath()}\n`);

    const resolved = await resolveConfig();
    for (const key of CONFIG_KEYS) {
      console.log(`  ${key}: ${resolved[key]}`);
    }
    console.log("");
  } finally {
    prompter.close();
  }
}

async function printConfigList(): Promise<void> {
  const resolved = await resolveConfig();
  const fileData = await readConfigFile();

  console.log(`\nConfig file: ${getConfigPath()}`);
  console.log("──────────────────────────────────────");

  for (const key of CONFIG_KEYS) {
    console.log(`  ${key}: ${resolved[key]}  (${getSource(key, fileData)})`);
  }
  console.log("");
}
