import { isLogLevel } from "@numplace/core";
import { isDifficulty } from "@numplace/game-sudoku";
import { isLocale } from "../i18n.js";
import { CONFIG_KEYS, ConfigData, DEFAULTS, ENV_MAP, RawConfig } from "./defaults.js";
import { readConfigFile } from "./configFile.js";

type Parsers = { [K in keyof ConfigData]: (raw: string) => ConfigData[K] | null };

const PARSERS: Parsers = {
  dataDir: (raw) => raw,
  locale: (raw) => (isLocale(raw) ? raw : null),
  difficulty: (raw) => (isDifficulty(raw) ? raw : null),
  logLevel: (raw) => (isLogLevel(raw) ? raw : null),
};

const cliOverrides: RawConfig = {};

export function setCliOverride(key: keyof ConfigData, value: string): void {
  cliOverrides[key] = value;
}

/** The typed value for `raw`, or null if `key` does not accept it */
export function parseConfigValue<K extends keyof ConfigData>(key: K, raw: string): ConfigData[K] | null {
  return PARSERS[key](raw);
}

export interface ResolveOptions {
  configPath?: string;
  env?: NodeJS.ProcessEnv;
  overrides?: RawConfig;
  warn?: (message: string) => void;
}

function apply<K extends keyof ConfigData>(
  target: ConfigData,
  key: K,
  raw: string | undefined,
  source: string,
  warn: (message: string) => void,
): void {
  if (raw === undefined || raw === "") return;
  const value = parseConfigValue(key, raw);
  if (value === null) {
    warn(`Ignoring invalid ${key} "${raw}" from ${source}`);
    return;
  }
  target[key] = value;
}

/**
 * Defaults, then the config file, then the environment, then command-line
 * overrides. Invalid values are skipped with a warning.
 */
export async function resolveConfig(options: ResolveOptions = {}): Promise<ConfigData> {
  const env = options.env ?? process.env;
  const overrides = options.overrides ?? cliOverrides;
  const warn = options.warn ?? ((message: string) => console.error(`Warning: ${message}`));

  const fileConfig = await readConfigFile(options.configPath);
  const resolved: ConfigData = { ...DEFAULTS };

  for (const key of CONFIG_KEYS) {
    apply(resolved, key, fileConfig[key], "config file", warn);
    apply(resolved, key, env[ENV_MAP[key]], ENV_MAP[key], warn);
    apply(resolved, key, overrides[key], "command line", warn);
  }

  return resolved;
}

export function getSource(
  key: keyof ConfigData,
  fileData: RawConfig,
  env: NodeJS.ProcessEnv = process.env,
): string {
  if (cliOverrides[key] !== undefined && cliOverrides[key] !== "") return "command line";
  const envVal = env[ENV_MAP[key]];
  if (envVal !== undefined && envVal !== "") return `env: ${ENV_MAP[key]}`;
  if (fileData[key] !== undefined && fileData[key] !== "") return "config file";
  return "default";
}
