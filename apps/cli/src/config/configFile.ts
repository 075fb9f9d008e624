import { readFile, writeFile, mkdir } from "node:fs/promises";
import { dirname, join } from "node:path";
import { CONFIG_DIR, CONFIG_KEYS, ConfigData, RawConfig } from "./defaults.js";

const CONFIG_PATH = join(CONFIG_DIR, "config.json");

export function getConfigPath(): string {
  return CONFIG_PATH;
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

export async function readConfigFile(path: string = CONFIG_PATH): Promise<RawConfig> {
  let raw: string;
  try {
    raw = await readFile(path, "utf-8");
  } catch (err) {
    if (isMissingFile(err)) {
      return {};
    }
    throw err;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    if (err instanceof SyntaxError) {
      console.error(
        `Warning: ${path} is malformed and was ignored. ` +
          `Run "numplace config set <key> <value>" to recreate it.`,
      );
      return {};
    }
    throw err;
  }
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    return {};
  }

  const entries = new Map<string, unknown>(Object.entries(parsed));
  const result: RawConfig = {};
  for (const key of CONFIG_KEYS) {
    const value = entries.get(key);
    if (typeof value === "string") {
      result[key] = value;
    }
  }
  return result;
}

export async function writeConfigFile(
  data: RawConfig,
  path: string = CONFIG_PATH,
): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, JSON.stringify(data, null, 2) + "\n", "utf-8");
}

export async function updateConfigFile(
  key: keyof ConfigData,
  value: string,
  path: string = CONFIG_PATH,
): Promise<RawConfig> {
  const existing = await readConfigFile(path);
  existing[key] = value;
  await writeConfigFile(existing, path);
  return existing;
}
