import { mkdir } from "node:fs/promises";
import { join } from "node:path";
import { createLogger, Logger } from "@numplace/core";
import { ConfigData } from "./config/index.js";

export const LOG_FILE = "numplace.log";

export function getLogPath(dataDir: string): string {
  return join(dataDir, LOG_FILE);
}

/** The terminal belongs to the UI, so records go to a file in the data directory. */
export async function openLog(config: ConfigData): Promise<Logger> {
  await mkdir(config.dataDir, { recursive: true });
  return createLogger("numplace", { level: config.logLevel, path: getLogPath(config.dataDir) });
}
