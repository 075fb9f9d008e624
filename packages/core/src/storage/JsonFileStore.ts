import { mkdir, readFile, rename, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import type { Logger } from "../logger.js";
import type { KeyValueStore } from "./KeyValueStore.js";

const KEY_RE = /^[a-z0-9][a-z0-9_-]*$/i;

let tmpCounter = 0;

function errorCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

/**
 * Stores each key as `<dir>/<key>.json`. Missing files read as undefined;
 * files that are not valid JSON are logged and also read as undefined.
 */
export class JsonFileStore implements KeyValueStore {
  constructor(
    private readonly dir: string,
    private readonly log?: Logger
  ) {}

  pathFor(key: string): string {
    if (!KEY_RE.test(key)) {
      throw new Error(`Invalid storage key: "${key}"`);
    }
    return join(this.dir, `${key}.json`);
  }

  async read(key: string): Promise<unknown> {
    const path = this.pathFor(key);
    let raw: string;
    try {
      raw = await readFile(path, "utf-8");
    } catch (err) {
      if (errorCode(err) === "ENOENT") {
        return undefined;
      }
      throw err;
    }
    try {
      return JSON.parse(raw);
    } catch (err) {
      if (err instanceof SyntaxError) {
        this.log?.warn({ path, err: err.message }, "ignoring malformed JSON file");
        return undefined;
      }
      throw err;
    }
  }

  async write(key: string, value: unknown): Promise<void> {
    const path = this.pathFor(key);
    await mkdir(this.dir, { recursive: true });
    // Write beside the target, then rename over it; one temp file per write
    const tmp = `${path}.${process.pid}.${++tmpCounter}.tmp`;
    await writeFile(tmp, JSON.stringify(value, null, 2) + "\n", "utf-8");
    await rename(tmp, path);
    this.log?.debug({ path }, "wrote file");
  }

  async remove(key: string): Promise<void> {
    await rm(this.pathFor(key), { force: true });
  }
}
