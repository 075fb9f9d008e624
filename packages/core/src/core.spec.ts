import { strict as assert } from "assert";
import { mkdtemp, readFile, readdir, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { formatDuration } from "./libs/formatDuration.js";
import { createLogger, isLogLevel } from "./logger.js";
import { JsonFileStore } from "./storage/JsonFileStore.js";
import { MemoryStore } from "./storage/MemoryStore.js";

describe("formatDuration", () => {
  it("formats minutes and seconds", () => {
    assert.equal(formatDuration(0), "00:00");
    assert.equal(formatDuration(7_900), "00:07");
    assert.equal(formatDuration(754_000), "12:34");
  });

  it("adds hours when needed", () => {
    assert.equal(formatDuration(3_723_000), "1:02:03");
  });

  it("clamps negative durations", () => {
    assert.equal(formatDuration(-5_000), "00:00");
  });
});

describe("logger", () => {
  it("isLogLevel accepts bunyan level names only", () => {
    assert.equal(isLogLevel("warn"), true);
    assert.equal(isLogLevel("verbose"), false);
  });

  it("createLogger honours the requested level", () => {
    const log = createLogger("test", { level: "warn", silent: true });
    assert.equal(log.level(), 40);
  });
});

describe("JsonFileStore", () => {
  let dir: string;
  let store: JsonFileStore;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "numplace-store-"));
    store = new JsonFileStore(join(dir, "nested"), createLogger("test", { silent: true }));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("reads undefined for a missing key", async () => {
    assert.equal(await store.read("statistics"), undefined);
  });

  it("writes pretty JSON and reads it back", async () => {
    await store.write("statistics", { easy: { completed: 2 } });
    assert.deepEqual(await store.read("statistics"), { easy: { completed: 2 } });
    const raw = await readFile(join(dir, "nested", "statistics.json"), "utf-8");
    assert.equal(raw, '{\n  "easy": {\n    "completed": 2\n  }\n}\n');
  });

  it("survives overlapping writes to one key", async () => {
    await Promise.all([store.write("saved-game", { n: 1 }), store.write("saved-game", { n: 2 })]);
    const value = await store.read("saved-game");
    assert.ok(
      [1, 2].some((n) => JSON.stringify(value) === JSON.stringify({ n })),
      `unexpected value ${JSON.stringify(value)}`
    );
    assert.deepEqual(await readdir(join(dir, "nested")), ["saved-game.json"]);
  });

  it("reads undefined for a malformed file", async () => {
    await store.write("saved-game", {});
    await writeFile(store.pathFor("saved-game"), "{ not json", "utf-8");
    assert.equal(await store.read("saved-game"), undefined);
  });

  it("removes keys, including missing ones", async () => {
    await store.write("saved-game", { a: 1 });
    await store.remove("saved-game");
    await store.remove("saved-game");
    assert.equal(await store.read("saved-game"), undefined);
  });

  it("rejects keys that are not plain names", () => {
    assert.throws(() => store.pathFor("../escape"), /Invalid storage key/);
  });
});

describe("MemoryStore", () => {
  it("returns copies of stored values", async () => {
    const store = new MemoryStore();
    const value = { times: [1, 2] };
    await store.write("k", value);
    value.times.push(3);
    assert.deepEqual(await store.read("k"), { times: [1, 2] });
    assert.equal(store.has("k"), true);
    await store.remove("k");
    assert.equal(await store.read("k"), undefined);
  });
});
