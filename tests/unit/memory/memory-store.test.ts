import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import { MemoryStore, isMemoryKind } from "../../../src/memory/memory-store.js";
import { createSilentLogger } from "../../../src/log.js";

describe("MemoryStore", () => {
  let dir: string;
  let filePath: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "servant-memory-"));
    filePath = path.join(dir, "memory.jsonl");
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("appends one JSON line per memory", async () => {
    const store = new MemoryStore({ filePath, logger: createSilentLogger() });

    const record = await store.add("task", "Tidy the notes", 3);
    await store.add("result", "Notes tidied", 2);

    const lines = (await fs.readFile(filePath, "utf-8")).trim().split("\n");
    expect(lines).toHaveLength(2);
    expect(JSON.parse(lines[0] ?? "")).toEqual({
      timestamp: record.timestamp,
      kind: "task",
      content: "Tidy the notes",
      importance: 3,
    });
    expect(store.count).toBe(2);
  });

  it("returns the most recent records oldest first, optionally by kind", async () => {
    const store = new MemoryStore({ filePath, logger: createSilentLogger() });
    for (const [kind, content] of [
      ["thought", "one"],
      ["task", "two"],
      ["thought", "three"],
      ["thought", "four"],
    ] as const) {
      await store.add(kind, content);
    }

    expect(store.recent(2).map((r) => r.content)).toEqual(["three", "four"]);
    expect(store.recent(10, "thought").map((r) => r.content)).toEqual(["one", "three", "four"]);
    expect(store.recent(0)).toEqual([]);
  });

  it("reloads from disk and skips lines that are not records", async () => {
    await fs.writeFile(
      filePath,
      [
        JSON.stringify({ timestamp: "2026-01-01T00:00:00.000Z", kind: "observation", content: "started", importance: 1 }),
        "not json",
        JSON.stringify({ timestamp: "2026-01-01T00:00:01.000Z", kind: "dream", content: "??" }),
        JSON.stringify({ timestamp: "2026-01-01T00:00:02.000Z", kind: "error", content: "oops" }),
        "",
      ].join("\n")
    );
    const store = new MemoryStore({ filePath, logger: createSilentLogger() });

    await store.load();

    expect(store.count).toBe(2);
    expect(store.recent(5)).toEqual([
      { timestamp: "2026-01-01T00:00:00.000Z", kind: "observation", content: "started", importance: 1 },
      { timestamp: "2026-01-01T00:00:02.000Z", kind: "error", content: "oops", importance: 1 },
    ]);
  });

  it("loads existing records before the first append", async () => {
    await fs.writeFile(filePath, JSON.stringify({ timestamp: "t0", kind: "task", content: "old", importance: 3 }) + "\n");
    const store = new MemoryStore({ filePath, logger: createSilentLogger() });

    await store.add("result", "new");

    expect(store.recent(5).map((r) => r.content)).toEqual(["old", "new"]);
  });
});

describe("isMemoryKind()", () => {
  it("accepts only known kinds", () => {
    expect(isMemoryKind("thought")).toBe(true);
    expect(isMemoryKind("dream")).toBe(false);
  });
});
