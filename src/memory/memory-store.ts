/**
 * Memory Store - append-only JSONL log of thoughts, tasks and results
 */

import fs from "node:fs/promises";
import path from "node:path";

import { z } from "zod";

import type { MemoryKind, MemoryRecord } from "../agent/types.js";
import type { Logger } from "../log.js";

export const MEMORY_KINDS: readonly MemoryKind[] = ["thought", "task", "result", "observation", "error"];

const MemoryRecordSchema = z.object({
  timestamp: z.string(),
  kind: z.enum(["thought", "task", "result", "observation", "error"]),
  content: z.string(),
  importance: z.number().default(1),
});

export function isMemoryKind(value: string): value is MemoryKind {
  return MEMORY_KINDS.some((kind) => kind === value);
}

export class MemoryStore {
  private readonly filePath: string;
  private readonly logger: Logger;
  private records: MemoryRecord[] = [];
  private loaded = false;

  constructor(params: { filePath: string; logger: Logger }) {
    this.filePath = params.filePath;
    this.logger = params.logger.child({ component: "memory" });
  }

  /**
   * Read every record from disk. Lines that are not valid records are skipped.
   */
  async load(): Promise<void> {
    let raw = "";
    try {
      raw = await fs.readFile(this.filePath, "utf-8");
    } catch (err) {
      if (!(err && typeof err === "object" && "code" in err && err.code === "ENOENT")) throw err;
    }

    const records: MemoryRecord[] = [];
    let skipped = 0;
    for (const line of raw.split("\n")) {
      if (!line.trim()) continue;
      try {
        const parsed = MemoryRecordSchema.safeParse(JSON.parse(line));
        if (parsed.success) {
          records.push(parsed.data);
        } else {
          skipped++;
        }
      } catch {
        skipped++;
      }
    }

    this.records = records;
    this.loaded = true;
    if (skipped > 0) {
      this.logger.warn({ skipped, filePath: this.filePath }, "Skipped invalid memory lines");
    }
    this.logger.info({ count: records.length }, "Loaded memories");
  }

  async add(kind: MemoryKind, content: string, importance = 1): Promise<MemoryRecord> {
    if (!this.loaded) await this.load();
    const record: MemoryRecord = {
      timestamp: new Date().toISOString(),
      kind,
      content,
      importance,
    };
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    await fs.appendFile(this.filePath, JSON.stringify(record) + "\n", "utf-8");
    this.records.push(record);
    return record;
  }

  /**
   * Last `n` records, oldest first, optionally of one kind.
   */
  recent(n = 10, kind?: MemoryKind): MemoryRecord[] {
    const filtered = kind ? this.records.filter((r) => r.kind === kind) : this.records;
    if (n <= 0) return [];
    return filtered.slice(-n);
  }

  get count(): number {
    return this.records.length;
  }
}
