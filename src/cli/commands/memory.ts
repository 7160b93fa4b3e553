/**
 * Memory Command - show recent memories
 */

import { z } from "zod";

import type { MemoryKind, MemoryRecord } from "../../agent/types.js";
import { isMemoryKind, MEMORY_KINDS } from "../../memory/memory-store.js";
import type { CliContext } from "../context.js";
import { parsePositiveNumber, ValidationError } from "../error-handler.js";

const MemoryOptionsSchema = z.object({
  count: z.string().optional(),
  kind: z.string().optional(),
  json: z.boolean().optional(),
});

const KIND_ICONS: Record<MemoryKind, string> = {
  thought: "💭",
  task: "📋",
  result: "✅",
  observation: "👁️",
  error: "⚠️",
};

export async function memory(ctx: CliContext, rawOptions: unknown): Promise<MemoryRecord[]> {
  const options = MemoryOptionsSchema.parse(rawOptions);
  const count = options.count ? Math.floor(parsePositiveNumber(options.count, "--count")) : 10;

  let kind: MemoryKind | undefined;
  if (options.kind !== undefined) {
    if (!isMemoryKind(options.kind)) {
      throw new ValidationError(`Unknown memory kind "${options.kind}"`, `Use one of: ${MEMORY_KINDS.join(", ")}`);
    }
    kind = options.kind;
  }

  await ctx.servant.init();
  const records = ctx.servant.memory.recent(count, kind);

  if (options.json) {
    ctx.out.json(records);
    return records;
  }

  ctx.out.header(`Last ${records.length} Memories`);
  if (records.length === 0) {
    ctx.out.info("No memories yet.");
  }
  for (const record of records) {
    const content = record.content.replace(/\s+/g, " ").trim();
    ctx.out.listItem(`${KIND_ICONS[record.kind]} [${record.kind}] ${content.slice(0, 80)}`);
  }
  ctx.out.newline();
  return records;
}
