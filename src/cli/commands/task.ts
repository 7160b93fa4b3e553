/**
 * Task Command - process a single task and print its result record
 */

import type { TaskResultRecord } from "../../agent/types.js";
import type { CliContext } from "../context.js";
import { ValidationError } from "../error-handler.js";

export async function task(ctx: CliContext, text: string): Promise<TaskResultRecord> {
  const trimmed = text.trim();
  if (!trimmed) {
    throw new ValidationError("Task text is empty", "Usage: servant task \"<what to do>\"");
  }

  const { record, filePath } = await ctx.servant.processTask(trimmed);
  ctx.out.json(record);

  if (record.error !== undefined) {
    ctx.out.error(`Task failed; record written to ${filePath}`);
    process.exitCode = 1;
  } else {
    ctx.logger.info({ filePath }, "Result written");
  }
  return record;
}
