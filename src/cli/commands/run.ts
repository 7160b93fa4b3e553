/**
 * Run Command - continuous thinking loop
 */

import { z } from "zod";

import type { CliContext } from "../context.js";
import { parsePositiveNumber } from "../error-handler.js";

const RunOptionsSchema = z.object({
  interval: z.string().optional(),
  duration: z.string().optional(),
});

export async function run(ctx: CliContext, rawOptions: unknown): Promise<number> {
  const options = RunOptionsSchema.parse(rawOptions);
  const intervalSeconds = options.interval
    ? parsePositiveNumber(options.interval, "--interval")
    : ctx.config.loop.intervalSeconds;
  const durationSeconds = options.duration
    ? parsePositiveNumber(options.duration, "--duration")
    : ctx.config.loop.durationSeconds;

  const controller = new AbortController();
  const stop = (signal: NodeJS.Signals) => {
    ctx.logger.info({ signal }, "Stop requested");
    controller.abort();
  };
  process.once("SIGINT", stop);
  process.once("SIGTERM", stop);

  ctx.out.info(
    `${ctx.servant.name} thinking every ${intervalSeconds}s` +
      (durationSeconds !== undefined ? ` for ${durationSeconds}s` : "") +
      " (Ctrl+C to stop)"
  );

  try {
    const cycles = await ctx.servant.runContinuous({
      intervalMs: intervalSeconds * 1000,
      ...(durationSeconds !== undefined ? { durationMs: durationSeconds * 1000 } : {}),
      signal: controller.signal,
    });
    ctx.out.success(`Stopped after ${cycles} cycle${cycles === 1 ? "" : "s"}`);
    return cycles;
  } finally {
    process.off("SIGINT", stop);
    process.off("SIGTERM", stop);
  }
}
