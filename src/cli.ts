#!/usr/bin/env node
/**
 * servant CLI - entry point
 */

import "dotenv/config";
import fs from "node:fs";
import { fileURLToPath } from "node:url";

import { Command } from "commander";

import { createCliContext, parseGlobalOptions, type CliContext } from "./cli/context.js";
import { OutputFormatter } from "./cli/output-formatter.js";
import { withErrorHandling } from "./cli/error-handler.js";
import { run } from "./cli/commands/run.js";
import { task } from "./cli/commands/task.js";
import { memory } from "./cli/commands/memory.js";
import { status } from "./cli/commands/status.js";

export const program = new Command();
const out = new OutputFormatter();

program
  .name("servant")
  .description("servant - file-driven autonomous agent")
  .version("0.1.0")
  .option("-c, --config <path>", "Path to servant.config.json")
  .option("--credentials <path>", "Path to credentials.json")
  .option("-w, --workspace <dir>", "Workspace directory")
  .option("--name <name>", "Agent name")
  .option("-q, --quiet", "Quiet mode - minimal output")
  .option("--no-color", "Disable colored output");

async function withContext<T>(cmd: Command, fn: (ctx: CliContext) => Promise<T>): Promise<T> {
  const ctx = await createCliContext(parseGlobalOptions(cmd.optsWithGlobals()));
  try {
    return await fn(ctx);
  } finally {
    ctx.close();
  }
}

program
  .command("run")
  .description("Run the continuous thinking loop, processing tasks/*.md as they appear")
  .option("-i, --interval <seconds>", "Seconds between cycles")
  .option("-d, --duration <seconds>", "Stop after this many seconds")
  .action(withErrorHandling(async (options: unknown, cmd: Command) => {
    await withContext(cmd, (ctx) => run(ctx, options));
  }));

program
  .command("task")
  .description("Process a single task and print the result record")
  .argument("<text...>", "Task text")
  .action(withErrorHandling(async (text: string[], _options: unknown, cmd: Command) => {
    await withContext(cmd, (ctx) => task(ctx, text.join(" ")));
  }));

program
  .command("memory")
  .description("Show recent memories")
  .option("-n, --count <n>", "Number of memories to show", "10")
  .option("-k, --kind <kind>", "Only this kind: thought, task, result, observation, error")
  .option("--json", "Output as JSON")
  .action(withErrorHandling(async (options: unknown, cmd: Command) => {
    await withContext(cmd, (ctx) => memory(ctx, options));
  }));

program
  .command("status")
  .description("Show agent state and LLM provider status")
  .option("--json", "Output as JSON")
  .option("--check", "Probe each provider over the network")
  .action(withErrorHandling(async (options: unknown, cmd: Command) => {
    await withContext(cmd, (ctx) => status(ctx, options));
  }));

// No command: status followed by recent memories.
program.action(withErrorHandling(async (_options: unknown, cmd: Command) => {
  await withContext(cmd, async (ctx) => {
    await status(ctx, {});
    await memory(ctx, {});
  });
}));

function isMainModule(): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  try {
    const entryPath = fs.realpathSync(entry);
    const modulePath = fs.realpathSync(fileURLToPath(import.meta.url));
    return entryPath === modulePath;
  } catch {
    return false;
  }
}

export async function runCli(argv: string[] = process.argv): Promise<void> {
  await program.parseAsync(argv).catch((err: unknown) => {
    out.error(err instanceof Error ? err.message : String(err));
    process.exitCode = 1;
  });
}

// Only parse argv when invoked as an entrypoint script.
if (isMainModule()) {
  void runCli();
}
