/**
 * Shell Tool - Run a program without a shell
 */

import { spawn } from "node:child_process";

import { z } from "zod";

import { defineTool, defineParams } from "../../agent/tool-registry.js";
import type { ToolOutcome } from "../../agent/types.js";
import { resolveWorkspacePath } from "./workspace-path.js";

const MAX_TIMEOUT_MS = 300_000;
const MAX_CAPTURE_CHARS = 200_000;

const ShellParamsSchema = z.object({
  command: z.string().trim().min(1),
  args: z.array(z.union([z.string(), z.number(), z.boolean()]).transform(String)).default([]),
  cwd: z.string().optional(),
  timeoutMs: z.number().positive().optional(),
});

export interface CommandResult {
  stdout: string;
  stderr: string;
  exitCode: number | null;
  timedOut: boolean;
  spawnError?: string;
}

export default defineTool({
  meta: {
    name: "shell",
    description: "Run a program with arguments (no shell expansion). Returns the exit code, stdout and stderr.",
    category: "system",
    // The command enforces its own timeout and kills the child.
    timeoutMs: MAX_TIMEOUT_MS + 5_000,
  },
  parameters: defineParams({
    command: { type: "string", description: "Program to run" },
    args: { type: "array", description: "Arguments as an array of strings" },
    cwd: { type: "string", description: "Working directory (defaults to workspace)" },
    timeoutMs: { type: "number", description: "Timeout in milliseconds (max 300000)" },
  }, ["command"]),
  async execute(args, ctx): Promise<ToolOutcome> {
    const parsed = ShellParamsSchema.safeParse(args);
    if (!parsed.success) {
      return { ok: false, error: `Invalid parameters: ${parsed.error.issues.map((i) => `${i.path.join(".") || "params"}: ${i.message}`).join("; ")}` };
    }
    const { command, args: argsList } = parsed.data;
    const cwd = parsed.data.cwd ? resolveWorkspacePath(parsed.data.cwd, ctx) : ctx.workspaceDir;
    const timeoutMs = Math.min(parsed.data.timeoutMs ?? ctx.defaultTimeoutMs, MAX_TIMEOUT_MS);

    ctx.logger.info({ tool: "shell", command, args: argsList, cwd, timeoutMs }, "Shell command started");

    const result = await runCommand({ command, args: argsList, cwd, timeoutMs });
    const output = formatCommandResult(result);

    if (result.exitCode === 0 && !result.timedOut) {
      ctx.logger.info({ tool: "shell", exitCode: result.exitCode, stdoutLength: result.stdout.length }, "Shell command completed");
      return { ok: true, output };
    }

    ctx.logger.warn({ tool: "shell", exitCode: result.exitCode, timedOut: result.timedOut, spawnError: result.spawnError }, "Shell command failed");
    if (result.spawnError) return { ok: false, error: result.spawnError };
    if (result.timedOut) return { ok: false, error: `Command timed out after ${timeoutMs}ms\n${output}` };
    return { ok: false, error: output };
  },
});

export function formatCommandResult(result: CommandResult): string {
  const lines = [`exit code: ${result.exitCode ?? "none"}`];
  if (result.stdout) lines.push(`stdout:\n${result.stdout}`);
  if (result.stderr) lines.push(`stderr:\n${result.stderr}`);
  return lines.join("\n");
}

export async function runCommand(params: {
  command: string;
  args: string[];
  cwd: string;
  timeoutMs: number;
}): Promise<CommandResult> {
  return new Promise((resolve) => {
    let stdout = "";
    let stderr = "";
    let timedOut = false;

    const child = spawn(params.command, params.args, {
      cwd: params.cwd,
      env: process.env,
      shell: false,
    });

    const timer = setTimeout(() => {
      timedOut = true;
      child.kill("SIGKILL");
    }, params.timeoutMs);

    child.stdout.on("data", (data: Buffer) => {
      stdout += data.toString();
      if (stdout.length > MAX_CAPTURE_CHARS) stdout = stdout.slice(-MAX_CAPTURE_CHARS);
    });

    child.stderr.on("data", (data: Buffer) => {
      stderr += data.toString();
      if (stderr.length > MAX_CAPTURE_CHARS) stderr = stderr.slice(-MAX_CAPTURE_CHARS);
    });

    child.on("error", (err) => {
      clearTimeout(timer);
      resolve({
        stdout,
        stderr,
        exitCode: null,
        timedOut,
        spawnError: err.message,
      });
    });

    child.on("close", (code) => {
      clearTimeout(timer);
      resolve({
        stdout: stdout.trim(),
        stderr: stderr.trim(),
        exitCode: code,
        timedOut,
      });
    });
  });
}
