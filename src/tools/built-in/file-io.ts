/**
 * File I/O Tool - Read, write, append and list files in the workspace
 */

import fs from "node:fs/promises";
import path from "node:path";

import { z } from "zod";

import { defineTool, defineParams } from "../../agent/tool-registry.js";
import type { ToolOutcome } from "../../agent/types.js";
import { resolveWorkspacePath } from "./workspace-path.js";

const MAX_READ_BYTES = 5_000_000; // 5MB

const FileIoParamsSchema = z.discriminatedUnion("action", [
  z.object({ action: z.literal("read"), path: z.string().min(1) }),
  z.object({ action: z.literal("write"), path: z.string().min(1), content: z.string() }),
  z.object({ action: z.literal("append"), path: z.string().min(1), content: z.string() }),
  z.object({ action: z.literal("list"), path: z.string().min(1).default(".") }),
]);

export default defineTool({
  meta: {
    name: "file-io",
    description: "Read, write, append to, or list files inside the workspace.",
    category: "file",
  },
  parameters: defineParams({
    action: { type: "string", description: "Operation to perform", enum: ["read", "write", "append", "list"] },
    path: { type: "string", description: "Path relative to the workspace (list defaults to the workspace root)" },
    content: { type: "string", description: "Text to write or append" },
  }, ["action"]),
  async execute(args, ctx): Promise<ToolOutcome> {
    const parsed = FileIoParamsSchema.safeParse(args);
    if (!parsed.success) {
      return { ok: false, error: `Invalid parameters: ${parsed.error.issues.map((i) => `${i.path.join(".") || "params"}: ${i.message}`).join("; ")}` };
    }
    const params = parsed.data;
    const filePath = resolveWorkspacePath(params.path, ctx);
    const display = path.relative(ctx.workspaceDir, filePath) || ".";

    switch (params.action) {
      case "read": {
        const stats = await fs.stat(filePath);
        if (stats.size > MAX_READ_BYTES) {
          ctx.logger.warn({ filePath, size: stats.size }, "File exceeds maximum size limit");
          return { ok: false, error: `File is too large (${(stats.size / 1_000_000).toFixed(2)}MB). Maximum allowed size is 5MB.` };
        }
        return fs.readFile(filePath, "utf-8");
      }
      case "write": {
        await fs.mkdir(path.dirname(filePath), { recursive: true });
        await fs.writeFile(filePath, params.content, "utf-8");
        return `Wrote ${Buffer.byteLength(params.content, "utf-8")} bytes to ${display}`;
      }
      case "append": {
        await fs.mkdir(path.dirname(filePath), { recursive: true });
        await fs.appendFile(filePath, params.content, "utf-8");
        return `Appended ${Buffer.byteLength(params.content, "utf-8")} bytes to ${display}`;
      }
      case "list": {
        const entries = await fs.readdir(filePath, { withFileTypes: true });
        if (entries.length === 0) return "(empty directory)";
        return entries
          .map((entry) => (entry.isDirectory() ? `${entry.name}/` : entry.name))
          .sort()
          .join("\n");
      }
    }
  },
});
