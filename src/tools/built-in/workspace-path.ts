import os from "node:os";
import path from "node:path";

import type { ToolContext } from "../../agent/types.js";

/**
 * Resolve a tool path against the workspace. Unless the context allows it,
 * a path that lands outside the workspace is rejected.
 */
export function resolveWorkspacePath(value: string, ctx: Pick<ToolContext, "workspaceDir" | "allowOutsideWorkspace">): string {
  const trimmed = value.trim();
  if (!trimmed) throw new Error("path is required");

  let resolved: string;
  if (trimmed.startsWith("~")) {
    resolved = path.join(os.homedir(), trimmed.slice(1));
  } else if (path.isAbsolute(trimmed)) {
    resolved = path.normalize(trimmed);
  } else {
    resolved = path.resolve(ctx.workspaceDir, trimmed);
  }

  if (!ctx.allowOutsideWorkspace && !isInside(path.resolve(ctx.workspaceDir), resolved)) {
    throw new Error(`Path escapes the workspace: ${value}`);
  }
  return resolved;
}

function isInside(root: string, target: string): boolean {
  const relative = path.relative(root, target);
  return relative === "" || (relative.split(path.sep)[0] !== ".." && !path.isAbsolute(relative));
}
