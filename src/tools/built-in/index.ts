import type { Tool } from "../../agent/types.js";
import type { ToolRegistry } from "../../agent/tool-registry.js";
import fileIo from "./file-io.js";
import httpFetch from "./http-fetch.js";
import shell from "./shell.js";

export const BUILT_IN_TOOLS: readonly Tool[] = [fileIo, shell, httpFetch];

/**
 * Register the built-in tools, or only the named ones. Returns the names
 * that were registered and those that matched no built-in.
 */
export function registerBuiltInTools(
  registry: ToolRegistry,
  enabled?: readonly string[]
): { registered: string[]; unknown: string[] } {
  const wanted = enabled ? new Set(enabled) : undefined;
  const registered: string[] = [];
  for (const tool of BUILT_IN_TOOLS) {
    if (wanted && !wanted.has(tool.meta.name)) continue;
    registry.register(tool);
    registered.push(tool.meta.name);
  }
  const unknown = enabled ? enabled.filter((name) => !BUILT_IN_TOOLS.some((tool) => tool.meta.name === name)) : [];
  return { registered, unknown };
}
