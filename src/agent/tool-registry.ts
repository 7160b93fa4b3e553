/**
 * Tool Registry - Dispatch table for tool calls
 *
 * Features:
 * - Name-based registration of handlers
 * - Failures, unknown names and timeouts all become ToolResults
 * - Tool metadata for prompt documentation
 */

import type { Tool, ToolCall, ToolContext, ToolMeta, ToolOutcome, ToolResult, JSONSchema } from "./types.js";
import type { Logger } from "../log.js";
import { getErrorMessage } from "./errors.js";

export class ToolTimeoutError extends Error {
  constructor(tool: string, timeoutMs: number) {
    super(`Tool ${tool} timed out after ${timeoutMs}ms`);
    this.name = "ToolTimeoutError";
  }
}

/**
 * Tool Registry manages all available tools
 */
export class ToolRegistry {
  private readonly tools: Map<string, Tool> = new Map();
  private readonly logger: Logger;

  constructor(params: { logger: Logger }) {
    this.logger = params.logger;
  }

  /**
   * Register a tool
   */
  register(tool: Tool): void {
    if (this.tools.has(tool.meta.name)) {
      this.logger.warn({ tool: tool.meta.name }, "Tool already registered, replacing");
    }
    this.tools.set(tool.meta.name, tool);
  }

  unregister(name: string): boolean {
    return this.tools.delete(name);
  }

  get(name: string): Tool | undefined {
    return this.tools.get(name);
  }

  getAll(): Tool[] {
    return Array.from(this.tools.values());
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  get count(): number {
    return this.tools.size;
  }

  getMetadata(): ToolMeta[] {
    return this.getAll().map((tool) => tool.meta);
  }

  /**
   * Execute one tool call. Never throws.
   */
  async execute(call: ToolCall, ctx: ToolContext): Promise<ToolResult> {
    const startTime = Date.now();
    const tool = this.tools.get(call.tool);

    if (!tool) {
      ctx.logger.warn({ tool: call.tool }, "Tool not found");
      return {
        tool: call.tool,
        success: false,
        output: `Tool not found: ${call.tool}`,
        errorKind: "not_found",
        durationMs: 0,
      };
    }

    const timeoutMs = tool.meta.timeoutMs ?? ctx.defaultTimeoutMs;

    try {
      ctx.logger.debug({ tool: call.tool, params: call.params }, "Executing tool");
      const outcome = await withTimeout(tool.execute(call.params, ctx), timeoutMs, () => new ToolTimeoutError(call.tool, timeoutMs));
      const result = normalizeOutcome(call.tool, outcome, Date.now() - startTime);

      ctx.logger.debug({ tool: call.tool, success: result.success, duration: result.durationMs }, "Tool execution complete");
      return result;
    } catch (err) {
      const error = getErrorMessage(err);
      const timedOut = err instanceof ToolTimeoutError;
      ctx.logger.warn({ tool: call.tool, error, timedOut }, "Tool execution failed");

      return {
        tool: call.tool,
        success: false,
        output: error,
        errorKind: timedOut ? "timeout" : "execution_failed",
        durationMs: Date.now() - startTime,
      };
    }
  }
}

function normalizeOutcome(tool: string, outcome: ToolOutcome, durationMs: number): ToolResult {
  if (typeof outcome === "string") {
    return { tool, success: true, output: outcome, durationMs };
  }
  if (outcome.ok) {
    return { tool, success: true, output: outcome.output, durationMs };
  }
  return { tool, success: false, output: outcome.error, errorKind: "execution_failed", durationMs };
}

export async function withTimeout<T>(promise: Promise<T>, timeoutMs: number, onTimeout: () => Error): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(onTimeout()), timeoutMs);
    timer.unref?.();
  });

  return Promise.race([
    promise.finally(() => {
      if (timer) clearTimeout(timer);
    }),
    timeout,
  ]);
}

/**
 * Helper to create a tool with proper typing
 */
export function defineTool(tool: Tool): Tool {
  return tool;
}

/**
 * Helper to create tool parameters schema
 */
export function defineParams(
  properties: Record<string, { type: string; description?: string; enum?: string[] }>,
  required: string[] = []
): JSONSchema {
  return {
    type: "object",
    properties,
    required,
  };
}
