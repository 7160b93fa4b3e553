import { describe, it, expect, vi } from "vitest";

import { ToolRegistry, defineTool, withTimeout } from "../../../src/agent/tool-registry.js";
import type { Tool, ToolContext, ToolOutcome } from "../../../src/agent/types.js";
import { createSilentLogger } from "../../../src/log.js";

function makeTool(name: string, run: (params: Record<string, unknown>) => Promise<ToolOutcome>, timeoutMs?: number): Tool {
  return defineTool({
    meta: { name, description: `${name} tool`, category: "test", ...(timeoutMs !== undefined ? { timeoutMs } : {}) },
    parameters: { type: "object", properties: {} },
    execute: (params) => run(params),
  });
}

function makeContext(defaultTimeoutMs = 1000): ToolContext {
  return {
    workspaceDir: "/tmp/servant-test",
    logger: createSilentLogger(),
    defaultTimeoutMs,
    allowOutsideWorkspace: false,
  };
}

describe("ToolRegistry", () => {
  it("registers, looks up and lists tools", () => {
    const registry = new ToolRegistry({ logger: createSilentLogger() });
    registry.register(makeTool("echo", async (p) => String(p.text)));
    registry.register(makeTool("noop", async () => ""));

    expect(registry.count).toBe(2);
    expect(registry.has("echo")).toBe(true);
    expect(registry.get("missing")).toBeUndefined();
    expect(registry.getMetadata().map((m) => m.name)).toEqual(["echo", "noop"]);
    expect(registry.unregister("noop")).toBe(true);
    expect(registry.count).toBe(1);
  });

  it("replaces a tool registered twice and warns", () => {
    const logger = createSilentLogger();
    const warn = vi.spyOn(logger, "warn");
    const registry = new ToolRegistry({ logger });

    registry.register(makeTool("echo", async () => "first"));
    registry.register(makeTool("echo", async () => "second"));

    expect(registry.count).toBe(1);
    expect(warn).toHaveBeenCalledWith({ tool: "echo" }, "Tool already registered, replacing");
  });

  it("returns the handler's text as a successful result", async () => {
    const registry = new ToolRegistry({ logger: createSilentLogger() });
    registry.register(makeTool("echo", async (p) => `said ${String(p.text)}`));

    const result = await registry.execute({ tool: "echo", params: { text: "hi" } }, makeContext());

    expect(result.tool).toBe("echo");
    expect(result.success).toBe(true);
    expect(result.output).toBe("said hi");
    expect(result.errorKind).toBeUndefined();
  });

  it("reports an unknown tool as not_found", async () => {
    const registry = new ToolRegistry({ logger: createSilentLogger() });

    const result = await registry.execute({ tool: "nope", params: {} }, makeContext());

    expect(result).toEqual({
      tool: "nope",
      success: false,
      output: "Tool not found: nope",
      errorKind: "not_found",
      durationMs: 0,
    });
  });

  it("turns a thrown error into an execution_failed result", async () => {
    const registry = new ToolRegistry({ logger: createSilentLogger() });
    registry.register(makeTool("boom", async () => {
      throw new Error("disk on fire");
    }));

    const result = await registry.execute({ tool: "boom", params: {} }, makeContext());

    expect(result.success).toBe(false);
    expect(result.output).toBe("disk on fire");
    expect(result.errorKind).toBe("execution_failed");
  });

  it("passes an explicit failure outcome through", async () => {
    const registry = new ToolRegistry({ logger: createSilentLogger() });
    registry.register(makeTool("refuse", async () => ({ ok: false, error: "not allowed" })));

    const result = await registry.execute({ tool: "refuse", params: {} }, makeContext());

    expect(result.success).toBe(false);
    expect(result.output).toBe("not allowed");
    expect(result.errorKind).toBe("execution_failed");
  });

  it("times out a slow handler using the context default", async () => {
    const registry = new ToolRegistry({ logger: createSilentLogger() });
    registry.register(makeTool("slow", () => new Promise<string>((resolve) => setTimeout(() => resolve("late"), 500))));

    const result = await registry.execute({ tool: "slow", params: {} }, makeContext(20));

    expect(result.success).toBe(false);
    expect(result.errorKind).toBe("timeout");
    expect(result.output).toBe("Tool slow timed out after 20ms");
  });

  it("prefers the tool's own timeout over the context default", async () => {
    const registry = new ToolRegistry({ logger: createSilentLogger() });
    registry.register(
      makeTool("patient", () => new Promise<string>((resolve) => setTimeout(() => resolve("done"), 30)), 1000)
    );

    const result = await registry.execute({ tool: "patient", params: {} }, makeContext(5));

    expect(result.success).toBe(true);
    expect(result.output).toBe("done");
  });
});

describe("withTimeout()", () => {
  it("resolves with the value when the promise wins", async () => {
    await expect(withTimeout(Promise.resolve(7), 100, () => new Error("late"))).resolves.toBe(7);
  });

  it("rejects with the timeout error when the promise loses", async () => {
    const never = new Promise<number>(() => undefined);
    await expect(withTimeout(never, 10, () => new Error("late"))).rejects.toThrow("late");
  });
});
