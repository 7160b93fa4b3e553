import { describe, it, expect, vi, beforeEach } from "vitest";
import { EventEmitter } from "node:events";
import path from "node:path";

const { spawnMock } = vi.hoisted(() => ({ spawnMock: vi.fn() }));

vi.mock("node:child_process", () => ({
  spawn: spawnMock,
}));

import shell, { formatCommandResult } from "../../../src/tools/built-in/shell.js";
import type { ToolContext } from "../../../src/agent/types.js";
import { createSilentLogger } from "../../../src/log.js";

const WORKSPACE = path.resolve("/tmp/servant-shell-test");

function createMockChildProcess(params: { code?: number; stdout?: string; stderr?: string; error?: Error; hang?: boolean }) {
  const emitter = new EventEmitter();
  const child = Object.assign(emitter, {
    stdout: new EventEmitter(),
    stderr: new EventEmitter(),
    kill: vi.fn(() => emitter.emit("close", null)),
  });

  setTimeout(() => {
    if (params.error) {
      child.emit("error", params.error);
      return;
    }
    if (params.stdout) child.stdout.emit("data", Buffer.from(params.stdout));
    if (params.stderr) child.stderr.emit("data", Buffer.from(params.stderr));
    if (!params.hang) child.emit("close", params.code ?? 0);
  }, 0);

  return child;
}

function makeCtx(overrides: Partial<ToolContext> = {}): ToolContext {
  return {
    workspaceDir: WORKSPACE,
    logger: createSilentLogger(),
    defaultTimeoutMs: 1000,
    allowOutsideWorkspace: false,
    ...overrides,
  };
}

describe("shell tool", () => {
  beforeEach(() => {
    spawnMock.mockReset();
  });

  it("runs the program without a shell in the workspace", async () => {
    spawnMock.mockImplementation(() => createMockChildProcess({ stdout: "a.txt\nb.txt\n" }));

    const result = await shell.execute({ command: "ls", args: ["-1", 2] }, makeCtx());

    expect(result).toEqual({ ok: true, output: "exit code: 0\nstdout:\na.txt\nb.txt" });
    expect(spawnMock).toHaveBeenCalledWith("ls", ["-1", "2"], { cwd: WORKSPACE, env: process.env, shell: false });
  });

  it("reports a non-zero exit as a failure with both streams", async () => {
    spawnMock.mockImplementation(() => createMockChildProcess({ code: 2, stdout: "partial", stderr: "no such file" }));

    const result = await shell.execute({ command: "cat", args: ["missing.txt"] }, makeCtx());

    expect(result).toEqual({ ok: false, error: "exit code: 2\nstdout:\npartial\nstderr:\nno such file" });
  });

  it("reports a spawn error", async () => {
    spawnMock.mockImplementation(() => createMockChildProcess({ error: new Error("spawn nosuchprog ENOENT") }));

    const result = await shell.execute({ command: "nosuchprog" }, makeCtx());

    expect(result).toEqual({ ok: false, error: "spawn nosuchprog ENOENT" });
  });

  it("kills the child when it runs past its timeout", async () => {
    const child = createMockChildProcess({ hang: true });
    spawnMock.mockImplementation(() => child);

    const result = await shell.execute({ command: "sleep", args: ["60"], timeoutMs: 20 }, makeCtx());

    expect(child.kill).toHaveBeenCalledWith("SIGKILL");
    expect(result).toEqual({ ok: false, error: "Command timed out after 20ms\nexit code: none" });
  });

  it("rejects a working directory outside the workspace", async () => {
    await expect(shell.execute({ command: "ls", cwd: "../elsewhere" }, makeCtx())).rejects.toThrow(
      "Path escapes the workspace: ../elsewhere"
    );
    expect(spawnMock).not.toHaveBeenCalled();
  });

  it("rejects missing parameters", async () => {
    const result = await shell.execute({ args: ["x"] }, makeCtx());

    expect(result).toEqual({ ok: false, error: "Invalid parameters: command: Required" });
  });
});

describe("formatCommandResult()", () => {
  it("omits empty streams", () => {
    expect(formatCommandResult({ stdout: "", stderr: "", exitCode: 0, timedOut: false })).toBe("exit code: 0");
  });
});
