import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import { program } from "../../src/cli.js";

describe("CLI wiring", () => {
  it("registers top-level commands", () => {
    const names = program.commands.map((cmd) => cmd.name());

    expect(names).toEqual(["run", "task", "memory", "status"]);
  });

  it("declares the global options", () => {
    const flags = program.options.map((opt) => opt.long);

    expect(flags).toEqual(expect.arrayContaining(["--config", "--credentials", "--workspace", "--name", "--quiet", "--no-color"]));
  });

  it("defaults memory --count to 10", () => {
    const memory = program.commands.find((cmd) => cmd.name() === "memory");
    const count = memory?.options.find((opt) => opt.long === "--count");

    expect(count?.defaultValue).toBe("10");
  });
});

describe("servant task", () => {
  let root: string;
  const savedConfig = process.env.SERVANT_CONFIG;

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), "servant-cli-"));
    delete process.env.SERVANT_CONFIG;
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    process.exitCode = undefined;
    if (savedConfig === undefined) delete process.env.SERVANT_CONFIG;
    else process.env.SERVANT_CONFIG = savedConfig;
    await fs.rm(root, { recursive: true, force: true });
  });

  it("prints an error record and exits non-zero when no provider can answer", async () => {
    const workspaceDir = path.join(root, "ws");
    const credentialsPath = path.join(root, "credentials.json");
    const configPath = path.join(root, "servant.config.json");
    await fs.writeFile(credentialsPath, JSON.stringify({ providers: [], fallback_order: ["ghost"] }));
    await fs.writeFile(configPath, JSON.stringify({ logging: { level: "error" } }));

    const printed: string[] = [];
    vi.spyOn(console, "log").mockImplementation((value?: unknown) => {
      printed.push(String(value));
    });
    vi.spyOn(process.stderr, "write").mockImplementation(() => true);

    await program.parseAsync(
      ["--config", configPath, "--workspace", workspaceDir, "--credentials", credentialsPath, "task", "tidy", "the", "notes"],
      { from: "user" }
    );

    expect(process.exitCode).toBe(1);
    const record: unknown = JSON.parse(printed[0] ?? "{}");
    expect(record).toEqual({
      timestamp: expect.any(String),
      task: "tidy the notes",
      error: "No LLM providers available. Tried:\n  - ghost: missing (no configuration)",
      iterations: 0,
      hitIterationCap: false,
    });

    const results = await fs.readdir(path.join(workspaceDir, "results"));
    expect(results).toHaveLength(1);
    expect(results[0]).toMatch(/^task_\d+\.json$/);
  });
});
