import fs from "node:fs/promises";
import path from "node:path";

import { z } from "zod";

const AgentStateSchema = z.object({
  name: z.string(),
  started: z.string(),
  cycles: z.number().int().min(0).default(0),
  tasksCompleted: z.number().int().min(0).default(0),
  lastCycle: z.string().optional(),
});

export type AgentState = z.infer<typeof AgentStateSchema>;

/**
 * Persisted run counters in state.json, replaced through a temp file and rename.
 */
export class StateStore {
  private readonly filePath: string;
  private state: AgentState;

  constructor(params: { filePath: string; name: string }) {
    this.filePath = params.filePath;
    this.state = { name: params.name, started: new Date().toISOString(), cycles: 0, tasksCompleted: 0 };
  }

  async load(): Promise<AgentState> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, "utf-8");
    } catch (err) {
      if (err && typeof err === "object" && "code" in err && err.code === "ENOENT") return this.get();
      throw err;
    }
    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      throw new Error(`Invalid JSON in state file ${this.filePath}: ${err instanceof Error ? err.message : String(err)}`);
    }
    const parsed = AgentStateSchema.safeParse(json);
    if (!parsed.success) {
      throw new Error(`Invalid state file ${this.filePath}: ${parsed.error.issues.map((i) => i.message).join("; ")}`);
    }
    this.state = { ...parsed.data, name: this.state.name };
    return this.get();
  }

  get(): AgentState {
    return { ...this.state };
  }

  async recordCycle(): Promise<AgentState> {
    this.state.cycles += 1;
    this.state.lastCycle = new Date().toISOString();
    await this.save();
    return this.get();
  }

  async recordTaskCompleted(): Promise<AgentState> {
    this.state.tasksCompleted += 1;
    await this.save();
    return this.get();
  }

  private async save(): Promise<void> {
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    const tmp = `${this.filePath}.tmp`;
    await fs.writeFile(tmp, JSON.stringify(this.state, null, 2) + "\n", "utf-8");
    await fs.rename(tmp, this.filePath);
  }
}
