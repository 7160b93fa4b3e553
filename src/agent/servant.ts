/**
 * Servant - the host around the think loop
 *
 * Polls tasks/ for *.md files, writes result records, keeps JSONL memory and
 * run counters, and thinks on a fixed interval between tasks.
 */

import fs from "node:fs/promises";
import path from "node:path";
import { setTimeout as sleep } from "node:timers/promises";

import type { MemoryKind, TaskResultRecord, ThinkResult } from "./types.js";
import type { Logger } from "../log.js";
import { AgentEngine } from "./engine.js";
import { BrainLoader, buildSystemPrompt } from "./prompt-builder.js";
import { getErrorMessage, NoProviderAvailableError } from "./errors.js";
import type { ProviderManager, ProviderStatus } from "./provider-manager.js";
import type { ToolRegistry } from "./tool-registry.js";
import { MemoryStore } from "../memory/memory-store.js";
import { StateStore, type AgentState } from "../runtime/state-store.js";
import { ensureWorkspacePaths, resolveWorkspacePaths, type WorkspacePaths } from "../runtime/paths.js";

export const THOUGHT_PROMPT =
  "What should you be thinking about right now? Reflect on your goals, recent tasks, and what you're learning.";

export function buildTaskPrompt(task: string): string {
  return `Task for you:\n\n${task}\n\nThink step-by-step and provide a solution.`;
}

const IMPORTANCE: Record<MemoryKind, number> = {
  task: 3,
  result: 2,
  error: 2,
  thought: 1,
  observation: 1,
};

const RESULT_MEMORY_CHARS = 200;

export interface ServantSettings {
  maxTokens: number;
  maxToolIterations: number;
  allowTools: boolean;
  providerTimeoutMs: number;
  toolTimeoutMs: number;
  recentMemory: number;
  allowOutsideWorkspace: boolean;
}

export interface ServantOptions {
  name: string;
  workspaceDir: string;
  settings: ServantSettings;
  providerManager: ProviderManager;
  toolRegistry: ToolRegistry;
  logger: Logger;
}

export interface ProcessedTask {
  record: TaskResultRecord;
  filePath: string;
}

export interface CycleResult {
  tasks: ProcessedTask[];
  thought?: string;
  error?: string;
}

export interface ServantStatus {
  state: AgentState;
  memories: number;
  workspaceDir: string;
  providers: ProviderStatus[];
  fallbackOrder: string[];
}

export class Servant {
  readonly name: string;
  readonly paths: WorkspacePaths;
  readonly memory: MemoryStore;
  private readonly settings: ServantSettings;
  private readonly providers: ProviderManager;
  private readonly tools: ToolRegistry;
  private readonly engine: AgentEngine;
  private readonly state: StateStore;
  private readonly brain: BrainLoader;
  private readonly logger: Logger;
  private lastResultStamp = 0;
  private initialized = false;

  constructor(options: ServantOptions) {
    this.name = options.name;
    this.settings = options.settings;
    this.providers = options.providerManager;
    this.tools = options.toolRegistry;
    this.logger = options.logger.child({ agent: options.name });
    this.paths = resolveWorkspacePaths(options.workspaceDir);
    this.memory = new MemoryStore({ filePath: this.paths.memoryFile, logger: this.logger });
    this.state = new StateStore({ filePath: this.paths.stateFile, name: options.name });
    this.brain = new BrainLoader({ coreFile: this.paths.coreFile, brainDir: this.paths.brainDir, logger: this.logger });
    this.engine = new AgentEngine({
      logger: this.logger,
      providerManager: options.providerManager,
      toolRegistry: options.toolRegistry,
      workspaceDir: this.paths.workspaceDir,
      allowOutsideWorkspace: options.settings.allowOutsideWorkspace,
      defaults: {
        maxToolIterations: options.settings.maxToolIterations,
        allowTools: options.settings.allowTools,
        providerTimeoutMs: options.settings.providerTimeoutMs,
        toolTimeoutMs: options.settings.toolTimeoutMs,
      },
    });
  }

  async init(): Promise<void> {
    if (this.initialized) return;
    await ensureWorkspacePaths(this.paths.workspaceDir);
    await this.memory.load();
    await this.state.load();
    await this.brain.refresh();
    this.initialized = true;
    this.logger.info({ workspaceDir: this.paths.workspaceDir }, "Servant initialized");
  }

  /**
   * One think() call with a freshly built system prompt.
   */
  async think(userPrompt: string): Promise<ThinkResult> {
    await this.init();
    await this.brain.refresh();
    const state = this.state.get();
    const allowTools = this.settings.allowTools;

    const systemPrompt = buildSystemPrompt({
      name: this.name,
      identity: this.brain.identity,
      brain: this.brain.files,
      cycle: state.cycles,
      tasksCompleted: state.tasksCompleted,
      recentMemory: this.memory.recent(this.settings.recentMemory),
      tools: allowTools ? this.tools.getAll() : [],
      currentTime: new Date(),
    });

    return this.engine.think({
      systemPrompt,
      userPrompt,
      maxTokens: this.settings.maxTokens,
      allowTools,
      maxToolIterations: this.settings.maxToolIterations,
      timeoutMs: this.settings.providerTimeoutMs,
    });
  }

  /**
   * Run one task through the think loop and write its result record.
   * A failed think() produces an error record instead of throwing.
   */
  async processTask(task: string): Promise<ProcessedTask> {
    await this.init();
    this.logger.info({ task: task.slice(0, 60) }, "Processing task");
    await this.memory.add("task", task, IMPORTANCE.task);

    let record: TaskResultRecord;
    try {
      const result = await this.think(buildTaskPrompt(task));
      record = {
        timestamp: new Date().toISOString(),
        task,
        result: result.text,
        providerId: result.providerId,
        iterations: result.iterations,
        hitIterationCap: result.hitIterationCap,
      };
      await this.memory.add("result", result.text.slice(0, RESULT_MEMORY_CHARS), IMPORTANCE.result);
      await this.state.recordTaskCompleted();
    } catch (err) {
      const error = getErrorMessage(err);
      this.logger.error({ error, noProvider: err instanceof NoProviderAvailableError }, "Task failed");
      record = {
        timestamp: new Date().toISOString(),
        task,
        error,
        iterations: 0,
        hitIterationCap: false,
      };
      await this.memory.add("error", `Task failed: ${error}`.slice(0, RESULT_MEMORY_CHARS), IMPORTANCE.error);
    }

    const filePath = await this.writeResult(record);
    this.logger.info({ filePath, ok: record.error === undefined }, "Task completed");
    return { record, filePath };
  }

  private async writeResult(record: TaskResultRecord): Promise<string> {
    const stamp = Math.max(Date.now(), this.lastResultStamp + 1);
    this.lastResultStamp = stamp;
    const filePath = path.join(this.paths.resultsDir, `task_${stamp}.json`);
    await fs.mkdir(this.paths.resultsDir, { recursive: true });
    await fs.writeFile(filePath, JSON.stringify(record, null, 2) + "\n", "utf-8");
    return filePath;
  }

  /**
   * Process every tasks/*.md file in name order, deleting each once handled.
   */
  async processPendingTasks(): Promise<ProcessedTask[]> {
    await this.init();
    let names: string[];
    try {
      names = await fs.readdir(this.paths.tasksDir);
    } catch (err) {
      if (err && typeof err === "object" && "code" in err && err.code === "ENOENT") return [];
      throw err;
    }

    const processed: ProcessedTask[] = [];
    for (const name of names.filter((n) => n.toLowerCase().endsWith(".md")).sort()) {
      const filePath = path.join(this.paths.tasksDir, name);
      const task = await fs.readFile(filePath, "utf-8");
      if (task.trim()) {
        processed.push(await this.processTask(task.trim()));
      }
      await fs.unlink(filePath);
    }
    return processed;
  }

  /**
   * One cycle: pending tasks, then a free thought, then the cycle counter.
   */
  async runCycle(): Promise<CycleResult> {
    const tasks = await this.processPendingTasks();
    const cycle: CycleResult = { tasks };

    try {
      const result = await this.think(THOUGHT_PROMPT);
      cycle.thought = result.text;
      await this.memory.add("thought", result.text, IMPORTANCE.thought);
      this.logger.info({ thought: result.text.slice(0, 100), providerId: result.providerId }, "Thought");
    } catch (err) {
      cycle.error = getErrorMessage(err);
      this.logger.error({ error: cycle.error }, "Thinking failed");
      await this.memory.add("error", `Thinking failed: ${cycle.error}`.slice(0, RESULT_MEMORY_CHARS), IMPORTANCE.error);
    }

    await this.state.recordCycle();
    return cycle;
  }

  /**
   * Think on a fixed interval until the duration passes or the signal fires.
   * Returns the number of cycles run.
   */
  async runContinuous(options: { intervalMs: number; durationMs?: number; signal?: AbortSignal }): Promise<number> {
    await this.init();
    const { intervalMs, durationMs, signal } = options;
    const startTime = Date.now();
    let cycles = 0;

    this.logger.info({ intervalMs, durationMs }, "Starting continuous thinking");
    await this.memory.add("observation", "Starting continuous thinking cycle", IMPORTANCE.observation);

    while (!signal?.aborted) {
      if (durationMs !== undefined && Date.now() - startTime >= durationMs) {
        this.logger.info("Duration limit reached, stopping");
        break;
      }

      try {
        await this.runCycle();
      } catch (err) {
        this.logger.error({ error: getErrorMessage(err) }, "Cycle failed");
      }
      cycles++;

      if (signal?.aborted) break;
      try {
        await sleep(intervalMs, undefined, signal ? { signal } : {});
      } catch (err) {
        if (signal?.aborted) break;
        throw err;
      }
    }

    await this.memory.add("observation", "Continuous thinking stopped", IMPORTANCE.observation);
    this.logger.info({ cycles }, "Continuous thinking stopped");
    return cycles;
  }

  async status(): Promise<ServantStatus> {
    await this.init();
    const providers = this.providers.status();
    return {
      state: this.state.get(),
      memories: this.memory.count,
      workspaceDir: this.paths.workspaceDir,
      providers: providers.providers,
      fallbackOrder: providers.fallbackOrder,
    };
  }
}
