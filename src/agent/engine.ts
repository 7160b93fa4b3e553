/**
 * Agent Engine - bounded think loop
 *
 * Features:
 * - Provider fallback through the ProviderManager
 * - Tool calls extracted from model text and run in extraction order
 * - Tool results folded into a continuation prompt
 * - Iteration cap as a normal, flagged termination
 */

import type { ThinkInput, ThinkResult, ToolContext, ToolResult } from "./types.js";
import type { Logger } from "../log.js";
import type { ProviderManager } from "./provider-manager.js";
import { ToolRegistry } from "./tool-registry.js";
import { extractToolCalls } from "./tool-call-parser.js";

export interface AgentEngineDefaults {
  maxToolIterations: number;
  allowTools: boolean;
  providerTimeoutMs: number;
  toolTimeoutMs: number;
}

/**
 * Agent Engine configuration
 */
export interface AgentEngineConfig {
  logger: Logger;
  providerManager: ProviderManager;
  toolRegistry: ToolRegistry;
  workspaceDir: string;
  allowOutsideWorkspace?: boolean;
  defaults?: Partial<AgentEngineDefaults>;
}

const DEFAULTS: AgentEngineDefaults = {
  maxToolIterations: 10,
  allowTools: true,
  providerTimeoutMs: 120_000,
  toolTimeoutMs: 30_000,
};

/**
 * Build the prompt for the next turn after a tool round.
 */
export function buildContinuationPrompt(originalPrompt: string, previousResponse: string, results: ToolResult[]): string {
  return [
    `Original request:\n${originalPrompt}`,
    `Your previous response:\n${previousResponse}`,
    `Tool results:\n${formatToolResults(results)}`,
    "Continue.",
  ].join("\n\n");
}

function formatToolResults(results: ToolResult[]): string {
  return JSON.stringify(
    results.map((r) => ({ tool: r.tool, success: r.success, output: r.output })),
    null,
    2
  );
}

export class AgentEngine {
  private readonly logger: Logger;
  private readonly providers: ProviderManager;
  private readonly tools: ToolRegistry;
  private readonly defaults: AgentEngineDefaults;
  private readonly toolContext: ToolContext;

  constructor(params: AgentEngineConfig) {
    this.logger = params.logger.child({ component: "engine" });
    this.providers = params.providerManager;
    this.tools = params.toolRegistry;
    this.defaults = { ...DEFAULTS, ...params.defaults };
    this.toolContext = {
      workspaceDir: params.workspaceDir,
      logger: this.logger,
      defaultTimeoutMs: this.defaults.toolTimeoutMs,
      allowOutsideWorkspace: params.allowOutsideWorkspace ?? false,
    };
  }

  /**
   * Run the think loop. Only total provider exhaustion escapes as an error.
   */
  async think(input: ThinkInput): Promise<ThinkResult> {
    const allowTools = input.allowTools ?? this.defaults.allowTools;
    const maxIterations = Math.max(1, Math.floor(input.maxToolIterations ?? this.defaults.maxToolIterations));
    const timeoutMs = input.timeoutMs ?? this.defaults.providerTimeoutMs;

    const originalPrompt = input.userPrompt;
    let currentPrompt = originalPrompt;
    let iteration = 0;
    let calls = 0;
    let lastText = "";
    let providerId = "";
    const toolResults: ToolResult[] = [];

    // awaiting response -> executing tools -> (continuation | done)
    for (;;) {
      const response = await this.providers.call(input.systemPrompt, currentPrompt, {
        maxTokens: input.maxTokens,
        timeoutMs,
      });
      calls++;
      lastText = response.text;
      providerId = response.providerId;

      const toolCalls = allowTools ? extractToolCalls(lastText) : [];
      if (toolCalls.length === 0) {
        this.logger.debug({ iterations: calls, providerId }, "Think loop finished without tool calls");
        return { text: lastText, hitIterationCap: false, iterations: calls, providerId, toolResults };
      }

      this.logger.debug({ iteration, tools: toolCalls.map((c) => c.tool) }, "Executing tool calls");

      const roundResults: ToolResult[] = [];
      for (const call of toolCalls) {
        const result = await this.tools.execute(call, this.toolContext);
        roundResults.push(result);
      }
      toolResults.push(...roundResults);
      iteration++;

      if (iteration >= maxIterations) {
        this.logger.warn({ iterations: calls, maxIterations }, "Max tool iterations reached");
        return { text: lastText, hitIterationCap: true, iterations: calls, providerId, toolResults };
      }

      currentPrompt = buildContinuationPrompt(originalPrompt, lastText, roundResults);
    }
  }
}
