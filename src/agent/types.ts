/**
 * Core Types for the servant agent
 *
 * Provider contract, tool contract and think-loop shapes shared by the
 * engine, the provider backends and the host.
 */

import type { Logger } from "../log.js";

// ============================================================================
// Provider Types
// ============================================================================

/**
 * Backend implementations known to the provider factory
 */
export type ProviderType = "bedrock" | "anthropic" | "openai" | "ollama";

/**
 * Per-call options handed to a provider
 */
export interface CallOptions {
  maxTokens: number;
  /** Aborts the backend request; the manager also races the call against timeoutMs. */
  signal?: AbortSignal;
  timeoutMs?: number;
}

/**
 * LLM Provider interface - every backend satisfies this
 */
export interface LLMProvider {
  readonly type: ProviderType;
  readonly id: string;
  readonly model: string;

  /** Minimum configuration present. Never touches the network. */
  isAvailable(): boolean;

  /** One request/response exchange. Failures surface as ProviderError. */
  call(systemPrompt: string, userPrompt: string, options: CallOptions): Promise<string>;

  /** Optional reachability probe used by `status --check`. */
  health?(): Promise<boolean>;
}

/**
 * Backend-specific settings as they appear in credentials.json
 */
export type ProviderSettings = Record<string, unknown>;

/**
 * One entry of the credentials document
 */
export interface ProviderConfig {
  name: string;
  enabled: boolean;
  type?: string;
  config: ProviderSettings;
}

/**
 * Parsed credentials document
 */
export interface CredentialsDocument {
  providers: ProviderConfig[];
  fallbackOrder: string[];
}

// ============================================================================
// Tool Types
// ============================================================================

/**
 * JSON Schema subset used to document tool parameters
 */
export interface JSONSchema {
  type: string;
  properties?: Record<string, { type: string; description?: string; enum?: string[] }>;
  required?: string[];
  description?: string;
}

/**
 * Structured invocation parsed out of model text
 */
export interface ToolCall {
  tool: string;
  params: Record<string, unknown>;
}

export type ToolErrorKind = "not_found" | "execution_failed" | "timeout";

/**
 * Outcome of one tool invocation, folded into the next prompt
 */
export interface ToolResult {
  tool: string;
  success: boolean;
  output: string;
  errorKind?: ToolErrorKind;
  durationMs?: number;
}

/**
 * What a handler may hand back: plain text, or an explicit outcome
 */
export type ToolOutcome = string | { ok: true; output: string } | { ok: false; error: string };

/**
 * Tool metadata
 */
export interface ToolMeta {
  name: string;
  description: string;
  category: string;
  timeoutMs?: number;
}

/**
 * Context passed to every tool execution
 */
export interface ToolContext {
  workspaceDir: string;
  logger: Logger;
  defaultTimeoutMs: number;
  allowOutsideWorkspace: boolean;
}

/**
 * Standard tool interface - all handlers implement this
 */
export interface Tool {
  meta: ToolMeta;
  parameters: JSONSchema;
  execute(params: Record<string, unknown>, ctx: ToolContext): Promise<ToolOutcome>;
}

// ============================================================================
// Think Loop Types
// ============================================================================

/**
 * Input to AgentEngine.think()
 */
export interface ThinkInput {
  systemPrompt: string;
  userPrompt: string;
  maxTokens: number;
  allowTools?: boolean;
  maxToolIterations?: number;
  timeoutMs?: number;
}

/**
 * Output from AgentEngine.think()
 */
export interface ThinkResult {
  text: string;
  /** True when the loop stopped on the iteration budget; `text` may still request tools. */
  hitIterationCap: boolean;
  /** Provider calls made during this invocation. */
  iterations: number;
  providerId: string;
  toolResults: ToolResult[];
}

// ============================================================================
// Memory Types
// ============================================================================

export type MemoryKind = "thought" | "task" | "result" | "observation" | "error";

export interface MemoryRecord {
  timestamp: string;
  kind: MemoryKind;
  content: string;
  importance: number;
}

/**
 * Written to results/task_<epoch-ms>.json for every processed task
 */
export interface TaskResultRecord {
  timestamp: string;
  task: string;
  result?: string;
  error?: string;
  providerId?: string;
  iterations: number;
  hitIterationCap: boolean;
}
