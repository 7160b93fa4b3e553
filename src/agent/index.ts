/**
 * Agent Module - think loop, providers, tools and prompt assembly
 */

// Core Engine
export { AgentEngine, buildContinuationPrompt, type AgentEngineConfig, type AgentEngineDefaults } from "./engine.js";

// Host
export {
  Servant,
  THOUGHT_PROMPT,
  buildTaskPrompt,
  type ServantOptions,
  type ServantSettings,
  type ProcessedTask,
  type CycleResult,
  type ServantStatus,
} from "./servant.js";

// Tool System
export { ToolRegistry, ToolTimeoutError, defineTool, defineParams, withTimeout } from "./tool-registry.js";
export { extractToolCalls, formatToolCall, stripToolCalls, looksLikeToolCallMarkup } from "./tool-call-parser.js";

// Provider System
export {
  ProviderManager,
  DEFAULT_PROVIDER_FACTORIES,
  type ProviderFactory,
  type ProviderManagerOptions,
  type ProviderCallResult,
  type ProviderStatus,
  type ProviderHealth,
} from "./provider-manager.js";
export { BedrockProvider, type ConverseSender, type ConverseReply } from "./providers/bedrock.js";
export { AnthropicProvider, type AnthropicSender, type AnthropicReply, type AnthropicMessageParams } from "./providers/anthropic.js";
export { OpenAIProvider } from "./providers/openai.js";
export { OllamaProvider } from "./providers/ollama.js";
export {
  ProviderError,
  NoProviderAvailableError,
  isProviderError,
  classifyFailoverReason,
  resolveFailoverReason,
  type FailoverReason,
  type ProviderAttempt,
  type AttemptOutcome,
} from "./errors.js";

// Prompt Builder
export { buildSystemPrompt, formatMemoryLine, BrainLoader, type BrainFile, type PromptContext } from "./prompt-builder.js";

// Types
export type {
  ProviderType,
  CallOptions,
  LLMProvider,
  ProviderSettings,
  ProviderConfig,
  CredentialsDocument,
  JSONSchema,
  ToolCall,
  ToolErrorKind,
  ToolResult,
  ToolOutcome,
  ToolMeta,
  ToolContext,
  Tool,
  ThinkInput,
  ThinkResult,
  MemoryKind,
  MemoryRecord,
  TaskResultRecord,
} from "./types.js";
