/**
 * Anthropic (Claude) Messages API adapter.
 * System prompt travels in the top-level `system` field.
 */

import Anthropic from "@anthropic-ai/sdk";

import type { CallOptions, LLMProvider, ProviderSettings } from "../types.js";
import type { Logger } from "../../log.js";
import { ProviderError, toProviderError } from "../errors.js";
import { previewText, readNumber, readString, resolveSecret } from "./settings.js";

const DEFAULT_MODEL = "claude-3-5-sonnet-20241022";

export interface AnthropicMessageParams {
  model: string;
  max_tokens: number;
  system: string;
  messages: Array<{ role: "user"; content: string }>;
  temperature?: number;
}

/**
 * The slice of a Messages API response this adapter reads.
 */
export interface AnthropicReply {
  content: Array<{ type: string; text?: string }>;
}

export type AnthropicSender = (params: AnthropicMessageParams, signal?: AbortSignal) => Promise<AnthropicReply>;

export interface AnthropicProviderOptions {
  id: string;
  settings: ProviderSettings;
  logger: Logger;
  send?: AnthropicSender;
}

export class AnthropicProvider implements LLMProvider {
  readonly type = "anthropic" as const;
  readonly id: string;
  readonly model: string;
  private readonly apiKey?: string;
  private readonly baseUrl?: string;
  private readonly temperature?: number;
  private readonly logger: Logger;
  private send?: AnthropicSender;

  constructor(options: AnthropicProviderOptions) {
    const s = options.settings;
    this.id = options.id;
    this.model = readString(s, "model", "model_id") ?? DEFAULT_MODEL;
    this.apiKey = resolveSecret(readString(s, "api_key", "apiKey"), "ANTHROPIC_API_KEY");
    this.baseUrl = readString(s, "base_url", "baseUrl");
    this.temperature = readNumber(s, "temperature");
    this.logger = options.logger;
    this.send = options.send;
  }

  isAvailable(): boolean {
    return Boolean(this.apiKey);
  }

  async call(systemPrompt: string, userPrompt: string, options: CallOptions): Promise<string> {
    const params: AnthropicMessageParams = {
      model: this.model,
      max_tokens: options.maxTokens,
      system: systemPrompt,
      messages: [{ role: "user", content: userPrompt }],
      ...(this.temperature !== undefined ? { temperature: this.temperature } : {}),
    };

    this.logger.debug({ providerId: this.id, model: this.model, maxTokens: options.maxTokens }, "Anthropic call started");

    let reply: AnthropicReply;
    try {
      reply = await this.getSender()(params, options.signal);
    } catch (err) {
      throw toProviderError(err, this.id, "Anthropic call failed");
    }

    const textBlocks = (reply.content ?? []).filter((block) => block.type === "text" && typeof block.text === "string");
    if (textBlocks.length === 0) {
      throw new ProviderError("Anthropic returned no text content", { reason: "format", providerId: this.id });
    }
    const text = textBlocks.map((block) => block.text ?? "").join("");

    this.logger.debug({ providerId: this.id, contentPreview: previewText(text) }, "Anthropic call completed");
    return text;
  }

  private getSender(): AnthropicSender {
    if (this.send) return this.send;
    if (!this.apiKey) {
      throw new ProviderError("Anthropic API key is not configured", { reason: "auth", providerId: this.id });
    }
    const client = new Anthropic({
      apiKey: this.apiKey,
      ...(this.baseUrl ? { baseURL: this.baseUrl } : {}),
      maxRetries: 0,
    });
    this.send = (params, signal) => client.messages.create(params, signal ? { signal } : {});
    return this.send;
  }
}
