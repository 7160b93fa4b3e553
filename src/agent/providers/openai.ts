import type { CallOptions, LLMProvider, ProviderSettings } from "../types.js";
import type { Logger } from "../../log.js";
import { ProviderError, toProviderError } from "../errors.js";
import { previewText, readNumber, readString, resolveSecret } from "./settings.js";

const DEFAULT_BASE_URL = "https://api.openai.com/v1";
const DEFAULT_MODEL = "gpt-4o-mini";

interface ChatCompletionResponse {
  choices?: Array<{
    message?: { content?: string | null };
    finish_reason?: string;
  }>;
  usage?: {
    prompt_tokens: number;
    completion_tokens: number;
    total_tokens: number;
  };
}

export interface OpenAIProviderOptions {
  id: string;
  settings: ProviderSettings;
  logger: Logger;
}

/**
 * OpenAI-compatible chat-completions provider.
 * The system prompt is sent as the first conversation turn.
 */
export class OpenAIProvider implements LLMProvider {
  readonly type = "openai" as const;
  readonly id: string;
  readonly model: string;
  private readonly baseUrl: string;
  private readonly apiKey?: string;
  private readonly temperature?: number;
  private readonly logger: Logger;

  constructor(options: OpenAIProviderOptions) {
    const s = options.settings;
    this.id = options.id;
    this.model = readString(s, "model", "model_id") ?? DEFAULT_MODEL;
    this.baseUrl = (readString(s, "base_url", "baseUrl") ?? DEFAULT_BASE_URL).replace(/\/$/, "");
    this.apiKey = resolveSecret(readString(s, "api_key", "apiKey"), "OPENAI_API_KEY");
    this.temperature = readNumber(s, "temperature");
    this.logger = options.logger;
  }

  isAvailable(): boolean {
    return Boolean(this.apiKey);
  }

  async call(systemPrompt: string, userPrompt: string, options: CallOptions): Promise<string> {
    const url = `${this.baseUrl}/chat/completions`;
    const body: Record<string, unknown> = {
      model: this.model,
      messages: [
        { role: "system", content: systemPrompt },
        { role: "user", content: userPrompt },
      ],
      max_tokens: options.maxTokens,
    };
    if (this.temperature !== undefined) {
      body.temperature = this.temperature;
    }

    this.logger.debug(
      { providerId: this.id, model: this.model, baseUrl: this.baseUrl, maxTokens: options.maxTokens },
      "OpenAI provider call started"
    );

    let response: Response;
    try {
      response = await fetch(url, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          "Authorization": `Bearer ${this.apiKey ?? ""}`,
        },
        body: JSON.stringify(body),
        ...(options.signal ? { signal: options.signal } : {}),
      });
    } catch (err) {
      throw toProviderError(err, this.id, "OpenAI request failed");
    }

    if (!response.ok) {
      const error = await response.text().catch(() => "(no body)");
      throw toProviderError(
        Object.assign(new Error(`${response.status} - ${error}`), { status: response.status }),
        this.id,
        "OpenAI API error"
      );
    }

    let data: ChatCompletionResponse;
    try {
      data = (await response.json()) as ChatCompletionResponse;
    } catch (err) {
      throw new ProviderError("OpenAI returned a non-JSON response", { reason: "format", providerId: this.id, cause: err });
    }

    const choice = data.choices?.[0];
    const content = choice?.message?.content;
    if (typeof content !== "string") {
      throw new ProviderError("OpenAI response has no message content", { reason: "format", providerId: this.id });
    }

    this.logger.debug(
      {
        providerId: this.id,
        finishReason: choice?.finish_reason,
        contentPreview: previewText(content),
        usage: data.usage,
      },
      "OpenAI provider call completed"
    );

    return content;
  }

  async health(): Promise<boolean> {
    try {
      const response = await fetch(`${this.baseUrl}/models`, {
        method: "GET",
        headers: {
          "Authorization": `Bearer ${this.apiKey ?? ""}`,
        },
        signal: AbortSignal.timeout(5000),
      });
      return response.ok;
    } catch {
      return false;
    }
  }
}
