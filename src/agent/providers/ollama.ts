import type { CallOptions, LLMProvider, ProviderSettings } from "../types.js";
import type { Logger } from "../../log.js";
import { ProviderError, toProviderError } from "../errors.js";
import { previewText, readString } from "./settings.js";

const DEFAULT_BASE_URL = "http://localhost:11434";
const DEFAULT_MODEL = "llama3";

export interface OllamaProviderOptions {
  id: string;
  settings: ProviderSettings;
  logger: Logger;
}

/**
 * Ollama provider for local models. `/api/generate` has no system role here,
 * so the system prompt is prepended to the user prompt as plain text.
 */
export class OllamaProvider implements LLMProvider {
  readonly type = "ollama" as const;
  readonly id: string;
  readonly model: string;
  private readonly baseUrl: string;
  private readonly logger: Logger;

  constructor(options: OllamaProviderOptions) {
    const s = options.settings;
    this.id = options.id;
    this.model = readString(s, "model", "model_id") ?? DEFAULT_MODEL;
    this.baseUrl = (readString(s, "base_url", "baseUrl") ?? DEFAULT_BASE_URL).replace(/\/$/, "");
    this.logger = options.logger;
  }

  isAvailable(): boolean {
    return Boolean(this.baseUrl && this.model);
  }

  async call(systemPrompt: string, userPrompt: string, options: CallOptions): Promise<string> {
    const url = `${this.baseUrl}/api/generate`;
    const body = {
      model: this.model,
      prompt: `${systemPrompt}\n\n${userPrompt}`,
      stream: false,
      options: {
        num_predict: options.maxTokens,
      },
    };

    this.logger.debug({ providerId: this.id, model: this.model, baseUrl: this.baseUrl }, "Ollama call started");

    let response: Response;
    try {
      response = await fetch(url, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
        },
        body: JSON.stringify(body),
        ...(options.signal ? { signal: options.signal } : {}),
      });
    } catch (err) {
      throw toProviderError(err, this.id, "Ollama request failed");
    }

    if (!response.ok) {
      const error = await response.text().catch(() => "(no body)");
      throw toProviderError(
        Object.assign(new Error(`${response.status} - ${error}`), { status: response.status }),
        this.id,
        "Ollama API error"
      );
    }

    let data: { response?: unknown };
    try {
      data = (await response.json()) as { response?: unknown };
    } catch (err) {
      throw new ProviderError("Ollama returned a non-JSON response", { reason: "format", providerId: this.id, cause: err });
    }

    if (typeof data.response !== "string") {
      throw new ProviderError("Ollama response has no 'response' field", { reason: "format", providerId: this.id });
    }

    this.logger.debug({ providerId: this.id, contentPreview: previewText(data.response) }, "Ollama call completed");
    return data.response;
  }

  async health(): Promise<boolean> {
    try {
      const response = await fetch(`${this.baseUrl}/api/tags`, { signal: AbortSignal.timeout(2000) });
      return response.ok;
    } catch {
      return false;
    }
  }
}
