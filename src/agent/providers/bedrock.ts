// Amazon Bedrock adapter - Converse API
//
//   - System prompt is a top-level "system" field (NOT a message role)
//   - Content is an array of { text } objects, with no type tag
//   - inferenceConfig carries temperature only; Claude models on Bedrock
//     reject temperature and topP together
//   - Newer models are only reachable through a region-prefixed inference
//     profile (us., eu., apac., global.); a bare model id answers with an
//     "on-demand throughput isn't supported" ValidationException

import {
  BedrockRuntimeClient,
  ConverseCommand,
  type ConverseCommandInput,
} from "@aws-sdk/client-bedrock-runtime";

import type { CallOptions, LLMProvider, ProviderSettings } from "../types.js";
import type { Logger } from "../../log.js";
import { ProviderError, getErrorMessage, toProviderError } from "../errors.js";
import { previewText, readNumber, readString, resolveSecret } from "./settings.js";

const DEFAULT_REGION = "us-east-1";
const DEFAULT_TEMPERATURE = 1;

const THROUGHPUT_RE = /on-demand throughput/i;

/**
 * The slice of a Converse response this adapter reads.
 */
export interface ConverseReply {
  output?: {
    message?: {
      content?: Array<{ text?: string }>;
    };
  };
}

export type ConverseSender = (input: ConverseCommandInput, signal?: AbortSignal) => Promise<ConverseReply>;

export interface BedrockProviderOptions {
  id: string;
  settings: ProviderSettings;
  logger: Logger;
  /** Replaces the SDK client; used by tests. */
  send?: ConverseSender;
}

export class BedrockProvider implements LLMProvider {
  readonly type = "bedrock" as const;
  readonly id: string;
  readonly model: string;
  private readonly region: string;
  private readonly accessKeyId?: string;
  private readonly secretAccessKey?: string;
  private readonly sessionToken?: string;
  private readonly temperature: number;
  private readonly logger: Logger;
  private send?: ConverseSender;

  constructor(options: BedrockProviderOptions) {
    const s = options.settings;
    this.id = options.id;
    this.model = readString(s, "model_id", "modelId", "model") ?? "";
    this.region = readString(s, "region") ?? DEFAULT_REGION;
    this.accessKeyId = resolveSecret(readString(s, "access_key", "accessKeyId"));
    this.secretAccessKey = resolveSecret(readString(s, "secret_key", "secretAccessKey"));
    this.sessionToken = resolveSecret(readString(s, "session_token", "sessionToken"));
    this.temperature = readNumber(s, "temperature") ?? DEFAULT_TEMPERATURE;
    this.logger = options.logger;
    this.send = options.send;
  }

  isAvailable(): boolean {
    return Boolean(this.accessKeyId && this.secretAccessKey && this.model);
  }

  async call(systemPrompt: string, userPrompt: string, options: CallOptions): Promise<string> {
    const input: ConverseCommandInput = {
      modelId: this.model,
      system: [{ text: systemPrompt }],
      messages: [
        {
          role: "user",
          content: [{ text: userPrompt }],
        },
      ],
      inferenceConfig: {
        maxTokens: options.maxTokens,
        temperature: this.temperature,
      },
    };

    this.logger.debug(
      { providerId: this.id, model: this.model, region: this.region, maxTokens: options.maxTokens },
      "Bedrock converse call started"
    );

    let reply: ConverseReply;
    try {
      reply = await this.getSender()(input, options.signal);
    } catch (err) {
      const message = getErrorMessage(err);
      if (THROUGHPUT_RE.test(message)) {
        throw new ProviderError(
          `Bedrock model ${this.model} needs an inference profile id with a region prefix (e.g. us.${this.model}): unsupported throughput mode`,
          { reason: "format", providerId: this.id, cause: err }
        );
      }
      throw toProviderError(err, this.id, "Bedrock call failed");
    }

    const text = reply.output?.message?.content?.find((part) => typeof part.text === "string")?.text;
    if (text === undefined) {
      throw new ProviderError("Bedrock returned no text content", { reason: "format", providerId: this.id });
    }

    this.logger.debug({ providerId: this.id, contentPreview: previewText(text) }, "Bedrock converse call completed");
    return text;
  }

  private getSender(): ConverseSender {
    if (this.send) return this.send;
    if (!this.accessKeyId || !this.secretAccessKey) {
      throw new ProviderError("Bedrock credentials are not configured", { reason: "auth", providerId: this.id });
    }
    const client = new BedrockRuntimeClient({
      region: this.region,
      credentials: {
        accessKeyId: this.accessKeyId,
        secretAccessKey: this.secretAccessKey,
        ...(this.sessionToken ? { sessionToken: this.sessionToken } : {}),
      },
    });
    this.send = (input, signal) => client.send(new ConverseCommand(input), signal ? { abortSignal: signal } : {});
    return this.send;
  }
}
