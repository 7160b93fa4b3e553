import { describe, it, expect } from "vitest";
import type { ConverseCommandInput } from "@aws-sdk/client-bedrock-runtime";

import { BedrockProvider, type ConverseReply } from "../../../../src/agent/providers/bedrock.js";
import { ProviderError } from "../../../../src/agent/errors.js";
import { createSilentLogger } from "../../../../src/log.js";

const settings = {
  access_key: "test-access-key",
  secret_key: "test-secret",
  region: "eu-west-1",
  model_id: "us.anthropic.claude-test-v1:0",
};

describe("BedrockProvider", () => {
  it("is available only with keys and a model", () => {
    const logger = createSilentLogger();
    expect(new BedrockProvider({ id: "bedrock", settings, logger }).isAvailable()).toBe(true);
    expect(new BedrockProvider({ id: "bedrock", settings: { ...settings, model_id: "" }, logger }).isAvailable()).toBe(false);
    expect(new BedrockProvider({ id: "bedrock", settings: { model_id: "m" }, logger }).isAvailable()).toBe(false);
  });

  it("sends a Converse request with a top-level system prompt", async () => {
    const inputs: ConverseCommandInput[] = [];
    const provider = new BedrockProvider({
      id: "bedrock",
      settings,
      logger: createSilentLogger(),
      send: async (input): Promise<ConverseReply> => {
        inputs.push(input);
        return { output: { message: { content: [{ text: "converse reply" }] } } };
      },
    });

    await expect(provider.call("be brief", "hello", { maxTokens: 64 })).resolves.toBe("converse reply");
    expect(inputs).toEqual([
      {
        modelId: "us.anthropic.claude-test-v1:0",
        system: [{ text: "be brief" }],
        messages: [{ role: "user", content: [{ text: "hello" }] }],
        inferenceConfig: { maxTokens: 64, temperature: 1 },
      },
    ]);
  });

  it("explains the inference-profile requirement on a throughput error", async () => {
    const provider = new BedrockProvider({
      id: "bedrock",
      settings: { ...settings, model_id: "anthropic.claude-test-v1:0" },
      logger: createSilentLogger(),
      send: async () => {
        throw new Error("Invocation of model ID anthropic.claude-test-v1:0 with on-demand throughput isn't supported.");
      },
    });

    const error = await provider.call("s", "u", { maxTokens: 10 }).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ProviderError);
    if (!(error instanceof ProviderError)) return;
    expect(error.reason).toBe("format");
    expect(error.message).toBe(
      "Bedrock model anthropic.claude-test-v1:0 needs an inference profile id with a region prefix " +
        "(e.g. us.anthropic.claude-test-v1:0): unsupported throughput mode"
    );
  });

  it("classifies other SDK failures", async () => {
    const provider = new BedrockProvider({
      id: "bedrock",
      settings,
      logger: createSilentLogger(),
      send: async () => {
        throw Object.assign(new Error("Rate exceeded"), { name: "ThrottlingException", $metadata: { httpStatusCode: 429 } });
      },
    });

    const error = await provider.call("s", "u", { maxTokens: 10 }).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ProviderError);
    if (!(error instanceof ProviderError)) return;
    expect(error.reason).toBe("rate_limit");
    expect(error.status).toBe(429);
    expect(error.message).toBe("Bedrock call failed: Rate exceeded");
  });

  it("rejects a reply without text", async () => {
    const provider = new BedrockProvider({
      id: "bedrock",
      settings,
      logger: createSilentLogger(),
      send: async () => ({ output: { message: { content: [] } } }),
    });

    await expect(provider.call("s", "u", { maxTokens: 10 })).rejects.toThrow("Bedrock returned no text content");
  });
});
