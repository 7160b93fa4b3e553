/**
 * Provider Manager - ordered fallback over the credentials document
 *
 * Features:
 * - One provider instance per configured entry, built through a factory map
 * - Strict fallback_order walk: first success wins, no provider is retried
 * - Every skipped or failed candidate is recorded for the final error
 * - Status and health probes for the CLI
 */

import type { CallOptions, CredentialsDocument, LLMProvider, ProviderConfig, ProviderSettings, ProviderType } from "./types.js";
import type { Logger } from "../log.js";
import {
  NoProviderAvailableError,
  ProviderError,
  getErrorMessage,
  resolveFailoverReason,
  type ProviderAttempt,
} from "./errors.js";
import { withTimeout } from "./tool-registry.js";
import { AnthropicProvider } from "./providers/anthropic.js";
import { BedrockProvider } from "./providers/bedrock.js";
import { OllamaProvider } from "./providers/ollama.js";
import { OpenAIProvider } from "./providers/openai.js";

export type ProviderFactory = (params: { id: string; settings: ProviderSettings; logger: Logger }) => LLMProvider;

export const DEFAULT_PROVIDER_FACTORIES: Record<ProviderType, ProviderFactory> = {
  bedrock: (p) => new BedrockProvider(p),
  anthropic: (p) => new AnthropicProvider(p),
  openai: (p) => new OpenAIProvider(p),
  ollama: (p) => new OllamaProvider(p),
};

export interface ProviderManagerOptions {
  credentials: CredentialsDocument;
  logger: Logger;
  /** Overrides or extends the backend factories, keyed by config `type`. */
  factories?: Partial<Record<string, ProviderFactory>>;
  /** Default per-call timeout when the caller gives none. */
  defaultTimeoutMs?: number;
}

export interface ProviderCallResult {
  text: string;
  providerId: string;
}

export interface ProviderStatus {
  name: string;
  type: string;
  model?: string;
  enabled: boolean;
  available: boolean;
  inFallbackOrder: boolean;
}

export interface ProviderHealth {
  name: string;
  ok: boolean;
  error?: string;
}

const HEALTH_TIMEOUT_MS = 5000;

export class ProviderManager {
  private readonly configs: Map<string, ProviderConfig> = new Map();
  private readonly providers: Map<string, LLMProvider> = new Map();
  private readonly initErrors: Map<string, string> = new Map();
  private readonly fallbackOrder: readonly string[];
  private readonly logger: Logger;
  private readonly defaultTimeoutMs?: number;

  constructor(options: ProviderManagerOptions) {
    this.logger = options.logger.child({ component: "providers" });
    this.fallbackOrder = Object.freeze([...options.credentials.fallbackOrder]);
    this.defaultTimeoutMs = options.defaultTimeoutMs;

    const factories: Partial<Record<string, ProviderFactory>> = {
      ...DEFAULT_PROVIDER_FACTORIES,
      ...options.factories,
    };

    for (const config of options.credentials.providers) {
      if (this.configs.has(config.name)) {
        this.logger.warn({ name: config.name }, "Duplicate provider entry, keeping the first");
        continue;
      }
      this.configs.set(config.name, config);

      const type = config.type ?? config.name;
      const factory = factories[type];
      if (!factory) {
        this.logger.warn({ name: config.name, type }, "Unknown provider type");
        continue;
      }
      try {
        this.providers.set(config.name, factory({ id: config.name, settings: config.config, logger: this.logger }));
        this.logger.debug({ name: config.name, type }, "Provider initialized");
      } catch (err) {
        const error = getErrorMessage(err);
        this.initErrors.set(config.name, error);
        this.logger.warn({ name: config.name, type, error }, "Failed to initialize provider");
      }
    }

    this.logger.info(
      { count: this.providers.size, fallbackOrder: this.fallbackOrder },
      "LLM providers initialized"
    );
  }

  getFallbackOrder(): string[] {
    return [...this.fallbackOrder];
  }

  getProvider(name: string): LLMProvider | undefined {
    return this.providers.get(name);
  }

  /**
   * Walk fallback_order and return the first successful reply.
   * Throws NoProviderAvailableError once every candidate is exhausted.
   */
  async call(
    systemPrompt: string,
    userPrompt: string,
    options: { maxTokens: number; timeoutMs?: number }
  ): Promise<ProviderCallResult> {
    const attempts: ProviderAttempt[] = [];
    const timeoutMs = options.timeoutMs ?? this.defaultTimeoutMs;

    for (const name of this.fallbackOrder) {
      const config = this.configs.get(name);
      if (!config) {
        attempts.push({ provider: name, outcome: "missing", reason: "no configuration" });
        continue;
      }
      if (!config.enabled) {
        attempts.push({ provider: name, outcome: "disabled", reason: "enabled is false" });
        continue;
      }
      const provider = this.providers.get(name);
      const initError = this.initErrors.get(name);
      if (initError !== undefined) {
        attempts.push({ provider: name, outcome: "unavailable", reason: `failed to initialize: ${initError}` });
        continue;
      }
      if (!provider) {
        attempts.push({
          provider: name,
          outcome: "unsupported",
          reason: `unknown type ${config.type ?? config.name}`,
        });
        continue;
      }
      if (!provider.isAvailable()) {
        this.logger.debug({ provider: name }, "Provider not available, skipping");
        attempts.push({ provider: name, outcome: "unavailable", reason: "missing configuration" });
        continue;
      }

      const startTime = Date.now();
      try {
        const text = await this.callWithTimeout(provider, systemPrompt, userPrompt, {
          maxTokens: options.maxTokens,
          timeoutMs,
        });
        this.logger.info({ provider: name, model: provider.model, durationMs: Date.now() - startTime }, "Provider call succeeded");
        return { text, providerId: name };
      } catch (err) {
        const reason = resolveFailoverReason(err);
        const error = getErrorMessage(err);
        this.logger.warn({ provider: name, reason, error, durationMs: Date.now() - startTime }, "Provider call failed, trying next");
        attempts.push({ provider: name, outcome: "failed", reason: `${reason}: ${error}` });
      }
    }

    const failure = new NoProviderAvailableError(attempts);
    this.logger.error({ attempts }, "No LLM providers available");
    throw failure;
  }

  private async callWithTimeout(
    provider: LLMProvider,
    systemPrompt: string,
    userPrompt: string,
    options: { maxTokens: number; timeoutMs?: number }
  ): Promise<string> {
    const { timeoutMs } = options;
    if (!timeoutMs || timeoutMs <= 0) {
      return provider.call(systemPrompt, userPrompt, { maxTokens: options.maxTokens });
    }

    const controller = new AbortController();
    const callOptions: CallOptions = { maxTokens: options.maxTokens, timeoutMs, signal: controller.signal };
    try {
      return await withTimeout(
        provider.call(systemPrompt, userPrompt, callOptions),
        timeoutMs,
        () => {
          controller.abort();
          return new ProviderError(`Provider ${provider.id} timed out after ${timeoutMs}ms`, {
            reason: "timeout",
            providerId: provider.id,
          });
        }
      );
    } finally {
      if (!controller.signal.aborted) controller.abort();
    }
  }

  status(): { providers: ProviderStatus[]; fallbackOrder: string[] } {
    const providers: ProviderStatus[] = [];
    for (const [name, config] of this.configs) {
      const provider = this.providers.get(name);
      providers.push({
        name,
        type: config.type ?? config.name,
        ...(provider ? { model: provider.model } : {}),
        enabled: config.enabled,
        available: Boolean(provider?.isAvailable()),
        inFallbackOrder: this.fallbackOrder.includes(name),
      });
    }
    return { providers, fallbackOrder: this.getFallbackOrder() };
  }

  /**
   * Run every provider's network probe. Providers without one report their
   * configuration check instead.
   */
  async checkHealth(timeoutMs = HEALTH_TIMEOUT_MS): Promise<ProviderHealth[]> {
    const results: ProviderHealth[] = [];
    for (const [name, provider] of this.providers) {
      if (!provider.health) {
        results.push({ name, ok: provider.isAvailable() });
        continue;
      }
      try {
        const ok = await withTimeout(provider.health(), timeoutMs, () => new Error(`health check timed out after ${timeoutMs}ms`));
        results.push({ name, ok });
      } catch (err) {
        results.push({ name, ok: false, error: getErrorMessage(err) });
      }
    }
    return results;
  }
}
