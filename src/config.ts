import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import { z } from "zod";

import type { CredentialsDocument } from "./agent/types.js";
import { ConfigError } from "./cli/error-handler.js";

const DEFAULT_CONFIG_PATH = "servant.config.json";
const DEFAULT_CREDENTIALS_PATH = "credentials.json";

export const DEFAULT_FALLBACK_ORDER = ["bedrock", "anthropic", "openai", "ollama"] as const;

/** Largest delay Node timers honour; longer ones fire after 1ms. */
const MAX_TIMER_MS = 2_147_483_647;

const LogLevelSchema = z.enum(["trace", "debug", "info", "warn", "error"]);

const AgentSchema = z.object({
  maxTokens: z.number().int().positive().default(500),
  maxToolIterations: z.number().int().default(10),
  allowTools: z.boolean().default(true),
  providerTimeoutMs: z.number().int().positive().max(MAX_TIMER_MS).default(120_000),
  toolTimeoutMs: z.number().int().positive().max(MAX_TIMER_MS).default(30_000),
  recentMemory: z.number().int().min(0).default(5),
});

const LoopSchema = z.object({
  intervalSeconds: z.number().positive().default(5),
  durationSeconds: z.number().positive().optional(),
});

const ToolsSchema = z.object({
  enabled: z.array(z.string().min(1)).optional(),
  allowOutsideWorkspace: z.boolean().default(false),
});

const LoggingSchema = z.object({
  level: LogLevelSchema.default("info"),
  filePath: z.string().optional(),
  fileLevel: LogLevelSchema.optional(),
});

const ConfigSchema = z.object({
  workspaceDir: z.string().default("~/.servant/workspace"),
  name: z.string().min(1).default("servant"),
  credentialsPath: z.string().optional(),
  agent: AgentSchema.default({}),
  loop: LoopSchema.default({}),
  tools: ToolsSchema.default({}),
  logging: LoggingSchema.default({}),
});

const ProviderEntrySchema = z.object({
  name: z.string().trim().min(1),
  enabled: z.boolean().default(true),
  type: z.string().trim().min(1).optional(),
  config: z.record(z.unknown()).default({}),
});

const CredentialsSchema = z.object({
  providers: z.array(ProviderEntrySchema).default([]),
  fallback_order: z.array(z.string().trim().min(1)).default([...DEFAULT_FALLBACK_ORDER]),
});

export type ServantConfig = z.infer<typeof ConfigSchema> & {
  resolved: {
    workspaceDir: string;
    configPath?: string;
    credentialsPath: string;
    logFilePath?: string;
  };
};

export interface ConfigOverrides {
  workspaceDir?: string;
  name?: string;
  credentialsPath?: string;
}

/**
 * Load servant.config.json. The file is optional: when neither an explicit
 * path nor SERVANT_CONFIG names one and ./servant.config.json is absent,
 * defaults apply.
 */
export async function loadConfig(explicitPath?: string, overrides: ConfigOverrides = {}): Promise<ServantConfig> {
  const configPath = resolveConfigPath(explicitPath);
  const required = Boolean(explicitPath?.trim() || process.env.SERVANT_CONFIG?.trim());

  let parsed: unknown = {};
  let found = false;
  try {
    const raw = await fs.readFile(configPath, "utf-8");
    parsed = parseJson(raw, configPath);
    found = true;
  } catch (err) {
    if (err instanceof ConfigError) throw err;
    if (required || !isNotFound(err)) {
      throw new ConfigError(
        `Cannot read config file ${configPath}: ${err instanceof Error ? err.message : String(err)}`,
        "Check the --config path or the SERVANT_CONFIG variable"
      );
    }
  }

  const result = ConfigSchema.safeParse(parsed);
  if (!result.success) {
    throw new ConfigError(`Invalid config ${configPath}: ${formatIssues(result.error)}`);
  }

  const base = {
    ...result.data,
    ...(overrides.workspaceDir ? { workspaceDir: overrides.workspaceDir } : {}),
    ...(overrides.name ? { name: overrides.name } : {}),
    ...(overrides.credentialsPath ? { credentialsPath: overrides.credentialsPath } : {}),
  };
  return resolveConfig(base, found ? configPath : undefined);
}

export function resolveConfigPath(explicitPath?: string): string {
  const envPath = process.env.SERVANT_CONFIG?.trim();
  const pathToUse = explicitPath?.trim() || envPath || DEFAULT_CONFIG_PATH;
  return resolveUserPath(pathToUse);
}

export function resolveCredentialsPath(configured?: string): string {
  const envPath = process.env.SERVANT_CREDENTIALS?.trim();
  return resolveUserPath(configured?.trim() || envPath || DEFAULT_CREDENTIALS_PATH);
}

function resolveConfig(base: z.infer<typeof ConfigSchema>, configPath?: string): ServantConfig {
  const workspaceDir = resolveUserPath(base.workspaceDir);
  const credentialsPath = resolveCredentialsPath(base.credentialsPath);
  const logFilePath = base.logging.filePath?.trim()
    ? resolveUserPath(base.logging.filePath, workspaceDir)
    : undefined;

  return {
    ...base,
    resolved: {
      workspaceDir,
      ...(configPath ? { configPath } : {}),
      credentialsPath,
      ...(logFilePath ? { logFilePath } : {}),
    },
  };
}

/**
 * Load the provider credentials document. A missing file yields no providers
 * and the default fallback order.
 */
export async function loadCredentials(filePath: string): Promise<CredentialsDocument> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, "utf-8");
  } catch (err) {
    if (isNotFound(err)) {
      return { providers: [], fallbackOrder: [...DEFAULT_FALLBACK_ORDER] };
    }
    throw new ConfigError(
      `Cannot read credentials file ${filePath}: ${err instanceof Error ? err.message : String(err)}`
    );
  }
  return parseCredentials(parseJson(raw, filePath), filePath);
}

export function parseCredentials(value: unknown, source = "credentials"): CredentialsDocument {
  const result = CredentialsSchema.safeParse(value);
  if (!result.success) {
    throw new ConfigError(
      `Invalid credentials ${source}: ${formatIssues(result.error)}`,
      "Each provider needs a name and a config object; fallback_order is a list of provider names"
    );
  }
  return {
    providers: result.data.providers.map((p) => ({
      name: p.name,
      enabled: p.enabled,
      ...(p.type ? { type: p.type } : {}),
      config: p.config,
    })),
    fallbackOrder: result.data.fallback_order,
  };
}

function parseJson(raw: string, filePath: string): unknown {
  try {
    return JSON.parse(raw);
  } catch (err) {
    throw new ConfigError(`Invalid JSON in ${filePath}: ${err instanceof Error ? err.message : String(err)}`);
  }
}

function formatIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`).join("; ");
}

function isNotFound(err: unknown): boolean {
  return Boolean(err && typeof err === "object" && "code" in err && err.code === "ENOENT");
}

export function resolveUserPath(value: string, baseDir?: string): string {
  const trimmed = value.trim();
  if (!trimmed) return trimmed;
  if (trimmed.startsWith("~")) {
    return path.join(os.homedir(), trimmed.slice(1));
  }
  if (path.isAbsolute(trimmed)) {
    return path.normalize(trimmed);
  }
  if (baseDir) {
    return path.resolve(baseDir, trimmed);
  }
  return path.resolve(trimmed);
}
