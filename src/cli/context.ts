/**
 * CLI Context - config, credentials, logger and agent for one command run
 */

import { z } from "zod";

import type { CredentialsDocument } from "../agent/types.js";
import { loadConfig, loadCredentials, type ServantConfig } from "../config.js";
import { createLogger, type Logger } from "../log.js";
import { ProviderManager } from "../agent/provider-manager.js";
import { ToolRegistry } from "../agent/tool-registry.js";
import { Servant } from "../agent/servant.js";
import { registerBuiltInTools } from "../tools/built-in/index.js";
import { OutputFormatter } from "./output-formatter.js";
import { ValidationError } from "./error-handler.js";

const GlobalOptionsSchema = z.object({
  config: z.string().optional(),
  credentials: z.string().optional(),
  workspace: z.string().optional(),
  name: z.string().optional(),
  quiet: z.boolean().optional(),
  color: z.boolean().optional(),
});

export type GlobalOptions = z.infer<typeof GlobalOptionsSchema>;

export interface CliContext {
  config: ServantConfig;
  credentials: CredentialsDocument;
  logger: Logger;
  out: OutputFormatter;
  servant: Servant;
  providers: ProviderManager;
  tools: ToolRegistry;
  close: () => void;
}

export function parseGlobalOptions(raw: unknown): GlobalOptions {
  const parsed = GlobalOptionsSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ValidationError(`Invalid options: ${parsed.error.issues.map((i) => i.message).join("; ")}`);
  }
  return parsed.data;
}

export async function createCliContext(globals: GlobalOptions): Promise<CliContext> {
  const config = await loadConfig(globals.config, {
    ...(globals.workspace ? { workspaceDir: globals.workspace } : {}),
    ...(globals.name ? { name: globals.name } : {}),
    ...(globals.credentials ? { credentialsPath: globals.credentials } : {}),
  });

  // stdout carries command output; logs go to stderr.
  const { logger, close } = createLogger(
    globals.quiet ? "error" : config.logging.level,
    config.resolved.logFilePath,
    config.logging.fileLevel,
    { stream: process.stderr }
  );

  const credentialsPath = config.resolved.credentialsPath;
  const credentials = await loadCredentials(credentialsPath);
  logger.debug({ credentialsPath, providers: credentials.providers.length }, "Credentials loaded");

  const providers = new ProviderManager({
    credentials,
    logger,
    defaultTimeoutMs: config.agent.providerTimeoutMs,
  });

  const tools = new ToolRegistry({ logger });
  const { unknown } = registerBuiltInTools(tools, config.tools.enabled);
  if (unknown.length > 0) {
    logger.warn({ unknown }, "Unknown tools in tools.enabled");
  }

  const servant = new Servant({
    name: config.name,
    workspaceDir: config.resolved.workspaceDir,
    settings: {
      maxTokens: config.agent.maxTokens,
      maxToolIterations: config.agent.maxToolIterations,
      allowTools: config.agent.allowTools,
      providerTimeoutMs: config.agent.providerTimeoutMs,
      toolTimeoutMs: config.agent.toolTimeoutMs,
      recentMemory: config.agent.recentMemory,
      allowOutsideWorkspace: config.tools.allowOutsideWorkspace,
    },
    providerManager: providers,
    toolRegistry: tools,
    logger,
  });

  const out = new OutputFormatter({
    quiet: globals.quiet,
    ...(globals.color === false ? { noColor: true } : {}),
  });

  return { config, credentials, logger, out, servant, providers, tools, close };
}
