/**
 * Status Command - agent state and provider status
 */

import { z } from "zod";

import type { ProviderHealth } from "../../agent/provider-manager.js";
import type { CliContext } from "../context.js";

const StatusOptionsSchema = z.object({
  json: z.boolean().optional(),
  check: z.boolean().optional(),
});

export async function status(ctx: CliContext, rawOptions: unknown): Promise<void> {
  const options = StatusOptionsSchema.parse(rawOptions);
  const info = await ctx.servant.status();
  const health: ProviderHealth[] | undefined = options.check ? await ctx.providers.checkHealth() : undefined;

  if (options.json) {
    ctx.out.json({
      ...info,
      credentialsFile: ctx.config.resolved.credentialsPath,
      ...(health ? { health } : {}),
    });
    return;
  }

  const { out } = ctx;
  out.header(`${ctx.servant.name} Status`);
  out.keyValue("Started", info.state.started);
  out.keyValue("Cycles", info.state.cycles);
  out.keyValue("Tasks Completed", info.state.tasksCompleted);
  if (info.state.lastCycle) out.keyValue("Last Cycle", info.state.lastCycle);
  out.keyValue("Memories", info.memories);
  out.keyValue("Work Dir", info.workspaceDir);

  out.section("LLM Providers");
  out.keyValue("Credentials file", ctx.config.resolved.credentialsPath);
  out.keyValue("Fallback order", info.fallbackOrder.join(" → ") || "(empty)");
  const usable = info.providers.filter((p) => p.enabled && p.available && p.inFallbackOrder).map((p) => p.name);
  out.keyValue("Available", usable.length > 0 ? usable.join(", ") : "none");

  if (info.providers.length > 0) {
    out.newline();
    out.table(info.providers, [
      { key: "name", header: "Name" },
      { key: "type", header: "Type" },
      { key: "model", header: "Model" },
      { key: "enabled", header: "Enabled" },
      { key: "available", header: "Available" },
      { key: "inFallbackOrder", header: "In Order" },
    ]);
  }

  if (health) {
    out.section("Health");
    for (const entry of health) {
      out.listItem(`${entry.name} ${out.badge(entry.ok)}${entry.error ? ` ${entry.error}` : ""}`);
    }
  }
  out.newline();
}
