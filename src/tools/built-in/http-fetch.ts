/**
 * HTTP Fetch Tool - Make an HTTP request and return status and body
 */

import { z } from "zod";

import { defineTool, defineParams } from "../../agent/tool-registry.js";
import type { ToolOutcome } from "../../agent/types.js";
import { getErrorMessage } from "../../agent/errors.js";

const MAX_BODY_CHARS = 100_000;

const HttpFetchParamsSchema = z.object({
  url: z.string().url().refine((value) => /^https?:\/\//i.test(value), { message: "only http and https URLs are supported" }),
  method: z.enum(["GET", "POST", "PUT", "PATCH", "DELETE", "HEAD"]).default("GET"),
  headers: z.record(z.string()).default({}),
  body: z.string().optional(),
});

export default defineTool({
  meta: {
    name: "http-fetch",
    description: "Make an HTTP request. Returns the status line and the response body (truncated to 100000 characters).",
    category: "network",
  },
  parameters: defineParams({
    url: { type: "string", description: "Absolute http(s) URL" },
    method: { type: "string", description: "HTTP method", enum: ["GET", "POST", "PUT", "PATCH", "DELETE", "HEAD"] },
    headers: { type: "object", description: "Request headers" },
    body: { type: "string", description: "Request body" },
  }, ["url"]),
  async execute(args, ctx): Promise<ToolOutcome> {
    const parsed = HttpFetchParamsSchema.safeParse({
      ...args,
      ...(typeof args.method === "string" ? { method: args.method.toUpperCase() } : {}),
    });
    if (!parsed.success) {
      return { ok: false, error: `Invalid parameters: ${parsed.error.issues.map((i) => `${i.path.join(".") || "params"}: ${i.message}`).join("; ")}` };
    }
    const { url, method, headers, body } = parsed.data;

    ctx.logger.info({ tool: "http-fetch", url, method }, "HTTP request started");

    let response: Response;
    try {
      response = await fetch(url, {
        method,
        headers,
        ...(body !== undefined && method !== "GET" && method !== "HEAD" ? { body } : {}),
        signal: AbortSignal.timeout(ctx.defaultTimeoutMs),
      });
    } catch (err) {
      return { ok: false, error: `Request failed: ${getErrorMessage(err)}` };
    }

    const text = method === "HEAD" ? "" : await response.text();
    const truncated = text.length > MAX_BODY_CHARS;
    const output = [
      `status: ${response.status} ${response.statusText}`.trim(),
      "",
      truncated ? `${text.slice(0, MAX_BODY_CHARS)}\n...[truncated]` : text,
    ].join("\n");

    ctx.logger.info({ tool: "http-fetch", url, status: response.status, length: text.length }, "HTTP request completed");

    return response.ok ? { ok: true, output } : { ok: false, error: output };
  },
});
