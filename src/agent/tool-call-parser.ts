import { z } from "zod";

import type { ToolCall } from "./types.js";

const TOOL_OPEN_TAG = "<tool>";
const TOOL_CLOSE_TAG = "</tool>";

const TOOL_OPEN_TAG_RE = /<tool>/i;

const ToolCallSchema = z.object({
  tool: z.string().refine((name) => name.trim().length > 0, "tool name is blank"),
  params: z.record(z.unknown()).default({}),
});

export function looksLikeToolCallMarkup(text: string): boolean {
  return TOOL_OPEN_TAG_RE.test(text ?? "");
}

/**
 * Extract every well-formed `<tool>{...}</tool>` span, left to right.
 *
 * A body that is not valid JSON is extended to each later closing tag in turn,
 * so a literal `</tool>` inside a JSON string stays part of the call. Spans whose
 * body is still not a `{ tool, params }` JSON object are skipped and the scan
 * resumes after their first closing tag. An unterminated opening tag ends the scan.
 */
export function extractToolCalls(text: string): ToolCall[] {
  const raw = text ?? "";
  const openRe = new RegExp(TOOL_OPEN_TAG, "gi");
  const closeRe = new RegExp(TOOL_CLOSE_TAG, "gi");
  const calls: ToolCall[] = [];

  let cursor = 0;
  while (cursor < raw.length) {
    openRe.lastIndex = cursor;
    const open = openRe.exec(raw);
    if (!open) break;

    const bodyStart = open.index + open[0].length;
    closeRe.lastIndex = bodyStart;
    const close = closeRe.exec(raw);
    if (!close) break;

    let spanEnd = close.index + close[0].length;
    let parsed = parseJsonBody(raw.slice(bodyStart, close.index));
    if (parsed === undefined) {
      let next = closeRe.exec(raw);
      while (next) {
        parsed = parseJsonBody(raw.slice(bodyStart, next.index));
        if (parsed !== undefined) {
          spanEnd = next.index + next[0].length;
          break;
        }
        next = closeRe.exec(raw);
      }
    }

    const call = parsed === undefined ? null : toToolCall(parsed);
    if (call) calls.push(call);

    cursor = spanEnd;
  }

  return calls;
}

/** Parsed JSON object body, or `undefined` when the body is not JSON. */
function parseJsonBody(body: string): unknown {
  const trimmed = body.trim();
  if (!trimmed.startsWith("{")) return undefined;
  try {
    return JSON.parse(trimmed);
  } catch {
    return undefined;
  }
}

function toToolCall(parsed: unknown): ToolCall | null {
  const result = ToolCallSchema.safeParse(parsed);
  if (!result.success) return null;
  return { tool: result.data.tool, params: result.data.params };
}

/**
 * Wire form of a call. Angle brackets inside the JSON are written as `\u003c`
 * and `\u003e` so no string value can close the span early.
 */
export function formatToolCall(call: ToolCall): string {
  const body = JSON.stringify({ tool: call.tool, params: call.params })
    .replace(/</g, "\\u003c")
    .replace(/>/g, "\\u003e");
  return `${TOOL_OPEN_TAG}${body}${TOOL_CLOSE_TAG}`;
}

/**
 * Text with every terminated tool span removed.
 */
export function stripToolCalls(text: string): string {
  return (text ?? "").replace(/<tool>[\s\S]*?<\/tool>/gi, "").replace(/\n{3,}/g, "\n\n").trim();
}
