/**
 * Prompt Builder - Constructs system prompts for the agent
 *
 * Features:
 * - Identity from core.md, or a default role description
 * - Knowledge files from brain/, reloaded when they change on disk
 * - Run counters and recent memory
 * - Tool documentation with the <tool> call format
 */

import fs from "node:fs/promises";
import path from "node:path";

import type { MemoryRecord, Tool } from "./types.js";
import type { Logger } from "../log.js";
import { formatToolCall } from "./tool-call-parser.js";

const BRAIN_EXTENSIONS = new Set([".md", ".txt"]);
const MAX_BRAIN_FILE_CHARS = 8000;
const MEMORY_PREVIEW_CHARS = 100;

/**
 * Knowledge file loaded from brain/
 */
export interface BrainFile {
  name: string;
  path: string;
  content: string;
}

export interface PromptContext {
  name: string;
  identity: string;
  brain: BrainFile[];
  cycle: number;
  tasksCompleted: number;
  recentMemory: MemoryRecord[];
  /** Empty when tools are not allowed for this call. */
  tools: Tool[];
  currentTime: Date;
}

/**
 * Build the complete system prompt
 */
export function buildSystemPrompt(ctx: PromptContext): string {
  const sections: string[] = [];

  sections.push(buildIdentitySection(ctx.name, ctx.identity));

  if (ctx.brain.length > 0) {
    sections.push(buildKnowledgeSection(ctx.brain));
  }

  sections.push(buildContextSection(ctx));

  if (ctx.recentMemory.length > 0) {
    sections.push(buildMemorySection(ctx.recentMemory));
  }

  if (ctx.tools.length > 0) {
    sections.push(buildToolsSection(ctx.tools));
  }

  return sections.filter(Boolean).join("\n\n---\n\n");
}

function buildIdentitySection(name: string, identity: string): string {
  const intro = `# ${name}\n\nYou are ${name}, a specialist AI agent.`;
  if (identity.trim()) {
    return `${intro}\n\n## Your Identity\n\n${identity.trim()}`;
  }
  return `${intro}

Your role:
- Think deeply about problems
- Remember previous insights (you have access to your memory)
- Complete tasks methodically
- Output clear, actionable results`;
}

function buildKnowledgeSection(files: BrainFile[]): string {
  const body = files.map((file) => `## ${path.parse(file.name).name}\n\n${file.content.trim()}`).join("\n\n");
  return `# Your Knowledge\n\n${body}`;
}

function buildContextSection(ctx: PromptContext): string {
  return `# Current Context

- **Time**: ${ctx.currentTime.toISOString()}
- **Cycle**: ${ctx.cycle}
- **Tasks completed**: ${ctx.tasksCompleted}`;
}

/**
 * One line per memory: `- [kind] content`, cut to 100 characters.
 */
export function formatMemoryLine(record: MemoryRecord): string {
  const content = record.content.replace(/\s+/g, " ").trim();
  const preview = content.length > MEMORY_PREVIEW_CHARS ? `${content.slice(0, MEMORY_PREVIEW_CHARS)}...` : content;
  return `- [${record.kind}] ${preview}`;
}

function buildMemorySection(records: MemoryRecord[]): string {
  return `# Recent Memory\n\n${records.map(formatMemoryLine).join("\n")}`;
}

function buildToolsSection(tools: Tool[]): string {
  const toolDocs = tools.map((tool) => {
    const properties = tool.parameters.properties ?? {};
    const entries = Object.entries(properties);
    const params = entries.length > 0
      ? entries.map(([name, schema]) => {
          const choices = schema.enum ? ` One of: ${schema.enum.join(", ")}.` : "";
          return `  - \`${name}\` (${schema.type}): ${schema.description ?? ""}${choices}`;
        }).join("\n")
      : "  (no parameters)";

    const required = tool.parameters.required?.join(", ") || "none";

    return `### ${tool.meta.name}

${tool.meta.description}

**Parameters:**
${params}

**Required:** ${required}`;
  }).join("\n\n");

  const example = formatToolCall({ tool: "tool-name", params: { key: "value" } });

  return `# Available Tools

To use a tool, write a tool block anywhere in your reply:

${example}

You may request several tools in one reply; they run in order. Their results come back in the next message. Reply without tool blocks when you have your final answer.

${toolDocs}`;
}

/**
 * Truncate content to a maximum length
 */
function truncateContent(content: string, maxLength: number): string {
  if (content.length <= maxLength) return content;

  const truncated = content.slice(0, maxLength);
  const lastNewline = truncated.lastIndexOf("\n");

  if (lastNewline > maxLength * 0.8) {
    return truncated.slice(0, lastNewline) + "\n\n...[truncated]";
  }

  return truncated + "\n\n...[truncated]";
}

/**
 * Loads core.md and brain/*.md|*.txt, and reloads them when any file's
 * mtime or the file set changes. Files whose name starts with "_" are skipped.
 */
export class BrainLoader {
  private readonly coreFile: string;
  private readonly brainDir: string;
  private readonly logger: Logger;
  private signature: string | null = null;
  private identityText = "";
  private brainFiles: BrainFile[] = [];

  constructor(params: { coreFile: string; brainDir: string; logger: Logger }) {
    this.coreFile = params.coreFile;
    this.brainDir = params.brainDir;
    this.logger = params.logger.child({ component: "brain" });
  }

  get identity(): string {
    return this.identityText;
  }

  get files(): BrainFile[] {
    return [...this.brainFiles];
  }

  /**
   * Reload when anything changed since the last load. Returns true when it reloaded.
   */
  async refresh(): Promise<boolean> {
    const candidates = await this.listBrainFiles();
    const signature = await this.computeSignature(candidates);
    if (signature === this.signature) return false;

    const firstLoad = this.signature === null;
    this.identityText = (await readOptional(this.coreFile)) ?? "";

    const files: BrainFile[] = [];
    for (const filePath of candidates) {
      const content = await readOptional(filePath);
      if (content === undefined || !content.trim()) continue;
      files.push({ name: path.basename(filePath), path: filePath, content: truncateContent(content, MAX_BRAIN_FILE_CHARS) });
    }
    this.brainFiles = files;
    this.signature = signature;

    this.logger.info(
      { identity: Boolean(this.identityText), brainFiles: files.length },
      firstLoad ? "Loaded identity and brain files" : "Brain files updated, reloaded"
    );
    return true;
  }

  private async listBrainFiles(): Promise<string[]> {
    let names: string[];
    try {
      names = await fs.readdir(this.brainDir);
    } catch (err) {
      if (isNotFound(err)) return [];
      throw err;
    }
    return names
      .filter((name) => !name.startsWith("_") && BRAIN_EXTENSIONS.has(path.extname(name).toLowerCase()))
      .sort()
      .map((name) => path.join(this.brainDir, name));
  }

  private async computeSignature(files: string[]): Promise<string> {
    const parts: string[] = [];
    for (const filePath of [this.coreFile, ...files]) {
      try {
        const stat = await fs.stat(filePath);
        parts.push(`${filePath}:${stat.mtimeMs}:${stat.size}`);
      } catch (err) {
        if (!isNotFound(err)) throw err;
      }
    }
    return parts.join("|");
  }
}

async function readOptional(filePath: string): Promise<string | undefined> {
  try {
    return await fs.readFile(filePath, "utf-8");
  } catch (err) {
    if (isNotFound(err)) return undefined;
    throw err;
  }
}

function isNotFound(err: unknown): boolean {
  return Boolean(err && typeof err === "object" && "code" in err && err.code === "ENOENT");
}
