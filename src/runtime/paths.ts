import fs from "node:fs/promises";
import path from "node:path";

export type WorkspacePaths = {
  workspaceDir: string;
  tasksDir: string;
  resultsDir: string;
  brainDir: string;
  memoryFile: string;
  stateFile: string;
  coreFile: string;
};

export function resolveWorkspacePaths(workspaceDir: string): WorkspacePaths {
  return {
    workspaceDir,
    tasksDir: path.join(workspaceDir, "tasks"),
    resultsDir: path.join(workspaceDir, "results"),
    brainDir: path.join(workspaceDir, "brain"),
    memoryFile: path.join(workspaceDir, "memory.jsonl"),
    stateFile: path.join(workspaceDir, "state.json"),
    coreFile: path.join(workspaceDir, "core.md"),
  };
}

export async function ensureWorkspacePaths(workspaceDir: string): Promise<WorkspacePaths> {
  const paths = resolveWorkspacePaths(workspaceDir);
  await fs.mkdir(paths.workspaceDir, { recursive: true });
  await fs.mkdir(paths.tasksDir, { recursive: true });
  await fs.mkdir(paths.resultsDir, { recursive: true });
  return paths;
}
