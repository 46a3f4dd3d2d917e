import { mkdir, rm } from "node:fs/promises";
import { resolve } from "node:path";

export class WorkspaceError extends Error {
  constructor(message: string, readonly dir: string) {
    super(message);
    this.name = "WorkspaceError";
  }
}

/**
 * Start from an empty workspace. Any failure here is fatal for the whole run.
 */
export async function prepareWorkspace(dir: string): Promise<string> {
  const abs = resolve(dir);
  try {
    await rm(abs, { recursive: true, force: true });
    await mkdir(abs, { recursive: true });
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new WorkspaceError(`Cannot prepare workspace ${abs}: ${reason}`, abs);
  }
  return abs;
}

export async function cleanupWorkspace(dir: string): Promise<boolean> {
  try {
    await rm(resolve(dir), { recursive: true, force: true });
    return true;
  } catch (err) {
    console.error(`Workspace cleanup failed for ${dir}:`, err instanceof Error ? err.message : err);
    return false;
  }
}
