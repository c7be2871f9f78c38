import { mkdir, mkdtemp, readdir, rm, stat } from "node:fs/promises";
import path from "node:path";
import type { Logger } from "../config/logger";
import { errorMessage } from "../shared/errors";

export const WORKSPACE_PREFIX = "track-";

/**
 * Runs `work` inside a fresh directory under `root` and removes the directory
 * afterwards, whether `work` resolved or threw.
 */
export async function withTempWorkspace<T>(
  root: string,
  work: (dir: string) => Promise<T>,
  logger?: Logger,
  prefix = WORKSPACE_PREFIX,
): Promise<T> {
  await mkdir(root, { recursive: true });
  const dir = await mkdtemp(path.join(root, prefix));
  try {
    return await work(dir);
  } finally {
    await removeWorkspace(dir, logger);
  }
}

export async function sweepStaleWorkspaces(
  root: string,
  maxAgeMs: number,
  logger?: Logger,
  prefix = WORKSPACE_PREFIX,
  now: number = Date.now(),
): Promise<number> {
  let entries: string[];
  try {
    entries = await readdir(root);
  } catch (error) {
    logger?.warn("workspace.sweep.unreadable_root", { root, error: errorMessage(error) });
    return 0;
  }

  let removed = 0;
  for (const entry of entries) {
    if (!entry.startsWith(prefix)) {
      continue;
    }
    const fullPath = path.join(root, entry);
    try {
      const info = await stat(fullPath);
      if (!info.isDirectory() || now - info.mtimeMs < maxAgeMs) {
        continue;
      }
      await rm(fullPath, { recursive: true, force: true });
      removed += 1;
    } catch (error) {
      logger?.warn("workspace.sweep.remove_failed", { path: fullPath, error: errorMessage(error) });
    }
  }

  if (removed > 0) {
    logger?.info("workspace.sweep.done", { root, removed });
  }
  return removed;
}

async function removeWorkspace(dir: string, logger?: Logger): Promise<void> {
  try {
    await rm(dir, { recursive: true, force: true });
  } catch (error) {
    logger?.warn("workspace.cleanup_failed", { dir, error: errorMessage(error) });
  }
}
