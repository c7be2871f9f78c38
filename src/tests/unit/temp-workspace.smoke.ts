import assert from "node:assert/strict";
import { existsSync } from "node:fs";
import { mkdir, mkdtemp, readdir, rm, utimes, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { sweepStaleWorkspaces, withTempWorkspace, WORKSPACE_PREFIX } from "../../tracks/temp-workspace";

const HOUR_MS = 60 * 60 * 1000;

async function testWorkspaceRemovedAfterSuccess(base: string): Promise<void> {
  const root = path.join(base, "nested", "root");
  const dir = await withTempWorkspace(root, async (workspaceDir) => {
    await writeFile(path.join(workspaceDir, "track.mp3"), "audio");
    assert.equal(existsSync(path.join(workspaceDir, "track.mp3")), true);
    return workspaceDir;
  });

  assert.equal(path.dirname(dir), root);
  assert.equal(path.basename(dir).startsWith(WORKSPACE_PREFIX), true);
  assert.equal(existsSync(dir), false);
  assert.deepEqual(await readdir(root), []);
}

async function testWorkspaceRemovedAfterFailure(base: string): Promise<void> {
  let seenDir = "";
  const failure = new Error("download exploded");
  await assert.rejects(
    withTempWorkspace(base, async (workspaceDir) => {
      seenDir = workspaceDir;
      await writeFile(path.join(workspaceDir, "partial.part"), "half");
      throw failure;
    }),
    (error: unknown) => error === failure,
  );
  assert.notEqual(seenDir, "");
  assert.equal(existsSync(seenDir), false);
}

async function testSweepRemovesOnlyStaleWorkspaces(base: string): Promise<void> {
  const root = path.join(base, "sweep");
  await mkdir(path.join(root, "track-old"), { recursive: true });
  await writeFile(path.join(root, "track-old", "leftover.mp3"), "audio");
  await mkdir(path.join(root, "track-new"));
  await mkdir(path.join(root, "other-old"));
  await writeFile(path.join(root, "track-file"), "not a directory");

  const now = Date.now();
  const stale = new Date(now - 2 * HOUR_MS);
  await utimes(path.join(root, "track-old"), stale, stale);
  await utimes(path.join(root, "other-old"), stale, stale);
  await utimes(path.join(root, "track-file"), stale, stale);

  const removed = await sweepStaleWorkspaces(root, HOUR_MS, undefined, WORKSPACE_PREFIX, now);
  assert.equal(removed, 1);
  assert.deepEqual((await readdir(root)).sort(), ["other-old", "track-file", "track-new"]);
}

async function testSweepOfMissingRoot(base: string): Promise<void> {
  assert.equal(await sweepStaleWorkspaces(path.join(base, "does-not-exist"), HOUR_MS), 0);
}

async function run(): Promise<void> {
  const base = await mkdtemp(path.join(os.tmpdir(), "workspace-smoke-"));
  try {
    await testWorkspaceRemovedAfterSuccess(base);
    await testWorkspaceRemovedAfterFailure(base);
    await testSweepRemovesOnlyStaleWorkspaces(base);
    await testSweepOfMissingRoot(base);
  } finally {
    await rm(base, { recursive: true, force: true });
  }
  process.stdout.write("Temp workspace smoke checks passed.\n");
}

void run();
