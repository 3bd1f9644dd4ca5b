import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";

export function sleep(ms: number): Promise<void> {
  return new Promise((r) => setTimeout(r, ms));
}

export async function waitFor(fn: () => boolean | Promise<boolean>, timeoutMs = 3000): Promise<void> {
  const start = Date.now();
  while (Date.now() - start < timeoutMs) {
    if (await fn()) return;
    await sleep(10);
  }
  throw new Error("timeout");
}

export type Deferred = { promise: Promise<void>; resolve: () => void; reject: (err: Error) => void };

export function deferred(): Deferred {
  let resolve: () => void = () => undefined;
  let reject: (err: Error) => void = () => undefined;
  const promise = new Promise<void>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

/** Points MESH_PROJECTS_DIR at a fresh temp dir; call the returned cleanup in afterEach. */
export async function useTempProjectsDir(): Promise<{ dir: string; cleanup: () => Promise<void> }> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), "mesh-projects-"));
  const prev = process.env.MESH_PROJECTS_DIR;
  process.env.MESH_PROJECTS_DIR = dir;
  return {
    dir,
    cleanup: async () => {
      if (prev === undefined) delete process.env.MESH_PROJECTS_DIR;
      else process.env.MESH_PROJECTS_DIR = prev;
      await fs.rm(dir, { recursive: true, force: true }).catch(() => undefined);
    }
  };
}
