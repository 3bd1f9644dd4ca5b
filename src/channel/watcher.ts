import fs from "node:fs/promises";
import path from "node:path";
import { watch, type FSWatcher } from "chokidar";
import type { Role } from "../roles.js";
import type { DispatchFn } from "../notifications.js";
import type { ServiceLog } from "../service_log.js";
import {
  MANIFEST_DIRNAME,
  STATE_FILE_NAME,
  ensureDir,
  errorMessage,
  isTempFileName,
  nowIso,
  projectDirAbs
} from "../pipeline/utils.js";

export type ArtifactWatcherOptions = {
  project: string;
  roles: readonly Role[];
  dispatch: DispatchFn;
  log: ServiceLog;
  debounceMs: number;
  /** Emit for artifacts already on disk when watching starts. */
  replayExisting?: boolean;
};

export type ArtifactWatcher = {
  ready: Promise<void>;
  close: () => Promise<void>;
};

/**
 * Whether a path (relative to a role's output directory) is an artifact that
 * signals completion. State files, temp files from atomic writes and
 * materialized manifest files never count.
 */
export function isRecognizedArtifact(relPath: string): boolean {
  const parts = relPath.split(/[\\/]+/).filter(Boolean);
  if (parts.length === 0) return false;
  if (parts[0] === MANIFEST_DIRNAME) return false;
  const base = parts[parts.length - 1];
  if (base === STATE_FILE_NAME || isTempFileName(base)) return false;
  return path.extname(base).toLowerCase() === ".json";
}

async function readArtifactPayload(filePath: string): Promise<unknown> {
  const raw = await fs.readFile(filePath, "utf8");
  try {
    const parsed: unknown = JSON.parse(raw);
    return parsed;
  } catch {
    // Half-written or hand-edited files still count as an update.
    return raw;
  }
}

/**
 * Splits a path under the project directory into its role and the path inside
 * that role's output directory. Null for the project root, foreign roles and
 * anything outside the project.
 */
export function routeProjectPath(
  projectDir: string,
  filePath: string,
  roles: ReadonlySet<Role>
): { role: Role; rel: string } | null {
  const rel = path.relative(projectDir, filePath);
  if (rel === "" || rel.startsWith("..") || path.isAbsolute(rel)) return null;
  const [first, ...rest] = rel.split(/[\\/]+/).filter(Boolean);
  const role = [...roles].find((r) => r === first);
  if (!role) return null;
  return { role, rel: rest.join("/") };
}

/**
 * One recursive watcher on the project directory, routed by the first path
 * segment. Role directories that appear after startup are picked up like any
 * other new subdirectory. Events for the same role that land within
 * `debounceMs` of each other collapse into one notification carrying the last
 * file touched.
 */
export async function watchRoleArtifacts(options: ArtifactWatcherOptions): Promise<ArtifactWatcher> {
  const { project, dispatch, log, debounceMs } = options;
  const roles: ReadonlySet<Role> = new Set(options.roles);
  const projectDir = projectDirAbs(project);
  // Only the shared project root is created here; role directories belong to their roles.
  await ensureDir(projectDir);

  const timers = new Map<Role, NodeJS.Timeout>();
  let closed = false;

  const fire = async (role: Role, filePath: string): Promise<void> => {
    timers.delete(role);
    if (closed) return;
    let payload: unknown;
    try {
      payload = await readArtifactPayload(filePath);
    } catch (err) {
      log.warn(`Could not read ${role} artifact ${filePath}: ${errorMessage(err)}`);
      return;
    }
    if (closed) return;
    dispatch({ source: role, kind: "update", payload, timestamp: nowIso(), origin: "watch" });
  };

  const watcher: FSWatcher = watch(projectDir, {
    ignoreInitial: !options.replayExisting,
    persistent: true,
    // Skip foreign role trees and materialized manifest files entirely.
    ignored: (candidate: string) => {
      if (path.resolve(candidate) === projectDir) return false;
      const routed = routeProjectPath(projectDir, candidate, roles);
      if (!routed) return true;
      return routed.rel.split("/")[0] === MANIFEST_DIRNAME;
    }
  });

  const onFile = (filePath: string) => {
    const routed = routeProjectPath(projectDir, filePath, roles);
    if (!routed || !isRecognizedArtifact(routed.rel)) return;
    const { role, rel } = routed;
    log.debug(`Watch event for ${role}: ${rel}`);
    const pending = timers.get(role);
    if (pending) clearTimeout(pending);
    timers.set(
      role,
      setTimeout(() => {
        void fire(role, filePath);
      }, debounceMs)
    );
  };

  watcher.on("add", onFile);
  watcher.on("change", onFile);
  watcher.on("error", (err) => log.warn(`Watcher for ${project} failed: ${errorMessage(err)}`));
  const ready = new Promise<void>((resolve) => watcher.once("ready", () => resolve()));

  return {
    ready,
    close: async () => {
      closed = true;
      for (const timer of timers.values()) clearTimeout(timer);
      timers.clear();
      await watcher.close();
    }
  };
}
