import fs from "node:fs/promises";
import path from "node:path";
import { fileURLToPath } from "node:url";
import type { Role } from "../roles.js";

export const STATE_FILE_NAME = "state.json";
export const RESULT_FILE_NAME = "result.json";
export const MANIFEST_DIRNAME = "files";

export function nowIso(): string {
  return new Date().toISOString();
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function repoRoot(): string {
  // This file lives at src/pipeline/utils.ts
  const here = path.dirname(fileURLToPath(import.meta.url));
  return path.resolve(here, "../..");
}

export function projectsRootAbs(): string {
  const env = process.env.MESH_PROJECTS_DIR;
  if (env && env.trim().length > 0) return path.resolve(env.trim());
  return path.join(repoRoot(), "projects");
}

export function projectDirAbs(project: string): string {
  return path.join(projectsRootAbs(), project);
}

export function roleOutputDirAbs(project: string, role: Role): string {
  return path.join(projectDirAbs(project), role);
}

export function stateFileAbs(project: string, role: Role): string {
  return path.join(roleOutputDirAbs(project, role), STATE_FILE_NAME);
}

export function resultFileAbs(project: string, role: Role): string {
  return path.join(roleOutputDirAbs(project, role), RESULT_FILE_NAME);
}

export async function ensureDir(dirPath: string): Promise<void> {
  await fs.mkdir(dirPath, { recursive: true });
}

async function atomicWrite(filePath: string, data: string | Buffer): Promise<void> {
  await ensureDir(path.dirname(filePath));
  const tmpPath = `${filePath}.tmp.${process.pid}.${Date.now()}`;
  await fs.writeFile(tmpPath, data);
  await fs.rename(tmpPath, filePath);
}

export async function writeTextFile(filePath: string, text: string): Promise<void> {
  const out = text.endsWith("\n") ? text : `${text}\n`;
  await atomicWrite(filePath, out);
}

export async function writeJsonFile(filePath: string, obj: unknown): Promise<void> {
  await atomicWrite(filePath, `${JSON.stringify(obj, null, 2)}\n`);
}

export async function readJsonFile<T>(filePath: string): Promise<T> {
  const raw = await fs.readFile(filePath, "utf8");
  return JSON.parse(raw) as T;
}

export async function tryReadJsonFile<T>(filePath: string): Promise<T | null> {
  try {
    return await readJsonFile<T>(filePath);
  } catch {
    return null;
  }
}

export function isTempFileName(name: string): boolean {
  return /\.tmp\.\d+\.\d+$/.test(name);
}

/**
 * Relative paths (always `/`-separated) of every regular file under `dir`, sorted.
 * A missing directory lists as empty.
 */
export async function listFilesRecursive(dir: string): Promise<string[]> {
  const out: string[] = [];

  async function walk(current: string, prefix: string): Promise<void> {
    const entries = await fs.readdir(current, { withFileTypes: true }).catch(() => []);
    for (const ent of entries) {
      const rel = prefix ? `${prefix}/${ent.name}` : ent.name;
      if (ent.isDirectory()) {
        await walk(path.join(current, ent.name), rel);
        continue;
      }
      if (ent.isFile() && !isTempFileName(ent.name)) out.push(rel);
    }
  }

  await walk(dir, "");
  return out.sort();
}

export function isSafeRelativePath(relPath: string): boolean {
  // Prevent path traversal out of the manifest directory.
  if (relPath.trim().length === 0) return false;
  if (path.isAbsolute(relPath) || /^[A-Za-z]:/.test(relPath)) return false;
  const parts = relPath.split(/[\\/]+/);
  if (parts.some((p) => p === "..")) return false;
  // "." or "./" would name the manifest root itself.
  return parts.some((p) => p !== "" && p !== ".");
}
