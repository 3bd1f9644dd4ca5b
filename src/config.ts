import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { ConfigurationError } from "./errors.js";
import { DEFAULT_ROLE_PORTS, ROLE_ORDER, parseRole, type Role } from "./roles.js";
import { errorMessage, repoRoot } from "./pipeline/utils.js";
import { DEFAULT_MAX_CONTINUATIONS } from "./pipeline/recovery.js";

export const DEFAULT_TEMPERATURE = 0.7;
export const DEFAULT_MAX_TOKENS = 4096;
export const DEFAULT_LLM_TIMEOUT_MS = 30_000;
export const DEFAULT_BROADCAST_TIMEOUT_MS = 5_000;
export const DEFAULT_WATCH_DEBOUNCE_MS = 500;

export type LlmConfig = {
  apiUrl: string;
  apiKey: string;
  model: string;
  temperature: number;
  maxTokens: number;
  timeoutMs: number;
};

export type ServiceConfig = {
  role: Role;
  project: string;
  host: string;
  ports: Record<Role, number>;
  replayExisting: boolean;
  watchDebounceMs: number;
  broadcastTimeoutMs: number;
  /** Drop a notification that repeats the last accepted one from the same source via the other channel. */
  suppressEchoes: boolean;
  maxContinuations: number;
  input?: string;
};

const RoleConfigFileSchema = z
  .object({
    api_url: z.string().min(1).optional(),
    api_key: z.string().min(1).optional(),
    model: z.string().min(1).optional(),
    temperature: z.number().min(0).max(2).optional(),
    max_tokens: z.number().int().positive().optional(),
    timeout_ms: z.number().int().positive().optional()
  })
  .strict();

const NumberFromEnv = z.coerce.number().finite();

export function configDirAbs(): string {
  const env = process.env.MESH_CONFIG_DIR;
  if (env && env.trim().length > 0) return path.resolve(env.trim());
  return path.join(repoRoot(), "config");
}

export function roleConfigPath(role: Role): string {
  return path.join(configDirAbs(), `${role}_config.json`);
}

function envValue(name: string): string | undefined {
  const v = process.env[name]?.trim();
  return v && v.length > 0 ? v : undefined;
}

function numberEnv(name: string, fallback: number): number {
  const raw = envValue(name);
  if (raw === undefined) return fallback;
  const parsed = NumberFromEnv.safeParse(raw);
  if (!parsed.success) throw new ConfigurationError(`${name} must be a number (got "${raw}")`);
  return parsed.data;
}

function flagEnv(name: string, fallback = false): boolean {
  const v = envValue(name)?.toLowerCase();
  if (v === undefined) return fallback;
  return v === "1" || v === "true" || v === "yes";
}

/** The SDK wants the API root; accept the full chat-completions URL as well. */
export function normalizeApiUrl(url: string): string {
  return url.replace(/\/+$/, "").replace(/\/chat\/completions$/, "");
}

async function readRoleConfigFile(role: Role): Promise<z.infer<typeof RoleConfigFileSchema> | null> {
  const filePath = roleConfigPath(role);
  let raw: string;
  try {
    raw = await fs.readFile(filePath, "utf8");
  } catch {
    return null;
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new ConfigurationError(`${filePath} is not valid JSON: ${errorMessage(err)}`);
  }

  const parsed = RoleConfigFileSchema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; ");
    throw new ConfigurationError(`${filePath} is invalid: ${issues}`);
  }
  return parsed.data;
}

/**
 * Generation endpoint settings for one role: `config/<role>_config.json` when
 * present, otherwise `LLM_*` environment variables. Values in the file win.
 */
export async function loadLlmConfig(role: Role): Promise<LlmConfig> {
  const file = await readRoleConfigFile(role);

  const apiUrl = file?.api_url ?? envValue("LLM_API_URL");
  const apiKey = file?.api_key ?? envValue("LLM_API_KEY");
  const model = file?.model ?? envValue("DEFAULT_MODEL");

  const missing: string[] = [];
  if (!apiKey) missing.push("LLM_API_KEY");
  if (!apiUrl) missing.push("LLM_API_URL");
  if (!model) missing.push("DEFAULT_MODEL");
  if (!apiKey || !apiUrl || !model) {
    throw new ConfigurationError(`Missing required LLM configuration in environment or config file: ${missing.join(", ")}`);
  }

  return {
    apiUrl: normalizeApiUrl(apiUrl),
    apiKey,
    model,
    temperature: file?.temperature ?? numberEnv("TEMPERATURE", DEFAULT_TEMPERATURE),
    maxTokens: file?.max_tokens ?? numberEnv("MAX_TOKENS", DEFAULT_MAX_TOKENS),
    timeoutMs: file?.timeout_ms ?? numberEnv("LLM_TIMEOUT_MS", DEFAULT_LLM_TIMEOUT_MS)
  };
}

export function loadServiceConfig(): ServiceConfig {
  const role = parseRole(envValue("MESH_ROLE"));

  const ports = { ...DEFAULT_ROLE_PORTS };
  for (const r of ROLE_ORDER) {
    const name = `MESH_PORT_${r.toUpperCase()}`;
    const port = numberEnv(name, ports[r]);
    if (!Number.isInteger(port) || port <= 0 || port > 65535) {
      throw new ConfigurationError(`${name} must be a TCP port (got ${port})`);
    }
    ports[r] = port;
  }

  const config: ServiceConfig = {
    role,
    project: envValue("MESH_PROJECT") ?? "default",
    host: envValue("MESH_HOST") ?? "localhost",
    ports,
    replayExisting: flagEnv("MESH_REPLAY_EXISTING"),
    watchDebounceMs: Math.max(0, numberEnv("MESH_WATCH_DEBOUNCE_MS", DEFAULT_WATCH_DEBOUNCE_MS)),
    broadcastTimeoutMs: Math.max(1, numberEnv("MESH_BROADCAST_TIMEOUT_MS", DEFAULT_BROADCAST_TIMEOUT_MS)),
    suppressEchoes: flagEnv("MESH_SUPPRESS_ECHOES"),
    maxContinuations: Math.max(0, Math.floor(numberEnv("MESH_MAX_CONTINUATIONS", DEFAULT_MAX_CONTINUATIONS)))
  };
  const input = envValue("MESH_INPUT");
  if (input) config.input = input;
  return config;
}
