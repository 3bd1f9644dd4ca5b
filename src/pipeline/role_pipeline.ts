import path from "node:path";
import type { Role } from "../roles.js";
import type { ChatMessage, GenerateFn } from "../llm.js";
import type { Notification } from "../notifications.js";
import type { ServiceLog } from "../service_log.js";
import { PayloadExtractionError } from "../errors.js";
import { ROLE_PROFILES, type RoleProfile } from "./agents.js";
import { extractStructuredPayload, type ManifestFile } from "./extract.js";
import { continuationMessages, isLikelyTruncated, recoverTruncatedResponse, type RecoveryStop } from "./recovery.js";
import {
  MANIFEST_DIRNAME,
  errorMessage,
  isSafeRelativePath,
  resultFileAbs,
  roleOutputDirAbs,
  tryReadJsonFile,
  writeTextFile
} from "./utils.js";

export type PipelineJob = {
  id: number;
  /** Null for a manual run started through `submit`. */
  trigger: Notification | null;
  input?: string;
  enqueuedAt: string;
};

export type PipelineContext = {
  role: Role;
  project: string;
  upstreams: readonly Role[];
  log: ServiceLog;
};

export type RolePipeline = (job: PipelineJob, ctx: PipelineContext) => Promise<unknown>;

export type RecoverySummary = {
  attempts: number;
  truncated: boolean;
  stoppedBy: RecoveryStop;
};

export type RoleResult =
  | {
      status: "success";
      role: Role;
      format: "json";
      strategy: string;
      data: unknown;
      recovery: RecoverySummary;
      format_version: "1.0";
    }
  | {
      status: "success";
      role: Role;
      format: "files";
      files: string[];
      file_count: number;
      recovery: RecoverySummary;
      format_version: "1.0";
    }
  | {
      status: "success";
      role: Role;
      format: "raw";
      raw_content: string;
      reason: string;
      recovery: RecoverySummary;
      format_version: "1.0";
    };

export function fileContinuationInstruction(filePath: string): string {
  return (
    `The file \`${filePath}\` appears truncated. Return the COMPLETE content of this file only, ` +
    "in the same plain format (no surrounding JSON). Do not include other files."
  );
}

/** Drops blank edge lines and one surrounding code fence, if present. */
export function unwrapFence(content: string): string {
  const lines = content.split("\n");
  while (lines.length > 0 && lines[0].trim() === "") lines.shift();
  while (lines.length > 0 && lines[lines.length - 1].trim() === "") lines.pop();
  if (lines.length > 0 && lines[0].trim().startsWith("```")) {
    lines.shift();
    if (lines.length > 0 && lines[lines.length - 1].trim() === "```") lines.pop();
  }
  return lines.join("\n");
}

/**
 * A reply that restates the file from its first line replaces it; anything
 * else is treated as the missing tail.
 */
export function mergeFileContinuation(existing: string, reply: string): string {
  const firstLine = existing.split("\n").find((l) => l.trim().length > 0);
  if (firstLine !== undefined && reply.trimStart().startsWith(firstLine.trim())) return reply;
  return `${existing}\n${reply}`;
}

async function collectUpstreamResults(project: string, upstreams: readonly Role[], trigger: Notification | null) {
  const out: Partial<Record<Role, unknown>> = {};
  for (const role of upstreams) {
    const stored = await tryReadJsonFile<unknown>(resultFileAbs(project, role));
    if (stored !== null) out[role] = stored;
  }
  // The triggering payload is the freshest copy of its source's result.
  if (trigger && trigger.kind === "update") out[trigger.source] = trigger.payload;
  return out;
}

function buildMessages(profile: RoleProfile, job: PipelineJob, upstream: Partial<Record<Role, unknown>>): ChatMessage[] {
  const parts = [profile.task];
  if (job.input) parts.push(`Requirements:\n${job.input}`);
  if (Object.keys(upstream).length > 0) parts.push(`Upstream results:\n${JSON.stringify(upstream, null, 2)}`);
  return [
    { role: "system", content: profile.instructions },
    { role: "user", content: parts.join("\n\n") }
  ];
}

async function completeTruncatedFiles(
  files: ManifestFile[],
  messages: ChatMessage[],
  generate: GenerateFn,
  log: ServiceLog
): Promise<ManifestFile[]> {
  const out: ManifestFile[] = [];
  for (const file of files) {
    const content = unwrapFence(file.content);
    if (!isLikelyTruncated(content)) {
      out.push({ path: file.path, content });
      continue;
    }

    log.info(`File ${file.path} looks truncated; requesting its full content`);
    try {
      const reply = await generate([...messages, { role: "user", content: fileContinuationInstruction(file.path) }]);
      const more = unwrapFence(reply);
      out.push({ path: file.path, content: more.trim().length > 0 ? mergeFileContinuation(content, more) : content });
    } catch (err) {
      log.warn(`Continuation for ${file.path} failed (${errorMessage(err)}); keeping partial content`);
      out.push({ path: file.path, content });
    }
  }
  return out;
}

async function materializeFiles(project: string, role: Role, files: ManifestFile[], log: ServiceLog): Promise<string[]> {
  const root = path.join(roleOutputDirAbs(project, role), MANIFEST_DIRNAME);
  const written: string[] = [];
  for (const file of files) {
    if (!isSafeRelativePath(file.path)) {
      log.warn(`Skipping manifest entry with unsafe path "${file.path}"`);
      continue;
    }
    await writeTextFile(path.join(root, file.path), file.content);
    written.push(file.path);
  }
  return written;
}

/**
 * The content pipeline every role shares: generation call, truncation
 * recovery, payload extraction, and for manifest roles per-file completion
 * plus writing the files under `files/`.
 */
export function createRolePipeline(options: { generate: GenerateFn; maxContinuations?: number }): RolePipeline {
  const { generate } = options;

  return async (job, ctx) => {
    const { role, project, upstreams, log } = ctx;
    const profile = ROLE_PROFILES[role];

    const upstream = await collectUpstreamResults(project, upstreams, job.trigger);
    const messages = buildMessages(profile, job, upstream);

    const first = await generate(messages);
    const recovered = await recoverTruncatedResponse(first, () => generate(continuationMessages(messages)), {
      maxAttempts: options.maxContinuations,
      onAttempt: (attempt) =>
        log.info(`Response looks truncated; continuation ${attempt.attemptCount}/${attempt.maxAttempts}`)
    });
    if (recovered.error) log.warn(`Continuation request failed: ${recovered.error}`);
    const recovery: RecoverySummary = {
      attempts: recovered.attempts,
      truncated: recovered.truncated,
      stoppedBy: recovered.stoppedBy
    };

    const extracted = extractStructuredPayload(recovered.text, { mode: profile.mode });

    if (extracted.kind === "json") {
      log.info(`Extracted JSON payload (${extracted.strategy})`);
      return {
        status: "success",
        role,
        format: "json",
        strategy: extracted.strategy,
        data: extracted.value,
        recovery,
        format_version: "1.0"
      } satisfies RoleResult;
    }

    if (extracted.kind === "files") {
      const completed = await completeTruncatedFiles(extracted.files, messages, generate, log);
      const written = await materializeFiles(project, role, completed, log);
      log.info(`Wrote ${written.length} manifest file(s)`);
      return {
        status: "success",
        role,
        format: "files",
        files: written,
        file_count: written.length,
        recovery,
        format_version: "1.0"
      } satisfies RoleResult;
    }

    if (profile.requiresStructure) {
      throw new PayloadExtractionError(`${profile.title} reply could not be parsed: ${extracted.reason}`, extracted.text);
    }
    log.warn(`Keeping unstructured reply: ${extracted.reason}`);
    return {
      status: "success",
      role,
      format: "raw",
      raw_content: extracted.text,
      reason: extracted.reason,
      recovery,
      format_version: "1.0"
    } satisfies RoleResult;
  };
}
