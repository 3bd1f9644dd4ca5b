import dotenv from "dotenv";
import path from "node:path";
import { fileURLToPath } from "node:url";

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const repoRoot = path.resolve(__dirname, "../");

dotenv.config({ path: path.resolve(repoRoot, ".env") });

// Dynamic imports so `.env` is loaded before any modules read process.env at import-time.
const { loadLlmConfig, loadServiceConfig } = await import("./config.js");
const { DependencyGraph } = await import("./dependency_graph.js");
const { ServiceCoordinator } = await import("./coordinator.js");
const { NotificationChannel } = await import("./channel/notification_channel.js");
const { ServiceLog } = await import("./service_log.js");
const { createOpenAiGenerator } = await import("./llm.js");
const { createRolePipeline } = await import("./pipeline/role_pipeline.js");

const config = loadServiceConfig();
const llm = await loadLlmConfig(config.role);

const debug = Boolean(process.env.MESH_DEBUG && process.env.MESH_DEBUG !== "0");
const log = new ServiceLog(config.role);
log.subscribe((event) => {
  if (event.level === "debug" && !debug) return;
  const line = `[${event.at}] [${event.role}] ${event.message}`;
  if (event.level === "error" || event.level === "warn") console.error(line);
  else console.log(line);
});

const coordinator = new ServiceCoordinator({
  role: config.role,
  project: config.project,
  graph: new DependencyGraph(),
  pipeline: createRolePipeline({ generate: createOpenAiGenerator(llm), maxContinuations: config.maxContinuations }),
  log,
  suppressEchoes: config.suppressEchoes,
  channel: (host) =>
    new NotificationChannel(host, {
      host: config.host,
      ports: config.ports,
      log,
      broadcastTimeoutMs: config.broadcastTimeoutMs,
      watchDebounceMs: config.watchDebounceMs,
      replayExisting: config.replayExisting
    })
});

await coordinator.start();
console.log(`${config.role} service started (project "${config.project}", model ${llm.model})`);

if (config.input) coordinator.submit(config.input);

let stopping = false;
const shutdown = (signal: string) => {
  if (stopping) return;
  stopping = true;
  console.log(`${signal} received; waiting for the current job to finish`);
  coordinator
    .stop()
    .then(() => process.exit(0))
    .catch((err: unknown) => {
      console.error(err instanceof Error ? err.message : String(err));
      process.exit(1);
    });
};

process.on("SIGINT", () => shutdown("SIGINT"));
process.on("SIGTERM", () => shutdown("SIGTERM"));
