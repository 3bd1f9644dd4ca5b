import { createHash } from "node:crypto";
import type { Role } from "./roles.js";
import type { DependencyGraph } from "./dependency_graph.js";
import { makeNotification, type Notification, type NotificationOrigin } from "./notifications.js";
import { ServiceLog } from "./service_log.js";
import { RECOVERED_AFTER_RESTART, StateStore } from "./state_store.js";
import type { ChannelHost, ChannelStatus } from "./channel/app.js";
import type { BroadcastOutcome } from "./channel/notification_channel.js";
import type { PipelineJob, RolePipeline } from "./pipeline/role_pipeline.js";
import { errorMessage, nowIso, resultFileAbs, writeJsonFile } from "./pipeline/utils.js";

export type CoordinatorPhase = "init" | "watching" | "processing" | "error_broadcast" | "stopped";

/** What the coordinator needs from its delivery layer; `NotificationChannel` in production. */
export type Channel = {
  readonly running: boolean;
  start(): Promise<void>;
  stop(): Promise<void>;
  broadcast(notification: Notification, targets?: readonly Role[]): Promise<BroadcastOutcome[]>;
};

export type ChannelFactory = (host: ChannelHost) => Channel;

export type CoordinatorOptions = {
  role: Role;
  project: string;
  graph: DependencyGraph;
  pipeline: RolePipeline;
  channel: ChannelFactory;
  log?: ServiceLog;
  /**
   * Drop a notification whose content matches the last one accepted from the
   * same source when it arrived through the other channel (push vs watch).
   * Off by default: every delivery runs.
   */
  suppressEchoes?: boolean;
};

type LastAccepted = {
  fingerprint: string;
  origin?: NotificationOrigin;
};

function fingerprintOf(notification: Notification): string {
  return createHash("sha256")
    .update(`${notification.source}\n${notification.kind}\n${JSON.stringify(notification.payload)}`)
    .digest("hex");
}

function describeUpstreamError(payload: unknown): string {
  if (payload && typeof payload === "object" && "error" in payload && typeof payload.error === "string") {
    return payload.error;
  }
  return JSON.stringify(payload);
}

/**
 * Composition root of one role service. Gates incoming notifications against
 * the dependency graph, runs accepted ones through the role pipeline one at a
 * time in arrival order, persists state around each run and tells dependents
 * about the outcome.
 */
export class ServiceCoordinator implements ChannelHost {
  readonly role: Role;
  readonly project: string;
  readonly log: ServiceLog;

  private readonly graph: DependencyGraph;
  private readonly pipeline: RolePipeline;
  private readonly state: StateStore;
  private readonly channel: Channel;
  private readonly suppressEchoes: boolean;

  private phase: CoordinatorPhase = "init";
  private accepting = false;
  private nextJobId = 1;
  private readonly queue: PipelineJob[] = [];
  private active: Promise<void> | null = null;
  private idleWaiters: Array<() => void> = [];
  private readonly lastAccepted = new Map<Role, LastAccepted>();

  constructor(options: CoordinatorOptions) {
    this.role = options.role;
    this.project = options.project;
    this.graph = options.graph;
    this.pipeline = options.pipeline;
    this.log = options.log ?? new ServiceLog(options.role);
    this.suppressEchoes = options.suppressEchoes ?? false;
    this.state = new StateStore(options.project, options.role);
    this.channel = options.channel(this);
  }

  get currentPhase(): CoordinatorPhase {
    return this.phase;
  }

  get stateStore(): StateStore {
    return this.state;
  }

  async start(): Promise<void> {
    if (this.phase !== "init") return;

    const loaded = await this.state.load();
    if (loaded) {
      if (loaded.status === "error" && loaded.error === RECOVERED_AFTER_RESTART) {
        this.log.warn("Previous run was interrupted; state marked as error");
      } else {
        this.log.info(`Loaded state: ${loaded.status} (last update ${loaded.lastUpdate})`);
      }
    } else {
      await this.state.save({ status: "idle" });
    }

    // Open the gate before the channel so watcher replays are not lost.
    this.accepting = true;
    try {
      await this.channel.start();
    } catch (err) {
      this.accepting = false;
      this.phase = "stopped";
      throw err;
    }
    this.phase = "watching";
    this.log.info(`Watching upstreams: ${this.graph.upstreamsOf(this.role).join(", ") || "(none)"}`);
  }

  /**
   * Stops accepting work, closes the channel and waits for the job in flight.
   * Jobs still queued are dropped.
   */
  async stop(): Promise<void> {
    if (this.phase === "stopped") return;
    this.accepting = false;

    if (this.queue.length > 0) {
      this.log.warn(`Dropping ${this.queue.length} queued job(s) on shutdown`);
      this.queue.length = 0;
    }

    await this.channel.stop();
    if (this.active) await this.active;
    this.phase = "stopped";
    this.settleIdleWaiters();
    this.log.info("Service stopped");
  }

  dispatch = (notification: Notification): void => {
    if (!this.accepting) {
      this.log.debug(`Ignoring ${notification.kind} from ${notification.source}: service is not accepting work`);
      return;
    }
    if (!this.graph.dependsOn(this.role, notification.source)) {
      this.log.debug(`Ignoring ${notification.kind} from ${notification.source}: not an upstream of ${this.role}`);
      return;
    }
    if (notification.kind === "error") {
      this.log.warn(`Upstream ${notification.source} failed: ${describeUpstreamError(notification.payload)}`);
      return;
    }
    if (this.isChannelEcho(notification)) {
      this.log.debug(`Ignoring ${notification.origin ?? "unknown"} echo of the last ${notification.source} update`);
      return;
    }

    this.enqueue({ trigger: notification });
  };

  submit = (input: string): void => {
    if (!this.accepting) {
      this.log.warn("Manual run rejected: service is not accepting work");
      return;
    }
    this.enqueue({ trigger: null, input });
  };

  status = (): ChannelStatus => ({
    running: this.channel.running,
    phase: this.phase,
    queued: this.queue.length
  });

  /** Resolves once the queue is empty and no job is running. */
  whenIdle(): Promise<void> {
    if (!this.active && this.queue.length === 0) return Promise.resolve();
    return new Promise((resolve) => this.idleWaiters.push(resolve));
  }

  private isChannelEcho(notification: Notification): boolean {
    const fingerprint = fingerprintOf(notification);
    const previous = this.lastAccepted.get(notification.source);
    const echo =
      this.suppressEchoes &&
      previous !== undefined &&
      previous.fingerprint === fingerprint &&
      previous.origin !== undefined &&
      notification.origin !== undefined &&
      previous.origin !== notification.origin;
    if (!echo) this.lastAccepted.set(notification.source, { fingerprint, origin: notification.origin });
    return echo;
  }

  private enqueue(job: Omit<PipelineJob, "id" | "enqueuedAt">): void {
    const queued: PipelineJob = { ...job, id: this.nextJobId++, enqueuedAt: nowIso() };
    this.queue.push(queued);
    const reason = queued.trigger ? `${queued.trigger.source} ${queued.trigger.origin ?? "update"}` : "manual run";
    this.log.info(`Queued job #${queued.id} (${reason}); ${this.queue.length} waiting`);
    this.drain();
  }

  private drain(): void {
    if (this.active) return;
    const next = this.queue.shift();
    if (!next) {
      this.settleIdleWaiters();
      return;
    }
    this.active = this.runJob(next).finally(() => {
      this.active = null;
      this.drain();
    });
  }

  private settleIdleWaiters(): void {
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) resolve();
  }

  private async runJob(job: PipelineJob): Promise<void> {
    this.phase = "processing";
    this.log.info(`Processing job #${job.id}`);

    try {
      await this.state.save({ status: "processing" });
      const result = await this.pipeline(job, {
        role: this.role,
        project: this.project,
        upstreams: this.graph.upstreamsOf(this.role),
        log: this.log
      });
      await writeJsonFile(resultFileAbs(this.project, this.role), result);
      await this.state.save({ status: "completed", lastResult: result });
      this.log.info(`Job #${job.id} completed`);
      await this.broadcast(makeNotification(this.role, "update", result));
    } catch (err) {
      await this.fail(job, err);
    } finally {
      if (this.currentPhase !== "stopped") this.phase = "watching";
    }
  }

  private async fail(job: PipelineJob, err: unknown): Promise<void> {
    const message = errorMessage(err);
    this.phase = "error_broadcast";
    this.log.error(`Job #${job.id} failed: ${message}`);

    try {
      await this.state.save({ status: "error", error: message });
    } catch (saveErr) {
      this.log.error(`Could not persist error state: ${errorMessage(saveErr)}`);
    }
    await this.broadcast(makeNotification(this.role, "error", { error: message }));
  }

  private async broadcast(notification: Notification): Promise<void> {
    const targets = this.graph.dependentsOf(this.role);
    if (targets.length === 0) return;
    try {
      const outcomes = await this.channel.broadcast(notification, targets);
      const delivered = outcomes.filter((o) => o.ok).length;
      this.log.info(`Broadcast ${notification.kind} to ${delivered}/${outcomes.length} dependent(s)`);
    } catch (err) {
      this.log.error(`Broadcast failed: ${errorMessage(err)}`);
    }
  }
}
