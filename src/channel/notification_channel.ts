import type { Server } from "node:http";
import { ROLE_ORDER, type Role } from "../roles.js";
import { TransportError } from "../errors.js";
import type { Notification } from "../notifications.js";
import type { ServiceLog } from "../service_log.js";
import { errorMessage } from "../pipeline/utils.js";
import { createChannelApp, type ChannelHost } from "./app.js";
import { watchRoleArtifacts, type ArtifactWatcher } from "./watcher.js";

export type ChannelOptions = {
  host: string;
  ports: Record<Role, number>;
  log: ServiceLog;
  broadcastTimeoutMs: number;
  watchDebounceMs: number;
  replayExisting?: boolean;
  /** Port to bind instead of `ports[role]`; 0 picks a free one. */
  listenPort?: number;
  fetchImpl?: typeof fetch;
};

export type BroadcastOutcome = {
  target: Role;
  ok: boolean;
  error?: string;
};

/**
 * Both delivery paths of one service: the push listener and the directory
 * watchers on every other role. Everything arriving is handed to
 * `host.dispatch`; deciding what to do with it is the host's job.
 */
export class NotificationChannel {
  private server: Server | null = null;
  private watcher: ArtifactWatcher | null = null;
  private readonly fetchImpl: typeof fetch;

  constructor(
    private readonly hostApi: ChannelHost,
    private readonly options: ChannelOptions
  ) {
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  get running(): boolean {
    return this.server !== null;
  }

  /** Bound port once started (differs from the configured one when listening on 0). */
  get port(): number | null {
    const address = this.server?.address();
    if (!address || typeof address === "string") return null;
    return address.port;
  }

  peerUrl(role: Role): string {
    return `http://${this.options.host}:${this.options.ports[role]}/notify`;
  }

  async start(): Promise<void> {
    if (this.server) return;
    const { role, project } = this.hostApi;
    const log = this.options.log;

    const watchRoles = ROLE_ORDER.filter((r) => r !== role);
    const watcher = await watchRoleArtifacts({
      project,
      roles: watchRoles,
      dispatch: this.hostApi.dispatch,
      log,
      debounceMs: this.options.watchDebounceMs,
      replayExisting: this.options.replayExisting
    });
    this.watcher = watcher;
    await watcher.ready;

    const app = createChannelApp(this.hostApi);
    const port = this.options.listenPort ?? this.options.ports[role];
    try {
      this.server = await new Promise<Server>((resolve, reject) => {
        const server = app.listen(port, this.options.host);
        server.once("listening", () => resolve(server));
        server.once("error", reject);
      });
    } catch (err) {
      this.watcher = null;
      await watcher.close();
      throw err;
    }
    log.info(`${role} service listening on http://${this.options.host}:${this.port ?? port}`);
  }

  async stop(): Promise<void> {
    const server = this.server;
    const watcher = this.watcher;
    this.server = null;
    this.watcher = null;
    if (watcher) await watcher.close();
    if (server) {
      await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
    }
  }

  /**
   * Pushes `notification` to each target independently. A failing peer is
   * logged and reported in the outcome list; it never stops the others.
   */
  async broadcast(notification: Notification, targets?: readonly Role[]): Promise<BroadcastOutcome[]> {
    const self = this.hostApi.role;
    const recipients = (targets ?? ROLE_ORDER).filter((r) => r !== self);
    return Promise.all(recipients.map((target) => this.notifyPeer(target, notification)));
  }

  private async notifyPeer(target: Role, notification: Notification): Promise<BroadcastOutcome> {
    const url = this.peerUrl(target);
    try {
      const res = await this.fetchImpl(url, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({
          source: notification.source,
          kind: notification.kind,
          payload: notification.payload,
          timestamp: notification.timestamp
        }),
        signal: AbortSignal.timeout(this.options.broadcastTimeoutMs)
      });
      if (!res.ok) throw new TransportError(`HTTP ${res.status} from ${url}`, res.status);
      return { target, ok: true };
    } catch (err) {
      const message = errorMessage(err);
      this.options.log.warn(`Error notifying service ${target}: ${message}`);
      return { target, ok: false, error: message };
    }
  }
}
