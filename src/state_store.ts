import { z } from "zod";
import { ROLE_ORDER, type Role } from "./roles.js";
import { nowIso, stateFileAbs, tryReadJsonFile, writeJsonFile } from "./pipeline/utils.js";

export const SERVICE_STATUSES = ["idle", "processing", "completed", "error"] as const;

export type ServiceStatus = (typeof SERVICE_STATUSES)[number];

export type ServiceState = {
  role: Role;
  lastUpdate: string;
  status: ServiceStatus;
  lastResult: unknown;
  error?: string;
};

const ServiceStateSchema = z.object({
  role: z.enum(ROLE_ORDER),
  lastUpdate: z.string().min(1),
  status: z.enum(SERVICE_STATUSES),
  lastResult: z.unknown(),
  error: z.string().optional()
});

export const RECOVERED_AFTER_RESTART = "Recovered after service restart while processing was active.";

export function initialState(role: Role): ServiceState {
  return { role, lastUpdate: nowIso(), status: "idle", lastResult: null };
}

function recoverStaleLoadedState(state: ServiceState): ServiceState {
  if (state.status !== "processing") return state;
  return {
    ...state,
    status: "error",
    lastUpdate: nowIso(),
    error: state.error ?? RECOVERED_AFTER_RESTART
  };
}

/**
 * Single JSON status record for one role. Each write replaces the whole file
 * (tmp file + rename), so readers never see a half-written record.
 */
export class StateStore {
  private current: ServiceState;

  constructor(
    private readonly project: string,
    private readonly role: Role
  ) {
    this.current = initialState(role);
  }

  get filePath(): string {
    return stateFileAbs(this.project, this.role);
  }

  snapshot(): ServiceState {
    return { ...this.current };
  }

  /**
   * Loads the persisted record, if any. A record for another role or one that
   * fails validation is ignored. A record still marked `processing` belongs to
   * a run that died with the previous process and is rewritten as `error`.
   */
  async load(): Promise<ServiceState | null> {
    const raw = await tryReadJsonFile<unknown>(this.filePath);
    if (raw === null) return null;

    const parsed = ServiceStateSchema.safeParse(raw);
    if (!parsed.success || parsed.data.role !== this.role) return null;

    const loaded: ServiceState = {
      role: parsed.data.role,
      lastUpdate: parsed.data.lastUpdate,
      status: parsed.data.status,
      lastResult: parsed.data.lastResult ?? null
    };
    if (parsed.data.error !== undefined) loaded.error = parsed.data.error;
    const recovered = recoverStaleLoadedState(loaded);
    if (recovered !== loaded) await writeJsonFile(this.filePath, recovered);
    this.current = recovered;
    return this.snapshot();
  }

  async save(patch: { status: ServiceStatus; lastResult?: unknown; error?: string }): Promise<ServiceState> {
    const next: ServiceState = {
      role: this.role,
      lastUpdate: nowIso(),
      status: patch.status,
      lastResult: patch.lastResult === undefined ? this.current.lastResult : patch.lastResult
    };
    if (patch.error !== undefined) next.error = patch.error;
    await writeJsonFile(this.filePath, next);
    this.current = next;
    return this.snapshot();
  }
}
