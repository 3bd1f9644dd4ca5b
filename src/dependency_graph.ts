import { ConfigurationError } from "./errors.js";
import { ROLE_ORDER, isRole, type Role } from "./roles.js";

export type DependencyRows = Partial<Record<Role, readonly Role[]>>;

export const DEFAULT_DEPENDENCIES: DependencyRows = {
  business: [],
  architecture: ["business"],
  developer: ["architecture"],
  qa: ["developer"],
  audit: ["developer", "qa"],
  documentation: ["business", "architecture", "developer", "qa", "audit"]
};

/**
 * Static role → upstream roles table. Built once at startup and handed to every
 * coordinator; nothing mutates it afterwards.
 */
export class DependencyGraph {
  private readonly upstreams: ReadonlyMap<Role, readonly Role[]>;
  private readonly dependents: ReadonlyMap<Role, readonly Role[]>;

  constructor(rows: DependencyRows = DEFAULT_DEPENDENCIES) {
    const upstreams = new Map<Role, readonly Role[]>();
    for (const role of ROLE_ORDER) upstreams.set(role, []);

    for (const [key, deps] of Object.entries(rows)) {
      if (!isRole(key)) throw new ConfigurationError(`Dependency graph names unknown role "${key}"`);
      const ordered: Role[] = [];
      for (const dep of deps ?? []) {
        if (!isRole(dep)) throw new ConfigurationError(`Role "${key}" depends on unknown role "${String(dep)}"`);
        if (dep === key) throw new ConfigurationError(`Role "${key}" cannot depend on itself`);
        if (!ordered.includes(dep)) ordered.push(dep);
      }
      upstreams.set(key, Object.freeze(ordered));
    }

    assertAcyclic(upstreams);

    const dependents = new Map<Role, Role[]>();
    for (const role of ROLE_ORDER) dependents.set(role, []);
    // Walk in ROLE_ORDER so fan-out order is stable.
    for (const role of ROLE_ORDER) {
      for (const up of upstreams.get(role) ?? []) dependents.get(up)?.push(role);
    }

    this.upstreams = upstreams;
    this.dependents = new Map([...dependents].map(([role, list]) => [role, Object.freeze(list)]));
  }

  upstreamsOf(role: Role): readonly Role[] {
    return this.upstreams.get(role) ?? [];
  }

  dependentsOf(role: Role): readonly Role[] {
    return this.dependents.get(role) ?? [];
  }

  dependsOn(role: Role, candidate: Role): boolean {
    return this.upstreamsOf(role).includes(candidate);
  }
}

function assertAcyclic(upstreams: ReadonlyMap<Role, readonly Role[]>): void {
  const visiting = new Set<Role>();
  const done = new Set<Role>();

  const visit = (role: Role, trail: Role[]): void => {
    if (done.has(role)) return;
    if (visiting.has(role)) {
      throw new ConfigurationError(`Dependency cycle: ${[...trail, role].join(" -> ")}`);
    }
    visiting.add(role);
    for (const up of upstreams.get(role) ?? []) visit(up, [...trail, role]);
    visiting.delete(role);
    done.add(role);
  };

  for (const role of ROLE_ORDER) visit(role, []);
}
