import { ConfigurationError } from "./errors.js";

export const ROLE_ORDER = ["business", "architecture", "developer", "qa", "audit", "documentation"] as const;

export type Role = (typeof ROLE_ORDER)[number];

export const DEFAULT_ROLE_PORTS: Record<Role, number> = {
  business: 5000,
  architecture: 5001,
  developer: 5002,
  qa: 5003,
  audit: 5004,
  documentation: 5005
};

export function isRole(value: unknown): value is Role {
  return typeof value === "string" && ROLE_ORDER.some((role) => role === value);
}

export function parseRole(value: string | undefined): Role {
  const normalized = value?.trim().toLowerCase();
  if (!isRole(normalized)) {
    throw new ConfigurationError(`Unknown role "${value ?? ""}" (expected one of: ${ROLE_ORDER.join(", ")})`);
  }
  return normalized;
}
